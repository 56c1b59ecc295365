/**
 * Where the frame loop sends its output: frames, status lines and
 * running-state changes. The server implements it over WebSocket.
 */

export type StatusLevel = "success" | "info" | "error";

export interface StatusMessage {
  readonly message: string;
  readonly level: StatusLevel;
}

export interface FramePublisher {
  publishFrame(image: string): void;
  publishStatus(status: StatusMessage): void;
  publishRunningState(isRunning: boolean): void;
}
