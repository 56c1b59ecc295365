/**
 * The set of connected WebSocket clients, and the frame loop's publisher.
 * Frames, statuses and running-state changes go to every open client.
 */

import type { WebSocket } from "ws";
import type { FramePublisher, StatusMessage } from "@vidsynth/core";
import type { ServerMessage } from "./protocol.js";

export class ClientHub implements FramePublisher {
  private readonly clients = new Set<WebSocket>();

  get size(): number {
    return this.clients.size;
  }

  add(client: WebSocket): void {
    this.clients.add(client);
  }

  remove(client: WebSocket): void {
    this.clients.delete(client);
  }

  /** Send to one client, if it is still open. */
  send(client: WebSocket, message: ServerMessage): void {
    if (client.readyState === client.OPEN) {
      client.send(JSON.stringify(message));
    }
  }

  broadcast(message: ServerMessage): void {
    const data = JSON.stringify(message);
    for (const client of this.clients) {
      if (client.readyState === client.OPEN) {
        client.send(data);
      }
    }
  }

  publishFrame(image: string): void {
    this.broadcast({ type: "frame", image });
  }

  publishStatus(status: StatusMessage): void {
    this.broadcast({ type: "status", ...status });
  }

  publishRunningState(isRunning: boolean): void {
    this.broadcast({ type: "rendering_state", isRunning });
  }

  closeAll(): void {
    for (const client of this.clients) {
      client.close();
    }
    this.clients.clear();
  }
}
