/**
 * WebSocket client for server tests. Records every message received and
 * lets a test wait for the next one matching a predicate.
 */

import { WebSocket } from "ws";

export type Received = Record<string, unknown> & { readonly type: string };

interface Waiter {
  readonly match: (message: Received) => boolean;
  readonly resolve: (message: Received) => void;
}

function isReceived(value: unknown): value is Received {
  return typeof value === "object" && value !== null && "type" in value && typeof value.type === "string";
}

export class TestClient {
  readonly messages: Received[] = [];
  private readonly waiters: Waiter[] = [];
  private readonly consumed = new Set<number>();

  private constructor(private readonly ws: WebSocket) {
    ws.on("message", (data) => {
      const parsed: unknown = JSON.parse(data.toString());
      if (!isReceived(parsed)) return;
      this.messages.push(parsed);
      this.flush();
    });
  }

  static connect(port: number): Promise<TestClient> {
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(`ws://127.0.0.1:${String(port)}`);
      const client = new TestClient(ws);
      ws.once("open", () => resolve(client));
      ws.once("error", reject);
    });
  }

  send(message: unknown): void {
    this.ws.send(typeof message === "string" ? message : JSON.stringify(message));
  }

  /**
   * The earliest message not yet returned by `next` that matches `type`
   * (and `predicate`, when given).
   */
  next(type: string, predicate: (message: Received) => boolean = () => true, timeoutMs = 2000): Promise<Received> {
    const match = (message: Received): boolean => message.type === type && predicate(message);
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => reject(new Error(`Timed out waiting for '${type}'`)), timeoutMs);
      this.waiters.push({
        match,
        resolve: (message) => {
          clearTimeout(timer);
          resolve(message);
        },
      });
      this.flush();
    });
  }

  close(): Promise<void> {
    return new Promise((resolve) => {
      if (this.ws.readyState === this.ws.CLOSED) {
        resolve();
        return;
      }
      this.ws.once("close", () => resolve());
      this.ws.close();
    });
  }

  private flush(): void {
    while (this.waiters.length > 0) {
      const waiter = this.waiters[0];
      const index = this.messages.findIndex((m, i) => !this.consumed.has(i) && waiter.match(m));
      if (index === -1) return;
      this.consumed.add(index);
      this.waiters.shift();
      waiter.resolve(this.messages[index]);
    }
  }
}
