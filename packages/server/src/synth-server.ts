/**
 * HTTP + WebSocket server that drives an {@link Engine} and streams its
 * frames to every connected client.
 *
 * Usage:
 * ```ts
 * const server = await createSynthServer({ engine, port: 5001, modesDir: "./modes" });
 * // later:
 * await server.close();
 * ```
 */

import { createServer } from "node:http";
import { WebSocketServer } from "ws";
import { FrameLoop, NodeClock } from "@vidsynth/core";
import type { Clock, Engine } from "@vidsynth/core";
import { createApp } from "./app.js";
import { ClientHub } from "./client-hub.js";
import { handleClientMessage } from "./handlers.js";
import type { ServerState } from "./handlers.js";
import { parseClientMessage } from "./protocol.js";

const TAG = "[vidsynth:server]";

export interface SynthServerOptions {
  readonly engine: Engine;
  /** Port to listen on; 0 picks a free one. Defaults to 5001. */
  readonly port?: number;
  /** Defaults to all interfaces. */
  readonly host?: string;
  /** Directory that relative `load_mode` paths resolve against. */
  readonly modesDir: string;
  readonly targetFps?: number;
  readonly maxConsecutiveErrors?: number;
  /** Defaults to a real-time {@link NodeClock}. */
  readonly clock?: Clock;
}

/** Handle to the running server. */
export interface SynthServer {
  /** The port actually bound. */
  readonly port: number;
  readonly loop: FrameLoop;
  /** Stop rendering, disconnect clients and stop listening. */
  close(): Promise<void>;
}

export function createSynthServer(options: SynthServerOptions): Promise<SynthServer> {
  const { engine } = options;
  const state: ServerState = { modesDir: options.modesDir };
  const hub = new ClientHub();
  const loop = new FrameLoop({
    source: engine,
    publisher: hub,
    clock: options.clock ?? new NodeClock(),
    targetFps: options.targetFps,
    maxConsecutiveErrors: options.maxConsecutiveErrors,
  });
  const ctx = { engine, loop, state };

  const app = createApp({ ...ctx, broadcast: (message) => hub.broadcast(message) });
  const httpServer = createServer(app);
  const wss = new WebSocketServer({ server: httpServer });

  wss.on("connection", (ws) => {
    hub.add(ws);
    console.log(`${TAG} Client connected (${hub.size} total)`);
    hub.send(ws, { type: "status", message: "Connected to vidsynth", level: "success" });
    hub.send(ws, { type: "rendering_state", isRunning: loop.isRunning });

    ws.on("message", (raw) => {
      const parsed = parseClientMessage(raw.toString());
      if (!parsed.ok) {
        hub.send(ws, { type: "status", message: parsed.error, level: "error" });
        return;
      }
      handleClientMessage(ctx, parsed.message, (message) => hub.send(ws, message));
    });

    ws.on("close", () => {
      hub.remove(ws);
      console.log(`${TAG} Client disconnected (${hub.size} total)`);
    });
  });

  const close = (): Promise<void> =>
    new Promise((resolve, reject) => {
      loop.stop();
      hub.closeAll();
      wss.close();
      httpServer.close((err) => (err ? reject(err) : resolve()));
      httpServer.closeAllConnections();
    });

  return new Promise((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(options.port ?? 5001, options.host ?? "0.0.0.0", () => {
      httpServer.off("error", reject);
      const address = httpServer.address();
      const port = typeof address === "object" && address !== null ? address.port : (options.port ?? 5001);
      resolve({ port, loop, close });
    });
  });
}
