/**
 * Express application for the HTTP side of the server:
 * - `GET /health` for startup polling
 * - `GET /api/status` engine status plus the loop's running flag
 * - `GET /api/modes` the modes in the current modes directory
 * - `POST /api/modes-dir` switch the modes directory at run time
 */

import { statSync } from "node:fs";
import { basename } from "node:path";
import express from "express";
import type { NextFunction, Request, Response } from "express";
import { z } from "zod";
import { modesListMessage } from "./handlers.js";
import type { HandlerContext } from "./handlers.js";
import type { ServerMessage } from "./protocol.js";

const modesDirBody = z.object({ modesDir: z.string().min(1) });

/** Simple CORS middleware: allows all origins. */
function corsMiddleware(req: Request, res: Response, next: NextFunction): void {
  res.setHeader("Access-Control-Allow-Origin", "*");
  res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
  res.setHeader("Access-Control-Allow-Headers", "Content-Type");

  if (req.method === "OPTIONS") {
    res.status(204).end();
    return;
  }
  next();
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

export interface AppOptions extends HandlerContext {
  /** Push a message to every connected WebSocket client. */
  readonly broadcast: (message: ServerMessage) => void;
}

export function createApp(options: AppOptions): express.Express {
  const { engine, loop, state, broadcast } = options;
  const app = express();

  app.use(corsMiddleware);
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/api/status", (_req, res) => {
    res.json({ ...engine.getStatus(), isRunning: loop.isRunning, modesDir: state.modesDir });
  });

  app.get("/api/modes", (_req, res) => {
    res.json(modesListMessage(state.modesDir));
  });

  app.post("/api/modes-dir", (req, res) => {
    const body = modesDirBody.safeParse(req.body);
    if (!body.success || !isDirectory(body.data.modesDir)) {
      res.status(400).json({ status: "error", message: "Invalid directory" });
      return;
    }
    state.modesDir = body.data.modesDir;
    console.log(`[vidsynth:server] Modes directory updated to: ${state.modesDir}`);
    broadcast({ type: "status", message: `Modes folder changed to: ${basename(state.modesDir)}`, level: "success" });
    broadcast(modesListMessage(state.modesDir));
    res.json({ status: "ok" });
  });

  return app;
}
