/**
 * Control-plane message handling: one validated client message in, zero
 * or more replies out. Broadcasts go through the hub.
 */

import { existsSync } from "node:fs";
import { isAbsolute, join } from "node:path";
import { describeError, listModes } from "@vidsynth/core";
import type { Engine, FrameLoop } from "@vidsynth/core";
import type { ClientMessage, ServerMessage } from "./protocol.js";

const TAG = "[vidsynth:server]";

/** Server state that changes at run time. */
export interface ServerState {
  modesDir: string;
}

export interface HandlerContext {
  readonly engine: Engine;
  readonly loop: FrameLoop;
  readonly state: ServerState;
}

export type Reply = (message: ServerMessage) => void;

/** The `modes_list` message for the current modes directory. */
export function modesListMessage(modesDir: string): ServerMessage {
  if (!existsSync(modesDir)) {
    return { type: "modes_list", modes: [], message: "Modes directory not found" };
  }
  return { type: "modes_list", modes: listModes(modesDir) };
}

export function handleClientMessage(ctx: HandlerContext, message: ClientMessage, reply: Reply): void {
  try {
    dispatch(ctx, message, reply);
  } catch (err) {
    reply({ type: "status", message: `Error handling ${message.type}: ${describeError(err).message}`, level: "error" });
  }
}

function dispatch(ctx: HandlerContext, message: ClientMessage, reply: Reply): void {
  const { engine, loop, state } = ctx;
  switch (message.type) {
    case "knob_change":
      if (engine.setKnob(message.knob, message.value)) {
        console.log(`${TAG} Knob ${message.knob} set to ${message.value.toFixed(2)}`);
      }
      return;

    case "load_mode": {
      if (message.path === "") {
        reply({ type: "status", message: "No mode path provided", level: "error" });
        return;
      }
      const directory = isAbsolute(message.path) ? message.path : join(state.modesDir, message.path);
      console.log(`${TAG} Loading mode: ${directory}`);
      const result = engine.loadMode(directory);
      if (!result.success) {
        reply({ type: "status", message: result.message, level: "error" });
        return;
      }
      reply({ type: "status", message: result.message, level: "success" });
      // One frame right away, so the mode shows before rendering starts.
      const frame = engine.renderFrame();
      if (frame.image !== null) reply({ type: "frame", image: frame.image });
      return;
    }

    case "load_mode_content": {
      const result = engine.loadModeSource(message.filename, message.content);
      reply({ type: "status", message: result.message, level: result.success ? "success" : "error" });
      return;
    }

    case "start_rendering": {
      const result = loop.start();
      reply({ type: "status", message: result.message, level: result.started ? "success" : "info" });
      return;
    }

    case "stop_rendering":
      if (!loop.stop()) reply({ type: "rendering_state", isRunning: false });
      reply({ type: "status", message: "Rendering stopped", level: "info" });
      return;

    case "set_audio":
      engine.configureAudio(message.audioType, message.level, message.frequency);
      reply({
        type: "status",
        message: `Audio set to ${message.audioType} (level: ${message.level.toFixed(2)})`,
        level: "success",
      });
      return;

    case "audio_data":
      engine.ingestAudio(message.samples);
      return;

    case "get_modes":
      reply(modesListMessage(state.modesDir));
      return;
  }
}
