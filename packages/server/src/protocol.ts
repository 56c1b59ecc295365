/**
 * Wire protocol between the control panel and the server.
 *
 * Every message is a JSON object with a `type` field. Client messages are
 * validated with zod; anything that fails validation gets an error status
 * back and is otherwise ignored.
 */

import { z } from "zod";
import type { ModeEntry, StatusLevel } from "@vidsynth/core";

const knobChange = z.object({
  type: z.literal("knob_change"),
  knob: z.number(),
  value: z.number(),
});

const loadMode = z.object({
  type: z.literal("load_mode"),
  path: z.string().default(""),
});

const loadModeContent = z.object({
  type: z.literal("load_mode_content"),
  filename: z.string().default("uploaded_mode.js"),
  content: z.string().default(""),
});

const setAudio = z.object({
  type: z.literal("set_audio"),
  audioType: z.string().default("sine"),
  level: z.number().default(0.5),
  frequency: z.number().default(440),
});

// Anything that is not a byte sequence is ignored by the audio state, not rejected.
const audioData = z.object({
  type: z.literal("audio_data"),
  samples: z.unknown(),
});

export const clientMessageSchema = z.discriminatedUnion("type", [
  knobChange,
  loadMode,
  loadModeContent,
  z.object({ type: z.literal("start_rendering") }),
  z.object({ type: z.literal("stop_rendering") }),
  setAudio,
  audioData,
  z.object({ type: z.literal("get_modes") }),
]);

export type ClientMessage = z.infer<typeof clientMessageSchema>;

export type ServerMessage =
  | { readonly type: "frame"; readonly image: string }
  | { readonly type: "status"; readonly message: string; readonly level: StatusLevel }
  | { readonly type: "rendering_state"; readonly isRunning: boolean }
  | { readonly type: "modes_list"; readonly modes: readonly ModeEntry[]; readonly message?: string };

export type ParseResult =
  | { readonly ok: true; readonly message: ClientMessage }
  | { readonly ok: false; readonly error: string };

/** Decode and validate one inbound text frame. */
export function parseClientMessage(raw: string): ParseResult {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, error: "Invalid message: not valid JSON" };
  }
  const result = clientMessageSchema.safeParse(json);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    return { ok: false, error: `Invalid message: ${detail}` };
  }
  return { ok: true, message: result.data };
}
