/**
 * CLI argument parsing for the vidsynth server.
 *
 * Supports:
 *   vidsynth
 *   vidsynth --port 5002 --modes-dir ./my-modes
 *   vidsynth --fps 60 --autostart
 */

import { fileURLToPath } from "node:url";

export interface ServerConfig {
  readonly port: number;
  readonly host: string;
  /** Directory that holds one subdirectory per mode. */
  readonly modesDir: string;
  readonly fps: number;
  /** Start the frame loop at boot instead of waiting for a client. */
  readonly autostart: boolean;
}

export const DEFAULT_PORT = 5001;
export const DEFAULT_HOST = "0.0.0.0";
/** The `modes/` directory at the repository root. */
export const DEFAULT_MODES_DIR = fileURLToPath(new URL("../../../modes", import.meta.url));

function positiveNumber(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  return Number.isFinite(n) && n > 0 ? n : undefined;
}

function portNumber(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  return Number.isInteger(n) && n >= 0 && n <= 65535 ? n : undefined;
}

/**
 * Parses process.argv into a ServerConfig. Flags win over environment
 * variables (`VIDSYNTH_PORT`, `VIDSYNTH_HOST`, `VIDSYNTH_MODES_DIR`).
 *
 * @param argv - The full process.argv array
 */
export function parseConfig(
  argv: readonly string[],
  env: Readonly<Record<string, string | undefined>> = process.env,
): ServerConfig {
  const args = argv.slice(2); // skip node + script

  let port: number | undefined;
  let host: string | undefined;
  let modesDir: string | undefined;
  let fps: number | undefined;
  let autostart = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];
    if (arg === "--port" && next !== undefined) {
      port = portNumber(next);
      i++;
    } else if (arg === "--host" && next !== undefined) {
      host = next;
      i++;
    } else if (arg === "--modes-dir" && next !== undefined) {
      modesDir = next;
      i++;
    } else if (arg === "--fps" && next !== undefined) {
      fps = positiveNumber(next);
      i++;
    } else if (arg === "--autostart") {
      autostart = true;
    }
  }

  return {
    port: port ?? portNumber(env["VIDSYNTH_PORT"]) ?? DEFAULT_PORT,
    host: host ?? env["VIDSYNTH_HOST"] ?? DEFAULT_HOST,
    modesDir: modesDir ?? env["VIDSYNTH_MODES_DIR"] ?? DEFAULT_MODES_DIR,
    fps: fps ?? 30,
    autostart,
  };
}
