/**
 * Filesystem conventions for modes: a mode is a directory holding a
 * `main.js` entry script.
 */

import { existsSync, mkdirSync, readdirSync, statSync, writeFileSync } from "node:fs";
import { basename, extname, join } from "node:path";

export const MODE_ENTRY_FILE = "main.js";

/** Directory prefix given to modes written by {@link writeUploadedMode}. */
export const UPLOADED_PREFIX = "uploaded_";

export interface ModeEntry {
  /** Directory name. */
  readonly name: string;
  /** Path relative to the listed directory. */
  readonly path: string;
}

/** Display name for a mode directory: its basename, minus the upload prefix. */
export function modeDisplayName(directory: string): string {
  const name = basename(directory);
  return name.startsWith(UPLOADED_PREFIX) ? name.slice(UPLOADED_PREFIX.length) : name;
}

/** Subdirectories of `dir` that contain an entry script, sorted by name. A missing directory lists nothing. */
export function listModes(dir: string): ModeEntry[] {
  if (!existsSync(dir)) return [];
  return readdirSync(dir)
    .filter((name) => {
      const full = join(dir, name);
      return statSync(full).isDirectory() && existsSync(join(full, MODE_ENTRY_FILE));
    })
    .sort()
    .map((name) => ({ name, path: name }));
}

/**
 * Write uploaded script content as `<baseDir>/uploaded_<name>/main.js`,
 * `<name>` being `filename` without its extension.
 *
 * @returns The mode directory, ready for loading.
 */
export function writeUploadedMode(baseDir: string, filename: string, content: string): string {
  if (content.trim() === "") {
    throw new Error("File content is empty");
  }
  const stem = basename(filename, extname(filename)) || "mode";
  const directory = join(baseDir, `${UPLOADED_PREFIX}${stem}`);
  mkdirSync(directory, { recursive: true });
  writeFileSync(join(directory, MODE_ENTRY_FILE), content, "utf8");
  return directory;
}
