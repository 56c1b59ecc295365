/**
 * Mode Host: loads a mode directory into a fresh namespace and keeps the
 * one mode that is current.
 *
 * A load either installs a complete mode or changes nothing. The current
 * mode is a single reference swapped in one assignment, so a frame that
 * runs between two loads sees the old mode or the new one, never a mix.
 */

import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import type { Gfx, Surface } from "@vidsynth/surface";
import type { ExecutionContext } from "../context.js";
import type { KnobValues } from "../knobs.js";
import { formatFailure } from "./errors.js";
import { MODE_ENTRY_FILE, modeDisplayName } from "./mode-directory.js";
import { createModeNamespace, lookupGlobal, runInNamespace } from "./namespace.js";

/** Outcome of {@link ModeHost.load}; never thrown. */
export interface LoadResult {
  readonly success: boolean;
  readonly message: string;
}

/** A lifecycle entry point of a mode script. */
export type ModeFunction = (surface: Surface, context: ExecutionContext) => void;

export interface LoadedMode {
  readonly name: string;
  readonly directory: string;
  readonly namespace: Record<string, unknown>;
  readonly setup: ModeFunction | null;
  readonly draw: ModeFunction;
  /** Set once `setup` has completed for this load. */
  setupDone: boolean;
}

export interface ModeHostOptions {
  readonly gfx: Gfx;
  readonly screen: Surface;
  readonly context: ExecutionContext;
  /** Current knob values, bound into each new namespace. */
  readonly knobs: () => KnobValues;
}

function asModeFunction(value: unknown): ModeFunction | null {
  if (typeof value !== "function") return null;
  return (surface, context) => {
    Reflect.apply(value, undefined, [surface, context]);
  };
}

export class ModeHost {
  private current: LoadedMode | null = null;

  constructor(private readonly options: ModeHostOptions) {}

  /** The installed mode, or null before the first successful load. */
  get loaded(): LoadedMode | null {
    return this.current;
  }

  /**
   * Load the mode in `directory`. On failure the previously loaded mode
   * stays current and keeps rendering.
   */
  load(directory: string): LoadResult {
    try {
      const mode = this.prepare(resolve(directory));
      this.current = mode;
      this.options.context.mode = mode.name;
      return { success: true, message: `Mode '${mode.name}' loaded successfully` };
    } catch (err) {
      return { success: false, message: formatFailure("Error loading mode", err) };
    }
  }

  /** Push knob values into the context and the current mode's globals. */
  bindKnobs(values: KnobValues): void {
    this.options.context.applyKnobs(values);
    if (this.current) Object.assign(this.current.namespace, values);
  }

  private prepare(directory: string): LoadedMode {
    const entryFile = join(directory, MODE_ENTRY_FILE);
    if (!existsSync(entryFile)) {
      throw new Error(`${MODE_ENTRY_FILE} not found in ${directory}`);
    }
    const source = readFileSync(entryFile, "utf8");
    const name = modeDisplayName(directory);
    const { gfx, screen, context, knobs } = this.options;

    const namespace = createModeNamespace({ gfx, screen, context, knobs: knobs(), entryFile, modeName: name });
    runInNamespace(namespace, source, entryFile);

    const draw = asModeFunction(lookupGlobal(namespace, "draw"));
    if (!draw) {
      throw new Error("Mode must have a 'draw' function");
    }
    const setup = asModeFunction(lookupGlobal(namespace, "setup"));
    return { name, directory, namespace, setup, draw, setupDone: false };
  }
}
