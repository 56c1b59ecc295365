/**
 * The global scope a mode script runs in.
 *
 * Each load gets a fresh `node:vm` context, so nothing a mode defines at top
 * level survives into the next load. Modes written against either naming
 * convention work: `etc.knob1` and the bare global `knob1` are both bound.
 */

import { createRequire } from "node:module";
import { dirname } from "node:path";
import vm from "node:vm";
import type { Gfx, Surface } from "@vidsynth/surface";
import type { ExecutionContext } from "../context.js";
import type { KnobValues } from "../knobs.js";

export interface NamespaceBindings {
  readonly gfx: Gfx;
  readonly screen: Surface;
  readonly context: ExecutionContext;
  readonly knobs: KnobValues;
  /** Absolute path of the script, for `require` and stack traces. */
  readonly entryFile: string;
  readonly modeName: string;
}

/** Module id under which `require` returns the drawing API. */
export const GFX_MODULE_ID = "gfx";

function taggedConsole(tag: string): Pick<Console, "log" | "info" | "warn" | "error" | "debug"> {
  const prefix = `[mode:${tag}]`;
  return {
    log: (...args: unknown[]) => console.log(prefix, ...args),
    info: (...args: unknown[]) => console.info(prefix, ...args),
    warn: (...args: unknown[]) => console.warn(prefix, ...args),
    error: (...args: unknown[]) => console.error(prefix, ...args),
    debug: (...args: unknown[]) => console.debug(prefix, ...args),
  };
}

/**
 * Build the sandbox object and contextify it. The returned object is the
 * script's global: top-level `function` and `var` declarations appear on it.
 */
export function createModeNamespace(bindings: NamespaceBindings): Record<string, unknown> {
  const nodeRequire = createRequire(bindings.entryFile);
  const sandbox: Record<string, unknown> = {
    gfx: bindings.gfx,
    screen: bindings.screen,
    etc: bindings.context,
    eyesy: bindings.context,
    console: taggedConsole(bindings.modeName),
    require: (id: string): unknown => (id === GFX_MODULE_ID ? bindings.gfx : nodeRequire(id)),
    __filename: bindings.entryFile,
    __dirname: dirname(bindings.entryFile),
    ...bindings.knobs,
  };
  vm.createContext(sandbox, { name: `mode:${bindings.modeName}` });
  return sandbox;
}

/** Run the script's top level once inside the namespace. */
export function runInNamespace(namespace: Record<string, unknown>, source: string, filename: string): void {
  new vm.Script(source, { filename }).runInContext(namespace);
}

/**
 * Read a global binding by name. Top-level `const`, `let` and `class`
 * declarations live in the context's lexical scope rather than on the
 * sandbox object, so the lookup runs inside the context.
 */
export function lookupGlobal(namespace: Record<string, unknown>, name: string): unknown {
  if (!/^[A-Za-z_$][\w$]*$/.test(name)) return undefined;
  const value: unknown = vm.runInContext(`typeof ${name} === "undefined" ? undefined : ${name}`, namespace);
  return value;
}
