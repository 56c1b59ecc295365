import { fileURLToPath } from "node:url";
import { Engine } from "../src/index.js";
import type { EngineOptions } from "../src/index.js";

/** Absolute path of a fixture mode directory. */
export function fixtureMode(name: string): string {
  return fileURLToPath(new URL(`./fixtures/modes/${name}`, import.meta.url));
}

/** A small engine with a trivial encoder, so tests don't pay for JPEG. */
export function makeEngine(options: EngineOptions = {}): Engine {
  return new Engine({ width: 32, height: 24, encode: () => "data:test", ...options });
}

/** Read a global a mode script defined at top level. */
export function modeGlobal(engine: Engine, name: string): unknown {
  return engine.modes.loaded?.namespace[name];
}
