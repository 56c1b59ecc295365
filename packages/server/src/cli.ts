#!/usr/bin/env node
/**
 * CLI entry point for the vidsynth server.
 *
 * Usage:
 *   npm start
 *   npm start -- --port 5002 --modes-dir ./my-modes --autostart
 */

import { Engine } from "@vidsynth/core";
import { parseConfig } from "./config.js";
import { createSynthServer } from "./synth-server.js";

async function main(): Promise<void> {
  const config = parseConfig(process.argv);
  const engine = new Engine();
  const server = await createSynthServer({
    engine,
    port: config.port,
    host: config.host,
    modesDir: config.modesDir,
    targetFps: config.fps,
  });

  console.log(`[vidsynth] Server started`);
  console.log(`  http:      http://localhost:${server.port}`);
  console.log(`  ws:        ws://localhost:${server.port}`);
  console.log(`  modes:     ${config.modesDir}`);
  console.log(`  fps:       ${config.fps}`);

  if (config.autostart) server.loop.start();

  const shutdown = (): void => {
    console.log("\n[vidsynth] Shutting down...");
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error("[vidsynth] Error during shutdown:", err);
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  console.error("[vidsynth] Failed to start:", err);
  process.exit(1);
});
