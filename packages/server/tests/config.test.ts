import { describe, it, expect } from "vitest";
import { DEFAULT_HOST, DEFAULT_MODES_DIR, DEFAULT_PORT, parseConfig } from "../src/config.js";

describe("parseConfig", () => {
  it("uses defaults with no flags or environment", () => {
    expect(parseConfig(["node", "cli.js"], {})).toEqual({
      port: DEFAULT_PORT,
      host: DEFAULT_HOST,
      modesDir: DEFAULT_MODES_DIR,
      fps: 30,
      autostart: false,
    });
  });

  it("points the default modes directory at the repository's modes folder", () => {
    expect(DEFAULT_MODES_DIR.endsWith("modes")).toBe(true);
  });

  it("parses every flag", () => {
    const config = parseConfig(
      ["node", "cli.js", "--port", "5002", "--host", "127.0.0.1", "--modes-dir", "/srv/modes", "--fps", "60", "--autostart"],
      {},
    );
    expect(config).toEqual({ port: 5002, host: "127.0.0.1", modesDir: "/srv/modes", fps: 60, autostart: true });
  });

  it("falls back to environment variables", () => {
    const config = parseConfig(["node", "cli.js"], {
      VIDSYNTH_PORT: "6000",
      VIDSYNTH_HOST: "localhost",
      VIDSYNTH_MODES_DIR: "/opt/modes",
    });
    expect(config.port).toBe(6000);
    expect(config.host).toBe("localhost");
    expect(config.modesDir).toBe("/opt/modes");
  });

  it("prefers flags over the environment", () => {
    const config = parseConfig(["node", "cli.js", "--port", "7000"], { VIDSYNTH_PORT: "6000" });
    expect(config.port).toBe(7000);
  });

  it("ignores malformed numbers", () => {
    const config = parseConfig(["node", "cli.js", "--port", "http", "--fps", "-5"], { VIDSYNTH_PORT: "99999" });
    expect(config.port).toBe(DEFAULT_PORT);
    expect(config.fps).toBe(30);
  });

  it("ignores a flag missing its value", () => {
    expect(parseConfig(["node", "cli.js", "--port"], {}).port).toBe(DEFAULT_PORT);
  });
});
