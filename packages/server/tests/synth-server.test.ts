import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { Engine, TestClock } from "@vidsynth/core";
import { createSynthServer } from "../src/index.js";
import type { SynthServer } from "../src/index.js";
import { TestClient } from "./helpers/test-client.js";

const FIXTURE_MODES = fileURLToPath(new URL("../../core/tests/fixtures/modes", import.meta.url));

describe("createSynthServer", () => {
  let scratch: string;
  let engine: Engine;
  let clock: TestClock;
  let server: SynthServer;
  let client: TestClient;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    scratch = mkdtempSync(join(tmpdir(), "vidsynth-server-"));
    engine = new Engine({ width: 16, height: 16, encode: () => "data:test", uploadDir: scratch });
    clock = new TestClock();
    server = await createSynthServer({ engine, port: 0, host: "127.0.0.1", modesDir: FIXTURE_MODES, clock });
    client = await TestClient.connect(server.port);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
    rmSync(scratch, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  /** Round-trip a message the server always answers, so earlier ones are handled. */
  async function sync(): Promise<void> {
    client.send({ type: "get_modes" });
    await client.next("modes_list");
  }

  it("greets new clients with a status and the running state", async () => {
    expect(await client.next("status")).toEqual({
      type: "status",
      message: "Connected to vidsynth",
      level: "success",
    });
    expect(await client.next("rendering_state")).toEqual({ type: "rendering_state", isRunning: false });
  });

  it("lists the modes directory", async () => {
    client.send({ type: "get_modes" });
    const list = await client.next("modes_list");
    expect(list["modes"]).toEqual(
      [
        "audio-probe",
        "knob-echo",
        "no-draw",
        "solid",
        "syntax-error",
        "throws",
        "top-level-throw",
        "uses-gfx",
      ].map((name) => ({ name, path: name })),
    );
  });

  describe("load_mode", () => {
    it("loads a relative path and sends a first frame", async () => {
      client.send({ type: "load_mode", path: "solid" });
      expect(await client.next("status", (m) => m["message"] !== "Connected to vidsynth")).toEqual({
        type: "status",
        message: "Mode 'solid' loaded successfully",
        level: "success",
      });
      expect(await client.next("frame")).toEqual({ type: "frame", image: "data:test" });
    });

    it("reports load failures", async () => {
      client.send({ type: "load_mode", path: "no-draw" });
      const status = await client.next("status", (m) => m["level"] === "error");
      expect(String(status["message"]).split("\n")[0]).toBe("Error loading mode: Mode must have a 'draw' function");
    });

    it("requires a path", async () => {
      client.send({ type: "load_mode" });
      const status = await client.next("status", (m) => m["level"] === "error");
      expect(status["message"]).toBe("No mode path provided");
    });
  });

  it("loads uploaded mode source", async () => {
    client.send({
      type: "load_mode_content",
      filename: "upload.js",
      content: "function draw(screen) { screen.fill([0, 255, 0]); }",
    });
    const status = await client.next("status", (m) => m["message"] !== "Connected to vidsynth");
    expect(status).toEqual({ type: "status", message: 'Uploaded mode "upload.js" loaded successfully', level: "success" });
    expect(engine.context.mode).toBe("upload");
  });

  describe("rendering", () => {
    it("starts and stops the loop for every client", async () => {
      const other = await TestClient.connect(server.port);
      client.send({ type: "load_mode", path: "solid" });
      await client.next("frame");

      client.send({ type: "start_rendering" });
      expect(await client.next("status", (m) => m["message"] === "Rendering started")).toMatchObject({
        level: "success",
      });
      expect(await other.next("rendering_state", (m) => m["isRunning"] === true)).toBeDefined();

      clock.advance(0);
      expect(await other.next("frame")).toEqual({ type: "frame", image: "data:test" });

      client.send({ type: "start_rendering" });
      expect(await client.next("status", (m) => m["message"] === "Already running")).toMatchObject({
        level: "info",
      });

      client.send({ type: "stop_rendering" });
      expect(await other.next("rendering_state", (m) => m["isRunning"] === false)).toBeDefined();
      expect(await client.next("status", (m) => m["message"] === "Rendering stopped")).toMatchObject({
        level: "info",
      });
      expect(server.loop.isRunning).toBe(false);
      await other.close();
    });

    it("broadcasts render errors", async () => {
      client.send({ type: "load_mode", path: "throws" });
      await client.next("status", (m) => m["message"] === "Mode 'throws' loaded successfully");
      client.send({ type: "start_rendering" });
      await client.next("status", (m) => m["message"] === "Rendering started");

      clock.advance(0);
      const status = await client.next("status", (m) => m["level"] === "error");
      expect(status["message"]).toBe("Render error (1): Error rendering frame: draw exploded");
    });
  });

  describe("controls", () => {
    it("applies knob changes", async () => {
      client.send({ type: "knob_change", knob: 2, value: 0.25 });
      await sync();
      expect(engine.getStatus().knobs.knob2).toBe(0.25);
    });

    it("configures audio", async () => {
      client.send({ type: "set_audio", audioType: "noise", level: 0.3 });
      const status = await client.next("status", (m) => m["message"] !== "Connected to vidsynth");
      expect(status).toEqual({ type: "status", message: "Audio set to noise (level: 0.30)", level: "success" });
      expect(engine.audio.snapshot()).toMatchObject({ type: "noise", level: 0.3, frequency: 440 });
    });

    it("ingests captured audio", async () => {
      client.send({ type: "audio_data", samples: [200, 56, 200, 56] });
      await sync();
      expect(engine.audio.snapshot().externalAudioReceived).toBe(true);
      expect(engine.context.audioIn[0]).toBe(18432);
    });

    it("ignores captured audio that is not a sequence", async () => {
      client.send({ type: "audio_data", samples: "loud" });
      client.send({ type: "audio_data", samples: 7 });
      await sync();
      expect(engine.audio.snapshot().externalAudioReceived).toBe(false);
      expect(client.messages.filter((m) => m["level"] === "error")).toEqual([]);
    });
  });

  describe("invalid messages", () => {
    it("rejects text that is not JSON", async () => {
      client.send("knob 1 up");
      const status = await client.next("status", (m) => m["level"] === "error");
      expect(status["message"]).toBe("Invalid message: not valid JSON");
    });

    it("rejects fields of the wrong type", async () => {
      client.send({ type: "knob_change", knob: "one", value: 0.5 });
      const status = await client.next("status", (m) => m["level"] === "error");
      expect(status["message"]).toBe("Invalid message: knob: Expected number, received string");
      expect(engine.getStatus().knobs.knob1).toBe(0.5);
    });

    it("rejects unknown message types", async () => {
      client.send({ type: "dance" });
      const status = await client.next("status", (m) => m["level"] === "error");
      expect(String(status["message"]).startsWith("Invalid message: type: Invalid discriminator value")).toBe(true);
    });
  });

  describe("HTTP", () => {
    const url = (path: string): string => `http://127.0.0.1:${String(server.port)}${path}`;

    it("answers health checks", async () => {
      const res = await fetch(url("/health"));
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: "ok" });
    });

    it("reports engine status", async () => {
      const res = await fetch(url("/api/status"));
      expect(await res.json()).toMatchObject({
        modeLoaded: false,
        currentMode: "unknown",
        resolution: [16, 16],
        isRunning: false,
        modesDir: FIXTURE_MODES,
      });
    });

    it("switches the modes directory and tells every client", async () => {
      const dir = join(scratch, "my-modes");
      mkdirSync(join(dir, "pulse"), { recursive: true });
      writeFileSync(join(dir, "pulse", "main.js"), "function draw() {}");

      const res = await fetch(url("/api/modes-dir"), {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ modesDir: dir }),
      });
      expect(res.status).toBe(200);
      expect(await client.next("status", (m) => m["message"] === `Modes folder changed to: ${basename(dir)}`)).toMatchObject({
        level: "success",
      });
      expect((await client.next("modes_list"))["modes"]).toEqual([{ name: "pulse", path: "pulse" }]);

      client.send({ type: "load_mode", path: "pulse" });
      expect(await client.next("status", (m) => m["message"] === "Mode 'pulse' loaded successfully")).toBeDefined();
    });

    it("rejects a modes directory that does not exist", async () => {
      const res = await fetch(url("/api/modes-dir"), {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ modesDir: join(scratch, "missing") }),
      });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ status: "error", message: "Invalid directory" });
    });
  });
});
