import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { USAGE, parseCliArgs, runCli } from "../src/cli";
import { ConfigError } from "../src/errors";
import { detection, recordedFrame } from "./fixtures";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "deck-cli-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function captureConsole() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("parseCliArgs", () => {
  it("turns flags into config overrides", () => {
    expect(parseCliArgs(["--config", "deck.json", "--fps", "15", "--sink", "xdotool", "--log-level", "debug"])).toEqual({
      help: false,
      config: "deck.json",
      overrides: { fps: 15, sink: "xdotool", logLevel: "debug" },
    });
  });

  it("rejects unknown flags", () => {
    expect(() => parseCliArgs(["--volume", "3"])).toThrow(ConfigError);
  });
});

describe("runCli", () => {
  it("prints usage for --help", async () => {
    const out = captureConsole();
    expect(await runCli(["--help"], { console: out })).toBeNull();
    expect(out.info).toHaveBeenCalledWith(USAGE);
  });

  it("requires a recording", async () => {
    await expect(runCli([], { console: captureConsole() })).rejects.toBeInstanceOf(ConfigError);
  });

  it("replays a recording into the simulation sink", async () => {
    const recording = join(dir, "session.jsonl");
    const frames = [
      recordedFrame([detection("Right", "fist")]),
      recordedFrame([detection("Right", "fist")]),
      recordedFrame([detection("Left", "open", true)]),
    ];
    await writeFile(recording, frames.map((f) => JSON.stringify(f)).join("\n"), "utf8");
    const config = join(dir, "config.json");
    await writeFile(config, JSON.stringify({ normalizedLandmarks: false, fps: 0 }), "utf8");
    const out = captureConsole();

    const stats = await runCli(["--config", config, "--recording", recording], { console: out });

    expect(stats?.frames).toBe(3);
    expect(stats?.events).toBe(2);
    expect(out.info).toHaveBeenCalledWith("SIMULATION: pressed key 'd'");
    expect(out.info).toHaveBeenCalledWith("SIMULATION: pressed key 'h'");
    expect(out.info).toHaveBeenCalledWith("left deck: Playing");
    expect(out.debug).not.toHaveBeenCalled();
  });
});
