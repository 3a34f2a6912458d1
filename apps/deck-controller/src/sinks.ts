import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { toError } from "@gesture-deck/control-core";
import type { Logger, OutputSink, SinkResult } from "@gesture-deck/control-core";
import type { DeckControllerConfig } from "./config";

export type CommandRunner = (command: string, args: string[], options: { timeout: number }) => Promise<unknown>;

const execFileAsync = promisify(execFile);

const KEYSYMS: Record<string, string> = {
  ";": "semicolon",
  ",": "comma",
  ".": "period",
  "/": "slash",
  " ": "space",
};

/** Mixxx shortcut symbol to X keysym name. */
export function toKeysym(key: string): string {
  if (KEYSYMS[key]) return KEYSYMS[key];
  if (/^f\d{1,2}$/.test(key)) return key.toUpperCase();
  return key;
}

export class SimulationSink implements OutputSink {
  readonly kind = "simulation";

  constructor(private readonly logger: Logger = console) {}

  async emit(key: string): Promise<SinkResult> {
    this.logger.info(`SIMULATION: pressed key '${key}'`);
    return { ok: true };
  }
}

/**
 * Presses keys in the focused X11 window through xdotool. A child still
 * running after `timeoutMs` is killed.
 */
export class XdotoolSink implements OutputSink {
  readonly kind = "xdotool";

  constructor(
    readonly timeoutMs: number,
    private readonly run: CommandRunner = (command, args, options) => execFileAsync(command, args, options)
  ) {}

  async emit(key: string): Promise<SinkResult> {
    try {
      await this.run("xdotool", ["key", "--clearmodifiers", toKeysym(key)], { timeout: this.timeoutMs });
      return { ok: true };
    } catch (err) {
      return { ok: false, error: toError(err) };
    }
  }
}

export function createSink(config: Pick<DeckControllerConfig, "sink" | "emitTimeoutMs">, logger: Logger): OutputSink {
  switch (config.sink) {
    case "xdotool":
      return new XdotoolSink(config.emitTimeoutMs);
    case "simulation":
      return new SimulationSink(logger);
  }
}
