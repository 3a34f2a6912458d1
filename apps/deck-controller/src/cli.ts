import { parseArgs } from "node:util";
import { DeckKeyController } from "@gesture-deck/control-core";
import type { Logger } from "@gesture-deck/control-core";
import { DeckGestureEngine } from "@gesture-deck/gesture-core";
import { JsonlFrameSource, RecordedLandmarkSource } from "@gesture-deck/landmark-source";
import { loadConfig } from "./config";
import { ConfigError } from "./errors";
import { createLogger } from "./logger";
import { runSession } from "./session";
import { createSink } from "./sinks";
import { formatSessionStats } from "./telemetry";
import type { SessionStats } from "./telemetry";

export const USAGE = `Usage: deck-controller [options]

  --config <file>      JSON configuration file
  --recording <file>   landmark recording to replay (one JSON frame per line)
  --sink <name>        simulation | xdotool
  --fps <n>            frame rate cap
  --log-level <level>  debug | info | warn | error | silent
  --help               show this message`;

export interface CliArgs {
  help: boolean;
  config?: string;
  overrides: Record<string, unknown>;
}

const CLI_OPTIONS = {
  config: { type: "string" },
  recording: { type: "string" },
  sink: { type: "string" },
  fps: { type: "string" },
  "log-level": { type: "string" },
  help: { type: "boolean", default: false },
} as const;

function readFlags(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: CLI_OPTIONS, strict: true }).values;
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err));
  }
}

export function parseCliArgs(argv: string[]): CliArgs {
  const values = readFlags(argv);

  // Values are checked against the config schema once merged.
  const overrides: Record<string, unknown> = {};
  if (values.recording !== undefined) overrides.recording = values.recording;
  if (values.sink !== undefined) overrides.sink = values.sink;
  if (values.fps !== undefined) overrides.fps = Number(values.fps);
  if (values["log-level"] !== undefined) overrides.logLevel = values["log-level"];

  return { help: values.help ?? false, config: values.config, overrides };
}

export interface CliEnvironment {
  console?: Logger;
  signal?: AbortSignal;
}

/** Returns null when only the usage text was requested. */
export async function runCli(argv: string[], env: CliEnvironment = {}): Promise<SessionStats | null> {
  const out = env.console ?? console;
  const args = parseCliArgs(argv);
  if (args.help) {
    out.info(USAGE);
    return null;
  }

  const config = await loadConfig(args.config, args.overrides);
  if (!config.recording) {
    throw new ConfigError("No landmark recording given; pass --recording <file> or set \"recording\"");
  }
  const logger = createLogger(config.logLevel, out);

  const frames = await JsonlFrameSource.open(config.recording);
  const engine = new DeckGestureEngine({
    pinchThresholdPx: config.pinchThresholdPx,
    pinchRepeatIntervalMs: config.pinchRepeatIntervalMs,
    geometricFallback: config.geometricFallback,
  });
  const controller = new DeckKeyController(createSink(config, logger), {
    bindings: config.keyBindings,
    emitTimeoutMs: config.emitTimeoutMs,
    logger,
  });

  logger.info(`Replaying ${config.recording} into the ${config.sink} sink`);
  try {
    const stats = await runSession({
      frames,
      landmarks: new RecordedLandmarkSource({ normalized: config.normalizedLandmarks }),
      engine,
      controller,
      fps: config.fps,
      maxConsecutiveFailures: config.maxConsecutiveFailures,
      signal: env.signal,
      logger,
    });
    logger.info(formatSessionStats(stats));
    return stats;
  } finally {
    await frames.close();
  }
}
