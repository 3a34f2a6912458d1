import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigError } from "./errors";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export const configSchema = z
  .object({
    pinchThresholdPx: z.number().positive().default(30),
    pinchRepeatIntervalMs: z.number().nonnegative().default(200),
    geometricFallback: z.boolean().default(true),
    fps: z.number().nonnegative().max(240).default(30),
    emitTimeoutMs: z.number().int().positive().default(250),
    maxConsecutiveFailures: z.number().int().positive().default(30),
    sink: z.enum(["simulation", "xdotool"]).default("simulation"),
    recording: z.string().min(1).nullable().default(null),
    normalizedLandmarks: z.boolean().default(true),
    logLevel: z.enum(LOG_LEVELS).default("info"),
    keyBindings: z.record(z.string()).default({}),
  })
  .strict();

export type DeckControllerConfig = z.infer<typeof configSchema>;

export function parseConfig(input: unknown): DeckControllerConfig {
  const parsed = configSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid configuration",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/** Reads the optional config file and lays the overrides over it. */
export async function loadConfig(path?: string, overrides: Record<string, unknown> = {}): Promise<DeckControllerConfig> {
  const fromFile = path ? await readConfigFile(path) : {};
  return parseConfig({ ...fromFile, ...overrides });
}

async function readConfigFile(path: string): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Config file ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  const object = z.record(z.unknown()).safeParse(json);
  if (!object.success) {
    throw new ConfigError(`Config file ${path} must contain a JSON object`);
  }
  return object.data;
}
