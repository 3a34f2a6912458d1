import type { Logger } from "@gesture-deck/control-core";
import { LOG_LEVELS } from "./config";

export type LogLevel = (typeof LOG_LEVELS)[number];

const noop = () => {};

/** Console-backed logger that drops messages below `level`. */
export function createLogger(level: LogLevel, target: Logger = console): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (at: LogLevel) => LOG_LEVELS.indexOf(at) >= threshold;
  return {
    debug: enabled("debug") ? target.debug.bind(target) : noop,
    info: enabled("info") ? target.info.bind(target) : noop,
    warn: enabled("warn") ? target.warn.bind(target) : noop,
    error: enabled("error") ? target.error.bind(target) : noop,
  };
}
