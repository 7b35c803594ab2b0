import {Logger, LogLevel, isLogLevel} from "@seqguard/utils";
import {getEmptyLogger} from "./empty.js";
import {LoggerOpts, TimestampFormat, isLogFormat, isTimestampFormatCode} from "./interface.js";
import {getConsoleLogger} from "./winston.js";

export function getEnvLogLevel(): LogLevel | null {
  if (typeof process === "undefined") return null;
  const envLevel = process.env.LOG_LEVEL;
  if (isLogLevel(envLevel)) return envLevel;
  if (process.env.DEBUG) return LogLevel.debug;
  if (process.env.VERBOSE) return LogLevel.verbose;
  return null;
}

function getEnvTimestampFormat(): TimestampFormat | undefined {
  const code = process.env.LOG_TIMESTAMP_FORMAT;
  return isTimestampFormatCode(code) ? {format: code} : undefined;
}

/**
 * Logger configured from environment variables:
 * - `LOG_LEVEL`, or `DEBUG` / `VERBOSE` as shortcuts
 * - `LOG_FORMAT`: "human" | "json"
 * - `LOG_TIMESTAMP_FORMAT`: "regular" | "hidden"
 *
 * Returns a no-op logger if no level is configured. Unknown values are ignored.
 */
export function getEnvLogger(opts?: Partial<LoggerOpts>): Logger {
  const level = opts?.level ?? getEnvLogLevel();
  if (level == null) {
    return getEmptyLogger();
  }

  const envFormat = process.env.LOG_FORMAT;
  const format = opts?.format ?? (isLogFormat(envFormat) ? envFormat : undefined);
  const timestampFormat = opts?.timestampFormat ?? getEnvTimestampFormat();

  return getConsoleLogger({...opts, level, format, timestampFormat});
}
