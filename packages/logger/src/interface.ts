import {LogLevel, Logger, LogHandler, LogData} from "@seqguard/utils";

export {LogLevel};
export type {Logger, LogHandler, LogData};

/** Winston levels, lower is more severe */
export const logLevelNum: {[K in LogLevel]: number} = {
  [LogLevel.error]: 0,
  [LogLevel.warn]: 1,
  [LogLevel.info]: 2,
  [LogLevel.verbose]: 3,
  [LogLevel.debug]: 4,
  [LogLevel.trace]: 5,
};

export type LogFormat = "human" | "json";
export const logFormats: LogFormat[] = ["human", "json"];

export function isLogFormat(value: unknown): value is LogFormat {
  return logFormats.some((format) => format === value);
}

export enum TimestampFormatCode {
  DateRegular = "regular",
  Hidden = "hidden",
}
export type TimestampFormat = {format: TimestampFormatCode};

export function isTimestampFormatCode(value: unknown): value is TimestampFormatCode {
  return Object.values(TimestampFormatCode).some((code) => code === value);
}

export type LoggerOpts = {
  level: LogLevel;
  /**
   * Rendered as `[module]` in human output and as a `module` field in json output
   */
  module?: string;
  /**
   * Defaults to "human"
   */
  format?: LogFormat;
  timestampFormat?: TimestampFormat;
};
