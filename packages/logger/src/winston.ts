import winston from "winston";
import type {Logger as Winston} from "winston";
import {getFormat} from "./format.js";
import {Logger, LogData, LogLevel, LoggerOpts, logLevelNum} from "./interface.js";

export class WinstonLogger implements Logger {
  constructor(private readonly winston: Winston) {}

  error(message: string, context?: LogData, error?: Error): void {
    this.write(LogLevel.error, message, context, error);
  }

  warn(message: string, context?: LogData, error?: Error): void {
    this.write(LogLevel.warn, message, context, error);
  }

  info(message: string, context?: LogData, error?: Error): void {
    this.write(LogLevel.info, message, context, error);
  }

  verbose(message: string, context?: LogData, error?: Error): void {
    this.write(LogLevel.verbose, message, context, error);
  }

  debug(message: string, context?: LogData, error?: Error): void {
    this.write(LogLevel.debug, message, context, error);
  }

  private write(level: LogLevel, message: string, context?: LogData, error?: Error): void {
    // A single object argument bypasses winston's splat handling, the formats get the fields untouched
    this.winston.log(level, {message, context, error});
  }
}

/**
 * Logger writing records at or above `opts.level` to stdout
 */
export function getConsoleLogger(opts: LoggerOpts): Logger {
  return new WinstonLogger(
    winston.createLogger({
      level: opts.level,
      levels: logLevelNum,
      defaultMeta: opts.module ? {module: opts.module} : undefined,
      format: getFormat(opts),
      transports: [new winston.transports.Console()],
      exitOnError: false,
    })
  );
}
