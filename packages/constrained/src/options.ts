import {Logger} from "@seqguard/utils";
import {getEnvLogger} from "@seqguard/logger";
import {TypeId} from "./typeId.js";

export type ConstrainedListOpts = {
  /**
   * Explicit allowed types, overriding the class-level declaration and inference
   */
  constraints?: Iterable<TypeId>;
  /**
   * Defaults to a logger configured from `LOG_LEVEL`, `LOG_FORMAT` and `LOG_TIMESTAMP_FORMAT`,
   * which writes nothing unless a level is set
   */
  logger?: Logger;
};

export const defaultLoggerModule = "constrained";

let defaultLogger: Logger | null = null;

/**
 * Environment is read once, on the first construction that does not pass its own logger
 */
export function getDefaultLogger(): Logger {
  if (defaultLogger === null) {
    defaultLogger = getEnvLogger({module: defaultLoggerModule});
  }
  return defaultLogger;
}
