import {CodedError} from "./errors.js";

export type Json = string | number | boolean | null | undefined | Json[] | {[key: string]: Json};

// Log records carry flat context objects and coded error metadata. Anything nested
// below the first level is not expanded.
const nestedPlaceholder = "[object]";

/**
 * Render log context or an error to a JSON-compatible value
 */
export function logDataToJson(arg: unknown, nested = false): Json {
  if (arg === null) return "null";
  if (typeof arg !== "object") {
    return typeof arg === "string" || typeof arg === "number" || typeof arg === "boolean" || arg === undefined
      ? arg
      : String(arg);
  }

  if (nested) return nestedPlaceholder;
  if (arg instanceof Error) return errorToJson(arg);
  if (Array.isArray(arg)) return arg.map((item: unknown) => logDataToJson(item, true));

  const fields: {[key: string]: Json} = {};
  for (const [key, value] of Object.entries(arg)) {
    fields[key] = logDataToJson(value, true);
  }
  return fields;
}

/**
 * Render log context or an error as `key=value` pairs. Errors are followed by their stack.
 */
export function logDataToString(arg: unknown, nested = false): string {
  if (arg === null || typeof arg !== "object") return String(arg);
  if (nested) return nestedPlaceholder;

  if (arg instanceof Error) {
    const head = arg instanceof CodedError ? logDataToString(arg.getMetadata()) : arg.message;
    return arg.stack ? `${head}\n${arg.stack}` : head;
  }

  if (Array.isArray(arg)) {
    return arg.map((item: unknown) => logDataToString(item, true)).join(", ");
  }

  return Object.entries(arg)
    .map(([key, value]) => `${key}=${logDataToString(value, true)}`)
    .join(", ");
}

function errorToJson(error: Error): {[key: string]: Json} {
  // Coded errors are described by their metadata, the message is rendered from it
  const fields: {[key: string]: Json} = error instanceof CodedError ? {...error.getMetadata()} : {message: error.message};
  if (error.stack) fields.stack = error.stack;
  return fields;
}
