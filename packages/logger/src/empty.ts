import {Logger} from "@seqguard/utils";

function discard(): void {
  // Logging disabled
}

/**
 * Logger that drops every record, used when no level is configured
 */
export function getEmptyLogger(): Logger {
  return {error: discard, warn: discard, info: discard, verbose: discard, debug: discard};
}
