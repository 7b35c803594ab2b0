export type CodedErrorMetadata = Record<string, string | number | null>;
export type CodedErrorObject = CodedErrorMetadata & {stack: string};

/**
 * Generic error with attached metadata. The `type` object carries a machine-readable `code`
 * plus any fields describing the failure, so callers and tests can branch on it.
 */
export class CodedError<T extends {code: string}> extends Error {
  type: T;
  constructor(type: T, message?: string) {
    super(message || type.code);
    this.type = type;
  }

  getMetadata(): CodedErrorMetadata {
    return this.type;
  }

  /**
   * Get the metadata and the stacktrace for the error.
   */
  toObject(): CodedErrorObject {
    return {
      // Ignore message since it's rendered from type
      ...this.getMetadata(),
      stack: this.stack || "",
    };
  }
}

/**
 * Returns true if arg `e` is a `CodedError` whose code is `code`
 */
export function isCodedError<T extends {code: string}>(e: unknown, code: T["code"]): e is CodedError<T> {
  return e instanceof CodedError && e.type.code === code;
}
