import {CodedError} from "@seqguard/utils";

/** Entry points that validate their arguments */
export type ConstraintOp =
  | "construct"
  | "declare"
  | "push"
  | "insert"
  | "set"
  | "extend"
  | "concatInPlace"
  | "repeatInPlace"
  | "pop"
  | "register";

export type ExpectedShape = "iterable" | "integer" | "type identifier" | "constructor";

export enum ConstraintErrorCode {
  /** A single element's runtime type is not allowed */
  ELEMENT_TYPE = "CONSTRAINT_ERROR_ELEMENT_TYPE",
  /** An element of a multi-element operation is not allowed, the whole operation is rejected */
  BATCH_TYPE = "CONSTRAINT_ERROR_BATCH_TYPE",
  /** An argument has neither the shape of an element nor of a sequence of elements */
  ARGUMENT_SHAPE = "CONSTRAINT_ERROR_ARGUMENT_SHAPE",
  /** The initial batch does not satisfy the resolved allowed types, no container is produced */
  CONSTRUCTION = "CONSTRAINT_ERROR_CONSTRUCTION",
  INDEX_OUT_OF_RANGE = "CONSTRAINT_ERROR_INDEX_OUT_OF_RANGE",
  /** The operation would grow the container past the maximum array length */
  LENGTH_LIMIT = "CONSTRAINT_ERROR_LENGTH_LIMIT",
  /** A container class can only be declared once */
  DECLARATION_FROZEN = "CONSTRAINT_ERROR_DECLARATION_FROZEN",
}

export type ConstraintErrorType =
  | {code: ConstraintErrorCode.ELEMENT_TYPE; op: ConstraintOp; received: string; allowed: string}
  | {code: ConstraintErrorCode.BATCH_TYPE; op: ConstraintOp; index: number; received: string; allowed: string}
  | {code: ConstraintErrorCode.ARGUMENT_SHAPE; op: ConstraintOp; expected: ExpectedShape; received: string}
  | {code: ConstraintErrorCode.CONSTRUCTION; index: number; received: string; allowed: string}
  | {code: ConstraintErrorCode.INDEX_OUT_OF_RANGE; op: ConstraintOp; index: number; length: number}
  | {code: ConstraintErrorCode.LENGTH_LIMIT; op: ConstraintOp; length: number; limit: number}
  | {code: ConstraintErrorCode.DECLARATION_FROZEN; className: string};

export class ConstraintError extends CodedError<ConstraintErrorType> {
  constructor(type: ConstraintErrorType) {
    super(type, renderErrorMessage(type));
  }
}

function renderErrorMessage(type: ConstraintErrorType): string {
  switch (type.code) {
    case ConstraintErrorCode.ELEMENT_TYPE:
      return `Invalid element type ${type.received} for ${type.op}, allowed ${type.allowed}`;
    case ConstraintErrorCode.BATCH_TYPE:
      return `Invalid element type ${type.received} at index ${type.index} for ${type.op}, allowed ${type.allowed}`;
    case ConstraintErrorCode.ARGUMENT_SHAPE:
      return `Invalid argument for ${type.op}: expected ${type.expected}, received ${type.received}`;
    case ConstraintErrorCode.CONSTRUCTION:
      return `Invalid initial element type ${type.received} at index ${type.index}, allowed ${type.allowed}`;
    case ConstraintErrorCode.INDEX_OUT_OF_RANGE:
      return `Index ${type.index} out of range for ${type.op} on length ${type.length}`;
    case ConstraintErrorCode.LENGTH_LIMIT:
      return `Resulting length ${type.length} of ${type.op} exceeds ${type.limit}`;
    case ConstraintErrorCode.DECLARATION_FROZEN:
      return `Constraints of ${type.className} are already declared`;
  }
}
