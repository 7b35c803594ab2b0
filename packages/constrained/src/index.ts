export {ConstrainedList} from "./constrainedList.js";
export type {ConstraintSource} from "./constrainedList.js";
export {defineConstrained} from "./derive.js";
export type {ConstrainedListClass, DeclaredElement} from "./derive.js";
export {declareConstraints, getClassConstraints, resolveDeclaration, TypeParameter, typeParameter} from "./declaration.js";
export type {ClassConstraints, DerivationDeclaration} from "./declaration.js";
export {ConstraintError, ConstraintErrorCode} from "./errors.js";
export type {ConstraintErrorType, ConstraintOp, ExpectedShape} from "./errors.js";
export {isIterable, maxArrayLength, MutationGuard, toTypeSet} from "./guard.js";
export {conforms} from "./marker.js";
export type {HasConstraints} from "./marker.js";
export {getDefaultLogger} from "./options.js";
export type {ConstrainedListOpts} from "./options.js";
export {CompatibilityRegistry, compatibilityRegistry, defaultCompatibleTypes, isCompatible} from "./registry.js";
export * from "./typeId.js";
