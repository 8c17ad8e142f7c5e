/**
 * callshape Module
 * Exports the runtime, the structural type system, and error types
 */

export * from './runtime/index.js';
export * from './type-system/index.js';
export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
} from './error-registry.js';
export {
  AdapterError,
  BindingError,
  createError,
  ReflectionError,
  ShapeError,
  TupleShapeError,
  TypeMismatchError,
  TypeSystemError,
  type MismatchSite,
  type ShapeErrorData,
} from './error-classes.js';
