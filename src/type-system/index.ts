/**
 * Structural Type System
 */

export {
  DTYPES,
  isDtype,
  isNamedTupleType,
  isType,
  scalarType,
  sequenceType,
  tupleType,
  type Dtype,
  type NamedTupleType,
  type ScalarType,
  type SequenceType,
  type Type,
} from './types.js';
export { toType, type TypeSpec } from './convert.js';
export { inferType } from './infer.js';
export { isAssignableFrom } from './assignable.js';
export { formatType, typeKey, typesEqual } from './format.js';
