/**
 * Structural Type Model
 *
 * Types describing the values that flow through adapters. Types are plain
 * immutable data; construct them with the helpers below or with toType().
 */

import {
  validateElementNames,
  type TupleElement,
} from '../runtime/core/values.js';

/** Element dtypes of scalar values */
export type Dtype = 'int' | 'float' | 'bool' | 'string';

export const DTYPES: readonly Dtype[] = ['int', 'float', 'bool', 'string'];

/** A single scalar value */
export interface ScalarType {
  readonly kind: 'scalar';
  readonly dtype: Dtype;
}

/**
 * An ordered tuple of optionally named elements.
 * Element names are unique identifiers.
 */
export interface NamedTupleType {
  readonly kind: 'tuple';
  readonly elements: readonly TupleElement<Type>[];
}

/** A homogeneous sequence of elements */
export interface SequenceType {
  readonly kind: 'sequence';
  readonly element: Type;
}

export type Type = ScalarType | NamedTupleType | SequenceType;

/** Check if a string names a dtype */
export function isDtype(value: string): value is Dtype {
  return DTYPES.some((dtype) => dtype === value);
}

/** Type guard for any structural type */
export function isType(value: unknown): value is Type {
  if (typeof value !== 'object' || value === null || !('kind' in value)) {
    return false;
  }
  switch (value.kind) {
    case 'scalar':
      return 'dtype' in value;
    case 'tuple':
      return 'elements' in value && Array.isArray(value.elements);
    case 'sequence':
      return 'element' in value;
    default:
      return false;
  }
}

/** Type guard for named tuple types */
export function isNamedTupleType(value: unknown): value is NamedTupleType {
  return isType(value) && value.kind === 'tuple';
}

export function scalarType(dtype: Dtype): ScalarType {
  return Object.freeze({ kind: 'scalar', dtype } satisfies ScalarType);
}

/** Create a tuple type; names are validated like tuple value names */
export function tupleType(
  elements: readonly TupleElement<Type>[]
): NamedTupleType {
  validateElementNames(elements);
  const frozen = Object.freeze(
    elements.map(([name, type]) => Object.freeze([name, type] as const))
  );
  return Object.freeze({
    kind: 'tuple',
    elements: frozen,
  } satisfies NamedTupleType);
}

export function sequenceType(element: Type): SequenceType {
  return Object.freeze({ kind: 'sequence', element } satisfies SequenceType);
}
