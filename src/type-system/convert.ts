/**
 * Type Conversion
 *
 * toType() turns a loose type spec into a structural type:
 * - a Type passes through unchanged
 * - a dtype name ('int', 'float', 'bool', 'string') becomes a scalar type
 * - an array of specs becomes a tuple of unnamed elements
 * - a plain record of specs becomes a tuple of named elements, in key order
 * - null and undefined mean "no type"
 */

import { TypeSystemError } from '../error-classes.js';
import type { TupleElement } from '../runtime/core/values.js';
import {
  isDtype,
  isType,
  scalarType,
  tupleType,
  type Dtype,
  type Type,
} from './types.js';

/** Anything toType() accepts */
export type TypeSpec =
  | Type
  | Dtype
  | readonly TypeSpec[]
  | { readonly [name: string]: TypeSpec }
  | null
  | undefined;

function describeSpec(spec: unknown): string {
  if (spec === null) return 'null';
  if (typeof spec === 'string') return JSON.stringify(spec);
  if (Array.isArray(spec)) return 'array';
  return typeof spec;
}

function isPlainRecord(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Convert a spec into a type, or undefined for null/undefined.
 * @throws TypeSystemError (SHAPE-T003) for anything else that is not a spec
 */
export function toType(spec: unknown): Type | undefined {
  if (spec === null || spec === undefined) return undefined;
  if (isType(spec)) return spec;

  if (typeof spec === 'string') {
    if (isDtype(spec)) return scalarType(spec);
    throw new TypeSystemError('SHAPE-T003', {
      spec: describeSpec(spec),
      reason: 'unknown dtype',
    });
  }

  if (Array.isArray(spec)) {
    const elements: TupleElement<Type>[] = spec.map(
      (element: unknown) => [undefined, requireType(element)] as const
    );
    return tupleType(elements);
  }

  if (typeof spec === 'object' && isPlainRecord(spec)) {
    const elements: TupleElement<Type>[] = Object.entries(spec).map(
      ([name, element]: [string, unknown]) =>
        [name, requireType(element)] as const
    );
    return tupleType(elements);
  }

  throw new TypeSystemError('SHAPE-T003', {
    spec: describeSpec(spec),
    reason: 'not a type spec',
  });
}

/** Convert a spec that must describe some type (nested elements) */
function requireType(spec: unknown): Type {
  const type = toType(spec);
  if (type === undefined) {
    throw new TypeSystemError('SHAPE-T003', {
      spec: describeSpec(spec),
      reason: 'tuple elements need a type',
    });
  }
  return type;
}
