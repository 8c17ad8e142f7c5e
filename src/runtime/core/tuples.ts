/**
 * Argument Tuple Classification
 *
 * Works uniformly on tuple values (AnonymousTuple) and tuple types
 * (anything toType() turns into a NamedTupleType).
 */

import { TupleShapeError } from '../../error-classes.js';
import { toType, type TypeSpec } from '../../type-system/convert.js';
import { formatType } from '../../type-system/format.js';
import type { Type } from '../../type-system/types.js';
import {
  isAnonymousTuple,
  packArgs,
  type AnonymousTuple,
  type ArgValue,
  type TupleElement,
} from './values.js';

/** A tuple value or a spec of a tuple type */
export type TupleLike = AnonymousTuple | TypeSpec;

/** Elements of an argument tuple split into positional and named parts */
export interface Unpacked<T> {
  readonly positional: readonly T[];
  readonly named: ReadonlyMap<string, T>;
}

/**
 * Get the elements of a tuple value or tuple type.
 * @throws TupleShapeError (SHAPE-S001) when the input is neither
 */
export function classify(x: AnonymousTuple): readonly TupleElement<ArgValue>[];
export function classify(x: TypeSpec): readonly TupleElement<Type>[];
export function classify(
  x: TupleLike
): readonly TupleElement<ArgValue | Type>[];
export function classify(
  x: TupleLike
): readonly TupleElement<ArgValue | Type>[] {
  if (isAnonymousTuple(x)) return x.elements;

  const type = toType(x);
  if (type?.kind === 'tuple') return type.elements;

  throw new TupleShapeError('SHAPE-S001', {
    found: type === undefined ? 'no type' : formatType(type),
  });
}

/**
 * Check that every unnamed element precedes every named element.
 * Non-tuple types are not argument tuples; the empty tuple is one.
 */
export function isArgumentTuple(x: TupleLike): boolean {
  let elements: readonly TupleElement<ArgValue | Type>[];
  try {
    elements = classify(x);
  } catch (error) {
    if (error instanceof TupleShapeError && error.errorId === 'SHAPE-S001') {
      return false;
    }
    throw error;
  }

  let lastUnnamed = -1;
  let firstNamed = elements.length;
  elements.forEach(([name], idx) => {
    if (name === undefined) {
      lastUnnamed = idx;
    } else {
      firstNamed = Math.min(firstNamed, idx);
    }
  });
  return lastUnnamed < firstNamed;
}

/**
 * Split an argument tuple into positional and named parts.
 * Positional order and named insertion order follow the tuple.
 * @throws TupleShapeError (SHAPE-S001) unless isArgumentTuple(x)
 */
export function unpack(x: AnonymousTuple): Unpacked<ArgValue>;
export function unpack(x: TypeSpec): Unpacked<Type>;
export function unpack(x: TupleLike): Unpacked<ArgValue | Type>;
export function unpack(x: TupleLike): Unpacked<ArgValue | Type> {
  if (!isArgumentTuple(x)) {
    throw new TupleShapeError('SHAPE-S001', { found: describeShape(x) });
  }

  const positional: (ArgValue | Type)[] = [];
  const named = new Map<string, ArgValue | Type>();
  for (const [name, element] of classify(x)) {
    if (name === undefined) {
      positional.push(element);
    } else {
      named.set(name, element);
    }
  }
  return { positional, named };
}

/** Pack unpacked parts back into an argument tuple */
export function repack(parts: Unpacked<ArgValue>): AnonymousTuple {
  return packArgs(parts.positional, Object.fromEntries(parts.named));
}

function describeShape(x: TupleLike): string {
  if (isAnonymousTuple(x)) return 'a tuple with named elements first';
  const type = toType(x);
  return type === undefined ? 'no type' : formatType(type);
}
