/**
 * Value Types and Utilities
 *
 * Runtime values that flow through adapters, and the anonymous tuple used
 * to bundle call arguments into a single value.
 * Public API for host applications.
 */

import { TupleShapeError } from '../../error-classes.js';

/** One element of an anonymous tuple: an optional name and a payload */
export type TupleElement<T> = readonly [name: string | undefined, value: T];

/**
 * Anonymous tuple - an ordered sequence of named and unnamed elements.
 *
 * Used to bundle positional and keyword call arguments into one value.
 * Named elements may appear anywhere; a tuple whose unnamed elements all
 * precede its named ones is an *argument tuple* (see isArgumentTuple).
 */
export interface AnonymousTuple {
  readonly __shape_tuple: true;
  readonly elements: readonly TupleElement<ArgValue>[];
}

/** Any value that can flow through an adapter */
export type ArgValue =
  | string
  | number
  | boolean
  | null
  | readonly ArgValue[]
  | AnonymousTuple;

/** Keyword arguments; entries keep the record's insertion order */
export type KeywordArgs<T> = Readonly<Record<string, T>>;

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/** Check that a name can label a tuple element or a parameter */
export function isIdentifier(name: string): boolean {
  return IDENTIFIER.test(name) && name !== '__proto__';
}

/** Type guard for AnonymousTuple */
export function isAnonymousTuple(value: unknown): value is AnonymousTuple {
  return (
    typeof value === 'object' &&
    value !== null &&
    '__shape_tuple' in value &&
    value.__shape_tuple === true
  );
}

/**
 * Validate element names shared by tuple values and tuple types.
 * Names must be identifiers and unique within the tuple.
 */
export function validateElementNames(
  elements: readonly TupleElement<unknown>[]
): void {
  const seen = new Set<string>();
  for (const [name] of elements) {
    if (name === undefined) continue;
    if (!isIdentifier(name)) {
      throw new TupleShapeError('SHAPE-S003', {
        name: JSON.stringify(name),
        reason: 'not an identifier',
      });
    }
    if (seen.has(name)) {
      throw new TupleShapeError('SHAPE-S003', {
        name: JSON.stringify(name),
        reason: 'duplicate name',
      });
    }
    seen.add(name);
  }
}

/** Create an immutable anonymous tuple from elements */
export function createTuple(
  elements: readonly TupleElement<ArgValue>[]
): AnonymousTuple {
  validateElementNames(elements);
  const frozen = Object.freeze(
    elements.map(([name, value]) => Object.freeze([name, value] as const))
  );
  const tuple: AnonymousTuple = { __shape_tuple: true, elements: frozen };
  return Object.freeze(tuple);
}

/**
 * Pack positional and keyword arguments into an argument tuple.
 * Positional values come first (unnamed), then keywords in insertion order.
 */
export function packArgs(
  positional: readonly ArgValue[],
  keyword: KeywordArgs<ArgValue> = {}
): AnonymousTuple {
  const elements: TupleElement<ArgValue>[] = positional.map(
    (value) => [undefined, value] as const
  );
  for (const [name, value] of Object.entries(keyword)) {
    elements.push([name, value]);
  }
  return createTuple(elements);
}

/** Get the value of the element at an index, or undefined past the end */
export function elementAt(
  tuple: AnonymousTuple,
  index: number
): ArgValue | undefined {
  return tuple.elements[index]?.[1];
}

/** Get the value of the element with a name, or undefined when absent */
export function elementNamed(
  tuple: AnonymousTuple,
  name: string
): ArgValue | undefined {
  return tuple.elements.find(([n]) => n === name)?.[1];
}

/** Format a value for display in messages */
export function formatValue(value: ArgValue): string {
  if (value === null) return 'null';
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'number') return String(value);
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (isAnonymousTuple(value)) {
    const parts = value.elements.map(([name, val]) =>
      name === undefined ? formatValue(val) : `${name}=${formatValue(val)}`
    );
    return `<${parts.join(',')}>`;
  }
  return `[${value.map(formatValue).join(',')}]`;
}
