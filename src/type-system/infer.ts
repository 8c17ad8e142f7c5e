/**
 * Type Inference
 *
 * Infers the structural type of a runtime value.
 */

import { TypeSystemError } from '../error-classes.js';
import {
  formatValue,
  isAnonymousTuple,
  type ArgValue,
} from '../runtime/core/values.js';
import { formatType, typeKey } from './format.js';
import { scalarType, sequenceType, tupleType, type Type } from './types.js';

/**
 * Infer the type of a value.
 * - integers are `int`, other numbers `float`
 * - arrays are sequences of their common element type
 * - anonymous tuples keep element names and order
 * @throws TypeSystemError (SHAPE-T002) for null, empty arrays, and arrays
 * whose elements disagree on type
 */
export function inferType(value: ArgValue): Type {
  if (value === null) {
    throw new TypeSystemError('SHAPE-T002', {
      value: 'null',
      reason: 'null carries no type',
    });
  }
  if (typeof value === 'string') return scalarType('string');
  if (typeof value === 'boolean') return scalarType('bool');
  if (typeof value === 'number') {
    return scalarType(Number.isInteger(value) ? 'int' : 'float');
  }
  if (isAnonymousTuple(value)) {
    return tupleType(
      value.elements.map(
        ([name, element]) => [name, inferType(element)] as const
      )
    );
  }

  const [first, ...rest] = value;
  if (first === undefined) {
    throw new TypeSystemError('SHAPE-T002', {
      value: '[]',
      reason: 'an empty sequence has no element type',
    });
  }
  const elementType = inferType(first);
  const key = typeKey(elementType);
  for (const element of rest) {
    const other = inferType(element);
    if (typeKey(other) !== key) {
      throw new TypeSystemError('SHAPE-T002', {
        value: formatValue(value),
        reason: `mixed element types ${formatType(elementType)} and ${formatType(other)}`,
      });
    }
  }
  return sequenceType(elementType);
}
