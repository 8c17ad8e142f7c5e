/**
 * Signature Compatibility
 *
 * Decides whether a callable declared by an ArgSpec can accept arguments
 * of the given types.
 */

import { BindingError } from '../../error-classes.js';
import { isAssignableFrom } from '../../type-system/assignable.js';
import { inferType } from '../../type-system/infer.js';
import type { Type } from '../../type-system/types.js';
import { bind, defaultFor, type ArgSpec, type CallBinding } from './argspec.js';
import type { KeywordArgs } from './values.js';

/**
 * Check if arguments of the given types can be bound to an ArgSpec.
 *
 * Binding alone decides when the ArgSpec has no defaults. Otherwise every
 * defaulted name the caller supplied a type for must accept its default:
 * `isAssignableFrom(suppliedType, inferType(default))`. A `null` default
 * carries no type and is never checked. A name filled from its own
 * default is never checked.
 *
 * Only binding failures map to `false`; anything else propagates.
 */
export function isCompatible(
  argSpec: ArgSpec,
  positionalTypes: readonly Type[] = [],
  keywordTypes: KeywordArgs<Type> = {}
): boolean {
  let binding: CallBinding<Type>;
  try {
    binding = bind(argSpec, positionalTypes, keywordTypes);
  } catch (error) {
    if (error instanceof BindingError) return false;
    throw error;
  }

  if (argSpec.defaults.length === 0) return true;

  for (const [name, bound] of binding.args) {
    if (bound.source === 'default') continue;
    const fallback = defaultFor(argSpec, name);
    if (fallback === undefined || fallback === null) continue;
    if (!isAssignableFrom(bound.value, inferType(fallback))) return false;
  }
  return true;
}
