/**
 * Dispatch Context Factory
 *
 * Resolves option objects against their defaults in one place.
 */

import type {
  DispatchContext,
  SpecializeOptions,
  UnpackPreference,
} from './types.js';

const UNPACK_PREFERENCES = ['required', 'forbidden', 'infer'] as const;

/**
 * Reject preferences outside the known set.
 * Untyped JavaScript callers can pass any string here.
 * @throws Error if `unpack` is not a known preference
 */
export function assertUnpackPreference(unpack: UnpackPreference): void {
  if (!UNPACK_PREFERENCES.includes(unpack)) {
    throw new Error(
      `Invalid unpack preference ${JSON.stringify(unpack)}: expected one of ${UNPACK_PREFERENCES.join(', ')}`
    );
  }
}

/**
 * Create a dispatch context from options.
 * @throws Error if `unpack` is not a known preference
 */
export function createDispatchContext(
  options: SpecializeOptions = {}
): DispatchContext {
  const unpack = options.unpack ?? 'required';
  assertUnpackPreference(unpack);

  return {
    name: options.name ?? 'anonymous',
    unpack,
    observability: options.observability ?? {},
  };
}
