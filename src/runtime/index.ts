/**
 * callshape Runtime
 *
 * Public API for adapting callables and dispatching on argument types.
 *
 * Module Structure:
 * - core/: Adaptation engine
 *   - values.ts: ArgValue, AnonymousTuple, packing
 *   - argspec.ts: ArgSpec and argument binding
 *   - compatibility.ts: typed signature compatibility
 *   - tuples.ts: argument tuple classification and unpacking
 *   - callable.ts: callable kinds, signatures, invocation
 *   - adapter.ts: zero-or-one-argument adapters
 *   - polymorphic.ts: specialization cache
 *   - types.ts / context.ts: options, events, defaults
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  AdapterBuiltEvent,
  AdapterOptions,
  CacheHitEvent,
  DispatchContext,
  DispatchErrorEvent,
  ObservabilityCallbacks,
  PolymorphicOptions,
  SpecializeEvent,
  SpecializeOptions,
  UnpackPreference,
} from './core/types.js';
export { createDispatchContext } from './core/context.js';

// ============================================================
// VALUES AND ARGUMENT TUPLES
// ============================================================

export {
  createTuple,
  elementAt,
  elementNamed,
  formatValue,
  isAnonymousTuple,
  isIdentifier,
  packArgs,
  type AnonymousTuple,
  type ArgValue,
  type KeywordArgs,
  type TupleElement,
} from './core/values.js';
export {
  classify,
  isArgumentTuple,
  repack,
  unpack,
  type TupleLike,
  type Unpacked,
} from './core/tuples.js';

// ============================================================
// SIGNATURES AND BINDING
// ============================================================

export {
  bind,
  createArgSpec,
  formatArgSpec,
  toHostArgs,
  type ArgSpec,
  type ArgSpecInit,
  type BoundArgument,
  type CallBinding,
} from './core/argspec.js';
export { isCompatible } from './core/compatibility.js';

// ============================================================
// CALLABLES, ADAPTERS, DISPATCH
// ============================================================

export {
  bindLeading,
  defineFunction,
  formatCallable,
  getArgSpec,
  invokeCallable,
  isAdaptableCallable,
  opaqueFunction,
  type AdaptableCallable,
  type BoundCallable,
  type HostCallable,
  type HostFn,
  type OpaqueCallable,
  type OpaqueFn,
} from './core/callable.js';
export {
  buildAdapter,
  resolveUnpack,
  type Adapter,
  type UnaryAdapter,
  type ZeroArgAdapter,
} from './core/adapter.js';
export {
  PolymorphicFunction,
  specialize,
  type ConcreteFunction,
  type ConcreteFunctionFactory,
} from './core/polymorphic.js';
