/**
 * Runtime Types
 *
 * Public types for adapter and dispatch configuration.
 * These types are the primary interface for host applications.
 */

import type { Type } from '../../type-system/types.js';

/** Observability callbacks for monitoring adaptation and dispatch */
export interface ObservabilityCallbacks {
  /** Called after an adapter is built */
  onAdapterBuilt?: (event: AdapterBuiltEvent) => void;
  /** Called after a cache miss has been specialized and stored */
  onSpecialize?: (event: SpecializeEvent) => void;
  /** Called when a cached specialization is reused */
  onCacheHit?: (event: CacheHitEvent) => void;
  /** Called when the factory fails for an unseen argument type */
  onDispatchError?: (event: DispatchErrorEvent) => void;
}

/** Event emitted after buildAdapter succeeds */
export interface AdapterBuiltEvent {
  /** Name of the adapted callable */
  callableName: string;
  /** Declared parameter type (undefined for zero-argument adapters) */
  parameterType: Type | undefined;
  /** Whether the adapter spreads its argument */
  unpack: boolean;
}

/** Event emitted when a new specialization is stored */
export interface SpecializeEvent {
  /** Name of the polymorphic function */
  name: string;
  /** Canonical key of the argument type */
  key: string;
  /** Inferred type of the packed arguments */
  argumentType: Type;
  /** Number of cached specializations, including this one */
  cacheSize: number;
}

/** Event emitted on a cache hit */
export interface CacheHitEvent {
  name: string;
  key: string;
}

/** Event emitted when building a specialization fails */
export interface DispatchErrorEvent {
  name: string;
  key: string;
  /** The error that occurred */
  error: unknown;
}

/** How a bundled parameter reaches the callable */
export type UnpackPreference = 'required' | 'forbidden' | 'infer';

/** Options for buildAdapter */
export interface AdapterOptions {
  /** Observability callbacks */
  observability?: ObservabilityCallbacks;
}

/** Options for PolymorphicFunction */
export interface PolymorphicOptions {
  /** Name used in events (default: 'anonymous') */
  name?: string;
  /** Observability callbacks */
  observability?: ObservabilityCallbacks;
}

/** Options for specialize() */
export interface SpecializeOptions extends PolymorphicOptions {
  /** Unpack preference for each specialization (default: 'required') */
  unpack?: UnpackPreference;
}

/** Resolved configuration shared by dispatch operations */
export interface DispatchContext {
  readonly name: string;
  readonly unpack: UnpackPreference;
  readonly observability: ObservabilityCallbacks;
}
