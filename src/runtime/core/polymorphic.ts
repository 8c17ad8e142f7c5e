/**
 * Polymorphic Dispatch
 *
 * A PolymorphicFunction specializes itself per distinct argument type. The
 * positional and keyword arguments of each call are packed into an
 * argument tuple, its type is inferred, and the canonical key of that type
 * selects a concrete function. Unseen keys are built by the factory and
 * stored; entries are never evicted.
 *
 * Lookup, build and store run synchronously within one invoke(), so callers
 * on the event loop never interleave inside that sequence and each key is
 * built at most once. A factory that throws stores nothing.
 */

import { typeKey } from '../../type-system/format.js';
import { inferType } from '../../type-system/infer.js';
import type { Type } from '../../type-system/types.js';
import { buildAdapter } from './adapter.js';
import type { AdaptableCallable } from './callable.js';
import { createDispatchContext } from './context.js';
import type {
  DispatchContext,
  PolymorphicOptions,
  SpecializeOptions,
} from './types.js';
import { packArgs, type ArgValue, type KeywordArgs } from './values.js';

/** A specialization, called with the original call arguments */
export type ConcreteFunction<R> = (
  positional: readonly ArgValue[],
  keyword: KeywordArgs<ArgValue>
) => R;

/** Builds the specialization for an inferred argument type */
export type ConcreteFunctionFactory<R> = (
  argumentType: Type
) => ConcreteFunction<R>;

export class PolymorphicFunction<R = unknown> {
  private readonly cache = new Map<string, ConcreteFunction<R>>();
  private readonly context: DispatchContext;

  constructor(
    private readonly factory: ConcreteFunctionFactory<R>,
    options: PolymorphicOptions = {}
  ) {
    this.context = createDispatchContext(options);
  }

  get name(): string {
    return this.context.name;
  }

  /** Number of cached specializations */
  get size(): number {
    return this.cache.size;
  }

  /** Canonical keys of the cached specializations, in creation order */
  keys(): string[] {
    return [...this.cache.keys()];
  }

  /**
   * Call the specialization for the type of these arguments, building it
   * on first use.
   * @throws whatever the factory or the specialization throws
   */
  invoke(
    positional: readonly ArgValue[] = [],
    keyword: KeywordArgs<ArgValue> = {}
  ): R {
    const argumentType = inferType(packArgs(positional, keyword));
    const key = typeKey(argumentType);
    const { name, observability } = this.context;

    let concrete = this.cache.get(key);
    if (concrete === undefined) {
      try {
        concrete = this.factory(argumentType);
      } catch (error) {
        observability.onDispatchError?.({ name, key, error });
        throw error;
      }
      this.cache.set(key, concrete);
      observability.onSpecialize?.({
        name,
        key,
        argumentType,
        cacheSize: this.cache.size,
      });
    } else {
      observability.onCacheHit?.({ name, key });
    }

    return concrete(positional, keyword);
  }

  toString(): string {
    return `PolymorphicFunction(${this.name}, ${this.cache.size} specializations)`;
  }
}

/**
 * Turn a callable into a polymorphic function that builds one adapter per
 * argument type. Each specialization re-packs the call arguments and hands
 * the tuple to its adapter.
 */
export function specialize<R>(
  callable: AdaptableCallable<R>,
  options: SpecializeOptions = {}
): PolymorphicFunction<R> {
  const context = createDispatchContext({
    ...options,
    name: options.name ?? callable.name,
  });
  const { observability } = context;

  const factory: ConcreteFunctionFactory<R> = (argumentType) => {
    const adapter = buildAdapter(callable, argumentType, context.unpack, {
      observability,
    });
    return (positional, keyword) =>
      adapter.arity === 0
        ? adapter.invoke()
        : adapter.invoke(packArgs(positional, keyword));
  };

  return new PolymorphicFunction(factory, {
    name: context.name,
    observability,
  });
}
