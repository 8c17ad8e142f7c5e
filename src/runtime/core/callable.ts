/**
 * Callable Types
 *
 * Unified representation for the callables an adapter can wrap:
 * - HostCallable: host function with a declared ArgSpec
 * - BoundCallable: another callable with leading arguments fixed
 * - OpaqueCallable: host function whose signature is unknown
 *
 * Each kind states how its signature is obtained; getArgSpec() dispatches
 * on the kind instead of inspecting function objects.
 *
 * Public API for host applications.
 */

import { BindingError, ReflectionError } from '../../error-classes.js';
import {
  bind,
  createArgSpec,
  formatArgSpec,
  toHostArgs,
  type ArgSpec,
  type ArgSpecInit,
} from './argspec.js';
import type { ArgValue, KeywordArgs } from './values.js';

/** Host function receiving arguments bound by name */
export type HostFn<R> = (args: Readonly<Record<string, ArgValue>>) => R;

/** Host function receiving raw positional and keyword arguments */
export type OpaqueFn<R> = (
  positional: readonly ArgValue[],
  keyword: KeywordArgs<ArgValue>
) => R;

/** Common fields for all callable types */
interface CallableBase {
  readonly __type: 'callable';
  /** Name used in error messages and events */
  readonly name: string;
}

/** Host callable with a declared parameter list */
export interface HostCallable<R = unknown> extends CallableBase {
  readonly kind: 'host';
  readonly argSpec: ArgSpec;
  readonly fn: HostFn<R>;
  /** Human-readable function description (optional) */
  readonly description?: string;
}

/** Partial application of another callable */
export interface BoundCallable<R = unknown> extends CallableBase {
  readonly kind: 'bound';
  readonly target: AdaptableCallable<R>;
  readonly leading: readonly ArgValue[];
}

/** Host callable without an introspectable signature */
export interface OpaqueCallable<R = unknown> extends CallableBase {
  readonly kind: 'opaque';
  readonly fn: OpaqueFn<R>;
}

/** Union of all callable types */
export type AdaptableCallable<R = unknown> =
  | HostCallable<R>
  | BoundCallable<R>
  | OpaqueCallable<R>;

/** Type guard for any callable */
export function isAdaptableCallable(
  value: unknown
): value is AdaptableCallable {
  return (
    typeof value === 'object' &&
    value !== null &&
    '__type' in value &&
    value.__type === 'callable'
  );
}

/**
 * Declare a host function and its parameter list.
 * @throws ReflectionError (SHAPE-R002) for a malformed ArgSpec
 *
 * @example
 * const add = defineFunction('add', { names: ['x', 'y'], defaults: [1] },
 *   (args) => Number(args['x']) + Number(args['y']));
 */
export function defineFunction<R>(
  name: string,
  argSpec: ArgSpecInit,
  fn: HostFn<R>,
  description?: string
): HostCallable<R> {
  const callable: HostCallable<R> = {
    __type: 'callable',
    kind: 'host',
    name,
    argSpec: createArgSpec(argSpec),
    fn,
    ...(description !== undefined ? { description } : {}),
  };
  return Object.freeze(callable);
}

/**
 * Fix the leading positional arguments of a callable.
 * The result's signature drops the first `leading.length` names.
 */
export function bindLeading<R>(
  target: AdaptableCallable<R>,
  leading: readonly ArgValue[],
  name = target.name
): BoundCallable<R> {
  const callable: BoundCallable<R> = {
    __type: 'callable',
    kind: 'bound',
    name,
    target,
    leading: Object.freeze([...leading]),
  };
  return Object.freeze(callable);
}

/** Wrap a function whose parameter list is unknown */
export function opaqueFunction<R>(
  name: string,
  fn: OpaqueFn<R>
): OpaqueCallable<R> {
  const callable: OpaqueCallable<R> = {
    __type: 'callable',
    kind: 'opaque',
    name,
    fn,
  };
  return Object.freeze(callable);
}

/**
 * Get the declared parameter list of a callable.
 * @throws ReflectionError (SHAPE-R001) for opaque callables
 * @throws BindingError (SHAPE-B001) when a bound callable fixes more
 * arguments than its target accepts
 */
export function getArgSpec(callable: AdaptableCallable): ArgSpec {
  switch (callable.kind) {
    case 'host':
      return callable.argSpec;
    case 'bound':
      return boundArgSpec(getArgSpec(callable.target), callable.leading);
    case 'opaque':
      throw new ReflectionError('SHAPE-R001', {
        callableKind: callable.kind,
        functionName: callable.name,
      });
  }
}

function boundArgSpec(argSpec: ArgSpec, leading: readonly ArgValue[]): ArgSpec {
  const { names, defaults } = argSpec;
  if (leading.length > names.length && argSpec.varargs === undefined) {
    throw new BindingError('SHAPE-B001', {
      signature: formatArgSpec(argSpec),
      expectedCount: names.length,
      actualCount: leading.length,
    });
  }
  const remaining = names.slice(leading.length);
  return createArgSpec({
    names: remaining,
    defaults: defaults.slice(Math.max(0, defaults.length - remaining.length)),
    varargs: argSpec.varargs,
    varkw: argSpec.varkw,
  });
}

/**
 * Invoke a callable with positional and keyword arguments.
 * Host callables bind the arguments against their ArgSpec first.
 */
export function invokeCallable<R>(
  callable: AdaptableCallable<R>,
  positional: readonly ArgValue[] = [],
  keyword: KeywordArgs<ArgValue> = {}
): R {
  switch (callable.kind) {
    case 'host':
      return callable.fn(toHostArgs(bind(callable.argSpec, positional, keyword)));
    case 'bound':
      return invokeCallable(
        callable.target,
        [...callable.leading, ...positional],
        keyword
      );
    case 'opaque':
      return callable.fn(positional, keyword);
  }
}

/** Format a callable for display */
export function formatCallable(callable: AdaptableCallable): string {
  if (callable.kind === 'opaque') return `${callable.name}(...)`;
  return `${callable.name}${formatArgSpec(getArgSpec(callable))}`;
}
