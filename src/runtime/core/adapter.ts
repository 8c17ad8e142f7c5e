/**
 * Adapter Builder
 *
 * Wraps a callable with an arbitrary parameter list so that it always
 * accepts zero arguments or exactly one bundled argument of a declared
 * type. When a parameter type is declared, the builder decides whether the
 * bundle is passed through as a single value or spread into positional
 * and keyword arguments:
 *
 * - unpackRequired: the callable cannot take the bundle as one value
 * - unpackPossible: the bundle is an argument tuple whose parts the
 *   callable accepts
 *
 * Both are computed up front. With preference 'infer' the builder only
 * proceeds when exactly one form is feasible.
 */

import {
  AdapterError,
  TupleShapeError,
  TypeMismatchError,
  type MismatchSite,
} from '../../error-classes.js';
import { isAssignableFrom } from '../../type-system/assignable.js';
import { toType, type TypeSpec } from '../../type-system/convert.js';
import { formatType } from '../../type-system/format.js';
import { inferType } from '../../type-system/infer.js';
import type { Type } from '../../type-system/types.js';
import { formatArgSpec } from './argspec.js';
import {
  getArgSpec,
  invokeCallable,
  type AdaptableCallable,
} from './callable.js';
import { isCompatible } from './compatibility.js';
import { assertUnpackPreference } from './context.js';
import {
  isArgumentTuple,
  unpack as unpackTuple,
  type Unpacked,
} from './tuples.js';
import type { AdapterOptions, UnpackPreference } from './types.js';
import {
  elementAt,
  elementNamed,
  formatValue,
  isAnonymousTuple,
  type ArgValue,
} from './values.js';

/** Adapter for a computation without a parameter */
export interface ZeroArgAdapter<R = unknown> {
  readonly arity: 0;
  invoke(): R;
}

/** Adapter for a computation taking one bundled parameter */
export interface UnaryAdapter<R = unknown> {
  readonly arity: 1;
  readonly parameterType: Type;
  /** True when the argument is spread into the callable's parameters */
  readonly unpack: boolean;
  invoke(arg: ArgValue): R;
}

export type Adapter<R = unknown> = ZeroArgAdapter<R> | UnaryAdapter<R>;

/** Outcome of the unpack resolution table */
type UnpackDecision =
  | { readonly ok: true; readonly unpack: boolean }
  | { readonly ok: false; readonly errorId: string };

/**
 * Resolve the unpack decision from the two feasibility flags.
 * Rows are evaluated in order; the first match wins.
 */
export function resolveUnpack(
  unpackRequired: boolean,
  unpackPossible: boolean,
  preference: UnpackPreference
): UnpackDecision {
  if (unpackRequired && preference === 'forbidden') {
    return { ok: false, errorId: 'SHAPE-A002' };
  }
  if (!unpackPossible && preference === 'required') {
    return { ok: false, errorId: 'SHAPE-A003' };
  }
  if (unpackRequired && !unpackPossible) {
    return { ok: false, errorId: 'SHAPE-A004' };
  }
  switch (preference) {
    case 'required':
      return { ok: true, unpack: true };
    case 'forbidden':
      return { ok: true, unpack: false };
    case 'infer':
      if (!unpackRequired && unpackPossible) {
        return { ok: false, errorId: 'SHAPE-A005' };
      }
      // Only one form is feasible here, so both flags agree
      return { ok: true, unpack: unpackPossible };
  }
}

/**
 * Build an adapter around a callable.
 *
 * @param parameterType - Type spec of the bundled parameter; null or
 * undefined builds a zero-argument adapter
 * @throws AdapterError (SHAPE-A001..A005) when the requested calling
 * convention is infeasible or ambiguous
 * @throws ReflectionError (SHAPE-R001) when the callable has no signature
 * @throws Error if `preference` is not a known preference
 */
export function buildAdapter<R>(
  callable: AdaptableCallable<R>,
  parameterType: TypeSpec,
  preference: UnpackPreference = 'infer',
  options: AdapterOptions = {}
): Adapter<R> {
  assertUnpackPreference(preference);
  const argSpec = getArgSpec(callable);
  const type = toType(parameterType);
  const context = {
    functionName: callable.name,
    signature: formatArgSpec(argSpec),
  };

  if (type === undefined) {
    if (!isCompatible(argSpec)) {
      throw new AdapterError('SHAPE-A001', context);
    }
    options.observability?.onAdapterBuilt?.({
      callableName: callable.name,
      parameterType: undefined,
      unpack: false,
    });
    return Object.freeze({
      arity: 0,
      invoke: () => invokeCallable(callable),
    } satisfies ZeroArgAdapter<R>);
  }

  const unpackRequired = !isCompatible(argSpec, [type]);
  const parts = isArgumentTuple(type) ? unpackTuple(type) : undefined;
  const unpackPossible =
    parts !== undefined &&
    isCompatible(argSpec, parts.positional, Object.fromEntries(parts.named));

  const decision = resolveUnpack(unpackRequired, unpackPossible, preference);
  if (!decision.ok) {
    throw new AdapterError(decision.errorId, {
      ...context,
      parameterType: formatType(type),
    });
  }

  options.observability?.onAdapterBuilt?.({
    callableName: callable.name,
    parameterType: type,
    unpack: decision.unpack,
  });

  if (decision.unpack && parts !== undefined) {
    return unpackingAdapter(callable, type, parts);
  }
  return singleValueAdapter(callable, type);
}

function unpackingAdapter<R>(
  callable: AdaptableCallable<R>,
  parameterType: Type,
  parts: Unpacked<Type>
): UnaryAdapter<R> {
  const positionalTypes = [...parts.positional];
  const namedTypes = new Map(parts.named);

  const invoke = (arg: ArgValue): R => {
    if (!isAnonymousTuple(arg) || !isArgumentTuple(arg)) {
      throw new TupleShapeError('SHAPE-S001', {
        found: formatValue(arg),
      });
    }

    const positional = positionalTypes.map((expected, idx) => {
      const value = elementAt(arg, idx);
      if (value === undefined) {
        throw new TupleShapeError('SHAPE-S002', {
          element: `at position ${idx}`,
        });
      }
      checkValue(expected, value, { position: idx });
      return value;
    });

    const keyword: Record<string, ArgValue> = {};
    for (const [name, expected] of namedTypes) {
      const value = elementNamed(arg, name);
      if (value === undefined) {
        throw new TupleShapeError('SHAPE-S002', { element: `named ${name}` });
      }
      checkValue(expected, value, { elementName: name });
      keyword[name] = value;
    }

    return invokeCallable(callable, positional, keyword);
  };

  return Object.freeze({
    arity: 1,
    parameterType,
    unpack: true,
    invoke,
  } satisfies UnaryAdapter<R>);
}

function singleValueAdapter<R>(
  callable: AdaptableCallable<R>,
  parameterType: Type
): UnaryAdapter<R> {
  return Object.freeze({
    arity: 1,
    parameterType,
    unpack: false,
    invoke: (arg: ArgValue): R => {
      checkValue(parameterType, arg, {});
      return invokeCallable(callable, [arg]);
    },
  } satisfies UnaryAdapter<R>);
}

function checkValue(
  expected: Type,
  value: ArgValue,
  site: MismatchSite
): void {
  // An empty array has no element type to infer but fits any sequence
  if (
    expected.kind === 'sequence' &&
    Array.isArray(value) &&
    value.length === 0
  ) {
    return;
  }
  const actual = inferType(value);
  if (!isAssignableFrom(expected, actual)) {
    throw new TypeMismatchError(formatType(expected), formatType(actual), site);
  }
}
