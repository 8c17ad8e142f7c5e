/**
 * ArgSpec and Argument Binding
 *
 * An ArgSpec describes a callable's declared parameter list: ordered names,
 * right-aligned defaults, and optional variadic collectors. bind() assigns
 * concrete positional and keyword items to those names.
 *
 * bind() is generic over the bound item so the same procedure serves real
 * calls (values) and compatibility checks (types).
 */

import { BindingError, ReflectionError } from '../../error-classes.js';
import {
  createTuple,
  formatValue,
  isIdentifier,
  type ArgValue,
  type KeywordArgs,
} from './values.js';

/** Declared parameter list of a callable */
export interface ArgSpec {
  readonly names: readonly string[];
  /** Defaults for the last `defaults.length` names */
  readonly defaults: readonly ArgValue[];
  /** Variadic-positional collector (`*rest`) */
  readonly varargs: string | undefined;
  /** Variadic-keyword collector (`**extra`) */
  readonly varkw: string | undefined;
}

export interface ArgSpecInit {
  readonly names?: readonly string[] | undefined;
  readonly defaults?: readonly ArgValue[] | undefined;
  readonly varargs?: string | undefined;
  readonly varkw?: string | undefined;
}

/**
 * Create a validated, frozen ArgSpec.
 * @throws ReflectionError (SHAPE-R002) when names are not distinct
 * identifiers or there are more defaults than names
 */
export function createArgSpec(init: ArgSpecInit = {}): ArgSpec {
  const names = init.names ?? [];
  const defaults = init.defaults ?? [];

  if (defaults.length > names.length) {
    throw new ReflectionError('SHAPE-R002', {
      reason: `${defaults.length} defaults for ${names.length} names`,
    });
  }

  const all = [...names];
  if (init.varargs !== undefined) all.push(init.varargs);
  if (init.varkw !== undefined) all.push(init.varkw);

  const seen = new Set<string>();
  for (const name of all) {
    if (!isIdentifier(name)) {
      throw new ReflectionError('SHAPE-R002', {
        reason: `${JSON.stringify(name)} is not an identifier`,
      });
    }
    if (seen.has(name)) {
      throw new ReflectionError('SHAPE-R002', {
        reason: `parameter '${name}' declared twice`,
      });
    }
    seen.add(name);
  }

  return Object.freeze({
    names: Object.freeze([...names]),
    defaults: Object.freeze([...defaults]),
    varargs: init.varargs,
    varkw: init.varkw,
  });
}

/** Number of leading names that have no default */
export function requiredCount(argSpec: ArgSpec): number {
  return argSpec.names.length - argSpec.defaults.length;
}

/** Default for a name, or undefined when the name has none */
export function defaultFor(
  argSpec: ArgSpec,
  name: string
): ArgValue | undefined {
  const idx = argSpec.names.indexOf(name) - requiredCount(argSpec);
  return idx >= 0 ? argSpec.defaults[idx] : undefined;
}

/** Format an ArgSpec for messages, e.g. `(x, y=5, *rest, **extra)` */
export function formatArgSpec(argSpec: ArgSpec): string {
  const firstDefault = requiredCount(argSpec);
  const parts = argSpec.names.map((name, idx) => {
    const value = argSpec.defaults[idx - firstDefault];
    return idx < firstDefault || value === undefined
      ? name
      : `${name}=${formatValue(value)}`;
  });
  if (argSpec.varargs !== undefined) parts.push(`*${argSpec.varargs}`);
  if (argSpec.varkw !== undefined) parts.push(`**${argSpec.varkw}`);
  return `(${parts.join(', ')})`;
}

// ============================================================
// BINDING
// ============================================================

/** How a declared name received its value */
export type BoundArgument<T> =
  | { readonly source: 'positional' | 'keyword'; readonly value: T }
  | { readonly source: 'default'; readonly value: ArgValue };

/** Result of binding call arguments to an ArgSpec */
export interface CallBinding<T> {
  /** Declared names in declaration order */
  readonly args: ReadonlyMap<string, BoundArgument<T>>;
  readonly varargs:
    | { readonly name: string; readonly values: readonly T[] }
    | undefined;
  readonly varkw:
    | { readonly name: string; readonly values: ReadonlyMap<string, T> }
    | undefined;
}

/**
 * Bind positional and keyword items to the names of an ArgSpec.
 *
 * @throws BindingError
 * - SHAPE-B001 more positional items than names and no `*` collector
 * - SHAPE-B002 a name given both positionally and by keyword
 * - SHAPE-B003 a name with no item and no default
 * - SHAPE-B004 leftover keywords and no `**` collector
 */
export function bind<T extends {} | null>(
  argSpec: ArgSpec,
  positional: readonly T[],
  keyword: KeywordArgs<T> = {}
): CallBinding<T> {
  const { names, defaults } = argSpec;
  const kwargs = new Map<string, T>(Object.entries(keyword));

  if (positional.length > names.length && argSpec.varargs === undefined) {
    throw new BindingError('SHAPE-B001', {
      signature: formatArgSpec(argSpec),
      expectedCount: names.length,
      actualCount: positional.length,
    });
  }

  const firstDefault = requiredCount(argSpec);
  const args = new Map<string, BoundArgument<T>>();

  for (const [idx, value] of positional.entries()) {
    const name = names[idx];
    if (name === undefined) break;
    if (kwargs.has(name)) {
      throw new BindingError('SHAPE-B002', { paramName: name });
    }
    args.set(name, { source: 'positional', value });
  }

  names.forEach((name, idx) => {
    if (idx < positional.length) return;

    const byKeyword = kwargs.get(name);
    if (byKeyword !== undefined) {
      args.set(name, { source: 'keyword', value: byKeyword });
      return;
    }

    const fallback =
      idx >= firstDefault ? defaults[idx - firstDefault] : undefined;
    if (fallback === undefined) {
      throw new BindingError('SHAPE-B003', { paramName: name });
    }
    args.set(name, { source: 'default', value: fallback });
  });

  const unused = new Map([...kwargs].filter(([name]) => !args.has(name)));
  if (argSpec.varkw === undefined && unused.size > 0) {
    const leftover = [...unused.keys()];
    throw new BindingError('SHAPE-B004', {
      names: leftover.join(', '),
      keywords: leftover,
    });
  }

  return {
    args,
    varargs:
      argSpec.varargs === undefined
        ? undefined
        : { name: argSpec.varargs, values: positional.slice(names.length) },
    varkw:
      argSpec.varkw === undefined
        ? undefined
        : { name: argSpec.varkw, values: unused },
  };
}

/**
 * Flatten a value binding into the record a host function receives.
 * Keys are the declared names plus any declared collectors; the `*`
 * collector holds an array, the `**` collector a tuple of named elements.
 */
export function toHostArgs(
  binding: CallBinding<ArgValue>
): Readonly<Record<string, ArgValue>> {
  const record: Record<string, ArgValue> = {};
  for (const [name, bound] of binding.args) {
    record[name] = bound.value;
  }
  if (binding.varargs !== undefined) {
    record[binding.varargs.name] = Object.freeze([...binding.varargs.values]);
  }
  if (binding.varkw !== undefined) {
    record[binding.varkw.name] = createTuple([...binding.varkw.values]);
  }
  return Object.freeze(record);
}
