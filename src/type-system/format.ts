/**
 * Type Formatting
 *
 * formatType() renders types for messages. typeKey() renders the canonical
 * cache key: structurally equal types give equal keys, and different types
 * give different keys. Element names are identifiers, so the delimiters
 * used below never occur inside a name.
 */

import type { Type } from './types.js';

/** Format a type for display, e.g. `<int,b=float>` or `int*` */
export function formatType(type: Type): string {
  switch (type.kind) {
    case 'scalar':
      return type.dtype;
    case 'sequence':
      return `${formatType(type.element)}*`;
    case 'tuple': {
      const parts = type.elements.map(([name, element]) =>
        name === undefined
          ? formatType(element)
          : `${name}=${formatType(element)}`
      );
      return `<${parts.join(',')}>`;
    }
  }
}

/** Canonical key for a type, e.g. `(:int,b:float)` or `[int]` */
export function typeKey(type: Type): string {
  switch (type.kind) {
    case 'scalar':
      return type.dtype;
    case 'sequence':
      return `[${typeKey(type.element)}]`;
    case 'tuple':
      return `(${type.elements
        .map(([name, element]) => `${name ?? ''}:${typeKey(element)}`)
        .join(',')})`;
  }
}

/** Structural equality via canonical keys */
export function typesEqual(a: Type, b: Type): boolean {
  return typeKey(a) === typeKey(b);
}
