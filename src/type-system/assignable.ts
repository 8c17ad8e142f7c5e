/**
 * Assignability
 *
 * isAssignableFrom(target, source) answers "can a value of type `source`
 * be used where `target` is expected".
 */

import type { Type } from './types.js';

export function isAssignableFrom(target: Type, source: Type): boolean {
  switch (target.kind) {
    case 'scalar':
      if (source.kind !== 'scalar') return false;
      // Whole numbers infer as int, so float widens from int
      return (
        source.dtype === target.dtype ||
        (target.dtype === 'float' && source.dtype === 'int')
      );
    case 'sequence':
      return (
        source.kind === 'sequence' &&
        isAssignableFrom(target.element, source.element)
      );
    case 'tuple': {
      if (source.kind !== 'tuple') return false;
      if (source.elements.length !== target.elements.length) return false;
      return target.elements.every(([name, element], i) => {
        const other = source.elements[i];
        if (other === undefined) return false;
        // An unnamed target slot accepts a named source element, not the reverse
        if (name !== undefined && other[0] !== name) return false;
        return isAssignableFrom(element, other[1]);
      });
    }
  }
}
