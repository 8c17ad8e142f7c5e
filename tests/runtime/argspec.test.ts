/**
 * callshape Runtime Tests: ArgSpec and Binding
 * Tests for ArgSpec validation, formatting, bind() and host argument records
 */

import fc from 'fast-check';
import { describe, expect, it } from 'vitest';

import {
  bind,
  BindingError,
  createArgSpec,
  createTuple,
  formatArgSpec,
  ReflectionError,
  toHostArgs,
} from '../../src/index.js';
import { captureError } from '../helpers/runtime.js';

const identifier = fc.stringMatching(/^[a-z][a-z0-9_]{0,5}$/);

describe('callshape Runtime: ArgSpec', () => {
  describe('createArgSpec', () => {
    it('defaults to an empty parameter list', () => {
      const argSpec = createArgSpec();

      expect(argSpec.names).toEqual([]);
      expect(argSpec.defaults).toEqual([]);
      expect(argSpec.varargs).toBeUndefined();
      expect(argSpec.varkw).toBeUndefined();
    });

    it('rejects more defaults than names', () => {
      const error = captureError(() =>
        createArgSpec({ names: ['a', 'b'], defaults: [1, 2, 3] })
      );

      expect(error).toBeInstanceOf(ReflectionError);
      expect(error.message).toBe('Invalid ArgSpec: 3 defaults for 2 names');
    });

    it('rejects names that are not identifiers', () => {
      const error = captureError(() => createArgSpec({ names: ['a-b'] }));
      expect(error.message).toBe('Invalid ArgSpec: "a-b" is not an identifier');
    });

    it('rejects a collector reusing a parameter name', () => {
      const error = captureError(() =>
        createArgSpec({ names: ['a'], varargs: 'a' })
      );
      expect(error.message).toBe(
        "Invalid ArgSpec: parameter 'a' declared twice"
      );
    });
  });

  describe('formatArgSpec', () => {
    it('renders defaults and collectors', () => {
      const argSpec = createArgSpec({
        names: ['x', 'y'],
        defaults: [5],
        varargs: 'rest',
        varkw: 'extra',
      });
      expect(formatArgSpec(argSpec)).toBe('(x, y=5, *rest, **extra)');
    });

    it('renders string defaults quoted', () => {
      const argSpec = createArgSpec({ names: ['greeting'], defaults: ['hi'] });
      expect(formatArgSpec(argSpec)).toBe('(greeting="hi")');
    });
  });

  describe('bind', () => {
    const pair = createArgSpec({ names: ['x', 'y'] });
    const withDefault = createArgSpec({ names: ['a', 'b'], defaults: [5] });

    it('binds positional items in order', () => {
      const binding = bind(pair, [1, 2]);

      expect([...binding.args]).toEqual([
        ['x', { source: 'positional', value: 1 }],
        ['y', { source: 'positional', value: 2 }],
      ]);
      expect(binding.varargs).toBeUndefined();
      expect(binding.varkw).toBeUndefined();
    });

    it('binds keywords and keeps declaration order', () => {
      const binding = bind(withDefault, [], { b: 2, a: 1 });

      expect([...binding.args]).toEqual([
        ['a', { source: 'keyword', value: 1 }],
        ['b', { source: 'keyword', value: 2 }],
      ]);
    });

    it('fills missing names from defaults', () => {
      const binding = bind(withDefault, [1]);
      expect(binding.args.get('b')).toEqual({ source: 'default', value: 5 });
    });

    it('binds a null keyword value', () => {
      const binding = bind(withDefault, [], { a: null });
      expect(binding.args.get('a')).toEqual({ source: 'keyword', value: null });
    });

    it('rejects too many positional items', () => {
      const single = createArgSpec({ names: ['x'] });
      const error = captureError(() => bind(single, [1, 2]));

      expect(error).toBeInstanceOf(BindingError);
      expect(error.kind).toBe('TooManyPositionalArguments');
      expect(error.message).toBe(
        'Too many positional arguments for (x): expected at most 1, found 2'
      );
    });

    it('checks the positional count before duplicates', () => {
      const error = captureError(() =>
        bind(createArgSpec({ names: ['x'] }), [1, 2], { x: 3 })
      );
      expect(error.errorId).toBe('SHAPE-B001');
    });

    it('rejects a name given positionally and by keyword', () => {
      const error = captureError(() => bind(pair, [1], { x: 1 }));

      expect(error.kind).toBe('DuplicateArgument');
      expect(error.message).toBe("Argument 'x' specified twice");
    });

    it('rejects a missing argument without default', () => {
      const error = captureError(() => bind(pair, [1]));

      expect(error.kind).toBe('MissingArgument');
      expect(error.message).toBe(
        "Argument 'y' was not specified and does not have a default"
      );
    });

    it('rejects leftover keywords without a keyword collector', () => {
      const error = captureError(() =>
        bind(createArgSpec({ names: ['a'] }), [1], { z: 1, w: 2 })
      );

      expect(error.kind).toBe('UnexpectedKeywordArguments');
      expect(error.message).toBe(
        'Unexpected keyword arguments in the call: z, w'
      );
      expect(error.context['keywords']).toEqual(['z', 'w']);
    });

    it('collects extra positional items', () => {
      const argSpec = createArgSpec({ names: ['a'], varargs: 'rest' });
      const binding = bind(argSpec, [1, 2, 3]);

      expect(binding.varargs).toEqual({ name: 'rest', values: [2, 3] });
    });

    it('always reports a declared positional collector', () => {
      const argSpec = createArgSpec({ names: ['a'], varargs: 'rest' });
      expect(bind(argSpec, [1]).varargs).toEqual({ name: 'rest', values: [] });
    });

    it('collects leftover keywords', () => {
      const argSpec = createArgSpec({ names: ['a'], varkw: 'extra' });
      const binding = bind(argSpec, [], { a: 1, b: 2 });

      expect(binding.varkw?.name).toBe('extra');
      expect([...(binding.varkw?.values ?? [])]).toEqual([['b', 2]]);
    });

    it('binds every declared name when binding succeeds', () => {
      fc.assert(
        fc.property(
          fc.uniqueArray(identifier, { maxLength: 6 }),
          fc.nat(),
          (names, split) => {
            const cut = names.length === 0 ? 0 : split % (names.length + 1);
            const argSpec = createArgSpec({ names });
            const positional = names.slice(0, cut).map((_, idx) => idx);
            const keyword = Object.fromEntries(
              names.slice(cut).map((name, idx) => [name, idx] as const)
            );

            const binding = bind(argSpec, positional, keyword);
            expect([...binding.args.keys()]).toEqual(names);
            expect(Object.keys(toHostArgs(binding))).toEqual(names);
          }
        )
      );
    });

    it('always rejects a name supplied twice', () => {
      fc.assert(
        fc.property(
          fc.uniqueArray(identifier, { minLength: 1, maxLength: 6 }),
          fc.nat(),
          fc.nat(),
          (names, split, pick) => {
            const cut = 1 + (split % names.length);
            const duplicated = names[pick % cut] ?? '';
            const argSpec = createArgSpec({ names });
            const positional = names.slice(0, cut).map((_, idx) => idx);

            const error = captureError(() =>
              bind(argSpec, positional, { [duplicated]: 0 })
            );
            expect(error.errorId).toBe('SHAPE-B002');
          }
        )
      );
    });
  });

  describe('toHostArgs', () => {
    it('flattens names and collectors into a frozen record', () => {
      const argSpec = createArgSpec({
        names: ['a', 'b'],
        defaults: [2],
        varargs: 'rest',
        varkw: 'extra',
      });
      const record = toHostArgs(bind(argSpec, [1, 9, 8], { c: 3 }));

      expect(Object.keys(record)).toEqual(['a', 'b', 'rest', 'extra']);
      expect(record['a']).toBe(1);
      expect(record['b']).toBe(9);
      expect(record['rest']).toEqual([8]);
      expect(record['extra']).toEqual(createTuple([['c', 3]]));
      expect(Object.isFrozen(record)).toBe(true);
    });
  });
});
