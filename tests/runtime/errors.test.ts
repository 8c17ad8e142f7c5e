/**
 * callshape Runtime Tests: Error Taxonomy
 * Tests for the error registry, template rendering, error classes and the factory
 */

import { describe, expect, it } from 'vitest';

import {
  AdapterError,
  BindingError,
  createError,
  ERROR_REGISTRY,
  ReflectionError,
  renderMessage,
  ShapeError,
  TupleShapeError,
  TypeMismatchError,
  TypeSystemError,
} from '../../src/index.js';

const CATEGORY_LETTERS = {
  binding: 'B',
  shape: 'S',
  adapter: 'A',
  type: 'T',
  reflection: 'R',
} as const;

describe('callshape Runtime: Error Taxonomy', () => {
  describe('Registry', () => {
    it('holds every error definition', () => {
      expect(ERROR_REGISTRY.size).toBe(17);
      expect(ERROR_REGISTRY.has('SHAPE-A005')).toBe(true);
      expect(ERROR_REGISTRY.get('SHAPE-X999')).toBeUndefined();
    });

    it('uses IDs matching the category letter', () => {
      for (const [errorId, definition] of ERROR_REGISTRY.entries()) {
        expect(errorId).toMatch(/^SHAPE-[BSATR]\d{3}$/);
        expect(errorId.charAt(6)).toBe(CATEGORY_LETTERS[definition.category]);
        expect(definition.errorId).toBe(errorId);
      }
    });

    it('gives every error a distinct kind', () => {
      const kinds = [...ERROR_REGISTRY.entries()].map(([, def]) => def.kind);
      expect(new Set(kinds).size).toBe(kinds.length);
    });

    it('keeps descriptions short', () => {
      for (const [, definition] of ERROR_REGISTRY.entries()) {
        expect(definition.description.length).toBeLessThanOrEqual(50);
      }
    });
  });

  describe('renderMessage', () => {
    it('substitutes placeholders', () => {
      expect(
        renderMessage('Expected {expected}, got {actual}', {
          expected: 'int',
          actual: 'float',
        })
      ).toBe('Expected int, got float');
    });

    it('renders missing values as empty', () => {
      expect(renderMessage('Value: {missing}!', {})).toBe('Value: !');
    });

    it('stringifies non-string values', () => {
      expect(renderMessage('{count} items', { count: 3 })).toBe('3 items');
    });

    it('returns the template unchanged on an unclosed brace', () => {
      expect(renderMessage('Hello {name', { name: 'x' })).toBe('Hello {name');
    });
  });

  describe('Error classes', () => {
    it('renders the registry message and keeps the context', () => {
      const error = new BindingError('SHAPE-B002', { paramName: 'x' });

      expect(error).toBeInstanceOf(ShapeError);
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('BindingError');
      expect(error.message).toBe("Argument 'x' specified twice");
      expect(error.toData()).toEqual({
        errorId: 'SHAPE-B002',
        kind: 'DuplicateArgument',
        message: "Argument 'x' specified twice",
        context: { paramName: 'x' },
      });
    });

    it('rejects IDs of another category', () => {
      expect(() => new BindingError('SHAPE-A001')).toThrow(
        'Expected binding error ID, got: SHAPE-A001'
      );
    });

    it('rejects unknown IDs', () => {
      expect(() => new ShapeError('SHAPE-X999')).toThrow(
        'Unknown error ID: SHAPE-X999'
      );
    });
  });

  describe('TypeMismatchError', () => {
    it('describes a whole argument', () => {
      const error = new TypeMismatchError('int', 'float');

      expect(error).toBeInstanceOf(TypeSystemError);
      expect(error.kind).toBe('TypeMismatch');
      expect(error.message).toBe('Expected an argument of type int, found float');
    });

    it('describes an element by position', () => {
      const error = new TypeMismatchError('int', 'float', { position: 1 });

      expect(error.message).toBe(
        'Expected element at position 1 of type int, found float'
      );
      expect(error.position).toBe(1);
      expect(error.elementName).toBeUndefined();
    });

    it('describes an element by name', () => {
      const error = new TypeMismatchError('int', 'float', { elementName: 'b' });

      expect(error.message).toBe(
        'Expected element named b of type int, found float'
      );
      expect(error.expectedType).toBe('int');
      expect(error.actualType).toBe('float');
    });
  });

  describe('createError', () => {
    it('picks the class from the category', () => {
      expect(createError('SHAPE-B003', { paramName: 'x' })).toBeInstanceOf(
        BindingError
      );
      expect(createError('SHAPE-S001', { found: '5' })).toBeInstanceOf(
        TupleShapeError
      );
      expect(createError('SHAPE-A004')).toBeInstanceOf(AdapterError);
      expect(createError('SHAPE-T002')).toBeInstanceOf(TypeSystemError);
      expect(createError('SHAPE-R001')).toBeInstanceOf(ReflectionError);
    });

    it('renders the message from the context', () => {
      expect(createError('SHAPE-B003', { paramName: 'x' }).message).toBe(
        "Argument 'x' was not specified and does not have a default"
      );
    });

    it('rejects unknown IDs', () => {
      expect(() => createError('SHAPE-X999')).toThrow(TypeError);
    });
  });
});
