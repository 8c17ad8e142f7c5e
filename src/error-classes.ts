/**
 * Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface ShapeErrorData {
  readonly errorId: string;
  readonly kind: string;
  readonly message: string;
  readonly context?: Record<string, unknown> | undefined;
}

function lookup(errorId: string, category?: ErrorCategory): ErrorDefinition {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (category !== undefined && definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return definition;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all callshape errors.
 * The message is rendered from the registry template and the context.
 */
export class ShapeError extends Error {
  readonly errorId: string;
  readonly kind: string;
  readonly context: Record<string, unknown>;

  constructor(
    errorId: string,
    context: Record<string, unknown> = {},
    category?: ErrorCategory
  ) {
    const definition = lookup(errorId, category);
    super(renderMessage(definition.messageTemplate, context));
    this.name = 'ShapeError';
    this.errorId = errorId;
    this.kind = definition.kind;
    this.context = context;
  }

  /** Get structured error data for custom formatting */
  toData(): ShapeErrorData {
    return {
      errorId: this.errorId,
      kind: this.kind,
      message: this.message,
      context: this.context,
    };
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Failures binding arguments to an ArgSpec */
export class BindingError extends ShapeError {
  constructor(errorId: string, context: Record<string, unknown> = {}) {
    super(errorId, context, 'binding');
    this.name = 'BindingError';
  }
}

/** Values or types lacking the argument-tuple shape */
export class TupleShapeError extends ShapeError {
  constructor(errorId: string, context: Record<string, unknown> = {}) {
    super(errorId, context, 'shape');
    this.name = 'TupleShapeError';
  }
}

/** Unpack feasibility contradicts the requested convention */
export class AdapterError extends ShapeError {
  constructor(errorId: string, context: Record<string, unknown> = {}) {
    super(errorId, context, 'adapter');
    this.name = 'AdapterError';
  }
}

/** Type conversion and inference failures */
export class TypeSystemError extends ShapeError {
  constructor(errorId: string, context: Record<string, unknown> = {}) {
    super(errorId, context, 'type');
    this.name = 'TypeSystemError';
  }
}

/** Where a mismatching value sat in the incoming argument */
export interface MismatchSite {
  readonly position?: number | undefined;
  readonly elementName?: string | undefined;
}

/** Runtime value not assignable to the expected type */
export class TypeMismatchError extends TypeSystemError {
  readonly expectedType: string;
  readonly actualType: string;
  readonly position: number | undefined;
  readonly elementName: string | undefined;

  constructor(
    expectedType: string,
    actualType: string,
    site: MismatchSite = {}
  ) {
    const { position, elementName } = site;
    let subject = 'an argument';
    if (position !== undefined) {
      subject = `element at position ${position}`;
    } else if (elementName !== undefined) {
      subject = `element named ${elementName}`;
    }
    super('SHAPE-T001', {
      subject,
      expectedType,
      actualType,
      position,
      elementName,
    });
    this.name = 'TypeMismatchError';
    this.expectedType = expectedType;
    this.actualType = actualType;
    this.position = position;
    this.elementName = elementName;
  }
}

/** Signature lookup and ArgSpec validation failures */
export class ReflectionError extends ShapeError {
  constructor(errorId: string, context: Record<string, unknown> = {}) {
    super(errorId, context, 'reflection');
    this.name = 'ReflectionError';
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create the error class matching a registry entry's category.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError('SHAPE-B003', { paramName: 'x' })
 * // BindingError: "Argument 'x' was not specified and does not have a default"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown> = {}
): ShapeError {
  const definition = lookup(errorId);
  switch (definition.category) {
    case 'binding':
      return new BindingError(errorId, context);
    case 'shape':
      return new TupleShapeError(errorId, context);
    case 'adapter':
      return new AdapterError(errorId, context);
    case 'type':
      return new TypeSystemError(errorId, context);
    case 'reflection':
      return new ReflectionError(errorId, context);
  }
}
