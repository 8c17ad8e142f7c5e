/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory =
  | 'binding'
  | 'shape'
  | 'adapter'
  | 'type'
  | 'reflection';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: SHAPE-{category letter}{3-digit} (e.g., SHAPE-B001) */
  readonly errorId: string;
  /** Stable failure name, independent of the numeric ID */
  readonly kind: string;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Registry of all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Binding Errors (SHAPE-B0xx)
  {
    errorId: 'SHAPE-B001',
    kind: 'TooManyPositionalArguments',
    category: 'binding',
    description: 'Too many positional arguments',
    messageTemplate:
      'Too many positional arguments for {signature}: expected at most {expectedCount}, found {actualCount}',
    resolution:
      'Pass fewer positional arguments, or declare a variadic-positional collector.',
  },
  {
    errorId: 'SHAPE-B002',
    kind: 'DuplicateArgument',
    category: 'binding',
    description: 'Argument bound twice',
    messageTemplate: "Argument '{paramName}' specified twice",
    resolution:
      'Supply the argument either positionally or by keyword, not both.',
  },
  {
    errorId: 'SHAPE-B003',
    kind: 'MissingArgument',
    category: 'binding',
    description: 'Missing required argument',
    messageTemplate:
      "Argument '{paramName}' was not specified and does not have a default",
  },
  {
    errorId: 'SHAPE-B004',
    kind: 'UnexpectedKeywordArguments',
    category: 'binding',
    description: 'Unexpected keyword arguments',
    messageTemplate: 'Unexpected keyword arguments in the call: {names}',
    resolution: 'Remove the keywords, or declare a variadic-keyword collector.',
  },

  // Tuple Shape Errors (SHAPE-S0xx)
  {
    errorId: 'SHAPE-S001',
    kind: 'NotArgumentTuple',
    category: 'shape',
    description: 'Not an argument tuple',
    messageTemplate: 'Expected an argument tuple, found {found}',
    resolution:
      'Use a tuple in which every unnamed element precedes every named element.',
  },
  {
    errorId: 'SHAPE-S002',
    kind: 'MissingTupleElement',
    category: 'shape',
    description: 'Tuple element missing',
    messageTemplate: 'Argument tuple has no element {element}',
  },
  {
    errorId: 'SHAPE-S003',
    kind: 'InvalidTupleElement',
    category: 'shape',
    description: 'Invalid tuple element name',
    messageTemplate: 'Invalid tuple element name {name}: {reason}',
  },

  // Adapter Errors (SHAPE-A0xx)
  {
    errorId: 'SHAPE-A001',
    kind: 'IncompatibleNoParameterSignature',
    category: 'adapter',
    description: 'Cannot call without arguments',
    messageTemplate:
      'The signature {signature} of {functionName} cannot be interpreted as a body of a no-parameter computation',
  },
  {
    errorId: 'SHAPE-A002',
    kind: 'CannotAcceptAsSingleArgument',
    category: 'adapter',
    description: 'Cannot accept as a single argument',
    messageTemplate:
      '{functionName} with signature {signature} cannot accept a value of type {parameterType} as a single argument',
  },
  {
    errorId: 'SHAPE-A003',
    kind: 'CannotAcceptAsMultipleArguments',
    category: 'adapter',
    description: 'Cannot accept as multiple arguments',
    messageTemplate:
      '{functionName} with signature {signature} cannot accept a value of type {parameterType} as multiple positional and/or keyword arguments',
  },
  {
    errorId: 'SHAPE-A004',
    kind: 'CannotAcceptEitherForm',
    category: 'adapter',
    description: 'Cannot accept in either form',
    messageTemplate:
      '{functionName} with signature {signature} cannot accept a value of type {parameterType} as either a single argument or multiple positional and/or keyword arguments',
  },
  {
    errorId: 'SHAPE-A005',
    kind: 'AmbiguousUnpackingChoice',
    category: 'adapter',
    description: 'Ambiguous unpacking',
    messageTemplate:
      '{functionName} with signature {signature} could accept a value of type {parameterType} as either a single argument or multiple positional and/or keyword arguments, and no unpack preference was given',
    resolution: "Pass 'required' or 'forbidden' as the unpack preference.",
  },

  // Type Errors (SHAPE-T0xx)
  {
    errorId: 'SHAPE-T001',
    kind: 'TypeMismatch',
    category: 'type',
    description: 'Type mismatch',
    messageTemplate: 'Expected {subject} of type {expectedType}, found {actualType}',
  },
  {
    errorId: 'SHAPE-T002',
    kind: 'TypeInferenceFailed',
    category: 'type',
    description: 'Cannot infer type',
    messageTemplate: 'Cannot infer the type of {value}: {reason}',
  },
  {
    errorId: 'SHAPE-T003',
    kind: 'InvalidTypeSpec',
    category: 'type',
    description: 'Invalid type spec',
    messageTemplate: 'Cannot convert {spec} to a type: {reason}',
  },

  // Reflection Errors (SHAPE-R0xx)
  {
    errorId: 'SHAPE-R001',
    kind: 'UnsupportedCallableKind',
    category: 'reflection',
    description: 'Signature not introspectable',
    messageTemplate:
      "Cannot read the signature of {callableKind} callable '{functionName}'",
    resolution: 'Wrap the function with defineFunction and declare its ArgSpec.',
  },
  {
    errorId: 'SHAPE-R002',
    kind: 'InvalidArgSpec',
    category: 'reflection',
    description: 'Malformed ArgSpec',
    messageTemplate: 'Invalid ArgSpec: {reason}',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Non-string values are coerced via String().
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Expected {expected}, got {actual}", {expected: "int", actual: "float"})
 * // Returns: "Expected int, got float"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      let j = i + 1;
      while (j < template.length && template[j] !== '}') {
        j++;
      }

      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        try {
          result += String(value);
        } catch {
          // String() coercion failed (e.g. null-prototype object)
          result += Object.prototype.toString.call(value);
        }
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
