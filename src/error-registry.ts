/**
 * Error Registry
 * Central diagnostic definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES AND SEVERITY
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'conversion' | 'shape' | 'handle' | 'parse';

/** Error severity level */
export type ErrorSeverity = 'error' | 'warning';

/** Registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: DOC-{category letter}{3-digit} (e.g., DOC-S001) */
  readonly errorId: string;
  /** Error category (determines ID prefix) */
  readonly category: ErrorCategory;
  /** Severity level (defaults to 'warning' when omitted) */
  readonly severity?: ErrorSeverity | undefined;
  /** Human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
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
  // Conversion Errors (DOC-C0xx)
  {
    errorId: 'DOC-C001',
    category: 'conversion',
    description: 'Value cannot be encoded',
    messageTemplate: 'Cannot encode {valueType} as a node: {reason}',
    cause:
      'The value is not a string, number, boolean, bigint, null, Date, array, Map, plain object or node, and no converter was given.',
    resolution:
      'Pass a converter whose encode() understands the value, or convert the value to plain data first.',
  },
  {
    errorId: 'DOC-C002',
    category: 'conversion',
    description: 'Key cannot be encoded',
    messageTemplate: 'Cannot encode {valueType} as a map key: {reason}',
    cause: 'A map lookup or insertion used a key that has no node encoding.',
    resolution: 'Use a scalar, a plain value or an existing node as the key.',
  },

  // Shape Errors (DOC-S0xx)
  {
    errorId: 'DOC-S001',
    category: 'shape',
    description: 'Push onto a non-sequence',
    messageTemplate: 'Cannot push onto a {type} node',
    cause: 'push() only appends to sequences and to null nodes.',
    resolution: 'Check isSequence() or isNull() before pushing.',
  },
  {
    errorId: 'DOC-S002',
    category: 'shape',
    description: 'Insert into a non-map',
    messageTemplate: 'Cannot insert a pair into a {type} node',
    cause: 'forceInsert() only works on maps, sequences and null nodes.',
    resolution: 'Assign a map to the node first.',
  },
  {
    errorId: 'DOC-S003',
    category: 'shape',
    description: 'Unusable index key',
    messageTemplate: 'Cannot index a {type} node with {key}',
    cause:
      'Scalars cannot be indexed, and sequences only take non-negative integer indices.',
    resolution: 'Use get() for lookups that may not match the node shape.',
  },
  {
    errorId: 'DOC-S004',
    category: 'shape',
    description: 'Style on a non-container',
    messageTemplate: 'Style applies to sequences and maps only, got {type}',
    cause: 'Presentation style is only tracked for containers.',
  },
  {
    errorId: 'DOC-S005',
    category: 'shape',
    description: 'Sequence padding limit exceeded',
    messageTemplate:
      'Index {index} would pad {padding} null elements, limit is {limit}',
    cause:
      'Writing far past the end of a sequence pads it with nulls up to the index.',
    resolution: 'Raise maxSequencePadding in the node context.',
  },

  // Handle Errors (DOC-H0xx)
  {
    errorId: 'DOC-H001',
    category: 'handle',
    description: 'Operation on an undefined node',
    messageTemplate: 'Cannot {operation} an undefined node',
    cause:
      'The handle came from a lookup that found nothing, or from indexing a node of the wrong shape.',
    resolution: 'Check isDefined() before mutating a looked-up node.',
  },
  {
    errorId: 'DOC-H002',
    category: 'handle',
    description: 'Stale iterator',
    messageTemplate: 'Iterator used after its {type} node was modified',
    cause: 'The iterated container changed structurally after begin().',
    resolution: 'Collect changes and apply them after the loop.',
  },

  // Parse Errors (DOC-P0xx)
  {
    errorId: 'DOC-P001',
    category: 'parse',
    severity: 'error',
    description: 'YAML syntax error',
    messageTemplate: '{message}',
    cause: 'The YAML parser rejected the input text.',
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
 * Missing context values render as empty string.
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Cannot push onto a {type} node", { type: "map" })
 * // Returns: "Cannot push onto a map node"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{' && template.charAt(i + 1) !== '{') {
      let j = i + 1;
      while (j < template.length && template.charAt(j) !== '}') {
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
          // Objects without a usable toString (null prototype)
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
