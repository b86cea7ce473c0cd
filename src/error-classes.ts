/**
 * Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorSeverity,
} from './error-registry.js';

// ============================================================
// SOURCE LOCATION
// ============================================================

/** Position in YAML source text (1-based line and column) */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface NodeErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create an error from the registry.
 *
 * Looks up the definition, renders its message template with `context`,
 * and returns a NodeError carrying the structured metadata.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError("DOC-S001", { type: "map" })
 * // NodeError: "Cannot push onto a map node"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation | undefined
): NodeError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const message = renderMessage(definition.messageTemplate, context);
  if (definition.category === 'parse' && location !== undefined) {
    return new ParseError(errorId, message, location, context);
  }
  return new NodeError({ errorId, message, location, context });
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all document node errors.
 * Node operations never throw these; they are handed to the diagnostic
 * callback. Only the YAML loader raises them.
 */
export class NodeError extends Error {
  readonly errorId: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: NodeErrorData) {
    const definition = ERROR_REGISTRY.get(data.errorId);
    if (!definition) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'NodeError';
    this.errorId = data.errorId;
    this.category = definition.category;
    this.severity = definition.severity ?? 'warning';
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): NodeErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: NodeErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return `[${this.errorId}] ${this.message}`;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** YAML text that the loader could not parse */
export class ParseError extends NodeError {
  declare readonly location: SourceLocation;

  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    const definition = ERROR_REGISTRY.get(errorId);
    if (!definition) {
      throw new TypeError(`Unknown error ID: ${errorId}`);
    }
    if (definition.category !== 'parse') {
      throw new TypeError(`Expected parse error ID, got: ${errorId}`);
    }

    super({ errorId, message, location, context });
    this.name = 'ParseError';
  }
}
