/**
 * Node Context Factory
 *
 * Creates the shared configuration handles carry, and routes diagnostics
 * to the configured callbacks.
 */

import { createError } from '../error-classes.js';
import type {
  NodeCallbacks,
  NodeContext,
  NodeContextOptions,
} from './types.js';

const DEFAULT_MAX_SEQUENCE_PADDING = 10_000;

const defaultCallbacks: NodeCallbacks = {
  onDiagnostic: (diagnostic) => {
    console.warn(`[${diagnostic.errorId}] ${diagnostic.message}`);
  },
};

/**
 * Create a node context.
 * Pass it to constructors or the loader to route diagnostics elsewhere.
 */
export function createNodeContext(
  options: NodeContextOptions = {}
): NodeContext {
  const maxSequencePadding =
    options.maxSequencePadding ?? DEFAULT_MAX_SEQUENCE_PADDING;
  if (!Number.isInteger(maxSequencePadding) || maxSequencePadding < 0) {
    throw new RangeError(
      `maxSequencePadding must be a non-negative integer, got ${maxSequencePadding}`
    );
  }

  return {
    callbacks: {
      onDiagnostic:
        options.callbacks?.onDiagnostic ?? defaultCallbacks.onDiagnostic,
    },
    maxSequencePadding,
  };
}

/** Context used by handles created without one */
export const DEFAULT_CONTEXT: NodeContext = createNodeContext();

/**
 * Emit a registry diagnostic through the context's callbacks.
 *
 * @example
 * reportDiagnostic(ctx, 'DOC-S001', { type: 'map' });
 * // Calls ctx.callbacks.onDiagnostic with a timestamped diagnostic
 */
export function reportDiagnostic(
  ctx: NodeContext,
  errorId: string,
  context: Record<string, unknown>
): void {
  const error = createError(errorId, context);
  ctx.callbacks.onDiagnostic({
    errorId,
    severity: error.severity,
    message: error.message,
    error,
    timestamp: new Date().toISOString(),
  });
}
