/**
 * docnode
 * Exports the node model, iterators, converters and the YAML boundary
 */

export { YamlNode } from './node/node.js';
export { NodeIterator } from './node/iterator.js';
export { createNodeContext, DEFAULT_CONTEXT } from './node/context.js';
export type {
  Converter,
  DecodeResult,
  DefinedNodeType,
  NodeCallbacks,
  NodeContext,
  NodeContextOptions,
  NodeDiagnostic,
  NodeInput,
  NodeInputList,
  NodeInputMap,
  NodeInputRecord,
  NodeKey,
  NodeOptions,
  NodeStyle,
  NodeType,
  ScalarInput,
} from './node/types.js';

// ============================================================
// CONVERSION
// ============================================================
export {
  Converters,
  defineConverter,
  type PlainData,
  type PlainList,
  type PlainRecord,
} from './convert/converters.js';

// ============================================================
// YAML BOUNDARY
// ============================================================
export { load, loadAll, loadFile, type LoadOptions } from './yaml/load.js';
export { emit, emitAll, type EmitOptions } from './yaml/emit.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
  type ErrorSeverity,
  ERROR_REGISTRY,
  renderMessage,
} from './error-registry.js';
export {
  createError,
  NodeError,
  ParseError,
  type NodeErrorData,
  type SourceLocation,
} from './error-classes.js';
