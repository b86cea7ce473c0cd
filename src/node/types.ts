/**
 * Node Types
 *
 * Public types shared by nodes, iterators, converters and the YAML
 * boundary. These types are the primary interface for host applications.
 */

import type { NodeError } from '../error-classes.js';
import type { ErrorSeverity } from '../error-registry.js';
import type { YamlNode } from './node.js';

/** Shape of a node. `undefined` is the type of an invalid handle. */
export type NodeType = 'undefined' | 'null' | 'scalar' | 'sequence' | 'map';

/** Shapes a node can actually hold */
export type DefinedNodeType = Exclude<NodeType, 'undefined'>;

/** Presentation hint for sequences and maps, read by the emitter */
export type NodeStyle = 'default' | 'block' | 'flow';

/** Scalar values accepted by the default encoder */
export type ScalarInput = string | number | boolean | bigint | null | Date;

/** List of encodable values */
export interface NodeInputList extends ReadonlyArray<NodeInput> {}

/** Map of encodable keys to encodable values */
export interface NodeInputMap extends ReadonlyMap<NodeInput, NodeInput> {}

/** Plain object of encodable values */
export interface NodeInputRecord {
  readonly [key: string]: NodeInput;
}

/** Any value the default encoder turns into a node */
export type NodeInput =
  | ScalarInput
  | YamlNode
  | NodeInputList
  | NodeInputMap
  | NodeInputRecord;

/** Outcome of decoding a node into a typed value */
export type DecodeResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly reason: string };

/**
 * Two-way conversion between nodes and typed values.
 *
 * `zero` is the fallback used by `as()` when no default is passed. It is
 * `undefined` for types without a natural zero value, which makes `as()`
 * return `T | undefined` until the caller supplies a default.
 */
export interface Converter<T, Z extends T | undefined = T | undefined> {
  /** Name used in failure reasons */
  readonly name: string;
  /** Fallback value for `as()` without an explicit default */
  readonly zero: Z;
  /** Decode a node; never throws */
  decode(node: YamlNode): DecodeResult<T>;
  /** Encode a value into node input; `undefined` when it cannot */
  encode(value: T): NodeInput | undefined;
}

/** A diagnostic emitted instead of raising to the caller */
export interface NodeDiagnostic {
  /** Registry error ID (e.g. DOC-S001) */
  readonly errorId: string;
  readonly severity: ErrorSeverity;
  readonly message: string;
  readonly error: NodeError;
  /** ISO timestamp of emission */
  readonly timestamp: string;
}

/** Logging callbacks for node operations */
export interface NodeCallbacks {
  /** Called when an operation fails without raising */
  onDiagnostic: (diagnostic: NodeDiagnostic) => void;
}

/** Shared configuration for every handle of a tree */
export interface NodeContext {
  readonly callbacks: NodeCallbacks;
  /** Most null elements a single indexing operation may pad a sequence with */
  readonly maxSequencePadding: number;
}

/** Options for creating a node context */
export interface NodeContextOptions {
  /** Diagnostic callbacks (missing entries use the console defaults) */
  callbacks?: Partial<NodeCallbacks>;
  /** Padding limit for sequence indexing (default 10000) */
  maxSequencePadding?: number;
}

/** Options accepted by node constructors */
export interface NodeOptions {
  context?: NodeContext;
}

/** Key or index accepted by indexing, lookup and removal */
export type NodeKey = NodeInput;
