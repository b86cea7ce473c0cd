/**
 * YamlNode
 *
 * Handle to a node of a mutable document tree. A node is null, a scalar,
 * a sequence or a map; a handle without storage is undefined.
 *
 * Handles alias storage: children returned by indexing and iteration are
 * views into the parent, and assigning a node makes the target share the
 * source's content. No operation throws. Failures return a default,
 * `false` or an undefined handle and report a diagnostic to the context.
 *
 * Nodes are not synchronized. Mutating shared storage from several places
 * at once must be serialized by the caller.
 */

import { plain, type PlainData } from '../convert/converters.js';
import { parseInteger } from '../convert/resolve.js';
import { emit } from '../yaml/emit.js';
import { DEFAULT_CONTEXT, reportDiagnostic } from './context.js';
import { describeValue, encodeValue, type EncodeResult } from './encode.js';
import { refEquals } from './equals.js';
import { NodeIterator } from './iterator.js';
import {
  childCount,
  cloneCell,
  emptyCell,
  isContainer,
  scalarCell,
  type NodeCell,
  type NodePair,
  type NodeRef,
} from './storage.js';
import type {
  Converter,
  DecodeResult,
  DefinedNodeType,
  NodeContext,
  NodeInput,
  NodeKey,
  NodeOptions,
  NodeStyle,
  NodeType,
} from './types.js';

export class YamlNode implements Iterable<[YamlNode, YamlNode]> {
  private cell: NodeCell | undefined;
  private readonly ctx: NodeContext;

  /**
   * Create a null node, a node encoding `value`, or (when `value` is a
   * node) a view sharing that node's storage.
   */
  constructor(value?: NodeInput, options: NodeOptions = {}) {
    if (value instanceof YamlNode) {
      this.ctx = options.context ?? value.ctx;
      this.cell = value.cell;
      return;
    }

    this.ctx = options.context ?? DEFAULT_CONTEXT;
    if (value === undefined) {
      this.cell = emptyCell();
      return;
    }

    const encoded = encodeValue(value);
    if (encoded.ok) {
      this.cell = encoded.cell;
    } else {
      this.cell = emptyCell();
      this.report('DOC-C001', {
        valueType: describeValue(value),
        reason: encoded.reason,
      });
    }
  }

  // ============================================================
  // FACTORIES
  // ============================================================

  /** Empty node of the given shape */
  static ofType(type: DefinedNodeType, options: NodeOptions = {}): YamlNode {
    return YamlNode.fromCell(emptyCell(type), options.context ?? DEFAULT_CONTEXT);
  }

  /** Node holding a value encoded by a converter; null when encoding fails */
  static from<T>(
    value: T,
    converter: Converter<T>,
    options: NodeOptions = {}
  ): YamlNode {
    const node = new YamlNode(undefined, options);
    node.assign(value, converter);
    return node;
  }

  /** @internal Handle over an existing cell (undefined for an invalid handle) */
  static fromCell(cell: NodeCell | undefined, context: NodeContext): YamlNode {
    const node = new YamlNode(undefined, { context });
    node.cell = cell;
    return node;
  }

  /** @internal Storage cell behind a handle */
  static cellOf(node: YamlNode): NodeCell | undefined {
    return node.cell;
  }

  /** Context shared by this handle and every handle derived from it */
  get context(): NodeContext {
    return this.ctx;
  }

  // ============================================================
  // TYPE INSPECTION
  // ============================================================

  type(): NodeType {
    return this.cell?.ref.type ?? 'undefined';
  }

  isDefined(): boolean {
    return this.cell !== undefined;
  }

  isNull(): boolean {
    return this.type() === 'null';
  }

  isScalar(): boolean {
    return this.type() === 'scalar';
  }

  isSequence(): boolean {
    return this.type() === 'sequence';
  }

  isMap(): boolean {
    return this.type() === 'map';
  }

  /** Defined and not null */
  isTruthy(): boolean {
    return this.isDefined() && !this.isNull();
  }

  /** Undefined or null */
  isFalsy(): boolean {
    return !this.isTruthy();
  }

  // ============================================================
  // STYLE AND TAG
  // ============================================================

  /** Presentation style; always 'default' for scalars and null */
  style(): NodeStyle {
    const ref = this.cell?.ref;
    return ref && isContainer(ref) ? ref.style : 'default';
  }

  setStyle(style: NodeStyle): boolean {
    const ref = this.cell?.ref;
    if (!ref) {
      this.report('DOC-H001', { operation: 'set the style of' });
      return false;
    }
    if (!isContainer(ref)) {
      this.report('DOC-S004', { type: ref.type });
      return false;
    }
    ref.style = style;
    return true;
  }

  /** YAML tag ('!' marks a scalar that must be read as a string) */
  tag(): string {
    return this.cell?.ref.tag ?? '';
  }

  setTag(tag: string): boolean {
    const ref = this.cell?.ref;
    if (!ref) {
      this.report('DOC-H001', { operation: 'tag' });
      return false;
    }
    ref.tag = tag;
    return true;
  }

  // ============================================================
  // EQUALITY
  // ============================================================

  /** Structural equality; style, tag and aliasing are ignored */
  is(other: YamlNode): boolean {
    const a = this.cell?.ref;
    const b = other.cell?.ref;
    if (!a || !b) return a === b;
    return refEquals(a, b);
  }

  equals(other: YamlNode): boolean {
    return this.is(other);
  }

  /** Whether both handles share the same storage */
  sameAs(other: YamlNode): boolean {
    const ref = this.cell?.ref;
    return ref !== undefined && ref === other.cell?.ref;
  }

  // ============================================================
  // ASSIGNMENT
  // ============================================================

  /**
   * Replace this node's content with an encoded value, visible through
   * every alias. Assigning a node makes this node share its storage.
   *
   * @returns false (content unchanged) when the handle is undefined or the
   * value cannot be encoded
   */
  assign(value: NodeInput): boolean;
  assign<T>(value: T, converter: Converter<T>): boolean;
  assign(value: unknown, converter?: Converter<unknown>): boolean {
    const cell = this.cell;
    if (!cell) {
      this.report('DOC-H001', { operation: 'assign to' });
      return false;
    }

    if (converter === undefined && value instanceof YamlNode) {
      if (!value.cell) {
        this.report('DOC-H001', { operation: 'assign from' });
        return false;
      }
      cell.ref = value.cell.ref;
      return true;
    }

    const encoded = this.encodeArgument(value, converter);
    if (!encoded.ok) {
      this.report('DOC-C001', {
        valueType: describeValue(value),
        reason: encoded.reason,
      });
      return false;
    }
    cell.ref.setContent(encoded.cell.ref);
    return true;
  }

  /**
   * Point this handle at another node's storage (default: a fresh null
   * node). Other holders of the previous storage are not affected.
   */
  reset(other: YamlNode = new YamlNode(undefined, { context: this.ctx })): boolean {
    if (!this.cell || !other.cell) {
      this.report('DOC-H001', { operation: 'reset' });
      return false;
    }
    this.cell = other.cell;
    return true;
  }

  /** Deep copy; aliasing and cycles inside the subtree are preserved */
  clone(): YamlNode {
    return YamlNode.fromCell(
      this.cell ? cloneCell(this.cell) : undefined,
      this.ctx
    );
  }

  // ============================================================
  // TYPED ACCESS
  // ============================================================

  /** Decode with a converter, reporting why it failed */
  decode<T>(converter: Converter<T>): DecodeResult<T> {
    try {
      return converter.decode(this);
    } catch (error) {
      return {
        ok: false,
        reason: error instanceof Error ? error.message : String(error),
      };
    }
  }

  /** Decoded value, or undefined when decoding fails */
  asOptional<T>(converter: Converter<T>): T | undefined {
    const result = this.decode(converter);
    return result.ok ? result.value : undefined;
  }

  /**
   * Decoded value, or the fallback when decoding fails. Without a
   * default the converter's zero value is used, which is undefined for
   * types that have none.
   *
   * @example
   * node.as(Converters.integer, 42) // 42 when node holds "hello"
   */
  as<T, Z extends T | undefined>(converter: Converter<T, Z>): T | Z;
  as<T>(converter: Converter<T>, defaultValue: T): T;
  as<T, Z extends T | undefined>(
    converter: Converter<T, Z>,
    defaultValue?: T
  ): T | Z {
    const result = this.decode(converter);
    if (result.ok) return result.value;
    return defaultValue !== undefined ? defaultValue : converter.zero;
  }

  /** Whether decoding would succeed */
  canConvertTo<T>(converter: Converter<T>): boolean {
    return this.decode(converter).ok;
  }

  /** Raw text of a scalar, '' for anything else */
  scalar(): string {
    const ref = this.cell?.ref;
    return ref?.type === 'scalar' ? ref.scalar : '';
  }

  /** Scalar text, or the YAML rendering of the node for diagnostics */
  getContent(): string {
    const ref = this.cell?.ref;
    if (!ref) return '';
    if (ref.type === 'scalar') return ref.scalar;
    return emit(this).replace(/\n$/, '');
  }

  /** Plain JS value (core-schema scalars); undefined for undefined nodes and cycles */
  toJS(): PlainData | undefined {
    return this.asOptional(plain);
  }

  toString(): string {
    return this.getContent();
  }

  // ============================================================
  // SIZE AND ITERATION
  // ============================================================

  /** Child count for sequences and maps, 0 otherwise */
  size(): number {
    const ref = this.cell?.ref;
    return ref ? childCount(ref) : 0;
  }

  /**
   * Cursor at the first child. A null node is turned into an empty
   * sequence first; use entries() to iterate without that side effect.
   */
  begin(): NodeIterator {
    return new NodeIterator(this.iterationSource(), 0, this.ctx);
  }

  /** Cursor past the last child. Turns a null node into a sequence like begin(). */
  end(): NodeIterator {
    const ref = this.iterationSource();
    return new NodeIterator(ref, ref ? childCount(ref) : 0, this.ctx);
  }

  private iterationSource(): NodeRef | undefined {
    const ref = this.cell?.ref;
    if (ref?.type === 'null') ref.reshape('sequence');
    return ref;
  }

  /**
   * Read-only iteration over [key, value] pairs. Sequences yield their
   * index as a scalar key. Iterates a snapshot of the children.
   */
  *entries(): Generator<[YamlNode, YamlNode], void, undefined> {
    const ref = this.cell?.ref;
    if (ref?.type === 'sequence') {
      const items = [...ref.items];
      for (let i = 0; i < items.length; i++) {
        yield [
          YamlNode.fromCell(scalarCell(String(i)), this.ctx),
          YamlNode.fromCell(items[i], this.ctx),
        ];
      }
    } else if (ref?.type === 'map') {
      for (const pair of [...ref.pairs]) {
        yield [
          YamlNode.fromCell(pair.key, this.ctx),
          YamlNode.fromCell(pair.value, this.ctx),
        ];
      }
    }
  }

  *keys(): Generator<YamlNode, void, undefined> {
    for (const [key] of this.entries()) yield key;
  }

  *values(): Generator<YamlNode, void, undefined> {
    for (const [, value] of this.entries()) yield value;
  }

  [Symbol.iterator](): Iterator<[YamlNode, YamlNode]> {
    return this.entries();
  }

  // ============================================================
  // SEQUENCE AND MAP MUTATION
  // ============================================================

  /**
   * Append an element, turning a null node into a sequence. Nodes are
   * appended by alias.
   */
  push(value: NodeInput): boolean;
  push<T>(value: T, converter: Converter<T>): boolean;
  push(value: unknown, converter?: Converter<unknown>): boolean {
    const ref = this.cell?.ref;
    if (!ref) {
      this.report('DOC-H001', { operation: 'push onto' });
      return false;
    }
    if (ref.type !== 'null' && ref.type !== 'sequence') {
      this.report('DOC-S001', { type: ref.type });
      return false;
    }

    const encoded = this.encodeArgument(value, converter);
    if (!encoded.ok) {
      this.report('DOC-C001', {
        valueType: describeValue(value),
        reason: encoded.reason,
      });
      return false;
    }

    if (ref.type === 'null') ref.reshape('sequence');
    ref.items.push(encoded.cell);
    ref.touch();
    return true;
  }

  /**
   * Append a key/value pair even when the key already exists. A null node
   * becomes a map; a sequence becomes a map keyed by its indices.
   */
  forceInsert(key: NodeKey, value: NodeInput): boolean {
    const ref = this.cell?.ref;
    if (!ref) {
      this.report('DOC-H001', { operation: 'insert into' });
      return false;
    }
    if (ref.type === 'scalar') {
      this.report('DOC-S002', { type: ref.type });
      return false;
    }

    const encodedKey = encodeValue(key);
    if (!encodedKey.ok) {
      this.report('DOC-C002', {
        valueType: describeValue(key),
        reason: encodedKey.reason,
      });
      return false;
    }
    const encodedValue = encodeValue(value);
    if (!encodedValue.ok) {
      this.report('DOC-C001', {
        valueType: describeValue(value),
        reason: encodedValue.reason,
      });
      return false;
    }

    if (ref.type === 'null') ref.reshape('map');
    if (ref.type === 'sequence') ref.sequenceToMap();
    ref.pairs.push({ key: encodedKey.cell, value: encodedValue.cell });
    ref.touch();
    return true;
  }

  // ============================================================
  // INDEXING
  // ============================================================

  /**
   * Child at `key`, creating structure as needed:
   * - map (or null with any key other than an index number): the value
   *   for `key`, adding a null entry when absent
   * - sequence (or null with a non-negative integer number): the element,
   *   padding with nulls up to and including the index. Integer text and
   *   integer scalar nodes index an existing sequence too.
   *
   * Scalars and unusable keys yield an undefined handle.
   *
   * @example
   * root.getOrCreate('a').getOrCreate('b').assign(5); // root is {a: {b: 5}}
   */
  getOrCreate(key: NodeKey): YamlNode {
    const ref = this.cell?.ref;
    if (!ref) {
      this.report('DOC-H001', { operation: 'index' });
      return this.invalid();
    }
    if (ref.type === 'scalar') {
      this.report('DOC-S003', { type: ref.type, key: describeKey(key) });
      return this.invalid();
    }

    if (ref.type === 'sequence') {
      return this.elementOrCreate(ref, toIndex(key), key);
    }
    if (ref.type === 'null' && typeof key === 'number') {
      const index = toIndex(key);
      if (index !== undefined) return this.elementOrCreate(ref, index, key);
    }
    return this.valueOrCreate(ref, key);
  }

  private elementOrCreate(
    ref: NodeRef,
    index: number | undefined,
    key: NodeKey
  ): YamlNode {
    if (index === undefined) {
      this.report('DOC-S003', { type: ref.type, key: describeKey(key) });
      return this.invalid();
    }

    const padding = index - childCount(ref);
    if (padding > this.ctx.maxSequencePadding) {
      this.report('DOC-S005', {
        index,
        padding,
        limit: this.ctx.maxSequencePadding,
      });
      return this.invalid();
    }

    if (ref.type === 'null') ref.reshape('sequence');
    if (index >= ref.items.length) {
      while (ref.items.length <= index) ref.items.push(emptyCell());
      ref.touch();
    }
    return YamlNode.fromCell(ref.items[index], this.ctx);
  }

  private valueOrCreate(ref: NodeRef, key: NodeKey): YamlNode {
    const encodedKey = encodeValue(key);
    if (!encodedKey.ok) {
      this.report('DOC-C002', {
        valueType: describeValue(key),
        reason: encodedKey.reason,
      });
      return this.invalid();
    }

    if (ref.type === 'null') ref.reshape('map');
    const existing = findPair(ref.pairs, encodedKey.cell.ref);
    if (existing) return YamlNode.fromCell(existing.value, this.ctx);

    const value = emptyCell();
    ref.pairs.push({ key: encodedKey.cell, value });
    ref.touch();
    return YamlNode.fromCell(value, this.ctx);
  }

  /** Read-only lookup; undefined handle when absent. Never mutates. */
  get(key: NodeKey): YamlNode {
    const ref = this.cell?.ref;
    if (ref?.type === 'sequence') {
      const index = toIndex(key);
      return YamlNode.fromCell(
        index === undefined ? undefined : ref.items[index],
        this.ctx
      );
    }
    if (ref?.type === 'map') {
      const encodedKey = encodeValue(key);
      const pair = encodedKey.ok
        ? findPair(ref.pairs, encodedKey.cell.ref)
        : undefined;
      return YamlNode.fromCell(pair?.value, this.ctx);
    }
    return this.invalid();
  }

  has(key: NodeKey): boolean {
    return this.get(key).isDefined();
  }

  /** Read-only lookup along a path of keys and indices */
  getIn(path: readonly NodeKey[]): YamlNode {
    let node: YamlNode = this;
    for (const key of path) {
      node = node.get(key);
      if (!node.isDefined()) break;
    }
    return node;
  }

  /** Assign at the end of a path, creating intermediate structure */
  setIn(path: readonly NodeKey[], value: NodeInput): boolean {
    let node: YamlNode = this;
    for (const key of path) {
      node = node.getOrCreate(key);
      if (!node.isDefined()) return false;
    }
    return node.assign(value);
  }

  /**
   * Remove the first pair matching `key` (map) or the element at the
   * index (sequence).
   *
   * @returns whether anything was removed
   */
  remove(key: NodeKey): boolean {
    const ref = this.cell?.ref;
    if (ref?.type === 'sequence') {
      const index = toIndex(key);
      if (index === undefined || index >= ref.items.length) return false;
      ref.items.splice(index, 1);
      ref.touch();
      return true;
    }
    if (ref?.type === 'map') {
      const encodedKey = encodeValue(key);
      if (!encodedKey.ok) return false;
      const index = ref.pairs.findIndex((pair) =>
        refEquals(pair.key.ref, encodedKey.cell.ref)
      );
      if (index < 0) return false;
      ref.pairs.splice(index, 1);
      ref.touch();
      return true;
    }
    return false;
  }

  // ============================================================
  // HELPERS
  // ============================================================

  private invalid(): YamlNode {
    return YamlNode.fromCell(undefined, this.ctx);
  }

  private report(errorId: string, context: Record<string, unknown>): void {
    reportDiagnostic(this.ctx, errorId, context);
  }

  private encodeArgument(
    value: unknown,
    converter: Converter<unknown> | undefined
  ): EncodeResult {
    if (converter === undefined) return encodeValue(value);

    let input: NodeInput | undefined;
    try {
      input = converter.encode(value);
    } catch (error) {
      return {
        ok: false,
        reason: error instanceof Error ? error.message : String(error),
      };
    }
    if (input === undefined) {
      return { ok: false, reason: `${converter.name} converter rejected it` };
    }
    return encodeValue(input);
  }
}

function findPair(
  pairs: readonly NodePair[],
  key: NodeRef
): NodePair | undefined {
  return pairs.find((pair) => refEquals(pair.key.ref, key));
}

/** Sequence index from a number, or from text or a scalar node holding one */
function toIndex(key: NodeKey): number | undefined {
  if (typeof key === 'number') {
    return Number.isSafeInteger(key) && key >= 0 ? key : undefined;
  }
  const text =
    typeof key === 'string'
      ? key
      : key instanceof YamlNode && key.isScalar()
        ? key.scalar()
        : undefined;
  if (text !== undefined) {
    const parsed = parseInteger(text);
    if (parsed === undefined || parsed < 0n) return undefined;
    const index = Number(parsed);
    return Number.isSafeInteger(index) ? index : undefined;
  }
  return undefined;
}

function describeKey(key: NodeKey): string {
  if (typeof key === 'string') return JSON.stringify(key);
  if (key instanceof YamlNode && key.isScalar()) {
    return JSON.stringify(key.scalar());
  }
  if (
    typeof key === 'number' ||
    typeof key === 'bigint' ||
    typeof key === 'boolean'
  ) {
    return String(key);
  }
  return describeValue(key);
}
