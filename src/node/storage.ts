/**
 * Node Storage
 *
 * A cell is the node identity that containers and handles hold. A cell
 * points at a ref, the content record. Assigning a value rewrites the ref
 * in place; assigning a node re-points the cell at the other node's ref.
 * @internal
 */

import type { DefinedNodeType, NodeStyle } from './types.js';

/** Key/value cells of one map entry */
export interface NodePair {
  readonly key: NodeCell;
  readonly value: NodeCell;
}

/** Content record shared by every cell that points at it */
export class NodeRef {
  type: DefinedNodeType = 'null';
  scalar = '';
  tag = '';
  style: NodeStyle = 'default';
  items: NodeCell[] = [];
  pairs: NodePair[] = [];
  /** Bumped on every structural change; iterators compare it */
  generation = 0;

  /** Overwrite this record with the content of another */
  setContent(other: NodeRef): void {
    if (other === this) return;
    this.type = other.type;
    this.scalar = other.scalar;
    this.tag = other.tag;
    this.style = other.style;
    this.items = [...other.items];
    this.pairs = [...other.pairs];
    this.touch();
  }

  /** Turn this record into an empty node of the given shape */
  reshape(type: DefinedNodeType): void {
    this.type = type;
    this.scalar = '';
    this.items = [];
    this.pairs = [];
    this.touch();
  }

  /** Replace a sequence by a map keyed with the element indices */
  sequenceToMap(): void {
    this.pairs = this.items.map((value, index) => ({
      key: scalarCell(String(index)),
      value,
    }));
    this.items = [];
    this.type = 'map';
    this.touch();
  }

  touch(): void {
    this.generation++;
  }
}

/** Node identity: holds the current ref */
export class NodeCell {
  constructor(public ref: NodeRef = new NodeRef()) {}
}

/** Create a cell holding a fresh node of the given shape */
export function emptyCell(type: DefinedNodeType = 'null'): NodeCell {
  const cell = new NodeCell();
  cell.ref.type = type;
  return cell;
}

/** Create a cell holding a scalar */
export function scalarCell(text: string, tag = ''): NodeCell {
  const cell = emptyCell('scalar');
  cell.ref.scalar = text;
  cell.ref.tag = tag;
  return cell;
}

/**
 * Deep copy of a cell. Cells and refs reached more than once map to a
 * single copy, so aliasing and cycles survive.
 */
export function cloneCell(
  cell: NodeCell,
  cells: Map<NodeCell, NodeCell> = new Map(),
  refs: Map<NodeRef, NodeRef> = new Map()
): NodeCell {
  const existing = cells.get(cell);
  if (existing) return existing;

  const copy = new NodeCell();
  cells.set(cell, copy);
  copy.ref = cloneRef(cell.ref, cells, refs);
  return copy;
}

function cloneRef(
  ref: NodeRef,
  cells: Map<NodeCell, NodeCell>,
  refs: Map<NodeRef, NodeRef>
): NodeRef {
  const existing = refs.get(ref);
  if (existing) return existing;

  const copy = new NodeRef();
  refs.set(ref, copy);
  copy.type = ref.type;
  copy.scalar = ref.scalar;
  copy.tag = ref.tag;
  copy.style = ref.style;
  copy.items = ref.items.map((item) => cloneCell(item, cells, refs));
  copy.pairs = ref.pairs.map((pair) => ({
    key: cloneCell(pair.key, cells, refs),
    value: cloneCell(pair.value, cells, refs),
  }));
  return copy;
}

/** Whether the ref holds a sequence or a map */
export function isContainer(ref: NodeRef): boolean {
  return ref.type === 'sequence' || ref.type === 'map';
}

/** Number of children for containers, 0 otherwise */
export function childCount(ref: NodeRef): number {
  switch (ref.type) {
    case 'sequence':
      return ref.items.length;
    case 'map':
      return ref.pairs.length;
    default:
      return 0;
  }
}
