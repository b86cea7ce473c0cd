/**
 * NodeIterator
 *
 * Forward cursor over the children of one sequence or map, created by
 * YamlNode.begin() and YamlNode.end(). A sequence cursor also counts
 * positions so key() can report the index.
 *
 * The iterated node must not change structurally while a cursor is in
 * use. Cursors record the node's generation and return undefined handles
 * (with a DOC-H002 diagnostic) once it has moved on.
 */

import { reportDiagnostic } from './context.js';
import { YamlNode } from './node.js';
import { scalarCell, type NodeRef } from './storage.js';
import type { NodeContext } from './types.js';

export class NodeIterator {
  /** @internal Use YamlNode.begin() / YamlNode.end() */
  constructor(
    private readonly source: NodeRef | undefined,
    private position: number,
    private readonly ctx: NodeContext,
    private readonly generation: number = source?.generation ?? 0
  ) {}

  /** Whether the source is unchanged since this cursor was created */
  isValid(): boolean {
    return this.source === undefined || this.source.generation === this.generation;
  }

  /** Map: the pair's key. Sequence: a scalar holding the index. */
  key(): YamlNode {
    const source = this.checkedSource();
    if (source?.type === 'map') {
      return YamlNode.fromCell(source.pairs[this.position]?.key, this.ctx);
    }
    if (source?.type === 'sequence' && this.position < source.items.length) {
      return YamlNode.fromCell(scalarCell(String(this.position)), this.ctx);
    }
    return YamlNode.fromCell(undefined, this.ctx);
  }

  /** Map: the pair's value. Sequence: the element. */
  value(): YamlNode {
    const source = this.checkedSource();
    if (source?.type === 'map') {
      return YamlNode.fromCell(source.pairs[this.position]?.value, this.ctx);
    }
    if (source?.type === 'sequence') {
      return YamlNode.fromCell(source.items[this.position], this.ctx);
    }
    return YamlNode.fromCell(undefined, this.ctx);
  }

  /** Current value as a handle sharing the child's storage */
  deref(): YamlNode {
    return this.value();
  }

  /** Advance and return this cursor */
  increment(): this {
    this.position++;
    return this;
  }

  /** Advance and return a cursor at the previous position */
  postIncrement(): NodeIterator {
    const previous = this.copy();
    this.position++;
    return previous;
  }

  /** Same source and position */
  equals(other: NodeIterator): boolean {
    return this.source === other.source && this.position === other.position;
  }

  private copy(): NodeIterator {
    return new NodeIterator(
      this.source,
      this.position,
      this.ctx,
      this.generation
    );
  }

  private checkedSource(): NodeRef | undefined {
    if (this.isValid()) return this.source;
    reportDiagnostic(this.ctx, 'DOC-H002', { type: this.source?.type });
    return undefined;
  }
}
