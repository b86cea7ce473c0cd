/**
 * YAML Loader Boundary
 *
 * Builds node trees from documents parsed by `yaml`:
 * - plain null scalars (`~`, `null`, empty) become null nodes
 * - quoted and block scalars carry the '!' tag, explicit tags are kept
 * - flow collections get the 'flow' style, block collections 'block'
 * - aliases share the storage of their anchor
 *
 * Unlike node operations, the loader throws ParseError on invalid input.
 */

import * as fs from 'fs/promises';
import {
  isAlias,
  isMap,
  isPair,
  isScalar,
  isSeq,
  parseAllDocuments,
  parseDocument,
  type Document,
  type Scalar,
  type YAMLError,
} from 'yaml';
import { ParseError } from '../error-classes.js';
import { DEFAULT_CONTEXT } from '../node/context.js';
import { YamlNode } from '../node/node.js';
import { emptyCell, scalarCell, type NodeCell } from '../node/storage.js';
import type { NodeContext } from '../node/types.js';

/** Options for loading YAML text */
export interface LoadOptions {
  /** Context attached to the loaded tree */
  context?: NodeContext;
}

/**
 * Parse a single YAML document.
 *
 * @throws ParseError when the text is not valid YAML
 */
export function load(source: string, options: LoadOptions = {}): YamlNode {
  return toNode(parseDocument(source), options);
}

/**
 * Parse every document of a YAML stream.
 *
 * @throws ParseError when any document is not valid YAML
 */
export function loadAll(source: string, options: LoadOptions = {}): YamlNode[] {
  const nodes: YamlNode[] = [];
  for (const doc of parseAllDocuments(source)) {
    nodes.push(toNode(doc, options));
  }
  return nodes;
}

/** Read and parse a YAML file */
export async function loadFile(
  filePath: string,
  options: LoadOptions = {}
): Promise<YamlNode> {
  const source = await fs.readFile(filePath, 'utf-8');
  return load(source, options);
}

function toNode(doc: Document.Parsed, options: LoadOptions): YamlNode {
  const [error] = doc.errors;
  if (error) throw toParseError(error);

  const cell = new TreeBuilder().build(doc.contents);
  return YamlNode.fromCell(cell, options.context ?? DEFAULT_CONTEXT);
}

function toParseError(error: YAMLError): ParseError {
  const [start] = error.linePos ?? [];
  const message = error.message.split('\n')[0] ?? error.message;
  return new ParseError(
    'DOC-P001',
    message,
    {
      line: start?.line ?? 1,
      column: start?.col ?? 1,
      offset: error.pos[0],
    },
    { code: error.code }
  );
}

class TreeBuilder {
  private readonly anchors = new Map<string, NodeCell>();

  build(node: unknown): NodeCell {
    if (isAlias(node)) {
      return this.anchors.get(node.source) ?? emptyCell();
    }
    if (isScalar(node)) {
      return this.anchor(node.anchor, scalarFromAst(node));
    }
    if (isMap(node)) {
      const cell = this.anchor(node.anchor, emptyCell('map'));
      cell.ref.style = node.flow ? 'flow' : 'block';
      cell.ref.tag = node.tag ?? '';
      for (const pair of node.items) {
        cell.ref.pairs.push({
          key: this.build(pair.key),
          value: this.build(pair.value),
        });
      }
      return cell;
    }
    if (isSeq(node)) {
      const cell = this.anchor(node.anchor, emptyCell('sequence'));
      cell.ref.style = node.flow ? 'flow' : 'block';
      cell.ref.tag = node.tag ?? '';
      for (const item of node.items) {
        cell.ref.items.push(this.buildItem(item));
      }
      return cell;
    }
    return emptyCell();
  }

  /** Sequence entries written as `key: value` become single-pair maps */
  private buildItem(item: unknown): NodeCell {
    if (!isPair(item)) return this.build(item);
    const cell = emptyCell('map');
    cell.ref.style = 'flow';
    cell.ref.pairs.push({
      key: this.build(item.key),
      value: this.build(item.value),
    });
    return cell;
  }

  private anchor(name: string | undefined, cell: NodeCell): NodeCell {
    if (name !== undefined) this.anchors.set(name, cell);
    return cell;
  }
}

function scalarFromAst(node: Scalar): NodeCell {
  const quoted = node.type !== undefined && node.type !== 'PLAIN';
  if (!quoted && node.value === null) {
    const cell = emptyCell();
    cell.ref.tag = node.tag ?? '';
    return cell;
  }

  const text = typeof node.source === 'string' ? node.source : String(node.value);
  return scalarCell(text, node.tag ?? (quoted ? '!' : ''));
}
