/**
 * YAML Emitter Boundary
 *
 * Serializes a node tree with the `yaml` stringifier. The walk only uses
 * the node's public surface: type, scalar text, tag, style and read-only
 * iteration. Containers reached more than once (shared or cyclic) are
 * written once with an anchor and referenced by alias afterwards.
 */

import {
  Alias,
  Document,
  Pair,
  Scalar,
  YAMLMap,
  YAMLSeq,
  type Node as AstNode,
} from 'yaml';
import {
  CORE_TAG_PREFIX,
  isStringTag,
  resolvePlain,
} from '../convert/resolve.js';
import { YamlNode } from '../node/node.js';

/** Formatting options passed through to the stringifier */
export interface EmitOptions {
  /** Spaces per indentation level (default 2) */
  indent?: number;
  /** Preferred maximum line width; 0 disables folding (default 80) */
  lineWidth?: number;
}

/**
 * Serialize a node as a YAML document.
 *
 * @example
 * emit(new YamlNode({ name: 'demo', ports: [80, 443] }))
 * // 'name: demo\nports:\n  - 80\n  - 443\n'
 */
export function emit(node: YamlNode, options: EmitOptions = {}): string {
  const doc = new Document();
  doc.contents = new AstBuilder().build(node);
  return doc.toString({
    indent: options.indent ?? 2,
    lineWidth: options.lineWidth ?? 80,
  });
}

/** Serialize several nodes as a multi-document stream */
export function emitAll(
  nodes: readonly YamlNode[],
  options: EmitOptions = {}
): string {
  return nodes.map((node) => `---\n${emit(node, options)}`).join('');
}

class AstBuilder {
  private readonly built = new Map<object, YAMLMap | YAMLSeq>();
  private anchorCount = 0;

  build(node: YamlNode): AstNode {
    switch (node.type()) {
      case 'undefined':
      case 'null':
        return withTag(new Scalar(null), node.tag());
      case 'scalar':
        return buildScalar(node.scalar(), node.tag());
      case 'sequence':
      case 'map':
        return this.buildCollection(node);
    }
  }

  private buildCollection(node: YamlNode): AstNode {
    const identity = YamlNode.cellOf(node)?.ref;
    const seen = identity ? this.built.get(identity) : undefined;
    if (seen) {
      seen.anchor ??= `a${++this.anchorCount}`;
      return new Alias(seen.anchor);
    }

    const collection = node.isMap()
      ? new YAMLMap<AstNode, AstNode>()
      : new YAMLSeq<AstNode>();
    if (identity) this.built.set(identity, collection);
    collection.flow = node.style() === 'flow';
    withTag(collection, node.tag());

    if (collection instanceof YAMLMap) {
      for (const [key, value] of node.entries()) {
        collection.items.push(new Pair(this.build(key), this.build(value)));
      }
    } else {
      for (const value of node.values()) {
        collection.items.push(this.build(value));
      }
    }
    return collection;
  }
}

/**
 * '!'-tagged and str-tagged text is written as a string (the stringifier
 * quotes it when needed). Untagged text that resolves to null, a boolean
 * or a number is written as that value.
 */
function buildScalar(text: string, tag: string): Scalar {
  if (isStringTag(tag)) {
    return new Scalar(text);
  }
  if (tag !== '' && !tag.startsWith(CORE_TAG_PREFIX)) {
    return withTag(new Scalar(text), tag);
  }

  const value = resolvePlain(text);
  const scalar = new Scalar(value);
  if (typeof value === 'number') {
    const fraction = /^[0-9]+\.([0-9]+)$/.exec(text);
    if (fraction?.[1]) scalar.minFractionDigits = fraction[1].length;
  }
  return scalar;
}

/** Keep custom tags; core-schema tags are implied by the value */
function withTag<T extends Scalar | YAMLMap | YAMLSeq>(
  node: T,
  tag: string
): T {
  if (tag !== '' && tag !== '!' && !tag.startsWith(CORE_TAG_PREFIX)) {
    node.tag = tag;
  }
  return node;
}
