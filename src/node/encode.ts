/**
 * Default Encoder
 *
 * Turns plain JS values into node storage. Nodes passed as values are
 * aliased, not copied.
 * @internal
 */

import { formatNumber, resolvesToNonString } from '../convert/resolve.js';
import { YamlNode } from './node.js';
import { emptyCell, NodeCell, scalarCell, type NodePair } from './storage.js';

export type EncodeResult =
  | { readonly ok: true; readonly cell: NodeCell }
  | { readonly ok: false; readonly reason: string };

function fail(reason: string): EncodeResult {
  return { ok: false, reason };
}

/** Human-readable name of a value's type for diagnostics */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof YamlNode) return `${value.type()} node`;
  if (typeof value === 'object') {
    const name: unknown = value.constructor?.name;
    return typeof name === 'string' && name !== '' ? name : 'object';
  }
  return typeof value;
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Encode a string so that quoted-looking text stays a string */
export function stringCell(text: string): NodeCell {
  return scalarCell(text, resolvesToNonString(text) ? '!' : '');
}

/**
 * Encode a value into a cell.
 * `seen` tracks the containers on the current path to reject cycles.
 */
export function encodeValue(
  value: unknown,
  seen: Set<object> = new Set()
): EncodeResult {
  if (value instanceof YamlNode) {
    const cell = YamlNode.cellOf(value);
    return cell ? { ok: true, cell } : fail('the node is undefined');
  }

  switch (typeof value) {
    case 'string':
      return { ok: true, cell: stringCell(value) };
    case 'number':
      return { ok: true, cell: scalarCell(formatNumber(value)) };
    case 'boolean':
      return { ok: true, cell: scalarCell(value ? 'true' : 'false') };
    case 'bigint':
      return { ok: true, cell: scalarCell(value.toString()) };
    case 'undefined':
      return fail('undefined has no node form');
    case 'function':
    case 'symbol':
      return fail(`${typeof value} values have no node form`);
  }

  if (value === null) return { ok: true, cell: emptyCell('null') };
  if (typeof value !== 'object') {
    return fail(`${typeof value} values have no node form`);
  }

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return fail('invalid date');
    return { ok: true, cell: scalarCell(value.toISOString()) };
  }

  if (seen.has(value)) return fail('circular structure');
  seen.add(value);
  try {
    if (Array.isArray(value)) {
      return encodeSequence(value, seen);
    }
    if (value instanceof Map) {
      return encodePairs(value.entries(), seen);
    }
    if (isPlainObject(value)) {
      return encodePairs(Object.entries(value), seen);
    }
  } finally {
    seen.delete(value);
  }

  return fail(`${describeValue(value)} instances need a converter`);
}

function encodeSequence(
  values: readonly unknown[],
  seen: Set<object>
): EncodeResult {
  const cell = emptyCell('sequence');
  for (const element of values) {
    const encoded = encodeValue(element, seen);
    if (!encoded.ok) return encoded;
    cell.ref.items.push(encoded.cell);
  }
  return { ok: true, cell };
}

function encodePairs(
  entries: Iterable<readonly [unknown, unknown]>,
  seen: Set<object>
): EncodeResult {
  const pairs: NodePair[] = [];
  for (const [key, value] of entries) {
    const encodedKey = encodeValue(key, seen);
    if (!encodedKey.ok) return fail(`key: ${encodedKey.reason}`);
    const encodedValue = encodeValue(value, seen);
    if (!encodedValue.ok) return encodedValue;
    pairs.push({ key: encodedKey.cell, value: encodedValue.cell });
  }
  const cell = emptyCell('map');
  cell.ref.pairs = pairs;
  return { ok: true, cell };
}
