/**
 * Built-in Converters
 *
 * Decoders never throw: a node that cannot be interpreted produces
 * `{ ok: false, reason }`. Encoders return node input, or undefined for
 * values they cannot represent.
 */

import type { YamlNode } from '../node/node.js';
import type { Converter, DecodeResult, NodeInput } from '../node/types.js';
import {
  isNullText,
  isStringTag,
  parseBoolean,
  parseInteger,
  parseNumber,
  parseTimestamp,
  resolvePlain,
} from './resolve.js';

/** Plain JS array produced by the plain converter */
export interface PlainList extends Array<PlainData> {}

/** Plain JS object produced by the plain converter */
export interface PlainRecord {
  [key: string]: PlainData;
}

/** Plain JS data a node tree decodes to */
export type PlainData =
  | null
  | boolean
  | number
  | bigint
  | string
  | PlainList
  | PlainRecord;

function success<T>(value: T): DecodeResult<T> {
  return { ok: true, value };
}

function failure(reason: string): { ok: false; reason: string } {
  return { ok: false, reason };
}

/** 'a map node', 'an undefined node', ... */
function shapeOf(node: YamlNode): string {
  const type = node.type();
  return type === 'undefined' ? 'an undefined node' : `a ${type} node`;
}

/** Scalar text of the node, or why the node has none */
function scalarText(node: YamlNode, target: string): DecodeResult<string> {
  if (node.isScalar()) return success(node.scalar());
  return failure(`cannot decode ${shapeOf(node)} as ${target}`);
}

/**
 * Helper for custom converters; fixes the type parameters from the
 * definition.
 *
 * @example
 * const upper = defineConverter<string, string>({
 *   name: 'upper',
 *   zero: '',
 *   decode: (node) => ...,
 *   encode: (value) => value.toLowerCase(),
 * });
 */
export function defineConverter<T, Z extends T | undefined = undefined>(
  definition: Converter<T, Z>
): Converter<T, Z> {
  return definition;
}

export const string: Converter<string, string> = {
  name: 'string',
  zero: '',
  decode: (node) => scalarText(node, 'string'),
  encode: (value) => value,
};

export const number: Converter<number, number> = {
  name: 'number',
  zero: 0,
  decode(node) {
    const text = scalarText(node, 'number');
    if (!text.ok) return text;
    const value = parseNumber(text.value);
    return value === undefined
      ? failure(`"${text.value}" is not a number`)
      : success(value);
  },
  encode: (value) => value,
};

export const integer: Converter<number, number> = {
  name: 'integer',
  zero: 0,
  decode(node) {
    const text = scalarText(node, 'integer');
    if (!text.ok) return text;
    const parsed = parseInteger(text.value);
    if (parsed === undefined) {
      return failure(`"${text.value}" is not an integer`);
    }
    const value = Number(parsed);
    return Number.isSafeInteger(value)
      ? success(value)
      : failure(`${text.value} is outside the safe integer range`);
  },
  encode: (value) => (Number.isInteger(value) ? value : undefined),
};

export const bigint: Converter<bigint, bigint> = {
  name: 'bigint',
  zero: 0n,
  decode(node) {
    const text = scalarText(node, 'bigint');
    if (!text.ok) return text;
    const value = parseInteger(text.value);
    return value === undefined
      ? failure(`"${text.value}" is not an integer`)
      : success(value);
  },
  encode: (value) => value,
};

export const boolean: Converter<boolean, boolean> = {
  name: 'boolean',
  zero: false,
  decode(node) {
    const text = scalarText(node, 'boolean');
    if (!text.ok) return text;
    const value = parseBoolean(text.value);
    return value === undefined
      ? failure(`"${text.value}" is not a boolean`)
      : success(value);
  },
  encode: (value) => value,
};

export const nullValue: Converter<null, null> = {
  name: 'null',
  zero: null,
  decode(node) {
    if (node.isNull()) return success(null);
    if (node.isScalar() && isNullText(node.scalar())) return success(null);
    return failure(`cannot decode ${shapeOf(node)} as null`);
  },
  encode: () => null,
};

export const date: Converter<Date, undefined> = {
  name: 'date',
  zero: undefined,
  decode(node) {
    const text = scalarText(node, 'date');
    if (!text.ok) return text;
    const value = parseTimestamp(text.value);
    return value === undefined
      ? failure(`"${text.value}" is not a timestamp`)
      : success(value);
  },
  encode: (value) => (Number.isNaN(value.getTime()) ? undefined : value),
};

/** Sequence whose every element decodes with `item` */
export function list<T>(item: Converter<T>): Converter<T[], T[]> {
  return {
    name: `list<${item.name}>`,
    get zero(): T[] {
      return [];
    },
    decode(node) {
      if (!node.isSequence()) {
        return failure(`cannot decode ${shapeOf(node)} as a list`);
      }
      const values: T[] = [];
      let index = 0;
      for (const element of node.values()) {
        const result = element.decode(item);
        if (!result.ok) return failure(`element ${index}: ${result.reason}`);
        values.push(result.value);
        index++;
      }
      return success(values);
    },
    encode(values) {
      const inputs: NodeInput[] = [];
      for (const value of values) {
        const input = item.encode(value);
        if (input === undefined) return undefined;
        inputs.push(input);
      }
      return inputs;
    },
  };
}

/** Map with scalar keys, values decoded with `value` */
export function record<T>(
  value: Converter<T>
): Converter<Record<string, T>, Record<string, T>> {
  return {
    name: `record<${value.name}>`,
    get zero(): Record<string, T> {
      return {};
    },
    decode(node) {
      if (!node.isMap()) {
        return failure(`cannot decode ${shapeOf(node)} as a record`);
      }
      const out: Record<string, T> = {};
      for (const [key, element] of node.entries()) {
        if (!key.isScalar()) {
          return failure(`record keys must be scalars, got ${key.type()}`);
        }
        const result = element.decode(value);
        if (!result.ok) return failure(`${key.scalar()}: ${result.reason}`);
        defineEntry(out, key.scalar(), result.value);
      }
      return success(out);
    },
    encode(values) {
      const inputs: Record<string, NodeInput> = {};
      for (const [key, element] of Object.entries(values)) {
        const input = value.encode(element);
        if (input === undefined) return undefined;
        inputs[key] = input;
      }
      return inputs;
    },
  };
}

/** Map decoded into a JS Map, keys with `key` and values with `value` */
export function map<K, V>(
  key: Converter<K>,
  value: Converter<V>
): Converter<Map<K, V>, Map<K, V>> {
  return {
    name: `map<${key.name}, ${value.name}>`,
    get zero(): Map<K, V> {
      return new Map();
    },
    decode(node) {
      if (!node.isMap()) {
        return failure(`cannot decode ${shapeOf(node)} as a map`);
      }
      const out = new Map<K, V>();
      for (const [keyNode, valueNode] of node.entries()) {
        const decodedKey = keyNode.decode(key);
        if (!decodedKey.ok) return failure(`key: ${decodedKey.reason}`);
        const decodedValue = valueNode.decode(value);
        if (!decodedValue.ok) {
          return failure(`${keyNode.getContent()}: ${decodedValue.reason}`);
        }
        out.set(decodedKey.value, decodedValue.value);
      }
      return success(out);
    },
    encode(values) {
      const inputs = new Map<NodeInput, NodeInput>();
      for (const [k, v] of values) {
        const encodedKey = key.encode(k);
        const encodedValue = value.encode(v);
        if (encodedKey === undefined || encodedValue === undefined) {
          return undefined;
        }
        inputs.set(encodedKey, encodedValue);
      }
      return inputs;
    },
  };
}

/**
 * Any defined node as plain JS data. Plain scalars resolve under the
 * YAML 1.2 core schema; scalars tagged '!' or '!!str' stay strings. Map
 * keys become their scalar text (or YAML rendering for container keys).
 */
export const plain: Converter<PlainData, null> = {
  name: 'plain',
  zero: null,
  decode: (node) => toPlain(node, []),
  encode: (value) => value,
};

function toPlain(node: YamlNode, path: YamlNode[]): DecodeResult<PlainData> {
  switch (node.type()) {
    case 'undefined':
      return failure('cannot decode an undefined node');
    case 'null':
      return success(null);
    case 'scalar':
      return success(
        isStringTag(node.tag()) ? node.scalar() : resolvePlain(node.scalar())
      );
  }

  if (path.some((ancestor) => ancestor.sameAs(node))) {
    return failure('circular structure');
  }
  path.push(node);
  try {
    if (node.isSequence()) {
      const out: PlainData[] = [];
      for (const element of node.values()) {
        const result = toPlain(element, path);
        if (!result.ok) return result;
        out.push(result.value);
      }
      return success(out);
    }

    const out: PlainRecord = {};
    for (const [key, element] of node.entries()) {
      const result = toPlain(element, path);
      if (!result.ok) return result;
      defineEntry(out, key.isNull() ? 'null' : key.getContent(), result.value);
    }
    return success(out);
  } finally {
    path.pop();
  }
}

/** Own enumerable property, so keys such as `__proto__` stay data */
function defineEntry<T>(out: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(out, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

/** All built-in converters */
export const Converters = {
  string,
  number,
  integer,
  bigint,
  boolean,
  null: nullValue,
  date,
  plain,
  list,
  record,
  map,
} as const;
