/**
 * Built-in converters and typed access
 */

import { describe, expect, it } from 'vitest';
import {
  Converters,
  YamlNode,
  defineConverter,
  type Converter,
} from '../../src/index.js';

interface Point {
  x: number;
  y: number;
}

const point = defineConverter<Point>({
  name: 'point',
  zero: undefined,
  decode(node) {
    const x = node.get(0).asOptional(Converters.number);
    const y = node.get(1).asOptional(Converters.number);
    if (node.size() !== 2 || x === undefined || y === undefined) {
      return { ok: false, reason: 'expected [x, y]' };
    }
    return { ok: true, value: { x, y } };
  },
  encode: (value) => [value.x, value.y],
});

describe('Converters', () => {
  describe('typed access', () => {
    it('returns the default when decoding fails', () => {
      const node = new YamlNode('hello');

      expect(node.as(Converters.integer, 42)).toBe(42);
      expect(node.as(Converters.integer)).toBe(0);
      expect(node.asOptional(Converters.integer)).toBeUndefined();
      expect(node.canConvertTo(Converters.integer)).toBe(false);
    });

    it('round-trips values through a node', () => {
      expect(new YamlNode('hello').as(Converters.string)).toBe('hello');
      expect(YamlNode.from(3.25, Converters.number).as(Converters.number)).toBe(
        3.25
      );
      expect(YamlNode.from(true, Converters.boolean).as(Converters.boolean)).toBe(
        true
      );
    });

    it('explains failures through decode', () => {
      expect(new YamlNode('abc').decode(Converters.number)).toEqual({
        ok: false,
        reason: '"abc" is not a number',
      });
      expect(new YamlNode({ a: 1 }).decode(Converters.string)).toEqual({
        ok: false,
        reason: 'cannot decode a map node as string',
      });
    });

    it('fails on undefined handles', () => {
      const missing = new YamlNode({}).get('x');

      expect(missing.decode(Converters.string)).toEqual({
        ok: false,
        reason: 'cannot decode an undefined node as string',
      });
      expect(missing.as(Converters.string, 'fallback')).toBe('fallback');
    });

    it('turns exceptions from custom decoders into failures', () => {
      const throwing: Converter<string, string> = {
        name: 'throwing',
        zero: '',
        decode() {
          throw new Error('boom');
        },
        encode: (value) => value,
      };

      expect(new YamlNode('x').decode(throwing)).toEqual({
        ok: false,
        reason: 'boom',
      });
    });
  });

  describe('scalar converters', () => {
    it('decodes numbers', () => {
      expect(new YamlNode('1.5').as(Converters.number)).toBe(1.5);
      expect(new YamlNode('0x1F').as(Converters.number)).toBe(31);
      expect(new YamlNode('.inf').as(Converters.number)).toBe(Infinity);
      expect(new YamlNode('.nan').as(Converters.number)).toBeNaN();
    });

    it('decodes integers within the safe range', () => {
      expect(new YamlNode('0o17').as(Converters.integer)).toBe(15);
      expect(new YamlNode('+7').as(Converters.integer)).toBe(7);
      expect(new YamlNode('1.5').canConvertTo(Converters.integer)).toBe(false);
      expect(new YamlNode('12345678901234567890').decode(Converters.integer)).toEqual({
        ok: false,
        reason: '12345678901234567890 is outside the safe integer range',
      });
    });

    it('decodes bigints of any size', () => {
      expect(new YamlNode('12345678901234567890').as(Converters.bigint)).toBe(
        12345678901234567890n
      );
      expect(new YamlNode('x').as(Converters.bigint)).toBe(0n);
    });

    it('decodes lenient boolean spellings', () => {
      expect(new YamlNode('yes').as(Converters.boolean)).toBe(true);
      expect(new YamlNode('Off').as(Converters.boolean)).toBe(false);
      expect(new YamlNode('TRUE').as(Converters.boolean)).toBe(true);
      expect(new YamlNode('maybe').decode(Converters.boolean)).toEqual({
        ok: false,
        reason: '"maybe" is not a boolean',
      });
    });

    it('decodes null from null nodes and null text', () => {
      expect(new YamlNode().canConvertTo(Converters.null)).toBe(true);
      expect(new YamlNode('~').canConvertTo(Converters.null)).toBe(true);
      expect(new YamlNode('x').decode(Converters.null)).toEqual({
        ok: false,
        reason: 'cannot decode a scalar node as null',
      });
    });

    it('decodes timestamps as UTC', () => {
      expect(new YamlNode('2024-03-05').as(Converters.date)?.toISOString()).toBe(
        '2024-03-05T00:00:00.000Z'
      );
      expect(
        new YamlNode('2024-03-05T10:00:00+02:00')
          .as(Converters.date)
          ?.toISOString()
      ).toBe('2024-03-05T08:00:00.000Z');
      expect(
        new YamlNode('2024-03-05 10:30:00.25').as(Converters.date)?.toISOString()
      ).toBe('2024-03-05T10:30:00.250Z');
    });

    it('keeps years below 100', () => {
      expect(
        new YamlNode(new Date('0050-03-01T00:00:00.000Z'))
          .as(Converters.date)
          ?.toISOString()
      ).toBe('0050-03-01T00:00:00.000Z');
      expect(new YamlNode('0050-03-01').as(Converters.date)?.toISOString()).toBe(
        '0050-03-01T00:00:00.000Z'
      );
    });

    it('has no zero date', () => {
      expect(new YamlNode('soon').as(Converters.date)).toBeUndefined();
    });
  });

  describe('container converters', () => {
    it('decodes lists element by element', () => {
      const list = Converters.list(Converters.integer);

      expect(new YamlNode([1, '2', 3]).as(list)).toEqual([1, 2, 3]);
      expect(new YamlNode([1, 'x']).decode(list)).toEqual({
        ok: false,
        reason: 'element 1: "x" is not an integer',
      });
      expect(new YamlNode('x').as(list)).toEqual([]);
    });

    it('decodes records with scalar keys', () => {
      const record = Converters.record(Converters.number);

      expect(new YamlNode({ a: 1, b: 2.5 }).as(record)).toEqual({
        a: 1,
        b: 2.5,
      });
      expect(new YamlNode({ a: 'x' }).decode(record)).toEqual({
        ok: false,
        reason: 'a: "x" is not a number',
      });
    });

    it('keeps __proto__ as an ordinary record key', () => {
      const node = new YamlNode();
      node.forceInsert('__proto__', 1);
      node.forceInsert('b', 2);

      const decoded = node.as(Converters.record(Converters.integer));

      expect(Object.keys(decoded)).toEqual(['__proto__', 'b']);
      expect(Object.getPrototypeOf(decoded)).toBe(Object.prototype);
    });

    it('decodes maps with typed keys', () => {
      const map = Converters.map(Converters.integer, Converters.string);

      const decoded = new YamlNode({ 1: 'one', 2: 'two' }).as(map);

      expect([...decoded.entries()]).toEqual([
        [1, 'one'],
        [2, 'two'],
      ]);
    });

    it('encodes maps', () => {
      const node = YamlNode.from(
        new Map([['a', 1]]),
        Converters.map(Converters.string, Converters.integer)
      );

      expect(node.isMap()).toBe(true);
      expect(node.get('a').scalar()).toBe('1');
    });
  });

  describe('plain', () => {
    it('resolves scalars under the core schema', () => {
      const node = new YamlNode({ a: [1, 'x', true, null], b: '12' });

      expect(node.toJS()).toEqual({ a: [1, 'x', true, null], b: '12' });
    });

    it('keeps __proto__ as an ordinary key', () => {
      const node = new YamlNode();
      node.forceInsert('__proto__', 1);
      node.forceInsert('b', 2);

      const value = node.toJS();

      expect(Object.entries(value ?? {})).toEqual([
        ['__proto__', 1],
        ['b', 2],
      ]);
      expect(Object.getPrototypeOf(value)).toBe(Object.prototype);
    });

    it('resolves large integers to bigint', () => {
      expect(new YamlNode(12345678901234567890n).toJS()).toBe(
        12345678901234567890n
      );
    });

    it('fails on undefined handles', () => {
      expect(new YamlNode({}).get('x').toJS()).toBeUndefined();
    });
  });

  describe('custom converters', () => {
    it('encodes and decodes user types', () => {
      const node = YamlNode.from({ x: 1, y: 2 }, point);

      expect(node.isSequence()).toBe(true);
      expect(node.as(point)).toEqual({ x: 1, y: 2 });
    });

    it('uses undefined as the zero value', () => {
      expect(new YamlNode([1]).as(point)).toBeUndefined();
      expect(new YamlNode([1]).as(point, { x: 0, y: 0 })).toEqual({
        x: 0,
        y: 0,
      });
    });

    it('works in nested converters', () => {
      const node = new YamlNode([
        [1, 2],
        [3, 4],
      ]);

      expect(node.as(Converters.list(point))).toEqual([
        { x: 1, y: 2 },
        { x: 3, y: 4 },
      ]);
    });
  });
});
