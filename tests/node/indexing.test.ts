/**
 * Indexing, auto-vivification and read-only lookup
 */

import { describe, expect, it } from 'vitest';
import { Converters, YamlNode } from '../../src/index.js';
import { collectDiagnostics } from '../helpers/diagnostics.js';

describe('YamlNode indexing', () => {
  describe('getOrCreate', () => {
    it('builds nested maps from a null node', () => {
      const root = new YamlNode();

      root.getOrCreate('a').getOrCreate('b').assign(5);

      expect(root.isMap()).toBe(true);
      expect(root.get('a').isMap()).toBe(true);
      expect(root.get('a').get('b').as(Converters.integer)).toBe(5);
      expect(root.toJS()).toEqual({ a: { b: 5 } });
    });

    it('turns a null node into a sequence for integer keys', () => {
      const root = new YamlNode();

      root.getOrCreate(0).assign('first');

      expect(root.isSequence()).toBe(true);
      expect(root.size()).toBe(1);
    });

    it('pads a sequence with nulls up to the index', () => {
      const root = new YamlNode();

      root.getOrCreate(3).assign('x');

      expect(root.size()).toBe(4);
      expect(root.get(0).isNull()).toBe(true);
      expect(root.get(2).isNull()).toBe(true);
      expect(root.get(3).scalar()).toBe('x');
    });

    it('returns existing children without adding entries', () => {
      const root = new YamlNode({ a: 1 });

      const first = root.getOrCreate('a');
      const second = root.getOrCreate('a');

      expect(first.sameAs(second)).toBe(true);
      expect(root.size()).toBe(1);
    });

    it('adds a null entry for an absent key', () => {
      const root = new YamlNode({ a: 1 });

      const child = root.getOrCreate('b');

      expect(child.isNull()).toBe(true);
      expect(root.size()).toBe(2);
    });

    it('writes through the returned handle', () => {
      const root = new YamlNode({ a: 1 });

      root.getOrCreate('a').assign('changed');

      expect(root.get('a').scalar()).toBe('changed');
    });

    it('accepts scalar nodes as sequence indices', () => {
      const list = new YamlNode(['a', 'b']);

      expect(list.getOrCreate(new YamlNode(1)).scalar()).toBe('b');
    });

    it('accepts integer text as a sequence index', () => {
      const list = new YamlNode(['a', 'b']);

      const child = list.getOrCreate('1');

      expect(child.scalar()).toBe('b');
      expect(child.sameAs(list.getOrCreate(new YamlNode('1')))).toBe(true);
      expect(list.size()).toBe(2);
    });

    it('makes a map when a null node is indexed by text or a node', () => {
      const byText = new YamlNode();
      const byNode = new YamlNode();

      byText.getOrCreate('0').assign('x');
      byNode.getOrCreate(new YamlNode(0)).assign('x');

      expect(byText.isMap()).toBe(true);
      expect(byText.get('0').scalar()).toBe('x');
      expect(byNode.isMap()).toBe(true);
    });

    it('uses container keys in maps', () => {
      const root = new YamlNode();

      root.getOrCreate(new YamlNode([1, 2])).assign('v');

      expect(root.isMap()).toBe(true);
      expect(root.get([1, 2]).scalar()).toBe('v');
    });

    it('matches keys by content rather than tag', () => {
      const root = new YamlNode({ 1: 'one' });

      expect(root.get(1).scalar()).toBe('one');
      expect(root.get('1').scalar()).toBe('one');
    });
  });

  describe('getOrCreate failures', () => {
    it('returns an undefined handle for scalars', () => {
      const { context, ids, messages } = collectDiagnostics();
      const scalar = new YamlNode('text', { context });

      const child = scalar.getOrCreate('a');

      expect(child.isDefined()).toBe(false);
      expect(child.type()).toBe('undefined');
      expect(ids()).toEqual(['DOC-S003']);
      expect(messages()).toEqual(['Cannot index a scalar node with "a"']);
    });

    it('rejects non-integer keys on sequences', () => {
      const { context, messages } = collectDiagnostics();
      const list = new YamlNode(['a'], { context });

      expect(list.getOrCreate('x').isDefined()).toBe(false);
      expect(list.getOrCreate(-1).isDefined()).toBe(false);
      expect(messages()).toEqual([
        'Cannot index a sequence node with "x"',
        'Cannot index a sequence node with -1',
      ]);
      expect(list.size()).toBe(1);
    });

    it('refuses to pad beyond the configured limit', () => {
      const { context, ids, messages } = collectDiagnostics({
        maxSequencePadding: 2,
      });
      const root = new YamlNode(undefined, { context });

      const child = root.getOrCreate(5);

      expect(child.isDefined()).toBe(false);
      expect(root.isNull()).toBe(true);
      expect(ids()).toEqual(['DOC-S005']);
      expect(messages()).toEqual([
        'Index 5 would pad 5 null elements, limit is 2',
      ]);
    });

    it('allows padding up to the limit', () => {
      const { context, diagnostics } = collectDiagnostics({
        maxSequencePadding: 2,
      });
      const root = new YamlNode(undefined, { context });

      root.getOrCreate(2).assign(true);

      expect(root.size()).toBe(3);
      expect(diagnostics).toHaveLength(0);
    });

    it('reports keys that cannot be encoded', () => {
      const { context, ids, messages } = collectDiagnostics();
      const root = new YamlNode({ a: 1 }, { context });

      expect(root.getOrCreate(new Date(NaN)).isDefined()).toBe(false);
      expect(root.forceInsert(new Date(NaN), 1)).toBe(false);
      expect(ids()).toEqual(['DOC-C002', 'DOC-C002']);
      expect(messages()[0]).toBe('Cannot encode Date as a map key: invalid date');
      expect(root.size()).toBe(1);
    });

    it('reports indexing through an undefined handle', () => {
      const { context, ids, messages } = collectDiagnostics();
      const root = new YamlNode({ a: 1 }, { context });

      const missing = root.get('missing').getOrCreate('x');

      expect(missing.isDefined()).toBe(false);
      expect(ids()).toEqual(['DOC-H001']);
      expect(messages()).toEqual(['Cannot index an undefined node']);
    });
  });

  describe('get', () => {
    it('never changes the node', () => {
      const root = new YamlNode();

      expect(root.get('a').isDefined()).toBe(false);
      expect(root.isNull()).toBe(true);

      const map = new YamlNode({ a: 1 });
      expect(map.get('b').isDefined()).toBe(false);
      expect(map.size()).toBe(1);
    });

    it('returns undefined handles for out-of-range indices', () => {
      const list = new YamlNode([1, 2]);

      expect(list.get(2).isDefined()).toBe(false);
      expect(list.get('2').isDefined()).toBe(false);
    });

    it('reads integer text and scalar nodes as indices', () => {
      const list = new YamlNode([1, 2]);

      expect(list.get('0').scalar()).toBe('1');
      expect(list.get(new YamlNode('1')).scalar()).toBe('2');
      expect(list.has('1')).toBe(true);
    });

    it('reports presence with has', () => {
      const map = new YamlNode({ a: null });

      expect(map.has('a')).toBe(true);
      expect(map.has('b')).toBe(false);
    });

    it('treats two undefined handles as equal', () => {
      const map = new YamlNode({ a: 1 });

      expect(map.get('x').is(map.get('y'))).toBe(true);
      expect(map.get('x').is(new YamlNode())).toBe(false);
    });
  });

  describe('paths', () => {
    it('creates intermediate structure with setIn', () => {
      const root = new YamlNode();

      expect(root.setIn(['servers', 0, 'port'], 8080)).toBe(true);

      expect(root.toJS()).toEqual({ servers: [{ port: 8080 }] });
      expect(root.getIn(['servers', 0, 'port']).as(Converters.integer)).toBe(
        8080
      );
    });

    it('returns an undefined handle for a missing path', () => {
      const root = new YamlNode({ a: { b: 1 } });

      expect(root.getIn(['a', 'c', 'd']).isDefined()).toBe(false);
      expect(root.getIn([]).sameAs(root)).toBe(true);
    });

    it('stops setIn at a scalar', () => {
      const { context, ids } = collectDiagnostics();
      const root = new YamlNode({ a: 'text' }, { context });

      expect(root.setIn(['a', 'b'], 1)).toBe(false);
      expect(ids()).toEqual(['DOC-S003']);
      expect(root.get('a').scalar()).toBe('text');
    });
  });
});
