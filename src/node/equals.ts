/**
 * Node Structural Equality
 *
 * Compares node contents, ignoring style, tag and storage identity.
 * - Scalars: same text
 * - Sequences: same length + pairwise equality in order
 * - Maps: same size + each pair matched by a distinct equal pair (order-independent)
 *
 * Pairs of containers already under comparison are assumed equal, so
 * cyclic structures terminate.
 * @internal
 */

import type { NodePair, NodeRef } from './storage.js';

type Assumptions = Map<NodeRef, Set<NodeRef>>;

export function refEquals(
  a: NodeRef,
  b: NodeRef,
  assumed: Assumptions = new Map()
): boolean {
  if (a === b) return true;
  if (a.type !== b.type) return false;

  switch (a.type) {
    case 'null':
      return true;
    case 'scalar':
      return a.scalar === b.scalar;
  }

  let pending = assumed.get(a);
  if (pending?.has(b)) return true;
  if (!pending) {
    pending = new Set();
    assumed.set(a, pending);
  }
  pending.add(b);

  const equal =
    a.type === 'sequence'
      ? sequenceEquals(a, b, assumed)
      : mapEquals(a.pairs, b.pairs, assumed);

  if (!equal) pending.delete(b);
  return equal;
}

function sequenceEquals(
  a: NodeRef,
  b: NodeRef,
  assumed: Assumptions
): boolean {
  if (a.items.length !== b.items.length) return false;
  return a.items.every((item, i) => {
    const other = b.items[i];
    return other !== undefined && refEquals(item.ref, other.ref, assumed);
  });
}

function mapEquals(
  a: readonly NodePair[],
  b: readonly NodePair[],
  assumed: Assumptions
): boolean {
  if (a.length !== b.length) return false;

  const matched = new Array<boolean>(b.length).fill(false);
  for (const pair of a) {
    const index = b.findIndex(
      (candidate, i) =>
        !matched[i] &&
        refEquals(pair.key.ref, candidate.key.ref, assumed) &&
        refEquals(pair.value.ref, candidate.value.ref, assumed)
    );
    if (index < 0) return false;
    matched[index] = true;
  }
  return true;
}
