import { QueryCompositionError } from '../errors.js';
import type { KeySelector, LinkedSorter, SortChain, SortDirection, SortKey } from './types.js';

export const MAX_SORT_KEYS = 32;

/**
 * Replaces the direction of the last key in the chain.
 */
function _withLastDirection<T>(keys: SortChain<T>, direction: SortDirection): SortBuilder<T> {
  const [head, ...tail] = keys;
  if (tail.length === 0) {
    return new SortBuilder([{ key: head.key, direction }]);
  }
  // Safe: tail is non-empty here; cast needed for noUncheckedIndexedAccess
  const last = tail[tail.length - 1] as SortKey<T>;
  return new SortBuilder([head, ...tail.slice(0, -1), { key: last.key, direction }]);
}

/**
 * Fluent immutable sort-chain builder. Every operation returns a new
 * SortBuilder — existing instances are never mutated.
 */
export class SortBuilder<T> {
  constructor(readonly keys: SortChain<T>) {}

  /** Sort the most recently added key ascending. */
  asc(): SortBuilder<T> {
    return _withLastDirection(this.keys, 'asc');
  }

  /** Sort the most recently added key descending. */
  desc(): SortBuilder<T> {
    return _withLastDirection(this.keys, 'desc');
  }

  /** Break ties left by the keys so far with another key. */
  thenBy(key: KeySelector<T>, direction: SortDirection = 'asc'): SortBuilder<T> {
    return new SortBuilder<T>([...this.keys, { key, direction }]);
  }

  thenByDescending(key: KeySelector<T>): SortBuilder<T> {
    return this.thenBy(key, 'desc');
  }
}

/**
 * Entry point for building sort chains.
 *
 * @example
 * sort.by((e: Employee) => e.department).thenByDescending((e) => e.salary)
 */
export const sort = {
  by<T>(key: KeySelector<T>, direction: SortDirection = 'asc'): SortBuilder<T> {
    return new SortBuilder<T>([{ key, direction }]);
  },
  byDescending<T>(key: KeySelector<T>): SortBuilder<T> {
    return sort.by(key, 'desc');
  },
};

/**
 * Flattens a linked sorter into a SortChain, primary key first.
 * Throws QueryCompositionError if a node is reached twice or the chain is
 * longer than MAX_SORT_KEYS.
 */
export function fromLinkedSorter<T>(head: LinkedSorter<T>): SortChain<T> {
  const seen = new Set<LinkedSorter<T>>();
  const keys: SortKey<T>[] = [];
  let node: LinkedSorter<T> | null | undefined = head;

  while (node) {
    if (seen.has(node)) {
      throw new QueryCompositionError(`Sort chain is cyclic: node ${keys.length + 1} repeats an earlier node`);
    }
    if (keys.length === MAX_SORT_KEYS) {
      throw new QueryCompositionError(`Sort chain exceeds ${MAX_SORT_KEYS} keys`);
    }
    seen.add(node);
    keys.push({ key: node.key, direction: node.direction });
    node = node.next;
  }

  return toSortChain(keys);
}

/** Narrows an array of keys to a SortChain, rejecting an empty one. */
export function toSortChain<T>(keys: readonly SortKey<T>[]): SortChain<T> {
  const [head, ...tail] = keys;
  if (head === undefined) {
    throw new QueryCompositionError('Sort chain must contain at least one key');
  }
  return [head, ...tail];
}
