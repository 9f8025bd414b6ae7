import type { Comparable, SortKey } from './types.js';

// Rank of each kind of value when two keys of different kinds meet.
function rank(value: Comparable): number {
  if (value === null || value === undefined) return 0;
  if (typeof value === 'boolean') return 1;
  if (typeof value === 'number' || typeof value === 'bigint') return 2;
  if (typeof value === 'string') return 3;
  return 4;
}

/**
 * Total ascending order over key values.
 * null/undefined < boolean < number/bigint < string < Date.
 * Strings compare by UTF-16 code unit, not locale. NaN and invalid dates
 * sort last within their kind.
 */
export function compareValues(a: Comparable, b: Comparable): number {
  const ra = rank(a);
  const rb = rank(b);
  if (ra !== rb) return ra < rb ? -1 : 1;

  if (a === null || a === undefined || b === null || b === undefined) return 0;

  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return a === b ? 0 : a ? 1 : -1;
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a === b ? 0 : a < b ? -1 : 1;
  }
  if (a instanceof Date && b instanceof Date) {
    return order(a.getTime(), b.getTime());
  }
  if ((typeof a === 'number' || typeof a === 'bigint') && (typeof b === 'number' || typeof b === 'bigint')) {
    return order(a, b);
  }
  return 0;
}

// number/bigint pairs compare numerically across the two types. NaN sorts
// after every other number and equals only itself.
function order(a: number | bigint, b: number | bigint): number {
  const aNaN = typeof a === 'number' && Number.isNaN(a);
  const bNaN = typeof b === 'number' && Number.isNaN(b);
  if (aNaN || bNaN) return aNaN === bNaN ? 0 : aNaN ? 1 : -1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Builds a comparator that orders lexicographically over `keys`: a later key
 * is consulted only when every earlier key compares equal.
 */
export function compareBy<T>(keys: readonly SortKey<T>[]): (a: T, b: T) => number {
  return (a, b) => {
    for (const { key, direction } of keys) {
      const result = compareValues(key(a), key(b));
      if (result !== 0) {
        return direction === 'asc' ? result : -result;
      }
    }
    return 0;
  };
}
