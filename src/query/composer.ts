import type { Specification } from '../specification/specification.js';
import { SortBuilder, toSortChain } from './sorter.js';
import type { QuerySource, SortChain, SortKey } from './types.js';

export type SorterInput<T> = SortChain<T> | SortBuilder<T>;

function assertPage(pageSize: number, pageIndex: number): void {
  if (!Number.isInteger(pageSize) || pageSize <= 0) {
    throw new RangeError(`pageSize must be a positive integer, got ${pageSize}`);
  }
  if (!Number.isInteger(pageIndex) || pageIndex < 0) {
    throw new RangeError(`pageIndex must be a non-negative integer, got ${pageIndex}`);
  }
}

function keysOf<T>(sorter: SorterInput<T>): readonly SortKey<T>[] {
  return sorter instanceof SortBuilder ? sorter.keys : sorter;
}

/**
 * Composes a filtered, ordered page over `source` without evaluating it.
 *
 * The specification filters before anything else so that only matching
 * records count towards a page. The first sort key sets the primary order and
 * each later key only breaks ties left by the keys before it. The page is the
 * slice [pageIndex * pageSize, pageIndex * pageSize + pageSize) of that
 * sequence; a page past the end is empty.
 *
 * `source` is never mutated. Errors thrown by key selectors or predicates
 * surface when the returned query is evaluated.
 *
 * @throws RangeError when pageSize is not a positive integer or pageIndex is negative
 * @throws QueryCompositionError when the sorter has no keys
 */
export function composeQuery<T>(
  source: QuerySource<T>,
  pageSize: number,
  pageIndex: number,
  sorter: SorterInput<T>,
  specification?: Specification<T> | null,
): QuerySource<T> {
  assertPage(pageSize, pageIndex);
  const [primary, ...rest] = toSortChain(keysOf(sorter));

  const filtered = specification ? source.where(specification.export()) : source;

  let ordered = filtered.orderBy(primary.key, primary.direction);
  for (const { key, direction } of rest) {
    ordered = ordered.thenBy(key, direction);
  }

  return ordered.skip(pageIndex * pageSize).take(pageSize);
}
