export type SortDirection = 'asc' | 'desc';

/** Values a sort key may produce. `null` and `undefined` sort first ascending. */
export type Comparable = string | number | bigint | boolean | Date | null | undefined;

export type Predicate<T> = (record: T) => boolean;

export type KeySelector<T> = (record: T) => Comparable;

export interface SortKey<T> {
  readonly key: KeySelector<T>;
  readonly direction: SortDirection;
}

/**
 * Ordered sort directives, primary key first. Never empty.
 */
export type SortChain<T> = readonly [SortKey<T>, ...SortKey<T>[]];

/**
 * Linked form of a sort chain: each node points at the key that breaks its ties.
 * Convert with fromLinkedSorter() before composing.
 */
export interface LinkedSorter<T> {
  readonly key: KeySelector<T>;
  readonly direction: SortDirection;
  readonly next?: LinkedSorter<T> | null;
}

export type QueryStage<T> =
  | { kind: 'where'; predicate: Predicate<T> }
  | { kind: 'order'; keys: SortChain<T> }
  | { kind: 'skip'; count: number }
  | { kind: 'take'; count: number };

/**
 * Lazily evaluated, immutable sequence of records. Every operation returns a
 * new source; nothing runs until toArray() or count() is awaited.
 */
export interface QuerySource<T> {
  where(predicate: Predicate<T>): QuerySource<T>;
  orderBy(key: KeySelector<T>, direction?: SortDirection): OrderedQuerySource<T>;
  skip(count: number): QuerySource<T>;
  take(count: number): QuerySource<T>;
  toArray(signal?: AbortSignal): Promise<T[]>;
  count(signal?: AbortSignal): Promise<number>;
}

/** A source whose last stage is an ordering, so it can be refined with thenBy(). */
export interface OrderedQuerySource<T> extends QuerySource<T> {
  thenBy(key: KeySelector<T>, direction?: SortDirection): OrderedQuerySource<T>;
}

/** Supplies the unfiltered records a query is evaluated over. */
export type RecordLoader<T> = (signal?: AbortSignal) => Promise<readonly T[]>;
