export { composeQuery } from './query/composer.js';
export type { SorterInput } from './query/composer.js';
export { sort, SortBuilder, fromLinkedSorter, MAX_SORT_KEYS } from './query/sorter.js';
export { Query, fromArray } from './query/source.js';
export { compareValues } from './query/comparer.js';
export type {
  SortDirection,
  Comparable,
  Predicate,
  KeySelector,
  SortKey,
  SortChain,
  LinkedSorter,
  QuerySource,
  OrderedQuerySource,
  RecordLoader,
} from './query/types.js';
export { Specification, spec } from './specification/specification.js';
export { defineModel } from './context/model.js';
export type { ModelDefinition, ModelOptions, ModelSchema, AggregateLock, AggregateRoot } from './context/model.js';
export { ChangeTracker } from './context/tracker.js';
export type { EntryState, TrackedEntry } from './context/tracker.js';
export { BaseDataContext } from './context/base-context.js';
export { InMemoryDataContext } from './context/in-memory-context.js';
export type { InMemoryDataContextConfig } from './context/in-memory-context.js';
export { PostgresDataContext } from './store/postgres-context.js';
export type { PostgresDataContextConfig } from './store/postgres-context.js';
export type { DataContext } from './types.js';
export { ConcurrencyError, DataContextError, QueryCompositionError } from './errors.js';
