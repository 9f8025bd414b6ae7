import type { ModelDefinition } from './context/model.js';
import type { SorterInput } from './query/composer.js';
import type { QuerySource } from './query/types.js';
import type { Specification } from './specification/specification.js';

/**
 * Repository-style access to records of any defined model: paged queries,
 * change tracking and saving.
 */
export interface DataContext {
  /** Every record the context currently tracks, in the order it started tracking them. */
  getTrackedObjects(): readonly object[];

  /** Lazy, unfiltered source over all records of `model`. */
  getDataModel<T extends object>(model: ModelDefinition<T>): QuerySource<T>;

  addRecord<T extends object>(model: ModelDefinition<T>, record: T): void;
  updateRecord<T extends object>(model: ModelDefinition<T>, record: T): void;
  deleteRecord<T extends object>(model: ModelDefinition<T>, record: T): void;

  /**
   * Loads one page of `model`, filtered by `specification` and ordered by
   * `sorter`. Returned records are tracked as unchanged.
   */
  getRecords<T extends object>(
    model: ModelDefinition<T>,
    pageSize: number,
    pageIndex: number,
    sorter: SorterInput<T>,
    specification?: Specification<T> | null,
    signal?: AbortSignal,
  ): Promise<T[]>;

  /** Writes pending changes; resolves to the number of records written. */
  saveChanges(signal?: AbortSignal): Promise<number>;
}
