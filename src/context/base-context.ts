import { DataContextError } from '../errors.js';
import { composeQuery } from '../query/composer.js';
import type { SorterInput } from '../query/composer.js';
import { Query } from '../query/source.js';
import type { QuerySource } from '../query/types.js';
import type { Specification } from '../specification/specification.js';
import type { DataContext } from '../types.js';
import { LOCK_PROPERTY, nextLock, readLock } from './model.js';
import type { AggregateLock, ModelDefinition } from './model.js';
import { ChangeTracker } from './tracker.js';
import type { TrackedEntry } from './tracker.js';

/**
 * DataContext over a backing store. Subclasses load the records of a model
 * and write a batch of tracked changes; composing, paging and tracking live
 * here.
 */
export abstract class BaseDataContext implements DataContext {
  protected readonly tracker = new ChangeTracker();
  private saving = false;

  protected abstract loadRecords<T extends object>(
    model: ModelDefinition<T>,
    signal?: AbortSignal,
  ): Promise<readonly T[]>;

  /**
   * Writes every change or none of them. Must not touch the tracker; the
   * caller accepts the changes once this resolves.
   */
  protected abstract persistChanges(
    changes: readonly TrackedEntry[],
    signal?: AbortSignal,
  ): Promise<void>;

  getTrackedObjects(): readonly object[] {
    return this.tracker.entries().map((entry) => entry.record);
  }

  getDataModel<T extends object>(model: ModelDefinition<T>): QuerySource<T> {
    return new Query<T>((signal) => this.loadRecords(model, signal));
  }

  addRecord<T extends object>(model: ModelDefinition<T>, record: T): void {
    this.tracker.add(model, record);
  }

  updateRecord<T extends object>(model: ModelDefinition<T>, record: T): void {
    this.tracker.update(model, record);
  }

  deleteRecord<T extends object>(model: ModelDefinition<T>, record: T): void {
    this.tracker.delete(model, record);
  }

  async getRecords<T extends object>(
    model: ModelDefinition<T>,
    pageSize: number,
    pageIndex: number,
    sorter: SorterInput<T>,
    specification?: Specification<T> | null,
    signal?: AbortSignal,
  ): Promise<T[]> {
    const query = composeQuery(this.getDataModel(model), pageSize, pageIndex, sorter, specification);
    const records = await query.toArray(signal);
    return records.map((record) => this.tracker.attach(model, record));
  }

  async saveChanges(signal?: AbortSignal): Promise<number> {
    if (this.saving) {
      throw new DataContextError('saveChanges() is already running on this context');
    }
    const pending = this.tracker.pending();
    if (pending.length === 0) return 0;

    this.saving = true;
    try {
      signal?.throwIfAborted();
      await this.persistChanges(pending, signal);
      this.tracker.acceptChanges(pending);
      return pending.length;
    } finally {
      this.saving = false;
    }
  }

  /**
   * Locks the written records of lock-enabled models will carry, keyed by record.
   * Computed before writing so the store can persist them; applied with
   * applyLocks() once the write succeeded.
   */
  protected planLocks(changes: readonly TrackedEntry[], now: Date): Map<object, AggregateLock> {
    const locks = new Map<object, AggregateLock>();
    for (const { model, record, state } of changes) {
      if (model.lock && (state === 'added' || state === 'modified')) {
        locks.set(record, nextLock(readLock(record), now));
      }
    }
    return locks;
  }

  protected applyLocks(locks: ReadonlyMap<object, AggregateLock>): void {
    for (const [record, lock] of locks) {
      Reflect.set(record, LOCK_PROPERTY, lock);
    }
  }
}
