import { ConcurrencyError, DataContextError } from '../errors.js';
import { BaseDataContext } from './base-context.js';
import { readKey } from './model.js';
import type { ModelDefinition } from './model.js';
import type { TrackedEntry } from './tracker.js';

export interface InMemoryDataContextConfig {
  /** Initial records per model name. Arrays are copied; records are not. */
  seed?: Record<string, readonly object[]>;
  /** Source of lock timestamps. Defaults to the system clock. */
  clock?: () => Date;
}

/**
 * Array-backed DataContext. Records are stored by reference, keyed by the
 * model's key property compared with ===.
 */
export class InMemoryDataContext extends BaseDataContext {
  private readonly tables = new Map<string, object[]>();
  private readonly clock: () => Date;

  constructor(config: InMemoryDataContextConfig = {}) {
    super();
    this.clock = config.clock ?? (() => new Date());
    for (const [name, records] of Object.entries(config.seed ?? {})) {
      this.tables.set(name, [...records]);
    }
  }

  protected async loadRecords<T extends object>(model: ModelDefinition<T>): Promise<readonly T[]> {
    const records: T[] = [];
    for (const record of this.tables.get(model.name) ?? []) {
      if (!model.isRecord(record)) {
        throw new DataContextError(`A stored "${model.name}" record does not match the model schema`);
      }
      records.push(record);
    }
    return records;
  }

  protected async persistChanges(changes: readonly TrackedEntry[]): Promise<void> {
    // Changes are applied to copies so that a failing change leaves every table untouched
    const staged = new Map<string, object[]>();
    const stagedTable = (name: string): object[] => {
      let table = staged.get(name);
      if (table === undefined) {
        table = [...(this.tables.get(name) ?? [])];
        staged.set(name, table);
      }
      return table;
    };

    const locks = this.planLocks(changes, this.clock());

    for (const { model, record, state } of changes) {
      const table = stagedTable(model.name);
      const key = readKey(model, record);
      const index = table.findIndex((stored) => readKey(model, stored) === key);

      switch (state) {
        case 'added':
          if (index !== -1) {
            throw new DataContextError(`Failed to add "${model.name}" record: key ${String(key)} already exists`);
          }
          table.push(record);
          break;
        case 'modified':
          if (index === -1) {
            throw new ConcurrencyError(1, 0, `"${model.name}" record ${String(key)} no longer exists`);
          }
          table[index] = record;
          break;
        case 'deleted':
          if (index === -1) {
            throw new ConcurrencyError(1, 0, `"${model.name}" record ${String(key)} no longer exists`);
          }
          table.splice(index, 1);
          break;
        case 'unchanged':
          break;
      }
    }

    for (const [name, table] of staged) {
      this.tables.set(name, table);
    }
    this.applyLocks(locks);
  }
}
