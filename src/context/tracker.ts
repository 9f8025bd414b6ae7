import { readKey } from './model.js';
import type { ModelDefinition } from './model.js';

export type EntryState = 'added' | 'modified' | 'deleted' | 'unchanged';

export interface TrackedEntry<T extends object = object> {
  readonly model: ModelDefinition<T>;
  readonly record: T;
  readonly state: EntryState;
}

/**
 * One entry per record, resolved by model name and primary key: a second
 * object with a tracked key stands for the same row. A record belongs to the
 * model it was first tracked under.
 */
export class ChangeTracker {
  private readonly tracked = new Map<object, TrackedEntry>();
  // model name → primary key → tracked record
  private readonly identities = new Map<string, Map<unknown, object>>();
  // Key each record was indexed under; a record's key property may change later
  private readonly keys = new Map<object, unknown>();

  private identity(modelName: string): Map<unknown, object> {
    let identity = this.identities.get(modelName);
    if (identity === undefined) {
      identity = new Map();
      this.identities.set(modelName, identity);
    }
    return identity;
  }

  private holderOf<T extends object>(model: ModelDefinition<T>, record: T): object | undefined {
    const key = readKey(model, record);
    if (key === null || key === undefined) return undefined;
    return this.identities.get(model.name)?.get(key);
  }

  /** Entry for `record`, or for the record tracked under the same key. */
  private current<T extends object>(model: ModelDefinition<T>, record: T): TrackedEntry | undefined {
    const own = this.tracked.get(record);
    if (own !== undefined) return own;
    const holder = this.holderOf(model, record);
    return holder === undefined ? undefined : this.tracked.get(holder);
  }

  private forget(record: object): void {
    const entry = this.tracked.get(record);
    if (entry === undefined) return;
    this.tracked.delete(record);
    const identity = this.identities.get(entry.model.name);
    const key = this.keys.get(record);
    if (identity?.get(key) === record) identity.delete(key);
    this.keys.delete(record);
  }

  private set<T extends object>(model: ModelDefinition<T>, record: T, state: EntryState): void {
    const existing = this.tracked.get(record);
    if (existing !== undefined && existing.model.name !== model.name) {
      throw new Error(
        `Record is already tracked under model "${existing.model.name}", not "${model.name}"`,
      );
    }
    // A newer object for a tracked key takes the older one's place
    const holder = this.holderOf(model, record);
    if (holder !== undefined && holder !== record) this.forget(holder);

    const entry: TrackedEntry<T> = { model, record, state };
    this.tracked.set(record, entry);

    const key = readKey(model, record);
    const identity = this.identity(model.name);
    if (this.keys.has(record)) {
      const previous = this.keys.get(record);
      if (previous !== key && identity.get(previous) === record) identity.delete(previous);
      this.keys.delete(record);
    }
    if (key !== null && key !== undefined) {
      identity.set(key, record);
      this.keys.set(record, key);
    }
  }

  stateOf(record: object): EntryState | undefined {
    return this.tracked.get(record)?.state;
  }

  add<T extends object>(model: ModelDefinition<T>, record: T): void {
    const holder = this.holderOf(model, record);
    if (holder !== undefined && holder !== record) {
      throw new Error(
        `Another "${model.name}" record with key ${String(readKey(model, record))} is already tracked`,
      );
    }
    this.set(model, record, 'added');
  }

  /** A record that has not been saved yet stays added. */
  update<T extends object>(model: ModelDefinition<T>, record: T): void {
    const state = this.current(model, record)?.state === 'added' ? 'added' : 'modified';
    this.set(model, record, state);
  }

  /** Deleting a record that was never saved forgets it. */
  delete<T extends object>(model: ModelDefinition<T>, record: T): void {
    const current = this.current(model, record);
    if (current?.state === 'added') {
      this.forget(current.record);
      this.forget(record);
      return;
    }
    this.set(model, record, 'deleted');
  }

  /**
   * Tracks a record read from the store and returns the instance to hand out:
   * the one already tracked under the same key, if any.
   */
  attach<T extends object>(model: ModelDefinition<T>, record: T): T {
    if (this.tracked.has(record)) return record;
    const holder = this.holderOf(model, record);
    if (holder !== undefined) return model.isRecord(holder) ? holder : record;
    this.set(model, record, 'unchanged');
    return record;
  }

  entries(): readonly TrackedEntry[] {
    return [...this.tracked.values()];
  }

  pending(): readonly TrackedEntry[] {
    return this.entries().filter((entry) => entry.state !== 'unchanged');
  }

  /**
   * Marks `saved` entries as persisted: deleted ones are dropped, the rest
   * become unchanged. An entry changed again since `saved` was taken stays
   * pending.
   */
  acceptChanges(saved: readonly TrackedEntry[]): void {
    for (const entry of saved) {
      if (this.tracked.get(entry.record) !== entry) continue;
      if (entry.state === 'deleted') {
        this.forget(entry.record);
      } else {
        this.tracked.set(entry.record, { ...entry, state: 'unchanged' });
      }
    }
  }
}
