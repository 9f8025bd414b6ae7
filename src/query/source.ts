import { QueryCompositionError } from '../errors.js';
import { compareBy } from './comparer.js';
import type {
  KeySelector,
  OrderedQuerySource,
  Predicate,
  QuerySource,
  QueryStage,
  RecordLoader,
  SortDirection,
} from './types.js';

function assertCount(operation: 'skip' | 'take', count: number): void {
  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`${operation}() count must be a non-negative integer, got ${count}`);
  }
}

/**
 * Runs the stages in the order they were composed. The loader's array is
 * copied first and never sorted in place.
 */
export function evaluateStages<T>(records: readonly T[], stages: readonly QueryStage<T>[]): T[] {
  let result = [...records];
  for (const stage of stages) {
    switch (stage.kind) {
      case 'where':
        result = result.filter((record) => stage.predicate(record));
        break;
      case 'order':
        // Array.prototype.sort is stable, so records equal under every key keep their order
        result.sort(compareBy(stage.keys));
        break;
      case 'skip':
        result = result.slice(stage.count);
        break;
      case 'take':
        result = result.slice(0, stage.count);
        break;
    }
  }
  return result;
}

/**
 * Generic lazy query over whatever a RecordLoader returns. Each backing store
 * supplies its own loader; filtering, ordering and paging are the same for all.
 */
export class Query<T> implements OrderedQuerySource<T> {
  constructor(
    private readonly loader: RecordLoader<T>,
    readonly stages: readonly QueryStage<T>[] = [],
  ) {}

  private append(stage: QueryStage<T>): Query<T> {
    return new Query(this.loader, [...this.stages, stage]);
  }

  where(predicate: Predicate<T>): QuerySource<T> {
    return this.append({ kind: 'where', predicate });
  }

  orderBy(key: KeySelector<T>, direction: SortDirection = 'asc'): OrderedQuerySource<T> {
    return this.append({ kind: 'order', keys: [{ key, direction }] });
  }

  thenBy(key: KeySelector<T>, direction: SortDirection = 'asc'): OrderedQuerySource<T> {
    const last = this.stages[this.stages.length - 1];
    if (last === undefined || last.kind !== 'order') {
      throw new QueryCompositionError('thenBy() must directly follow orderBy() or thenBy()');
    }
    return new Query(this.loader, [
      ...this.stages.slice(0, -1),
      { kind: 'order', keys: [...last.keys, { key, direction }] },
    ]);
  }

  skip(count: number): QuerySource<T> {
    assertCount('skip', count);
    return this.append({ kind: 'skip', count });
  }

  take(count: number): QuerySource<T> {
    assertCount('take', count);
    return this.append({ kind: 'take', count });
  }

  async toArray(signal?: AbortSignal): Promise<T[]> {
    signal?.throwIfAborted();
    const records = await this.loader(signal);
    signal?.throwIfAborted();
    return evaluateStages(records, this.stages);
  }

  async count(signal?: AbortSignal): Promise<number> {
    const records = await this.toArray(signal);
    return records.length;
  }
}

/**
 * Query over an in-memory array. The array is read at evaluation time, so
 * later pushes are visible to queries composed earlier.
 */
export function fromArray<T>(records: readonly T[]): QuerySource<T> {
  return new Query<T>(async () => records);
}
