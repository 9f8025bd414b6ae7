import type pg from 'pg';
import { BaseDataContext } from '../context/base-context.js';
import type { ModelDefinition } from '../context/model.js';
import type { TrackedEntry } from '../context/tracker.js';
import { ConcurrencyError, DataContextError } from '../errors.js';
import { fromRow } from './row-mapper.js';
import type { Row } from './row-mapper.js';
import { compileChange, compileSelectAll } from './statements.js';

export interface PostgresDataContextConfig {
  /** Caller-owned pool; the context never ends it. */
  pool: pg.Pool;
  /** Called with every statement right before it is sent. */
  onStatement?: (sql: string, params: readonly unknown[]) => void;
  /** Receives failures that cannot be rethrown, such as a failed ROLLBACK. */
  onError?: (context: string, error: unknown) => void;
  /** Source of lock timestamps. Defaults to the system clock. */
  clock?: () => Date;
}

export class PostgresDataContext extends BaseDataContext {
  private readonly pool: pg.Pool;
  private readonly onStatement: ((sql: string, params: readonly unknown[]) => void) | undefined;
  private readonly onError: (context: string, error: unknown) => void;
  private readonly clock: () => Date;

  constructor(config: PostgresDataContextConfig) {
    super();
    this.pool = config.pool;
    this.onStatement = config.onStatement;
    this.onError = config.onError ?? ((context, err) => {
      console.error(`[data-context] ${context} failed:`, err);
    });
    this.clock = config.clock ?? (() => new Date());
  }

  protected async loadRecords<T extends object>(model: ModelDefinition<T>): Promise<readonly T[]> {
    const { sql, params } = compileSelectAll(model);
    this.onStatement?.(sql, params);
    let result: pg.QueryResult<Row>;
    try {
      result = await this.pool.query<Row>(sql, params);
    } catch (err) {
      throw new DataContextError(`Failed to load "${model.name}" records: ${String(err)}`, err);
    }

    try {
      return result.rows.map((row) => fromRow(model, row));
    } catch (err) {
      throw new DataContextError(`Failed to map a "${model.name}" row: ${String(err)}`, err);
    }
  }

  protected async persistChanges(changes: readonly TrackedEntry[], signal?: AbortSignal): Promise<void> {
    const locks = this.planLocks(changes, this.clock());
    let client: pg.PoolClient;
    try {
      client = await this.pool.connect();
    } catch (err) {
      throw new DataContextError(`Failed to connect: ${String(err)}`, err);
    }
    try {
      await this.run(client, 'BEGIN');

      for (const change of changes) {
        signal?.throwIfAborted();
        const statement = compileChange(change, locks.get(change.record));
        if (statement === null) continue;

        let result: pg.QueryResult;
        try {
          result = await this.run(client, statement.sql, statement.params);
        } catch (err) {
          throw new DataContextError(`Failed to save a "${change.model.name}" record: ${String(err)}`, err);
        }
        // An update or delete that matched nothing means the row is gone
        if (change.state !== 'added' && (result.rowCount ?? 0) === 0) {
          throw new ConcurrencyError(1, 0, `"${change.model.name}" record no longer exists`);
        }
      }

      await this.run(client, 'COMMIT');
    } catch (err) {
      await this.rollback(client);
      if (err instanceof DataContextError || err instanceof ConcurrencyError || signal?.aborted === true) {
        throw err;
      }
      throw new DataContextError(`Failed to save changes: ${String(err)}`, err);
    } finally {
      client.release();
    }

    this.applyLocks(locks);
  }

  private async run(client: pg.PoolClient, sql: string, params: unknown[] = []): Promise<pg.QueryResult> {
    this.onStatement?.(sql, params);
    return client.query(sql, params);
  }

  private async rollback(client: pg.PoolClient): Promise<void> {
    try {
      await this.run(client, 'ROLLBACK');
    } catch (err) {
      this.onError('rollback', err);
    }
  }
}
