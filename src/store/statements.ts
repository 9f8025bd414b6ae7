import { readKey } from '../context/model.js';
import type { AggregateLock, ModelDefinition } from '../context/model.js';
import type { TrackedEntry } from '../context/tracker.js';
import { columnOf, toRow } from './row-mapper.js';

export interface CompiledStatement {
  sql: string;
  params: unknown[];
}

/**
 * Double-quotes each part of a possibly schema-qualified identifier.
 */
export function quoteIdentifier(name: string): string {
  return name
    .split('.')
    .map((part) => `"${part.replace(/"/g, '""')}"`)
    .join('.');
}

export function compileSelectAll<T extends object>(model: ModelDefinition<T>): CompiledStatement {
  return { sql: `SELECT * FROM ${quoteIdentifier(model.table)}`, params: [] };
}

export function compileInsert<T extends object>(
  model: ModelDefinition<T>,
  record: T,
  lock?: AggregateLock,
): CompiledStatement {
  const row = toRow(model, record, lock);
  const columns = Object.keys(row);
  const placeholders = columns.map((_, i) => `$${i + 1}`);

  const sql = [
    `INSERT INTO ${quoteIdentifier(model.table)}`,
    `(${columns.map(quoteIdentifier).join(', ')})`,
    `VALUES (${placeholders.join(', ')})`,
  ].join('\n');

  return { sql, params: Object.values(row) };
}

/**
 * Rewrites every column of the row, the key included, so a record holding
 * nothing but its key still produces a valid statement.
 */
export function compileUpdate<T extends object>(
  model: ModelDefinition<T>,
  record: T,
  lock?: AggregateLock,
): CompiledStatement {
  const row = toRow(model, record, lock);
  const params: unknown[] = [];
  const assignments = Object.entries(row).map(([column, value]) => {
    params.push(value);
    return `${quoteIdentifier(column)} = $${params.length}`;
  });
  params.push(readKey(model, record));

  const sql = [
    `UPDATE ${quoteIdentifier(model.table)}`,
    `SET ${assignments.join(', ')}`,
    `WHERE ${quoteIdentifier(columnOf(model, model.key))} = $${params.length}`,
  ].join('\n');

  return { sql, params };
}

export function compileDelete<T extends object>(model: ModelDefinition<T>, record: T): CompiledStatement {
  const sql = [
    `DELETE FROM ${quoteIdentifier(model.table)}`,
    `WHERE ${quoteIdentifier(columnOf(model, model.key))} = $1`,
  ].join('\n');

  return { sql, params: [readKey(model, record)] };
}

/** Statement writing one tracked change, or null for an unchanged entry. */
export function compileChange(entry: TrackedEntry, lock?: AggregateLock): CompiledStatement | null {
  switch (entry.state) {
    case 'added':
      return compileInsert(entry.model, entry.record, lock);
    case 'modified':
      return compileUpdate(entry.model, entry.record, lock);
    case 'deleted':
      return compileDelete(entry.model, entry.record);
    case 'unchanged':
      return null;
  }
}
