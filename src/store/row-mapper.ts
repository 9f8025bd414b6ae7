import { LOCK_PROPERTY, TIMESTAMP_COLUMN, VERSION_COLUMN } from '../context/model.js';
import type { AggregateLock, ModelDefinition } from '../context/model.js';

export type Row = Record<string, unknown>;

export function columnOf<T extends object>(model: ModelDefinition<T>, property: string): string {
  return model.columns[property] ?? property;
}

/**
 * Maps a record onto column values. The lock of a lock-enabled model is
 * replaced by `lock`, the values being written; undefined properties are left out.
 */
export function toRow<T extends object>(model: ModelDefinition<T>, record: T, lock?: AggregateLock): Row {
  const row: Row = {};
  for (const [property, value] of Object.entries(record)) {
    if (value === undefined) continue;
    if (model.lock && property === LOCK_PROPERTY) continue;
    row[columnOf(model, property)] = value;
  }
  if (model.lock && lock !== undefined) {
    row[VERSION_COLUMN] = lock.version;
    row[TIMESTAMP_COLUMN] = lock.timestamp;
  }
  return row;
}

/**
 * Maps a row back onto property names and parses it with the model schema.
 * pg returns BIGINT as string, so the version column goes through Number().
 */
export function fromRow<T extends object>(model: ModelDefinition<T>, row: Row): T {
  const properties = new Map<string, string>();
  for (const [property, column] of Object.entries(model.columns)) {
    properties.set(column, property);
  }
  const values: Row = {};
  for (const [column, value] of Object.entries(row)) {
    if (model.lock && (column === VERSION_COLUMN || column === TIMESTAMP_COLUMN)) continue;
    values[properties.get(column) ?? column] = value;
  }
  if (model.lock) {
    values[LOCK_PROPERTY] = {
      version: Number(row[VERSION_COLUMN]),
      timestamp: row[TIMESTAMP_COLUMN],
    };
  }
  return model.parse(values);
}
