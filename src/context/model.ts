import type { z } from 'zod';

/** Optimistic lock carried by an aggregate root: bumped on every write. */
export interface AggregateLock {
  version: number;
  timestamp: Date;
}

export interface AggregateRoot {
  lock: AggregateLock;
}

export type ModelSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Mapping of one record type onto a table. Use defineModel() to create
 * validated instances.
 */
export interface ModelDefinition<T extends object> {
  /**
   * Stable unique identifier — keys the model's records inside a context.
   * Convention: /^[a-zA-Z][a-zA-Z0-9\-_]{0,127}$/
   */
  readonly name: string;

  /** Table name, optionally schema-qualified (`hr.employees`). */
  readonly table: string;

  /** Property holding the primary key. */
  readonly key: string;

  /**
   * When true, the record's `lock` property is stored in the `version` and
   * `timestamp` columns and restamped on every write.
   */
  readonly lock: boolean;

  /** Property name → column name, for properties whose column differs. */
  readonly columns: Readonly<Record<string, string>>;

  /** Parses column-mapped row values into a record; throws a ZodError on mismatch. */
  readonly parse: (values: Record<string, unknown>) => T;

  /** True when `value` satisfies the model's schema as it is, without conversion. */
  readonly isRecord: (value: unknown) => value is T;
}

export interface ModelOptions<T extends object> {
  name: string;
  table: string;
  schema: ModelSchema<T>;
  key?: Extract<keyof T, string>;
  lock?: boolean;
  columns?: Partial<Record<Extract<keyof T, string>, string>>;
}

const MODEL_NAME_PATTERN = /^[a-zA-Z][a-zA-Z0-9\-_]{0,127}$/;
const IDENTIFIER_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]{0,62}$/;

export const LOCK_PROPERTY = 'lock';
export const VERSION_COLUMN = 'version';
export const TIMESTAMP_COLUMN = 'timestamp';

function isIdentifier(value: string): boolean {
  return value.split('.').length <= 2 && value.split('.').every((part) => IDENTIFIER_PATTERN.test(part));
}

/**
 * Validates model options and returns a ModelDefinition.
 * Throws if the name does not match the naming convention, if the table or a
 * column is not a plain identifier, or if a mapped column collides with the
 * lock columns.
 */
export function defineModel<T extends object>(options: ModelOptions<T>): ModelDefinition<T> {
  if (!MODEL_NAME_PATTERN.test(options.name)) {
    throw new Error(
      `defineModel: name "${options.name}" must match /^[a-zA-Z][a-zA-Z0-9\\-_]{0,127}$/`,
    );
  }
  if (!isIdentifier(options.table)) {
    throw new Error(`defineModel: "${options.name}" table "${options.table}" is not a valid identifier`);
  }

  const columns: Record<string, string> = {};
  for (const [property, column] of Object.entries(options.columns ?? {})) {
    if (typeof column !== 'string') continue;
    if (!IDENTIFIER_PATTERN.test(column)) {
      throw new Error(`defineModel: "${options.name}" column "${column}" is not a valid identifier`);
    }
    columns[property] = column;
  }

  const lock = options.lock ?? false;
  if (lock) {
    const mapped = Object.values(columns);
    if (mapped.includes(VERSION_COLUMN) || mapped.includes(TIMESTAMP_COLUMN)) {
      throw new Error(
        `defineModel: "${options.name}" maps a property onto a lock column (${VERSION_COLUMN}, ${TIMESTAMP_COLUMN})`,
      );
    }
  }

  return {
    name: options.name,
    table: options.table,
    key: options.key ?? 'id',
    lock,
    columns,
    parse: (values) => options.schema.parse(values),
    isRecord: (value: unknown): value is T => options.schema.safeParse(value).success,
  };
}

/** Reads the primary-key value of a record. */
export function readKey<T extends object>(model: ModelDefinition<T>, record: T): unknown {
  return Reflect.get(record, model.key);
}

export function isAggregateLock(value: unknown): value is AggregateLock {
  return (
    typeof value === 'object' &&
    value !== null &&
    'version' in value &&
    typeof value.version === 'number' &&
    'timestamp' in value &&
    value.timestamp instanceof Date
  );
}

/** Lock of a lock-enabled record; a record written for the first time has none yet. */
export function readLock<T extends object>(record: T): AggregateLock | undefined {
  const lock: unknown = Reflect.get(record, LOCK_PROPERTY);
  return isAggregateLock(lock) ? lock : undefined;
}

/** Lock a record carries after it has been written at `now`. */
export function nextLock(current: AggregateLock | undefined, now: Date): AggregateLock {
  return { version: (current?.version ?? 0) + 1, timestamp: now };
}
