export class ConcurrencyError extends Error {
  override readonly name = 'ConcurrencyError';

  constructor(
    readonly expectedRows: number,
    readonly actualRows: number,
    message?: string,
  ) {
    super(message ?? `Concurrency conflict: expected ${expectedRows} row(s) affected, got ${actualRows}`);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DataContextError extends Error {
  override readonly name = 'DataContextError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class QueryCompositionError extends Error {
  override readonly name = 'QueryCompositionError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
