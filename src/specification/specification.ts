import type { Predicate } from '../query/types.js';

/**
 * A reusable, composable criterion over records of type T.
 * Subclasses implement isSatisfiedBy(); export() turns the criterion into a
 * standalone predicate that a query source can filter with.
 */
export abstract class Specification<T> {
  abstract isSatisfiedBy(record: T): boolean;

  export(): Predicate<T> {
    return (record) => this.isSatisfiedBy(record);
  }

  and(other: Specification<T>): Specification<T> {
    return new AndSpecification([this, other]);
  }

  or(other: Specification<T>): Specification<T> {
    return new OrSpecification([this, other]);
  }

  not(): Specification<T> {
    return new NotSpecification(this);
  }
}

export class PredicateSpecification<T> extends Specification<T> {
  constructor(private readonly predicate: Predicate<T>) {
    super();
  }

  isSatisfiedBy(record: T): boolean {
    return this.predicate(record);
  }
}

export class AndSpecification<T> extends Specification<T> {
  constructor(readonly specifications: readonly Specification<T>[]) {
    super();
  }

  isSatisfiedBy(record: T): boolean {
    return this.specifications.every((s) => s.isSatisfiedBy(record));
  }

  // Flat accumulation: a chain of and() calls stays one node
  override and(other: Specification<T>): Specification<T> {
    return new AndSpecification([...this.specifications, other]);
  }
}

export class OrSpecification<T> extends Specification<T> {
  constructor(readonly specifications: readonly Specification<T>[]) {
    super();
  }

  isSatisfiedBy(record: T): boolean {
    return this.specifications.some((s) => s.isSatisfiedBy(record));
  }

  override or(other: Specification<T>): Specification<T> {
    return new OrSpecification([...this.specifications, other]);
  }
}

export class NotSpecification<T> extends Specification<T> {
  constructor(readonly inner: Specification<T>) {
    super();
  }

  isSatisfiedBy(record: T): boolean {
    return !this.inner.isSatisfiedBy(record);
  }

  override not(): Specification<T> {
    return this.inner;
  }
}

/**
 * Entry point for building specifications.
 *
 * @example
 * spec.where((e: Employee) => e.active).and(spec.where((e) => e.age >= 30))
 */
export const spec = {
  where<T>(predicate: Predicate<T>): Specification<T> {
    return new PredicateSpecification(predicate);
  },
  all<T>(): Specification<T> {
    return new PredicateSpecification<T>(() => true);
  },
  none<T>(): Specification<T> {
    return new PredicateSpecification<T>(() => false);
  },
};
