import type { ComparisonOperation } from '../qualifier/comparison-operation.js';
import { and, or } from '../qualifier/factory.js';
import { KeyComparisonQualifier } from '../qualifier/key-comparison-qualifier.js';
import { KeyValueQualifier } from '../qualifier/key-value-qualifier.js';
import type { Qualifier } from '../qualifier/qualifier.js';

type Combinator = 'where' | 'and' | 'or';

function applyQualifier(
  existing: Qualifier | null,
  combinator: Combinator,
  added: Qualifier,
): QualifierBuilder {
  if (combinator === 'where' || existing === null) return new QualifierBuilder(added);
  // and()/or() flatten runs of the same operator
  return new QualifierBuilder(combinator === 'and' ? and(existing, added) : or(existing, added));
}

/**
 * Fluent immutable qualifier builder. Every operation returns a new
 * QualifierBuilder, existing instances are never mutated.
 */
export class QualifierBuilder {
  constructor(readonly qualifier: Qualifier | null = null) {}

  /** Start over with a new expression, dropping the current one. */
  get where(): KeySelector {
    return new KeySelector(this.qualifier, 'where');
  }

  /** Combine with the current qualifier using AND. */
  get and(): KeySelector {
    return new KeySelector(this.qualifier, 'and');
  }

  /** Combine with the current qualifier using OR. */
  get or(): KeySelector {
    return new KeySelector(this.qualifier, 'or');
  }

  /** Negates the current qualifier. */
  not(): QualifierBuilder {
    return new QualifierBuilder(this.qualifier ? this.qualifier.not() : null);
  }

  get stringRepresentation(): string {
    return this.qualifier ? this.qualifier.stringRepresentation : '';
  }
}

/**
 * Intermediate builder step: holds the combinator and awaits a key.
 */
export class KeySelector {
  constructor(
    private readonly _qualifier: Qualifier | null,
    private readonly _combinator: Combinator,
  ) {}

  /** Select the key path to compare, eg `address.city`. */
  key(k: string): ValueSetter {
    return new ValueSetter(this._qualifier, this._combinator, k);
  }
}

/**
 * Intermediate builder step: holds the key and awaits the comparison.
 */
export class ValueSetter {
  constructor(
    private readonly _qualifier: Qualifier | null,
    private readonly _combinator: Combinator,
    private readonly _key: string,
  ) {}

  private compare(op: ComparisonOperation, value: unknown): QualifierBuilder {
    return applyQualifier(this._qualifier, this._combinator, new KeyValueQualifier(this._key, op, value));
  }

  equals(value: unknown): QualifierBuilder {
    return this.compare('equalTo', value);
  }

  notEquals(value: unknown): QualifierBuilder {
    return this.compare('notEqualTo', value);
  }

  greaterThan(value: unknown): QualifierBuilder {
    return this.compare('greaterThan', value);
  }

  greaterThanOrEqual(value: unknown): QualifierBuilder {
    return this.compare('greaterThanOrEqual', value);
  }

  lessThan(value: unknown): QualifierBuilder {
    return this.compare('lessThan', value);
  }

  lessThanOrEqual(value: unknown): QualifierBuilder {
    return this.compare('lessThanOrEqual', value);
  }

  in(values: Iterable<unknown>): QualifierBuilder {
    return this.compare('in', [...values]);
  }

  /** `*` matches any run of characters, `?` a single one. */
  like(pattern: string): QualifierBuilder {
    return this.compare('like', pattern);
  }

  ilike(pattern: string): QualifierBuilder {
    return this.compare('caseInsensitiveLike', pattern);
  }

  isNull(): QualifierBuilder {
    return this.compare('equalTo', null);
  }

  isNotNull(): QualifierBuilder {
    return this.compare('notEqualTo', null);
  }

  /** Compares with another key of the same object, eg `startDate < endDate`. */
  equalsKey(other: string, op: ComparisonOperation = 'equalTo'): QualifierBuilder {
    return applyQualifier(this._qualifier, this._combinator, new KeyComparisonQualifier(this._key, op, other));
  }
}
