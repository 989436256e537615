import { QualifierBindingNotFoundError } from '../errors.js';
import { defaultLogger } from '../logger.js';
import { formatValue, toQualifierValue, valuesEqual, type QualifierValue } from '../values.js';
import { conjoin, disjoin, negate } from './combinators.js';
import {
  compareWithOperation,
  operationsEqual,
  operationToString,
  type ComparisonOperation,
} from './comparison-operation.js';
import { ConstantValue, NullExpression, QualifierVariable } from './expression.js';
import { keyOf, type Key } from './key.js';
import type { EvaluatableQualifier, EvaluationOptions, Qualifier } from './qualifier.js';

/**
 * Compares a key of the candidate object with a constant, e.g.
 * `lastname = 'Duck'`. The value may be a QualifierVariable that is filled
 * in later by qualifierWithBindings().
 */
export class KeyValueQualifier implements EvaluatableQualifier {
  readonly keyExpr: Key;
  readonly operation: ComparisonOperation;
  readonly value: QualifierValue | QualifierVariable;

  constructor(key: Key | string, operation: ComparisonOperation, value: unknown) {
    this.keyExpr = keyOf(key);
    this.operation = operation;
    this.value = value instanceof QualifierVariable ? value : toQualifierValue(value);
  }

  get key(): string {
    return this.keyExpr.key;
  }

  get variable(): QualifierVariable | null {
    return this.value instanceof QualifierVariable ? this.value : null;
  }

  get leftExpression(): Key {
    return this.keyExpr;
  }

  get rightExpression(): ConstantValue | NullExpression | QualifierVariable {
    if (this.value instanceof QualifierVariable) return this.value;
    return this.value === null ? NullExpression.shared : new ConstantValue(this.value);
  }

  get isEmpty(): boolean {
    return false;
  }

  get hasUnresolvedBindings(): boolean {
    return this.variable !== null;
  }

  addReferencedKeys(set: Set<string>): void {
    set.add(this.key);
  }

  addBindingKeys(set: Set<string>): void {
    const v = this.variable;
    if (v) set.add(v.key);
  }

  keyPathForBindingKey(variable: string): string | null {
    return this.variable?.key === variable ? this.key : null;
  }

  qualifierWithBindings(bindings: unknown, requiresAll = false): Qualifier {
    const v = this.variable;
    if (!v) return this;

    const bound = v.valueIn(bindings);
    if (bound === undefined) {
      if (requiresAll) throw new QualifierBindingNotFoundError(v.key);
      return this;
    }
    return new KeyValueQualifier(this.keyExpr, this.operation, bound);
  }

  evaluateWith(object: unknown, options: EvaluationOptions = {}): boolean {
    const log = options.log ?? defaultLogger;
    if (this.value instanceof QualifierVariable) {
      log.error(`cannot evaluate qualifier with unresolved binding $${this.value.key}`, this.key);
      return false;
    }
    const lhs = toQualifierValue(this.keyExpr.valueFor(object));
    return compareWithOperation(this.operation, lhs, this.value, log);
  }

  not(): Qualifier {
    return negate(this);
  }

  and(other?: Qualifier | null): Qualifier {
    return conjoin(this, other);
  }

  or(other?: Qualifier | null): Qualifier {
    return disjoin(this, other);
  }

  isEqual(other: unknown): boolean {
    if (!(other instanceof KeyValueQualifier)) return false;
    if (!operationsEqual(this.operation, other.operation)) return false;
    if (!this.keyExpr.isEqual(other.keyExpr)) return false;
    if (this.value instanceof QualifierVariable) return this.value.isEqual(other.value);
    if (other.value instanceof QualifierVariable) return false;
    return valuesEqual(this.value, other.value);
  }

  get stringRepresentation(): string {
    if (this.value === null) {
      if (this.operation === 'equalTo') return `${this.key} IS NULL`;
      if (this.operation === 'notEqualTo') return `${this.key} IS NOT NULL`;
    }
    const rhs = this.value instanceof QualifierVariable ? this.value.toString() : formatValue(this.value);
    return `${this.key} ${operationToString(this.operation)} ${rhs}`;
  }

  get description(): string {
    return `<KeyValueQualifier: ${this.stringRepresentation}>`;
  }

  toString(): string {
    return this.stringRepresentation;
  }
}
