import { defaultLogger } from '../logger.js';
import { toQualifierValue } from '../values.js';
import { conjoin, disjoin, negate } from './combinators.js';
import {
  compareWithOperation,
  operationsEqual,
  operationToString,
  type ComparisonOperation,
} from './comparison-operation.js';
import { keyOf, type Key } from './key.js';
import type { EvaluatableQualifier, EvaluationOptions, Qualifier } from './qualifier.js';

/** Compares two keys of the same candidate object, e.g. `startDate < endDate`. */
export class KeyComparisonQualifier implements EvaluatableQualifier {
  readonly leftKeyExpr: Key;
  readonly rightKeyExpr: Key;

  constructor(
    left: Key | string,
    readonly operation: ComparisonOperation,
    right: Key | string,
  ) {
    this.leftKeyExpr = keyOf(left);
    this.rightKeyExpr = keyOf(right);
  }

  get leftKey(): string {
    return this.leftKeyExpr.key;
  }

  get rightKey(): string {
    return this.rightKeyExpr.key;
  }

  get isEmpty(): boolean {
    return false;
  }

  get hasUnresolvedBindings(): boolean {
    return false;
  }

  addReferencedKeys(set: Set<string>): void {
    set.add(this.leftKey);
    set.add(this.rightKey);
  }

  addBindingKeys(_set: Set<string>): void {}

  keyPathForBindingKey(_variable: string): string | null {
    return null;
  }

  qualifierWithBindings(_bindings: unknown, _requiresAll = false): Qualifier {
    return this;
  }

  evaluateWith(object: unknown, options: EvaluationOptions = {}): boolean {
    const lhs = toQualifierValue(this.leftKeyExpr.valueFor(object));
    const rhs = toQualifierValue(this.rightKeyExpr.valueFor(object));
    return compareWithOperation(this.operation, lhs, rhs, options.log ?? defaultLogger);
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
    return (
      other instanceof KeyComparisonQualifier &&
      operationsEqual(this.operation, other.operation) &&
      this.leftKeyExpr.isEqual(other.leftKeyExpr) &&
      this.rightKeyExpr.isEqual(other.rightKeyExpr)
    );
  }

  get stringRepresentation(): string {
    return `${this.leftKey} ${operationToString(this.operation)} ${this.rightKey}`;
  }

  get description(): string {
    return `<KeyComparisonQualifier: ${this.stringRepresentation}>`;
  }

  toString(): string {
    return this.stringRepresentation;
  }
}
