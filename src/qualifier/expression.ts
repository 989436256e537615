import { valueForKeyPath } from '../kvc.js';
import { formatValue, toQualifierValue, valuesEqual, type QualifierValue } from '../values.js';

/**
 * Anything that can appear in a qualifier tree: keys, constants, variables
 * and the qualifiers themselves.
 */
export interface Expression {
  /** Adds every key path this expression reads from a candidate object. */
  addReferencedKeys(set: Set<string>): void;
  /** Adds the names of all `$variables` that still need a value. */
  addBindingKeys(set: Set<string>): void;
  readonly hasUnresolvedBindings: boolean;
  /** The key path compared against the named variable, if any. */
  keyPathForBindingKey(variable: string): string | null;
}

/** A named placeholder (`$name`) bound later against a bindings object. */
export class QualifierVariable implements Expression {
  constructor(readonly key: string) {}

  get hasUnresolvedBindings(): boolean {
    return true;
  }

  addReferencedKeys(_set: Set<string>): void {}

  addBindingKeys(set: Set<string>): void {
    set.add(this.key);
  }

  keyPathForBindingKey(_variable: string): string | null {
    return null;
  }

  /** Looks the variable up; `undefined` means the binding is missing. */
  valueIn(bindings: unknown): unknown {
    return valueForKeyPath(this.key, bindings);
  }

  isEqual(other: unknown): boolean {
    return other instanceof QualifierVariable && other.key === this.key;
  }

  toString(): string {
    return `$${this.key}`;
  }
}

export function isQualifierVariable(value: unknown): value is QualifierVariable {
  return value instanceof QualifierVariable;
}

abstract class ConstantExpression implements Expression {
  get hasUnresolvedBindings(): boolean {
    return false;
  }
  addReferencedKeys(_set: Set<string>): void {}
  addBindingKeys(_set: Set<string>): void {}
  keyPathForBindingKey(_variable: string): string | null {
    return null;
  }
}

export class ConstantValue extends ConstantExpression {
  readonly value: QualifierValue;

  constructor(value: unknown) {
    super();
    this.value = toQualifierValue(value);
  }

  valueFor(_object: unknown): QualifierValue {
    return this.value;
  }

  isEqual(other: unknown): boolean {
    return other instanceof ConstantValue && valuesEqual(this.value, other.value);
  }

  override toString(): string {
    return formatValue(this.value);
  }
}

/** SQL NULL as an expression. */
export class NullExpression extends ConstantExpression {
  static readonly shared = new NullExpression();

  private constructor() {
    super();
  }

  valueFor(_object: unknown): null {
    return null;
  }

  isEqual(other: unknown): boolean {
    return other instanceof NullExpression;
  }

  override toString(): string {
    return 'NULL';
  }
}

/** Literal SQL text that is emitted verbatim, never quoted. */
export class RawSQLValue extends ConstantExpression {
  constructor(readonly sql: string) {
    super();
  }

  isEqual(other: unknown): boolean {
    return other instanceof RawSQLValue && other.sql === this.sql;
  }

  override toString(): string {
    return this.sql;
  }
}
