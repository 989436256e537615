import type { EvaluatableQualifier, Qualifier } from './qualifier.js';

/** Always matches (`*true*`) or never matches (`*false*`). */
export class BooleanQualifier implements EvaluatableQualifier {
  static readonly TRUE = new BooleanQualifier(true);
  static readonly FALSE = new BooleanQualifier(false);

  static of(value: boolean): BooleanQualifier {
    return value ? BooleanQualifier.TRUE : BooleanQualifier.FALSE;
  }

  private constructor(readonly value: boolean) {}

  get isEmpty(): boolean {
    return false;
  }

  get hasUnresolvedBindings(): boolean {
    return false;
  }

  addReferencedKeys(_set: Set<string>): void {}
  addBindingKeys(_set: Set<string>): void {}

  keyPathForBindingKey(_variable: string): string | null {
    return null;
  }

  qualifierWithBindings(_bindings: unknown, _requiresAll = false): Qualifier {
    return this;
  }

  evaluateWith(_object: unknown): boolean {
    return this.value;
  }

  not(): Qualifier {
    return BooleanQualifier.of(!this.value);
  }

  and(other?: Qualifier | null): Qualifier {
    if (!other) return this;
    return this.value ? other : BooleanQualifier.FALSE;
  }

  or(other?: Qualifier | null): Qualifier {
    if (!other) return this;
    return this.value ? BooleanQualifier.TRUE : other;
  }

  isEqual(other: unknown): boolean {
    return other instanceof BooleanQualifier && other.value === this.value;
  }

  get stringRepresentation(): string {
    return this.value ? '*true*' : '*false*';
  }

  get description(): string {
    return `<BooleanQualifier: ${this.value ? 'TRUE' : 'FALSE'}>`;
  }

  toString(): string {
    return this.stringRepresentation;
  }
}
