import { defaultLogger } from '../logger.js';
import { conjoin, disjoin, negate } from './combinators.js';
import { isEvaluatable, type EvaluatableQualifier, type EvaluationOptions, type Qualifier } from './qualifier.js';

export type CompoundOperator = 'and' | 'or';

/** AND / OR over an ordered list of child qualifiers. */
export class CompoundQualifier implements EvaluatableQualifier {
  readonly qualifiers: readonly Qualifier[];

  constructor(
    qualifiers: readonly Qualifier[],
    readonly operator: CompoundOperator,
  ) {
    this.qualifiers = [...qualifiers];
  }

  get operatorAsString(): string {
    return this.operator === 'and' ? 'AND' : 'OR';
  }

  get isEmpty(): boolean {
    return this.qualifiers.length === 0;
  }

  get hasUnresolvedBindings(): boolean {
    return this.qualifiers.some((q) => q.hasUnresolvedBindings);
  }

  addReferencedKeys(set: Set<string>): void {
    for (const q of this.qualifiers) q.addReferencedKeys(set);
  }

  addBindingKeys(set: Set<string>): void {
    for (const q of this.qualifiers) q.addBindingKeys(set);
  }

  keyPathForBindingKey(variable: string): string | null {
    for (const q of this.qualifiers) {
      const kp = q.keyPathForBindingKey(variable);
      if (kp !== null) return kp;
    }
    return null;
  }

  /**
   * Children with missing bindings are kept in their partially bound form
   * when `requiresAll` is off, never dropped: with only `la` supplied,
   * `lastname = $la AND firstname = $fa` becomes
   * `lastname = 'Duck' AND firstname = $fa`.
   */
  qualifierWithBindings(bindings: unknown, requiresAll = false): Qualifier {
    let didChange = false;
    const bound = this.qualifiers.map((q) => {
      const b = q.qualifierWithBindings(bindings, requiresAll);
      if (b !== q) didChange = true;
      return b;
    });
    return didChange ? new CompoundQualifier(bound, this.operator) : this;
  }

  evaluateWith(object: unknown, options: EvaluationOptions = {}): boolean {
    for (const q of this.qualifiers) {
      if (!isEvaluatable(q)) {
        (options.log ?? defaultLogger).error('compound child does not support evaluation', q.description);
        return false;
      }
      const matches = q.evaluateWith(object, options);
      if (this.operator === 'or' && matches) return true;
      if (this.operator === 'and' && !matches) return false;
    }
    return this.operator === 'and';
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

  /** Order-sensitive: `a OR b` is not equal to `b OR a`. */
  isEqual(other: unknown): boolean {
    if (!(other instanceof CompoundQualifier)) return false;
    if (other.operator !== this.operator) return false;
    if (other.qualifiers.length !== this.qualifiers.length) return false;
    return this.qualifiers.every((q, i) => {
      const o = other.qualifiers[i];
      return o !== undefined && q.isEqual(o);
    });
  }

  get stringRepresentation(): string {
    const [first] = this.qualifiers;
    // empty AND matches everything, empty OR nothing
    if (first === undefined) return this.operator === 'and' ? '*true*' : '*false*';
    if (this.qualifiers.length === 1) return first.stringRepresentation;

    return this.qualifiers
      .map((q) => (q instanceof CompoundQualifier ? `(${q.stringRepresentation})` : q.stringRepresentation))
      .join(` ${this.operatorAsString} `);
  }

  get description(): string {
    return `<CompoundQualifier: ${this.operatorAsString}(${this.qualifiers.map((q) => q.description).join(', ')})>`;
  }

  toString(): string {
    return this.stringRepresentation;
  }
}
