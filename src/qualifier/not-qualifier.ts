import { defaultLogger } from '../logger.js';
import { conjoin, disjoin } from './combinators.js';
import { KeyComparisonQualifier } from './key-comparison-qualifier.js';
import { KeyValueQualifier } from './key-value-qualifier.js';
import { isEvaluatable, type EvaluatableQualifier, type EvaluationOptions, type Qualifier } from './qualifier.js';

export class NotQualifier implements EvaluatableQualifier {
  constructor(readonly qualifier: Qualifier) {}

  get isEmpty(): boolean {
    return this.qualifier.isEmpty;
  }

  get hasUnresolvedBindings(): boolean {
    return this.qualifier.hasUnresolvedBindings;
  }

  addReferencedKeys(set: Set<string>): void {
    this.qualifier.addReferencedKeys(set);
  }

  addBindingKeys(set: Set<string>): void {
    this.qualifier.addBindingKeys(set);
  }

  keyPathForBindingKey(variable: string): string | null {
    return this.qualifier.keyPathForBindingKey(variable);
  }

  qualifierWithBindings(bindings: unknown, requiresAll = false): Qualifier {
    const bound = this.qualifier.qualifierWithBindings(bindings, requiresAll);
    return bound === this.qualifier ? this : bound.not();
  }

  evaluateWith(object: unknown, options: EvaluationOptions = {}): boolean {
    if (!isEvaluatable(this.qualifier)) {
      (options.log ?? defaultLogger).error('negated qualifier does not support evaluation', this.qualifier.description);
      return false;
    }
    return !this.qualifier.evaluateWith(object, options);
  }

  not(): Qualifier {
    return this.qualifier;
  }

  and(other?: Qualifier | null): Qualifier {
    return conjoin(this, other);
  }

  or(other?: Qualifier | null): Qualifier {
    return disjoin(this, other);
  }

  isEqual(other: unknown): boolean {
    return other instanceof NotQualifier && this.qualifier.isEqual(other.qualifier);
  }

  get stringRepresentation(): string {
    const inner = this.qualifier;
    if (inner instanceof KeyValueQualifier || inner instanceof KeyComparisonQualifier) {
      return `NOT ${inner.stringRepresentation}`;
    }
    return `NOT (${inner.stringRepresentation})`;
  }

  get description(): string {
    return `<NotQualifier: ${this.qualifier.description}>`;
  }

  toString(): string {
    return this.stringRepresentation;
  }
}
