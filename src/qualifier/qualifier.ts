import type { Logger } from '../logger.js';
import type { Expression } from './expression.js';

/**
 * A predicate node restricting which records match a fetch.
 *
 * This is an interface rather than a closed union so that clients can add
 * their own qualifier kinds next to the built-in ones. Qualifiers are
 * immutable; binding resolution and the combinators return new trees and
 * never touch the receiver.
 */
export interface Qualifier extends Expression {
  readonly isEmpty: boolean;

  /**
   * Replaces `$variables` with values looked up in `bindings`. With
   * `requiresAll` a missing binding throws QualifierBindingNotFoundError,
   * otherwise the variable stays in place. Returns the receiver itself
   * when nothing was replaced.
   */
  qualifierWithBindings(bindings: unknown, requiresAll?: boolean): Qualifier;

  not(): Qualifier;
  and(other?: Qualifier | null): Qualifier;
  or(other?: Qualifier | null): Qualifier;

  isEqual(other: unknown): boolean;

  /** Canonical qualifier format, readable by parseQualifier(). */
  readonly stringRepresentation: string;
  /** Debug rendering, not meant to be parsed. */
  readonly description: string;
}

export interface EvaluationOptions {
  /** Receives soft failures such as unsupported comparisons. */
  log?: Logger;
}

/** Qualifiers that can be evaluated against an in-memory object. */
export interface EvaluatableQualifier extends Qualifier {
  evaluateWith(object: unknown, options?: EvaluationOptions): boolean;
}

export function isEvaluatable(qualifier: Qualifier): qualifier is EvaluatableQualifier {
  return 'evaluateWith' in qualifier && typeof qualifier.evaluateWith === 'function';
}

/** All key paths the expression reads, in first-seen order. */
export function referencedKeys(expression: Expression): string[] {
  const keys = new Set<string>();
  expression.addReferencedKeys(keys);
  return [...keys];
}

/** Names of all variables still waiting for a binding. */
export function bindingKeys(expression: Expression): string[] {
  const keys = new Set<string>();
  expression.addBindingKeys(keys);
  return [...keys];
}
