import { BooleanQualifier } from './boolean-qualifier.js';
import { CompoundQualifier, type CompoundOperator } from './compound-qualifier.js';
import { NotQualifier } from './not-qualifier.js';
import type { Qualifier } from './qualifier.js';

function operandsOf(q: Qualifier, op: CompoundOperator): readonly Qualifier[] {
  return q instanceof CompoundQualifier && q.operator === op ? q.qualifiers : [q];
}

/**
 * `left AND right` with simplification: a boolean operand short-circuits
 * or disappears, and AND compounds on either side are flattened into one.
 */
export function conjoin(left: Qualifier, right?: Qualifier | null): Qualifier {
  if (right === null || right === undefined) return left;
  if (left instanceof BooleanQualifier) return left.value ? right : BooleanQualifier.FALSE;
  if (right instanceof BooleanQualifier) return right.value ? left : BooleanQualifier.FALSE;
  return new CompoundQualifier([...operandsOf(left, 'and'), ...operandsOf(right, 'and')], 'and');
}

/** `left OR right`, simplified the same way as conjoin(). */
export function disjoin(left: Qualifier, right?: Qualifier | null): Qualifier {
  if (right === null || right === undefined) return left;
  if (left instanceof BooleanQualifier) return left.value ? BooleanQualifier.TRUE : right;
  if (right instanceof BooleanQualifier) return right.value ? BooleanQualifier.TRUE : left;
  return new CompoundQualifier([...operandsOf(left, 'or'), ...operandsOf(right, 'or')], 'or');
}

/** `NOT q`, eliminating double negation and flipping boolean constants. */
export function negate(q: Qualifier): Qualifier {
  if (q instanceof NotQualifier) return q.qualifier;
  if (q instanceof BooleanQualifier) return q.value ? BooleanQualifier.FALSE : BooleanQualifier.TRUE;
  return new NotQualifier(q);
}
