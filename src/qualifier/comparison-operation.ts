import { defaultLogger, type Logger } from '../logger.js';
import {
  compareValues,
  isValueArray,
  valueKind,
  valuesEqual,
  type QualifierValue,
} from '../values.js';

export type KnownComparisonOperation =
  | 'equalTo'
  | 'notEqualTo'
  | 'greaterThan'
  | 'greaterThanOrEqual'
  | 'lessThan'
  | 'lessThanOrEqual'
  | 'in'
  | 'like'
  | 'caseInsensitiveLike'
  | 'SQLLike'
  | 'SQLCaseInsensitiveLike';

/** Operator tokens nobody recognized; they round-trip as written. */
export interface OtherComparisonOperation {
  readonly kind: 'other';
  readonly token: string;
}

export type ComparisonOperation = KnownComparisonOperation | OtherComparisonOperation;

const OPERATION_BY_TOKEN: Readonly<Record<string, KnownComparisonOperation>> = {
  '=': 'equalTo',
  '==': 'equalTo',
  '!=': 'notEqualTo',
  '>': 'greaterThan',
  '>=': 'greaterThanOrEqual',
  '=>': 'greaterThanOrEqual',
  '<': 'lessThan',
  '<=': 'lessThanOrEqual',
  '=<': 'lessThanOrEqual',
  IN: 'in',
  LIKE: 'like',
  like: 'like',
  ILIKE: 'caseInsensitiveLike',
  ilike: 'caseInsensitiveLike',
  caseInsensitiveLike: 'caseInsensitiveLike',
  'caseInsensitiveLike:': 'caseInsensitiveLike',
  SQLLIKE: 'SQLLike',
  SQLILIKE: 'SQLCaseInsensitiveLike',
};

const TOKEN_BY_OPERATION: Readonly<Record<KnownComparisonOperation, string>> = {
  equalTo: '=',
  notEqualTo: '!=',
  greaterThan: '>',
  greaterThanOrEqual: '>=',
  lessThan: '<',
  lessThanOrEqual: '<=',
  in: 'IN',
  like: 'LIKE',
  caseInsensitiveLike: 'ILIKE',
  SQLLike: 'SQLLIKE',
  SQLCaseInsensitiveLike: 'SQLILIKE',
};

export function otherOperation(token: string): OtherComparisonOperation {
  return { kind: 'other', token };
}

export function parseComparisonOperation(token: string): ComparisonOperation {
  return Object.hasOwn(OPERATION_BY_TOKEN, token)
    ? (OPERATION_BY_TOKEN[token] ?? otherOperation(token))
    : otherOperation(token);
}

export function operationToString(op: ComparisonOperation): string {
  return typeof op === 'string' ? TOKEN_BY_OPERATION[op] : op.token;
}

export function operationsEqual(a: ComparisonOperation, b: ComparisonOperation): boolean {
  if (typeof a === 'string' || typeof b === 'string') return a === b;
  return a.token === b.token;
}

/**
 * Evaluates `a op b` in memory. Used by in-memory filtering only, SQL
 * generation renders the operator instead. Unsupported combinations log an
 * error and yield false.
 */
export function compareWithOperation(
  op: ComparisonOperation,
  a: QualifierValue,
  b: QualifierValue,
  log: Logger = defaultLogger,
): boolean {
  switch (op) {
    case 'equalTo':
      return valuesEqual(a, b);
    case 'notEqualTo':
      return !valuesEqual(a, b);
    case 'lessThan':
      return isSmaller(a, b, op, log);
    case 'greaterThan':
      return isSmaller(b, a, op, log);
    case 'lessThanOrEqual':
      return valuesEqual(a, b) || isSmaller(a, b, op, log);
    case 'greaterThanOrEqual':
      return valuesEqual(a, b) || isSmaller(b, a, op, log);

    case 'in':
      // firstname IN ('Donald', 'Daisy') or firstname IN 'Donald Duck'
      if (b === null) return false;
      if (isValueArray(b)) return b.some((element) => valuesEqual(a, element));
      if (typeof b === 'string' && typeof a === 'string') return b.includes(a);
      return unsupported(op, a, b, log);

    case 'like':
    case 'caseInsensitiveLike':
      if (a === null && b === null) return true;
      if (typeof a !== 'string') return unsupported(op, a, b, log);
      if (typeof b !== 'string') return false;
      return likePattern(b, op === 'caseInsensitiveLike').test(a);

    default:
      return unsupported(op, a, b, log);
  }
}

function isSmaller(
  a: QualifierValue,
  b: QualifierValue,
  op: ComparisonOperation,
  log: Logger,
): boolean {
  if (a === null || b === null) return false;
  const order = compareValues(a, b);
  if (order === undefined) return unsupported(op, a, b, log);
  return order < 0;
}

function unsupported(
  op: ComparisonOperation,
  a: QualifierValue,
  b: QualifierValue,
  log: Logger,
): false {
  log.error(
    `attempt to evaluate comparison "${operationToString(op)}" dynamically ` +
      `(${valueKind(a)} vs ${valueKind(b)})`,
    a,
    b,
  );
  return false;
}

/**
 * Compiles a LIKE pattern: `*` matches any run of characters, `?` exactly
 * one. Everything else matches literally.
 */
export function likePattern(pattern: string, caseInsensitive: boolean): RegExp {
  let source = '';
  for (const c of pattern) {
    if (c === '*') source += '[\\s\\S]*';
    else if (c === '?') source += '[\\s\\S]';
    else source += c.replace(/[\\^$.*+?()[\]{}|/]/g, '\\$&');
  }
  return new RegExp(`^${source}$`, caseInsensitive ? 'iu' : 'u');
}
