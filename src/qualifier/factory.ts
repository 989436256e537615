import { valuesEqual, type QualifierValue } from '../values.js';
import type { ComparisonOperation } from './comparison-operation.js';
import { CompoundQualifier } from './compound-qualifier.js';
import { QualifierVariable } from './expression.js';
import { KeyValueQualifier } from './key-value-qualifier.js';
import type { Qualifier } from './qualifier.js';

export type ValueRecord = Readonly<Record<string, unknown>> | ReadonlyMap<string, unknown>;

function entriesOf(values: ValueRecord): [string, unknown][] {
  return values instanceof Map ? [...values.entries()] : Object.entries(values);
}

export function and(a?: Qualifier | null, b?: Qualifier | null): Qualifier | null {
  if (a && b) return a.and(b);
  return a ?? b ?? null;
}

export function or(a?: Qualifier | null, b?: Qualifier | null): Qualifier | null {
  if (a && b) return a.or(b);
  return a ?? b ?? null;
}

export function not(q?: Qualifier | null): Qualifier | null {
  return q ? q.not() : null;
}

function qualifierForRecord(
  values: ValueRecord | null | undefined,
  op: ComparisonOperation,
  compound: 'and' | 'or',
): Qualifier | null {
  if (!values) return null;
  const kvqs = entriesOf(values).map(([key, value]) => new KeyValueQualifier(key, op, value));
  const [first] = kvqs;
  if (first === undefined) return null;
  return kvqs.length === 1 ? first : new CompoundQualifier(kvqs, compound);
}

/**
 * One KeyValueQualifier per entry, joined with AND:
 *
 *     { lastname: 'Duck', firstname: 'Donald' }
 *     => lastname = 'Duck' AND firstname = 'Donald'
 *
 * Returns null for an empty record.
 */
export function qualifierToMatchAllValues(
  values: ValueRecord | null | undefined,
  op: ComparisonOperation = 'equalTo',
): Qualifier | null {
  return qualifierForRecord(values, op, 'and');
}

/** Like qualifierToMatchAllValues(), joined with OR. */
export function qualifierToMatchAnyValue(
  values: ValueRecord | null | undefined,
  op: ComparisonOperation = 'equalTo',
): Qualifier | null {
  return qualifierForRecord(values, op, 'or');
}

/** The constant an `key = value` qualifier compares with, if it can be merged into an IN. */
function mergeableValue(q: Qualifier): QualifierValue | undefined {
  if (!(q instanceof KeyValueQualifier) || q.operation !== 'equalTo') return undefined;
  const value = q.value;
  if (value === null || value instanceof QualifierVariable) return undefined;
  return value;
}

/**
 * ORs the qualifiers together, merging equality comparisons on the same key
 * into a single IN:
 *
 *     [firstname = 'Donald', firstname = 'Daisy', city = 'Duckburg']
 *     => firstname IN ('Donald', 'Daisy') OR city = 'Duckburg'
 *
 * Merged qualifiers take the position of the first one for that key.
 */
export function compactingOr(qualifiers: readonly Qualifier[]): Qualifier | null {
  const valuesByKey = new Map<string, QualifierValue[]>();
  for (const q of qualifiers) {
    const value = mergeableValue(q);
    if (value === undefined || !(q instanceof KeyValueQualifier)) continue;
    const values = valuesByKey.get(q.key) ?? [];
    if (!values.some((v) => valuesEqual(v, value))) values.push(value);
    valuesByKey.set(q.key, values);
  }

  const result: Qualifier[] = [];
  const emitted = new Set<string>();
  for (const q of qualifiers) {
    if (mergeableValue(q) === undefined || !(q instanceof KeyValueQualifier)) {
      result.push(q);
      continue;
    }
    if (emitted.has(q.key)) continue;
    emitted.add(q.key);

    const values = valuesByKey.get(q.key) ?? [];
    result.push(values.length > 1 ? new KeyValueQualifier(q.keyExpr, 'in', values) : q);
  }

  const [first] = result;
  if (first === undefined) return null;
  return result.length === 1 ? first : new CompoundQualifier(result, 'or');
}
