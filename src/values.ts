/**
 * Closed set of values a qualifier can carry or compare. Anything handed
 * to a qualifier, or read from a candidate object during evaluation, is
 * normalized into this shape first.
 */
export type QualifierValue =
  | null
  | boolean
  | number
  | string
  | Date
  | readonly QualifierValue[];

export function isQualifierValue(value: unknown): value is QualifierValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'boolean':
    case 'string':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (value instanceof Date) return !Number.isNaN(value.getTime());
      return Array.isArray(value) && value.every(isQualifierValue);
    default:
      return false;
  }
}

/**
 * Normalizes an arbitrary value.
 *
 * - `undefined`, `NaN`, infinities and invalid dates become `null`
 * - bigints become numbers
 * - arrays, sets and other non-string iterables become arrays
 * - maps contribute their values
 * - any other object is rendered with `String()`
 */
export function toQualifierValue(value: unknown): QualifierValue {
  if (value === undefined || value === null) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'boolean' || typeof value === 'string') return value;
  if (typeof value === 'bigint') return toQualifierValue(Number(value));
  if (typeof value !== 'object') return String(value);
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
  if (Array.isArray(value)) return value.map(toQualifierValue);
  if (value instanceof Map) return Array.from(value.values(), toQualifierValue);
  if (isIterable(value)) return Array.from(value, toQualifierValue);
  return String(value);
}

function isIterable(value: object): value is Iterable<unknown> {
  return Symbol.iterator in value;
}

export function isValueArray(value: QualifierValue): value is readonly QualifierValue[] {
  return Array.isArray(value);
}

export function valuesEqual(a: QualifierValue, b: QualifierValue): boolean {
  if (a === null || b === null) return a === b;
  if (a instanceof Date) return b instanceof Date && a.getTime() === b.getTime();
  if (isValueArray(a)) {
    if (!isValueArray(b) || a.length !== b.length) return false;
    return a.every((v, i) => valuesEqual(v, b[i] ?? null));
  }
  return a === b;
}

/**
 * Orders two values of the same kind. Returns `undefined` when they are not
 * mutually orderable (null, mixed kinds, arrays).
 */
export function compareValues(a: QualifierValue, b: QualifierValue): number | undefined {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
  return undefined;
}

export function valueKind(value: QualifierValue): string {
  if (value === null) return 'null';
  if (value instanceof Date) return 'date';
  if (isValueArray(value)) return 'array';
  return typeof value;
}

/**
 * Renders a constant the way the qualifier parser reads it back.
 * Strings are single quoted; quotes and backslashes inside are
 * backslash-escaped.
 */
export function formatValue(value: QualifierValue): string {
  if (value === null) return 'NULL';
  if (typeof value === 'string') return `'${value.replace(/[\\']/g, '\\$&')}'`;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return String(value);
  if (value instanceof Date) return `'${value.toISOString()}'`;
  return `(${value.map(formatValue).join(', ')})`;
}
