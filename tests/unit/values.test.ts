import { describe, it, expect } from 'vitest';
import {
  compareValues,
  formatValue,
  isQualifierValue,
  toQualifierValue,
  valueKind,
  valuesEqual,
} from '../../src/values.js';

describe('toQualifierValue', () => {
  it('keeps primitives, null and dates', () => {
    const d = new Date(0);
    expect(toQualifierValue('a')).toBe('a');
    expect(toQualifierValue(1.5)).toBe(1.5);
    expect(toQualifierValue(false)).toBe(false);
    expect(toQualifierValue(null)).toBeNull();
    expect(toQualifierValue(d)).toBe(d);
  });

  it('maps undefined to null and bigint to number', () => {
    expect(toQualifierValue(undefined)).toBeNull();
    expect(toQualifierValue(10n)).toBe(10);
  });

  it('maps NaN, infinities and invalid dates to null', () => {
    expect(toQualifierValue(Number.NaN)).toBeNull();
    expect(toQualifierValue(Number.POSITIVE_INFINITY)).toBeNull();
    expect(toQualifierValue(-Infinity)).toBeNull();
    expect(toQualifierValue(new Date(Number.NaN))).toBeNull();
  });

  it('turns arrays, sets and maps into arrays', () => {
    expect(toQualifierValue([1, undefined, 'x'])).toEqual([1, null, 'x']);
    expect(toQualifierValue(new Set(['a', 'b']))).toEqual(['a', 'b']);
    expect(toQualifierValue(new Map([['k', 3]]))).toEqual([3]);
  });

  it('stringifies other objects', () => {
    expect(toQualifierValue({ toString: () => 'custom' })).toBe('custom');
    expect(toQualifierValue(Symbol('s'))).toBe('Symbol(s)');
  });
});

describe('isQualifierValue', () => {
  it('accepts nested arrays of values', () => {
    expect(isQualifierValue([1, ['a', null]])).toBe(true);
  });

  it('rejects plain objects and undefined', () => {
    expect(isQualifierValue({})).toBe(false);
    expect(isQualifierValue(undefined)).toBe(false);
  });

  it('rejects non-finite numbers', () => {
    expect(isQualifierValue(Number.NaN)).toBe(false);
    expect(isQualifierValue([1, Infinity])).toBe(false);
  });
});

describe('valuesEqual', () => {
  it('compares dates by time', () => {
    expect(valuesEqual(new Date(5), new Date(5))).toBe(true);
    expect(valuesEqual(new Date(5), new Date(6))).toBe(false);
  });

  it('compares arrays element-wise', () => {
    expect(valuesEqual([1, 'a'], [1, 'a'])).toBe(true);
    expect(valuesEqual([1, 'a'], [1])).toBe(false);
  });

  it('treats two nulls as equal and null as unequal to anything else', () => {
    expect(valuesEqual(null, null)).toBe(true);
    expect(valuesEqual(null, 0)).toBe(false);
  });

  it('does not coerce between kinds', () => {
    expect(valuesEqual(1, '1')).toBe(false);
  });
});

describe('compareValues', () => {
  it('orders values of the same kind', () => {
    expect(compareValues(1, 2)).toBeLessThan(0);
    expect(compareValues('b', 'a')).toBe(1);
    expect(compareValues(true, false)).toBe(1);
    expect(compareValues(new Date(1), new Date(1))).toBe(0);
  });

  it('returns undefined for mixed kinds, nulls and arrays', () => {
    expect(compareValues(1, 'a')).toBeUndefined();
    expect(compareValues(null, 1)).toBeUndefined();
    expect(compareValues([1], [1])).toBeUndefined();
  });
});

describe('valueKind', () => {
  it('names each kind', () => {
    expect(valueKind(null)).toBe('null');
    expect(valueKind(new Date(0))).toBe('date');
    expect(valueKind([])).toBe('array');
    expect(valueKind(1)).toBe('number');
  });
});

describe('formatValue', () => {
  it('renders constants in qualifier format', () => {
    expect(formatValue(null)).toBe('NULL');
    expect(formatValue(true)).toBe('true');
    expect(formatValue(-2.5)).toBe('-2.5');
    expect(formatValue('Duck')).toBe("'Duck'");
    expect(formatValue(['a', 1])).toBe("('a', 1)");
  });

  it('escapes quotes and backslashes in strings', () => {
    expect(formatValue("O'Hara")).toBe("'O\\'Hara'");
    expect(formatValue('a\\b')).toBe("'a\\\\b'");
  });

  it('renders dates as quoted ISO strings', () => {
    expect(formatValue(new Date(Date.UTC(2020, 0, 2)))).toBe("'2020-01-02T00:00:00.000Z'");
  });
});
