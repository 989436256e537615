import { keyOf, type Key } from '../qualifier/key.js';
import { compareValues, toQualifierValue, type QualifierValue } from '../values.js';

export type SortSelector =
  | 'ASC'
  | 'DESC'
  | 'IASC'
  | 'IDESC'
  | { readonly kind: 'other'; readonly token: string };

/** `ASC`, `DESC`, `CASE ASC`/`IASC`, `CASE DESC`/`IDESC` in any case; anything else is kept as written. */
export function parseSelector(text: string): SortSelector {
  switch (text.toUpperCase()) {
    case 'ASC':
      return 'ASC';
    case 'DESC':
      return 'DESC';
    case 'CASE ASC':
    case 'IASC':
      return 'IASC';
    case 'CASE DESC':
    case 'IDESC':
      return 'IDESC';
    default:
      return { kind: 'other', token: text };
  }
}

export function selectorToString(selector: SortSelector): string {
  return typeof selector === 'string' ? selector : selector.token;
}

function selectorsEqual(a: SortSelector, b: SortSelector): boolean {
  return selectorToString(a) === selectorToString(b) && typeof a === typeof b;
}

export class SortOrdering {
  readonly keyExpr: Key;

  constructor(
    key: Key | string,
    readonly selector: SortSelector = 'ASC',
  ) {
    this.keyExpr = typeof key === 'string' ? keyOf(key) : key;
  }

  get key(): string {
    return this.keyExpr.key;
  }

  /**
   * Parses a comma separated list such as `name,-balance`. A leading `-`
   * sorts descending, a leading `+` (or none) ascending. Returns null for
   * an empty string.
   */
  static parse(text: string): SortOrdering[] | null {
    if (text.length === 0) return null;

    const orderings: SortOrdering[] = [];
    for (const part of text.split(',')) {
      const trimmed = part.trim();
      if (trimmed.length === 0) continue;

      const c0 = trimmed.charAt(0);
      if ((c0 === '+' || c0 === '-') && trimmed.length > 1) {
        orderings.push(new SortOrdering(trimmed.slice(1), c0 === '-' ? 'DESC' : 'ASC'));
      } else {
        orderings.push(new SortOrdering(trimmed, 'ASC'));
      }
    }
    return orderings;
  }

  addReferencedKeys(set: Set<string>): void {
    set.add(this.key);
  }

  isEqual(other: unknown): boolean {
    return other instanceof SortOrdering && other.key === this.key && selectorsEqual(other.selector, this.selector);
  }

  get stringRepresentation(): string {
    return `${this.key} ${selectorToString(this.selector)}`;
  }

  toString(): string {
    return this.stringRepresentation;
  }
}

function sortValue(object: unknown, ordering: SortOrdering): QualifierValue {
  const value = toQualifierValue(ordering.keyExpr.valueFor(object));
  const caseInsensitive = ordering.selector === 'IASC' || ordering.selector === 'IDESC';
  return caseInsensitive && typeof value === 'string' ? value.toLowerCase() : value;
}

/**
 * Compares two objects by the orderings, first ordering first. Nulls sort
 * before any value; values of different kinds, and `other` selectors,
 * compare as equal.
 */
export function compareByOrderings(a: unknown, b: unknown, orderings: readonly SortOrdering[]): number {
  for (const ordering of orderings) {
    if (typeof ordering.selector !== 'string') continue;

    const va = sortValue(a, ordering);
    const vb = sortValue(b, ordering);
    let result: number;
    if (va === null || vb === null) {
      result = va === vb ? 0 : va === null ? -1 : 1;
    } else {
      result = compareValues(va, vb) ?? 0;
    }
    if (result !== 0) {
      const descending = ordering.selector === 'DESC' || ordering.selector === 'IDESC';
      return descending ? -result : result;
    }
  }
  return 0;
}

/** Stable in-memory sort; returns a new array. */
export function sortObjects<T>(objects: readonly T[], orderings: readonly SortOrdering[]): T[] {
  if (orderings.length === 0) return [...objects];
  return [...objects].sort((a, b) => compareByOrderings(a, b, orderings));
}
