import { QualifierBindingNotFoundError, UnsupportedRawValueError } from '../errors.js';
import { valueForKeyPath } from '../kvc.js';
import { conjoin, disjoin, negate } from './combinators.js';
import type { Qualifier } from './qualifier.js';

/** The bound values a raw SQL part can carry. */
export type RawValueReplacement =
  | { readonly kind: 'int'; readonly value: number }
  | { readonly kind: 'double'; readonly value: number }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'intArray'; readonly value: readonly number[] }
  | { readonly kind: 'stringArray'; readonly value: readonly string[] };

export type SQLPart =
  | { readonly kind: 'raw'; readonly sql: string }
  | { readonly kind: 'variable'; readonly name: string }
  | { readonly kind: 'value'; readonly value: RawValueReplacement | null };

export const sqlPart = {
  raw: (sql: string): SQLPart => ({ kind: 'raw', sql }),
  variable: (name: string): SQLPart => ({ kind: 'variable', name }),
  value: (value: RawValueReplacement | null): SQLPart => ({ kind: 'value', value }),
};

/**
 * Maps a bound value onto a RawValueReplacement. Returns undefined for
 * values that have no raw SQL form (objects, booleans, mixed arrays).
 */
export function toRawValueReplacement(value: unknown): RawValueReplacement | undefined {
  if (typeof value === 'string') return { kind: 'string', value };
  if (typeof value === 'bigint') return { kind: 'int', value: Number(value) };
  if (typeof value === 'number') {
    return Number.isInteger(value) ? { kind: 'int', value } : { kind: 'double', value };
  }
  if (value instanceof Set) return toRawValueReplacement([...value]);
  if (!Array.isArray(value)) return undefined;

  const elements: unknown[] = value;
  const ints: number[] = [];
  const strings: string[] = [];
  for (const element of elements) {
    if (typeof element === 'number' && Number.isInteger(element)) ints.push(element);
    else if (typeof element === 'bigint') ints.push(Number(element));
    else if (typeof element === 'string') strings.push(element);
    else return undefined;
  }
  if (strings.length === 0) return { kind: 'intArray', value: ints };
  if (ints.length === 0) return { kind: 'stringArray', value: strings };
  return undefined;
}

function quote(s: string): string {
  return `'${s.replace(/'/g, "''")}'`;
}

export function formatRawValue(value: RawValueReplacement | null): string {
  if (value === null) return 'NULL';
  switch (value.kind) {
    case 'int':
    case 'double':
      return String(value.value);
    case 'string':
      return quote(value.value);
    case 'intArray':
      return `(${value.value.join(', ')})`;
    case 'stringArray':
      return `(${value.value.map(quote).join(', ')})`;
  }
}

function rawValuesEqual(a: RawValueReplacement | null, b: RawValueReplacement | null): boolean {
  if (a === null || b === null) return a === b;
  return a.kind === b.kind && formatRawValue(a) === formatRawValue(b);
}

function partsEqual(a: SQLPart, b: SQLPart): boolean {
  switch (a.kind) {
    case 'raw':
      return b.kind === 'raw' && a.sql === b.sql;
    case 'variable':
      return b.kind === 'variable' && a.name === b.name;
    case 'value':
      return b.kind === 'value' && rawValuesEqual(a.value, b.value);
  }
}

/**
 * Verbatim SQL with bindable `$variables`, for predicates the qualifier
 * algebra cannot express:
 *
 * ```
 * SQL[EXISTS (SELECT 1 FROM acl WHERE acl.auth_id IN $authIds)]
 * ```
 *
 * Not evaluatable in memory. In the rendered form `\`, `]` and `$` inside
 * raw text are backslash-escaped.
 */
export class SQLQualifier implements Qualifier {
  readonly parts: readonly SQLPart[];

  constructor(parts: readonly SQLPart[]) {
    this.parts = [...parts];
  }

  get isEmpty(): boolean {
    return this.parts.length === 0;
  }

  get hasUnresolvedBindings(): boolean {
    return this.parts.some((p) => p.kind === 'variable');
  }

  addReferencedKeys(_set: Set<string>): void {}

  addBindingKeys(set: Set<string>): void {
    for (const p of this.parts) {
      if (p.kind === 'variable') set.add(p.name);
    }
  }

  keyPathForBindingKey(_variable: string): string | null {
    return null;
  }

  qualifierWithBindings(bindings: unknown, requiresAll = false): Qualifier {
    if (!this.hasUnresolvedBindings) return this;

    let didChange = false;
    const parts = this.parts.map((part): SQLPart => {
      if (part.kind !== 'variable') return part;

      const bound = valueForKeyPath(part.name, bindings);
      if (bound === undefined) {
        if (requiresAll) throw new QualifierBindingNotFoundError(part.name);
        return part;
      }
      didChange = true;
      if (bound === null) return sqlPart.value(null);

      const raw = toRawValueReplacement(bound);
      if (raw === undefined) throw new UnsupportedRawValueError(part.name, bound);
      return sqlPart.value(raw);
    });
    return didChange ? new SQLQualifier(parts) : this;
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

  isEqual(other: unknown): boolean {
    if (!(other instanceof SQLQualifier)) return false;
    if (other.parts.length !== this.parts.length) return false;
    return this.parts.every((p, i) => {
      const o = other.parts[i];
      return o !== undefined && partsEqual(p, o);
    });
  }

  get stringRepresentation(): string {
    const body = this.parts
      .map((p) => {
        switch (p.kind) {
          case 'raw':
            return p.sql.replace(/[\\\]$]/g, '\\$&');
          case 'variable':
            return `$${p.name}`;
          case 'value':
            return formatRawValue(p.value);
        }
      })
      .join('');
    return `SQL[${body}]`;
  }

  get description(): string {
    return `<SQLQualifier: ${this.stringRepresentation}>`;
  }

  toString(): string {
    return this.stringRepresentation;
  }
}
