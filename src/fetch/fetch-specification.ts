import { valueForKeyPath } from '../kvc.js';
import type { Logger } from '../logger.js';
import { parseQualifier } from '../parser/qualifier-parser.js';
import { and, or } from '../qualifier/factory.js';
import type { Qualifier } from '../qualifier/qualifier.js';
import { SortOrdering } from './sort-ordering.js';

const BIND_PATTERN_SUFFIX = 'BindPattern';

export interface FetchSpecificationInit {
  entityName?: string | null;
  qualifier?: Qualifier | null;
  sortOrderings?: readonly SortOrdering[];
  fetchLimit?: number | null;
  fetchOffset?: number | null;
  usesDistinct?: boolean;
  /** When set, withBindings() throws for any binding it cannot find. */
  requiresAllQualifierBindingVariables?: boolean;
  hints?: Readonly<Record<string, unknown>>;
  /** Receives parse errors of format-string qualifiers. */
  log?: Logger;
}

/**
 * Fills `%(key)s` patterns with values looked up in `bindings`; `%%` yields
 * a literal `%`. Missing and null values render as an empty string.
 *
 *     formatWithBindings('SELECT * FROM %(table)s', { table: 'person' })
 *     => 'SELECT * FROM person'
 */
export function formatWithBindings(pattern: string, bindings: unknown): string {
  return pattern.replace(/%%|%\(([^)]*)\)s/g, (match, key: string | undefined) => {
    if (match === '%%') return '%';
    const value = valueForKeyPath(key ?? '', bindings);
    return value === null || value === undefined ? '' : String(value);
  });
}

/**
 * Parameters of a fetch: which entity, which objects (qualifier), in which
 * order and which slice. Immutable; the fluent methods return copies.
 */
export class FetchSpecification {
  readonly entityName: string | null;
  readonly qualifier: Qualifier | null;
  readonly sortOrderings: readonly SortOrdering[];
  readonly fetchLimit: number | null;
  readonly fetchOffset: number | null;
  readonly usesDistinct: boolean;
  readonly requiresAllQualifierBindingVariables: boolean;
  readonly hints: Readonly<Record<string, unknown>>;
  private readonly log: Logger | undefined;

  constructor(init: FetchSpecificationInit = {}) {
    this.entityName = init.entityName ?? null;
    this.qualifier = init.qualifier ?? null;
    this.sortOrderings = [...(init.sortOrderings ?? [])];
    this.fetchLimit = init.fetchLimit ?? null;
    this.fetchOffset = init.fetchOffset ?? null;
    this.usesDistinct = init.usesDistinct ?? false;
    this.requiresAllQualifierBindingVariables = init.requiresAllQualifierBindingVariables ?? false;
    this.hints = { ...(init.hints ?? {}) };
    this.log = init.log;
  }

  private with(changes: Partial<FetchSpecificationInit>): FetchSpecification {
    return new FetchSpecification({
      entityName: this.entityName,
      qualifier: this.qualifier,
      sortOrderings: this.sortOrderings,
      fetchLimit: this.fetchLimit,
      fetchOffset: this.fetchOffset,
      usesDistinct: this.usesDistinct,
      requiresAllQualifierBindingVariables: this.requiresAllQualifierBindingVariables,
      hints: this.hints,
      log: this.log,
      ...changes,
    });
  }

  private toQualifier(q: Qualifier | string, args: readonly unknown[]): Qualifier | null {
    if (typeof q !== 'string') return q;
    return parseQualifier(q, args, this.log ? { log: this.log } : {});
  }

  /** Replaces the qualifier. A format that fails to parse clears it. */
  where(q: Qualifier | string, ...args: unknown[]): FetchSpecification {
    return this.with({ qualifier: this.toQualifier(q, args) });
  }

  and(q: Qualifier | string, ...args: unknown[]): FetchSpecification {
    return this.with({ qualifier: and(this.qualifier, this.toQualifier(q, args)) });
  }

  or(q: Qualifier | string, ...args: unknown[]): FetchSpecification {
    return this.with({ qualifier: or(this.qualifier, this.toQualifier(q, args)) });
  }

  /** Appends orderings; strings use the SortOrdering.parse() syntax, eg `name,-balance`. */
  orderBy(...orderings: (SortOrdering | string)[]): FetchSpecification {
    const added = orderings.flatMap((o) => (typeof o === 'string' ? (SortOrdering.parse(o) ?? []) : [o]));
    return this.with({ sortOrderings: [...this.sortOrderings, ...added] });
  }

  limit(value: number): FetchSpecification {
    return this.with({ fetchLimit: value });
  }

  offset(value: number): FetchSpecification {
    return this.with({ fetchOffset: value });
  }

  distinct(usesDistinct = true): FetchSpecification {
    return this.with({ usesDistinct });
  }

  requiresAllBindings(requiresAll = true): FetchSpecification {
    return this.with({ requiresAllQualifierBindingVariables: requiresAll });
  }

  hint(name: string, value: unknown): FetchSpecification {
    const hints = { ...this.hints };
    if (value === undefined) delete hints[name];
    else hints[name] = value;
    return this.with({ hints });
  }

  /**
   * Hints named `xyzBindPattern` are formatted against the bindings and
   * stored as `xyz`; the pattern hint itself is removed.
   */
  resolveHintBindPatterns(bindings: unknown): Record<string, unknown> {
    const bound: Record<string, unknown> = { ...this.hints };
    for (const [name, value] of Object.entries(this.hints)) {
      if (!name.endsWith(BIND_PATTERN_SUFFIX)) continue;
      delete bound[name];
      bound[name.slice(0, -BIND_PATTERN_SUFFIX.length)] = formatWithBindings(String(value), bindings);
    }
    return bound;
  }

  /**
   * Copy with the qualifier bindings and the bind-pattern hints resolved.
   * Throws QualifierBindingNotFoundError for a missing binding when
   * requiresAllQualifierBindingVariables is set.
   */
  withBindings(bindings: unknown): FetchSpecification {
    const qualifier = this.qualifier
      ? this.qualifier.qualifierWithBindings(bindings, this.requiresAllQualifierBindingVariables)
      : null;
    return this.with({ qualifier, hints: this.resolveHintBindPatterns(bindings) });
  }

  get description(): string {
    let s = '<FetchSpecification:';
    if (this.entityName !== null) s += ` '${this.entityName}'`;
    if (this.qualifier) s += ` ${this.qualifier.stringRepresentation}`;
    if (this.sortOrderings.length > 0) s += ` sort=${this.sortOrderings.map((so) => so.stringRepresentation).join(',')}`;
    if (this.fetchLimit !== null) {
      s += this.fetchOffset !== null ? ` range=${this.fetchOffset}/#${this.fetchLimit}` : ` limit=${this.fetchLimit}`;
    } else if (this.fetchOffset !== null) {
      s += ` offset=${this.fetchOffset}`;
    }
    if (this.usesDistinct) s += ' DISTINCT';
    return `${s}>`;
  }
}
