import { defaultLogger, type Logger } from '../logger.js';
import { and } from '../qualifier/factory.js';
import { isEvaluatable, type Qualifier } from '../qualifier/qualifier.js';
import type { FetchSpecification } from './fetch-specification.js';
import { sortObjects } from './sort-ordering.js';

export interface ArrayDataSourceConfig {
  fetchSpecification?: FetchSpecification | null;
  /** ANDed with the fetch specification's qualifier. */
  auxiliaryQualifier?: Qualifier | null;
  /** Resolves `$variables` in the qualifiers before each fetch. */
  qualifierBindings?: unknown;
  log?: Logger;
}

/**
 * In-memory data source: filters, sorts and slices a plain array the way
 * a database fetch would.
 */
export class ArrayDataSource<T> {
  readonly objects: readonly T[];
  readonly fetchSpecification: FetchSpecification | null;
  readonly auxiliaryQualifier: Qualifier | null;
  readonly qualifierBindings: unknown;
  private readonly log: Logger;

  constructor(objects: readonly T[], config: ArrayDataSourceConfig = {}) {
    this.objects = [...objects];
    this.fetchSpecification = config.fetchSpecification ?? null;
    this.auxiliaryQualifier = config.auxiliaryQualifier ?? null;
    this.qualifierBindings = config.qualifierBindings;
    this.log = config.log ?? defaultLogger;
  }

  /**
   * The fetch specification with its bindings resolved against
   * qualifierBindings. Throws QualifierBindingNotFoundError under
   * requiresAllQualifierBindingVariables.
   */
  private boundFetchSpecification(): FetchSpecification | null {
    const fs = this.fetchSpecification;
    if (!fs || this.qualifierBindings === undefined) return fs;
    return fs.withBindings(this.qualifierBindings);
  }

  private boundAuxiliaryQualifier(requiresAll: boolean): Qualifier | null {
    const q = this.auxiliaryQualifier;
    if (!q || this.qualifierBindings === undefined) return q;
    return q.qualifierWithBindings(this.qualifierBindings, requiresAll);
  }

  private filter(qualifier: Qualifier | null): T[] {
    if (!qualifier) return [...this.objects];
    if (!isEvaluatable(qualifier)) {
      this.log.error('qualifier does not support evaluation, not filtering', qualifier.description);
      return [...this.objects];
    }
    const result: T[] = [];
    for (const object of this.objects) {
      if (qualifier.evaluateWith(object, { log: this.log })) result.push(object);
    }
    return result;
  }

  fetchObjects(): T[] {
    const fs = this.boundFetchSpecification();
    const requiresAll = fs?.requiresAllQualifierBindingVariables ?? false;
    const qualifier = and(fs?.qualifier, this.boundAuxiliaryQualifier(requiresAll));

    const sorted = sortObjects(this.filter(qualifier), fs?.sortOrderings ?? []);
    const offset = fs?.fetchOffset ?? 0;
    const limit = fs?.fetchLimit ?? null;
    return limit === null ? sorted.slice(offset) : sorted.slice(offset, offset + limit);
  }

  fetchCount(): number {
    return this.fetchObjects().length;
  }
}
