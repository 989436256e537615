import { defaultLogger } from '../logger.js';
import { isEvaluatable, type EvaluationOptions, type Qualifier } from './qualifier.js';

/**
 * Returns the objects matching the qualifier, in their original order.
 * A null qualifier matches everything. A qualifier that cannot be
 * evaluated in memory (such as an SQLQualifier) is logged and matches
 * nothing.
 */
export function filterObjects<T>(
  objects: Iterable<T>,
  qualifier: Qualifier | null | undefined,
  options: EvaluationOptions = {},
): T[] {
  if (!qualifier) return [...objects];
  if (!isEvaluatable(qualifier)) {
    (options.log ?? defaultLogger).error('qualifier does not support evaluation', qualifier.description);
    return [];
  }
  const result: T[] = [];
  for (const object of objects) {
    if (qualifier.evaluateWith(object, options)) result.push(object);
  }
  return result;
}
