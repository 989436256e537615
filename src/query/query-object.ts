import { KeySelector, QualifierBuilder } from './builder.js';

/**
 * Entry point for the qualifier DSL.
 *
 * @example
 * where.key('lastname').equals('Duck')
 *   .and.key('age').greaterThan(18)
 *   .or.key('isVIP').equals(true)
 *   .qualifier
 */
export const where: KeySelector = new QualifierBuilder().where;
