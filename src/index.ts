export { QualifierBindingNotFoundError, UnsupportedRawValueError } from './errors.js';
export {
  createConsoleLogger,
  createDiagnosticsCollector,
  defaultLogger,
  logLevelFromEnv,
} from './logger.js';
export type { ConsoleLoggerConfig, Diagnostic, DiagnosticsCollector, Logger, LogLevel } from './logger.js';
export { isKeyValueCoding, valueForKey, valueForKeyPath } from './kvc.js';
export type { KeyValueCoding } from './kvc.js';
export {
  compareValues,
  formatValue,
  isQualifierValue,
  toQualifierValue,
  valuesEqual,
} from './values.js';
export type { QualifierValue } from './values.js';

export {
  ConstantValue,
  isQualifierVariable,
  NullExpression,
  QualifierVariable,
  RawSQLValue,
} from './qualifier/expression.js';
export type { Expression } from './qualifier/expression.js';
export { isKey, KeyPath, keyOf, StringKey } from './qualifier/key.js';
export type { Key } from './qualifier/key.js';
export {
  compareWithOperation,
  operationToString,
  operationsEqual,
  otherOperation,
  parseComparisonOperation,
} from './qualifier/comparison-operation.js';
export type {
  ComparisonOperation,
  KnownComparisonOperation,
  OtherComparisonOperation,
} from './qualifier/comparison-operation.js';
export { bindingKeys, isEvaluatable, referencedKeys } from './qualifier/qualifier.js';
export type { EvaluatableQualifier, EvaluationOptions, Qualifier } from './qualifier/qualifier.js';
export { BooleanQualifier } from './qualifier/boolean-qualifier.js';
export { KeyValueQualifier } from './qualifier/key-value-qualifier.js';
export { KeyComparisonQualifier } from './qualifier/key-comparison-qualifier.js';
export { NotQualifier } from './qualifier/not-qualifier.js';
export { CompoundQualifier } from './qualifier/compound-qualifier.js';
export type { CompoundOperator } from './qualifier/compound-qualifier.js';
export { formatRawValue, SQLQualifier, sqlPart, toRawValueReplacement } from './qualifier/sql-qualifier.js';
export type { RawValueReplacement, SQLPart } from './qualifier/sql-qualifier.js';
export {
  and,
  compactingOr,
  not,
  or,
  qualifierToMatchAllValues,
  qualifierToMatchAnyValue,
} from './qualifier/factory.js';
export type { ValueRecord } from './qualifier/factory.js';
export { filterObjects } from './qualifier/evaluation.js';

export { parseQualifier, QualifierParser } from './parser/qualifier-parser.js';
export type { ParserOptions } from './parser/qualifier-parser.js';

export { where } from './query/query-object.js';
export { KeySelector, QualifierBuilder, ValueSetter } from './query/builder.js';
