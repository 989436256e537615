import { defaultLogger, type Logger } from '../logger.js';
import { BooleanQualifier } from '../qualifier/boolean-qualifier.js';
import { parseComparisonOperation, type ComparisonOperation } from '../qualifier/comparison-operation.js';
import { CompoundQualifier } from '../qualifier/compound-qualifier.js';
import { QualifierVariable } from '../qualifier/expression.js';
import { KeyComparisonQualifier } from '../qualifier/key-comparison-qualifier.js';
import { KeyValueQualifier } from '../qualifier/key-value-qualifier.js';
import type { Qualifier } from '../qualifier/qualifier.js';
import { SQLQualifier, sqlPart, type SQLPart } from '../qualifier/sql-qualifier.js';
import type { QualifierValue } from '../values.js';

export interface ParserOptions {
  /** Receives parse errors and warnings. Defaults to the console logger. */
  log?: Logger;
}

const SPACES = new Set([' ', '\t', '\n', '\r']);

// eg NSFileName!="index.html" breaks at the `!`
const ID_BREAK = new Set([' ', '\t', '\n', '\r', '<', '>', '=', '*', '/', '+', '-', '(', ')', ']', '!']);

const INT_PATTERN = /^[-+]?\d+$/;
const DOUBLE_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

function isDigit(c: string): boolean {
  return c >= '0' && c <= '9' && c.length === 1;
}

function toInt(text: string): number | null {
  if (!INT_PATTERN.test(text)) return null;
  const n = Number(text);
  return Number.isSafeInteger(n) ? n : null;
}

function toDouble(text: string): number | null {
  return DOUBLE_PATTERN.test(text) ? Number(text) : null;
}

/** A parsed literal; `null` from a parse function means the parse failed. */
interface Constant {
  readonly value: QualifierValue;
}

/**
 * Cursor state for a single parse. Never shared: QualifierParser creates a
 * fresh session for every call.
 */
class ParseSession {
  private idx = 0;
  private argIdx = 0;

  constructor(
    private readonly s: string,
    private readonly args: readonly unknown[],
    private readonly log: Logger,
  ) {}

  parse(): Qualifier | null {
    if (!this.skipSpaces()) return null;
    return this.parseCompoundQualifier();
  }

  private parseOneQualifier(): Qualifier | null {
    if (!this.skipSpaces()) return null;

    if (this.match('(')) return this.parseCompoundQualifierInParenthesis();
    if (this.matchKeyword('NOT')) return this.parseNotQualifier();
    if (this.match('SQL[')) return this.parseRawSQLQualifier();

    if (this.consumeIfMatch('*true*')) return BooleanQualifier.TRUE;
    if (this.consumeIfMatch('*false*')) return BooleanQualifier.FALSE;
    return this.parseKeyBasedQualifier();
  }

  /**
   * Sequences are grouped by operator run rather than by precedence:
   * `a AND b AND c OR d OR e AND f` parses as `((a AND b AND c) OR d OR e) AND f`.
   */
  private parseCompoundQualifier(): Qualifier | null {
    let qualifiers: Qualifier[] = [];
    let lastOperator: string | null = null;

    while (this.idx < this.s.length) {
      const q = this.parseOneQualifier();
      if (!q) return null;
      qualifiers.push(q);

      if (!this.skipSpaces()) break;
      if (this.match(')')) break;

      let operator = this.parseIdentifier(false);
      if (operator === null) {
        this.error(`could not parse compound operator at index ${this.idx}`);
        break;
      }
      if (operator.length > 1 && operator.startsWith('%')) {
        const arg = this.nextStringArgument(operator);
        if (arg === null) return null;
        operator = arg;
      }

      if (!this.skipSpaces()) {
        this.error(`expected another qualifier after compound operator (op='${operator}')`);
        break;
      }

      if (lastOperator !== null && operator !== lastOperator) {
        const folded = this.buildCompoundQualifier(lastOperator, qualifiers);
        qualifiers = folded ? [folded] : [];
      }
      lastOperator = operator;
    }

    return this.buildCompoundQualifier(lastOperator ?? 'AND', qualifiers);
  }

  private buildCompoundQualifier(operator: string, qualifiers: readonly Qualifier[]): Qualifier | null {
    const [first] = qualifiers;
    if (first === undefined) return null;
    if (qualifiers.length === 1) return first;

    if (operator === 'AND') return new CompoundQualifier(qualifiers, 'and');
    if (operator === 'OR') return new CompoundQualifier(qualifiers, 'or');
    this.error(`unknown compound operator: ${operator}`);
    return null;
  }

  private parseCompoundQualifierInParenthesis(): Qualifier | null {
    this.idx += 1; // (
    if (!this.skipSpaces()) {
      this.error('missing closing parenthesis');
      return null;
    }

    const q = this.parseCompoundQualifier();
    if (!q) return null;

    this.skipSpaces();
    if (!this.consumeIfMatch(')')) {
      // tolerated, the qualifier is kept
      this.error('missing closing parenthesis');
    }
    return q;
  }

  private parseNotQualifier(): Qualifier | null {
    this.idx += 'NOT'.length;
    if (!this.skipSpaces()) {
      this.error('missing qualifier after NOT');
      return null;
    }
    const q = this.parseOneQualifier();
    return q ? q.not() : null;
  }

  /**
   * `SQL[select 1 WHERE date_id = $dateId]`. Text is kept verbatim apart
   * from backslash escapes; `$name` becomes a variable part.
   */
  private parseRawSQLQualifier(): Qualifier {
    this.idx += 'SQL['.length;
    const parts: SQLPart[] = [];
    let sql = '';
    let closed = false;

    while (this.idx < this.s.length) {
      const c = this.peek();
      if (c === ']') {
        this.idx += 1;
        closed = true;
        break;
      }
      if (c === '\\' && this.idx + 1 < this.s.length) {
        sql += this.peek(1);
        this.idx += 2;
        continue;
      }
      if (c === '$') {
        if (sql.length > 0) {
          parts.push(sqlPart.raw(sql));
          sql = '';
        }
        this.idx += 1;
        const name = this.parseIdentifier(false);
        if (name === null) this.error('could not parse SQL qualifier variable');
        else parts.push(sqlPart.variable(name));
        continue;
      }
      sql += c;
      this.idx += 1;
    }
    if (sql.length > 0) parts.push(sqlPart.raw(sql));
    if (!closed) this.error("missing closing ']' after SQL[");

    return new SQLQualifier(parts);
  }

  private parseKeyBasedQualifier(): Qualifier | null {
    let id = this.parseIdentifier(false);
    if (id === null) {
      this.error(`expected key at index ${this.idx}`);
      return null;
    }
    if (id.length > 1 && id.startsWith('%')) {
      // the key itself is a pattern, eg "%@ LIKE 'Hello*'"
      const arg = this.nextStringArgument(id);
      if (arg === null) return null;
      id = arg;
    }

    // a bare key is a boolean test, eg "isArchived" or "isArchived AND code > 10"
    if (!this.skipSpaces()) return new KeyValueQualifier(id, 'equalTo', true);
    if (this.matchKeyword('AND') || this.matchKeyword('OR') || this.match(')')) {
      return new KeyValueQualifier(id, 'equalTo', true);
    }

    let operation = this.parseOperation();
    if (operation === null) return new KeyValueQualifier(id, 'equalTo', true);
    if (operation.length > 1 && operation.startsWith('%')) {
      // the operation is a pattern, eg "value %@ 5" with "<"
      const arg = this.nextStringArgument(operation);
      if (arg === null) return null;
      operation = arg;
    }

    if (operation === 'IS') {
      const saved = this.idx;
      if (this.skipSpaces()) {
        if (this.consumeKeyword('NOT')) {
          if (this.skipSpaces() && this.consumeKeyword('NULL')) {
            return new KeyValueQualifier(id, 'notEqualTo', null);
          }
        } else if (this.consumeKeyword('NULL')) {
          return new KeyValueQualifier(id, 'equalTo', null);
        }
      }
      this.idx = saved;
    }

    const op = parseComparisonOperation(operation);

    if (!this.skipSpaces()) {
      this.error(`expected value or key after operation (op=${operation}, id=${id})`);
      return null;
    }

    if (this.consumeIfMatch('$')) {
      const name = this.parseIdentifier(false);
      if (name === null) {
        this.error("expected variable name after '$'");
        return null;
      }
      return new KeyValueQualifier(id, op, new QualifierVariable(name));
    }

    if (this.match('%')) return this.parseFormatValue(id, op);

    if (this.matchConstant()) {
      const isList = this.match('(') && (op === 'in' || this.valueListAhead());
      const constant = isList ? this.parseValueList() : this.parseConstant();
      return constant ? new KeyValueQualifier(id, op, constant.value) : null;
    }

    const rhs = this.parseIdentifier(false);
    if (rhs === null) {
      this.error(`expected value or key after operation (op=${operation}, id=${id})`);
      return null;
    }
    return new KeyComparisonQualifier(id, op, rhs);
  }

  /** `%@`, `%s`, `%i`/`%d`, `%f` or `%K` in value position. */
  private parseFormatValue(id: string, op: ComparisonOperation): Qualifier | null {
    this.idx += 1; // %
    const spec = this.peek();
    if (spec === '') {
      this.error('incomplete format specification at end of input');
      return null;
    }
    this.idx += 1;

    if (this.argIdx >= this.args.length) {
      this.error('more format patterns than arguments');
      return null;
    }
    const arg = this.args[this.argIdx];
    this.argIdx += 1;
    const isNull = arg === null || arg === undefined;

    switch (spec) {
      case '@':
        return new KeyValueQualifier(id, op, arg);
      case 's':
        if (isNull) return new KeyValueQualifier(id, 'equalTo', null);
        return new KeyValueQualifier(id, op, String(arg));
      case 'd':
      case 'i':
        if (isNull) return new KeyValueQualifier(id, 'equalTo', null);
        if (typeof arg === 'number' && Number.isInteger(arg)) return new KeyValueQualifier(id, op, arg);
        return new KeyValueQualifier(id, op, toInt(String(arg)));
      case 'f':
        if (isNull) return new KeyValueQualifier(id, 'equalTo', null);
        if (typeof arg === 'number') return new KeyValueQualifier(id, op, arg);
        return new KeyValueQualifier(id, op, toDouble(String(arg)));
      case 'K':
        if (isNull) {
          this.error('argument for %K is null, needs to be a key');
          return null;
        }
        return new KeyComparisonQualifier(id, op, String(arg));
      case '%':
        this.error('%% is not supported');
        return null;
      default:
        this.error(`unknown format specification: %${spec}`);
        return null;
    }
  }

  /** Consumes the next argument for a pattern used as a key, operation or compound operator. */
  private nextStringArgument(pattern: string): string | null {
    if (this.argIdx >= this.args.length) {
      this.error('more format patterns than arguments');
      return null;
    }
    const arg = this.args[this.argIdx];
    this.argIdx += 1;

    switch (pattern.charAt(1)) {
      case 'K':
      case 's':
      case 'i':
      case 'd':
      case 'f':
      case '@':
        return arg === null || arg === undefined ? 'null' : String(arg);
      case '%':
        this.error('%% is not supported');
        return null;
      default:
        this.error(`unknown format specification: ${pattern}`);
        return null;
    }
  }

  /**
   * Reads an identifier. Identifiers never start with a digit or a space.
   * Unless `onlyBreakOnSpace` is set they end at the next ID_BREAK char.
   */
  private parseIdentifier(onlyBreakOnSpace: boolean): string | null {
    const first = this.peek();
    if (first === '' || isDigit(first) || SPACES.has(first)) return null;
    if (!onlyBreakOnSpace && ID_BREAK.has(first)) return null;

    let end = this.idx + 1;
    while (end < this.s.length) {
      const c = this.s.charAt(end);
      if (onlyBreakOnSpace ? SPACES.has(c) : ID_BREAK.has(c)) break;
      end += 1;
    }
    const id = this.s.slice(this.idx, end);
    this.idx = end;
    return id;
  }

  /** Symbolic operators, or else an identifier such as `LIKE`, `IN` or `hasPrefix:`. */
  private parseOperation(): string | null {
    if (this.idx + 2 > this.s.length) return null;

    const c = this.peek();
    const next = this.peek(1);

    if (c === '=') {
      if (next === '>' || next === '<') {
        this.idx += 2;
        return `=${next}`;
      }
      this.idx += 1;
      return '=';
    }
    if (c === '!' && next === '=') {
      this.idx += 2;
      return '!=';
    }
    if (c === '<') {
      if (next === '=') {
        this.idx += 2;
        return '=<';
      }
      if (next === '>') {
        this.idx += 2;
        return '<>';
      }
      this.idx += 1;
      return '<';
    }
    if (c === '>') {
      if (next === '=') {
        this.idx += 2;
        return '=>';
      }
      if (next === '<') {
        this.idx += 2;
        return '<>';
      }
      this.idx += 1;
      return '>';
    }

    return this.parseIdentifier(true);
  }

  private matchConstant(): boolean {
    const c = this.peek();
    if (c === '(' || c === "'" || c === '"' || isDigit(c)) return true;
    if (c === '-' && isDigit(this.peek(1))) return true;
    return ['true', 'false', 'NULL', 'null', 'nil', 'YES', 'NO'].some((kw) => this.matchKeyword(kw));
  }

  /**
   * A literal, optionally prefixed with a cast such as `(Date)'2007-09-21'`.
   * Casts are accepted but not applied.
   */
  private parseConstant(): Constant | null {
    let castClass: string | null = null;
    if (this.match('(')) {
      castClass = this.parseCast();
      if (castClass === null) return null;
      if (!this.skipSpaces()) {
        this.error(`expected constant after cast to '${castClass}'`);
        return null;
      }
    }

    const constant = this.parseLiteral();
    if (constant && castClass !== null && constant.value !== null) {
      this.log.warn(`not handling cast to '${castClass}'`, constant.value);
    }
    return constant;
  }

  private parseCast(): string | null {
    this.idx += 1; // (
    this.skipSpaces();
    const castClass = this.parseIdentifier(false);
    if (castClass === null) {
      this.error('expected class cast identifier after parenthesis');
      return null;
    }
    this.skipSpaces();
    if (!this.consumeIfMatch(')')) {
      this.error('expected closing parenthesis after class cast');
      return null;
    }
    return castClass;
  }

  /** `('a', 'b')` as opposed to a cast such as `(Date)'2007-09-21'`. */
  private valueListAhead(): boolean {
    const saved = this.idx;
    this.idx += 1; // (
    this.skipSpaces();
    const isList = this.match(')') || (!this.match('(') && this.matchConstant());
    this.idx = saved;
    return isList;
  }

  /** `IN ('a', 'b')`, or an array value with any other operation. */
  private parseValueList(): Constant | null {
    this.idx += 1; // (
    const values: QualifierValue[] = [];
    this.skipSpaces();
    if (this.consumeIfMatch(')')) return { value: values };

    for (;;) {
      if (!this.skipSpaces()) {
        this.error('value list after IN is not closed');
        return null;
      }
      const element = this.parseLiteral();
      if (!element) return null;
      values.push(element.value);

      this.skipSpaces();
      if (this.consumeIfMatch(',')) continue;
      if (this.consumeIfMatch(')')) return { value: values };
      this.error(`expected ',' or ')' in value list at index ${this.idx}`);
      return null;
    }
  }

  private parseLiteral(): Constant | null {
    const c = this.peek();
    if (c === "'" || c === '"') {
      const s = this.parseQuotedString();
      return s === null ? null : { value: s };
    }
    if (isDigit(c) || (c === '-' && isDigit(this.peek(1)))) {
      const n = this.parseNumber();
      return n === null ? null : { value: n };
    }
    if (this.consumeKeyword('true') || this.consumeKeyword('YES')) return { value: true };
    if (this.consumeKeyword('false') || this.consumeKeyword('NO')) return { value: false };
    if (this.consumeKeyword('NULL') || this.consumeKeyword('null') || this.consumeKeyword('nil')) {
      return { value: null };
    }
    this.error(`expected constant at index ${this.idx}`);
    return null;
  }

  /** Single or double quoted; a backslash escapes the following char. */
  private parseQuotedString(): string | null {
    const quote = this.peek();
    let pos = this.idx + 1;
    let out = '';

    while (pos < this.s.length) {
      const c = this.s.charAt(pos);
      if (c === quote) {
        this.idx = pos + 1;
        return out;
      }
      if (c === '\\') {
        pos += 1;
        if (pos >= this.s.length) {
          this.idx = pos;
          this.error('escape in quoted string not finished');
          return null;
        }
        out += this.s.charAt(pos);
      } else {
        out += c;
      }
      pos += 1;
    }

    this.idx = pos;
    this.error(`quoted string not closed (expected ${quote})`);
    return null;
  }

  /** Plain integers, or doubles such as `2.5` and `1e-7`. */
  private parseNumber(): number | null {
    let end = this.idx + 1;
    while (end < this.s.length) {
      const c = this.s.charAt(end);
      const exponentSign = (c === '-' || c === '+') && /[eE]/.test(this.s.charAt(end - 1));
      if ((ID_BREAK.has(c) && !exponentSign) || c === ',') break;
      end += 1;
    }
    const text = this.s.slice(this.idx, end);
    this.idx = end;

    // integers past the safe range still parse, as doubles
    const n = toInt(text) ?? toDouble(text);
    if (n === null) this.error(`failed to parse number: '${text}'`);
    return n;
  }

  /* cursor */

  private peek(offset = 0): string {
    return this.s.charAt(this.idx + offset);
  }

  /** Skips whitespace; false when the input is exhausted. */
  private skipSpaces(): boolean {
    while (this.idx < this.s.length && SPACES.has(this.peek())) this.idx += 1;
    return this.idx < this.s.length;
  }

  private match(token: string): boolean {
    return this.s.startsWith(token, this.idx);
  }

  private consumeIfMatch(token: string): boolean {
    if (!this.match(token)) return false;
    this.idx += token.length;
    return true;
  }

  /** Like match(), but `NOTE` does not match the keyword `NOT`. */
  private matchKeyword(keyword: string): boolean {
    if (!this.match(keyword)) return false;
    const after = this.peek(keyword.length);
    return after === '' || ID_BREAK.has(after) || after === ',';
  }

  private consumeKeyword(keyword: string): boolean {
    if (!this.matchKeyword(keyword)) return false;
    this.idx += keyword.length;
    return true;
  }

  private error(message: string): void {
    this.log.error(message);
  }
}

/**
 * Parses qualifiers from a format that reads like a SQL WHERE clause:
 *
 * ```
 * lastname LIKE 'D*' AND (age > %d OR isVIP) AND firstname = $firstname
 * ```
 *
 * - operations: `=`, `!=`, `<`, `>`, `<=`/`=<`, `>=`/`=>`, `<>`, `LIKE`,
 *   `ILIKE`, `IN`, `IS NULL`, `IS NOT NULL` and custom identifiers such
 *   as `hasPrefix:`
 * - constants: `'single'` or `"double"` quoted strings, numbers,
 *   `true`/`false`/`YES`/`NO`, `NULL`/`null`/`nil`, value lists after `IN`
 * - `$name` binds later through qualifierWithBindings()
 * - patterns consume the positional `args` in order: `%@` as-is, `%s`
 *   string, `%i`/`%d` integer, `%f` double, `%K` a key (yields a
 *   KeyComparisonQualifier)
 * - `*true*` and `*false*` always match or fail
 * - `SQL[...]` embeds raw SQL, see SQLQualifier
 *
 * AND and OR have no precedence; operator runs are grouped left to right,
 * so `a AND b OR c` is `(a AND b) OR c` and `a OR b AND c` is
 * `(a OR b) AND c`.
 *
 * Parse errors go to the logger and the result is null.
 */
export class QualifierParser {
  private readonly log: Logger;

  constructor(options: ParserOptions = {}) {
    this.log = options.log ?? defaultLogger;
  }

  parse(format: string, args: readonly unknown[] = []): Qualifier | null {
    return new ParseSession(format, args, this.log).parse();
  }
}

export function parseQualifier(
  format: string,
  args: readonly unknown[] = [],
  options: ParserOptions = {},
): Qualifier | null {
  return new QualifierParser(options).parse(format, args);
}
