import { describe, it, expect } from 'vitest';
import { createDiagnosticsCollector } from '../../src/logger.js';
import { parseQualifier, QualifierParser } from '../../src/parser/qualifier-parser.js';
import { BooleanQualifier } from '../../src/qualifier/boolean-qualifier.js';
import { CompoundQualifier } from '../../src/qualifier/compound-qualifier.js';
import { QualifierVariable } from '../../src/qualifier/expression.js';
import { KeyComparisonQualifier } from '../../src/qualifier/key-comparison-qualifier.js';
import { KeyValueQualifier } from '../../src/qualifier/key-value-qualifier.js';
import { NotQualifier } from '../../src/qualifier/not-qualifier.js';
import { bindingKeys } from '../../src/qualifier/qualifier.js';
import { SQLQualifier } from '../../src/qualifier/sql-qualifier.js';

function parse(format: string, args: unknown[] = []) {
  const log = createDiagnosticsCollector();
  const q = parseQualifier(format, args, { log });
  return { q, log };
}

function render(format: string, args: unknown[] = []): string | undefined {
  return parse(format, args).q?.stringRepresentation;
}

describe('QualifierParser', () => {

  // ---------------------------------------------------------------------------
  // Key/value qualifiers
  // ---------------------------------------------------------------------------
  describe('key/value qualifiers', () => {
    it.each([
      ['amount = 10000', 'amount', 'equalTo', 10000],
      ["name = 'Duck'", 'name', 'equalTo', 'Duck'],
      ["name like 'Duck*'", 'name', 'like', 'Duck*'],
      ["name < 'Duck'", 'name', 'lessThan', 'Duck'],
      ['name = null', 'name', 'equalTo', null],
      ['price = 9.99', 'price', 'equalTo', 9.99],
      ['balance > -5', 'balance', 'greaterThan', -5],
      ['isActive = YES', 'isActive', 'equalTo', true],
      ['isActive = false', 'isActive', 'equalTo', false],
      ['deletedAt = nil', 'deletedAt', 'equalTo', null],
      ['name = "Duck"', 'name', 'equalTo', 'Duck'],
      ["address.city = 'Duckburg'", 'address.city', 'equalTo', 'Duckburg'],
    ])('parses %s', (format, key, operation, value) => {
      const { q } = parse(format);
      expect(q).toBeInstanceOf(KeyValueQualifier);
      if (!(q instanceof KeyValueQualifier)) return;
      expect(q.key).toBe(key);
      expect(q.operation).toBe(operation);
      expect(q.value).toEqual(value);
    });

    it('parses operators without surrounding spaces', () => {
      expect(render('balance>-5')).toBe('balance > -5');
      expect(render("name!='Daisy'")).toBe("name != 'Daisy'");
    });

    it('maps the operator spellings', () => {
      expect(render('a >= 1')).toBe('a >= 1');
      expect(render('a => 1')).toBe('a >= 1');
      expect(render('a <= 1')).toBe('a <= 1');
      expect(render('a =< 1')).toBe('a <= 1');
      expect(render('a != 1')).toBe('a != 1');
      expect(render("name ILIKE 'd*'")).toBe("name ILIKE 'd*'");
      expect(render("name caseInsensitiveLike: 'd*'")).toBe("name ILIKE 'd*'");
    });

    it('keeps unknown operators as other', () => {
      const { q } = parse("name hasPrefix: 'D'");
      expect(q).toBeInstanceOf(KeyValueQualifier);
      if (!(q instanceof KeyValueQualifier)) return;
      expect(q.operation).toEqual({ kind: 'other', token: 'hasPrefix:' });
      expect(render('a <> 1')).toBe('a <> 1');
    });

    it('unescapes quoted strings', () => {
      const { q } = parse("name = 'O\\'Hara'");
      expect(q).toBeInstanceOf(KeyValueQualifier);
      if (!(q instanceof KeyValueQualifier)) return;
      expect(q.value).toBe("O'Hara");
    });

    it('parses value lists after IN', () => {
      const { q } = parse("person.status IN ('301','302', '303')");
      expect(q).toBeInstanceOf(KeyValueQualifier);
      if (!(q instanceof KeyValueQualifier)) return;
      expect(q.key).toBe('person.status');
      expect(q.operation).toBe('in');
      expect(q.value).toEqual(['301', '302', '303']);
      expect(render('id IN (1, 2.5, NULL)')).toBe('id IN (1, 2.5, NULL)');
      expect(render('id IN ()')).toBe('id IN ()');
    });

    it('reads exponents', () => {
      expect(render('a = 1e-7')).toBe('a = 1e-7');
      expect(render('a = 2.5E+3')).toBe('a = 2500');
      expect(render('a IN (1e21, -3e-2)')).toBe('a IN (1e+21, -0.03)');
    });

    it('reads integers beyond the safe range as doubles', () => {
      const { q } = parse('a = 100000000000000000000');
      expect(q?.isEqual(new KeyValueQualifier('a', 'equalTo', 1e20))).toBe(true);
    });

    it('parses value lists with any operation', () => {
      const { q } = parse("tags = ('a', 'b')");
      expect(q?.isEqual(new KeyValueQualifier('tags', 'equalTo', ['a', 'b']))).toBe(true);
      expect(render('tags != ()')).toBe('tags != ()');
      expect(render('flags = (true, NULL)')).toBe('flags = (true, NULL)');
    });

    it('does not take keyword prefixes for constants', () => {
      const { q } = parse('name = NOBODY');
      expect(q).toBeInstanceOf(KeyComparisonQualifier);
      expect(q?.stringRepresentation).toBe('name = NOBODY');
    });
  });

  // ---------------------------------------------------------------------------
  // IS NULL / IS NOT NULL
  // ---------------------------------------------------------------------------
  describe('IS NULL', () => {
    it('parses IS NULL and IS NOT NULL', () => {
      const { q } = parse('email IS NULL');
      expect(q?.isEqual(new KeyValueQualifier('email', 'equalTo', null))).toBe(true);
      expect(parse('email IS NOT NULL').q?.isEqual(new KeyValueQualifier('email', 'notEqualTo', null))).toBe(true);
      expect(render('email IS NULL AND age > 1')).toBe('email IS NULL AND age > 1');
    });

    it('falls back to a plain IS operation', () => {
      const { q } = parse("name IS 'x'");
      expect(q).toBeInstanceOf(KeyValueQualifier);
      if (!(q instanceof KeyValueQualifier)) return;
      expect(q.operation).toEqual({ kind: 'other', token: 'IS' });
      expect(q.value).toBe('x');
    });
  });

  // ---------------------------------------------------------------------------
  // Boolean identifier shortcut
  // ---------------------------------------------------------------------------
  describe('bare identifiers', () => {
    it('treats a lone identifier as "= true"', () => {
      const { q } = parse('isArchived');
      expect(q?.isEqual(new KeyValueQualifier('isArchived', 'equalTo', true))).toBe(true);
    });

    it('works before AND, after AND, in parentheses and with trailing spaces', () => {
      expect(render('isArchived AND code > 3')).toBe('isArchived = true AND code > 3');
      expect(render('code > 3 AND isArchived')).toBe('code > 3 AND isArchived = true');
      expect(render('(isArchived) AND code > 3 AND (isUsed)')).toBe(
        'isArchived = true AND code > 3 AND isUsed = true',
      );
      expect(render('isArchived  ')).toBe('isArchived = true');
    });

    it('compares two keys when the right side is an identifier', () => {
      const { q } = parse('startDate < endDate');
      expect(q?.isEqual(new KeyComparisonQualifier('startDate', 'lessThan', 'endDate'))).toBe(true);
    });
  });

  // ---------------------------------------------------------------------------
  // Compound qualifiers
  // ---------------------------------------------------------------------------
  describe('compound qualifiers', () => {
    it('groups by operator run instead of precedence', () => {
      expect(render('a AND b OR c')).toBe('(a = true AND b = true) OR c = true');
      expect(render('a OR b AND c')).toBe('(a = true OR b = true) AND c = true');
    });

    it('folds every operator change', () => {
      const { q } = parse('a = 1 AND b = 2 OR c = 3 AND f = 4');
      expect(q).toBeInstanceOf(CompoundQualifier);
      if (!(q instanceof CompoundQualifier)) return;
      expect(q.operator).toBe('and');
      expect(q.qualifiers).toHaveLength(2);
      expect(q.stringRepresentation).toBe('((a = 1 AND b = 2) OR c = 3) AND f = 4');
    });

    it('keeps runs of the same operator flat', () => {
      const { q } = parse('a = 1 AND b = 2 AND c = 3');
      expect(q).toBeInstanceOf(CompoundQualifier);
      if (!(q instanceof CompoundQualifier)) return;
      expect(q.qualifiers).toHaveLength(3);
    });

    it('parses parenthesized groups across newlines', () => {
      const { q } = parse("name = 'Duck' AND (balance = 1 OR balance = 2\n OR balance = 3)");
      expect(q).toBeInstanceOf(CompoundQualifier);
      if (!(q instanceof CompoundQualifier)) return;
      expect(q.operator).toBe('and');
      expect(q.qualifiers[0]).toBeInstanceOf(KeyValueQualifier);
      const inner = q.qualifiers[1];
      expect(inner).toBeInstanceOf(CompoundQualifier);
      if (!(inner instanceof CompoundQualifier)) return;
      expect(inner.operator).toBe('or');
      expect(inner.qualifiers).toHaveLength(3);
    });

    it('tolerates a missing closing parenthesis', () => {
      const { q, log } = parse('(a = 1 AND b = 2');
      expect(q?.stringRepresentation).toBe('a = 1 AND b = 2');
      expect(log.errors()).toEqual(['missing closing parenthesis']);
    });

    it('rejects unknown compound operators', () => {
      const { q, log } = parse('a = 1 XOR b = 2');
      expect(q).toBeNull();
      expect(log.errors()).toEqual(['unknown compound operator: XOR']);
    });
  });

  // ---------------------------------------------------------------------------
  // NOT and constant qualifiers
  // ---------------------------------------------------------------------------
  describe('NOT', () => {
    it('negates the following qualifier', () => {
      const { q } = parse("NOT name = 'Duck'");
      expect(q).toBeInstanceOf(NotQualifier);
      expect(q?.stringRepresentation).toBe("NOT name = 'Duck'");
    });

    it('binds tighter than AND', () => {
      expect(render('NOT a = 1 AND b = 2')).toBe('NOT a = 1 AND b = 2');
      const { q } = parse('NOT a = 1 AND b = 2');
      expect(q).toBeInstanceOf(CompoundQualifier);
    });

    it('negates parenthesized groups', () => {
      expect(render('NOT (a = 1 OR b = 2)')).toBe('NOT (a = 1 OR b = 2)');
    });

    it('eliminates double negation', () => {
      expect(parse('NOT NOT a = 1').q).toBeInstanceOf(KeyValueQualifier);
    });

    it('does not mistake identifiers starting with NOT', () => {
      expect(render('NOTE = 1')).toBe('NOTE = 1');
    });

    it('requires a qualifier after NOT', () => {
      const { q, log } = parse('NOT');
      expect(q).toBeNull();
      expect(log.errors()).toEqual(['missing qualifier after NOT']);
    });
  });

  describe('empty SQL', () => {
    it('parses SQL[] into an empty qualifier', () => {
      const { q } = parse('a = 1 AND SQL[]');
      expect(q?.stringRepresentation).toBe('a = 1 AND SQL[]');
    });
  });

  describe('*true* and *false*', () => {
    it('parses constant qualifiers', () => {
      expect(parse('*true*').q).toBe(BooleanQualifier.TRUE);
      expect(parse('*false*').q).toBe(BooleanQualifier.FALSE);
    });

    it('keeps them inside compounds', () => {
      expect(render('*true* AND a = 1')).toBe('*true* AND a = 1');
    });
  });

  // ---------------------------------------------------------------------------
  // Bindings
  // ---------------------------------------------------------------------------
  describe('$variables', () => {
    it('parses a variable', () => {
      const { q } = parse('lastname = $lastname');
      expect(q).toBeInstanceOf(KeyValueQualifier);
      if (!(q instanceof KeyValueQualifier)) return;
      expect(q.variable?.isEqual(new QualifierVariable('lastname'))).toBe(true);
      expect(bindingKeys(q)).toEqual(['lastname']);
    });

    it('collects all variables', () => {
      const { q } = parse('lastname = $lastname AND firstname = $firstname OR salary > $salary');
      expect(q && bindingKeys(q)).toEqual(['lastname', 'firstname', 'salary']);
    });

    it('requires a name after $', () => {
      const { q, log } = parse('a = $ ');
      expect(q).toBeNull();
      expect(log.errors()).toEqual(["expected variable name after '$'"]);
    });
  });

  // ---------------------------------------------------------------------------
  // Format patterns
  // ---------------------------------------------------------------------------
  describe('format patterns', () => {
    it('substitutes keys, values and operators from the arguments', () => {
      const { q } = parse('name = %K AND salary > %d AND startDate %@ endDate', ['firstname', '5000', '<=']);
      expect(q).toBeInstanceOf(CompoundQualifier);
      if (!(q instanceof CompoundQualifier)) return;
      expect(q.qualifiers[0]).toBeInstanceOf(KeyComparisonQualifier);
      expect(q.qualifiers[1]).toBeInstanceOf(KeyValueQualifier);
      expect(q.qualifiers[2]).toBeInstanceOf(KeyComparisonQualifier);
      expect(q.stringRepresentation).toBe('name = firstname AND salary > 5000 AND startDate <= endDate');
    });

    it('%@ uses the argument as-is', () => {
      expect(render('name = %@', ['Duck'])).toBe("name = 'Duck'");
      expect(render('age = %@', [30])).toBe('age = 30');
      expect(render('name = %@', [null])).toBe('name IS NULL');
      expect(render('id IN %@', [[1, 2]])).toBe('id IN (1, 2)');
    });

    it('%s converts to a string and maps null to IS NULL', () => {
      expect(render('code = %s', [42])).toBe("code = '42'");
      expect(render('age > %s', [null])).toBe('age IS NULL');
    });

    it('%d / %i convert to integers', () => {
      expect(render('age > %i', [18])).toBe('age > 18');
      expect(render('age > %d', ['abc'])).toBe('age > NULL');
      expect(render('age > %d', [2.5])).toBe('age > NULL');
    });

    it('%f converts to doubles', () => {
      expect(render('price < %f', ['2.5'])).toBe('price < 2.5');
      expect(render('price < %f', [3])).toBe('price < 3');
    });

    it('uses a pattern as the key', () => {
      expect(render("%@ LIKE 'Hello*'", ['greeting'])).toBe("greeting LIKE 'Hello*'");
    });

    it('uses a pattern as the compound operator', () => {
      expect(render('a = 1 %@ b = 2', ['OR'])).toBe('a = 1 OR b = 2');
    });

    it('consumes arguments left to right', () => {
      expect(render('a = %@ AND b = %@', [1, 2])).toBe('a = 1 AND b = 2');
    });

    it('fails with more patterns than arguments', () => {
      const { q, log } = parse('a = %@ AND b = %@', [1]);
      expect(q).toBeNull();
      expect(log.errors()).toEqual(['more format patterns than arguments']);
    });

    it('rejects %% and unknown specifications', () => {
      expect(parse('name = %%', ['x']).log.errors()).toEqual(['%% is not supported']);
      expect(parse('name = %x', ['x']).log.errors()).toEqual(['unknown format specification: %x']);
    });

    it('rejects a null %K argument', () => {
      const { q, log } = parse('a = %K', [null]);
      expect(q).toBeNull();
      expect(log.errors()).toEqual(['argument for %K is null, needs to be a key']);
    });
  });

  // ---------------------------------------------------------------------------
  // SQL[...]
  // ---------------------------------------------------------------------------
  describe('SQL qualifiers', () => {
    it('splits raw text and variables', () => {
      const { q } = parse('SQL[lastname = $lastname AND balance = $balance]');
      expect(q).toBeInstanceOf(SQLQualifier);
      if (!(q instanceof SQLQualifier)) return;
      expect(q.parts).toEqual([
        { kind: 'raw', sql: 'lastname = ' },
        { kind: 'variable', name: 'lastname' },
        { kind: 'raw', sql: ' AND balance = ' },
        { kind: 'variable', name: 'balance' },
      ]);
    });

    it('combines with other qualifiers', () => {
      expect(render("lastname = 'Duck' AND SQL[EXISTS (SELECT 1)]")).toBe(
        "lastname = 'Duck' AND SQL[EXISTS (SELECT 1)]",
      );
    });

    it('honours backslash escapes', () => {
      const { q } = parse('SQL[a\\]b]');
      expect(q).toBeInstanceOf(SQLQualifier);
      if (!(q instanceof SQLQualifier)) return;
      expect(q.parts).toEqual([{ kind: 'raw', sql: 'a]b' }]);
    });

    it('reports a missing closing bracket but keeps the qualifier', () => {
      const { q, log } = parse('SQL[1 = 1');
      expect(q).toBeInstanceOf(SQLQualifier);
      expect(log.errors()).toEqual(["missing closing ']' after SQL["]);
    });
  });

  // ---------------------------------------------------------------------------
  // Casts
  // ---------------------------------------------------------------------------
  describe('casts', () => {
    it('accepts and ignores a cast with a warning', () => {
      const { q, log } = parse("date = (Date)'2007-09-21'");
      expect(q?.isEqual(new KeyValueQualifier('date', 'equalTo', '2007-09-21'))).toBe(true);
      expect(log.diagnostics).toEqual([
        { level: 'warn', message: "not handling cast to 'Date'", details: ['2007-09-21'] },
      ]);
    });
  });

  // ---------------------------------------------------------------------------
  // Errors
  // ---------------------------------------------------------------------------
  describe('errors', () => {
    it('returns null for empty input without logging', () => {
      const { q, log } = parse('   ');
      expect(q).toBeNull();
      expect(log.diagnostics).toEqual([]);
    });

    it('reports unterminated strings', () => {
      const { q, log } = parse("name = 'Duck");
      expect(q).toBeNull();
      expect(log.errors()).toEqual(["quoted string not closed (expected ')"]);
    });

    it('reports malformed numbers', () => {
      const { q, log } = parse('version = 1.2.3');
      expect(q).toBeNull();
      expect(log.errors()).toEqual(["failed to parse number: '1.2.3'"]);
    });

    it('reports a missing value after the operation', () => {
      const { q, log } = parse('a = ');
      expect(q).toBeNull();
      expect(log.errors()).toEqual(['expected value or key after operation (op==, id=a)']);
    });
  });

  // ---------------------------------------------------------------------------
  // Parser instances
  // ---------------------------------------------------------------------------
  describe('QualifierParser instances', () => {
    it('start every parse with a fresh cursor', () => {
      const parser = new QualifierParser({ log: createDiagnosticsCollector() });
      expect(parser.parse('a = %@', [1])?.stringRepresentation).toBe('a = 1');
      expect(parser.parse('a = %@', [2])?.stringRepresentation).toBe('a = 2');
    });
  });
});
