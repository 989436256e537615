import { describe, it, expect } from 'vitest';
import { isKey, KeyPath, keyOf, StringKey } from '../../src/qualifier/key.js';
import {
  ConstantValue,
  isQualifierVariable,
  NullExpression,
  QualifierVariable,
  RawSQLValue,
} from '../../src/qualifier/expression.js';
import { referencedKeys, bindingKeys } from '../../src/qualifier/qualifier.js';

describe('StringKey', () => {
  it('renders its name', () => {
    const k = new StringKey('lastname');
    expect(k.key).toBe('lastname');
    expect(String(k)).toBe('lastname');
  });

  it('reads its value through key-value lookup', () => {
    expect(new StringKey('lastname').valueFor({ lastname: 'Duck' })).toBe('Duck');
    expect(new StringKey('lastname').valueFor(null)).toBeUndefined();
  });

  it('reports itself as referenced key', () => {
    expect(referencedKeys(new StringKey('a'))).toEqual(['a']);
  });
});

describe('KeyPath', () => {
  it('joins component keys with dots', () => {
    const path = new StringKey('address').append('city');
    expect(path).toBeInstanceOf(KeyPath);
    expect(path.key).toBe('address.city');
  });

  it('dot() is append()', () => {
    expect(new StringKey('a').dot(new StringKey('b')).key).toBe('a.b');
  });

  it('flattens nested paths', () => {
    const path = new KeyPath([new KeyPath([new StringKey('a'), new StringKey('b')]), new StringKey('c')]);
    expect(path.keys).toHaveLength(3);
    expect(path.key).toBe('a.b.c');
  });

  it('requires at least one key', () => {
    expect(() => new KeyPath([])).toThrow('KeyPath: at least one key is required');
  });

  it('resolves the path against an object', () => {
    expect(keyOf('address.city').valueFor({ address: { city: 'Duckburg' } })).toBe('Duckburg');
  });

  it('compares structurally between paths and by rendered string otherwise', () => {
    const ab = keyOf('a.b');
    expect(ab.isEqual(new StringKey('a').append('b'))).toBe(true);
    expect(ab.isEqual(keyOf('a.c'))).toBe(false);
    expect(ab.isEqual(new StringKey('a.b'))).toBe(true);
    expect(new StringKey('a.b').isEqual(ab)).toBe(true);
    expect(ab.isEqual('a.b')).toBe(false);
  });
});

describe('keyOf', () => {
  it('returns StringKey for plain names and KeyPath for dotted ones', () => {
    expect(keyOf('name')).toBeInstanceOf(StringKey);
    expect(keyOf('a.b')).toBeInstanceOf(KeyPath);
  });

  it('passes keys through', () => {
    const k = new StringKey('x');
    expect(keyOf(k)).toBe(k);
    expect(isKey(k)).toBe(true);
    expect(isKey('x')).toBe(false);
  });
});

describe('QualifierVariable', () => {
  it('is equal by name', () => {
    expect(new QualifierVariable('a').isEqual(new QualifierVariable('a'))).toBe(true);
    expect(new QualifierVariable('a').isEqual(new QualifierVariable('b'))).toBe(false);
  });

  it('renders as $name and reports a binding key', () => {
    const v = new QualifierVariable('lastname');
    expect(String(v)).toBe('$lastname');
    expect(v.hasUnresolvedBindings).toBe(true);
    expect(bindingKeys(v)).toEqual(['lastname']);
    expect(isQualifierVariable(v)).toBe(true);
  });

  it('looks its value up by key path', () => {
    expect(new QualifierVariable('user.id').valueIn({ user: { id: 3 } })).toBe(3);
    expect(new QualifierVariable('missing').valueIn({})).toBeUndefined();
  });
});

describe('constants', () => {
  it('ConstantValue normalizes and renders its value', () => {
    const c = new ConstantValue(5n);
    expect(c.value).toBe(5);
    expect(String(c)).toBe('5');
    expect(c.isEqual(new ConstantValue(5))).toBe(true);
    expect(c.hasUnresolvedBindings).toBe(false);
  });

  it('NullExpression is a shared singleton rendering NULL', () => {
    expect(NullExpression.shared.isEqual(NullExpression.shared)).toBe(true);
    expect(String(NullExpression.shared)).toBe('NULL');
    expect(NullExpression.shared.valueFor({})).toBeNull();
  });

  it('RawSQLValue renders verbatim', () => {
    const raw = new RawSQLValue('NOW()');
    expect(String(raw)).toBe('NOW()');
    expect(raw.isEqual(new RawSQLValue('NOW()'))).toBe(true);
    expect(raw.isEqual(new ConstantValue('NOW()'))).toBe(false);
  });
});
