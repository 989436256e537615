import { describe, it, expect } from 'vitest';
import { QualifierBindingNotFoundError, UnsupportedRawValueError } from '../../src/errors.js';

describe('QualifierBindingNotFoundError', () => {
  it('has correct name', () => {
    const err = new QualifierBindingNotFoundError('lastname');
    expect(err.name).toBe('QualifierBindingNotFoundError');
  });

  it('stores the binding name', () => {
    const err = new QualifierBindingNotFoundError('lastname');
    expect(err.binding).toBe('lastname');
  });

  it('generates a default message naming the binding', () => {
    const err = new QualifierBindingNotFoundError('lastname');
    expect(err.message).toBe('Qualifier binding not found: $lastname');
  });

  it('uses custom message when provided', () => {
    const err = new QualifierBindingNotFoundError('lastname', 'my message');
    expect(err.message).toBe('my message');
  });

  it('is instanceof QualifierBindingNotFoundError and Error', () => {
    const err = new QualifierBindingNotFoundError('x');
    expect(err).toBeInstanceOf(QualifierBindingNotFoundError);
    expect(err).toBeInstanceOf(Error);
  });

  it('has a stack trace', () => {
    expect(new QualifierBindingNotFoundError('x').stack).toBeDefined();
  });
});

describe('UnsupportedRawValueError', () => {
  it('has correct name', () => {
    const err = new UnsupportedRawValueError('ids', true);
    expect(err.name).toBe('UnsupportedRawValueError');
  });

  it('stores binding and value', () => {
    const value = { a: 1 };
    const err = new UnsupportedRawValueError('ids', value);
    expect(err.binding).toBe('ids');
    expect(err.value).toBe(value);
  });

  it('describes the value type in the message', () => {
    expect(new UnsupportedRawValueError('flag', true).message).toBe(
      'Unsupported raw SQL value for binding $flag: boolean',
    );
    expect(new UnsupportedRawValueError('ids', [1, 'a']).message).toBe(
      'Unsupported raw SQL value for binding $ids: array',
    );
    expect(new UnsupportedRawValueError('when', new Date(0)).message).toBe(
      'Unsupported raw SQL value for binding $when: Date',
    );
  });

  it('is instanceof UnsupportedRawValueError and Error', () => {
    const err = new UnsupportedRawValueError('x', null);
    expect(err).toBeInstanceOf(UnsupportedRawValueError);
    expect(err).toBeInstanceOf(Error);
  });
});
