export class QualifierBindingNotFoundError extends Error {
  override readonly name = 'QualifierBindingNotFoundError';

  constructor(
    readonly binding: string,
    message?: string,
  ) {
    super(message ?? `Qualifier binding not found: $${binding}`);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnsupportedRawValueError extends Error {
  override readonly name = 'UnsupportedRawValueError';

  constructor(
    readonly binding: string,
    readonly value: unknown,
  ) {
    super(`Unsupported raw SQL value for binding $${binding}: ${describeType(value)}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'object') return value.constructor?.name ?? 'object';
  return typeof value;
}
