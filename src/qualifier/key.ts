import { valueForKeyPath } from '../kvc.js';
import type { Expression } from './expression.js';

/**
 * An addressable path into a candidate object. Two keys are equal when
 * they render the same key string, whatever their structure.
 */
export interface Key extends Expression {
  readonly key: string;
  append(key: Key | string): Key;
  dot(key: Key | string): Key;
  valueFor(object: unknown): unknown;
  isEqual(other: unknown): boolean;
  toString(): string;
}

export function isKey(value: unknown): value is Key {
  return value instanceof StringKey || value instanceof KeyPath;
}

abstract class KeyBase implements Key {
  abstract readonly key: string;

  get hasUnresolvedBindings(): boolean {
    return false;
  }

  addReferencedKeys(set: Set<string>): void {
    set.add(this.key);
  }

  addBindingKeys(_set: Set<string>): void {}

  keyPathForBindingKey(_variable: string): string | null {
    return null;
  }

  append(key: Key | string): Key {
    return new KeyPath([this, typeof key === 'string' ? new StringKey(key) : key]);
  }

  dot(key: Key | string): Key {
    return this.append(key);
  }

  valueFor(object: unknown): unknown {
    if (object === null || object === undefined) return undefined;
    return valueForKeyPath(this.key, object);
  }

  isEqual(other: unknown): boolean {
    return isKey(other) && other.key === this.key;
  }

  toString(): string {
    return this.key;
  }
}

export class StringKey extends KeyBase {
  constructor(readonly key: string) {
    super();
  }
}

export class KeyPath extends KeyBase {
  readonly keys: readonly Key[];

  constructor(keys: readonly Key[]) {
    super();
    if (keys.length === 0) {
      throw new Error('KeyPath: at least one key is required');
    }
    // nested paths are flattened so `keys` always holds the components
    this.keys = keys.flatMap((k) => (k instanceof KeyPath ? k.keys : [k]));
  }

  get key(): string {
    return this.keys.map((k) => k.key).join('.');
  }

  override isEqual(other: unknown): boolean {
    if (other instanceof KeyPath) {
      return other.keys.length === this.keys.length && other.key === this.key;
    }
    return super.isEqual(other);
  }
}

/** `'a.b'` becomes a KeyPath of two StringKeys, anything else a StringKey. */
export function keyOf(key: Key | string): Key {
  if (typeof key !== 'string') return key;
  if (!key.includes('.')) return new StringKey(key);
  return new KeyPath(key.split('.').map((k) => new StringKey(k)));
}
