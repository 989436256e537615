/**
 * Objects that want to control how qualifiers read their values implement
 * this instead of exposing plain properties.
 */
export interface KeyValueCoding {
  valueForKey(key: string): unknown;
}

export function isKeyValueCoding(object: unknown): object is KeyValueCoding {
  return (
    typeof object === 'object' &&
    object !== null &&
    'valueForKey' in object &&
    typeof object.valueForKey === 'function'
  );
}

/**
 * Looks up a single key. Lookup order:
 * 1. `valueForKey` of KeyValueCoding objects
 * 2. `get` of Maps
 * 3. `count` / `length` of arrays
 * 4. own or inherited properties (functions are not invoked)
 */
export function valueForKey(key: string, object: unknown): unknown {
  if (object === null || object === undefined) return undefined;
  if (isKeyValueCoding(object)) return object.valueForKey(key);
  if (object instanceof Map) return object.get(key);
  if (Array.isArray(object)) {
    if (key === 'count' || key === 'length') return object.length;
    return object.map((element: unknown) => valueForKey(key, element));
  }
  if (typeof object !== 'object') return undefined;

  const value: unknown = Reflect.get(object, key);
  return typeof value === 'function' ? undefined : value;
}

/**
 * Resolves a dotted key path, e.g. `address.city`. Arrays in the middle of
 * a path map the rest of the path over their elements, so
 * `addresses.city` yields one city per address.
 */
export function valueForKeyPath(path: string, object: unknown): unknown {
  if (path.length === 0) return undefined;
  const dot = path.indexOf('.');
  if (dot < 0) return valueForKey(path, object);

  const head = valueForKey(path.slice(0, dot), object);
  if (head === null || head === undefined) return undefined;
  return valueForKeyPath(path.slice(dot + 1), head);
}
