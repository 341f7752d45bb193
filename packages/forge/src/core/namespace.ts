/**
 * A named key/value source that reference scalars (`"$KEY"`) resolve against.
 *
 * `has` decides whether the reference instantiator accepts a key; `get` is
 * only called after `has` returned true.
 */
export interface Namespace {
  readonly name: string;
  has(key: string): boolean;
  get(key: string): unknown;
}

/**
 * Namespace over a plain record. Only own properties are visible, so keys
 * such as `toString` or `constructor` never resolve through the prototype.
 */
export function recordNamespace(name: string, record: Readonly<Record<string, unknown>>): Namespace {
  return {
    name,
    has: (key) => Object.prototype.hasOwnProperty.call(record, key),
    get: (key) => record[key],
  };
}
