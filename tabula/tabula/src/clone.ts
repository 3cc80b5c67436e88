import type { UnknownRecord } from "type-fest";

const isPlainRecord = (value: unknown): value is UnknownRecord => {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
};

/**
 * Deep copy of default values.
 * Only plain records, arrays, Maps and Sets are structural - everything else (instances, functions, class
 * instances of the host program, dates) is shared as-is, the same way a reference field would be.
 *
 * The identity map is filled before children are visited, so self-referencing defaults come out
 * as equally self-referencing copies instead of recursing forever.
 */
export function deepCopy<T>(source: T, mapping?: WeakMap<object, unknown>): T;
export function deepCopy(source: unknown, mapping: WeakMap<object, unknown> = new WeakMap()): unknown {
  if (typeof source !== "object" || source === null) {
    return source;
  }
  if (mapping.has(source)) {
    return mapping.get(source);
  }

  if (Array.isArray(source)) {
    const copy: unknown[] = new Array(source.length);
    mapping.set(source, copy);
    // holes stay holes
    for (const index of Object.keys(source)) {
      copy[Number(index)] = deepCopy(source[Number(index)], mapping);
    }
    return copy;
  }
  if (source instanceof Map) {
    const copy = new Map<unknown, unknown>();
    mapping.set(source, copy);
    for (const [key, value] of source) {
      copy.set(deepCopy(key, mapping), deepCopy(value, mapping));
    }
    return copy;
  }
  if (source instanceof Set) {
    const copy = new Set<unknown>();
    mapping.set(source, copy);
    for (const value of source) {
      copy.add(deepCopy(value, mapping));
    }
    return copy;
  }
  if (isPlainRecord(source)) {
    const copy: UnknownRecord = Object.create(Object.getPrototypeOf(source));
    mapping.set(source, copy);
    for (const key of Reflect.ownKeys(source)) {
      const descriptor = Object.getOwnPropertyDescriptor(source, key);
      if (descriptor?.enumerable) {
        copy[key] = deepCopy(source[key], mapping);
      }
    }
    return copy;
  }
  return source;
}
