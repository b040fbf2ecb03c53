import { MissingAttributeError } from './errors.js';
import { hasOwn, typeName } from '../utils.js';

/** Fetches a raw value from the object being serialized. */
export type Getter = (source: unknown) => unknown;

/** Builds the getter used when a field does not supply its own. */
export type GetterFactory = (path: string) => Getter;

function readAttribute(target: unknown, name: string): unknown {
  if (target === null || target === undefined) {
    throw new MissingAttributeError(`Cannot read attribute '${name}' of ${String(target)}`);
  }
  const holder: object = Object(target);
  if (!(name in holder)) {
    throw new MissingAttributeError(`'${typeName(target)}' object has no attribute '${name}'`);
  }
  const value: unknown = Reflect.get(holder, name);
  // Keep `this` for values that will be invoked later.
  return typeof value === 'function' ? value.bind(holder) : value;
}

/**
 * Attribute-path getter: `attributeGetter('owner.address.city')` walks
 * nested properties, prototype getters and methods included.
 */
export function attributeGetter(path: string): Getter {
  const parts = path.split('.');
  if (parts.length === 1) {
    return (source) => readAttribute(source, path);
  }
  return (source) => parts.reduce<unknown>((current, part) => readAttribute(current, part), source);
}

/**
 * Single-level key getter for plain mappings and `Map` instances.
 * The key is used as-is, dots included.
 */
export function keyGetter(key: string): Getter {
  return (source) => {
    if (source instanceof Map) {
      if (!source.has(key)) {
        throw new MissingAttributeError(`Key '${key}' not found`);
      }
      return source.get(key);
    }
    if (typeof source !== 'object' || source === null) {
      throw new TypeError(`Expected a mapping, got ${typeName(source)}`);
    }
    if (!hasOwn(source, key)) {
      throw new MissingAttributeError(`Key '${key}' not found`);
    }
    return Reflect.get(source, key);
  };
}
