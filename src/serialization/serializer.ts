import { SerializationException } from '../core/exceptions.js';
import { isIterable, typeName } from '../utils.js';
import { isFieldFailure } from './errors.js';
import type { FieldMap, SchemaGetter } from './field.js';
import { attributeGetter, keyGetter, type Getter, type GetterFactory } from './getters.js';

export type SerializedObject = Record<string, unknown>;
export type SerializedData = SerializedObject | SerializedObject[];

interface CompiledFieldBase {
  /** Output key: the field's label, or its declared name. */
  name: string;
  /** Set only when the field overrides `toValue()`. */
  toValue: ((value: unknown) => unknown) | null;
  invoke: boolean;
  required: boolean;
}

/**
 * One field of a serializer class, resolved once and reused for every
 * object that class serializes.
 */
export type CompiledField =
  | (CompiledFieldBase & { withSchema: false; get: Getter })
  | (CompiledFieldBase & { withSchema: true; get: SchemaGetter });

export interface SerializerOptions {
  /** Serialize an iterable of objects into a list. */
  many?: boolean;
}

export type SerializerClass = typeof Serializer;

const compiledCache = new WeakMap<SerializerClass, readonly CompiledField[]>();

/**
 * Resolves every field of a serializer class into a {@link CompiledField}.
 * Runs once per class; later calls hit the cache.
 */
export function compileSerializer(cls: SerializerClass): readonly CompiledField[] {
  const cached = compiledCache.get(cls);
  if (cached) return cached;

  const compiled = Object.entries(cls.fields).map(([fieldName, field]): CompiledField => {
    const base: CompiledFieldBase = {
      name: field.label ?? fieldName,
      toValue: field.isToValueOverridden() ? (value) => field.toValue(value) : null,
      invoke: field.invoke,
      required: field.required,
    };
    const bound = field.asGetter(fieldName, cls);
    if (bound === null) {
      return { ...base, withSchema: false, get: cls.defaultGetter(field.source ?? fieldName) };
    }
    return bound.withSchema
      ? { ...base, withSchema: true, get: bound.get }
      : { ...base, withSchema: false, get: bound.get };
  });

  const frozen = Object.freeze(compiled);
  compiledCache.set(cls, frozen);
  return frozen;
}

export function isSerializerClass(value: unknown): value is SerializerClass {
  return typeof value === 'function' && (value === Serializer || value.prototype instanceof Serializer);
}

function invokeValue(value: unknown): unknown {
  if (typeof value !== 'function') {
    throw new TypeError(`'${typeName(value)}' object is not callable`);
  }
  return value();
}

/**
 * Base class for serializers. A serializer declares its fields in a static
 * `fields` map; field maps of other serializers are reused by spreading them.
 *
 * @example
 * ```ts
 * class UserSerializer extends Serializer {
 *   static override fields = {
 *     id: new IntegerField(),
 *     email: new CharField({ source: 'contact.email' }),
 *     fullName: new MethodField(),
 *   };
 *
 *   getFullName(user: User) {
 *     return `${user.firstName} ${user.lastName}`;
 *   }
 * }
 *
 * class AdminUserSerializer extends UserSerializer {
 *   static override fields = { ...UserSerializer.fields, roles: new ListField(new CharField()) };
 * }
 *
 * return c.json(new UserSerializer(user).data);
 * ```
 */
export class Serializer {
  static fields: FieldMap = {};

  /** Getter used for fields that do not provide one. */
  static defaultGetter: GetterFactory = attributeGetter;

  readonly instance: unknown;
  readonly many: boolean;

  private cachedData: SerializedData | undefined;

  constructor(instance: unknown, options: SerializerOptions = {}) {
    this.instance = instance;
    this.many = options.many ?? false;
  }

  /**
   * The serialized output, computed on first access. Later accesses return
   * the same object.
   */
  get data(): SerializedData {
    if (this.cachedData === undefined) {
      this.cachedData = this.toValue(this.instance);
    }
    return this.cachedData;
  }

  /**
   * Serializes `instance` (a list of objects when `many` is set) without
   * touching the cache.
   */
  toValue(instance: unknown): SerializedData {
    const fields = this.compiledFields();
    if (this.many) {
      if (!isIterable(instance)) {
        throw new TypeError(`'${typeName(instance)}' object is not iterable`);
      }
      return Array.from(instance, (item) => this.serializeOne(item, fields));
    }
    return this.serializeOne(instance, fields);
  }

  protected compiledFields(): readonly CompiledField[] {
    const cls = this.constructor;
    if (!isSerializerClass(cls)) {
      throw new TypeError(`${cls.name} is not a Serializer subclass`);
    }
    return compileSerializer(cls);
  }

  protected serializeOne(source: unknown, fields: readonly CompiledField[]): SerializedObject {
    const output: SerializedObject = {};
    for (const field of fields) {
      let result: unknown;
      try {
        result = field.withSchema ? field.get(this, source) : field.get(source);
        if (field.required || (result !== null && result !== undefined)) {
          if (field.invoke) {
            result = invokeValue(result);
          }
          if (field.toValue) {
            result = field.toValue(result);
          }
        }
      } catch (error) {
        if (!isFieldFailure(error)) throw error;
        if (field.required) {
          throw new SerializationException(`Field '${field.name}': ${error.message}`);
        }
        continue;
      }
      output[field.name] = result === undefined ? null : result;
    }
    return output;
  }
}

/**
 * Serializer for plain mappings (and `Map`s): fields are read by key rather
 * than by attribute path.
 *
 * @example
 * ```ts
 * class TotalsSerializer extends DictSerializer {
 *   static override fields = { count: new IntegerField(), avg: new FloatField({ source: 'average' }) };
 * }
 * new TotalsSerializer({ count: '5', average: '2.5' }).data; // { count: 5, avg: 2.5 }
 * ```
 */
export class DictSerializer extends Serializer {
  static override defaultGetter: GetterFactory = keyGetter;
}
