import { ConfigurationException } from '../core/exceptions.js';
import { capitalize, isIterable, isPlainObject, typeName } from '../utils.js';
import { CoercionError } from './errors.js';
import { Field, type BoundGetter, type FieldOptions } from './field.js';
import type { SerializerClass } from './serializer.js';

export { Field, type FieldOptions } from './field.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const SPECIAL_FLOAT_PATTERN = /^([+-]?)(nan|inf|infinity)$/i;

function safeInteger(result: number, value: unknown): number {
  if (!Number.isSafeInteger(result)) {
    throw new CoercionError(`Integer out of safe range: '${String(value)}'`);
  }
  return result;
}

function parseSpecialFloat(text: string): number | undefined {
  const match = SPECIAL_FLOAT_PATTERN.exec(text);
  if (!match) return undefined;
  if (match[2].toLowerCase() === 'nan') return Number.NaN;
  return match[1] === '-' ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
}

/** A field that converts the value to a string. */
export class CharField extends Field {
  override toValue(value: unknown): unknown {
    return String(value);
  }
}

/**
 * A field that converts the value to an integer, truncating decimals.
 * Results outside the safe integer range are rejected.
 */
export class IntegerField extends Field {
  override toValue(value: unknown): unknown {
    if (typeof value === 'boolean') return value ? 1 : 0;
    if (typeof value === 'bigint') return safeInteger(Number(value), value);
    if (typeof value === 'number') {
      if (!Number.isFinite(value)) {
        throw new CoercionError(`Cannot convert ${value} to integer`);
      }
      return safeInteger(Math.trunc(value), value);
    }
    if (typeof value === 'string') {
      const trimmed = value.trim();
      if (!INTEGER_PATTERN.test(trimmed)) {
        throw new CoercionError(`Invalid literal for integer: '${value}'`);
      }
      return safeInteger(Number.parseInt(trimmed, 10), trimmed);
    }
    throw new TypeError(`Integer argument must be a string or a number, not '${typeName(value)}'`);
  }
}

/**
 * A field that converts the value to a float. `'nan'`, `'inf'` and
 * `'infinity'` (any case, optionally signed) map to `NaN` and `±Infinity`.
 */
export class FloatField extends Field {
  override toValue(value: unknown): unknown {
    if (typeof value === 'boolean') return value ? 1 : 0;
    if (typeof value === 'bigint') return Number(value);
    if (typeof value === 'number') return value;
    if (typeof value === 'string') {
      const trimmed = value.trim();
      const special = parseSpecialFloat(trimmed);
      if (special !== undefined) return special;
      if (!FLOAT_PATTERN.test(trimmed)) {
        throw new CoercionError(`Could not convert string to float: '${value}'`);
      }
      return Number.parseFloat(trimmed);
    }
    throw new TypeError(`Float argument must be a string or a number, not '${typeName(value)}'`);
  }
}

/** A field that converts the value to a boolean. */
export class BooleanField extends Field {
  override toValue(value: unknown): unknown {
    return Boolean(value);
  }
}

/**
 * True for JSON-shaped constants: null, booleans, numbers, strings, and
 * arrays or plain objects made of those.
 */
export function isPrimitiveConstant(value: unknown): boolean {
  if (value === null) return true;
  if (typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
    return true;
  }
  if (Array.isArray(value)) {
    return value.every(isPrimitiveConstant);
  }
  if (isPlainObject(value)) {
    return Object.values(value).every(isPrimitiveConstant);
  }
  return false;
}

export interface ConstantFieldOptions {
  label?: string;
  required?: boolean;
}

/**
 * Injects a constant into the output without reading the source object.
 *
 * A required field with a non-primitive constant is rejected at
 * construction; an optional one is dropped from every output instead.
 *
 * @example
 * ```ts
 * class FooSerializer extends Serializer {
 *   static override fields = {
 *     kind: new ConstantField('foo'),
 *     bar: new IntegerField(),
 *   };
 * }
 * new FooSerializer({ bar: 5 }).data; // { kind: 'foo', bar: 5 }
 * ```
 */
export class ConstantField extends Field {
  readonly constant: unknown;
  private readonly primitive: boolean;

  constructor(constant: unknown = null, options: ConstantFieldOptions = {}) {
    super({ label: options.label, required: options.required });
    this.primitive = isPrimitiveConstant(constant);
    if (!this.primitive && this.required) {
      throw new ConfigurationException(
        'Only primitive types are accepted in `ConstantField` (number, string, boolean, null) ' +
          `and arrays/plain objects of primitive types. Given: ${typeName(constant)}.`
      );
    }
    this.constant = constant;
  }

  override asGetter(): BoundGetter {
    const { constant, primitive } = this;
    return {
      withSchema: false,
      get: () => {
        if (!primitive) {
          throw new TypeError(`Non-required field: non primitive constant given: ${typeName(constant)}`);
        }
        return constant;
      },
    };
  }
}

export interface MethodFieldOptions {
  label?: string;
  required?: boolean;
}

/**
 * Computes the value by calling a method of the serializer with the source
 * object. The method defaults to `get<FieldName>`.
 *
 * @example
 * ```ts
 * class TotalSerializer extends Serializer {
 *   static override fields = {
 *     plus: new MethodField(),
 *     minus: new MethodField('doMinus'),
 *   };
 *
 *   getPlus(obj: { bar: number; baz: number }) {
 *     return obj.bar + obj.baz;
 *   }
 *
 *   doMinus(obj: { bar: number; baz: number }) {
 *     return obj.bar - obj.baz;
 *   }
 * }
 * ```
 */
export class MethodField extends Field {
  readonly methodName: string | null;

  constructor(methodName?: string, options: MethodFieldOptions = {}) {
    super({ label: options.label, required: options.required });
    this.methodName = methodName ?? null;
  }

  override asGetter(fieldName: string, owner: SerializerClass): BoundGetter {
    const methodName = this.methodName ?? `get${capitalize(fieldName)}`;
    const method: unknown = Reflect.get(owner.prototype, methodName);
    if (typeof method !== 'function') {
      throw new ConfigurationException(
        `${owner.name} has no method '${methodName}' for MethodField '${fieldName}'`
      );
    }
    return {
      withSchema: true,
      get: (serializer, source) => method.call(serializer, source),
    };
  }
}

export interface SerializerFieldOptions extends FieldOptions {
  /** The source value is an iterable of objects. */
  many?: boolean;
}

/**
 * Nests another serializer under this field's key.
 *
 * @example
 * ```ts
 * class OrderSerializer extends Serializer {
 *   static override fields = {
 *     customer: new SerializerField(CustomerSerializer),
 *     lines: new SerializerField(LineSerializer, { many: true }),
 *   };
 * }
 * ```
 */
export class SerializerField extends Field {
  readonly serializer: SerializerClass;
  readonly many: boolean;

  constructor(serializer: SerializerClass, options: SerializerFieldOptions = {}) {
    super(options);
    this.serializer = serializer;
    this.many = options.many ?? false;
  }

  override toValue(value: unknown): unknown {
    return new this.serializer(value, { many: this.many }).data;
  }
}

/**
 * Serializes an iterable of values sharing one primitive type.
 *
 * Takes the wrapped field's options (source, label, required, invoke) unless
 * overridden. Nested serializers use `many: true` instead; method and
 * constant fields have no per-element conversion to map.
 *
 * @example
 * ```ts
 * class SubscriptionSerializer extends Serializer {
 *   static override fields = {
 *     status: new ListField(new CharField({ label: 'allowedStatus' })),
 *   };
 * }
 * // { allowedStatus: ['active', 'trialing', 'canceled'] }
 * ```
 */
export class ListField extends Field {
  readonly child: Field;

  constructor(child: Field, options: FieldOptions = {}) {
    if (child instanceof SerializerField) {
      throw new ConfigurationException(
        'Cannot use `ListField` with a nested serializer. Use the `many` option of `SerializerField` instead.'
      );
    }
    if (!child.isToValueOverridden()) {
      throw new ConfigurationException(
        `\`ListField\` can only wrap primitive-typed fields. Given field type: ${child.constructor.name}`
      );
    }
    const inherited = child.options();
    super({
      source: options.source ?? inherited.source,
      invoke: options.invoke ?? inherited.invoke,
      label: options.label ?? inherited.label,
      required: options.required ?? inherited.required,
    });
    this.child = child;
  }

  override toValue(value: unknown): unknown {
    if (typeof value === 'string' || !isIterable(value)) {
      throw new TypeError(`'${typeName(value)}' object is not a list`);
    }
    return Array.from(value, (item) => this.child.toValue(item));
  }
}
