import type { Getter } from './getters.js';
import type { Serializer, SerializerClass } from './serializer.js';

/**
 * A getter that also receives the serializer instance, used by fields whose
 * value is computed by a serializer method.
 */
export type SchemaGetter = (serializer: Serializer, source: unknown) => unknown;

/**
 * Getter returned by {@link Field.asGetter}, tagged with the arguments it takes.
 */
export type BoundGetter =
  | { withSchema: false; get: Getter }
  | { withSchema: true; get: SchemaGetter };

export interface FieldOptions {
  /**
   * Attribute path (or key, for dict serializers) to read on the source.
   * Defaults to the name the field is declared under.
   */
  source?: string;
  /** Call the fetched value with no arguments before coercion. */
  invoke?: boolean;
  /** Output key to use instead of the declared name. */
  label?: string;
  /**
   * When false, a null value skips coercion and fetch/coercion failures drop
   * the field instead of failing the whole serialization.
   * @default true
   */
  required?: boolean;
}

/**
 * Maps one property (or computed value) of an object to one key of the
 * serialized output.
 *
 * Subclass and override {@link Field.toValue} for simple conversions; override
 * {@link Field.asGetter} to control how the raw value is fetched.
 *
 * @example
 * ```ts
 * class CentsField extends Field {
 *   override toValue(value: unknown): unknown {
 *     return Math.round(Number(value) * 100);
 *   }
 * }
 * ```
 */
export class Field {
  readonly source: string | null;
  readonly invoke: boolean;
  readonly label: string | null;
  readonly required: boolean;

  constructor(options: FieldOptions = {}) {
    this.source = options.source ?? null;
    this.invoke = options.invoke ?? false;
    this.label = options.label ?? null;
    this.required = options.required ?? true;
  }

  /**
   * Converts the fetched value. Identity by default; the serializer skips
   * the call entirely unless a subclass overrides it.
   */
  toValue(value: unknown): unknown {
    return value;
  }

  isToValueOverridden(): boolean {
    return this.toValue !== Field.prototype.toValue;
  }

  /**
   * Returns the function fetching this field's raw value, or null to use the
   * owning serializer's default getter.
   */
  asGetter(_fieldName: string, _owner: SerializerClass): BoundGetter | null {
    return null;
  }

  /** The options this field was built with, for wrapping fields. */
  options(): FieldOptions {
    return {
      source: this.source ?? undefined,
      invoke: this.invoke,
      label: this.label ?? undefined,
      required: this.required,
    };
  }
}

export type FieldMap = Record<string, Field>;
