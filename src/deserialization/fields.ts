import { z, type ZodType } from 'zod';
import { isPlainObject } from '../utils.js';
import type { DeserializerClass } from './deserializer.js';
import { NON_FIELD_ERRORS, ValidationError } from './errors.js';
import { InputField, isEmptyValue, type InputFieldOptions } from './field.js';

export { InputField, type InputFieldOptions } from './field.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const TRAILING_ZERO_DECIMALS = /\.0*\s*$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function isScalar(value: unknown): value is string | number | bigint | boolean {
  return (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    typeof value === 'boolean'
  );
}

export interface CharFieldOptions extends InputFieldOptions {
  minLength?: number;
  maxLength?: number;
  /**
   * Strip surrounding whitespace before validation.
   * @default true
   */
  trim?: boolean;
}

/**
 * Text input. Numbers and booleans are accepted and converted to strings;
 * an optional empty value cleans to `''`.
 */
export class CharField extends InputField {
  readonly minLength: number | undefined;
  readonly maxLength: number | undefined;
  readonly trim: boolean;

  constructor(options: CharFieldOptions = {}) {
    super(options);
    this.minLength = options.minLength;
    this.maxLength = options.maxLength;
    this.trim = options.trim ?? true;
  }

  protected override toInternal(value: unknown): unknown {
    if (isEmptyValue(value)) return '';
    if (!isScalar(value)) {
      throw this.error('invalid');
    }
    const text = String(value);
    return this.trim ? text.trim() : text;
  }

  protected override runValidators(value: unknown): void {
    if (typeof value !== 'string') return;
    const count = value.length;
    if (this.maxLength !== undefined && count > this.maxLength) {
      throw this.error('maxLength', { limit: this.maxLength, count });
    }
    if (this.minLength !== undefined && count < this.minLength) {
      throw this.error('minLength', { limit: this.minLength, count });
    }
  }

  protected override defaultMessages(): Record<string, string> {
    return {
      ...super.defaultMessages(),
      maxLength: 'Ensure this value has at most {limit} characters (it has {count}).',
      minLength: 'Ensure this value has at least {limit} characters (it has {count}).',
    };
  }
}

const emailSchema = z.email();

/** A {@link CharField} that only accepts email addresses. */
export class EmailField extends CharField {
  protected override runValidators(value: unknown): void {
    super.runValidators(value);
    if (!emailSchema.safeParse(value).success) {
      throw this.error('invalid');
    }
  }

  protected override defaultMessages(): Record<string, string> {
    return { ...super.defaultMessages(), invalid: 'Enter a valid email address.' };
  }
}

export interface NumberFieldOptions extends InputFieldOptions {
  minValue?: number;
  maxValue?: number;
}

abstract class NumberField extends InputField {
  readonly minValue: number | undefined;
  readonly maxValue: number | undefined;

  constructor(options: NumberFieldOptions = {}) {
    super(options);
    this.minValue = options.minValue;
    this.maxValue = options.maxValue;
  }

  protected override runValidators(value: unknown): void {
    if (typeof value !== 'number') return;
    if (this.maxValue !== undefined && value > this.maxValue) {
      throw this.error('maxValue', { limit: this.maxValue });
    }
    if (this.minValue !== undefined && value < this.minValue) {
      throw this.error('minValue', { limit: this.minValue });
    }
  }

  protected override defaultMessages(): Record<string, string> {
    return {
      ...super.defaultMessages(),
      maxValue: 'Ensure this value is less than or equal to {limit}.',
      minValue: 'Ensure this value is greater than or equal to {limit}.',
    };
  }
}

/**
 * Whole numbers. Strings such as `'42'` or `'42.0'` are accepted; `1.5`,
 * booleans and values beyond the safe integer range are not. An optional
 * empty value cleans to `null`.
 */
export class IntegerField extends NumberField {
  protected override toInternal(value: unknown): unknown {
    if (isEmptyValue(value)) return null;
    if (typeof value !== 'string' && typeof value !== 'number' && typeof value !== 'bigint') {
      throw this.error('invalid');
    }
    const text = String(value).trim().replace(TRAILING_ZERO_DECIMALS, '');
    if (!INTEGER_PATTERN.test(text)) {
      throw this.error('invalid');
    }
    const parsed = Number.parseInt(text, 10);
    if (!Number.isSafeInteger(parsed)) {
      throw this.error('invalid');
    }
    return parsed;
  }

  protected override defaultMessages(): Record<string, string> {
    return { ...super.defaultMessages(), invalid: 'Enter a whole number.' };
  }
}

/** Finite numbers, or strings holding one. An optional empty value cleans to `null`. */
export class FloatField extends NumberField {
  protected override toInternal(value: unknown): unknown {
    if (isEmptyValue(value)) return null;
    if (typeof value === 'number') {
      if (!Number.isFinite(value)) throw this.error('invalid');
      return value;
    }
    if (typeof value !== 'string' || !FLOAT_PATTERN.test(value.trim())) {
      throw this.error('invalid');
    }
    return Number.parseFloat(value.trim());
  }

  protected override defaultMessages(): Record<string, string> {
    return { ...super.defaultMessages(), invalid: 'Enter a number.' };
  }
}

/**
 * Truthiness of the raw value, except the strings `'false'` and `'0'`
 * which are false. A required field rejects only missing values; an optional
 * empty value cleans to `false`.
 */
export class BooleanField extends InputField {
  override clean(value: unknown): unknown {
    if (isEmptyValue(value)) {
      if (this.required) throw this.error('required');
      return false;
    }
    return this.toInternal(value);
  }

  protected override toInternal(value: unknown): unknown {
    if (typeof value === 'string' && ['false', '0'].includes(value.trim().toLowerCase())) {
      return false;
    }
    return Boolean(value);
  }
}

export type Choice = string | number | boolean;

export interface ChoiceFieldOptions extends InputFieldOptions {
  choices: readonly Choice[];
}

/**
 * One value out of a fixed list. Raw values are compared by their string
 * form, so `'2'` matches the choice `2`; the cleaned value is the choice
 * itself. An optional empty value cleans to `null`.
 */
export class ChoiceField extends InputField {
  readonly choices: readonly Choice[];

  constructor(options: ChoiceFieldOptions) {
    super(options);
    this.choices = options.choices;
  }

  protected override toInternal(value: unknown): unknown {
    if (isEmptyValue(value)) return null;
    if (!isScalar(value)) {
      throw this.error('invalid');
    }
    const raw = String(value);
    const match = this.choices.find((choice) => String(choice) === raw);
    if (match === undefined) {
      throw this.error('invalidChoice', { value: raw });
    }
    return match;
  }

  protected override defaultMessages(): Record<string, string> {
    return {
      ...super.defaultMessages(),
      invalidChoice: 'Select a valid choice. {value} is not one of the available choices.',
    };
  }
}

/**
 * A list whose items are each cleaned by `child`. A lone scalar is wrapped
 * into a one-item list, so a single form value works like a repeated one.
 * An optional empty value (including `[]`) cleans to `[]`.
 */
export class ListField extends InputField {
  readonly child: InputField;

  constructor(child: InputField, options: InputFieldOptions = {}) {
    super(options);
    this.child = child;
  }

  protected override toInternal(value: unknown): unknown {
    if (isEmptyValue(value)) return [];
    if (isPlainObject(value)) {
      throw this.error('invalidList');
    }
    const items: unknown[] = Array.isArray(value) ? value : [value];

    const messages: string[] = [];
    const cleaned = items.map((item, index) => {
      try {
        return this.child.clean(item);
      } catch (error) {
        if (!(error instanceof ValidationError)) throw error;
        messages.push(
          this.message('itemInvalid', { nth: index + 1, detail: error.messages.join(' ') })
        );
        return null;
      }
    });
    if (messages.length > 0) {
      throw new ValidationError(messages);
    }
    return cleaned;
  }

  protected override isEmpty(value: unknown): boolean {
    return super.isEmpty(value) || (Array.isArray(value) && value.length === 0);
  }

  protected override defaultMessages(): Record<string, string> {
    return {
      ...super.defaultMessages(),
      invalidList: 'Enter a list of values.',
      itemInvalid: 'Item {nth} in the list did not validate: {detail}',
    };
  }
}

/**
 * Validates the raw value with a zod schema. Issue messages become the
 * field's errors, prefixed with the issue path when there is one. An
 * optional empty value cleans to `null`.
 *
 * @example
 * ```ts
 * class TagDeserializer extends Deserializer {
 *   static override fields = {
 *     slug: new SchemaField(z.string().regex(/^[a-z-]+$/)),
 *   };
 * }
 * ```
 */
export class SchemaField<T extends ZodType = ZodType> extends InputField {
  readonly schema: T;

  constructor(schema: T, options: InputFieldOptions = {}) {
    super(options);
    this.schema = schema;
  }

  protected override toInternal(value: unknown): unknown {
    if (isEmptyValue(value)) return null;
    const result = this.schema.safeParse(value);
    if (!result.success) {
      throw new ValidationError(
        result.error.issues.map((issue) =>
          issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ${issue.message}` : issue.message
        )
      );
    }
    return result.data;
  }
}

/**
 * Validates the raw value with another deserializer. The nested "not an
 * object" failure is reported as a flat list; field failures keep their
 * tree shape under this field's key.
 */
export class DeserializerField extends InputField {
  readonly deserializer: DeserializerClass;

  constructor(deserializer: DeserializerClass, options: InputFieldOptions = {}) {
    super(options);
    this.deserializer = deserializer;
  }

  override clean(value: unknown): unknown {
    if (isEmptyValue(value)) {
      if (this.required) throw this.error('required');
      return null;
    }
    return this.toInternal(value);
  }

  protected override toInternal(value: unknown): unknown {
    const nested = new this.deserializer(value);
    if (nested.isValid()) {
      return nested.data;
    }
    const errors = nested.errors;
    const nonField = errors[NON_FIELD_ERRORS];
    if (Object.keys(errors).length === 1 && Array.isArray(nonField)) {
      throw new ValidationError(nonField);
    }
    throw new ValidationError(errors);
  }
}
