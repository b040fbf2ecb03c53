import { ValidationError } from './errors.js';

export type EmptyValue = null | undefined | '';

export function isEmptyValue(value: unknown): value is EmptyValue {
  return value === null || value === undefined || value === '';
}

export type MessageParams = Record<string, string | number>;

export interface InputFieldOptions {
  /**
   * A required field rejects empty values with the `required` message.
   * An optional one cleans them to its empty value.
   * @default true
   */
  required?: boolean;
  /** Per-key overrides of the field's error messages. */
  errorMessages?: Record<string, string>;
}

/**
 * Base class of deserializer fields: cleans one raw value into its typed
 * form or raises a {@link ValidationError}.
 *
 * Cleaning runs in three steps: `toInternal()` converts the raw value,
 * `validate()` enforces required-ness, `runValidators()` checks bounds.
 */
export abstract class InputField {
  readonly required: boolean;
  private readonly messageOverrides: Record<string, string>;

  constructor(options: InputFieldOptions = {}) {
    this.required = options.required ?? true;
    this.messageOverrides = options.errorMessages ?? {};
  }

  clean(value: unknown): unknown {
    const internal = this.toInternal(value);
    this.validate(internal);
    if (!this.isEmpty(internal)) {
      this.runValidators(internal);
    }
    return internal;
  }

  /**
   * Converts the raw value. Empty raw values map to the field's empty value;
   * unconvertible ones raise the `invalid` message.
   */
  protected abstract toInternal(value: unknown): unknown;

  protected validate(value: unknown): void {
    if (this.required && this.isEmpty(value)) {
      throw this.error('required');
    }
  }

  protected runValidators(_value: unknown): void {}

  protected isEmpty(value: unknown): boolean {
    return isEmptyValue(value);
  }

  protected defaultMessages(): Record<string, string> {
    return { required: 'This field is required.', invalid: 'Enter a valid value.' };
  }

  protected message(key: string, params: MessageParams = {}): string {
    const template = this.messageOverrides[key] ?? this.defaultMessages()[key] ?? key;
    return template.replace(/\{(\w+)\}/g, (match, name: string) =>
      name in params ? String(params[name]) : match
    );
  }

  protected error(key: string, params?: MessageParams): ValidationError {
    return new ValidationError(this.message(key, params));
  }
}

export type InputFieldMap = Record<string, InputField>;
