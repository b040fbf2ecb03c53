import { capitalize, hasOwn, isPlainObject } from '../utils.js';
import { NON_FIELD_ERRORS, ValidationError, isErrorTreeEmpty, type ErrorTree } from './errors.js';
import { isEmptyValue, type EmptyValue, type InputField, type InputFieldMap } from './field.js';

export const NOT_AN_OBJECT_MESSAGE = 'This field should be an object.';

export type CleanedData = Record<string, unknown> | EmptyValue;

export type DeserializerState = 'unvalidated' | 'validating' | 'valid' | 'invalid';

export type DeserializerClass = typeof Deserializer;

interface CompiledInput {
  name: string;
  field: InputField;
  /** Name of the `postClean<Field>` method, when the class defines one. */
  postClean: string | null;
}

const compiledCache = new WeakMap<DeserializerClass, readonly CompiledInput[]>();

/**
 * Resolves the fields of a deserializer class and its `postClean<Field>`
 * hooks. Runs once per class.
 */
export function compileDeserializer(cls: DeserializerClass): readonly CompiledInput[] {
  const cached = compiledCache.get(cls);
  if (cached) return cached;

  const compiled = Object.freeze(
    Object.entries(cls.fields).map(([name, field]): CompiledInput => {
      const hook = `postClean${capitalize(name)}`;
      const postClean = typeof Reflect.get(cls.prototype, hook) === 'function' ? hook : null;
      return { name, field, postClean };
    })
  );
  compiledCache.set(cls, compiled);
  return compiled;
}

export function isDeserializerClass(value: unknown): value is DeserializerClass {
  return (
    typeof value === 'function' && (value === Deserializer || value.prototype instanceof Deserializer)
  );
}

/**
 * Validates untyped input (a parsed JSON body, normalized form data) against
 * a static map of fields.
 *
 * Validation runs on first access to `errors`, `data` or `isValid()` and is
 * kept for the lifetime of the instance.
 *
 * @example
 * ```ts
 * class CreateUserDeserializer extends Deserializer {
 *   static override fields = {
 *     email: new EmailField(),
 *     age: new IntegerField({ required: false, minValue: 0 }),
 *     heightCm: new FloatField({ required: false }),
 *   };
 *
 *   postCleanHeightCm(value: unknown) {
 *     return typeof value === 'number' ? value / 100 : value;
 *   }
 * }
 *
 * const deserializer = new CreateUserDeserializer(await c.req.json());
 * if (!deserializer.isValid()) {
 *   return c.json({ errors: deserializer.errors }, 400);
 * }
 * ```
 */
export class Deserializer {
  static fields: InputFieldMap = {};

  readonly initialData: unknown;

  protected cleanedData: CleanedData = {};
  private errorTree: ErrorTree = {};
  private currentState: DeserializerState = 'unvalidated';

  constructor(data?: unknown) {
    this.initialData = data;
  }

  /** Declared fields, in declaration order. */
  static declaredFields(): Array<[string, InputField]> {
    return Object.entries(this.fields);
  }

  get state(): DeserializerState {
    return this.currentState;
  }

  get errors(): ErrorTree {
    this.ensureValidated();
    return this.errorTree;
  }

  /**
   * Cleaned data. Fields that failed validation are absent; an empty input
   * is returned as-is.
   */
  get data(): CleanedData {
    this.ensureValidated();
    return this.cleanedData;
  }

  isValid(): boolean {
    return isErrorTreeEmpty(this.errors);
  }

  /**
   * Runs validation, replacing any earlier result.
   */
  fullClean(): void {
    if (this.currentState === 'validating') {
      throw new Error(`${this.constructor.name}.fullClean() called during validation`);
    }
    this.currentState = 'validating';
    this.errorTree = {};
    this.cleanedData = {};
    try {
      this.cleanFields();
    } catch (error) {
      if (!(error instanceof ValidationError)) {
        this.currentState = 'unvalidated';
        throw error;
      }
      this.addError(null, error);
    }
    this.currentState = isErrorTreeEmpty(this.errorTree) ? 'valid' : 'invalid';
  }

  protected cleanFields(): void {
    const data = this.initialData;
    if (isEmptyValue(data)) {
      this.cleanedData = data;
      return;
    }
    if (!isPlainObject(data)) {
      throw new ValidationError(NOT_AN_OBJECT_MESSAGE);
    }

    const cleaned: Record<string, unknown> = {};
    this.cleanedData = cleaned;
    for (const { name, field, postClean } of this.compiledFields()) {
      const present = hasOwn(data, name);
      if (!present && !field.required) continue;
      try {
        cleaned[name] = field.clean(present ? data[name] : null);
        if (postClean) {
          cleaned[name] = this.runPostClean(postClean, cleaned[name]);
        }
      } catch (error) {
        if (!(error instanceof ValidationError)) throw error;
        delete cleaned[name];
        if (field.required) {
          this.addError(name, error);
        }
      }
    }
  }

  /**
   * Records an error under `field`, or under `__all__` for input-level
   * errors. Nested deserializer errors keep their tree shape.
   */
  protected addError(field: string | null, error: ValidationError): void {
    this.errorTree[field ?? NON_FIELD_ERRORS] = error.detail;
  }

  protected compiledFields(): readonly CompiledInput[] {
    const cls = this.constructor;
    if (!isDeserializerClass(cls)) {
      throw new TypeError(`${cls.name} is not a Deserializer subclass`);
    }
    return compileDeserializer(cls);
  }

  private ensureValidated(): void {
    if (this.currentState === 'unvalidated') {
      this.fullClean();
    }
  }

  private runPostClean(methodName: string, value: unknown): unknown {
    const method: unknown = Reflect.get(this, methodName);
    return typeof method === 'function' ? method.call(this, value) : value;
  }
}

/**
 * Accepts any mapping: every key is copied to the cleaned data unchanged.
 */
export class AllPassDeserializer extends Deserializer {
  protected override cleanFields(): void {
    const data = this.initialData;
    if (isEmptyValue(data)) {
      this.cleanedData = data;
      return;
    }
    if (!isPlainObject(data)) {
      throw new ValidationError(NOT_AN_OBJECT_MESSAGE);
    }
    this.cleanedData = { ...data };
  }
}
