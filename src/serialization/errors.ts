/**
 * Raised by getters when the attribute path or key is missing on the source.
 */
export class MissingAttributeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MissingAttributeError';
  }
}

/**
 * Raised by `toValue()` when a value cannot be converted.
 */
export class CoercionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CoercionError';
  }
}

/**
 * Failures that a serializer absorbs for optional fields and reports for
 * required ones. Anything else propagates untouched.
 */
export function isFieldFailure(error: unknown): error is Error {
  return (
    error instanceof MissingAttributeError ||
    error instanceof CoercionError ||
    error instanceof TypeError
  );
}
