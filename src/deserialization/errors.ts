/**
 * Recursive error map: a list of messages for flat fields, a nested tree for
 * nested deserializers.
 */
export interface ErrorTree {
  [field: string]: string[] | ErrorTree;
}

/** Key holding errors that concern the whole input rather than one field. */
export const NON_FIELD_ERRORS = '__all__';

/**
 * Raised by fields while cleaning a value. Caught by the owning deserializer
 * and turned into an entry of its error tree.
 */
export class ValidationError extends Error {
  readonly detail: string[] | ErrorTree;

  constructor(detail: string | string[] | ErrorTree) {
    const normalized = typeof detail === 'string' ? [detail] : detail;
    super(Array.isArray(normalized) ? normalized.join(' ') : 'Nested validation failed');
    this.name = 'ValidationError';
    this.detail = normalized;
  }

  get messages(): string[] {
    return Array.isArray(this.detail) ? this.detail : collectMessages(this.detail);
  }
}

function collectMessages(tree: ErrorTree): string[] {
  return Object.values(tree).flatMap((entry) => (Array.isArray(entry) ? entry : collectMessages(entry)));
}

export function isErrorTreeEmpty(tree: ErrorTree): boolean {
  return Object.keys(tree).length === 0;
}
