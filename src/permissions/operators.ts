import type { Permission, PermissionContext } from './types.js';

/**
 * Raised when an abstract operation is evaluated without an implementation.
 */
export class NotImplementedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotImplementedError';
  }
}

/**
 * Base class of two-operand permission combinators. Subclasses set
 * `operatorName` and override `calculate()`.
 *
 * Both operands are evaluated on every call; there is no short-circuit.
 */
export class BinaryOperator<C = PermissionContext> implements Permission<C> {
  protected readonly operatorName: string = '';

  constructor(
    readonly first: Permission<C>,
    readonly second: Permission<C>
  ) {}

  get name(): string {
    return `(${this.first.name}${this.operatorName}${this.second.name})`;
  }

  get description(): string {
    return `(${this.first.description}) ${this.operatorName} (${this.second.description})`;
  }

  hasPermission(context: C): boolean {
    const firstResult = this.first.hasPermission(context);
    const secondResult = this.second.hasPermission(context);
    return this.calculate(firstResult, secondResult);
  }

  protected calculate(_first: boolean, _second: boolean): boolean {
    throw new NotImplementedError('`calculate()` method should be defined in subclasses');
  }
}

/**
 * Base class of one-operand permission combinators.
 */
export class UnaryOperator<C = PermissionContext> implements Permission<C> {
  protected readonly operatorName: string = '';

  constructor(readonly operand: Permission<C>) {}

  get name(): string {
    return `(${this.operatorName}${this.operand.name})`;
  }

  get description(): string {
    return `${this.operatorName}(${this.operand.description})`;
  }

  hasPermission(context: C): boolean {
    return this.calculate(this.operand.hasPermission(context));
  }

  protected calculate(_value: boolean): boolean {
    throw new NotImplementedError('`calculate()` method should be defined in subclasses');
  }
}

export class AndOperator<C = PermissionContext> extends BinaryOperator<C> {
  protected override readonly operatorName = '_AND_';

  protected override calculate(first: boolean, second: boolean): boolean {
    return first && second;
  }
}

export class OrOperator<C = PermissionContext> extends BinaryOperator<C> {
  protected override readonly operatorName = '_OR_';

  protected override calculate(first: boolean, second: boolean): boolean {
    return first || second;
  }
}

export class XorOperator<C = PermissionContext> extends BinaryOperator<C> {
  protected override readonly operatorName = '_XOR_';

  protected override calculate(first: boolean, second: boolean): boolean {
    return first !== second;
  }
}

export class NotOperator<C = PermissionContext> extends UnaryOperator<C> {
  protected override readonly operatorName = 'NOT_';

  protected override calculate(value: boolean): boolean {
    return !value;
  }
}

// ============================================================================
// Combinator functions
// ============================================================================

/**
 * Grants access when both permissions do.
 *
 * @example
 * ```ts
 * const CanPublish = andOf(IsAuthenticated, hasRole('editor'));
 * CanPublish.name; // '(IsAuthenticated_AND_HasRole(editor))'
 * ```
 */
export function andOf<C = PermissionContext>(first: Permission<C>, second: Permission<C>): Permission<C> {
  return new AndOperator(first, second);
}

/** Grants access when either permission does. */
export function orOf<C = PermissionContext>(first: Permission<C>, second: Permission<C>): Permission<C> {
  return new OrOperator(first, second);
}

/** Grants access when exactly one of the permissions does. */
export function xorOf<C = PermissionContext>(first: Permission<C>, second: Permission<C>): Permission<C> {
  return new XorOperator(first, second);
}

/** Inverts a permission. */
export function notOf<C = PermissionContext>(permission: Permission<C>): Permission<C> {
  return new NotOperator(permission);
}

/**
 * Left fold of {@link andOf}: `allOf(A, B, C)` is `andOf(andOf(A, B), C)`.
 */
export function allOf<C = PermissionContext>(
  first: Permission<C>,
  ...rest: Permission<C>[]
): Permission<C> {
  return rest.reduce<Permission<C>>((acc, permission) => andOf(acc, permission), first);
}

/**
 * Left fold of {@link orOf}.
 */
export function anyOf<C = PermissionContext>(
  first: Permission<C>,
  ...rest: Permission<C>[]
): Permission<C> {
  return rest.reduce<Permission<C>>((acc, permission) => orOf(acc, permission), first);
}
