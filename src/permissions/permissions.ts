import { getUser } from '../core/context-helpers.js';
import { isSafeMethod } from '../core/http.js';
import { NotImplementedError, orOf } from './operators.js';
import type { Permission, PermissionContext } from './types.js';

/**
 * Builds a permission from a plain predicate.
 *
 * @example
 * ```ts
 * const IsOwner = definePermission(
 *   'IsOwner',
 *   ({ ctx }) => getUser(ctx)?.id === ctx.req.param('userId'),
 *   'Allows the view access to the owner of the resource.'
 * );
 * ```
 */
export function definePermission<C = PermissionContext>(
  name: string,
  check: (context: C) => boolean,
  description = ''
): Permission<C> {
  return { name, description, hasPermission: check };
}

/**
 * Class-based permissions. The name is the class name; subclasses override
 * `hasPermission()` and may set a `description`.
 *
 * @example
 * ```ts
 * class IsWeekday extends BasePermission {
 *   override readonly description = 'Allows access from Monday to Friday.';
 *
 *   override hasPermission(): boolean {
 *     const day = new Date().getDay();
 *     return day > 0 && day < 6;
 *   }
 * }
 * ```
 */
export class BasePermission implements Permission {
  readonly description: string = '';

  get name(): string {
    return this.constructor.name;
  }

  hasPermission(_context: PermissionContext): boolean {
    throw new NotImplementedError('`hasPermission()` method should be defined in subclasses');
  }
}

function userHasRole(ctx: PermissionContext['ctx'], role: string): boolean {
  return getUser(ctx)?.roles?.includes(role) ?? false;
}

// ============================================================================
// Built-in permissions
// ============================================================================

export const AllowAny = definePermission('AllowAny', () => true, 'Allows everybody to access the view.');

export const IsAuthenticated = definePermission(
  'IsAuthenticated',
  ({ ctx }) => getUser(ctx) !== undefined,
  'Allows the view access to authenticated users only.'
);

export const IsStaff = definePermission(
  'IsStaff',
  ({ ctx }) => userHasRole(ctx, 'staff'),
  'Allows the view access to staff users only.'
);

export const IsAdmin = definePermission(
  'IsAdmin',
  ({ ctx }) => userHasRole(ctx, 'admin'),
  'Allows the view access to admin users only.'
);

export const IsReadOnly = definePermission(
  'IsReadOnly',
  ({ method }) => isSafeMethod(method),
  'Allows the view access to read-only http methods: GET, HEAD and OPTIONS.'
);

export const IsAuthenticatedOrReadOnly = orOf(IsAuthenticated, IsReadOnly);

// ============================================================================
// Permission factories
// ============================================================================

/**
 * Allows users holding at least one of the roles.
 */
export function hasRole(...roles: string[]): Permission {
  return definePermission(
    `HasRole(${roles.join('|')})`,
    ({ ctx }) => roles.some((role) => userHasRole(ctx, role)),
    `Allows users with role: ${roles.join(' or ')}.`
  );
}

/**
 * Allows users holding all of the permissions.
 */
export function hasPermissions(...permissions: string[]): Permission {
  return definePermission(
    `HasPermissions(${permissions.join(',')})`,
    ({ ctx }) => {
      const granted = getUser(ctx)?.permissions ?? [];
      return permissions.every((permission) => granted.includes(permission));
    },
    `Allows users with permissions: ${permissions.join(', ')}.`
  );
}
