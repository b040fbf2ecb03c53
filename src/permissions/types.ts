import type { Context, Env } from 'hono';

// ============================================================================
// User Types
// ============================================================================

/**
 * User information stored in context by the application's authentication
 * middleware.
 */
export interface AuthUser {
  /** Unique user identifier */
  id: string;
  /** User's email address */
  email?: string;
  /** User's assigned roles (e.g., ['admin', 'staff']) */
  roles?: string[];
  /** User's permissions (e.g., ['users:read', 'users:write']) */
  permissions?: string[];
  /** Additional user metadata */
  metadata?: Record<string, unknown>;
}

/**
 * Hono environment variables read by the built-in permissions.
 *
 * @example
 * ```ts
 * const app = new Hono<AuthEnv>();
 * app.use('*', async (c, next) => {
 *   c.set('user', await loadUser(c));
 *   await next();
 * });
 * ```
 */
export interface AuthEnv extends Env {
  Variables: {
    /** Authenticated user, absent for anonymous requests */
    user?: AuthUser;
  };
}

// ============================================================================
// Permission Types
// ============================================================================

/**
 * What a permission sees for one request.
 */
export interface PermissionContext {
  /** Hono context of the request */
  ctx: Context;
  /** Upper-cased HTTP method */
  method: string;
  /** Name of the handler being guarded */
  handler: string;
}

/**
 * A named, stateless predicate over a request.
 */
export interface Permission<C = PermissionContext> {
  readonly name: string;
  readonly description: string;
  hasPermission(context: C): boolean;
}
