import type { Env, MiddlewareHandler } from 'hono';
import { ForbiddenException } from '../core/exceptions.js';
import type { Permission, PermissionContext } from './types.js';

/**
 * Creates a middleware that rejects the request with 403 unless the
 * permission grants access. `handler` in the permission context is the
 * matched route path.
 *
 * @example
 * ```ts
 * app.use('/admin/*', requirePermission(IsAdmin));
 * app.use('/posts/*', requirePermission(IsAuthenticatedOrReadOnly, 'Sign in to write posts.'));
 * ```
 */
export function requirePermission<E extends Env = Env>(
  permission: Permission<PermissionContext>,
  message?: string
): MiddlewareHandler<E> {
  return async (ctx, next) => {
    const allowed = permission.hasPermission({
      ctx,
      method: ctx.req.method.toUpperCase(),
      handler: ctx.req.routePath,
    });
    if (!allowed) {
      throw new ForbiddenException(message);
    }
    await next();
  };
}
