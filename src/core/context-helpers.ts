import type { Context, Env } from 'hono';
import type { AuthUser } from '../permissions/types.js';

/**
 * Type-safe context variable accessors.
 * Provides safe access to context variables with proper typing.
 */

/**
 * Safely retrieves a variable from the Hono context.
 * Returns undefined if the variable doesn't exist or context is invalid.
 *
 * @example
 * ```ts
 * const requestId = getContextVar<string>(ctx, 'requestId');
 * ```
 */
export function getContextVar<T>(ctx: unknown, key: string): T | undefined {
  // Access via .var property and cast through unknown for type safety
  const ctxObj = ctx as { var?: Record<string, unknown> };
  return ctxObj?.var?.[key] as T | undefined;
}

/**
 * Type-safe setter for context variables in middleware.
 * Used when the generic Env type may not include the specific variable keys.
 */
export function setContextVar<E extends Env>(ctx: Context<E>, key: string, value: unknown): void {
  (ctx as unknown as { set: (key: string, value: unknown) => void }).set(key, value);
}

/**
 * Retrieves the authenticated user object from context.
 * Set by whatever authentication middleware runs before the view; a `null`
 * user reads as anonymous.
 */
export function getUser(ctx: unknown): AuthUser | undefined {
  return getContextVar<AuthUser | null>(ctx, 'user') ?? undefined;
}

/**
 * Retrieves the request id set by `hono/request-id` (or any middleware
 * storing a `requestId` variable).
 */
export function getRequestId(ctx: unknown): string | undefined {
  return getContextVar<string>(ctx, 'requestId');
}
