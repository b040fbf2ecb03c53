import type { Context, Env, ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import { toError } from '../utils.js';
import { getRequestId } from './context-helpers.js';
import { ApiException, InputValidationException, InternalServerErrorException } from './exceptions.js';
import { getLogger } from './logger.js';

/**
 * Error mapper: transforms unknown errors to ApiException.
 * Return undefined to skip this mapper and try the next one.
 */
export type ErrorMapper<E extends Env = Env> = (
  error: Error,
  ctx: Context<E>
) => ApiException | undefined | Promise<ApiException | undefined>;

/**
 * Hook: called after mapping, before response (for logging/Sentry).
 * Hooks are fire-and-forget; their failures go to `onHookError` or the logger.
 */
export type ErrorHook<E extends Env = Env> = (
  error: Error,
  ctx: Context<E>,
  apiException: ApiException
) => void | Promise<void>;

/**
 * Configuration options for the error handler factory.
 */
export interface ErrorHandlerConfig<E extends Env = Env> {
  /** Custom error mappers - tried in order, first non-undefined wins */
  mappers?: ErrorMapper<E>[];
  /** Error reporting hooks (logging, Sentry, etc.) */
  hooks?: ErrorHook<E>[];
  /** Include requestId in error response if available (default: true) */
  includeRequestId?: boolean;
  /** Include stack trace in error response (default: false, never enable in production!) */
  includeStackTrace?: boolean;
  /** Default error code for unmapped errors (default: 'INTERNAL_ERROR') */
  defaultErrorCode?: string;
  /** Default error message for unmapped errors (default: 'An unknown server error occurred.') */
  defaultErrorMessage?: string;
  /** Log unmapped errors through the logger (default: true) */
  logUnmappedErrors?: boolean;
  /** Called when a hook throws an error */
  onHookError?: (hookError: Error, originalError: Error, ctx: Context<E>) => void;
}

/**
 * The `error` member of an error response.
 */
export interface ErrorResponseBody {
  code: string;
  message: string;
  details?: unknown;
  requestId?: string;
  stack?: string;
}

/**
 * Built-in mapper for ZodError to InputValidationException.
 */
export const zodErrorMapper = (error: Error): ApiException | undefined => {
  if (error instanceof ZodError) {
    return InputValidationException.fromZodError(error);
  }
  return undefined;
};

/**
 * Creates a standardized global error handler for Hono apps.
 *
 * This catches all errors (including non-ApiException errors) and converts
 * them to the standard JSON response format. Views created with `apiView`
 * route their errors through it; it can also be installed app-wide.
 *
 * @example Basic usage:
 * ```typescript
 * const app = new Hono();
 * app.onError(createErrorHandler());
 * ```
 *
 * @example With custom mappers and hooks:
 * ```typescript
 * app.onError(createErrorHandler({
 *   mappers: [
 *     (error) => {
 *       if (error instanceof OrderLockedError) {
 *         return new ApiException('Order is locked', 409, 'CONFLICT');
 *       }
 *     },
 *   ],
 *   hooks: [
 *     (error, ctx, apiException) => {
 *       if (apiException.status >= 500) {
 *         Sentry.captureException(error);
 *       }
 *     },
 *   ],
 * }));
 * ```
 */
export function createErrorHandler<E extends Env = Env>(
  config: ErrorHandlerConfig<E> = {}
): ErrorHandler<E> {
  const {
    mappers = [],
    hooks = [],
    includeRequestId = true,
    includeStackTrace = false,
    defaultErrorCode = 'INTERNAL_ERROR',
    defaultErrorMessage = InternalServerErrorException.defaultMessage,
    logUnmappedErrors = true,
    onHookError,
  } = config;

  // Combine custom mappers with built-in mappers
  const allMappers: ErrorMapper<E>[] = [...mappers, zodErrorMapper];

  const reportHookError = (hookErr: unknown, err: Error, ctx: Context<E>): void => {
    const hookError = toError(hookErr);
    if (onHookError) {
      onHookError(hookError, err, ctx);
    } else {
      getLogger().warn('Error hook failed', { error: hookError.message });
    }
  };

  const resolve = async (err: Error, ctx: Context<E>): Promise<ApiException> => {
    // Step 1: Check if error is already ApiException (extends HTTPException)
    if (err instanceof ApiException) {
      return err;
    }
    // Step 1b: Handle plain HTTPException (from Hono's built-in handlers)
    if (err instanceof HTTPException) {
      return new ApiException(err.message, err.status, 'HTTP_ERROR');
    }

    // Step 2: Try custom mappers in order
    for (const mapper of allMappers) {
      try {
        const mapped = await mapper(err, ctx);
        if (mapped) {
          return mapped;
        }
      } catch (mapperErr) {
        getLogger().warn('Error mapper failed', { error: toError(mapperErr).message });
      }
    }

    // Step 3: Fall back to generic 500 error
    if (logUnmappedErrors) {
      getLogger().error('Unmapped error', { error: err.message, name: err.name, stack: err.stack });
    }
    return new ApiException(defaultErrorMessage, 500, defaultErrorCode);
  };

  return async (err: Error, ctx: Context<E>): Promise<Response> => {
    const apiException = await resolve(err, ctx);

    // Step 4: Run hooks (fire-and-forget)
    for (const hook of hooks) {
      try {
        const result = hook(err, ctx, apiException);
        if (result instanceof Promise) {
          result.catch((hookErr: unknown) => reportHookError(hookErr, err, ctx));
        }
      } catch (hookErr) {
        reportHookError(hookErr, err, ctx);
      }
    }

    // Step 5: Build response
    const { success, error } = apiException.toJSON();
    const body: ErrorResponseBody = { ...error };

    if (includeRequestId) {
      const requestId = getRequestId(ctx);
      if (requestId) {
        body.requestId = requestId;
      }
    }

    // Add stack trace if enabled (development only!)
    if (includeStackTrace && err.stack) {
      body.stack = err.stack;
    }

    return ctx.json({ success, error: body }, apiException.status);
  };
}
