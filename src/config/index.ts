/**
 * Global defaults for views created with `apiView` / `apiViewSet`.
 *
 * Options passed to a view win over these settings.
 *
 * @example
 * ```ts
 * import { configureViews } from 'hono-restkit';
 *
 * configureViews({
 *   allowForms: true,
 *   errorHandler: { includeStackTrace: process.env.NODE_ENV !== 'production' },
 * });
 * ```
 */

import { z } from 'zod';
import type { ErrorHandlerConfig } from '../core/error-handler.js';
import { ConfigurationException } from '../core/exceptions.js';
import { ALL_METHODS } from '../core/http.js';
import { isPlainObject } from '../utils.js';

// ============================================================================
// Schemas
// ============================================================================

/**
 * How a view answers form-encoded payloads when forms are not allowed.
 */
export const formRejectionSchema = z.enum(['forbidden', 'unsupported-media-type']);

export type FormRejection = z.infer<typeof formRejectionSchema>;

/** Accepts method names in any case and upper-cases them. */
export const httpMethodSchema = z
  .string()
  .transform((method) => method.toUpperCase())
  .pipe(z.enum(ALL_METHODS));

export const viewSettingsSchema = z.object({
  /** Parse form-encoded payloads instead of rejecting them */
  allowForms: z.boolean(),
  /** Rejection used for form payloads when `allowForms` is false */
  formRejection: formRejectionSchema,
  /** Methods a view answers; others get 405 */
  allowedMethods: z.array(httpMethodSchema).min(1),
  /** Options of the error handler each view uses */
  errorHandler: z.custom<ErrorHandlerConfig>((value) => isPlainObject(value), {
    message: 'errorHandler must be an options object',
  }),
});

export type ViewSettings = z.infer<typeof viewSettingsSchema>;

/** Settings as callers write them: every key optional, methods in any case. */
export type ViewSettingsInput = Partial<z.input<typeof viewSettingsSchema>>;

// ============================================================================
// Registry
// ============================================================================

const DEFAULT_SETTINGS: ViewSettings = {
  allowForms: false,
  formRejection: 'forbidden',
  allowedMethods: [...ALL_METHODS],
  errorHandler: {},
};

let currentSettings: ViewSettings = DEFAULT_SETTINGS;

/**
 * Validates a partial settings object. Throws ConfigurationException with
 * the zod issues as details.
 */
export function parseViewSettings(input: unknown): Partial<ViewSettings> {
  const result = viewSettingsSchema.partial().safeParse(input);
  if (!result.success) {
    throw new ConfigurationException(
      'Invalid view settings',
      result.error.issues.map((issue) => ({
        path: issue.path.map(String).join('.'),
        message: issue.message,
      }))
    );
  }
  return result.data;
}

/**
 * Merges the given settings into the global view defaults.
 */
export function configureViews(settings: ViewSettingsInput): ViewSettings {
  currentSettings = { ...currentSettings, ...parseViewSettings(settings) };
  return currentSettings;
}

/** Current global view defaults. */
export function getViewSettings(): ViewSettings {
  return currentSettings;
}

/** Restores the built-in defaults. Intended for tests. */
export function resetViewSettings(): void {
  currentSettings = DEFAULT_SETTINGS;
}
