import type { Context } from 'hono';
import type { FormRejection } from '../config/index.js';
import {
  BadRequestException,
  ForbiddenException,
  UnsupportedMediaTypeException,
} from '../core/exceptions.js';
import { FORM_CONTENT_TYPES, isPayloadMethod, mediaType } from '../core/http.js';
import type { QueryParams } from './types.js';

export const MALFORMED_JSON_MESSAGE = 'Malformed JSON payload.';

/**
 * Collapses single-valued query keys to a string; repeated keys stay lists.
 */
export function normalizeQueries(queries: Record<string, string[]>): QueryParams {
  const params: QueryParams = {};
  for (const [key, values] of Object.entries(queries)) {
    params[key] = values.length > 1 ? values : (values[0] ?? '');
  }
  return params;
}

export interface PayloadOptions {
  allowForms: boolean;
  formRejection: FormRejection;
}

/**
 * Reads the request body of POST, PUT and PATCH requests.
 *
 * - form payloads are parsed (repeated keys become lists) when allowed,
 *   otherwise rejected with 403 or 415;
 * - any other body is parsed as JSON, an empty body being `null`;
 * - other methods have no payload.
 */
export async function extractPayload(c: Context, options: PayloadOptions): Promise<unknown> {
  if (!isPayloadMethod(c.req.method.toUpperCase())) {
    return null;
  }

  if (FORM_CONTENT_TYPES.includes(mediaType(c.req.header('Content-Type')))) {
    if (!options.allowForms) {
      throw options.formRejection === 'unsupported-media-type'
        ? new UnsupportedMediaTypeException()
        : new ForbiddenException();
    }
    const form = await c.req.parseBody({ all: true });
    return { ...form };
  }

  const text = await c.req.text();
  if (text.trim() === '') {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    throw new BadRequestException(MALFORMED_JSON_MESSAGE);
  }
}
