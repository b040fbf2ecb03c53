/**
 * HTTP method constants.
 * @see https://developer.mozilla.org/en-US/docs/Web/HTTP/Methods
 */

export const ALL_METHODS = [
  'HEAD',
  'GET',
  'POST',
  'PUT',
  'PATCH',
  'DELETE',
  'OPTIONS',
  'TRACE',
  'CONNECT',
] as const;

export type HttpMethod = (typeof ALL_METHODS)[number];

/** Read-only methods. */
export const SAFE_METHODS: readonly HttpMethod[] = ['GET', 'HEAD', 'OPTIONS'];

/** Methods whose body is extracted and deserialized. */
export const PAYLOAD_METHODS = ['POST', 'PUT', 'PATCH'] as const;

export type PayloadMethod = (typeof PAYLOAD_METHODS)[number];

export const FORM_CONTENT_TYPES: readonly string[] = [
  'application/x-www-form-urlencoded',
  'multipart/form-data',
];

export function isHttpMethod(value: string): value is HttpMethod {
  return (ALL_METHODS as readonly string[]).includes(value);
}

export function isSafeMethod(value: string): boolean {
  return (SAFE_METHODS as readonly string[]).includes(value);
}

export function isPayloadMethod(value: string): value is PayloadMethod {
  return (PAYLOAD_METHODS as readonly string[]).includes(value);
}

/**
 * Extracts the media type from a Content-Type header, without parameters.
 */
export function mediaType(contentType: string | undefined): string {
  if (!contentType) return '';
  return contentType.split(';')[0].trim().toLowerCase();
}
