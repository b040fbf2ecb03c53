import { HTTPException } from 'hono/http-exception';
import type { ZodError } from 'zod';
import type { ContentfulStatusCode } from 'hono/utils/http-status';

/**
 * Valid HTTP status codes for API exceptions.
 * Uses Hono's ContentfulStatusCode which excludes informational codes (1xx).
 */
export type ApiStatusCode = ContentfulStatusCode;

/**
 * Base API exception that extends Hono's HTTPException.
 * Provides structured error responses with code, message, and optional details.
 *
 * @example
 * ```ts
 * throw new ApiException('Something went wrong', 500, 'INTERNAL_ERROR');
 * throw new ApiException('Invalid input', 400, 'VALIDATION_ERROR', { field: 'email' });
 * ```
 */
export class ApiException extends HTTPException {
  public readonly code: string;
  public readonly details?: unknown;

  constructor(
    message: string,
    status: ApiStatusCode = 500,
    code: string = 'INTERNAL_ERROR',
    details?: unknown
  ) {
    super(status, { message });
    this.name = 'ApiException';
    this.code = code;
    this.details = details;
  }

  /**
   * Converts the exception to the JSON error envelope.
   */
  toJSON() {
    const errorObj: { code: string; message: string; details?: unknown } = {
      code: this.code,
      message: this.message,
    };
    if (this.details) {
      errorObj.details = this.details;
    }
    return {
      success: false as const,
      error: errorObj,
    };
  }

  /**
   * Gets the HTTP status code.
   * Alias for compatibility with code expecting 'statusCode' property.
   */
  get statusCode(): ApiStatusCode {
    return this.status;
  }
}

// ============================================================================
// Transport Exceptions
// ============================================================================

export class BadRequestException extends ApiException {
  constructor(message: string = 'Bad request.', details?: unknown) {
    super(message, 400, 'BAD_REQUEST', details);
    this.name = 'BadRequestException';
  }
}

export class InputValidationException extends ApiException {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', details);
    this.name = 'InputValidationException';
  }

  static fromZodError(error: ZodError): InputValidationException {
    const issues = error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
      code: issue.code,
    }));

    return new InputValidationException('Validation failed', issues);
  }
}

export class UnauthorizedException extends ApiException {
  constructor(message: string = 'Unauthorized operation. Maybe forgot the authentication step?') {
    super(message, 401, 'UNAUTHORIZED');
    this.name = 'UnauthorizedException';
  }
}

export class ForbiddenException extends ApiException {
  constructor(message: string = 'Forbidden operation. Make sure you have the right permissions.') {
    super(message, 403, 'FORBIDDEN');
    this.name = 'ForbiddenException';
  }
}

export class NotFoundException extends ApiException {
  constructor(message: string = 'The requested resource is not found.') {
    super(message, 404, 'NOT_FOUND');
    this.name = 'NotFoundException';
  }
}

export class MethodNotAllowedException extends ApiException {
  constructor(message: string = 'HTTP method not allowed.') {
    super(message, 405, 'METHOD_NOT_ALLOWED');
    this.name = 'MethodNotAllowedException';
  }
}

export class UnsupportedMediaTypeException extends ApiException {
  constructor(message: string = "Unsupported media type. Check your request's Content-Type.") {
    super(message, 415, 'UNSUPPORTED_MEDIA_TYPE');
    this.name = 'UnsupportedMediaTypeException';
  }
}

export class InternalServerErrorException extends ApiException {
  static readonly defaultMessage = 'An unknown server error occurred.';

  constructor(message: string = InternalServerErrorException.defaultMessage) {
    super(message, 500, 'INTERNAL_ERROR');
    this.name = 'InternalServerErrorException';
  }
}

export class ServiceUnavailableException extends ApiException {
  constructor(message: string = 'The requested service is unavailable.') {
    super(message, 503, 'SERVICE_UNAVAILABLE');
    this.name = 'ServiceUnavailableException';
  }
}

// ============================================================================
// Schema Exceptions
// ============================================================================

/**
 * Raised when a required serializer field cannot be fetched or coerced.
 */
export class SerializationException extends ApiException {
  constructor(message: string, details?: unknown) {
    super(message, 500, 'SERIALIZATION_ERROR', details);
    this.name = 'SerializationException';
  }
}

/**
 * Raised at declaration time for malformed schemas, fields or view options.
 */
export class ConfigurationException extends ApiException {
  constructor(message: string, details?: unknown) {
    super(message, 500, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationException';
  }
}
