// Core exports
export {
  ApiException,
  BadRequestException,
  InputValidationException,
  UnauthorizedException,
  ForbiddenException,
  NotFoundException,
  MethodNotAllowedException,
  UnsupportedMediaTypeException,
  InternalServerErrorException,
  ServiceUnavailableException,
  SerializationException,
  ConfigurationException,
} from './core/exceptions.js';
export type { ApiStatusCode } from './core/exceptions.js';
export { createErrorHandler, zodErrorMapper } from './core/error-handler.js';
export type {
  ErrorMapper,
  ErrorHook,
  ErrorHandlerConfig,
  ErrorResponseBody,
} from './core/error-handler.js';
export { getLogger, setLogger, resetLogger } from './core/logger.js';
export type { Logger } from './core/logger.js';
export { getContextVar, setContextVar, getUser, getRequestId } from './core/context-helpers.js';
export {
  ALL_METHODS,
  SAFE_METHODS,
  PAYLOAD_METHODS,
  FORM_CONTENT_TYPES,
  isHttpMethod,
  isSafeMethod,
  isPayloadMethod,
} from './core/http.js';
export type { HttpMethod, PayloadMethod } from './core/http.js';

// Configuration
export {
  configureViews,
  getViewSettings,
  resetViewSettings,
  parseViewSettings,
  viewSettingsSchema,
  formRejectionSchema,
} from './config/index.js';
export type { ViewSettings, ViewSettingsInput, FormRejection } from './config/index.js';

// Serialization
export * from './serialization/index.js';

// Deserialization
export * from './deserialization/index.js';

// Permissions
export * from './permissions/index.js';

// Views
export * from './views/index.js';
