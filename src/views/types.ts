import type { Context, Env } from 'hono';
import type { FormRejection } from '../config/index.js';
import type { ErrorHandlerConfig } from '../core/error-handler.js';
import type { HttpMethod, PayloadMethod } from '../core/http.js';
import type { CleanedData, DeserializerClass } from '../deserialization/index.js';
import type { Permission } from '../permissions/index.js';

/** Query string values: one occurrence is a string, repeats are a list. */
export type QueryParams = Record<string, string | string[]>;

/** Route parameters, as matched by Hono. */
export type UrlParams = Record<string, string>;

/**
 * Extracted request data handed to a view handler.
 */
export interface ViewArgs {
  urlParams: UrlParams;
  queryParams: QueryParams;
  /** Cleaned payload for POST, PUT and PATCH; `null` for other methods. */
  deserializedData: CleanedData | null;
}

export type ViewHandler<E extends Env = Env> = (
  c: Context<E>,
  args: ViewArgs
) => Response | Promise<Response>;

/** A decorated handler, ready to be registered on a Hono route. */
export type View<E extends Env = Env> = (c: Context<E>) => Promise<Response>;

/**
 * A deserializer for every payload method, or a map keyed by POST, PUT or
 * PATCH (in any case). Methods left out of the map accept any mapping.
 */
export type DeserializerOption = DeserializerClass | Readonly<Record<string, DeserializerClass>>;

export interface ApiViewOptions {
  /** Permission checked before the payload is read (default: AllowAny) */
  permission?: Permission;
  /** Methods answered by the view; others get 405 (default: all methods) */
  allowedMethods?: readonly string[];
  /** Payload validation (default: AllPassDeserializer) */
  deserializer?: DeserializerOption;
  /** Parse form-encoded payloads instead of rejecting them */
  allowForms?: boolean;
  /** Rejection used for form payloads when forms are not allowed */
  formRejection?: FormRejection;
  /** Options of the error handler that renders failures */
  errorHandler?: ErrorHandlerConfig;
  /** Handler name passed to permissions (default: the function's name) */
  name?: string;
}

/** Resolved view options, after merging with the global settings. */
export interface ResolvedViewOptions {
  permission: Permission;
  allowedMethods: readonly HttpMethod[];
  deserializers: ReadonlyMap<PayloadMethod, DeserializerClass>;
  allowForms: boolean;
  formRejection: FormRejection;
  errorHandler: ErrorHandlerConfig;
}

/**
 * Per-method handlers of a view set. Keys are lower-case method names.
 */
export type ViewSetBundle<E extends Env = Env> = Partial<Record<Lowercase<HttpMethod>, ViewHandler<E>>>;

export interface ViewSet<E extends Env, T extends ViewSetBundle<E>> {
  /** Routes the request to the handler for its method, or answers 405 */
  dispatch: View<E>;
  /** Decorated handlers, keyed by upper-case method */
  handlers: ReadonlyMap<HttpMethod, View<E>>;
  /** The undecorated bundle */
  target: T;
}
