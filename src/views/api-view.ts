import type { Context, Env } from 'hono';
import { createErrorHandler } from '../core/error-handler.js';
import { BadRequestException, MethodNotAllowedException, ForbiddenException } from '../core/exceptions.js';
import { ALL_METHODS, isHttpMethod, isPayloadMethod, type HttpMethod } from '../core/http.js';
import type { CleanedData } from '../deserialization/index.js';
import { toError } from '../utils.js';
import { resolveViewOptions } from './options.js';
import { extractPayload, normalizeQueries } from './payload.js';
import type {
  ApiViewOptions,
  ResolvedViewOptions,
  UrlParams,
  View,
  ViewHandler,
  ViewSet,
  ViewSetBundle,
} from './types.js';

const BUNDLE_KEYS = {
  HEAD: 'head',
  GET: 'get',
  POST: 'post',
  PUT: 'put',
  PATCH: 'patch',
  DELETE: 'delete',
  OPTIONS: 'options',
  TRACE: 'trace',
  CONNECT: 'connect',
} as const satisfies Record<HttpMethod, Lowercase<HttpMethod>>;

function decorate<E extends Env>(
  handler: ViewHandler<E>,
  handlerName: string,
  options: ResolvedViewOptions
): View<E> {
  const handleError = createErrorHandler(options.errorHandler);
  const allowedMethods: readonly string[] = options.allowedMethods;

  return async (c: Context): Promise<Response> => {
    try {
      const method = c.req.method.toUpperCase();
      if (!allowedMethods.includes(method)) {
        throw new MethodNotAllowedException();
      }
      if (!options.permission.hasPermission({ ctx: c, method, handler: handlerName })) {
        throw new ForbiddenException();
      }

      const queryParams = normalizeQueries(c.req.queries());
      const urlParams = c.req.param() as UrlParams;
      const payload = await extractPayload(c, options);

      let deserializedData: CleanedData | null = null;
      const deserializerClass = isPayloadMethod(method) ? options.deserializers.get(method) : undefined;
      if (deserializerClass) {
        const deserializer = new deserializerClass(payload);
        if (!deserializer.isValid()) {
          throw new BadRequestException(undefined, deserializer.errors);
        }
        deserializedData = deserializer.data;
      }

      return await handler(c, { urlParams, queryParams, deserializedData });
    } catch (error) {
      return handleError(toError(error), c);
    }
  };
}

/**
 * Decorates a Hono handler: checks the method and permission, reads and
 * validates the payload, and renders every failure as a JSON error.
 *
 * @example
 * ```ts
 * class CreatePostDeserializer extends Deserializer {
 *   static override fields = { title: new inputs.CharField({ maxLength: 120 }) };
 * }
 *
 * const createPost = apiView({
 *   allowedMethods: ['POST'],
 *   permission: IsAuthenticated,
 *   deserializer: CreatePostDeserializer,
 * })(async (c, { deserializedData }) => {
 *   const post = await posts.create(deserializedData);
 *   return c.json(new PostSerializer(post).data, 201);
 * });
 *
 * app.post('/posts', createPost);
 * ```
 */
export function apiView<E extends Env = Env>(
  options: ApiViewOptions = {}
): (handler: ViewHandler<E>) => View<E> {
  const resolved = resolveViewOptions(options);
  return (handler) => decorate(handler, options.name ?? (handler.name || 'view'), resolved);
}

/**
 * Decorates every per-method handler of a bundle (`get`, `post`, ...) with
 * the same options. `dispatch` routes a request to the handler for its
 * method and answers 405 when the bundle has none.
 *
 * @example
 * ```ts
 * class PostViews {
 *   async get(c: Context) {
 *     return c.json(new PostSerializer(await posts.list(), { many: true }).data);
 *   }
 *
 *   async post(c: Context, { deserializedData }: ViewArgs) {
 *     return c.json(new PostSerializer(await posts.create(deserializedData)).data, 201);
 *   }
 * }
 *
 * const views = apiViewSet({ permission: IsAuthenticatedOrReadOnly })(new PostViews());
 * app.on(['GET', 'POST'], '/posts', views.dispatch);
 * ```
 */
export function apiViewSet<E extends Env = Env>(
  options: ApiViewOptions = {}
): <T extends ViewSetBundle<E>>(bundle: T) => ViewSet<E, T> {
  const resolved = resolveViewOptions(options);

  return <T extends ViewSetBundle<E>>(bundle: T): ViewSet<E, T> => {
    const baseName = options.name ?? bundle.constructor.name;
    const handlers = new Map<HttpMethod, View<E>>();

    for (const method of ALL_METHODS) {
      const key = BUNDLE_KEYS[method];
      const handler: ViewHandler<E> | undefined = bundle[key];
      if (!handler) continue;
      const bound: ViewHandler<E> = (c, args) => handler.call(bundle, c, args);
      handlers.set(method, decorate(bound, `${baseName}.${key}`, resolved));
    }

    const handleError = createErrorHandler(resolved.errorHandler);
    const dispatch = async (c: Context): Promise<Response> => {
      const method = c.req.method.toUpperCase();
      const view = isHttpMethod(method) ? handlers.get(method) : undefined;
      if (!view) {
        return handleError(new MethodNotAllowedException(), c);
      }
      return view(c);
    };

    return { dispatch, handlers, target: bundle };
  };
}
