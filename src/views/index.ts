export { apiView, apiViewSet } from './api-view.js';
export { buildDeserializerMap, resolveViewOptions } from './options.js';
export { extractPayload, normalizeQueries, MALFORMED_JSON_MESSAGE } from './payload.js';
export type { PayloadOptions } from './payload.js';
export type {
  ApiViewOptions,
  DeserializerOption,
  QueryParams,
  ResolvedViewOptions,
  UrlParams,
  View,
  ViewArgs,
  ViewHandler,
  ViewSet,
  ViewSetBundle,
} from './types.js';
