import { z } from 'zod';
import { formRejectionSchema, getViewSettings, httpMethodSchema } from '../config/index.js';
import type { ErrorHandlerConfig } from '../core/error-handler.js';
import { ConfigurationException } from '../core/exceptions.js';
import { PAYLOAD_METHODS, isPayloadMethod, type PayloadMethod } from '../core/http.js';
import {
  AllPassDeserializer,
  isDeserializerClass,
  type DeserializerClass,
} from '../deserialization/index.js';
import { AllowAny, type Permission } from '../permissions/index.js';
import { isPlainObject } from '../utils.js';
import type { ApiViewOptions, DeserializerOption, ResolvedViewOptions } from './types.js';

function isPermission(value: unknown): value is Permission {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'name') === 'string' &&
    typeof Reflect.get(value, 'hasPermission') === 'function'
  );
}

const apiViewOptionsSchema = z.object({
  permission: z
    .custom<Permission>(isPermission, { message: 'permission must implement hasPermission()' })
    .optional(),
  allowedMethods: z.array(httpMethodSchema).min(1).optional(),
  deserializer: z.unknown().optional(),
  allowForms: z.boolean().optional(),
  formRejection: formRejectionSchema.optional(),
  errorHandler: z
    .custom<ErrorHandlerConfig>((value) => isPlainObject(value), {
      message: 'errorHandler must be an options object',
    })
    .optional(),
  name: z.string().optional(),
});

/**
 * Maps every payload method to its deserializer. A single class serves all
 * of them; a map falls back to AllPassDeserializer for missing methods.
 */
export function buildDeserializerMap(
  option: DeserializerOption | undefined
): ReadonlyMap<PayloadMethod, DeserializerClass> {
  if (option === undefined || isDeserializerClass(option)) {
    const cls = option ?? AllPassDeserializer;
    return new Map(PAYLOAD_METHODS.map((method) => [method, cls]));
  }

  if (!isPlainObject(option)) {
    throw new ConfigurationException(
      '`deserializer` should be either a subclass of `Deserializer` or a map of `Deserializer` subclasses'
    );
  }

  const map = new Map<PayloadMethod, DeserializerClass>(
    PAYLOAD_METHODS.map((method) => [method, AllPassDeserializer])
  );
  for (const [key, value] of Object.entries(option)) {
    const method = key.toUpperCase();
    if (!isPayloadMethod(method)) {
      throw new ConfigurationException(
        `\`deserializer\` map keys must be one of ${PAYLOAD_METHODS.join(', ')}. Given: ${key}`
      );
    }
    if (!isDeserializerClass(value)) {
      throw new ConfigurationException(
        'The values of the `deserializer` map should be subclasses of `Deserializer`.'
      );
    }
    map.set(method, value);
  }
  return map;
}

/**
 * Validates view options and fills the gaps from the global view settings.
 */
export function resolveViewOptions(options: ApiViewOptions): ResolvedViewOptions {
  const result = apiViewOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new ConfigurationException(
      'Invalid view options',
      result.error.issues.map((issue) => ({
        path: issue.path.map(String).join('.'),
        message: issue.message,
      }))
    );
  }

  const parsed = result.data;
  const settings = getViewSettings();
  return {
    permission: parsed.permission ?? AllowAny,
    allowedMethods: parsed.allowedMethods ?? settings.allowedMethods,
    deserializers: buildDeserializerMap(options.deserializer),
    allowForms: parsed.allowForms ?? settings.allowForms,
    formRejection: parsed.formRejection ?? settings.formRejection,
    errorHandler: parsed.errorHandler ?? settings.errorHandler,
  };
}
