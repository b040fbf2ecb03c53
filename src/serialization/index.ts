export {
  Serializer,
  DictSerializer,
  compileSerializer,
  isSerializerClass,
} from './serializer.js';
export type {
  SerializerClass,
  SerializerOptions,
  SerializedData,
  SerializedObject,
  CompiledField,
} from './serializer.js';
export type { FieldMap, BoundGetter, SchemaGetter } from './field.js';
export { attributeGetter, keyGetter } from './getters.js';
export type { Getter, GetterFactory } from './getters.js';
export { MissingAttributeError, CoercionError, isFieldFailure } from './errors.js';
export * as fields from './fields.js';
