export {
  Deserializer,
  AllPassDeserializer,
  compileDeserializer,
  isDeserializerClass,
  NOT_AN_OBJECT_MESSAGE,
} from './deserializer.js';
export type { CleanedData, DeserializerClass, DeserializerState } from './deserializer.js';
export { ValidationError, NON_FIELD_ERRORS, isErrorTreeEmpty } from './errors.js';
export type { ErrorTree } from './errors.js';
export { isEmptyValue } from './field.js';
export type { EmptyValue, InputFieldMap, MessageParams } from './field.js';
export * as inputs from './fields.js';
