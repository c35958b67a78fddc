export type {
  FieldRole,
  FieldDefinition,
  RowMapping,
  ContainerHooks,
  ValidationInvariant,
  FieldDeclaration,
  SchemaDeclaration,
} from "@vectordef/shared";

export {
  VectorDefinitionError,
  SchemaError,
  ValidationError,
  SerializationError,
  type ErrorCode,
} from "./errors.js";
export { createField, resolveRole, recordName, type FieldOptions } from "./field-definition.js";
export { inferValueType, VECTOR_OR_PENDING_SOURCE_TEXT } from "./type-inference.js";
export {
  field,
  recordType,
  type FieldAnnotation,
  type FieldDescriptor,
  type FieldSource,
  type RecordType,
} from "./record-type.js";
export { zodRecordType, typeExpression } from "./zod-record.js";
export { extractFields, extractDefinition } from "./schema-extractor.js";
export { validateFields } from "./validation.js";
export {
  CollectionDefinition,
  pairHooks,
  type DefinitionOptions,
  type NoContainerHooks,
  type VectorDefaults,
} from "./collection-definition.js";
export { CollectionDefinitionBuilder } from "./collection-builder.js";
export { ContainerAdapter, rowListHooks, isRowMapping } from "./container-adapter.js";
export { RecordMapper } from "./record-mapper.js";
export {
  DefinitionRegistry,
  type EntryState,
  type Extractor,
} from "./definition-registry.js";
export { createLogger, log, type Logger } from "./logger.js";
