export type {
  FieldRole,
  FieldDefinition,
  RowMapping,
  ContainerHooks,
  ValidationInvariant,
  FieldDeclaration,
  SchemaDeclaration,
} from "./types.js";

export {
  FieldRoleSchema,
  FieldMetadataSchema,
  DefaultPrimitiveSchema,
  FieldAnnotationSchema,
  FieldSpecFile,
  DefinitionFile,
} from "./schemas.js";
