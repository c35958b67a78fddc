import {
  FieldAnnotationSchema,
  type FieldDefinition,
  type FieldRole,
  type RowMapping,
} from "@vectordef/shared";
import { CollectionDefinition, type DefinitionOptions } from "./collection-definition.js";
import { formatIssues, SchemaError } from "./errors.js";
import { createField, resolveRole } from "./field-definition.js";
import { log } from "./logger.js";
import type { FieldDescriptor, FieldSource } from "./record-type.js";
import { inferValueType } from "./type-inference.js";
import { validateFields } from "./validation.js";

const extractLog = log.child("extract");

function toField(descriptor: FieldDescriptor): FieldDefinition | undefined {
  if (descriptor.annotation === undefined) {
    extractLog.debug("Skipping unannotated field", { field: descriptor.name });
    return undefined;
  }

  const parsed = FieldAnnotationSchema.safeParse(descriptor.annotation);
  if (!parsed.success) {
    throw new SchemaError(`invalid annotation (${formatIssues(parsed.error)})`, descriptor.name);
  }
  const { role: token, name, type, ...metadata } = parsed.data;
  const role = resolveRole(token, descriptor.name);

  if (name !== undefined && name !== descriptor.name) {
    extractLog.debug("Annotation name ignored, declared field name wins", {
      field: descriptor.name,
      annotated: name,
    });
  }

  const valueType = type ?? inferValueType(descriptor.declaredType) ?? fallbackType(role, descriptor);

  return createField(role, {
    ...metadata,
    name: descriptor.name,
    type: valueType,
    defaultValue: descriptor.defaultValue,
    defaultFactory: descriptor.defaultFactory,
  });
}

/** Non-vector fields keep their declared type expression when no tag fits. */
function fallbackType(role: FieldRole, descriptor: FieldDescriptor): string {
  const declared = descriptor.declaredType.trim();
  if (role === "vector" || declared.length === 0) {
    throw new SchemaError(
      `cannot infer a value type from '${descriptor.declaredType}'; set type explicitly`,
      descriptor.name
    );
  }
  return declared;
}

/**
 * Derive the ordered schema fields of a record type from its declared
 * fields. Unannotated fields are skipped.
 */
export function extractFields(source: FieldSource): FieldDefinition[] {
  const fields: FieldDefinition[] = [];
  for (const descriptor of source.describeFields()) {
    const field = toField(descriptor);
    if (field) fields.push(field);
  }
  validateFields(fields);
  return fields;
}

export function extractDefinition(
  source: FieldSource,
  options: DefinitionOptions = {}
): CollectionDefinition<RowMapping[]> {
  return CollectionDefinition.create(extractFields(source), options);
}
