import type { FieldDefinition } from "@vectordef/shared";
import { ValidationError } from "./errors.js";

/** Aggregate checks shared by extraction and manual construction. */
export function validateFields(fields: readonly FieldDefinition[]): void {
  const keys = fields.filter((f) => f.role === "key");
  if (keys.length === 0) {
    throw new ValidationError("no-key-field");
  }
  if (keys.length > 1) {
    throw new ValidationError(
      "multiple-key-fields",
      keys.map((f) => f.propertyName ?? f.storageName).join(", ")
    );
  }

  const storageNames = new Set<string>();
  const propertyNames = new Set<string>();
  for (const field of fields) {
    if (storageNames.has(field.storageName)) {
      throw new ValidationError("duplicate-storage-name", `'${field.storageName}'`);
    }
    storageNames.add(field.storageName);

    if (field.propertyName !== undefined) {
      if (propertyNames.has(field.propertyName)) {
        throw new ValidationError("duplicate-property-name", `'${field.propertyName}'`);
      }
      propertyNames.add(field.propertyName);
    }

    if (field.role === "vector" && field.dimensions === undefined) {
      throw new ValidationError("missing-dimensions", `'${field.propertyName ?? field.storageName}'`);
    }
  }
}
