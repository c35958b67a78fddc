import {
  DefaultPrimitiveSchema,
  FieldMetadataSchema,
  FieldRoleSchema,
  type FieldDefinition,
  type FieldRole,
} from "@vectordef/shared";
import { formatIssues, SchemaError } from "./errors.js";

type DefaultPrimitive = string | number | boolean | bigint | null;

export interface FieldOptions {
  /** Property (attribute or column) name on the record type. */
  name?: string;
  /** Name used by the backing store; defaults to `name`. */
  storageName?: string;
  type?: string;
  dimensions?: number;
  indexKind?: string;
  distanceFunction?: string;
  isFullTextIndexed?: boolean;
  isFilterable?: boolean;
  /** Primitive default; objects and arrays must go through `defaultFactory`. */
  defaultValue?: DefaultPrimitive;
  defaultFactory?: () => unknown;
}

const VECTOR_ONLY = ["dimensions", "indexKind", "distanceFunction"] as const;
const DATA_ONLY = ["isFullTextIndexed", "isFilterable"] as const;

/** Resolve a role token to the closed role set, rejecting anything else. */
export function resolveRole(token: unknown, field?: string): FieldRole {
  const parsed = FieldRoleSchema.safeParse(token);
  if (!parsed.success) {
    throw new SchemaError(
      `unknown field role ${JSON.stringify(token)}, expected one of ${FieldRoleSchema.options.join(", ")}`,
      field
    );
  }
  return parsed.data;
}

function toFactory(
  defaultValue: unknown,
  defaultFactory: (() => unknown) | undefined,
  label: string | undefined
): (() => unknown) | undefined {
  if (defaultFactory !== undefined && defaultValue !== undefined) {
    throw new SchemaError("declare either defaultValue or defaultFactory, not both", label);
  }
  if (defaultFactory !== undefined) return defaultFactory;
  if (defaultValue === undefined) return undefined;

  const parsed = DefaultPrimitiveSchema.safeParse(defaultValue);
  if (!parsed.success) {
    throw new SchemaError(
      "defaultValue must be a primitive; use defaultFactory for objects and arrays",
      label
    );
  }
  const value = parsed.data;
  return () => value;
}

/**
 * Create an immutable field definition. Role-specific metadata is checked
 * here; aggregate rules (single key, unique names, dimensions on vectors)
 * are checked when the collection definition is built.
 */
export function createField(role: FieldRole | string, options: FieldOptions = {}): FieldDefinition {
  const label = options.name ?? options.storageName;
  const resolved = resolveRole(role, label);

  const { name, defaultValue, defaultFactory, ...metadata } = options;
  const parsed = FieldMetadataSchema.safeParse(metadata);
  if (!parsed.success) {
    throw new SchemaError(`invalid field metadata (${formatIssues(parsed.error)})`, label);
  }
  const meta = parsed.data;

  const storageName = meta.storageName ?? name;
  if (!storageName) {
    throw new SchemaError("field needs a name or a storageName");
  }

  if (resolved !== "vector") {
    for (const key of VECTOR_ONLY) {
      if (meta[key] !== undefined) {
        throw new SchemaError(`${key} is only valid on vector fields`, label);
      }
    }
  }
  if (resolved !== "data") {
    for (const key of DATA_ONLY) {
      if (meta[key] !== undefined) {
        throw new SchemaError(`${key} is only valid on data fields`, label);
      }
    }
  }

  const field: FieldDefinition = {
    role: resolved,
    storageName,
    ...(name !== undefined && { propertyName: name }),
    ...(meta.type !== undefined && { valueType: meta.type }),
    ...(meta.dimensions !== undefined && { dimensions: meta.dimensions }),
    ...(meta.indexKind !== undefined && { indexKind: meta.indexKind }),
    ...(meta.distanceFunction !== undefined && { distanceFunction: meta.distanceFunction }),
    ...(meta.isFullTextIndexed !== undefined && { isFullTextIndexed: meta.isFullTextIndexed }),
    ...(meta.isFilterable !== undefined && { isFilterable: meta.isFilterable }),
  };
  const factory = toFactory(defaultValue, defaultFactory, label);
  return Object.freeze(factory ? { ...field, defaultFactory: factory } : field);
}

/** Name the field goes by on in-memory records. */
export function recordName(field: FieldDefinition): string {
  return field.propertyName ?? field.storageName;
}
