import type { FieldRole, RowMapping } from "@vectordef/shared";
import type { FieldOptions } from "./field-definition.js";

/** Schema annotation attached to one declared field; `role` is checked on extraction. */
export type FieldAnnotation = { role: FieldRole | string } & Omit<
  FieldOptions,
  "defaultValue" | "defaultFactory"
>;

export interface FieldDescriptor {
  name: string;
  /** Type expression of the declared value, e.g. `"number[] | string | null"`. */
  declaredType: string;
  /** Fields without an annotation are not part of the schema. */
  annotation?: FieldAnnotation;
  defaultValue?: string | number | boolean | bigint | null;
  defaultFactory?: () => unknown;
}

/** Anything that can list its declared fields; identity is the registry key. */
export interface FieldSource {
  describeFields(): readonly FieldDescriptor[];
}

export interface RecordType<TRecord> extends FieldSource {
  /** Build a record from property values; omitted values are already defaulted. */
  construct(values: Record<string, unknown>): TRecord;
}

/**
 * Annotation for one declared field. The declared field name is always the
 * property name; a `name` given here that differs from it is ignored.
 */
export function field(
  role: FieldRole,
  options: Omit<FieldAnnotation, "role"> = {}
): FieldAnnotation {
  return { role, ...options };
}

/** Record type for plain attribute-holding objects. */
export function recordType(fields: readonly FieldDescriptor[]): RecordType<RowMapping> {
  const frozen = Object.freeze([...fields]);
  return {
    describeFields: () => frozen,
    construct: (values) => ({ ...values }),
  };
}
