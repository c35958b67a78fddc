import { z } from "zod";
import type { FieldAnnotation, FieldDescriptor, RecordType } from "./record-type.js";

/** Render a zod type as the type expression the extractor understands. */
export function typeExpression(type: z.ZodTypeAny): string {
  if (type instanceof z.ZodString || type instanceof z.ZodEnum) return "string";
  if (type instanceof z.ZodNumber) return "number";
  if (type instanceof z.ZodBigInt) return "bigint";
  if (type instanceof z.ZodBoolean) return "boolean";
  if (type instanceof z.ZodDate) return "Date";
  if (type instanceof z.ZodNull) return "null";
  if (type instanceof z.ZodUndefined) return "undefined";
  if (type instanceof z.ZodLiteral) {
    const value: unknown = type.value;
    return value === null ? "null" : typeof value;
  }
  if (type instanceof z.ZodArray) {
    const element = typeExpression(type.element);
    return element.includes("|") ? `Array<${element}>` : `${element}[]`;
  }
  if (type instanceof z.ZodOptional) return `${typeExpression(type.unwrap())} | undefined`;
  if (type instanceof z.ZodNullable) return `${typeExpression(type.unwrap())} | null`;
  if (type instanceof z.ZodDefault) return typeExpression(type.removeDefault());
  if (type instanceof z.ZodEffects) return typeExpression(type.innerType());
  if (type instanceof z.ZodUnion) {
    const options: readonly z.ZodTypeAny[] = type.options;
    return options.map(typeExpression).join(" | ");
  }
  return "unknown";
}

type ShapeAnnotations<TShape extends z.ZodRawShape> = {
  [K in keyof TShape]?: FieldAnnotation;
};

/**
 * Record type for zod-validated objects. Declared types and defaults come
 * from the object schema; records are constructed through `schema.parse`.
 *
 * @example
 * const Hotel = zodRecordType(
 *   z.object({ id: z.string(), description: z.string(), embedding: z.array(z.number()).optional() }),
 *   { id: field("key"), description: field("data"), embedding: field("vector", { dimensions: 1536 }) }
 * );
 */
export function zodRecordType<TShape extends z.ZodRawShape>(
  schema: z.ZodObject<TShape>,
  annotations: ShapeAnnotations<TShape>
): RecordType<z.output<z.ZodObject<TShape>>> {
  const lookup: Partial<Record<string, FieldAnnotation>> = annotations;
  const descriptors: FieldDescriptor[] = Object.entries(schema.shape).map(([name, type]) => {
    const descriptor: FieldDescriptor = {
      name,
      declaredType: typeExpression(type),
      annotation: lookup[name],
    };
    if (type instanceof z.ZodDefault) {
      descriptor.defaultFactory = () => type.parse(undefined);
    }
    return descriptor;
  });
  const frozen = Object.freeze(descriptors);

  return {
    describeFields: () => frozen,
    construct: (values) => schema.parse(values),
  };
}
