import { z } from "zod";

export const FieldRoleSchema = z.enum(["key", "data", "vector"]);
export type FieldRoleSchema = z.infer<typeof FieldRoleSchema>;

export const DefaultPrimitiveSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.bigint(),
  z.null(),
]);

/** Metadata keys shared by annotations and manually declared fields. */
export const FieldMetadataSchema = z
  .object({
    storageName: z.string().min(1).optional(),
    type: z.string().min(1).optional(),
    dimensions: z.number().int().positive().optional(),
    indexKind: z.string().min(1).optional(),
    distanceFunction: z.string().min(1).optional(),
    isFullTextIndexed: z.boolean().optional(),
    isFilterable: z.boolean().optional(),
  })
  .strict();
export type FieldMetadataSchema = z.infer<typeof FieldMetadataSchema>;

/** Annotation as attached to a record field; the role token is still unresolved. */
export const FieldAnnotationSchema = FieldMetadataSchema.extend({
  role: z.string(),
  name: z.string().min(1).optional(),
}).strict();
export type FieldAnnotationSchema = z.infer<typeof FieldAnnotationSchema>;

/** One `[[fields]]` table of a definition file (snake_case keys). */
export const FieldSpecFile = z
  .object({
    role: FieldRoleSchema,
    name: z.string().min(1).optional(),
    storage_name: z.string().min(1).optional(),
    type: z.string().min(1).optional(),
    dimensions: z.number().int().positive().optional(),
    index_kind: z.string().min(1).optional(),
    distance_function: z.string().min(1).optional(),
    is_full_text_indexed: z.boolean().optional(),
    is_filterable: z.boolean().optional(),
    default: DefaultPrimitiveSchema.optional(),
  })
  .strict();
export type FieldSpecFile = z.infer<typeof FieldSpecFile>;

export const DefinitionFile = z
  .object({
    container_mode: z.boolean().optional().default(false),
    fields: z.array(FieldSpecFile).min(1),
  })
  .strict();
export type DefinitionFile = z.infer<typeof DefinitionFile>;
