import type { ValidationInvariant } from "@vectordef/shared";
import type { ZodError } from "zod";

export type ErrorCode = "SCHEMA_ERROR" | "VALIDATION_ERROR" | "SERIALIZATION_ERROR";

export class VectorDefinitionError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "VectorDefinitionError";
  }
}

/** Malformed or unrecognized field metadata, raised while reading declarations. */
export class SchemaError extends VectorDefinitionError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super("SCHEMA_ERROR", field ? `${field}: ${message}` : message);
    this.name = "SchemaError";
  }
}

const INVARIANT_LABELS: Record<ValidationInvariant, string> = {
  "no-key-field": "no key field",
  "multiple-key-fields": "multiple key fields",
  "duplicate-storage-name": "duplicate storage name",
  "duplicate-property-name": "duplicate property name",
  "missing-dimensions": "vector field missing dimensions",
  "unpaired-container-hooks": "unpaired container hooks",
};

export class ValidationError extends VectorDefinitionError {
  constructor(
    public readonly invariant: ValidationInvariant,
    detail?: string
  ) {
    const label = INVARIANT_LABELS[invariant];
    super("VALIDATION_ERROR", detail ? `${label}: ${detail}` : label);
    this.name = "ValidationError";
  }
}

export class SerializationError extends VectorDefinitionError {
  constructor(
    message: string,
    public readonly rowIndex?: number,
    cause?: unknown
  ) {
    super(
      "SERIALIZATION_ERROR",
      rowIndex === undefined ? message : `row ${rowIndex}: ${message}`,
      cause === undefined ? undefined : { cause }
    );
    this.name = "SerializationError";
  }
}

/** Flatten zod issues into one line, e.g. `dimensions: Number must be greater than 0`. */
export function formatIssues(error: ZodError): string {
  return error.issues
    .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}
