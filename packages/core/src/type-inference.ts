const NULLISH = new Set(["null", "undefined"]);

const MEMBER_TAGS = new Map<string, string>([
  ["string", "text"],
  ["number", "float"],
  ["bigint", "integer"],
  ["boolean", "bool"],
  ["Date", "datetime"],
  ["number[]", "float-sequence"],
  ["Array<number>", "float-sequence"],
  ["Float32Array", "float-sequence"],
  ["Float64Array", "float-sequence"],
  ["string[]", "text-sequence"],
  ["Array<string>", "text-sequence"],
]);

/**
 * A vector may be stored either as numbers or as the text an external
 * embedding service will turn into numbers later.
 */
export const VECTOR_OR_PENDING_SOURCE_TEXT = "vector-or-pending-source-text";

/**
 * Infer a value-type tag from a declared type expression. Returns undefined
 * when the expression has no unambiguous tag.
 */
export function inferValueType(declaredType: string): string | undefined {
  const members = declaredType
    .split("|")
    .map((m) => m.trim())
    .filter((m) => m.length > 0 && !NULLISH.has(m));

  const tags = new Set<string>();
  for (const member of members) {
    const tag = MEMBER_TAGS.get(member);
    if (tag === undefined) return undefined;
    tags.add(tag);
  }

  if (tags.size === 1) return [...tags][0];
  if (tags.size === 2 && tags.has("float-sequence") && tags.has("text")) {
    return VECTOR_OR_PENDING_SOURCE_TEXT;
  }
  return undefined;
}
