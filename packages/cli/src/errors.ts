import { VectorDefinitionError } from "@vectordef/core";
import { globalJsonMode } from "./json-mode.js";

export type ErrorCode =
  | "INVALID_INPUT"
  | "NOT_FOUND"
  | "SCHEMA_ERROR"
  | "VALIDATION_ERROR"
  | "CONFIG_ERROR";

export function exitWithError(
  code: ErrorCode,
  message: string,
  opts?: { suggestion?: string; exitCode?: number }
): never {
  const exitCode = opts?.exitCode ?? 1;
  if (globalJsonMode()) {
    const error: Record<string, string> = { code, message };
    if (opts?.suggestion) error.suggestion = opts.suggestion;
    console.log(JSON.stringify({ ok: false, error }));
  } else {
    console.error(message);
    if (opts?.suggestion) console.error(`Hint: ${opts.suggestion}`);
  }
  process.exit(exitCode);
}

/** Map a thrown value to the code reported on exit. */
export function errorCodeFor(err: unknown): ErrorCode {
  if (err instanceof VectorDefinitionError) {
    return err.code === "VALIDATION_ERROR" ? "VALIDATION_ERROR" : "SCHEMA_ERROR";
  }
  if (err instanceof Error && "code" in err && err.code === "ENOENT") {
    return "NOT_FOUND";
  }
  return "INVALID_INPUT";
}
