import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";
import { parse, stringify, type AnyJson, type JsonMap } from "@iarna/toml";
import { z } from "zod";
import type { VectorDefaults } from "@vectordef/core";

const ConfigSchema = z
  .object({
    defaults: z
      .object({
        index_kind: z.string().default(""),
        distance_function: z.string().default(""),
      })
      .strict()
      .default({}),
    output: z
      .object({
        json: z.boolean().default(false),
      })
      .strict()
      .default({}),
  })
  .strict();

export type VectordefConfig = z.infer<typeof ConfigSchema>;

const DEFAULT_CONFIG: VectordefConfig = {
  defaults: { index_kind: "", distance_function: "" },
  output: { json: false },
};

function isTable(value: AnyJson | undefined): value is JsonMap {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

export class Config {
  private readonly configDir: string;
  private readonly configPath: string;

  constructor(configDir?: string) {
    this.configDir = configDir ?? join(homedir(), ".vectordef");
    this.configPath = join(this.configDir, "config.toml");
  }

  get path(): string {
    return this.configPath;
  }

  /** Load config from disk, returning defaults if the file doesn't exist. */
  load(): VectordefConfig {
    if (!this.exists()) {
      return structuredClone(DEFAULT_CONFIG);
    }
    return this.validate(this.readDocument());
  }

  /** Get a config value using dot-notation (e.g. "defaults.index_kind"). */
  get(key: string): unknown {
    let current: unknown = this.load();
    for (const part of key.split(".")) {
      if (current === null || typeof current !== "object") {
        return undefined;
      }
      current = Object.entries(current).find(([name]) => name === part)?.[1];
    }
    return current;
  }

  /** Set a config value using dot-notation. Preserves number and boolean types. */
  set(key: string, value: string): void {
    const doc: JsonMap = this.exists() ? this.readDocument() : structuredClone(DEFAULT_CONFIG);
    const parts = key.split(".");
    const lastKey = parts.pop() ?? key;

    let current = doc;
    for (const part of parts) {
      const next = current[part];
      if (isTable(next)) {
        current = next;
      } else {
        const created: JsonMap = {};
        current[part] = created;
        current = created;
      }
    }

    const existing = current[lastKey];
    if (typeof existing === "number" && !Number.isNaN(Number(value))) {
      current[lastKey] = Number(value);
    } else if (typeof existing === "boolean" && (value === "true" || value === "false")) {
      current[lastKey] = value === "true";
    } else {
      current[lastKey] = value;
    }

    this.validate(doc);
    mkdirSync(this.configDir, { recursive: true });
    writeFileSync(this.configPath, stringify(doc), "utf-8");
  }

  /** Vector defaults for definition files; empty strings mean unset. */
  vectorDefaults(): VectorDefaults {
    const { defaults } = this.load();
    return {
      indexKind: defaults.index_kind || undefined,
      distanceFunction: defaults.distance_function || undefined,
    };
  }

  /** Config rendered as TOML, defaults included. */
  raw(): string {
    return stringify(this.load());
  }

  exists(): boolean {
    return existsSync(this.configPath);
  }

  private readDocument(): JsonMap {
    return parse(readFileSync(this.configPath, "utf-8"));
  }

  private validate(doc: JsonMap): VectordefConfig {
    const parsed = ConfigSchema.safeParse(doc);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new Error(`invalid config ${this.configPath} (${issues})`);
    }
    return parsed.data;
  }
}
