import type { RowMapping } from "@vectordef/shared";
import type { CollectionDefinition } from "./collection-definition.js";
import { SchemaError } from "./errors.js";
import { log } from "./logger.js";
import type { FieldSource } from "./record-type.js";
import { extractDefinition } from "./schema-extractor.js";

export type EntryState = "unseen" | "building" | "ready";

type Entry =
  | { state: "building" }
  | { state: "ready"; definition: CollectionDefinition<RowMapping[]> };

export type Extractor = (source: FieldSource) => CollectionDefinition<RowMapping[]>;

/**
 * Memoizes one collection definition per record type. Entries are never
 * evicted; create one registry per application (or per test) and pass it
 * to whatever needs definitions.
 */
export class DefinitionRegistry {
  private readonly entries = new Map<FieldSource, Entry>();
  private readonly registryLog = log.child("registry");

  constructor(private readonly extract: Extractor = extractDefinition) {}

  get(source: FieldSource): CollectionDefinition<RowMapping[]> {
    const entry = this.entries.get(source);
    if (entry?.state === "ready") return entry.definition;
    if (entry?.state === "building") {
      throw new SchemaError("re-entrant definition build for the same record type");
    }

    this.entries.set(source, { state: "building" });
    let definition: CollectionDefinition<RowMapping[]>;
    try {
      definition = this.extract(source);
    } catch (err) {
      this.entries.delete(source);
      throw err;
    }

    this.entries.set(source, { state: "ready", definition });
    this.registryLog.debug("Built definition", {
      key: definition.keyField.storageName,
      fields: definition.fields.length,
    });
    return definition;
  }

  state(source: FieldSource): EntryState {
    return this.entries.get(source)?.state ?? "unseen";
  }

  has(source: FieldSource): boolean {
    return this.state(source) === "ready";
  }

  get size(): number {
    let ready = 0;
    for (const entry of this.entries.values()) {
      if (entry.state === "ready") ready++;
    }
    return ready;
  }
}
