import type { RowMapping } from "@vectordef/shared";
import type { CollectionDefinition } from "./collection-definition.js";
import { SerializationError } from "./errors.js";
import { recordName } from "./field-definition.js";
import type { RecordType } from "./record-type.js";

function readProperty(record: unknown, name: string): unknown {
  if (typeof record !== "object" || record === null) return undefined;
  return Reflect.get(record, name);
}

/**
 * Converts records of one record type to storage rows and back, applying
 * the storage renames of the definition. Rows only carry storage names.
 */
export class RecordMapper<TRecord, TContainer = RowMapping[]> {
  constructor(
    readonly definition: CollectionDefinition<TContainer>,
    private readonly type: RecordType<TRecord>
  ) {}

  /** Construct one record, filling omitted values from field defaults. */
  create(values: Record<string, unknown> = {}): TRecord {
    const filled: Record<string, unknown> = { ...values };
    for (const field of this.definition.fields) {
      const name = recordName(field);
      if (filled[name] === undefined && field.defaultFactory) {
        filled[name] = field.defaultFactory();
      }
    }
    return this.type.construct(filled);
  }

  toRow(record: TRecord): RowMapping {
    const row: RowMapping = {};
    for (const field of this.definition.fields) {
      const value = readProperty(record, recordName(field));
      if (value !== undefined) row[field.storageName] = value;
    }
    return row;
  }

  toRows(records: readonly TRecord[]): RowMapping[] {
    return records.map((record) => this.toRow(record));
  }

  fromRow(row: RowMapping): TRecord {
    const values: Record<string, unknown> = {};
    for (const field of this.definition.fields) {
      if (row[field.storageName] !== undefined) {
        values[recordName(field)] = row[field.storageName];
      }
    }
    return this.create(values);
  }

  fromRows(rows: readonly RowMapping[]): TRecord[] {
    return rows.map((row, index) => {
      try {
        return this.fromRow(row);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new SerializationError(`cannot construct record: ${reason}`, index, err);
      }
    });
  }

  serialize(records: readonly TRecord[]): TContainer {
    return this.definition.toContainer(this.toRows(records));
  }

  deserialize(container: TContainer): TRecord[] {
    return this.fromRows(this.definition.fromContainer(container));
  }
}
