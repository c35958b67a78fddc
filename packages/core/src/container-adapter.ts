import type { ContainerHooks, RowMapping } from "@vectordef/shared";
import { SerializationError } from "./errors.js";
import { log } from "./logger.js";

const adapterLog = log.child("container");

/** Default container: the ordered list of rows itself. */
export const rowListHooks: ContainerHooks<RowMapping[]> = {
  toContainer: (rows) => rows.map((row) => ({ ...row })),
  fromContainer: (container) => container.map((row) => ({ ...row })),
};

/** Hooks whose containers belong to the caller; their row counts are not tracked. */
const DEFAULT_HOOKS: ReadonlySet<object> = new Set([rowListHooks]);

export function isRowMapping(value: unknown): value is RowMapping {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Moves rows (keyed by storage name) in and out of a bulk container value
 * through a pair of hooks. Row order is kept in both directions.
 */
export class ContainerAdapter<TContainer> {
  private readonly known: ReadonlySet<string>;
  /** Row counts of containers this adapter produced, for the inverse check. */
  private readonly produced = new WeakMap<object, number>();
  private readonly tracksCounts: boolean;

  constructor(
    storageNames: readonly string[],
    private readonly keyName: string,
    private readonly hooks: ContainerHooks<TContainer>
  ) {
    this.known = new Set(storageNames);
    this.tracksCounts = !DEFAULT_HOOKS.has(hooks);
  }

  toContainer(rows: readonly RowMapping[]): TContainer {
    const copies = rows.map((row, index) => this.checkRow(row, index));

    let container: TContainer;
    try {
      container = this.hooks.toContainer(copies);
    } catch (err) {
      adapterLog.warn("toContainer hook failed", { rows: rows.length, error: describe(err) });
      throw new SerializationError(`toContainer hook failed: ${describe(err)}`, undefined, err);
    }

    if (this.tracksCounts && typeof container === "object" && container !== null) {
      this.produced.set(container, rows.length);
    }
    return container;
  }

  fromContainer(container: TContainer): RowMapping[] {
    let result: unknown;
    try {
      result = this.hooks.fromContainer(container);
    } catch (err) {
      adapterLog.warn("fromContainer hook failed", { error: describe(err) });
      throw new SerializationError(`fromContainer hook failed: ${describe(err)}`, undefined, err);
    }

    if (!Array.isArray(result)) {
      throw new SerializationError("fromContainer hook must return an array of rows");
    }
    const rows: unknown[] = result;

    const expected =
      typeof container === "object" && container !== null
        ? this.produced.get(container)
        : undefined;
    if (expected !== undefined && rows.length !== expected) {
      throw new SerializationError(
        `fromContainer returned ${rows.length} rows for a container built from ${expected}`,
        Math.min(rows.length, expected)
      );
    }

    return rows.map((row, index) => this.checkRow(row, index));
  }

  private checkRow(row: unknown, index: number): RowMapping {
    if (!isRowMapping(row)) {
      throw new SerializationError("row is not a field mapping", index);
    }
    for (const name of Object.keys(row)) {
      if (!this.known.has(name)) {
        throw new SerializationError(`unknown field '${name}'`, index);
      }
    }
    if (row[this.keyName] === undefined) {
      throw new SerializationError(`missing key field '${this.keyName}'`, index);
    }
    return { ...row };
  }
}
