import { describe, it, expect, vi } from "vitest";
import type { ContainerHooks, RowMapping } from "@vectordef/shared";
import { ContainerAdapter, rowListHooks } from "./container-adapter.js";
import { SerializationError } from "./errors.js";

interface Table {
  columns: Record<string, unknown[]>;
  length: number;
}

/** Group rows into columns and back, the way a dataframe would hold them. */
const tableHooks: ContainerHooks<Table> = {
  toContainer(rows) {
    const columns: Record<string, unknown[]> = {};
    rows.forEach((row, i) => {
      for (const [name, value] of Object.entries(row)) {
        columns[name] ??= new Array<unknown>(rows.length).fill(undefined);
        columns[name][i] = value;
      }
    });
    return { columns, length: rows.length };
  },
  fromContainer(table) {
    return Array.from({ length: table.length }, (_, i) => {
      const row: RowMapping = {};
      for (const [name, values] of Object.entries(table.columns)) {
        if (values[i] !== undefined) row[name] = values[i];
      }
      return row;
    });
  },
};

function serializationError(run: () => unknown): SerializationError {
  try {
    run();
  } catch (err) {
    if (err instanceof SerializationError) return err;
    throw err;
  }
  throw new Error("expected a SerializationError");
}

describe("ContainerAdapter", () => {
  const rows = [
    { id: "1", content: "a" },
    { id: "2", content: "b" },
  ];

  it("round-trips rows through the default row list", () => {
    const adapter = new ContainerAdapter(["id", "content"], "id", rowListHooks);

    const container = adapter.toContainer(rows);
    expect(container).toEqual(rows);
    expect(container[0]).not.toBe(rows[0]);
    expect(adapter.fromContainer(container)).toEqual(rows);
  });

  it("accepts a default row list the caller has extended", () => {
    const adapter = new ContainerAdapter(["id", "content"], "id", rowListHooks);

    const container = adapter.toContainer(rows);
    container.push({ id: "3", content: "c" });

    expect(adapter.fromContainer(container)).toEqual([...rows, { id: "3", content: "c" }]);
  });

  it("round-trips rows through table hooks in order", () => {
    const adapter = new ContainerAdapter(["id", "content", "vector"], "id", tableHooks);

    const table = adapter.toContainer(rows);
    expect(table).toEqual({ columns: { id: ["1", "2"], content: ["a", "b"] }, length: 2 });
    expect(adapter.fromContainer(table)).toEqual(rows);
  });

  it("rejects rows with unknown fields", () => {
    const adapter = new ContainerAdapter(["id", "content"], "id", rowListHooks);

    const err = serializationError(() =>
      adapter.toContainer([{ id: "1" }, { id: "2", title: "x" }])
    );
    expect(err.rowIndex).toBe(1);
    expect(err.message).toBe("row 1: unknown field 'title'");
  });

  it("rejects rows without the key field", () => {
    const adapter = new ContainerAdapter(["id", "content"], "id", rowListHooks);

    const err = serializationError(() => adapter.toContainer([{ content: "a" }]));
    expect(err.rowIndex).toBe(0);
    expect(err.message).toBe("row 0: missing key field 'id'");
  });

  it("wraps hook failures", () => {
    const boom = new Error("bad table");
    const adapter = new ContainerAdapter<Table>(["id"], "id", {
      toContainer: () => {
        throw boom;
      },
      fromContainer: () => [],
    });
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});

    const err = serializationError(() => adapter.toContainer([{ id: "1" }]));
    expect(err.message).toBe("toContainer hook failed: bad table");
    expect(err.cause).toBe(boom);
    expect(err.rowIndex).toBeUndefined();

    warnSpy.mockRestore();
  });

  it("rejects a non-array result from fromContainer", () => {
    const adapter = new ContainerAdapter<string>(["id"], "id", {
      toContainer: () => "",
      fromContainer: () => JSON.parse('{"id":"1"}'),
    });

    expect(() => adapter.fromContainer("")).toThrow(
      "fromContainer hook must return an array of rows"
    );
  });

  it("reports the first row whose fields do not match", () => {
    const adapter = new ContainerAdapter<RowMapping[]>(["id"], "id", {
      toContainer: (r) => r,
      fromContainer: (c) => c.map((row, i) => (i === 1 ? { ...row, extra: true } : row)),
    });

    const err = serializationError(() => adapter.fromContainer([{ id: "1" }, { id: "2" }]));
    expect(err.rowIndex).toBe(1);
  });

  it("detects a row count mismatch on containers it produced", () => {
    const adapter = new ContainerAdapter<Table>(["id", "content"], "id", {
      toContainer: tableHooks.toContainer,
      fromContainer: (table) => tableHooks.fromContainer(table).slice(0, 1),
    });

    const table = adapter.toContainer(rows);
    const err = serializationError(() => adapter.fromContainer(table));
    expect(err.rowIndex).toBe(1);
    expect(err.message).toBe("row 1: fromContainer returned 1 rows for a container built from 2");
  });
});
