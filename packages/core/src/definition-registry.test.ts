import { describe, it, expect, vi } from "vitest";
import { DefinitionRegistry } from "./definition-registry.js";
import { field, recordType, type FieldDescriptor, type FieldSource } from "./record-type.js";
import { extractDefinition } from "./schema-extractor.js";
import { SchemaError } from "./errors.js";

function noteFields(): FieldDescriptor[] {
  return [
    { name: "id", declaredType: "string", annotation: field("key") },
    { name: "vector", declaredType: "number[]", annotation: field("vector", { dimensions: 3 }) },
  ];
}

describe("DefinitionRegistry", () => {
  it("builds on first use and caches the result", () => {
    const describeFields = vi.fn(noteFields);
    const source: FieldSource = { describeFields };
    const registry = new DefinitionRegistry();

    expect(registry.state(source)).toBe("unseen");
    const first = registry.get(source);
    const second = registry.get(source);

    expect(first).toBe(second);
    expect(describeFields).toHaveBeenCalledTimes(1);
    expect(registry.state(source)).toBe("ready");
    expect(registry.has(source)).toBe(true);
    expect(registry.size).toBe(1);
  });

  it("hands every concurrent caller the same definition", async () => {
    const describeFields = vi.fn(noteFields);
    const source: FieldSource = { describeFields };
    const registry = new DefinitionRegistry();

    const results = await Promise.all(
      Array.from({ length: 10 }, async () => {
        await Promise.resolve();
        return registry.get(source);
      })
    );

    expect(new Set(results).size).toBe(1);
    expect(describeFields).toHaveBeenCalledTimes(1);
  });

  it("keys entries by record type identity", () => {
    const registry = new DefinitionRegistry();
    const a = recordType(noteFields());
    const b = recordType(noteFields());

    expect(registry.get(a)).not.toBe(registry.get(b));
    expect(registry.size).toBe(2);
  });

  it("keeps separate registries independent", () => {
    const source = recordType(noteFields());
    const one = new DefinitionRegistry();
    const two = new DefinitionRegistry();

    one.get(source);
    expect(two.has(source)).toBe(false);
  });

  it("does not cache a failed build", () => {
    const source = recordType([{ name: "content", declaredType: "string", annotation: field("data") }]);
    const registry = new DefinitionRegistry();

    expect(() => registry.get(source)).toThrow("no key field");
    expect(registry.state(source)).toBe("unseen");
    expect(() => registry.get(source)).toThrow("no key field");
  });

  it("rejects a re-entrant build of the same type", () => {
    const registry = new DefinitionRegistry();
    const source: FieldSource = {
      describeFields: () => {
        registry.get(source);
        return noteFields();
      },
    };

    expect(() => registry.get(source)).toThrow(SchemaError);
    expect(registry.state(source)).toBe("unseen");
  });

  it("uses an injected extractor", () => {
    const extract = vi.fn(extractDefinition);
    const registry = new DefinitionRegistry(extract);
    const source = recordType(noteFields());

    registry.get(source);
    registry.get(source);

    expect(extract).toHaveBeenCalledTimes(1);
    expect(extract).toHaveBeenCalledWith(source);
  });
});
