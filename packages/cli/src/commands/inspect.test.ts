import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { Config } from "../config.js";
import { errorCodeFor } from "../errors.js";
import { formatDeclaration, inspectCommand, loadDefinitionFile } from "./inspect.js";

const DEFINITION = `
container_mode = false

[[fields]]
role = "key"
name = "id"

[[fields]]
role = "data"
name = "content"
type = "text"
is_full_text_indexed = true

[[fields]]
role = "vector"
name = "embedding"
storage_name = "vector"
dimensions = 3
distance_function = "cosine_similarity"
`;

describe("inspect", () => {
  let tempDir: string;
  let definitionPath: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "vectordef-test-"));
    definitionPath = join(tempDir, "notes.toml");
    writeFileSync(definitionPath, DEFINITION, "utf-8");
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe("loadDefinitionFile()", () => {
    it("builds a definition from TOML with vector defaults", () => {
      const definition = loadDefinitionFile(definitionPath, { indexKind: "hnsw" });

      expect(definition.storageNames).toEqual(["id", "content", "vector"]);
      expect(definition.vectorFields[0].indexKind).toBe("hnsw");
      expect(definition.vectorFields[0].distanceFunction).toBe("cosine_similarity");
    });

    it("reads .json files as JSON", () => {
      const jsonPath = join(tempDir, "notes.json");
      writeFileSync(
        jsonPath,
        JSON.stringify({ fields: [{ role: "key", name: "id" }, { role: "data", name: "title" }] }),
        "utf-8"
      );

      expect(loadDefinitionFile(jsonPath).propertyNames).toEqual(["id", "title"]);
    });
  });

  describe("formatDeclaration()", () => {
    it("prints an aligned table", () => {
      const declaration = loadDefinitionFile(definitionPath, { indexKind: "hnsw" }).toSchemaDeclaration();

      expect(formatDeclaration(declaration).split("\n")).toEqual([
        "Key field: id",
        "Container mode: off",
        "",
        "ROLE    STORAGE NAME  PROPERTY   TYPE  DETAILS",
        "key     id            id         -",
        "data    content       content    text  full-text",
        "vector  vector        embedding  -     dimensions=3, index=hnsw, distance=cosine_similarity",
      ]);
    });
  });

  describe("errorCodeFor()", () => {
    function codeOf(run: () => unknown): string {
      try {
        run();
      } catch (err) {
        return errorCodeFor(err);
      }
      return "none";
    }

    it("reports a missing file as NOT_FOUND", () => {
      expect(codeOf(() => loadDefinitionFile(join(tempDir, "missing.toml")))).toBe("NOT_FOUND");
    });

    it("reports bad field metadata as SCHEMA_ERROR", () => {
      const path = join(tempDir, "bad.toml");
      writeFileSync(path, '[[fields]]\nrole = "primary"\nname = "id"\n', "utf-8");
      expect(codeOf(() => loadDefinitionFile(path))).toBe("SCHEMA_ERROR");
    });

    it("reports broken invariants as VALIDATION_ERROR", () => {
      const path = join(tempDir, "keyless.toml");
      writeFileSync(path, '[[fields]]\nrole = "data"\nname = "content"\n', "utf-8");
      expect(codeOf(() => loadDefinitionFile(path))).toBe("VALIDATION_ERROR");
    });

    it("reports unparseable TOML as INVALID_INPUT", () => {
      const path = join(tempDir, "broken.toml");
      writeFileSync(path, "[[fields]\nrole =", "utf-8");
      expect(codeOf(() => loadDefinitionFile(path))).toBe("INVALID_INPUT");
    });
  });

  describe("inspect command", () => {
    it("prints the declaration as JSON with --json", () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});
      const config = new Config(join(tempDir, "config"));

      inspectCommand(config).parse([definitionPath, "--json"], { from: "user" });

      expect(log).toHaveBeenCalledTimes(1);
      const output: unknown = JSON.parse(String(log.mock.calls[0][0]));
      expect(output).toMatchObject({
        keyField: "id",
        containerMode: false,
        fields: [
          { role: "key", storageName: "id" },
          { role: "data", storageName: "content", isFullTextIndexed: true },
          { role: "vector", storageName: "vector", dimensions: 3, indexKind: null },
        ],
      });
    });

    it("applies configured vector defaults", () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});
      const config = new Config(join(tempDir, "config"));
      config.set("defaults.index_kind", "flat");

      inspectCommand(config).parse([definitionPath, "--json"], { from: "user" });

      const output: unknown = JSON.parse(String(log.mock.calls[0][0]));
      expect(output).toMatchObject({ fields: [{}, {}, { indexKind: "flat" }] });
    });

    it("exits with a validation code on an invalid file", () => {
      const error = vi.spyOn(console, "error").mockImplementation(() => {});
      const exit = vi.spyOn(process, "exit").mockImplementation(() => {
        throw new Error("process.exit");
      });
      const path = join(tempDir, "two-keys.toml");
      writeFileSync(
        path,
        '[[fields]]\nrole = "key"\nname = "id"\n\n[[fields]]\nrole = "key"\nname = "key"\n',
        "utf-8"
      );

      expect(() =>
        inspectCommand(new Config(join(tempDir, "config"))).parse([path], { from: "user" })
      ).toThrow("process.exit");
      expect(exit).toHaveBeenCalledWith(1);
      expect(error).toHaveBeenCalledWith(`${path}: multiple key fields: id, key`);
    });
  });
});
