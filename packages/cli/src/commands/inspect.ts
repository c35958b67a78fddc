import { readFileSync } from "node:fs";
import { extname } from "node:path";
import { Command } from "commander";
import { parse } from "@iarna/toml";
import {
  CollectionDefinition,
  type FieldDeclaration,
  type SchemaDeclaration,
  type VectorDefaults,
} from "@vectordef/core";
import { Config } from "../config.js";
import { errorCodeFor, exitWithError } from "../errors.js";

/** Read a TOML (or .json) definition file and build the collection definition. */
export function loadDefinitionFile(path: string, defaults: VectorDefaults = {}): CollectionDefinition {
  const raw = readFileSync(path, "utf-8");
  const doc: unknown = extname(path) === ".json" ? JSON.parse(raw) : parse(raw);
  return CollectionDefinition.fromSpec(doc, defaults);
}

function details(field: FieldDeclaration): string {
  const parts: string[] = [];
  if (field.dimensions !== null) parts.push(`dimensions=${field.dimensions}`);
  if (field.indexKind !== null) parts.push(`index=${field.indexKind}`);
  if (field.distanceFunction !== null) parts.push(`distance=${field.distanceFunction}`);
  if (field.isFullTextIndexed) parts.push("full-text");
  if (field.isFilterable) parts.push("filterable");
  if (field.hasDefault) parts.push("default");
  return parts.join(", ");
}

/** Render a declaration as an aligned plain-text table. */
export function formatDeclaration(declaration: SchemaDeclaration): string {
  const header = ["ROLE", "STORAGE NAME", "PROPERTY", "TYPE", "DETAILS"];
  const rows = declaration.fields.map((f) => [
    f.role,
    f.storageName,
    f.propertyName ?? "-",
    f.valueType ?? "-",
    details(f),
  ]);
  const widths = header.map((h, i) => Math.max(h.length, ...rows.map((row) => row[i].length)));
  const line = (cells: string[]) =>
    cells
      .map((cell, i) => cell.padEnd(widths[i]))
      .join("  ")
      .trimEnd();

  return [
    `Key field: ${declaration.keyField}`,
    `Container mode: ${declaration.containerMode ? "on" : "off"}`,
    "",
    line(header),
    ...rows.map(line),
  ].join("\n");
}

export function inspectCommand(config: Config): Command {
  return new Command("inspect")
    .description("Validate a definition file and print its storage schema declaration")
    .argument("<file>", "TOML definition file ([[fields]] tables)")
    .option("--json", "Output as JSON")
    .action((file: string, opts: { json?: boolean }) => {
      let defaults: VectorDefaults;
      let jsonOutput: boolean;
      try {
        defaults = config.vectorDefaults();
        jsonOutput = opts.json === true || config.load().output.json;
      } catch (err) {
        exitWithError("CONFIG_ERROR", err instanceof Error ? err.message : String(err));
      }

      let definition: CollectionDefinition;
      try {
        definition = loadDefinitionFile(file, defaults);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        exitWithError(errorCodeFor(err), `${file}: ${message}`);
      }

      const declaration = definition.toSchemaDeclaration();
      if (jsonOutput) {
        console.log(JSON.stringify(declaration, null, 2));
      } else {
        console.log(formatDeclaration(declaration));
      }
    });
}
