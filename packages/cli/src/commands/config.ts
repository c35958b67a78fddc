import { Command } from "commander";
import type { Config } from "../config.js";
import { exitWithError } from "../errors.js";

function print(value: unknown): void {
  if (typeof value === "object" && value !== null) {
    console.log(JSON.stringify(value, null, 2));
  } else {
    console.log(String(value));
  }
}

function message(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function registerConfigCommand(program: Command, config: Config): void {
  const configCmd = program
    .command("config")
    .description("Manage vectordef configuration")
    .addHelpText("after", `
Examples:
  $ vectordef config show
  $ vectordef config get defaults.distance_function
  $ vectordef config set defaults.index_kind hnsw`);

  configCmd
    .command("show")
    .description("Display the effective configuration")
    .option("--json", "Output as JSON")
    .action((opts: { json?: boolean }) => {
      try {
        if (opts.json) {
          console.log(JSON.stringify(config.load(), null, 2));
        } else {
          console.log(`# ${config.path}${config.exists() ? "" : " (not created, showing defaults)"}`);
          console.log(config.raw());
        }
      } catch (err) {
        exitWithError("CONFIG_ERROR", message(err));
      }
    });

  configCmd
    .command("get <key>")
    .description("Get a config value (dot-notation, e.g. defaults.index_kind)")
    .action((key: string) => {
      let value: unknown;
      try {
        value = config.get(key);
      } catch (err) {
        exitWithError("CONFIG_ERROR", message(err));
      }
      if (value === undefined) {
        exitWithError("NOT_FOUND", `Key "${key}" not found.`);
      }
      print(value);
    });

  configCmd
    .command("set <key> <value>")
    .description("Set a config value (dot-notation, e.g. output.json true)")
    .action((key: string, value: string) => {
      try {
        config.set(key, value);
      } catch (err) {
        exitWithError("CONFIG_ERROR", message(err), {
          suggestion: "Known keys: defaults.index_kind, defaults.distance_function, output.json",
        });
      }
      console.log(`Set ${key} = ${String(config.get(key))}`);
    });
}
