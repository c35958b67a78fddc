#!/usr/bin/env -S node --import tsx
import { Command } from "commander";
import { Config } from "./config.js";
import { inspectCommand } from "./commands/inspect.js";
import { registerConfigCommand } from "./commands/config.js";
import { setJsonMode } from "./json-mode.js";

const config = new Config(process.env.VECTORDEF_CONFIG_DIR);

const program = new Command();

program
  .name("vectordef")
  .description("Validate vector store collection definitions and print their storage schema")
  .version("0.1.0");

program.hook("preAction", (_thisCommand, actionCommand) => {
  if (actionCommand.opts().json) setJsonMode(true);
});

program.addCommand(inspectCommand(config));
registerConfigCommand(program, config);

program.parse();
