#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import { generateCmd } from "./commands/generate.js";
import { schemaCmd } from "./commands/schema.js";
import { tablesCmd } from "./commands/tables.js";

const program = new Command();

program
  .name("crm-seeder")
  .description("Synthetic CRM data with foreign-key aware table ordering")
  .version("0.1.0");

program.addCommand(generateCmd());
program.addCommand(tablesCmd());
program.addCommand(schemaCmd());

await program.parseAsync(process.argv);
