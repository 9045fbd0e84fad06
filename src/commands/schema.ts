// src/commands/schema.ts
import { Command } from "commander";
import { readFile } from "fs/promises";
import { resourceUrl } from "../util/fs.js";

export function schemaCmd(): Command {
  return new Command("schema")
    .description("Print the DDL for the CRM tables")
    .action(async () => {
      try {
        console.log(await readFile(resourceUrl("sql/schema.sql"), "utf-8"));
      } catch (error) {
        console.error(
          "❌ Reading schema failed:",
          error instanceof Error ? error.message : String(error)
        );
        process.exit(1);
      }
    });
}
