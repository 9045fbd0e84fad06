// src/commands/tables.ts
import { Command } from "commander";
import { describeSchema } from "../core/schema.js";

/**
 * One line per table with its default count and direct dependencies.
 */
export function formatTableListing(): string[] {
  const rule = "-".repeat(50);
  const lines = ["Available tables and dependencies:", rule];

  for (const table of describeSchema()) {
    const deps =
      table.dependencies.length > 0 ? table.dependencies.join(", ") : "(none)";
    lines.push(
      `  ${table.name.padEnd(15)} default: ${String(table.defaultCount).padStart(4)}  deps: ${deps}`
    );
  }

  lines.push(rule);
  return lines;
}

export function tablesCmd(): Command {
  return new Command("tables")
    .description("List available tables, their default counts and dependencies")
    .action(() => {
      console.log(formatTableListing().join("\n"));
    });
}
