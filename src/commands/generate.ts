// src/commands/generate.ts
import { Command } from "commander";
import { createContext } from "../core/context.js";
import { SqlScriptStore } from "../core/emit_sql.js";
import { generateRows } from "../core/generate_rows.js";
import { formatCompanyDealTotals } from "../core/verification.js";
import { buildPlan } from "../core/plan.js";
import { PgRecordStore } from "../db/pg_store.js";
import { resolveGenerateOptions } from "../models/options.js";
import type { GenerateOptions } from "../types/commands/generate.type.js";
import type { GeneratorContext } from "../types/generator.js";
import type { GenerationPlan, GenerationResult } from "../types/plan.js";
import type { RecordStore } from "../types/store.js";
import { writeFile } from "../util/fs.js";

export function generateCmd(): Command {
  const cmd = new Command("generate");

  cmd
    .description("Generate CRM data into PostgreSQL or as a SQL script")
    .option(
      "-t, --tables <spec>",
      'Tables to generate: "all", "companies,contacts" or "companies:50,contacts" (env: GENERATE_TABLES, default: all)'
    )
    .option(
      "-n, --count <n>",
      "Records per table, unless the table spec gives one (env: GENERATE_COUNT)"
    )
    .option(
      "--no-deps",
      "Do not auto-include dependencies; use existing rows instead (env: GENERATE_NO_DEPS)"
    )
    .option("--seed <n>", "Random seed for a reproducible run (env: GENERATE_SEED)")
    .option("--sql", "Emit a SQL script instead of inserting")
    .option(
      "-o, --output <file>",
      "SQL script path (defaults to stdout, auto-prefixes output/ for relative paths)"
    )
    .option(
      "-c, --connection <string>",
      "PostgreSQL connection string (env: DATABASE_URL or DB_HOST/DB_PORT/DB_USER/DB_PASSWORD/DB_NAME)"
    )
    .option("--dry-run", "Show plan without generating data")
    .action(async (rawOptions: unknown) => {
      try {
        const options = resolveGenerateOptions(rawOptions, process.env);
        await processGeneration(options);
      } catch (error) {
        console.error(
          "❌ Generation failed:",
          error instanceof Error ? error.message : String(error)
        );
        process.exit(1);
      }
    });

  return cmd;
}

async function processGeneration(options: GenerateOptions): Promise<void> {
  console.error("🔧 Building generation plan...");
  const plan = buildPlan({
    tables: options.tables,
    count: options.count,
    includeDeps: options.includeDeps,
    seed: options.seed,
  });

  printPlan(plan);

  if (options.dryRun) {
    console.error("🚫 Dry run - skipping generation");
    return;
  }

  const context = await createContext({ seed: plan.seed });

  if (options.mode === "sql") {
    const store = new SqlScriptStore([
      "CRM sample data",
      "Generated by crm-seeder",
      `Seed: ${plan.seed}`,
      `Generated at: ${context.now.toISOString()}`,
    ]);

    console.error("🎲 Generating data...");
    const result = await runGeneration(plan, store, context);
    const sql = store.toSql();

    if (options.output) {
      await writeFile(options.output, sql);
      console.error(`✅ SQL written to ${options.output}`);
    } else {
      console.log(sql);
    }

    printSummary(result);
    return;
  }

  if (!options.connectionString) {
    throw new Error("No database connection configured");
  }

  console.error("🔌 Connecting to database...");
  const store = await PgRecordStore.connect(options.connectionString);

  try {
    console.error("🎲 Generating data...");
    const result = await runGeneration(plan, store, context);
    console.error("✅ All data committed");

    await printVerification(store, plan);
    printSummary(result);
  } finally {
    await store.close();
  }
}

function runGeneration(
  plan: GenerationPlan,
  store: RecordStore,
  context: GeneratorContext
): Promise<GenerationResult> {
  return generateRows(plan, store, {
    context,
    log: (message) => console.error(`   ${message}`),
  });
}

function printPlan(plan: GenerationPlan): void {
  console.error("");
  console.error("📋 Generation Plan:");
  console.error(`   Seed: ${plan.seed}`);
  console.error(`   Table order: ${plan.tableOrder.join(" → ")}`);
  console.error("");

  for (const table of plan.tableOrder) {
    const marker = plan.autoIncluded.includes(table) ? "*" : " ";
    console.error(`   ${marker} ${table}: ${plan.counts.get(table) ?? 0} rows`);
  }

  if (plan.autoIncluded.length > 0) {
    console.error("\n   * = auto-included dependency");
  }

  if (plan.externalDependencies.length > 0) {
    console.error("\n   Using existing data for dependencies:");
    for (const { table, dependency } of plan.externalDependencies) {
      console.error(`     ${table} requires existing ${dependency} records`);
    }
  }
  console.error("");
}

async function printVerification(
  store: RecordStore,
  plan: GenerationPlan
): Promise<void> {
  console.error("\n🔎 Data verification:");
  for (const table of plan.tableOrder) {
    console.error(`   ${table}: ${await store.countRows(table)} records`);
  }

  console.error("\n🏆 Top 10 companies by deal value:");
  const top = await store.topCompaniesByDealValue(10);
  for (const line of formatCompanyDealTotals(top)) {
    console.error(`   ${line}`);
  }
}

function printSummary(result: GenerationResult): void {
  let totalRows = 0;
  for (const count of result.counts.values()) {
    totalRows += count;
  }
  console.error(
    `\n✅ Generated ${totalRows} rows across ${result.counts.size} tables`
  );
  for (const [table, count] of result.counts) {
    console.error(`   ${table}: ${count}`);
  }
}
