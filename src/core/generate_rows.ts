// src/core/generate_rows.ts
import { MissingPrerequisiteError } from "../errors.js";
import type { IdentifierPool } from "../types/data.js";
import type { GeneratorContext } from "../types/generator.js";
import type { GenerationPlan, GenerationResult } from "../types/plan.js";
import type { TableName } from "../types/schema.js";
import type { RecordStore } from "../types/store.js";
import { GENERATORS } from "./generators/index.js";
import { PoolMap } from "./pools.js";
import { describeTable } from "./schema.js";

export type GenerateRowsOptions = {
  context: GeneratorContext;
  log?: (message: string) => void;
};

/**
 * Generate every table in the plan, in order, and commit once at the end.
 *
 * Dependencies that were not generated in this run (or came out empty) are
 * loaded from the store before the dependent table runs. Any failure rolls
 * the store back and is rethrown; a rollback that fails as well is reported
 * through `log` and the original error still wins.
 */
export async function generateRows(
  plan: GenerationPlan,
  store: RecordStore,
  options: GenerateRowsOptions,
): Promise<GenerationResult> {
  const { context } = options;
  const log = options.log ?? (() => {});

  const pools = new PoolMap();
  const counts = new Map<TableName, number>();
  const reused = new Map<TableName, number>();

  try {
    for (const table of plan.tableOrder) {
      const count = plan.counts.get(table) ?? 0;
      const descriptor = describeTable(table);

      if (count > 0) {
        for (const dependency of descriptor.dependencies) {
          if (pools.hasRows(dependency)) continue;

          const pool = await fetchPool(store, dependency);
          if (pool.ids.length === 0) {
            throw new MissingPrerequisiteError(dependency, table);
          }
          pools.set(dependency, pool);
          reused.set(dependency, pool.ids.length);
          log(`Using ${pool.ids.length} existing ${dependency}`);
        }
      }

      log(`Generating ${count} ${table}...`);
      const rows = GENERATORS[table].generate(pools, count, context);
      const ids = await store.insertRecords(table, rows);

      const refs = new Map<number, number>();
      const { lookupColumn } = descriptor;
      if (lookupColumn) {
        ids.forEach((id, i) => {
          const value = rows[i]?.[lookupColumn];
          if (typeof value === "number") refs.set(id, value);
        });
      }

      pools.set(table, { ids, refs });
      counts.set(table, ids.length);
      log(`  Created ${ids.length} ${table}`);
    }

    await store.commit();
  } catch (error) {
    try {
      await store.rollback();
    } catch (rollbackError) {
      log(
        `Rollback failed: ${rollbackError instanceof Error ? rollbackError.message : String(rollbackError)}`,
      );
    }
    throw error;
  }

  return { counts, reused };
}

async function fetchPool(
  store: RecordStore,
  table: TableName,
): Promise<IdentifierPool> {
  const { lookupColumn } = describeTable(table);
  if (!lookupColumn) {
    return { ids: await store.fetchAllIds(table), refs: new Map() };
  }

  const refs = await store.fetchPairs(table, "id", lookupColumn);
  return { ids: [...refs.keys()], refs };
}
