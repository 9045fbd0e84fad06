import type { GenerationPlan } from "../types/plan.js";
import type { TableName } from "../types/schema.js";
import { resolveTables } from "./resolve.js";
import { DEFAULT_COUNTS, TABLE_DEPENDENCIES } from "./schema.js";
import { parseTableSpec } from "./table_spec.js";

export type PlanInput = {
  tables: string;
  count?: number;
  includeDeps: boolean;
  seed?: number;
};

/**
 * Build a generation plan from a table spec.
 */
export function buildPlan(input: PlanInput): GenerationPlan {
  const seed = input.seed ?? Date.now();

  const tableCounts = parseTableSpec(input.tables, input.count);
  const requested = [...tableCounts.keys()];

  const tableOrder = resolveTables(requested, input.includeDeps);

  // Auto-included dependencies fall back to --count, then the table default
  const counts = new Map<TableName, number>();
  for (const table of tableOrder) {
    counts.set(
      table,
      tableCounts.get(table) ??
        (input.count ? input.count : DEFAULT_COUNTS[table]),
    );
  }

  const autoIncluded = tableOrder.filter((t) => !tableCounts.has(t));

  const externalDependencies: GenerationPlan["externalDependencies"] = [];
  for (const [index, table] of tableOrder.entries()) {
    for (const dependency of TABLE_DEPENDENCIES[table]) {
      const position = tableOrder.indexOf(dependency);
      if (position === -1 || position > index) {
        externalDependencies.push({ table, dependency });
      }
    }
  }

  return {
    seed,
    includeDeps: input.includeDeps,
    requested,
    tableOrder,
    counts,
    autoIncluded,
    externalDependencies,
  };
}
