// src/core/resolve.ts
import type { DependencyGraph, TableName } from "../types/schema.js";
import { dependencyClosure, toposort } from "../util/toposort.js";
import { ALL_TABLES, TABLE_DEPENDENCIES } from "./schema.js";

/**
 * Resolve the ordered list of tables to generate.
 *
 * With `includeDeps` off the requested tables are returned as given and the
 * caller relies on existing data for their dependencies.
 */
export function resolveTables(
  requested: readonly TableName[],
  includeDeps: boolean,
): TableName[];
export function resolveTables<T extends string>(
  requested: readonly T[],
  includeDeps: boolean,
  graph: DependencyGraph<T>,
  enumeration: readonly T[],
): T[];
export function resolveTables(
  requested: readonly string[],
  includeDeps: boolean,
  graph: DependencyGraph<string> = TABLE_DEPENDENCIES,
  enumeration: readonly string[] = ALL_TABLES,
): string[] {
  if (!includeDeps) {
    return [...new Set(requested)];
  }

  const closure = dependencyClosure(requested, graph, enumeration);
  return toposort(closure, graph, enumeration);
}
