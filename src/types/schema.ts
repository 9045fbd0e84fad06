// src/types/schema.ts
import type { ALL_TABLES } from "../core/schema.js";

export type TableName = (typeof ALL_TABLES)[number];

/** table -> tables whose identifiers it needs as foreign keys */
export type DependencyGraph<T extends string = TableName> = Readonly<
  Record<T, readonly T[]>
>;

export type TableDescriptor = {
  name: TableName;
  dependencies: readonly TableName[];
  defaultCount: number;
  // Secondary column other tables key off (exported alongside ids)
  lookupColumn?: string;
};
