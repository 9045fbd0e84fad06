// src/types/plan.ts
import type { TableName } from "./schema.js";

export type GenerationPlan = {
  seed: number;
  includeDeps: boolean;
  // Tables named in the --tables selection, in the order given
  requested: TableName[];
  tableOrder: TableName[];
  counts: Map<TableName, number>;
  autoIncluded: TableName[];
  // Dependencies outside the plan that must already exist in the store
  externalDependencies: Array<{ table: TableName; dependency: TableName }>;
};

export type GenerationResult = {
  counts: Map<TableName, number>;
  // Tables whose pools were fetched from existing data, with their sizes
  reused: Map<TableName, number>;
};
