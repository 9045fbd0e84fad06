// src/core/schema.ts
import type {
  DependencyGraph,
  TableDescriptor,
  TableName,
} from "../types/schema.js";

/** Canonical table enumeration; also the tie-break order for planning. */
export const ALL_TABLES = [
  "companies",
  "contacts",
  "deals",
  "products",
  "deal_products",
  "activities",
  "notes",
  "tasks",
] as const;

export const TABLE_DEPENDENCIES: DependencyGraph = {
  companies: [],
  contacts: ["companies"],
  deals: ["companies", "contacts"],
  products: [],
  deal_products: ["deals", "products"],
  activities: ["contacts"],
  notes: ["contacts"],
  tasks: ["deals"],
};

export const DEFAULT_COUNTS: Readonly<Record<TableName, number>> = {
  companies: 100,
  contacts: 500,
  deals: 200,
  products: 50,
  deal_products: 300,
  activities: 400,
  notes: 300,
  tasks: 150,
};

const LOOKUP_COLUMNS: Partial<Record<TableName, string>> = {
  contacts: "company_id",
  products: "price",
};

const TABLE_NAMES: readonly string[] = ALL_TABLES;

export function isTableName(name: string): name is TableName {
  return TABLE_NAMES.includes(name);
}

export function describeTable(table: TableName): TableDescriptor {
  const lookupColumn = LOOKUP_COLUMNS[table];
  return {
    name: table,
    dependencies: TABLE_DEPENDENCIES[table],
    defaultCount: DEFAULT_COUNTS[table],
    ...(lookupColumn ? { lookupColumn } : {}),
  };
}

export function describeSchema(): TableDescriptor[] {
  return ALL_TABLES.map(describeTable);
}
