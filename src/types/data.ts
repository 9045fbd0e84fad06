// src/types/data.ts
import type { TableName } from "./schema.js";

export type SqlValue = string | number | boolean | null;

export type GeneratedRow = Record<string, SqlValue>;

/** A row together with the id the store assigned to it. */
export type StoredRecord = { id: number; row: GeneratedRow };

export type IdentifierPool = {
  ids: number[];
  // id -> secondary attribute (contact -> company_id, product -> price)
  refs: Map<number, number>;
};

/** Read-only view of the pools handed to generators. */
export interface PoolReader {
  get(table: TableName): Readonly<IdentifierPool> | undefined;
}
