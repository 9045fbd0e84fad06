// src/types/store.ts
import type { GeneratedRow } from "./data.js";
import type { TableName } from "./schema.js";

export type CompanyDealTotal = {
  name: string;
  dealCount: number;
  totalValue: number;
};

/**
 * Persistence collaborator used by the generation driver. Implementations
 * hold one open transaction from creation until commit() or rollback().
 */
export interface RecordStore {
  /** Persist rows and return their primary keys, in row order. */
  insertRecords(table: TableName, rows: GeneratedRow[]): Promise<number[]>;
  fetchAllIds(table: TableName): Promise<number[]>;
  fetchPairs(
    table: TableName,
    keyColumn: string,
    valueColumn: string,
  ): Promise<Map<number, number>>;
  countRows(table: TableName): Promise<number>;
  /**
   * Companies ranked by the summed value of their deals, companies without
   * deals included at zero. Used to check deal -> company links after a run.
   */
  topCompaniesByDealValue(limit: number): Promise<CompanyDealTotal[]>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  close(): Promise<void>;
}
