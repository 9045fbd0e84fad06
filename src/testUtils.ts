// src/testUtils.ts
import { createContext } from "./core/context.js";
import { PoolMap } from "./core/pools.js";
import { isTableName } from "./core/schema.js";
import { rankCompaniesByDealValue } from "./core/verification.js";
import type { GeneratedRow, StoredRecord } from "./types/data.js";
import type { GeneratorContext } from "./types/generator.js";
import type { TableName } from "./types/schema.js";
import type { CompanyDealTotal, RecordStore } from "./types/store.js";

export const TEST_NOW = new Date("2026-01-15T12:00:00Z");

export function testContext(seed = 42): Promise<GeneratorContext> {
  return createContext({ seed, now: TEST_NOW });
}

export function poolsOf(
  entries: Partial<Record<TableName, { ids: number[]; refs?: Map<number, number> }>>,
): PoolMap {
  const pools = new PoolMap();
  for (const [table, pool] of Object.entries(entries)) {
    if (pool && isTableName(table)) {
      pools.set(table, { ids: pool.ids, refs: pool.refs ?? new Map() });
    }
  }
  return pools;
}

/**
 * In-process RecordStore. Rows inserted before commit() are discarded by
 * rollback(); rows passed to the constructor count as already persisted.
 */
export class MemoryRecordStore implements RecordStore {
  committed = false;
  rolledBack = false;
  closed = false;

  private readonly persisted = new Map<TableName, StoredRecord[]>();
  private pending = new Map<TableName, StoredRecord[]>();

  constructor(existing: Partial<Record<TableName, GeneratedRow[]>> = {}) {
    for (const [table, rows] of Object.entries(existing)) {
      if (!rows || !isTableName(table)) continue;
      this.persisted.set(
        table,
        rows.map((row, i) => ({ id: i + 1, row })),
      );
    }
  }

  rows(table: TableName): StoredRecord[] {
    return [
      ...(this.persisted.get(table) ?? []),
      ...(this.pending.get(table) ?? []),
    ];
  }

  async insertRecords(table: TableName, rows: GeneratedRow[]): Promise<number[]> {
    const existing = this.rows(table);
    let nextId = existing.reduce((max, r) => Math.max(max, r.id), 0) + 1;

    const stored = rows.map((row) => ({ id: nextId++, row }));
    this.pending.set(table, [...(this.pending.get(table) ?? []), ...stored]);
    return stored.map((r) => r.id);
  }

  async fetchAllIds(table: TableName): Promise<number[]> {
    return this.rows(table).map((r) => r.id);
  }

  async fetchPairs(
    table: TableName,
    keyColumn: string,
    valueColumn: string,
  ): Promise<Map<number, number>> {
    const pairs = new Map<number, number>();
    for (const { id, row } of this.rows(table)) {
      const key = keyColumn === "id" ? id : row[keyColumn];
      const value = valueColumn === "id" ? id : row[valueColumn];
      if (typeof key === "number" && typeof value === "number") {
        pairs.set(key, value);
      }
    }
    return pairs;
  }

  async countRows(table: TableName): Promise<number> {
    return this.rows(table).length;
  }

  async topCompaniesByDealValue(limit: number): Promise<CompanyDealTotal[]> {
    return rankCompaniesByDealValue(
      this.rows("companies"),
      this.rows("deals").map((r) => r.row),
      limit,
    );
  }

  async commit(): Promise<void> {
    for (const [table, rows] of this.pending) {
      this.persisted.set(table, [...(this.persisted.get(table) ?? []), ...rows]);
    }
    this.pending = new Map();
    this.committed = true;
  }

  async rollback(): Promise<void> {
    this.pending = new Map();
    this.rolledBack = true;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
