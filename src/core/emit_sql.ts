// src/core/emit_sql.ts
import type { GeneratedRow, SqlValue } from "../types/data.js";
import type { TableName } from "../types/schema.js";
import type { CompanyDealTotal, RecordStore } from "../types/store.js";
import { rankCompaniesByDealValue } from "./verification.js";

/**
 * Render a value as a SQL literal.
 */
export function escapeSql(value: SqlValue): string {
  if (value === null) return "NULL";
  if (typeof value === "boolean") return value ? "TRUE" : "FALSE";
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new Error(`Cannot emit non-finite number: ${value}`);
    }
    return String(value);
  }
  return `'${value.replace(/'/g, "''")}'`;
}

export function emitInsert(
  table: TableName,
  id: number,
  row: GeneratedRow,
): string {
  const columns = ["id", ...Object.keys(row)];
  const values = [String(id), ...Object.values(row).map(escapeSql)];
  return `INSERT INTO ${table} (${columns.join(", ")}) VALUES (${values.join(", ")});`;
}

type EmittedTable = { ids: number[]; rows: GeneratedRow[] };

/**
 * Store that writes a replayable SQL script instead of touching a database.
 *
 * Ids are assigned from 1 per table, exactly as SERIAL columns would on an
 * empty schema, and each table section ends by moving its sequence past the
 * last id. The script is one BEGIN/COMMIT block.
 */
export class SqlScriptStore implements RecordStore {
  private readonly lines: string[] = [];
  private readonly emitted = new Map<TableName, EmittedTable>();
  private state: "open" | "committed" | "rolled_back" = "open";

  constructor(header: string[] = []) {
    for (const line of header) {
      this.lines.push(`-- ${line}`);
    }
    if (header.length > 0) this.lines.push("");
    this.lines.push("BEGIN;");
  }

  async insertRecords(
    table: TableName,
    rows: GeneratedRow[],
  ): Promise<number[]> {
    this.assertOpen();
    if (rows.length === 0) return [];

    const entry = this.emitted.get(table) ?? { ids: [], rows: [] };
    this.emitted.set(table, entry);

    this.lines.push("", `-- ${table}`);
    const ids: number[] = [];
    for (const row of rows) {
      const id = entry.ids.length + 1;
      entry.ids.push(id);
      entry.rows.push(row);
      ids.push(id);
      this.lines.push(emitInsert(table, id, row));
    }
    this.lines.push(`SELECT setval('${table}_id_seq', ${entry.ids.length});`);

    return ids;
  }

  async fetchAllIds(table: TableName): Promise<number[]> {
    return [...(this.emitted.get(table)?.ids ?? [])];
  }

  async fetchPairs(
    table: TableName,
    keyColumn: string,
    valueColumn: string,
  ): Promise<Map<number, number>> {
    const pairs = new Map<number, number>();
    const entry = this.emitted.get(table);
    if (!entry) return pairs;

    entry.rows.forEach((row, i) => {
      const id = entry.ids[i];
      const key = keyColumn === "id" ? id : row[keyColumn];
      const value = valueColumn === "id" ? id : row[valueColumn];
      if (typeof key === "number" && typeof value === "number") {
        pairs.set(key, value);
      }
    });
    return pairs;
  }

  async countRows(table: TableName): Promise<number> {
    return this.emitted.get(table)?.ids.length ?? 0;
  }

  async topCompaniesByDealValue(limit: number): Promise<CompanyDealTotal[]> {
    const companies = this.emitted.get("companies");
    const stored = (companies?.rows ?? []).map((row, i) => ({
      id: companies?.ids[i] ?? i + 1,
      row,
    }));
    return rankCompaniesByDealValue(
      stored,
      this.emitted.get("deals")?.rows ?? [],
      limit,
    );
  }

  async commit(): Promise<void> {
    this.assertOpen();
    this.lines.push("", "COMMIT;");
    this.state = "committed";
  }

  async rollback(): Promise<void> {
    this.state = "rolled_back";
  }

  async close(): Promise<void> {}

  /** The finished script. Only available after commit(). */
  toSql(): string {
    if (this.state !== "committed") {
      throw new Error("SQL script is only available after a successful commit");
    }
    return `${this.lines.join("\n")}\n`;
  }

  private assertOpen(): void {
    if (this.state !== "open") {
      throw new Error(`SQL script store is ${this.state.replace("_", " ")}`);
    }
  }
}
