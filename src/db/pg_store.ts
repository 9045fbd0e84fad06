// src/db/pg_store.ts
import pg from "pg";
import type { Client as PgClient } from "pg";
import type { GeneratedRow, SqlValue } from "../types/data.js";
import type { TableName } from "../types/schema.js";
import type { CompanyDealTotal, RecordStore } from "../types/store.js";

const { Client } = pg;

// Rows per INSERT statement; keeps bind parameters well under the 65535 limit
const BATCH_SIZE = 500;

/**
 * Live PostgreSQL store. The whole run happens inside one transaction that
 * is opened on connect and closed by commit() or rollback().
 */
export class PgRecordStore implements RecordStore {
  private constructor(private readonly client: PgClient) {}

  static async connect(connectionString: string): Promise<PgRecordStore> {
    const client = new Client({ connectionString });
    await client.connect();

    try {
      await client.query("BEGIN");
    } catch (error) {
      await client.end();
      throw error;
    }

    return new PgRecordStore(client);
  }

  async insertRecords(
    table: TableName,
    rows: GeneratedRow[],
  ): Promise<number[]> {
    const ids: number[] = [];

    for (let start = 0; start < rows.length; start += BATCH_SIZE) {
      const batch = rows.slice(start, start + BATCH_SIZE);
      const columns = Object.keys(batch[0] ?? {});
      const values: SqlValue[] = [];

      const tuples = batch.map((row) => {
        const params = columns.map((col) => {
          values.push(row[col] ?? null);
          return `$${values.length}`;
        });
        return `(${params.join(", ")})`;
      });

      // Postgres returns rows of a multi-row VALUES insert in input order
      const res = await this.client.query<{ id: number }>(
        `INSERT INTO ${this.ident(table)} (${columns.map((c) => this.ident(c)).join(", ")})
         VALUES ${tuples.join(", ")}
         RETURNING id`,
        values,
      );
      ids.push(...res.rows.map((r) => r.id));
    }

    return ids;
  }

  async fetchAllIds(table: TableName): Promise<number[]> {
    const res = await this.client.query<{ id: number }>(
      `SELECT id FROM ${this.ident(table)} ORDER BY id`,
    );
    return res.rows.map((r) => r.id);
  }

  async fetchPairs(
    table: TableName,
    keyColumn: string,
    valueColumn: string,
  ): Promise<Map<number, number>> {
    // DECIMAL columns come back as strings
    const res = await this.client.query<{
      key: number | string;
      value: number | string;
    }>(
      `SELECT ${this.ident(keyColumn)} AS key, ${this.ident(valueColumn)} AS value
       FROM ${this.ident(table)}
       ORDER BY ${this.ident(keyColumn)}`,
    );

    const pairs = new Map<number, number>();
    for (const r of res.rows) {
      pairs.set(Number(r.key), Number(r.value));
    }
    return pairs;
  }

  async countRows(table: TableName): Promise<number> {
    const res = await this.client.query<{ count: number }>(
      `SELECT COUNT(*)::int AS count FROM ${this.ident(table)}`,
    );
    return res.rows[0]?.count ?? 0;
  }

  async topCompaniesByDealValue(limit: number): Promise<CompanyDealTotal[]> {
    const res = await this.client.query<{
      name: string;
      deal_count: number;
      total_value: string;
    }>(
      `SELECT c.name, COUNT(d.id)::int AS deal_count,
              COALESCE(SUM(d.value), 0) AS total_value
       FROM companies c
       LEFT JOIN deals d ON c.id = d.company_id
       GROUP BY c.id, c.name
       ORDER BY total_value DESC, c.id
       LIMIT $1`,
      [limit],
    );

    return res.rows.map((r) => ({
      name: r.name,
      dealCount: r.deal_count,
      totalValue: Number(r.total_value),
    }));
  }

  async commit(): Promise<void> {
    await this.client.query("COMMIT");
  }

  async rollback(): Promise<void> {
    await this.client.query("ROLLBACK");
  }

  async close(): Promise<void> {
    await this.client.end();
  }

  private ident(name: string): string {
    return this.client.escapeIdentifier(name);
  }
}
