// src/core/pools.ts
import { MissingPrerequisiteError } from "../errors.js";
import type { IdentifierPool, PoolReader } from "../types/data.js";
import type { TableName } from "../types/schema.js";

/**
 * Identifier pools for one run. Only the driver writes to it; generators see
 * it through PoolReader.
 */
export class PoolMap implements PoolReader {
  private readonly pools = new Map<TableName, IdentifierPool>();

  get(table: TableName): Readonly<IdentifierPool> | undefined {
    return this.pools.get(table);
  }

  set(table: TableName, pool: IdentifierPool): void {
    this.pools.set(table, pool);
  }

  hasRows(table: TableName): boolean {
    return (this.pools.get(table)?.ids.length ?? 0) > 0;
  }
}

export function requirePool(
  pools: PoolReader,
  table: TableName,
  requiredBy: TableName,
): Readonly<IdentifierPool> {
  const pool = pools.get(table);
  if (!pool || pool.ids.length === 0) {
    throw new MissingPrerequisiteError(table, requiredBy);
  }
  return pool;
}

export function lookupRef(
  pool: Readonly<IdentifierPool>,
  id: number,
  table: TableName,
): number {
  const value = pool.refs.get(id);
  if (value === undefined) {
    throw new Error(`No lookup value for ${table} id ${id}`);
  }
  return value;
}
