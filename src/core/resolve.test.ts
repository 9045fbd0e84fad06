import { describe, expect, it } from "vitest";
import { CycleError, UnknownTableError } from "../errors.js";
import type { TableName } from "../types/schema.js";
import { resolveTables } from "./resolve.js";
import { ALL_TABLES, TABLE_DEPENDENCIES } from "./schema.js";

function expectedClosure(requested: TableName[]): Set<TableName> {
  const seen = new Set<TableName>();
  const visit = (table: TableName) => {
    if (seen.has(table)) return;
    seen.add(table);
    TABLE_DEPENDENCIES[table].forEach(visit);
  };
  requested.forEach(visit);
  return seen;
}

function allSubsets(): TableName[][] {
  const subsets: TableName[][] = [];
  for (let mask = 0; mask < 1 << ALL_TABLES.length; mask++) {
    subsets.push(ALL_TABLES.filter((_, i) => mask & (1 << i)));
  }
  return subsets;
}

describe("resolveTables", () => {
  it("adds transitive dependencies ahead of the requested table", () => {
    expect(resolveTables(["contacts"], true)).toEqual(["companies", "contacts"]);
    expect(resolveTables(["tasks"], true)).toEqual([
      "companies",
      "contacts",
      "deals",
      "tasks",
    ]);
    expect(resolveTables(["deal_products"], true)).toEqual([
      "companies",
      "contacts",
      "deals",
      "products",
      "deal_products",
    ]);
  });

  it("breaks ties by the canonical table order", () => {
    expect(resolveTables(["notes", "products"], true)).toEqual([
      "companies",
      "contacts",
      "products",
      "notes",
    ]);
    expect(resolveTables([...ALL_TABLES].reverse(), true)).toEqual([
      ...ALL_TABLES,
    ]);
  });

  it("returns the closure with dependencies first for every subset", () => {
    for (const subset of allSubsets()) {
      const order = resolveTables(subset, true);

      expect(new Set(order)).toEqual(expectedClosure(subset));
      expect(order).toHaveLength(new Set(order).size);
      order.forEach((table, index) => {
        for (const dep of TABLE_DEPENDENCIES[table]) {
          expect(order.indexOf(dep)).toBeGreaterThanOrEqual(0);
          expect(order.indexOf(dep)).toBeLessThan(index);
        }
      });
    }
  });

  it("is deterministic", () => {
    const requested: TableName[] = ["tasks", "notes", "deal_products"];
    expect(resolveTables(requested, true)).toEqual(
      resolveTables(requested, true),
    );
  });

  it("passes requested tables through untouched without dependencies", () => {
    expect(resolveTables(["tasks", "companies"], false)).toEqual([
      "tasks",
      "companies",
    ]);
    expect(resolveTables(["deals"], false)).toEqual(["deals"]);
    expect(resolveTables([], false)).toEqual([]);
  });

  it("fails on a cycle instead of looping", () => {
    const graph: Record<string, string[]> = { a: ["b"], b: ["a"], c: [] };
    const enumeration = ["a", "b", "c"];

    expect(() => resolveTables<string>(["a", "c"], true, graph, enumeration)).toThrow(
      CycleError,
    );
    try {
      resolveTables<string>(["a", "c"], true, graph, enumeration);
    } catch (error) {
      expect(error).toBeInstanceOf(CycleError);
      expect(error instanceof CycleError && error.remaining).toEqual(["a", "b"]);
    }
  });

  it("treats a self-dependency as a cycle", () => {
    expect(() => resolveTables<string>(["a"], true, { a: ["a"] }, ["a"])).toThrow(
      "Circular dependency detected involving tables: a",
    );
  });

  it("rejects a dependency outside the enumeration", () => {
    expect(() => resolveTables<string>(["a"], true, { a: ["zzz"] }, ["a"])).toThrow(
      UnknownTableError,
    );
  });
});
