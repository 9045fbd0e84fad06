import { describe, expect, it } from "vitest";
import { UniquenessExhaustedError } from "../../errors.js";
import { poolsOf, testContext } from "../../testUtils.js";
import { productsGenerator } from "./products.js";

describe("productsGenerator", () => {
  it("gives every product a unique SKU derived from its category", async () => {
    const ctx = await testContext();
    const rows = productsGenerator.generate(poolsOf({}), 300, ctx);

    expect(new Set(rows.map((r) => r.sku)).size).toBe(300);
    for (const row of rows) {
      const category = String(row.category);
      expect(String(row.sku).startsWith(`${category.slice(0, 3).toUpperCase()}-`)).toBe(true);
      expect(row.sku).toMatch(/^[A-Z]{3}-\d{4}$/);
      expect(Number(row.price)).toBeGreaterThanOrEqual(99);
      expect(Number(row.price)).toBeLessThanOrEqual(99999.99);
    }
  });

  it("stops retrying when no SKU is free", async () => {
    const base = await testContext();
    // rng pinned to 0: same category and number every time
    const ctx = { ...base, rng: () => 0 };

    expect(productsGenerator.generate(poolsOf({}), 1, ctx)[0]?.sku).toBe(
      `${base.vocabulary.productCategories[0]?.slice(0, 3).toUpperCase()}-1000`,
    );
    expect(() => productsGenerator.generate(poolsOf({}), 2, ctx)).toThrow(
      UniquenessExhaustedError,
    );
  });
});
