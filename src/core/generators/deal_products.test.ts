import { describe, expect, it } from "vitest";
import { UniquenessExhaustedError } from "../../errors.js";
import { poolsOf, testContext } from "../../testUtils.js";
import { dealProductsGenerator } from "./deal_products.js";

describe("dealProductsGenerator", () => {
  const pools = poolsOf({
    deals: { ids: [1, 2, 3] },
    products: {
      ids: [7, 8],
      refs: new Map([
        [7, 100],
        [8, 50],
      ]),
    },
  });

  it("fills every distinct pair when asked for all of them", async () => {
    const ctx = await testContext();
    const rows = dealProductsGenerator.generate(pools, 6, ctx);

    const pairs = rows.map((r) => `${r.deal_id}:${r.product_id}`).sort();
    expect(pairs).toEqual(["1:7", "1:8", "2:7", "2:8", "3:7", "3:8"]);
  });

  it("prices lines around the product price", async () => {
    const ctx = await testContext(3);
    const rows = dealProductsGenerator.generate(pools, 5, ctx);

    for (const row of rows) {
      const base = row.product_id === 7 ? 100 : 50;
      const unitPrice = Number(row.unit_price);
      expect(unitPrice).toBeGreaterThanOrEqual(base * 0.8);
      expect(unitPrice).toBeLessThanOrEqual(base * 1.2);
      expect(Number(row.quantity)).toBeGreaterThanOrEqual(1);
      expect(Number(row.quantity)).toBeLessThanOrEqual(20);
      expect([0, 5, 10, 15, 20]).toContain(row.discount_percent);
    }
  });

  it("refuses more pairs than deals x products", async () => {
    const ctx = await testContext();
    expect(() => dealProductsGenerator.generate(pools, 7, ctx)).toThrow(
      UniquenessExhaustedError,
    );
  });

  it("produces nothing for a zero or negative count", async () => {
    const ctx = await testContext();
    expect(dealProductsGenerator.generate(poolsOf({}), 0, ctx)).toEqual([]);
    expect(dealProductsGenerator.generate(poolsOf({}), -2, ctx)).toEqual([]);
  });
});
