// src/core/generators/deal_products.ts
import { UniquenessExhaustedError } from "../../errors.js";
import type { GeneratedRow } from "../../types/data.js";
import type { TableGenerator } from "../../types/generator.js";
import { randomFloat, randomInt, randomPick, roundMoney } from "../../util/rng.js";
import { lookupRef, requirePool } from "../pools.js";

const DISCOUNTS = [0, 0, 0, 5, 10, 15, 20] as const;

export const dealProductsGenerator: TableGenerator = {
  table: "deal_products",

  generate(pools, count, { rng }) {
    const rows: GeneratedRow[] = [];
    if (count <= 0) return rows;

    const deals = requirePool(pools, "deals", "deal_products");
    const products = requirePool(pools, "products", "deal_products");

    const capacity = deals.ids.length * products.ids.length;
    if (count > capacity) {
      throw new UniquenessExhaustedError(
        "deal_products",
        "(deal_id, product_id)",
        `requested ${count} pairs but only ${capacity} exist (${deals.ids.length} deals x ${products.ids.length} products)`,
      );
    }

    const usedPairs = new Set<string>();
    while (rows.length < count) {
      const dealId = randomPick(rng, deals.ids);
      const productId = randomPick(rng, products.ids);

      const pair = `${dealId}:${productId}`;
      if (usedPairs.has(pair)) continue;
      usedPairs.add(pair);

      const basePrice = lookupRef(products, productId, "products");

      rows.push({
        deal_id: dealId,
        product_id: productId,
        quantity: randomInt(rng, 1, 20),
        unit_price: roundMoney(basePrice * randomFloat(rng, 0.8, 1.2)),
        discount_percent: randomPick(rng, DISCOUNTS),
      });
    }

    return rows;
  },
};
