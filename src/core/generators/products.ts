// src/core/generators/products.ts
import { UniquenessExhaustedError } from "../../errors.js";
import type { GeneratedRow } from "../../types/data.js";
import type { TableGenerator } from "../../types/generator.js";
import { dateBetween, formatTimestamp } from "../../util/dates.js";
import { randomInt, randomPick, roundMoney } from "../../util/rng.js";

export const MAX_SKU_ATTEMPTS = 1000;

export const productsGenerator: TableGenerator = {
  table: "products",

  generate(_pools, count, { rng, faker, now, vocabulary }) {
    const rows: GeneratedRow[] = [];
    const usedSkus = new Set<string>();

    for (let i = 0; i < count; i++) {
      const prefix = randomPick(rng, vocabulary.productPrefixes);
      const type = randomPick(rng, vocabulary.productTypes);
      const category = randomPick(rng, vocabulary.productCategories);
      const skuPrefix = category.slice(0, 3).toUpperCase();

      let sku = `${skuPrefix}-${randomInt(rng, 1000, 9999)}`;
      let attempts = 1;
      while (usedSkus.has(sku)) {
        if (attempts >= MAX_SKU_ATTEMPTS) {
          throw new UniquenessExhaustedError(
            "products",
            "sku",
            `no free ${skuPrefix}-NNNN value after ${MAX_SKU_ATTEMPTS} attempts`,
          );
        }
        sku = `${skuPrefix}-${randomInt(rng, 1000, 9999)}`;
        attempts++;
      }
      usedSkus.add(sku);

      rows.push({
        name: `${prefix} ${category} ${type}`,
        description: faker.lorem.paragraph(2),
        price: roundMoney(randomInt(rng, 99, 99999) + randomInt(rng, 0, 99) / 100),
        sku,
        category,
        is_active: rng() > 0.1,
        created_at: formatTimestamp(dateBetween(faker, now, -2 * 365, 0)),
      });
    }

    return rows;
  },
};
