// src/core/generators/companies.ts
import type { GeneratedRow } from "../../types/data.js";
import type { TableGenerator } from "../../types/generator.js";
import { dateBetween, formatTimestamp } from "../../util/dates.js";
import { randomInt, randomPick } from "../../util/rng.js";

export const companiesGenerator: TableGenerator = {
  table: "companies",

  generate(_pools, count, { rng, faker, now, vocabulary }) {
    const rows: GeneratedRow[] = [];

    for (let i = 0; i < count; i++) {
      rows.push({
        name: faker.company.name(),
        industry: randomPick(rng, vocabulary.industries),
        website: faker.internet.url(),
        address: faker.location.streetAddress(),
        city: faker.location.city(),
        state: faker.location.state({ abbreviated: true }),
        country: "USA",
        postal_code: faker.location.zipCode(),
        phone: faker.phone.number(),
        employee_count: randomInt(rng, 10, 10000),
        annual_revenue: randomInt(rng, 100_000, 100_000_000),
        created_at: formatTimestamp(dateBetween(faker, now, -3 * 365, 0)),
      });
    }

    return rows;
  },
};
