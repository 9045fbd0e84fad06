// src/core/generators/contacts.ts
import { UniquenessExhaustedError } from "../../errors.js";
import type { GeneratedRow } from "../../types/data.js";
import type { TableGenerator } from "../../types/generator.js";
import { dateBetween, formatTimestamp } from "../../util/dates.js";
import { randomPick } from "../../util/rng.js";
import { requirePool } from "../pools.js";

export const MAX_EMAIL_ATTEMPTS = 1000;

function slug(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9]/g, "");
}

/**
 * Reserve `local@domain`, appending 1, 2, ... to the local part until the
 * address is free.
 */
export function uniqueEmail(
  local: string,
  domain: string,
  used: Set<string>,
): string {
  let email = `${local}@${domain}`;
  let counter = 1;

  while (used.has(email)) {
    if (counter > MAX_EMAIL_ATTEMPTS) {
      throw new UniquenessExhaustedError(
        "contacts",
        "email",
        `${local}@${domain} collided ${MAX_EMAIL_ATTEMPTS} times`,
      );
    }
    email = `${local}${counter}@${domain}`;
    counter++;
  }

  used.add(email);
  return email;
}

export const contactsGenerator: TableGenerator = {
  table: "contacts",

  generate(pools, count, { rng, faker, now, vocabulary }) {
    const rows: GeneratedRow[] = [];
    if (count <= 0) return rows;

    const companies = requirePool(pools, "companies", "contacts");
    const departments = Object.keys(vocabulary.jobTitles);
    const usedEmails = new Set<string>();

    for (let i = 0; i < count; i++) {
      const companyId = randomPick(rng, companies.ids);
      const department = randomPick(rng, departments);
      const title = randomPick(rng, vocabulary.jobTitles[department] ?? []);

      const firstName = faker.person.firstName();
      const lastName = faker.person.lastName();
      const first = slug(firstName);
      const last = slug(lastName);

      const email = uniqueEmail(
        `${first}.${last}`,
        faker.internet.domainName(),
        usedEmails,
      );

      rows.push({
        company_id: companyId,
        first_name: firstName,
        last_name: lastName,
        email,
        phone: faker.phone.number(),
        mobile: faker.phone.number(),
        title,
        department,
        linkedin_url: `https://linkedin.com/in/${first}-${last}-${faker.string.uuid().slice(0, 8)}`,
        is_primary: i % 5 === 0,
        created_at: formatTimestamp(dateBetween(faker, now, -2 * 365, 0)),
      });
    }

    return rows;
  },
};
