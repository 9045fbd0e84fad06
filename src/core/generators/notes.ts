// src/core/generators/notes.ts
import type { Faker } from "@faker-js/faker";
import type { GeneratedRow } from "../../types/data.js";
import type { TableGenerator } from "../../types/generator.js";
import type { RNG } from "../../types/rng.js";
import { dateBetween, formatTimestamp } from "../../util/dates.js";
import { randomInt, randomPick } from "../../util/rng.js";
import { requirePool } from "../pools.js";

type Filler = (rng: RNG, faker: Faker, now: Date) => string;

const FILLERS: Record<string, Filler> = {
  name: (_rng, faker) => faker.person.fullName(),
  topic: (_rng, faker) => faker.company.buzzPhrase(),
  role: (rng) => randomPick(rng, ["CEO", "CTO", "CFO", "VP", "Director"]),
  dept: (rng) => randomPick(rng, ["Finance", "IT", "Operations", "Executive"]),
  time: (rng) => randomPick(rng, ["morning", "afternoon", "after 3pm"]),
  competitor: (_rng, faker) => faker.company.name(),
  feature: (_rng, faker) => faker.company.buzzPhrase(),
  product: (rng) =>
    `${randomPick(rng, ["Pro", "Enterprise"])} ${randomPick(rng, ["Suite", "Platform"])}`,
  date: (_rng, faker, now) =>
    dateBetween(faker, now, 0, 30).toLocaleDateString("en-US", {
      month: "long",
      day: "2-digit",
      timeZone: "UTC",
    }),
  requirements: (_rng, faker) => faker.company.buzzPhrase(),
  budget: (rng) => `$${randomInt(rng, 10, 500)}K`,
  timeline: (rng) => `${randomInt(rng, 1, 6)} months`,
};

/**
 * Replace `{placeholder}` markers; unknown placeholders are left as written.
 */
export function fillTemplate(
  template: string,
  fill: (key: string) => string | undefined,
): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => fill(key) ?? match);
}

export const notesGenerator: TableGenerator = {
  table: "notes",

  generate(pools, count, { rng, faker, now, vocabulary }) {
    const rows: GeneratedRow[] = [];
    if (count <= 0) return rows;

    const contacts = requirePool(pools, "contacts", "notes");

    for (let i = 0; i < count; i++) {
      const contactId = randomPick(rng, contacts.ids);
      const template = randomPick(rng, vocabulary.noteTemplates);

      rows.push({
        contact_id: contactId,
        content: fillTemplate(template, (key) => FILLERS[key]?.(rng, faker, now)),
        created_at: formatTimestamp(dateBetween(faker, now, -365, 0)),
      });
    }

    return rows;
  },
};
