// src/core/generators/deals.ts
import type { GeneratedRow } from "../../types/data.js";
import type { TableGenerator } from "../../types/generator.js";
import { dateBetween, formatDate, formatTimestamp } from "../../util/dates.js";
import { randomInt, randomPick } from "../../util/rng.js";
import { lookupRef, requirePool } from "../pools.js";

/** stage -> base win probability */
export const DEAL_STAGES = {
  prospecting: 10,
  qualification: 25,
  proposal: 50,
  negotiation: 75,
  closed_won: 100,
  closed_lost: 0,
} as const;

export type DealStage = keyof typeof DEAL_STAGES;

const STAGES = Object.keys(DEAL_STAGES).filter(
  (s): s is DealStage => s in DEAL_STAGES,
);

export function isClosedStage(stage: DealStage): boolean {
  return stage === "closed_won" || stage === "closed_lost";
}

/**
 * Closed deals carry their fixed probability; open deals jitter the base
 * value by up to 10 points.
 */
export function stageProbability(stage: DealStage, jitter: number): number {
  const base = DEAL_STAGES[stage];
  if (isClosedStage(stage)) return base;
  return Math.max(0, Math.min(100, base + jitter));
}

function titleCase(text: string): string {
  return text.replace(/\b\w/g, (c) => c.toUpperCase());
}

export const dealsGenerator: TableGenerator = {
  table: "deals",

  generate(pools, count, { rng, faker, now, vocabulary }) {
    const rows: GeneratedRow[] = [];
    if (count <= 0) return rows;

    const companies = requirePool(pools, "companies", "deals");
    const contacts = requirePool(pools, "contacts", "deals");

    // company -> its contacts, so a deal only references its own company's people
    const contactsByCompany = new Map<number, number[]>();
    for (const contactId of contacts.ids) {
      const companyId = lookupRef(contacts, contactId, "contacts");
      const list = contactsByCompany.get(companyId) ?? [];
      list.push(contactId);
      contactsByCompany.set(companyId, list);
    }

    for (let i = 0; i < count; i++) {
      const companyId = randomPick(rng, companies.ids);
      const companyContacts = contactsByCompany.get(companyId);
      const contactId = companyContacts ? randomPick(rng, companyContacts) : null;

      const stage = randomPick(rng, STAGES);
      const probability = stageProbability(stage, randomInt(rng, -10, 10));

      rows.push({
        company_id: companyId,
        contact_id: contactId,
        title: `${titleCase(faker.company.buzzPhrase())} Project`,
        description: faker.lorem.paragraph(2),
        value: randomInt(rng, 1000, 500_000),
        stage,
        probability,
        expected_close_date: formatDate(dateBetween(faker, now, -182, 182)),
        actual_close_date: isClosedStage(stage)
          ? formatDate(dateBetween(faker, now, -182, 0))
          : null,
        source: randomPick(rng, vocabulary.dealSources),
        created_at: formatTimestamp(dateBetween(faker, now, -365, 0)),
      });
    }

    return rows;
  },
};
