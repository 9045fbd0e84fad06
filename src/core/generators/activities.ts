// src/core/generators/activities.ts
import { ActivityTypeSchema } from "../../models/vocabulary.js";
import type { GeneratedRow } from "../../types/data.js";
import type { TableGenerator } from "../../types/generator.js";
import { dateBetween, formatTimestamp } from "../../util/dates.js";
import { randomInt, randomPick } from "../../util/rng.js";
import { requirePool } from "../pools.js";

const TIMED_TYPES = new Set(["call", "meeting", "demo"]);

export const activitiesGenerator: TableGenerator = {
  table: "activities",

  generate(pools, count, { rng, faker, now, vocabulary }) {
    const rows: GeneratedRow[] = [];
    if (count <= 0) return rows;

    const contacts = requirePool(pools, "contacts", "activities");

    for (let i = 0; i < count; i++) {
      const contactId = randomPick(rng, contacts.ids);
      const type = randomPick(rng, ActivityTypeSchema.options);
      const subject = randomPick(rng, vocabulary.activitySubjects[type] ?? []);

      rows.push({
        contact_id: contactId,
        type,
        subject,
        notes: rng() > 0.3 ? faker.lorem.paragraph(3) : null,
        duration_minutes: TIMED_TYPES.has(type) ? randomInt(rng, 5, 120) : null,
        activity_date: formatTimestamp(dateBetween(faker, now, -365, 0)),
      });
    }

    return rows;
  },
};
