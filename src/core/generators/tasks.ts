// src/core/generators/tasks.ts
import type { GeneratedRow } from "../../types/data.js";
import type { TableGenerator } from "../../types/generator.js";
import {
  addDays,
  dateBetween,
  formatDate,
  formatTimestamp,
} from "../../util/dates.js";
import { randomPick, weightedPick } from "../../util/rng.js";
import { requirePool } from "../pools.js";

const STATUS_WEIGHTS = {
  pending: 30,
  in_progress: 20,
  completed: 40,
  cancelled: 10,
} as const;

const PRIORITIES = ["low", "medium", "high", "urgent"] as const;

export const tasksGenerator: TableGenerator = {
  table: "tasks",

  generate(pools, count, { rng, faker, now, vocabulary }) {
    const rows: GeneratedRow[] = [];
    if (count <= 0) return rows;

    const deals = requirePool(pools, "deals", "tasks");

    for (let i = 0; i < count; i++) {
      const dealId = randomPick(rng, deals.ids);
      const { title, description } = randomPick(rng, vocabulary.taskTemplates);
      const status = weightedPick(rng, STATUS_WEIGHTS);
      const due = dateBetween(faker, now, -30, 60);

      // completed_at is set only for completed tasks, never after now
      let completedAt: string | null = null;
      if (status === "completed") {
        const to = new Date(
          Math.min(addDays(due, 3).getTime(), now.getTime()),
        );
        const from = new Date(
          Math.min(addDays(due, -7).getTime(), to.getTime()),
        );
        completedAt = formatTimestamp(faker.date.between({ from, to }));
      }

      rows.push({
        deal_id: dealId,
        title,
        description,
        due_date: formatDate(due),
        status,
        priority: randomPick(rng, PRIORITIES),
        completed_at: completedAt,
        created_at: formatTimestamp(dateBetween(faker, now, -60, 0)),
      });
    }

    return rows;
  },
};
