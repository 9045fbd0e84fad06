import { describe, expect, it } from "vitest";
import { poolsOf, testContext, TEST_NOW } from "../../testUtils.js";
import { formatTimestamp } from "../../util/dates.js";
import { activitiesGenerator } from "./activities.js";
import { companiesGenerator } from "./companies.js";
import { GENERATORS } from "./index.js";
import { fillTemplate, notesGenerator } from "./notes.js";
import { tasksGenerator } from "./tasks.js";
import { ALL_TABLES } from "../schema.js";

describe("generator registry", () => {
  it("has one generator per table, keyed by its own name", () => {
    for (const table of ALL_TABLES) {
      expect(GENERATORS[table].table).toBe(table);
    }
  });
});

describe("companiesGenerator", () => {
  it("is reproducible from the seed", async () => {
    const first = companiesGenerator.generate(poolsOf({}), 5, await testContext(11));
    const second = companiesGenerator.generate(poolsOf({}), 5, await testContext(11));
    expect(first).toEqual(second);
    expect(first.every((r) => r.country === "USA")).toBe(true);
  });
});

describe("activitiesGenerator", () => {
  it("sets a duration only for calls, meetings and demos", async () => {
    const ctx = await testContext();
    const rows = activitiesGenerator.generate(
      poolsOf({ contacts: { ids: [5, 6] } }),
      200,
      ctx,
    );

    for (const row of rows) {
      expect([5, 6]).toContain(row.contact_id);
      if (row.type === "call" || row.type === "meeting" || row.type === "demo") {
        expect(typeof row.duration_minutes).toBe("number");
      } else {
        expect(row.duration_minutes).toBeNull();
      }
    }
  });
});

describe("notesGenerator", () => {
  it("fills known placeholders and leaves unknown ones", () => {
    expect(
      fillTemplate("Budget: {budget}. {unknown}", (key) =>
        key === "budget" ? "$10K" : undefined,
      ),
    ).toBe("Budget: $10K. {unknown}");
  });

  it("leaves no placeholder unfilled", async () => {
    const ctx = await testContext();
    const rows = notesGenerator.generate(poolsOf({ contacts: { ids: [1] } }), 100, ctx);
    for (const row of rows) {
      expect(row.content).not.toMatch(/\{\w+\}/);
    }
  });
});

describe("tasksGenerator", () => {
  it("sets completed_at only for completed tasks and never after now", async () => {
    const ctx = await testContext();
    const rows = tasksGenerator.generate(poolsOf({ deals: { ids: [1, 2] } }), 200, ctx);
    const now = formatTimestamp(TEST_NOW);

    for (const row of rows) {
      expect(row.due_date).toMatch(/^\d{4}-\d{2}-\d{2}$/);
      if (row.status === "completed") {
        expect(typeof row.completed_at).toBe("string");
        expect(String(row.completed_at) <= now).toBe(true);
      } else {
        expect(row.completed_at).toBeNull();
      }
    }
  });
});
