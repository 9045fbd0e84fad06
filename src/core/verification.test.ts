import { describe, expect, it } from "vitest";
import { MemoryRecordStore } from "../testUtils.js";
import { formatCompanyDealTotals } from "./verification.js";

describe("top companies by deal value", () => {
  const store = new MemoryRecordStore({
    companies: [{ name: "Acme" }, { name: "Globex" }, { name: "Initech" }],
    deals: [
      { company_id: 2, value: 5000 },
      { company_id: 2, value: 1500.5 },
      { company_id: 1, value: 100 },
    ],
  });

  it("ranks companies by summed deal value, keeping those without deals", async () => {
    expect(await store.topCompaniesByDealValue(10)).toEqual([
      { name: "Globex", dealCount: 2, totalValue: 6500.5 },
      { name: "Acme", dealCount: 1, totalValue: 100 },
      { name: "Initech", dealCount: 0, totalValue: 0 },
    ]);
  });

  it("honours the limit", async () => {
    const top = await store.topCompaniesByDealValue(1);
    expect(top.map((t) => t.name)).toEqual(["Globex"]);
  });

  it("formats one aligned line per company", () => {
    expect(
      formatCompanyDealTotals([
        { name: "Globex", dealCount: 2, totalValue: 6500.5 },
        { name: "Initech", dealCount: 0, totalValue: 0 },
      ]),
    ).toEqual([
      "Globex                                   | Deals:   2 | Value: $    6,500.50",
      "Initech                                  | Deals:   0 | Value: $        0.00",
    ]);
  });

  it("truncates long names to 40 characters", () => {
    const [line] = formatCompanyDealTotals([
      { name: "x".repeat(45), dealCount: 1, totalValue: 1234567.891 },
    ]);
    expect(line).toBe(`${"x".repeat(40)} | Deals:   1 | Value: $1,234,567.89`);
  });
});
