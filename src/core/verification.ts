// src/core/verification.ts
import type { GeneratedRow, StoredRecord } from "../types/data.js";
import type { CompanyDealTotal } from "../types/store.js";

/**
 * In-process equivalent of the ranking query PgRecordStore runs: a left join
 * of companies to deals, summed per company, highest total first. Ties keep
 * company id order.
 */
export function rankCompaniesByDealValue(
  companies: readonly StoredRecord[],
  deals: readonly GeneratedRow[],
  limit: number,
): CompanyDealTotal[] {
  const totals = new Map<number, { dealCount: number; totalValue: number }>();
  for (const deal of deals) {
    if (typeof deal.company_id !== "number") continue;
    const entry = totals.get(deal.company_id) ?? { dealCount: 0, totalValue: 0 };
    entry.dealCount++;
    entry.totalValue += typeof deal.value === "number" ? deal.value : 0;
    totals.set(deal.company_id, entry);
  }

  return companies
    .map(({ id, row }) => ({
      name: String(row.name ?? ""),
      ...(totals.get(id) ?? { dealCount: 0, totalValue: 0 }),
    }))
    .sort((a, b) => b.totalValue - a.totalValue)
    .slice(0, Math.max(0, limit));
}

const money = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/** `name (40 cols) | Deals: nnn | Value: $nnn,nnn.nn` per company. */
export function formatCompanyDealTotals(
  totals: readonly CompanyDealTotal[],
): string[] {
  return totals.map(
    ({ name, dealCount, totalValue }) =>
      `${name.slice(0, 40).padEnd(40)} | Deals: ${String(dealCount).padStart(3)} | Value: $${money.format(totalValue).padStart(12)}`
  );
}
