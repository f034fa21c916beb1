import type { RawRecord } from "../../core/records/record.types";
import type { ReportParser } from "../../ports/ReportParser";
import { decodeText, readDelimitedRows, toNumberOrNull } from "./delimitedReportParser";

const EXCLUDED_ORDER_STATUSES = new Set(["Cancelled"]);

type AsinTotals = {
  unitsOrdered: number;
  salesCents: number;
  orderIds: Set<string>;
  currency?: string;
};

/**
 * Daily orders are stored at the same grain as sales & traffic: one row per child ASIN.
 * Every order line counts as one unit; item-price is the line total.
 */
export const aggregateOrdersByAsin = (rows: Array<Record<string, string>>): RawRecord[] => {
  const byAsin = new Map<string, AsinTotals>();

  for (const row of rows) {
    if (EXCLUDED_ORDER_STATUSES.has(row["order-status"] ?? "")) continue;
    const asin = row["asin"] ?? "";
    if (asin === "") continue;

    const totals = byAsin.get(asin) ?? { unitsOrdered: 0, salesCents: 0, orderIds: new Set<string>() };
    totals.unitsOrdered += 1;
    totals.salesCents += Math.round((toNumberOrNull(row["item-price"] ?? "") ?? 0) * 100);
    const orderId = row["amazon-order-id"] ?? "";
    if (orderId !== "") totals.orderIds.add(orderId);
    const currency = row["currency"] ?? "";
    if (!totals.currency && currency !== "") totals.currency = currency;
    byAsin.set(asin, totals);
  }

  return Array.from(byAsin.entries()).map(([childAsin, totals]) => ({
    childAsin,
    unitsOrdered: totals.unitsOrdered,
    orderedProductSales: totals.salesCents / 100,
    totalOrderItems: totals.orderIds.size,
    currency: totals.currency ?? "USD"
  }));
};

export const createOrdersParser = (): ReportParser => ({
  parse: (bytes: Uint8Array): RawRecord[] => aggregateOrdersByAsin(readDelimitedRows(decodeText(bytes)))
});
