import type { ReportParsers } from "../../ports/ReportParser";
import { createDelimitedParser } from "./delimitedReportParser";
import { createJsonPathParser } from "./jsonReportParser";
import { createOrdersParser } from "./ordersAggregation";

export const createReportParsers = (): ReportParsers =>
  Object.freeze({
    sales_traffic: createJsonPathParser({
      rowsAt: "salesAndTrafficByAsin",
      fields: {
        parentAsin: "parentAsin",
        childAsin: "childAsin",
        unitsOrdered: "salesByAsin.unitsOrdered",
        orderedProductSales: "salesByAsin.orderedProductSales.amount",
        currency: "salesByAsin.orderedProductSales.currencyCode",
        totalOrderItems: "salesByAsin.totalOrderItems",
        sessions: "trafficByAsin.sessions",
        pageViews: "trafficByAsin.pageViews",
        buyBoxPercentage: "trafficByAsin.buyBoxPercentage",
        unitSessionPercentage: "trafficByAsin.unitSessionPercentage"
      }
    }),
    orders: createOrdersParser(),
    inventory: createDelimitedParser({
      columns: {
        sku: { field: "sku", required: true },
        fnsku: { field: "fnsku" },
        asin: { field: "asin" },
        "product-name": { field: "productName" },
        condition: { field: "condition" },
        "afn-fulfillable-quantity": { field: "fulfillableQuantity", type: "number" },
        "afn-reserved-quantity": { field: "reservedQuantity", type: "number" },
        "afn-inbound-working-quantity": { field: "inboundWorkingQuantity", type: "number" },
        "afn-inbound-shipped-quantity": { field: "inboundShippedQuantity", type: "number" },
        "afn-unsellable-quantity": { field: "unsellableQuantity", type: "number" },
        "afn-total-quantity": { field: "totalQuantity", type: "number" }
      }
    }),
    search_query_performance: createJsonPathParser({
      rowsAt: "dataByAsin",
      fields: {
        childAsin: "asin",
        searchQuery: "searchQueryData.searchQuery",
        searchQueryScore: "searchQueryData.searchQueryScore",
        searchQueryVolume: "searchQueryData.searchQueryVolume",
        impressions: "impressionData.asinImpressionCount",
        totalImpressions: "impressionData.totalQueryImpressionCount",
        clicks: "clickData.asinClickCount",
        totalClicks: "clickData.totalClickCount",
        cartAdds: "cartAddData.asinCartAddCount",
        totalCartAdds: "cartAddData.totalCartAddCount",
        purchases: "purchaseData.asinPurchaseCount",
        totalPurchases: "purchaseData.totalPurchaseCount"
      }
    }),
    financial_events: createDelimitedParser({
      columns: {
        "posted-date": { field: "postedDate", required: true },
        "settlement-id": { field: "settlementId" },
        "transaction-type": { field: "transactionType", required: true },
        "order-id": { field: "orderId" },
        sku: { field: "sku" },
        quantity: { field: "quantity", type: "number" },
        "amount-type": { field: "amountType" },
        "amount-description": { field: "amountDescription" },
        amount: { field: "amount", type: "number", required: true },
        currency: { field: "currency" }
      }
    }),
    reimbursements: createDelimitedParser({
      columns: {
        "approval-date": { field: "approvalDate" },
        "reimbursement-id": { field: "reimbursementId", required: true },
        "case-id": { field: "caseId" },
        "amazon-order-id": { field: "orderId" },
        reason: { field: "reason" },
        sku: { field: "sku", required: true },
        fnsku: { field: "fnsku" },
        asin: { field: "asin" },
        "currency-unit": { field: "currency" },
        "amount-per-unit": { field: "amountPerUnit", type: "number" },
        "amount-total": { field: "amountTotal", type: "number" },
        "quantity-reimbursed-cash": { field: "quantityReimbursedCash", type: "number" },
        "quantity-reimbursed-inventory": { field: "quantityReimbursedInventory", type: "number" },
        "quantity-reimbursed-total": { field: "quantityReimbursedTotal", type: "number" }
      }
    })
  });
