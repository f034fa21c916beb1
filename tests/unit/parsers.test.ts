import { createDelimitedParser, readDelimitedRows } from "../../src/infrastructure/parsers/delimitedReportParser";
import { createJsonPathParser, readPath } from "../../src/infrastructure/parsers/jsonReportParser";
import { aggregateOrdersByAsin } from "../../src/infrastructure/parsers/ordersAggregation";
import { createReportParsers } from "../../src/infrastructure/parsers/parserRegistry";

const bytes = (text: string): Uint8Array => Buffer.from(text, "utf8");

describe("delimited report parser", () => {
  const parser = createDelimitedParser({
    columns: {
      sku: { field: "sku", required: true },
      "afn-total-quantity": { field: "totalQuantity", type: "number" },
      condition: { field: "condition" }
    }
  });

  it("maps known columns, converts numbers and drops the rest", () => {
    const text = "\uFEFFsku\tAFN-Total-Quantity\tcondition\tnotes\r\nSKU-1\t1,204\tNew\tx\n\nSKU-2\t\t\"Used, good\"\ty\n";

    expect(parser.parse(bytes(text))).toEqual([
      { sku: "SKU-1", totalQuantity: 1204, condition: "New" },
      { sku: "SKU-2", totalQuantity: null, condition: "Used, good" }
    ]);
  });

  it("returns no rows for an empty document", () => {
    expect(parser.parse(bytes("  \n"))).toEqual([]);
  });

  it("rejects documents without a required column", () => {
    expect(() => parser.parse(bytes("condition\tqty\nNew\t1\n"))).toThrow("Report is missing required column(s): sku");
  });

  it("rejects rows with more cells than the header", () => {
    expect(() => readDelimitedRows("a\tb\n1\t2\n1\t2\t3\n")).toThrow("Row 3 has 3 columns, header has 2");
  });

  it("fills missing trailing cells with empty strings", () => {
    expect(readDelimitedRows("a,b\n1\n", ",")).toEqual([{ a: "1", b: "" }]);
  });
});

describe("JSON path report parser", () => {
  const parser = createJsonPathParser({
    rowsAt: "salesAndTrafficByAsin",
    fields: { childAsin: "childAsin", unitsOrdered: "salesByAsin.unitsOrdered", sessions: "trafficByAsin.sessions" }
  });

  it("reads dotted paths out of every row", () => {
    const document = {
      reportSpecification: { reportType: "GET_SALES_AND_TRAFFIC_REPORT" },
      salesAndTrafficByAsin: [
        { childAsin: "B0A", salesByAsin: { unitsOrdered: 3 }, trafficByAsin: { sessions: 40 } },
        { childAsin: "B0B", salesByAsin: { unitsOrdered: 0 } }
      ]
    };

    expect(parser.parse(bytes(JSON.stringify(document)))).toEqual([
      { childAsin: "B0A", unitsOrdered: 3, sessions: 40 },
      { childAsin: "B0B", unitsOrdered: 0 }
    ]);
  });

  it("treats a missing row property as an empty report", () => {
    expect(parser.parse(bytes("{}"))).toEqual([]);
  });

  it.each([
    ["[]", "Report document is not a JSON object"],
    ['{"salesAndTrafficByAsin":{}}', "Report property salesAndTrafficByAsin is not an array"],
    ["{", "JSON"]
  ])("rejects %s", (text, message) => {
    expect(() => parser.parse(bytes(text))).toThrow(message);
  });

  it("stops at non-object path segments", () => {
    expect(readPath({ a: { b: 1 } }, "a.b")).toBe(1);
    expect(readPath({ a: 5 }, "a.b")).toBeUndefined();
  });
});

describe("orders aggregation", () => {
  it("sums order lines per ASIN and skips cancelled ones", () => {
    const rows = [
      { "amazon-order-id": "111-1", "order-status": "Shipped", asin: "B0A", "item-price": "19.99", currency: "CAD" },
      { "amazon-order-id": "111-2", "order-status": "Pending", asin: "B0A", "item-price": "0.01", currency: "CAD" },
      { "amazon-order-id": "111-2", "order-status": "Pending", asin: "B0A", "item-price": "", currency: "CAD" },
      { "amazon-order-id": "111-3", "order-status": "Cancelled", asin: "B0A", "item-price": "50.00", currency: "CAD" },
      { "amazon-order-id": "111-4", "order-status": "Shipped", asin: "B0B", "item-price": "5.10", currency: "" },
      { "amazon-order-id": "111-5", "order-status": "Shipped", asin: "", "item-price": "9.00", currency: "CAD" }
    ];

    expect(aggregateOrdersByAsin(rows)).toEqual([
      { childAsin: "B0A", unitsOrdered: 3, orderedProductSales: 20, totalOrderItems: 2, currency: "CAD" },
      { childAsin: "B0B", unitsOrdered: 1, orderedProductSales: 5.1, totalOrderItems: 1, currency: "USD" }
    ]);
  });

  it("is registered as the orders parser", () => {
    const text = "amazon-order-id\torder-status\tasin\titem-price\tcurrency\n111-1\tShipped\tB0A\t10.00\tUSD\n";

    expect(createReportParsers().orders.parse(bytes(text))).toEqual([
      { childAsin: "B0A", unitsOrdered: 1, orderedProductSales: 10, totalOrderItems: 1, currency: "USD" }
    ]);
  });
});

describe("parser registry", () => {
  it("parses financial events into the fields their identity key uses", () => {
    const text = [
      "posted-date\tsettlement-id\ttransaction-type\torder-id\tsku\tquantity\tamount-type\tamount-description\tamount\tcurrency",
      "2024-03-04T08:15:00Z\tS-100\tOrder\t111-1\tSKU-1\t1\tItemPrice\tPrincipal\t19.99\tUSD"
    ].join("\n");

    expect(createReportParsers().financial_events.parse(bytes(text))).toEqual([
      {
        postedDate: "2024-03-04T08:15:00Z",
        settlementId: "S-100",
        transactionType: "Order",
        orderId: "111-1",
        sku: "SKU-1",
        quantity: 1,
        amountType: "ItemPrice",
        amountDescription: "Principal",
        amount: 19.99,
        currency: "USD"
      }
    ]);
  });
});
