import { dedupeByIdentityKey, toCanonicalRecord } from "../../src/core/records/canonicalize";
import { resolvePrecedence, sourceTagFor } from "../../src/core/records/precedence";
import type { SourceType } from "../../src/core/sync/workUnit";

const ingestedAt = new Date("2024-03-10T12:00:00Z");

describe("resolvePrecedence", () => {
  const orders = { source: sourceTagFor("orders") };
  const salesTraffic = { source: sourceTagFor("sales_traffic") };

  it("inserts when nothing is stored", () => {
    expect(resolvePrecedence(undefined, orders)).toBe("insert");
  });

  it("lets a more authoritative source replace a less authoritative one, never the reverse", () => {
    expect(resolvePrecedence(orders, salesTraffic)).toBe("overwrite");
    expect(resolvePrecedence(salesTraffic, orders)).toBe("skip");
    expect(resolvePrecedence(salesTraffic, orders, { allowEqualAuthority: true })).toBe("skip");
  });

  it("replaces equal authority only when asked to", () => {
    expect(resolvePrecedence(salesTraffic, salesTraffic)).toBe("skip");
    expect(resolvePrecedence(salesTraffic, salesTraffic, { allowEqualAuthority: true })).toBe("overwrite");
  });

  it("never lowers the stored authority whatever order sources arrive in", () => {
    const sequences: SourceType[][] = [
      ["orders", "sales_traffic", "orders"],
      ["sales_traffic", "orders"],
      ["orders", "orders", "sales_traffic"]
    ];

    for (const sequence of sequences) {
      let stored: { source: ReturnType<typeof sourceTagFor> } | undefined;
      for (const source of sequence) {
        const incoming = { source: sourceTagFor(source) };
        if (resolvePrecedence(stored, incoming) !== "skip") stored = incoming;
      }
      expect(stored?.source.source).toBe("sales_traffic");
    }
  });
});

describe("toCanonicalRecord", () => {
  it("fills scope fields the row does not repeat and pins the marketplace to the work unit", () => {
    const record = toCanonicalRecord(
      { childAsin: "B0TEST0001", unitsOrdered: 3, marketplace: "ca", sessions: undefined },
      { sourceType: "sales_traffic", marketplace: "usa", scopeFields: { date: "2024-03-06" }, ingestedAt }
    );

    expect(record).toEqual({
      key: "daily_asin_metrics:USA|2024-03-06|B0TEST0001",
      identity: { kind: "natural", entity: "daily_asin_metrics", parts: ["USA", "2024-03-06", "B0TEST0001"] },
      entity: "daily_asin_metrics",
      marketplace: "USA",
      source: { source: "sales_traffic", authority: 20 },
      fields: { date: "2024-03-06", childAsin: "B0TEST0001", unitsOrdered: 3, marketplace: "USA" },
      ingestedAt
    });
  });

  it("prefers the row's own value over the scope value", () => {
    const record = toCanonicalRecord(
      { childAsin: "B0TEST0001", date: "2024-03-05" },
      { sourceType: "orders", marketplace: "USA", scopeFields: { date: "2024-03-06" }, ingestedAt }
    );

    expect(record.key).toBe("daily_asin_metrics:USA|2024-03-05|B0TEST0001");
    expect(record.source).toEqual({ source: "orders", authority: 10 });
  });

  it("keeps the last occurrence of a repeated identity key", () => {
    const ctx = { sourceType: "sales_traffic" as const, marketplace: "USA", scopeFields: { date: "2024-03-06" }, ingestedAt };
    const first = toCanonicalRecord({ childAsin: "B0A", unitsOrdered: 1 }, ctx);
    const other = toCanonicalRecord({ childAsin: "B0B", unitsOrdered: 5 }, ctx);
    const latest = toCanonicalRecord({ childAsin: "B0A", unitsOrdered: 2 }, ctx);

    expect(dedupeByIdentityKey([first, other, latest])).toEqual([other, latest]);
  });
});
