import { gzipSync } from "zlib";
import {
  parseRateLimitHeader,
  parseRetryAfterMs,
  presignedExpiry,
  ReportingHttpClient
} from "../../src/infrastructure/reporting/ReportingHttpClient";
import { readBody, sendJson, startServer } from "../support/httpServer";

const fastRetries = { retries: 2, minDelayMs: 5, maxDelayMs: 20 };

describe("ReportingHttpClient request shape", () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  it("creates reports with a bearer token and a JSON body", async () => {
    let received: { method?: string; path?: string; auth?: string; contentType?: string; body?: unknown } = {};
    const server = await startServer((req, res) => {
      void readBody(req).then((body) => {
        received = {
          method: req.method,
          path: req.url,
          auth: req.headers.authorization,
          contentType: req.headers["content-type"],
          body: JSON.parse(body)
        };
        sendJson(res, 202, { reportId: "rep-42" });
      });
    });

    const client = new ReportingHttpClient(server.baseUrl, "test-token", 5000, fastRetries);
    const request = {
      reportType: "GET_FBA_REIMBURSEMENTS_DATA",
      marketplaceIds: ["ATVPDKIKX0DER"],
      dataStartTime: "2024-03-03T00:00:00Z",
      dataEndTime: "2024-03-09T23:59:59Z"
    };

    await expect(client.createReport(request)).resolves.toBe("rep-42");
    expect(received).toEqual({
      method: "POST",
      path: "/reports/2021-06-30/reports",
      auth: "Bearer test-token",
      contentType: "application/json",
      body: request
    });

    await server.close();
  });

  it.each(["/sp", "/sp/"])("keeps the base URL path prefix %s", async (prefix) => {
    let receivedPath = "";
    const server = await startServer((req, res) => {
      receivedPath = req.url ?? "";
      sendJson(res, 200, { processingStatus: "DONE", reportDocumentId: "doc-7" });
    });

    const client = new ReportingHttpClient(`${server.baseUrl}${prefix}`, "test-token", 5000, fastRetries);

    await expect(client.getReportStatus("rep 1")).resolves.toEqual({ status: "DONE", resultRef: "doc-7" });
    expect(receivedPath).toBe("/sp/reports/2021-06-30/reports/rep%201");

    await server.close();
  });

  it("leaves resultRef out while the report is still running", async () => {
    const server = await startServer((_req, res) => {
      sendJson(res, 200, { processingStatus: "IN_PROGRESS" });
    });

    const client = new ReportingHttpClient(server.baseUrl, "test-token", 5000, fastRetries);

    await expect(client.getReportStatus("rep-1")).resolves.toEqual({ status: "IN_PROGRESS" });
    await server.close();
  });

  it("resolves document locations with compression and signed expiry", async () => {
    const url = "https://downloads.test/doc-7?X-Amz-Date=20240312T100000Z&X-Amz-Expires=300&X-Amz-Signature=abc";
    let receivedPath = "";
    const server = await startServer((req, res) => {
      receivedPath = req.url ?? "";
      sendJson(res, 200, { reportDocumentId: "doc-7", url, compressionAlgorithm: "GZIP" });
    });

    const client = new ReportingHttpClient(server.baseUrl, "test-token", 5000, fastRetries);

    await expect(client.getResultLocation("doc-7")).resolves.toEqual({
      url,
      compression: "GZIP",
      expiresAt: new Date("2024-03-12T10:05:00.000Z")
    });
    expect(receivedPath).toBe("/reports/2021-06-30/documents/doc-7");
    await server.close();
  });

  it("downloads documents without sending credentials", async () => {
    let auth: string | undefined = "unset";
    const document = gzipSync(Buffer.from("sku\tqty\nA\t1\n"));
    const server = await startServer((req, res) => {
      auth = req.headers.authorization;
      res.writeHead(200, { "content-type": "application/octet-stream" });
      res.end(document);
    });

    const client = new ReportingHttpClient(server.baseUrl, "test-token", 5000, fastRetries);
    const bytes = await client.downloadResult({ url: `${server.baseUrl}/doc-7?X-Amz-Signature=abc`, compression: "GZIP" });

    expect(Buffer.from(bytes).equals(document)).toBe(true);
    expect(auth).toBeUndefined();
    await server.close();
  });

  it.each([
    [[1, 2], "Reporting API response for"],
    [{ processingStatus: "" }, "Report rep-1 response has no processingStatus"]
  ])("rejects unusable status payload %p", async (payload, message) => {
    const server = await startServer((_req, res) => {
      sendJson(res, 200, payload);
    });

    const client = new ReportingHttpClient(server.baseUrl, "test-token", 5000, fastRetries);

    await expect(client.getReportStatus("rep-1")).rejects.toThrow(message);
    await server.close();
  });
});

describe("reporting header helpers", () => {
  it("parses Retry-After seconds", () => {
    expect(parseRetryAfterMs("2")).toBe(2000);
    expect(parseRetryAfterMs(" 0 ")).toBe(0);
    expect(parseRetryAfterMs("1.5")).toBeUndefined();
    expect(parseRetryAfterMs("NaN")).toBeUndefined();
    expect(parseRetryAfterMs(null)).toBeUndefined();
  });

  it("parses the advertised rate", () => {
    expect(parseRateLimitHeader("0.0167")).toBe(0.0167);
    expect(parseRateLimitHeader("0")).toBeUndefined();
    expect(parseRateLimitHeader("fast")).toBeUndefined();
  });

  it("reads pre-signed URL expiry", () => {
    expect(presignedExpiry("https://downloads.test/doc?X-Amz-Date=20240312T100000Z&X-Amz-Expires=60")).toEqual(
      new Date("2024-03-12T10:01:00.000Z")
    );
    expect(presignedExpiry("https://downloads.test/doc?X-Amz-Expires=60")).toBeUndefined();
    expect(presignedExpiry("not a url")).toBeUndefined();
  });
});
