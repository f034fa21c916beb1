import type {
  ReportApiClient,
  ReportRequest,
  ReportStatusSnapshot,
  ResultLocation
} from "../../ports/ReportApiClient";
import { ResultLocationExpiredError } from "../../ports/ReportApiClient";
import { logEvent, toErrorMessage } from "../../shared/logging/logger";
import { ThrottledError } from "../../shared/rate-limit/rateLimiter";
import { retry } from "../../shared/retry/retry";

const REPORTS_PATH = "reports/2021-06-30";

/**
 * Non-2xx answer or transport failure. `requestUrl` never carries a query string.
 * `transient` marks failures of idempotent requests that are worth sending again: 5xx
 * answers, timeouts and dropped connections. A POST that failed this way may still have
 * been processed upstream, so it is never transient.
 */
export class ReportingRequestError extends Error {
  readonly status?: number;
  readonly isTimeout: boolean;
  readonly transient: boolean;
  readonly requestUrl: string;

  constructor(message: string, opts: { requestUrl: string; status?: number; isTimeout?: boolean; transient?: boolean }) {
    super(message);
    this.name = "ReportingRequestError";
    this.status = opts.status;
    this.isTimeout = opts.isTimeout ?? false;
    this.transient = opts.transient ?? false;
    this.requestUrl = opts.requestUrl;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const isTransientReportingError = (err: unknown): boolean =>
  err instanceof ReportingRequestError && err.transient;

type Method = "GET" | "POST";

export type ReportingHttpClientOptions = {
  retries?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readString = (body: Record<string, unknown>, field: string): string | undefined => {
  const value = body[field];
  return typeof value === "string" && value.trim() !== "" ? value : undefined;
};

/** Seconds (only whole, non-negative numbers are honoured) to milliseconds. */
export const parseRetryAfterMs = (header: string | null): number | undefined => {
  if (!header || !/^\d+$/.test(header.trim())) return undefined;
  const ms = Number(header.trim()) * 1000;
  return Number.isSafeInteger(ms) ? ms : undefined;
};

export const parseRateLimitHeader = (header: string | null): number | undefined => {
  if (!header) return undefined;
  const rate = Number(header.trim());
  return Number.isFinite(rate) && rate > 0 ? rate : undefined;
};

/** Pre-signed URLs carry their own lifetime as X-Amz-Date + X-Amz-Expires. */
export const presignedExpiry = (url: string): Date | undefined => {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return undefined;
  }
  const signedAt = parsed.searchParams.get("X-Amz-Date");
  const expires = parsed.searchParams.get("X-Amz-Expires");
  const match = signedAt ? /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})Z$/.exec(signedAt) : null;
  if (!match || !expires || !/^\d+$/.test(expires)) return undefined;

  const [, year, month, day, hour, minute, second] = match;
  const start = Date.parse(`${year}-${month}-${day}T${hour}:${minute}:${second}Z`);
  return Number.isNaN(start) ? undefined : new Date(start + Number(expires) * 1000);
};

const safeUrl = (url: URL): string => `${url.origin}${url.pathname}`;

/**
 * Reporting API over native fetch (Node 20). API calls are sent exactly once: the quota
 * gate they run under owns every retry, so each attempt takes its own permit. 429 is
 * surfaced as ThrottledError so the gate can slow the whole quota class down. Only the
 * pre-signed download, which no quota covers, retries transient failures here.
 */
export class ReportingHttpClient implements ReportApiClient {
  private readonly retries: number;
  private readonly minDelayMs: number;
  private readonly maxDelayMs: number;

  constructor(
    private readonly baseUrl: string,
    private readonly accessToken: string,
    private readonly timeoutMs = 8000,
    opts: ReportingHttpClientOptions = {}
  ) {
    this.retries = opts.retries ?? 3;
    this.minDelayMs = opts.minDelayMs ?? 250;
    this.maxDelayMs = opts.maxDelayMs ?? 5000;
  }

  async createReport(request: ReportRequest): Promise<string> {
    const body = await this.requestJson("POST", `${REPORTS_PATH}/reports`, request);
    const reportId = readString(body, "reportId");
    if (!reportId) throw new Error("Create report response has no reportId");
    return reportId;
  }

  async getReportStatus(reportId: string): Promise<ReportStatusSnapshot> {
    const body = await this.requestJson("GET", `${REPORTS_PATH}/reports/${encodeURIComponent(reportId)}`);
    const status = readString(body, "processingStatus");
    if (!status) throw new Error(`Report ${reportId} response has no processingStatus`);
    const snapshot: ReportStatusSnapshot = { status };
    const resultRef = readString(body, "reportDocumentId");
    if (resultRef) snapshot.resultRef = resultRef;
    return snapshot;
  }

  async getResultLocation(resultRef: string): Promise<ResultLocation> {
    const body = await this.requestJson("GET", `${REPORTS_PATH}/documents/${encodeURIComponent(resultRef)}`);
    const url = readString(body, "url");
    if (!url) throw new Error(`Report document ${resultRef} response has no url`);

    const location: ResultLocation = { url };
    if (readString(body, "compressionAlgorithm")?.toUpperCase() === "GZIP") location.compression = "GZIP";
    const expiresAt = presignedExpiry(url);
    if (expiresAt) location.expiresAt = expiresAt;
    return location;
  }

  /** The URL is pre-signed: no credentials are sent with it. */
  async downloadResult(location: ResultLocation): Promise<Uint8Array> {
    const url = new URL(location.url);
    return this.withRetry(safeUrl(url), async () => {
      const res = await this.fetchWithTimeout(url, "GET", {});
      if (res.status === 403) {
        await res.text().catch(() => "");
        throw new ResultLocationExpiredError(`Result location rejected with 403: ${safeUrl(url)}`);
      }
      await this.assertOk(res, url, "GET");
      return new Uint8Array(await res.arrayBuffer());
    });
  }

  private endpoint(path: string): URL {
    const url = new URL(this.baseUrl);
    url.pathname = url.pathname.endsWith("/") ? `${url.pathname}${path}` : `${url.pathname}/${path}`;
    return url;
  }

  private async requestJson(method: Method, path: string, payload?: unknown): Promise<Record<string, unknown>> {
    const url = this.endpoint(path);
    const headers: Record<string, string> = {
      authorization: `Bearer ${this.accessToken}`,
      accept: "application/json"
    };
    if (payload !== undefined) headers["content-type"] = "application/json";

    const res = await this.fetchWithTimeout(url, method, {
      headers,
      body: payload === undefined ? undefined : JSON.stringify(payload)
    });
    await this.assertOk(res, url, method);

    const json: unknown = await res.json();
    if (!isRecord(json)) {
      throw new ReportingRequestError(`Reporting API response for ${safeUrl(url)} is not an object`, {
        requestUrl: safeUrl(url),
        status: res.status
      });
    }
    return json;
  }

  private async fetchWithTimeout(url: URL, method: Method, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const idempotent = method === "GET";
    try {
      return await fetch(url.toString(), { ...init, method, signal: controller.signal });
    } catch (err) {
      if (controller.signal.aborted) {
        throw new ReportingRequestError(`Reporting request timeout after ${this.timeoutMs}ms`, {
          requestUrl: safeUrl(url),
          isTimeout: true,
          transient: idempotent
        });
      }
      throw new ReportingRequestError(`Reporting request to ${safeUrl(url)} failed: ${toErrorMessage(err)}`, {
        requestUrl: safeUrl(url),
        transient: idempotent
      });
    } finally {
      clearTimeout(timeout);
    }
  }

  private async assertOk(res: Response, url: URL, method: Method): Promise<void> {
    if (res.ok) return;
    await res.text().catch(() => "");

    if (res.status === 429) {
      throw new ThrottledError(`Reporting request throttled: ${safeUrl(url)}`, {
        retryAfterMs: parseRetryAfterMs(res.headers.get("retry-after")),
        advertisedRatePerSecond: parseRateLimitHeader(res.headers.get("x-amzn-ratelimit-limit"))
      });
    }
    throw new ReportingRequestError(`Reporting request failed: ${res.status}`, {
      requestUrl: safeUrl(url),
      status: res.status,
      transient: method === "GET" && res.status >= 500
    });
  }

  private withRetry<T>(requestUrl: string, fn: () => Promise<T>): Promise<T> {
    const statusOf = (error: unknown) => (error instanceof ReportingRequestError ? error.status ?? null : null);

    return retry(fn, {
      retries: this.retries,
      minDelayMs: this.minDelayMs,
      maxDelayMs: this.maxDelayMs,
      onRetry: ({ attempt, maxAttempts, error }) => {
        logEvent("warn", "http.retry", { status: statusOf(error), url: requestUrl, attempt, maxAttempts });
      },
      onGiveUp: ({ attempt, maxAttempts, error }) => {
        if (error instanceof ThrottledError || error instanceof ResultLocationExpiredError) return;
        logEvent("warn", "http.give_up", { status: statusOf(error), url: requestUrl, attempt, maxAttempts });
      },
      shouldRetry: isTransientReportingError
    });
  }
}
