import http from "http";
import { buildCheckpointReport, toReportRow } from "./application/monitoring/checkpointReport";
import type { CheckpointStatus } from "./core/checkpoints/checkpoint.types";
import { isSourceType, type SourceType } from "./core/sync/workUnit";
import { MongoCheckpointRepository } from "./infrastructure/mongo/MongoCheckpointRepository";
import { MongoConnection } from "./infrastructure/mongo/MongoClientFactory";
import type { CheckpointRepository } from "./ports/CheckpointRepository";
import { loadEnv } from "./shared/config/env";
import { logEvent, toErrorMessage } from "./shared/logging/logger";

const checkpointStatuses: readonly CheckpointStatus[] = ["pending", "in_progress", "done", "partial", "failed"];

const isCheckpointStatus = (value: string): value is CheckpointStatus =>
  checkpointStatuses.some((status) => status === value);

class BadRequestError extends Error {}

const sendJson = (res: http.ServerResponse, status: number, body: unknown) => {
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(body));
};

const readSource = (params: URLSearchParams): SourceType | undefined => {
  const source = params.get("source");
  if (source == null || source === "") return undefined;
  if (!isSourceType(source)) throw new BadRequestError(`Unknown source: ${source}`);
  return source;
};

const readStatuses = (params: URLSearchParams): CheckpointStatus[] | undefined => {
  const raw = params.get("status");
  if (raw == null || raw === "") return undefined;
  const statuses = raw.split(",").map((status) => status.trim());
  const unknown = statuses.filter((status) => !isCheckpointStatus(status));
  if (unknown.length > 0) throw new BadRequestError(`Unknown status: ${unknown.join(", ")}`);
  return statuses.filter(isCheckpointStatus);
};

const readLimit = (params: URLSearchParams): number | undefined => {
  const raw = params.get("limit");
  if (raw == null || raw === "") return undefined;
  const limit = Number(raw);
  if (!Number.isInteger(limit) || limit < 1 || limit > 1000) {
    throw new BadRequestError(`limit=${raw} is out of allowed range [1..1000]`);
  }
  return limit;
};

/** Read-only status surface over checkpoints. */
export const createServer = (deps: { checkpoints: CheckpointRepository; now?: () => Date }) => {
  const handle = async (req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
    const url = new URL(req.url ?? "/", "http://localhost");
    try {
      if (req.method !== "GET") {
        sendJson(res, 405, { error: "method_not_allowed" });
        return;
      }

      if (url.pathname === "/health") {
        sendJson(res, 200, { ok: true, service: "report-sync" });
        return;
      }

      if (url.pathname === "/checkpoints") {
        const checkpoints = await deps.checkpoints.find({
          sourceType: readSource(url.searchParams),
          marketplace: url.searchParams.get("marketplace") ?? undefined,
          statuses: readStatuses(url.searchParams),
          limit: readLimit(url.searchParams) ?? 100
        });
        sendJson(res, 200, { checkpoints: checkpoints.map(toReportRow) });
        return;
      }

      if (url.pathname === "/checkpoints/report") {
        const report = await buildCheckpointReport(
          deps.checkpoints,
          { sourceType: readSource(url.searchParams), marketplace: url.searchParams.get("marketplace") ?? undefined },
          deps.now?.() ?? new Date()
        );
        sendJson(res, 200, report);
        return;
      }

      sendJson(res, 404, { error: "not_found" });
    } catch (err) {
      if (err instanceof BadRequestError) {
        sendJson(res, 400, { error: "bad_request", message: err.message });
        return;
      }
      logEvent("error", "server.request_failed", { path: url.pathname, message: toErrorMessage(err) });
      sendJson(res, 500, { error: "internal_error" });
    }
  };

  return http.createServer((req, res) => {
    void handle(req, res);
  });
};

if (require.main === module) {
  const env = loadEnv();
  const port = Number(process.env.PORT ?? 3000);
  const connection = new MongoConnection(env.MONGO_URI, env.MONGO_DB_NAME);
  const server = createServer({ checkpoints: new MongoCheckpointRepository(connection) });

  server.listen(port, () => {
    logEvent("info", "server.listening", { url: `http://localhost:${port}` });
  });

  process.once("SIGTERM", () => {
    server.close(() => {
      void connection.close();
    });
  });
}
