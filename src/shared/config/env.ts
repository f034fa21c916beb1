export type Env = {
  MONGO_URI: string;
  MONGO_DB_NAME: string;
  REPORTS_API_BASE_URL: string;
  REPORTS_API_TOKEN: string;
  /** Incoming webhook for failure and needs-attention alerts; console only when unset. */
  SLACK_WEBHOOK_URL?: string;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

const validateMongoUri = (value: string): string => {
  if (!/^mongodb(\+srv)?:\/\//.test(value)) {
    throw new Error("MONGO_URI must start with mongodb:// or mongodb+srv://");
  }
  return value;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const MONGO_URI = validateMongoUri(env.MONGO_URI ?? "mongodb://localhost:27017");
  const MONGO_DB_NAME = env.MONGO_DB_NAME?.trim() || "report_sync";
  const REPORTS_API_BASE_URL = validateHttpUrl(
    "REPORTS_API_BASE_URL",
    env.REPORTS_API_BASE_URL ?? "https://sellingpartnerapi-na.amazon.com"
  );
  const REPORTS_API_TOKEN = env.REPORTS_API_TOKEN ?? "";

  const loaded: Env = { MONGO_URI, MONGO_DB_NAME, REPORTS_API_BASE_URL, REPORTS_API_TOKEN };
  const webhook = env.SLACK_WEBHOOK_URL?.trim();
  if (webhook) loaded.SLACK_WEBHOOK_URL = validateHttpUrl("SLACK_WEBHOOK_URL", webhook);
  return loaded;
};
