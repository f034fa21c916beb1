import { logEvent, toErrorMessage } from "../logging/logger";

export type SyncAlert =
  | { kind: "sync_failed"; sourceType: string; mode: string; error: string }
  | { kind: "needs_attention"; sourceType: string; mode: string; workUnits: string[] };

export interface AlertNotifier {
  /** Never rejects: a lost alert must not change the outcome of the sync it reports on. */
  notify(alert: SyncAlert): Promise<void>;
}

export const formatAlertText = (alert: SyncAlert): string =>
  alert.kind === "sync_failed"
    ? `Report sync failed: ${alert.sourceType} (${alert.mode}): ${alert.error}`
    : `Report sync needs attention: ${alert.sourceType} (${alert.mode}): ${alert.workUnits.length} work unit(s) flagged`;

/** Incoming-webhook body: a plain-text fallback plus one colored attachment with the details. */
export const buildWebhookPayload = (alert: SyncAlert) => {
  const fields = [
    { title: "Source", value: alert.sourceType, short: true },
    { title: "Mode", value: alert.mode, short: true },
    alert.kind === "sync_failed"
      ? { title: "Error", value: alert.error, short: false }
      : { title: "Work units", value: alert.workUnits.join("\n"), short: false }
  ];
  return {
    text: formatAlertText(alert),
    attachments: [{ color: alert.kind === "sync_failed" ? "#FF0000" : "#FFA500", fields }]
  };
};

export class ConsoleAlertNotifier implements AlertNotifier {
  async notify(alert: SyncAlert): Promise<void> {
    if (alert.kind === "sync_failed") {
      logEvent("error", "alert.sync_failed", { sourceType: alert.sourceType, mode: alert.mode, error: alert.error });
    } else {
      logEvent("warn", "alert.needs_attention", {
        sourceType: alert.sourceType,
        mode: alert.mode,
        workUnits: alert.workUnits
      });
    }
  }
}

/**
 * Console alert plus a JSON POST to an incoming webhook over native fetch. Delivery
 * failures are logged as `alert.failed`; the webhook URL is a credential and is never logged.
 */
export class WebhookAlertNotifier implements AlertNotifier {
  private readonly console = new ConsoleAlertNotifier();

  constructor(
    private readonly webhookUrl: string,
    private readonly timeoutMs = 10_000
  ) {}

  async notify(alert: SyncAlert): Promise<void> {
    await this.console.notify(alert);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const res = await fetch(this.webhookUrl, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(buildWebhookPayload(alert)),
        signal: controller.signal
      });
      await res.text().catch(() => "");
      if (!res.ok) {
        logEvent("warn", "alert.failed", { kind: alert.kind, status: res.status });
      }
    } catch (err) {
      logEvent("warn", "alert.failed", {
        kind: alert.kind,
        message: controller.signal.aborted ? `Alert webhook timeout after ${this.timeoutMs}ms` : toErrorMessage(err)
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}

export const createAlertNotifier = (webhookUrl?: string): AlertNotifier =>
  webhookUrl ? new WebhookAlertNotifier(webhookUrl) : new ConsoleAlertNotifier();
