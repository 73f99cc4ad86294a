import { CollaboratorUnavailableError, describeError } from "../errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { formatAlertText, type Alert } from "./alert.js";

const log = createSubsystemLogger("alerts/webhook");

const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Outbound alert channel. Delivery is at-least-once from the pipeline's side.
 */
export type AlertSink = {
  notify(alert: Alert): Promise<void>;
};

export class NoopAlertSink implements AlertSink {
  async notify(alert: Alert): Promise<void> {
    log.debug("Alert skipped (no webhook configured)", { kind: alert.kind });
  }
}

/**
 * Posts a Slack-compatible `{ text, alert }` JSON body to a webhook URL.
 */
export class WebhookAlertSink implements AlertSink {
  private readonly url: string;
  private readonly timeoutMs: number;

  constructor(url: string, options: { timeoutMs?: number } = {}) {
    this.url = url;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async notify(alert: Alert): Promise<void> {
    let response: Response;
    try {
      response = await fetch(this.url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ text: formatAlertText(alert), alert }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new CollaboratorUnavailableError(
        "alerts",
        `Alert webhook request failed: ${describeError(err)}`,
        { cause: err },
      );
    }

    if (!response.ok) {
      throw new CollaboratorUnavailableError(
        "alerts",
        `Alert webhook returned HTTP ${response.status}`,
      );
    }
    log.info("Alert sent", { kind: alert.kind });
  }
}

export function createAlertSink(url: string | undefined): AlertSink {
  return url ? new WebhookAlertSink(url) : new NoopAlertSink();
}

/**
 * Sends every alert, logging failures. Never throws: ingestion state is
 * already committed when alerts go out.
 */
export async function dispatchAlerts(sink: AlertSink, alerts: Alert[]): Promise<number> {
  let delivered = 0;
  for (const alert of alerts) {
    try {
      await sink.notify(alert);
      delivered += 1;
    } catch (err) {
      log.warn(`Alert delivery failed: ${describeError(err)}`, { kind: alert.kind });
    }
  }
  return delivered;
}
