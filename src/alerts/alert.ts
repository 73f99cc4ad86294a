import type { IngestRunResult, TruncationAction } from "../ingest/ingestor.js";
import type { EventType } from "../ingest/parsers/index.js";
import { sortCounts } from "../metrics/aggregator.js";

const TOP_SOURCES = 5;

const TRUNCATION_ACTION_TEXT: Record<TruncationAction, string> = {
  reset: "ingestion restarted at offset 0 under a new generation",
  halted: "ingestion is halted until an operator resets the cursor",
  deferred: "the log shrank mid-read; the next run restarts at offset 0 under a new generation",
};

export type ActivityAlert = {
  kind: "activity";
  /** Events of the alerted types accepted by the run */
  total: number;
  byEventType: Partial<Record<EventType, number>>;
  /** Busiest sources across everything the run accepted */
  topSources: Array<{ ip: string; count: number }>;
  samples: Array<{
    timestamp: string;
    eventType: EventType;
    srcIp: string;
    dstPort: number;
    username?: string;
  }>;
};

export type TruncationAlert = {
  kind: "log-truncated";
  logPath: string;
  cursor: number;
  size: number;
  action: TruncationAction;
};

export type Alert = ActivityAlert | TruncationAlert;

/**
 * Builds the alerts a finished run warrants: operator attention for a
 * truncated log, and a summary of accepted events of the alerted types.
 */
export function buildAlerts(
  result: IngestRunResult,
  params: { logPath: string; eventTypes: EventType[] },
): Alert[] {
  const alerts: Alert[] = [];

  if (result.truncation) {
    alerts.push({
      kind: "log-truncated",
      logPath: params.logPath,
      cursor: result.truncation.cursor,
      size: result.truncation.size,
      action: result.truncation.action,
    });
  }

  const alerted = new Set(params.eventTypes);
  const byEventType: Partial<Record<EventType, number>> = {};
  let total = 0;
  for (const type of params.eventTypes) {
    const count = result.accepted.byEventType[type] ?? 0;
    if (count > 0) {
      byEventType[type] = count;
      total += count;
    }
  }
  if (total === 0) {
    return alerts;
  }

  const samples = result.accepted.samples.filter((event) => alerted.has(event.eventType));
  const topSources = sortCounts(
    Object.entries(result.accepted.bySource).map(([key, count]) => ({ key, count })),
  )
    .slice(0, TOP_SOURCES)
    .map((entry) => ({ ip: entry.key, count: entry.count }));

  alerts.push({
    kind: "activity",
    total,
    byEventType,
    topSources,
    samples: samples.map((event) => ({
      timestamp: event.timestamp,
      eventType: event.eventType,
      srcIp: event.srcIp,
      dstPort: event.dstPort,
      username: event.username,
    })),
  });
  return alerts;
}

/**
 * Plain-text rendering used as the webhook message body.
 */
export function formatAlertText(alert: Alert): string {
  if (alert.kind === "log-truncated") {
    const action = TRUNCATION_ACTION_TEXT[alert.action];
    return `*[WARN]* Honeypot log truncated\n>${alert.logPath} is ${alert.size} bytes, cursor was ${alert.cursor}; ${action}`;
  }

  const types = Object.entries(alert.byEventType)
    .map(([type, count]) => `${type}: ${count}`)
    .join(", ");
  const sources = alert.topSources.map((s) => `${s.ip} (${s.count})`).join(", ");
  return `*[INFO]* ${alert.total} new honeypot events\n>${types}\nTop sources: ${sources}`;
}
