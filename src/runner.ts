import type { HoneytallyConfig } from "./config/config.js";
import { buildAlerts } from "./alerts/alert.js";
import { dispatchAlerts, type AlertSink } from "./alerts/webhook.js";
import { CollaboratorUnavailableError, describeError } from "./errors.js";
import type { IngestRunResult, Ingestor } from "./ingest/ingestor.js";
import { createSubsystemLogger } from "./logging/subsystem.js";
import type { Aggregator } from "./metrics/aggregator.js";
import type { ReportPublisher } from "./metrics/publisher.js";
import { renderReport, type RenderedReport } from "./metrics/report.js";
import { previousCivilDay } from "./metrics/windows.js";

const log = createSubsystemLogger("runner");

/**
 * Renders the report for `day` (defaults to the last complete day in the
 * report timezone).
 */
export async function buildReport(
  aggregator: Aggregator,
  params: { timezone: string; topN: number; day?: string; now?: Date },
): Promise<RenderedReport> {
  const now = params.now ?? new Date();
  const day = params.day ?? previousCivilDay(now, params.timezone);
  const allTime = await aggregator.allTime();
  const snapshot = await aggregator.forDay(day);
  return renderReport({
    allTime,
    snapshot,
    generatedAt: now,
    timezone: params.timezone,
    topN: params.topN,
  });
}

export type ScheduledRunOutcome = {
  ingest: IngestRunResult;
  alertsDelivered: number;
  published: boolean;
};

export type ScheduledRunDeps = {
  ingestor: Ingestor;
  aggregator: Aggregator;
  alerts: AlertSink;
  publisher: ReportPublisher;
};

/**
 * The scheduled job: ingest, alert, then publish the report. Alerts and
 * publication run only after ingestion has committed; collaborator failures
 * are logged and reflected in the outcome.
 */
export async function runScheduled(
  config: HoneytallyConfig,
  deps: ScheduledRunDeps,
  options: { day?: string; now?: Date } = {},
): Promise<ScheduledRunOutcome> {
  const ingest = await deps.ingestor.run();

  const alerts = buildAlerts(ingest, {
    logPath: config.logPath,
    eventTypes: config.alertEventTypes,
  });
  const alertsDelivered = await dispatchAlerts(deps.alerts, alerts);

  const report = await buildReport(deps.aggregator, {
    timezone: config.reportTimezone,
    topN: config.topN,
    day: options.day,
    now: options.now,
  });

  let published = false;
  try {
    await deps.publisher.publish(report);
    published = true;
  } catch (err) {
    if (!(err instanceof CollaboratorUnavailableError)) {
      throw err;
    }
    log.warn(`Report not published: ${describeError(err)}`);
  }

  return { ingest, alertsDelivered, published };
}
