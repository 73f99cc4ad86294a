/**
 * Honeypot log ingestion and reporting.
 *
 * Reads an OpenCanary JSON-lines log incrementally into SQLite, then
 * aggregates daily and all-time metrics for alerts and a Markdown report.
 *
 * State (all paths configurable, see `loadConfig`):
 * - Cursor: ~/.honeytally/ingest.cursor (plus ingest.cursor.lock while a run is active)
 * - Events: ~/.honeytally/events.db
 * - Report: ~/.honeytally/report/README.md and metrics.json
 *
 * @example
 * ```ts
 * import { Aggregator, EventStore, StaticGeoResolver, createIngestor, loadConfig } from "honeytally";
 *
 * const config = loadConfig();
 * const store = EventStore.open(config.dbPath);
 *
 * const result = await createIngestor(config, store).run();
 * console.log(`${result.status}: ${result.inserted} new events`);
 *
 * const aggregator = new Aggregator(store, new StaticGeoResolver(), {
 *   timezone: config.reportTimezone,
 * });
 * console.log(await aggregator.forDay("2024-03-10"));
 *
 * store.close();
 * ```
 */

// Configuration
export { loadConfig, type HoneytallyConfig, type TruncatePolicy } from "./config/config.js";
export { resolveStateDir } from "./config/paths.js";

// Errors
export {
  CollaboratorUnavailableError,
  ConfigError,
  CursorCorruptError,
  HoneytallyError,
  LockContentionError,
  LogTruncatedError,
  StoreWriteError,
  type HoneytallyErrorCode,
} from "./errors.js";

// Ingestion
export {
  Ingestor,
  createIngestor,
  getIngestStatus,
  type EventWriter,
  type IngestRunResult,
  type IngestRunStatus,
  type IngestState,
  type IngestStatus,
  type IngestorOptions,
} from "./ingest/ingestor.js";
export { inspectLog, readLogLines, type LogInspection } from "./ingest/tail-reader.js";
export {
  FileCursorStore,
  INITIAL_CURSOR,
  MemoryCursorStore,
  type CursorStore,
  type IngestCursor,
} from "./ingest/cursor-store.js";
export { acquireRunLock, type RunLock } from "./ingest/lock.js";
export {
  EventStore,
  ensureEventStoreSchema,
  type EventFilter,
  type EventGroupKey,
  type EventQuery,
  type GroupedCount,
} from "./ingest/event-store.js";
export {
  EVENT_TYPES,
  parseCanaryLine,
  parseLines,
  type EventType,
  type HoneypotEvent,
  type ParseError,
  type ParseErrorReason,
  type ParseResult,
  type RawLine,
} from "./ingest/parsers/index.js";

// Metrics and reporting
export {
  Aggregator,
  type AllTimeMetrics,
  type CountEntry,
  type PortCount,
  type WindowMetrics,
} from "./metrics/aggregator.js";
export {
  CachedGeoResolver,
  MaxmindGeoResolver,
  StaticGeoResolver,
  UNKNOWN_COUNTRY,
  createGeoResolver,
  type GeoResolver,
} from "./metrics/geo.js";
export { civilDayWindow, previousCivilDay, type CivilDayWindow, type TimeRange } from "./metrics/windows.js";
export { renderReport, type RenderedReport } from "./metrics/report.js";
export { FileReportPublisher, type ReportPublisher } from "./metrics/publisher.js";

// Alerts
export { buildAlerts, formatAlertText, type Alert } from "./alerts/alert.js";
export {
  NoopAlertSink,
  WebhookAlertSink,
  createAlertSink,
  dispatchAlerts,
  type AlertSink,
} from "./alerts/webhook.js";

export { buildReport, runScheduled, type ScheduledRunOutcome } from "./runner.js";
