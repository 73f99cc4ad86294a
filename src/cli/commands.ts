import fs from "node:fs";
import { parseArgs } from "node:util";
import { createAlertSink } from "../alerts/webhook.js";
import { loadConfig, type HoneytallyConfig } from "../config/config.js";
import { ConfigError, HoneytallyError, describeError } from "../errors.js";
import { EventStore, type EventStoreSummary } from "../ingest/event-store.js";
import { createIngestor, getIngestStatus, type IngestRunResult } from "../ingest/ingestor.js";
import { FileCursorStore } from "../ingest/cursor-store.js";
import { configureLogging, createSubsystemLogger } from "../logging/subsystem.js";
import { Aggregator } from "../metrics/aggregator.js";
import { createGeoResolver } from "../metrics/geo.js";
import { FileReportPublisher } from "../metrics/publisher.js";
import { isCivilDay } from "../metrics/windows.js";
import { buildReport, runScheduled } from "../runner.js";

const log = createSubsystemLogger("cli");

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
/** Another run holds the ingestion lock (EX_TEMPFAIL) */
export const EXIT_LOCKED = 75;
/** The log is shorter than the cursor and the run stopped without reading it */
export const EXIT_TRUNCATED = 76;

const USAGE = `Usage: honeytally <command> [--day YYYY-MM-DD]

Commands:
  ingest   Read new log lines into the event store
  report   Aggregate metrics and publish the report
  run      ingest, send alerts, then report (for the scheduler)
  status   Show cursor position, backlog and store totals

Exit codes: 0 ok, 1 failure, 2 usage/config error, 75 locked, 76 log truncated`;

type Output = { write(chunk: string): unknown };

type EventSummarySource = Pick<EventStore, "summary">;

const EMPTY_SUMMARY: EventStoreSummary = {
  total: 0,
  byEventType: {},
  firstTimestamp: null,
  lastTimestamp: null,
};

export function exitCodeForIngest(result: IngestRunResult): number {
  switch (result.status) {
    case "ok":
      return EXIT_OK;
    case "locked":
      return EXIT_LOCKED;
    case "truncated":
      return EXIT_TRUNCATED;
  }
}

function printJson(out: Output, value: unknown): void {
  out.write(`${JSON.stringify(value, null, 2)}\n`);
}

async function withStore<T>(
  config: HoneytallyConfig,
  fn: (store: EventStore) => Promise<T>,
): Promise<T> {
  const store = EventStore.open(config.dbPath);
  try {
    return await fn(store);
  } finally {
    store.close();
  }
}

/**
 * Read-only access for inspection commands. A store that does not exist yet
 * is left uncreated and reads as empty.
 */
async function withReadonlyStore<T>(
  config: HoneytallyConfig,
  fn: (store: EventSummarySource) => Promise<T>,
): Promise<T> {
  if (!fs.existsSync(config.dbPath)) {
    return fn({ summary: () => EMPTY_SUMMARY });
  }
  const store = EventStore.open(config.dbPath, { readonly: true });
  try {
    return await fn(store);
  } finally {
    store.close();
  }
}

async function createAggregator(config: HoneytallyConfig, store: EventStore): Promise<Aggregator> {
  const geo = await createGeoResolver(config.geoipDbPath);
  return new Aggregator(store, geo, {
    timezone: config.reportTimezone,
    topN: config.topN,
    ignoredUsernames: config.ignoredUsernames,
    ignoredPasswords: config.ignoredPasswords,
  });
}

/**
 * Runs one CLI invocation and resolves to its exit code.
 */
export async function runCli(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  out: Output = process.stdout,
): Promise<number> {
  let command: string | undefined;
  let day: string | undefined;
  try {
    const parsed = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        day: { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    });
    if (parsed.values.help) {
      out.write(`${USAGE}\n`);
      return EXIT_OK;
    }
    command = parsed.positionals[0];
    day = parsed.values.day;
  } catch (err) {
    out.write(`${describeError(err)}\n${USAGE}\n`);
    return EXIT_USAGE;
  }

  if (day !== undefined && !isCivilDay(day)) {
    out.write(`--day must be YYYY-MM-DD, got ${day}\n`);
    return EXIT_USAGE;
  }

  let config: HoneytallyConfig;
  try {
    config = loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) {
      out.write(`${err.message}\n`);
      return EXIT_USAGE;
    }
    throw err;
  }
  configureLogging({ level: config.logLevel, format: config.logFormat });

  try {
    switch (command) {
      case "ingest":
        return await withStore(config, async (store) => {
          const result = await createIngestor(config, store).run();
          printJson(out, result);
          return exitCodeForIngest(result);
        });

      case "report":
        return await withStore(config, async (store) => {
          const aggregator = await createAggregator(config, store);
          const report = await buildReport(aggregator, {
            timezone: config.reportTimezone,
            topN: config.topN,
            day,
          });
          await new FileReportPublisher(config.reportDir).publish(report);
          return EXIT_OK;
        });

      case "run":
        return await withStore(config, async (store) => {
          const outcome = await runScheduled(
            config,
            {
              ingestor: createIngestor(config, store),
              aggregator: await createAggregator(config, store),
              alerts: createAlertSink(config.alertWebhookUrl),
              publisher: new FileReportPublisher(config.reportDir),
            },
            { day },
          );
          printJson(out, outcome);
          return exitCodeForIngest(outcome.ingest);
        });

      case "status":
        return await withReadonlyStore(config, async (store) => {
          printJson(
            out,
            await getIngestStatus({
              logPath: config.logPath,
              cursorStore: new FileCursorStore(config.cursorPath),
              eventStore: store,
            }),
          );
          return EXIT_OK;
        });

      default:
        out.write(`${command ? `Unknown command: ${command}\n` : ""}${USAGE}\n`);
        return EXIT_USAGE;
    }
  } catch (err) {
    if (err instanceof HoneytallyError) {
      log.error(err.message, { code: err.code });
    } else {
      log.error(`Unexpected failure: ${describeError(err)}`, {
        stack: err instanceof Error ? err.stack : undefined,
      });
    }
    return EXIT_FAILURE;
  }
}
