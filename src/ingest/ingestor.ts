import type { HoneytallyConfig, TruncatePolicy } from "../config/config.js";
import type { EventStore, EventStoreSummary } from "./event-store.js";
import { LockContentionError, LogTruncatedError } from "../errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { FileCursorStore, type CursorStore, type IngestCursor } from "./cursor-store.js";
import { acquireRunLock, type RunLock } from "./lock.js";
import {
  parseLines,
  type EventType,
  type HoneypotEvent,
  type ParseErrorReason,
  type RawLine,
} from "./parsers/index.js";
import { inspectLog, readLogLines } from "./tail-reader.js";

const log = createSubsystemLogger("ingest/ingestor");

const DEFAULT_BATCH_SIZE = 500;

export type IngestState = "idle" | "reading" | "parsing" | "committing" | "advancing-cursor";

const TRANSITIONS: Record<IngestState, IngestState[]> = {
  idle: ["reading"],
  reading: ["parsing", "advancing-cursor", "idle"],
  parsing: ["committing", "idle"],
  committing: ["advancing-cursor", "idle"],
  "advancing-cursor": ["reading", "idle"],
};

/**
 * Where accepted events are committed. EventStore satisfies this.
 */
export type EventWriter = Pick<EventStore, "append">;

export type IngestRunStatus = "ok" | "locked" | "truncated";

/**
 * What a run accepted, for alerting. Counts include events re-read after a
 * crash, so consumers see them at least once.
 */
export type AcceptedSummary = {
  byEventType: Partial<Record<EventType, number>>;
  bySource: Record<string, number>;
  samples: HoneypotEvent[];
};

/**
 * What a run did about a truncated log. `deferred` means the log shrank
 * while being read under the reset policy; the next run resets.
 */
export type TruncationAction = "halted" | "reset" | "deferred";

export type IngestRunResult = {
  status: IngestRunStatus;
  startCursor: IngestCursor | null;
  endCursor: IngestCursor | null;
  /** True when a truncated log restarted reading under a new generation */
  reset: boolean;
  /** Set when the cursor pointed past the end of the log */
  truncation: { cursor: number; size: number; action: TruncationAction } | null;
  linesRead: number;
  bytesRead: number;
  inserted: number;
  duplicates: number;
  parseErrors: Partial<Record<ParseErrorReason, number>>;
  accepted: AcceptedSummary;
  durationMs: number;
};

export type IngestorOptions = {
  logPath: string;
  lockPath: string;
  cursorStore: CursorStore;
  eventWriter: EventWriter;
  /** What to do when the cursor points past the end of the log */
  onTruncate?: TruncatePolicy;
  /** Lines per commit */
  batchSize?: number;
  /** Upper bound on bytes consumed per run */
  maxBytesPerRun?: number;
  sourceTimezone?: string;
  /** Accepted events kept per run for alert payloads */
  maxSamples?: number;
};

function emptySummary(): AcceptedSummary {
  return { byEventType: {}, bySource: {}, samples: [] };
}

/**
 * Incremental ingestion of the honeypot log.
 *
 * Each run reads complete lines after the saved cursor, parses them, commits
 * accepted events batch by batch and only then moves the cursor past the
 * batch. A run interrupted between commit and cursor write re-reads that
 * batch next time; the event store's unique key absorbs the replay.
 */
export class Ingestor {
  private readonly logPath: string;
  private readonly lockPath: string;
  private readonly cursorStore: CursorStore;
  private readonly eventWriter: EventWriter;
  private readonly onTruncate: TruncatePolicy;
  private readonly batchSize: number;
  private readonly maxBytesPerRun: number | undefined;
  private readonly sourceTimezone: string;
  private readonly maxSamples: number;
  private state: IngestState = "idle";

  constructor(options: IngestorOptions) {
    this.logPath = options.logPath;
    this.lockPath = options.lockPath;
    this.cursorStore = options.cursorStore;
    this.eventWriter = options.eventWriter;
    this.onTruncate = options.onTruncate ?? "halt";
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.maxBytesPerRun = options.maxBytesPerRun;
    this.sourceTimezone = options.sourceTimezone ?? "UTC";
    this.maxSamples = options.maxSamples ?? 20;
  }

  get currentState(): IngestState {
    return this.state;
  }

  private transition(next: IngestState): void {
    if (this.state === next) {
      return;
    }
    if (!TRANSITIONS[this.state].includes(next)) {
      throw new Error(`Illegal ingest transition ${this.state} -> ${next}`);
    }
    log.trace(`${this.state} -> ${next}`);
    this.state = next;
  }

  /**
   * Performs one bounded ingestion run under the single-writer lock.
   * Lock contention and a halted truncation come back as statuses, not errors.
   */
  async run(): Promise<IngestRunResult> {
    const startedAt = Date.now();
    let lock: RunLock;
    try {
      lock = await acquireRunLock(this.lockPath);
    } catch (err) {
      if (err instanceof LockContentionError) {
        log.warn("Another ingestion run holds the lock, skipping", {
          lockPath: this.lockPath,
          holderPid: err.holderPid,
        });
        return this.emptyResult("locked", null, startedAt);
      }
      throw err;
    }

    try {
      return await this.runLocked(startedAt);
    } finally {
      this.state = "idle";
      await lock.release();
    }
  }

  private async runLocked(startedAt: number): Promise<IngestRunResult> {
    const startCursor = await this.cursorStore.read();
    let cursor = startCursor;
    let reset = false;

    this.transition("reading");
    const inspection = await inspectLog({ file: this.logPath, cursor: cursor.offset });
    if (inspection.truncated) {
      const truncation = new LogTruncatedError({
        file: this.logPath,
        cursor: cursor.offset,
        size: inspection.size,
      });
      if (this.onTruncate === "halt") {
        log.error(`${truncation.message}; halting until an operator intervenes`, {
          generation: cursor.generation,
        });
        return {
          ...this.emptyResult("truncated", startCursor, startedAt),
          truncation: { cursor: truncation.cursor, size: truncation.size, action: "halted" },
        };
      }

      cursor = { offset: 0, generation: cursor.generation + 1 };
      log.warn(`${truncation.message}; restarting at offset 0`, {
        generation: cursor.generation,
      });
      this.transition("advancing-cursor");
      await this.cursorStore.write(cursor);
      this.transition("reading");
      reset = true;
    }

    const result: IngestRunResult = {
      ...this.emptyResult("ok", startCursor, startedAt),
      endCursor: cursor,
      reset,
      truncation: reset
        ? { cursor: startCursor.offset, size: inspection.size, action: "reset" }
        : null,
    };

    try {
      let batch: RawLine[] = [];
      for await (const line of readLogLines({
        file: this.logPath,
        cursor: cursor.offset,
        maxBytes: this.maxBytesPerRun,
      })) {
        batch.push(line);
        if (batch.length >= this.batchSize) {
          cursor = await this.processBatch(batch, cursor, result);
          batch = [];
          this.transition("reading");
        }
      }
      if (batch.length > 0) {
        cursor = await this.processBatch(batch, cursor, result);
      }
    } catch (err) {
      if (err instanceof LogTruncatedError) {
        // The log shrank between inspection and reading; the next run applies the policy.
        log.error(err.message);
        return {
          ...result,
          status: "truncated",
          truncation: {
            cursor: err.cursor,
            size: err.size,
            action: this.onTruncate === "reset" ? "deferred" : "halted",
          },
          durationMs: Date.now() - startedAt,
        };
      }
      throw err;
    }

    this.transition("idle");
    result.durationMs = Date.now() - startedAt;

    const level = result.linesRead > 0 ? "info" : "debug";
    log[level](`Ingestion run complete`, {
      lines: result.linesRead,
      inserted: result.inserted,
      duplicates: result.duplicates,
      parseErrors: result.parseErrors,
      cursor: cursor.offset,
      generation: cursor.generation,
    });
    return result;
  }

  /**
   * Parses, commits and then advances the cursor past one batch of lines.
   */
  private async processBatch(
    lines: RawLine[],
    cursor: IngestCursor,
    result: IngestRunResult,
  ): Promise<IngestCursor> {
    const first = lines[0];
    const last = lines[lines.length - 1];
    if (!first || !last) {
      return cursor;
    }

    this.transition("parsing");
    const { events, errors } = parseLines(lines, { sourceTimezone: this.sourceTimezone });
    for (const error of errors) {
      result.parseErrors[error.reason] = (result.parseErrors[error.reason] ?? 0) + 1;
      log.debug(`Skipping line at ${error.offset}: ${error.message}`, { reason: error.reason });
    }

    this.transition("committing");
    const inserted = this.eventWriter.append(events, cursor.generation);

    this.transition("advancing-cursor");
    const next: IngestCursor = {
      offset: last.offset + last.byteLength,
      generation: cursor.generation,
    };
    await this.cursorStore.write(next);

    result.linesRead += lines.length;
    result.bytesRead += next.offset - first.offset;
    result.inserted += inserted;
    result.duplicates += events.length - inserted;
    result.endCursor = next;
    this.recordAccepted(result.accepted, events);

    return next;
  }

  private recordAccepted(summary: AcceptedSummary, events: HoneypotEvent[]): void {
    for (const event of events) {
      summary.byEventType[event.eventType] = (summary.byEventType[event.eventType] ?? 0) + 1;
      summary.bySource[event.srcIp] = (summary.bySource[event.srcIp] ?? 0) + 1;
      if (summary.samples.length < this.maxSamples) {
        summary.samples.push(event);
      }
    }
  }

  private emptyResult(
    status: IngestRunStatus,
    startCursor: IngestCursor | null,
    startedAt: number,
  ): IngestRunResult {
    return {
      status,
      startCursor,
      endCursor: startCursor,
      reset: false,
      truncation: null,
      linesRead: 0,
      bytesRead: 0,
      inserted: 0,
      duplicates: 0,
      parseErrors: {},
      accepted: emptySummary(),
      durationMs: Date.now() - startedAt,
    };
  }
}

export type IngestStatus = {
  logPath: string;
  logSize: number;
  cursor: IngestCursor;
  pendingBytes: number;
  truncated: boolean;
  store: EventStoreSummary;
};

/**
 * Cursor position relative to the log, plus store totals.
 */
export async function getIngestStatus(params: {
  logPath: string;
  cursorStore: CursorStore;
  eventStore: Pick<EventStore, "summary">;
}): Promise<IngestStatus> {
  const cursor = await params.cursorStore.read();
  const inspection = await inspectLog({ file: params.logPath, cursor: cursor.offset });
  return {
    logPath: params.logPath,
    logSize: inspection.size,
    cursor,
    pendingBytes: inspection.pending,
    truncated: inspection.truncated,
    store: params.eventStore.summary(),
  };
}

/**
 * Creates an ingestor wired to the configured cursor file, lock and store.
 */
export function createIngestor(config: HoneytallyConfig, eventWriter: EventWriter): Ingestor {
  return new Ingestor({
    logPath: config.logPath,
    lockPath: config.lockPath,
    cursorStore: new FileCursorStore(config.cursorPath),
    eventWriter,
    onTruncate: config.onTruncate,
    batchSize: config.batchSize,
    maxBytesPerRun: config.maxBytesPerRun,
    sourceTimezone: config.sourceTimezone,
  });
}
