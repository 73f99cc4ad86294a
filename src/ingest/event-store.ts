import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import type { EventType, HoneypotEvent } from "./parsers/index.js";
import type { TimeRange } from "../metrics/windows.js";
import { StoreWriteError } from "../errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";

const log = createSubsystemLogger("ingest/event-store");

/**
 * Columns events can be grouped by. Country is derived from `src_ip` by the
 * aggregator and never stored.
 */
export type EventGroupKey = "dst_port" | "username" | "password" | "src_ip" | "event_type";

export type EventFilter = {
  eventTypes?: EventType[];
};

export type EventQuery = {
  groupBy: EventGroupKey;
  range?: TimeRange;
  filter?: EventFilter;
  /** Values of the grouped column to leave out */
  exclude?: string[];
  /** Compare excluded values trimmed and case-insensitively */
  foldExclude?: boolean;
  limit?: number;
};

export type GroupedCount = {
  key: string;
  count: number;
};

export type EventStoreSummary = {
  total: number;
  byEventType: Record<string, number>;
  firstTimestamp: string | null;
  lastTimestamp: string | null;
};

/**
 * A stored event row as read back for inspection.
 */
export type StoredEvent = HoneypotEvent & {
  generation: number;
  ingestedAt: number;
};

type EventRow = {
  generation: number;
  source_offset: number;
  ts: string;
  event_type: EventType;
  logtype: number;
  src_ip: string;
  src_port: number | null;
  dst_port: number;
  username: string | null;
  password: string | null;
  raw_payload: string;
  ingested_at: number;
};

const GROUP_COLUMNS: Record<EventGroupKey, { column: string; nullable: boolean }> = {
  dst_port: { column: "dst_port", nullable: false },
  username: { column: "username", nullable: true },
  password: { column: "password", nullable: true },
  src_ip: { column: "src_ip", nullable: false },
  event_type: { column: "event_type", nullable: false },
};

/**
 * Ensures the event store schema exists. The table is append-only: updates
 * and deletes are rejected by triggers, and `(generation, source_offset)`
 * is unique so re-reading a byte range cannot duplicate rows.
 */
export function ensureEventStoreSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      generation INTEGER NOT NULL DEFAULT 0,
      source_offset INTEGER NOT NULL,
      ts TEXT NOT NULL,
      event_type TEXT NOT NULL,
      logtype INTEGER NOT NULL,
      src_ip TEXT NOT NULL,
      src_port INTEGER,
      dst_port INTEGER NOT NULL,
      username TEXT,
      password TEXT,
      raw_payload TEXT NOT NULL,
      ingested_at INTEGER NOT NULL,
      UNIQUE (generation, source_offset)
    );
  `);

  db.exec(`
    CREATE TRIGGER IF NOT EXISTS events_no_update BEFORE UPDATE ON events
    BEGIN SELECT RAISE(ABORT, 'events are append-only'); END;
  `);
  db.exec(`
    CREATE TRIGGER IF NOT EXISTS events_no_delete BEFORE DELETE ON events
    BEGIN SELECT RAISE(ABORT, 'events are append-only'); END;
  `);

  db.exec(`CREATE INDEX IF NOT EXISTS idx_events_ts ON events(ts);`);
  db.exec(`CREATE INDEX IF NOT EXISTS idx_events_src_ip ON events(src_ip);`);
  db.exec(`CREATE INDEX IF NOT EXISTS idx_events_dst_port ON events(dst_port);`);
  db.exec(`CREATE INDEX IF NOT EXISTS idx_events_username ON events(username);`);
  db.exec(`CREATE INDEX IF NOT EXISTS idx_events_password ON events(password);`);
  db.exec(`CREATE INDEX IF NOT EXISTS idx_events_event_type ON events(event_type);`);
}

function buildWhere(params: {
  range?: TimeRange;
  filter?: EventFilter;
  extra?: string[];
}): { sql: string; values: Array<string | number> } {
  const clauses = [...(params.extra ?? [])];
  const values: Array<string | number> = [];

  if (params.range) {
    clauses.push("ts >= ? AND ts < ?");
    values.push(params.range.start, params.range.end);
  }
  const eventTypes = params.filter?.eventTypes;
  if (eventTypes && eventTypes.length > 0) {
    clauses.push(`event_type IN (${eventTypes.map(() => "?").join(", ")})`);
    values.push(...eventTypes);
  }

  return { sql: clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "", values };
}

/**
 * Append-only SQLite store of parsed honeypot events.
 */
export class EventStore {
  private readonly db: Database.Database;
  readonly dbPath: string;

  private constructor(db: Database.Database, dbPath: string) {
    this.db = db;
    this.dbPath = dbPath;
  }

  /**
   * Opens (creating if needed) the store at `dbPath`. `":memory:"` is accepted.
   * Read-only stores skip schema creation and require the file to exist.
   */
  static open(dbPath: string, options: { readonly?: boolean } = {}): EventStore {
    const inMemory = dbPath === ":memory:";
    if (!inMemory && !options.readonly) {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    const db = new Database(dbPath, {
      readonly: options.readonly ?? false,
      fileMustExist: options.readonly ?? false,
    });
    db.pragma("busy_timeout = 5000");
    if (!options.readonly) {
      if (!inMemory) {
        db.pragma("journal_mode = WAL");
      }
      db.pragma("synchronous = FULL");
      ensureEventStoreSchema(db);
    }

    log.debug("Event store opened", { dbPath, readonly: options.readonly ?? false });
    return new EventStore(db, dbPath);
  }

  /**
   * Inserts a batch inside one transaction. Events whose
   * `(generation, source_offset)` already exists are skipped by the table's
   * unique constraint. Returns the number of rows actually inserted.
   */
  append(events: HoneypotEvent[], generation: number): number {
    if (events.length === 0) {
      return 0;
    }

    const now = Date.now();
    let inserted = 0;
    try {
      const stmt = this.db.prepare(
        `INSERT INTO events (
          generation, source_offset, ts, event_type, logtype, src_ip,
          src_port, dst_port, username, password, raw_payload, ingested_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(generation, source_offset) DO NOTHING`,
      );

      this.db.exec("BEGIN IMMEDIATE");
      for (const event of events) {
        const result = stmt.run(
          generation,
          event.sourceOffset,
          event.timestamp,
          event.eventType,
          event.logtype,
          event.srcIp,
          event.srcPort ?? null,
          event.dstPort,
          event.username ?? null,
          event.password ?? null,
          event.rawPayload,
          now,
        );
        inserted += result.changes;
      }
      this.db.exec("COMMIT");
    } catch (err) {
      if (this.db.inTransaction) {
        this.db.exec("ROLLBACK");
      }
      throw new StoreWriteError(`Failed to append ${events.length} events to ${this.dbPath}`, {
        cause: err,
      });
    }
    return inserted;
  }

  /**
   * Grouped counts ordered by count (desc) then by the grouped value (asc).
   * NULL credentials are never grouped.
   */
  query(query: EventQuery): GroupedCount[] {
    const { column, nullable } = GROUP_COLUMNS[query.groupBy];
    const extra: string[] = [];
    const exclude = query.foldExclude
      ? (query.exclude ?? []).map((value) => value.trim().toLowerCase())
      : (query.exclude ?? []);
    if (nullable) {
      extra.push(`${column} IS NOT NULL`);
    }
    if (exclude.length > 0) {
      const compared = query.foldExclude ? `lower(trim(${column}))` : column;
      extra.push(`${compared} NOT IN (${exclude.map(() => "?").join(", ")})`);
    }

    const where = buildWhere({ range: query.range, filter: query.filter, extra });
    // exclusion placeholders come first in the WHERE clause
    const values: Array<string | number> = [...exclude, ...where.values];
    let sql = `SELECT CAST(${column} AS TEXT) AS key, COUNT(*) AS count
      FROM events ${where.sql}
      GROUP BY ${column}
      ORDER BY count DESC, ${column} ASC`;
    if (query.limit !== undefined) {
      sql += " LIMIT ?";
      values.push(query.limit);
    }

    return this.db.prepare<unknown[], GroupedCount>(sql).all(...values);
  }

  /**
   * Runs `read` inside one read transaction so every query it makes sees the
   * same committed state, even while another connection appends.
   */
  snapshot<T>(read: () => T): T {
    if (this.db.inTransaction) {
      return read();
    }
    this.db.exec("BEGIN DEFERRED");
    try {
      const result = read();
      this.db.exec("COMMIT");
      return result;
    } catch (err) {
      if (this.db.inTransaction) {
        this.db.exec("ROLLBACK");
      }
      throw err;
    }
  }

  count(params: { range?: TimeRange; filter?: EventFilter } = {}): number {
    const where = buildWhere(params);
    const row = this.db
      .prepare<unknown[], { count: number }>(`SELECT COUNT(*) AS count FROM events ${where.sql}`)
      .get(...where.values);
    return row?.count ?? 0;
  }

  countDistinctSources(params: { range?: TimeRange; filter?: EventFilter } = {}): number {
    const where = buildWhere(params);
    const row = this.db
      .prepare<unknown[], { count: number }>(
        `SELECT COUNT(DISTINCT src_ip) AS count FROM events ${where.sql}`,
      )
      .get(...where.values);
    return row?.count ?? 0;
  }

  /**
   * Totals for status output.
   */
  summary(): EventStoreSummary {
    const totals = this.db
      .prepare<[], { count: number; first: string | null; last: string | null }>(
        "SELECT COUNT(*) AS count, MIN(ts) AS first, MAX(ts) AS last FROM events",
      )
      .get();
    const byTypeRows = this.db
      .prepare<[], { event_type: string; count: number }>(
        "SELECT event_type, COUNT(*) AS count FROM events GROUP BY event_type ORDER BY event_type",
      )
      .all();

    const byEventType: Record<string, number> = {};
    for (const row of byTypeRows) {
      byEventType[row.event_type] = row.count;
    }

    return {
      total: totals?.count ?? 0,
      byEventType,
      firstTimestamp: totals?.first ?? null,
      lastTimestamp: totals?.last ?? null,
    };
  }

  /**
   * Events in storage order, optionally limited to one generation.
   */
  list(params: { generation?: number; limit?: number } = {}): StoredEvent[] {
    const clauses: string[] = [];
    const values: number[] = [];
    if (params.generation !== undefined) {
      clauses.push("generation = ?");
      values.push(params.generation);
    }
    let sql = `SELECT generation, source_offset, ts, event_type, logtype, src_ip, src_port,
      dst_port, username, password, raw_payload, ingested_at
      FROM events ${clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : ""}
      ORDER BY generation ASC, source_offset ASC`;
    if (params.limit !== undefined) {
      sql += " LIMIT ?";
      values.push(params.limit);
    }

    return this.db
      .prepare<unknown[], EventRow>(sql)
      .all(...values)
      .map((row) => ({
        generation: row.generation,
        sourceOffset: row.source_offset,
        timestamp: row.ts,
        eventType: row.event_type,
        logtype: row.logtype,
        srcIp: row.src_ip,
        srcPort: row.src_port ?? undefined,
        dstPort: row.dst_port,
        username: row.username ?? undefined,
        password: row.password ?? undefined,
        rawPayload: row.raw_payload,
        ingestedAt: row.ingested_at,
      }));
  }

  close(): void {
    this.db.close();
  }
}
