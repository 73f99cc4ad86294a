import { isIP } from "node:net";
import dayjs from "dayjs";
import timezone from "dayjs/plugin/timezone.js";
import utc from "dayjs/plugin/utc.js";
import type { HoneypotEvent, ParseErrorReason, ParseResult, RawLine } from "./index.js";
import { lookupLogType } from "./logtypes.js";

dayjs.extend(utc);
dayjs.extend(timezone);

/**
 * OpenCanary JSON log entry. Every field is optional on the wire, so all are
 * treated as unknown until checked.
 *
 * Example:
 * {"dst_host": "10.0.0.5", "dst_port": 22, "local_time": "2024-01-01 12:00:00.123456",
 *  "logdata": {"USERNAME": "root", "PASSWORD": "toor"}, "logtype": 4002,
 *  "node_id": "canary-1", "src_host": "1.2.3.4", "src_port": 51234,
 *  "utc_time": "2024-01-01 12:00:00.123456"}
 */
type CanaryEntry = Record<string, unknown>;

export type CanaryParseOptions = {
  /** Timezone `local_time` is written in when `utc_time` is missing. Defaults to UTC. */
  sourceTimezone?: string;
};

const TIMESTAMP_PATTERN = /^(\d{4}-\d{2}-\d{2})[ T](\d{2}:\d{2}:\d{2})(?:\.(\d{1,9}))?$/;

class LineRejected extends Error {
  constructor(
    readonly reason: ParseErrorReason,
    message: string,
  ) {
    super(message);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function credentialValue(value: unknown): string | undefined {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return undefined;
}

/**
 * Pulls username/password out of `logdata` first (keys vary in case per
 * service), then from top-level fields.
 */
function extractCredentials(entry: CanaryEntry): { username?: string; password?: string } {
  let username: string | undefined;
  let password: string | undefined;

  if (isRecord(entry.logdata)) {
    for (const [key, raw] of Object.entries(entry.logdata)) {
      const lower = key.toLowerCase();
      if (username === undefined && (lower === "username" || lower === "user")) {
        username = credentialValue(raw);
      }
      if (password === undefined && lower.includes("password")) {
        password = credentialValue(raw);
      }
    }
  }

  username ??= credentialValue(entry.username) ?? credentialValue(entry.user);
  password ??= credentialValue(entry.password);

  return { username, password };
}

function parsePort(value: unknown, field: string): number | undefined {
  if (value === undefined || value === null || value === -1) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0 || value > 65535) {
    throw new LineRejected(
      "invalid-field",
      `${field} is not a port number: ${JSON.stringify(value)}`,
    );
  }
  return value;
}

/**
 * Normalizes an OpenCanary timestamp to ISO-8601 UTC.
 * `utc_time` is authoritative; `local_time` is read in the source timezone.
 */
function normalizeTimestamp(entry: CanaryEntry, sourceTimezone: string): string {
  const fromUtc = typeof entry.utc_time === "string";
  const raw = fromUtc ? entry.utc_time : entry.local_time;
  if (typeof raw !== "string") {
    throw new LineRejected("invalid-timestamp", "missing local_time/utc_time");
  }

  const match = TIMESTAMP_PATTERN.exec(raw.trim());
  if (!match) {
    throw new LineRejected("invalid-timestamp", `unrecognized timestamp: ${raw}`);
  }
  const [, date, time, fraction] = match;
  const millis = (fraction ?? "").padEnd(3, "0").slice(0, 3);
  const wallClock = `${date} ${time}`;

  // dayjs rolls overflow (Feb 30) into the next month; reject instead.
  const calendar = dayjs.utc(wallClock);
  if (!calendar.isValid() || calendar.format("YYYY-MM-DD HH:mm:ss") !== wallClock) {
    throw new LineRejected("invalid-timestamp", `not a calendar time: ${raw}`);
  }

  const instant =
    fromUtc || sourceTimezone === "UTC"
      ? calendar.valueOf()
      : dayjs.tz(wallClock, sourceTimezone).valueOf();
  return new Date(instant + Number(millis)).toISOString();
}

function parseEntry(line: RawLine, sourceTimezone: string): HoneypotEvent {
  const trimmed = line.text.trim();
  if (!trimmed.startsWith("{")) {
    throw new LineRejected("malformed", "line is not a JSON object");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch (err) {
    throw new LineRejected("malformed", `invalid JSON: ${String(err)}`);
  }
  if (!isRecord(parsed)) {
    throw new LineRejected("malformed", "line is not a JSON object");
  }
  const entry: CanaryEntry = parsed;

  if (typeof entry.logtype !== "number" || !Number.isInteger(entry.logtype)) {
    throw new LineRejected("malformed", "missing integer logtype");
  }
  const logtype = entry.logtype;
  const info = lookupLogType(logtype);
  if (!info) {
    throw new LineRejected("unknown-event-type", `unknown logtype ${logtype}`);
  }
  if (info.category === "system") {
    throw new LineRejected("not-an-event", `${info.name} is a honeypot system message`);
  }
  const eventType = info.category;

  if (entry.dst_port === -1) {
    throw new LineRejected("not-an-event", "event has no destination port");
  }
  const dstPort = parsePort(entry.dst_port, "dst_port");
  if (dstPort === undefined) {
    throw new LineRejected("invalid-field", "missing dst_port");
  }
  const srcPort = parsePort(entry.src_port, "src_port");

  if (typeof entry.src_host !== "string" || isIP(entry.src_host) === 0) {
    throw new LineRejected(
      "invalid-field",
      `src_host is not an IP address: ${JSON.stringify(entry.src_host)}`,
    );
  }
  const srcIp = entry.src_host;

  const timestamp = normalizeTimestamp(entry, sourceTimezone);
  const { username, password } = extractCredentials(entry);

  return {
    sourceOffset: line.offset,
    timestamp,
    eventType,
    logtype,
    srcIp,
    srcPort,
    dstPort,
    username,
    password,
    rawPayload: trimmed,
  };
}

/**
 * Parses one OpenCanary log line. Never throws: rejected lines come back as
 * a ParseError tagged with the line's offset.
 */
export function parseCanaryLine(line: RawLine, options: CanaryParseOptions = {}): ParseResult {
  try {
    return { ok: true, event: parseEntry(line, options.sourceTimezone ?? "UTC") };
  } catch (err) {
    if (err instanceof LineRejected) {
      return {
        ok: false,
        error: { reason: err.reason, message: err.message, offset: line.offset },
      };
    }
    return {
      ok: false,
      error: { reason: "malformed", message: String(err), offset: line.offset },
    };
  }
}
