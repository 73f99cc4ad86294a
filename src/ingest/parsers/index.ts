export { parseCanaryLine, type CanaryParseOptions } from "./opencanary.js";
export { lookupLogType, type LogTypeInfo } from "./logtypes.js";

/**
 * Attack categories an OpenCanary log type maps to.
 */
export const EVENT_TYPES = [
  "connection",
  "login-attempt",
  "request",
  "scan",
  "unusual-activity",
] as const;

export type EventType = (typeof EVENT_TYPES)[number];

/**
 * One complete line of the log. `byteLength` includes the line terminator.
 */
export type RawLine = {
  offset: number;
  byteLength: number;
  text: string;
};

/**
 * Parsed honeypot event ready for the event store.
 */
export type HoneypotEvent = {
  /** Byte position of the line in the log */
  sourceOffset: number;
  /** ISO-8601 UTC, millisecond precision */
  timestamp: string;
  eventType: EventType;
  logtype: number;
  srcIp: string;
  srcPort?: number;
  dstPort: number;
  /** Absent when the event carried no username field; "" is a real value */
  username?: string;
  password?: string;
  rawPayload: string;
};

export type ParseErrorReason =
  | "malformed"
  | "not-an-event"
  | "unknown-event-type"
  | "invalid-field"
  | "invalid-timestamp";

export type ParseError = {
  reason: ParseErrorReason;
  message: string;
  offset: number;
};

export type ParseResult = { ok: true; event: HoneypotEvent } | { ok: false; error: ParseError };

import { parseCanaryLine, type CanaryParseOptions } from "./opencanary.js";

/**
 * Parses lines in order, splitting accepted events from rejected lines.
 */
export function parseLines(
  lines: RawLine[],
  options: CanaryParseOptions = {},
): { events: HoneypotEvent[]; errors: ParseError[] } {
  const events: HoneypotEvent[] = [];
  const errors: ParseError[] = [];
  for (const line of lines) {
    const result = parseCanaryLine(line, options);
    if (result.ok) {
      events.push(result.event);
    } else {
      errors.push(result.error);
    }
  }
  return { events, errors };
}
