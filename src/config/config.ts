import path from "node:path";
import { z } from "zod";
import { ConfigError } from "../errors.js";
import { EVENT_TYPES, type EventType } from "../ingest/parsers/index.js";
import { LOG_FORMATS, LOG_LEVELS, type LogFormat, type LogLevel } from "../logging/subsystem.js";
import { isValidTimezone } from "../metrics/windows.js";
import { lockPathFor, resolveStateDir, resolveUserPath } from "./paths.js";

export type TruncatePolicy = "halt" | "reset";

export type HoneytallyConfig = {
  /** OpenCanary JSON-lines log */
  logPath: string;
  /** Persisted ingestion cursor */
  cursorPath: string;
  /** Single-writer lock beside the cursor */
  lockPath: string;
  /** SQLite event store */
  dbPath: string;
  /** Where the rendered report is published */
  reportDir: string;
  /** Civil timezone that daily windows align to */
  reportTimezone: string;
  /** Timezone of `local_time` values in the log */
  sourceTimezone: string;
  alertWebhookUrl?: string;
  alertEventTypes: EventType[];
  geoipDbPath: string;
  onTruncate: TruncatePolicy;
  batchSize: number;
  maxBytesPerRun: number;
  topN: number;
  ignoredUsernames: string[];
  ignoredPasswords: string[];
  logLevel: LogLevel;
  logFormat: LogFormat;
};

export const DEFAULT_LOG_PATH = "/var/log/opencanary.log";
export const DEFAULT_GEOIP_DB_PATH = "/usr/share/GeoIP/GeoLite2-City.mmdb";
export const DEFAULT_REPORT_TIMEZONE = "America/New_York";

const csv = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item.length > 0),
    );

const timezone = (fallback: string) =>
  z
    .string()
    .trim()
    .default(fallback)
    .refine(isValidTimezone, { message: "unknown IANA timezone" });

const envSchema = z.object({
  HONEYTALLY_LOG_PATH: z.string().trim().default(DEFAULT_LOG_PATH),
  HONEYTALLY_CURSOR_PATH: z.string().trim().optional(),
  HONEYTALLY_DB_PATH: z.string().trim().optional(),
  HONEYTALLY_REPORT_DIR: z.string().trim().optional(),
  HONEYTALLY_REPORT_TIMEZONE: timezone(DEFAULT_REPORT_TIMEZONE),
  HONEYTALLY_SOURCE_TIMEZONE: timezone("UTC"),
  HONEYTALLY_ALERT_WEBHOOK_URL: z.string().trim().url().optional(),
  HONEYTALLY_ALERT_EVENT_TYPES: csv("login-attempt,unusual-activity").pipe(
    z.array(z.enum(EVENT_TYPES)),
  ),
  HONEYTALLY_GEOIP_DB_PATH: z.string().trim().default(DEFAULT_GEOIP_DB_PATH),
  HONEYTALLY_ON_TRUNCATE: z.enum(["halt", "reset"]).default("halt"),
  HONEYTALLY_BATCH_SIZE: z.coerce.number().int().positive().default(500),
  HONEYTALLY_MAX_BYTES_PER_RUN: z.coerce.number().int().positive().default(64 * 1024 * 1024),
  HONEYTALLY_TOP_N: z.coerce.number().int().positive().max(100).default(10),
  HONEYTALLY_IGNORED_USERNAMES: csv("none"),
  HONEYTALLY_IGNORED_PASSWORDS: csv("<Password was not in the common list>"),
  HONEYTALLY_LOG_LEVEL: z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)).default("info"),
  HONEYTALLY_LOG_FORMAT: z.string().trim().toLowerCase().pipe(z.enum(LOG_FORMATS)).default("pretty"),
});

/**
 * Builds the runtime configuration from environment variables.
 * Empty variables count as unset. Throws a ConfigError naming every bad variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): HoneytallyConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith("HONEYTALLY_") && value !== undefined && value.trim() !== "") {
      present[key] = value;
    }
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const values = parsed.data;
  const stateDir = resolveStateDir(env);
  const fromState = (value: string | undefined, fallback: string): string =>
    path.resolve(resolveUserPath(value ?? path.join(stateDir, fallback)));
  const cursorPath = fromState(values.HONEYTALLY_CURSOR_PATH, "ingest.cursor");

  return {
    logPath: path.resolve(resolveUserPath(values.HONEYTALLY_LOG_PATH)),
    cursorPath,
    lockPath: lockPathFor(cursorPath),
    dbPath: fromState(values.HONEYTALLY_DB_PATH, "events.db"),
    reportDir: fromState(values.HONEYTALLY_REPORT_DIR, "report"),
    reportTimezone: values.HONEYTALLY_REPORT_TIMEZONE,
    sourceTimezone: values.HONEYTALLY_SOURCE_TIMEZONE,
    alertWebhookUrl: values.HONEYTALLY_ALERT_WEBHOOK_URL,
    alertEventTypes: values.HONEYTALLY_ALERT_EVENT_TYPES,
    geoipDbPath: path.resolve(resolveUserPath(values.HONEYTALLY_GEOIP_DB_PATH)),
    onTruncate: values.HONEYTALLY_ON_TRUNCATE,
    batchSize: values.HONEYTALLY_BATCH_SIZE,
    maxBytesPerRun: values.HONEYTALLY_MAX_BYTES_PER_RUN,
    topN: values.HONEYTALLY_TOP_N,
    ignoredUsernames: values.HONEYTALLY_IGNORED_USERNAMES,
    ignoredPasswords: values.HONEYTALLY_IGNORED_PASSWORDS,
    logLevel: values.HONEYTALLY_LOG_LEVEL,
    logFormat: values.HONEYTALLY_LOG_FORMAT,
  };
}
