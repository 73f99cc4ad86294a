import { Logger, type ILogObj } from "tslog";

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;
export const LOG_FORMATS = ["pretty", "json", "hidden"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
export type LogFormat = (typeof LOG_FORMATS)[number];

const LEVEL_IDS: Record<LogLevel, number> = {
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

type LogMeta = Record<string, unknown>;

/**
 * Logger scoped to one subsystem. Messages come first, structured metadata second.
 */
export type SubsystemLogger = {
  subsystem: string;
  trace: (message: string, meta?: LogMeta) => void;
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
  fatal: (message: string, meta?: LogMeta) => void;
};

let rootLogger: Logger<ILogObj> | null = null;
// Bumped on reconfiguration so cached subsystem loggers are rebuilt
let rootVersion = 0;

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_IDS, value);
}

function isLogFormat(value: string): value is LogFormat {
  return LOG_FORMATS.some((format) => format === value);
}

function resolveLevel(env: NodeJS.ProcessEnv): LogLevel {
  const raw = env.HONEYTALLY_LOG_LEVEL?.trim().toLowerCase();
  return raw && isLogLevel(raw) ? raw : "info";
}

function resolveFormat(env: NodeJS.ProcessEnv): LogFormat {
  const raw = env.HONEYTALLY_LOG_FORMAT?.trim().toLowerCase();
  return raw && isLogFormat(raw) ? raw : "pretty";
}

function buildRootLogger(level: LogLevel, format: LogFormat): Logger<ILogObj> {
  return new Logger<ILogObj>({ name: "honeytally", type: format, minLevel: LEVEL_IDS[level] });
}

/**
 * Shared root logger. Until configureLogging runs it is built from
 * HONEYTALLY_LOG_LEVEL and HONEYTALLY_LOG_FORMAT, with unknown values
 * falling back to info and pretty.
 */
function getRootLogger(): Logger<ILogObj> {
  if (!rootLogger) {
    rootLogger = buildRootLogger(resolveLevel(process.env), resolveFormat(process.env));
  }
  return rootLogger;
}

/**
 * Applies validated logging settings to every subsystem logger.
 */
export function configureLogging(settings: { level: LogLevel; format: LogFormat }): void {
  rootLogger = buildRootLogger(settings.level, settings.format);
  rootVersion += 1;
}

export function currentLogSettings(): { minLevel: number; type: string } {
  const settings = getRootLogger().settings;
  return { minLevel: settings.minLevel, type: settings.type };
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  let cachedSub: Logger<ILogObj> | null = null;
  let cachedVersion = -1;

  const sub = (): Logger<ILogObj> => {
    if (!cachedSub || cachedVersion !== rootVersion) {
      cachedSub = getRootLogger().getSubLogger({ name: subsystem });
      cachedVersion = rootVersion;
    }
    return cachedSub;
  };

  const emit =
    (level: LogLevel) =>
    (message: string, meta?: LogMeta): void => {
      const logger = sub();
      const args: unknown[] = meta ? [message, meta] : [message];
      switch (level) {
        case "trace":
          logger.trace(...args);
          break;
        case "debug":
          logger.debug(...args);
          break;
        case "info":
          logger.info(...args);
          break;
        case "warn":
          logger.warn(...args);
          break;
        case "error":
          logger.error(...args);
          break;
        case "fatal":
          logger.fatal(...args);
          break;
      }
    };

  return {
    subsystem,
    trace: emit("trace"),
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
    fatal: emit("fatal"),
  };
}
