/**
 * Error taxonomy for ingestion runs. Every class carries a stable `code`
 * that the CLI maps to an exit status.
 */
export type HoneytallyErrorCode =
  | "CONFIG_INVALID"
  | "LOG_TRUNCATED"
  | "STORE_WRITE_FAILED"
  | "LOCK_CONTENTION"
  | "CURSOR_CORRUPT"
  | "COLLABORATOR_UNAVAILABLE";

export class HoneytallyError extends Error {
  readonly code: HoneytallyErrorCode;

  constructor(code: HoneytallyErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends HoneytallyError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("CONFIG_INVALID", `Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.issues = issues;
  }
}

/**
 * The saved cursor points past the end of the log (rotation or truncation).
 */
export class LogTruncatedError extends HoneytallyError {
  readonly file: string;
  readonly cursor: number;
  readonly size: number;

  constructor(params: { file: string; cursor: number; size: number }) {
    super(
      "LOG_TRUNCATED",
      `Log ${params.file} is ${params.size} bytes but the cursor is at ${params.cursor}`,
    );
    this.file = params.file;
    this.cursor = params.cursor;
    this.size = params.size;
  }
}

export class StoreWriteError extends HoneytallyError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("STORE_WRITE_FAILED", message, options);
  }
}

export class LockContentionError extends HoneytallyError {
  readonly lockPath: string;
  readonly holderPid: number | null;

  constructor(lockPath: string, holderPid: number | null) {
    super(
      "LOCK_CONTENTION",
      holderPid === null
        ? `Ingestion lock ${lockPath} is held by another run`
        : `Ingestion lock ${lockPath} is held by pid ${holderPid}`,
    );
    this.lockPath = lockPath;
    this.holderPid = holderPid;
  }
}

export class CursorCorruptError extends HoneytallyError {
  readonly cursorPath: string;

  constructor(cursorPath: string, content: string) {
    super("CURSOR_CORRUPT", `Cursor file ${cursorPath} is unreadable: ${JSON.stringify(content)}`);
    this.cursorPath = cursorPath;
  }
}

export class CollaboratorUnavailableError extends HoneytallyError {
  readonly collaborator: "geolocation" | "alerts" | "publisher";

  constructor(
    collaborator: "geolocation" | "alerts" | "publisher",
    message: string,
    options?: { cause?: unknown },
  ) {
    super("COLLABORATOR_UNAVAILABLE", message, options);
    this.collaborator = collaborator;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
