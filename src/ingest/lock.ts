import { randomUUID } from "node:crypto";
import fs, { type FileHandle } from "node:fs/promises";
import path from "node:path";
import { LockContentionError } from "../errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";

const log = createSubsystemLogger("ingest/lock");

// A lock file still being written by its owner may briefly be empty.
const FRESH_LOCK_GRACE_MS = 10_000;

/**
 * Exclusive hold on ingestion for one run.
 */
export type RunLock = {
  path: string;
  release(): Promise<void>;
};

export type LockHolder = {
  pid: number;
  acquiredAt: string;
  /** Distinguishes holders sharing a pid and timestamp */
  token?: string;
};

function sameHolder(a: LockHolder | null, b: LockHolder | null): boolean {
  return (
    a !== null &&
    b !== null &&
    a.pid === b.pid &&
    a.acquiredAt === b.acquiredAt &&
    a.token === b.token
  );
}

function errorCode(err: unknown): unknown {
  return err instanceof Error && "code" in err ? err.code : undefined;
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return errorCode(err) === "EPERM";
  }
}

async function readHolder(lockPath: string): Promise<LockHolder | null> {
  try {
    const parsed: unknown = JSON.parse(await fs.readFile(lockPath, "utf8"));
    if (
      typeof parsed === "object" &&
      parsed !== null &&
      "pid" in parsed &&
      typeof parsed.pid === "number" &&
      "acquiredAt" in parsed &&
      typeof parsed.acquiredAt === "string"
    ) {
      const token = "token" in parsed && typeof parsed.token === "string" ? parsed.token : undefined;
      return { pid: parsed.pid, acquiredAt: parsed.acquiredAt, token };
    }
    return null;
  } catch (err) {
    log.debug(`Unreadable lock file ${lockPath}: ${String(err)}`);
    return null;
  }
}

async function lockAgeMs(lockPath: string): Promise<number> {
  try {
    const stat = await fs.stat(lockPath);
    return Date.now() - stat.mtimeMs;
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return Number.POSITIVE_INFINITY;
    }
    throw err;
  }
}

async function tryCreate(lockPath: string, holder: LockHolder): Promise<boolean> {
  let handle: FileHandle;
  try {
    handle = await fs.open(lockPath, "wx");
  } catch (err) {
    if (errorCode(err) === "EEXIST") {
      return false;
    }
    throw err;
  }
  try {
    await handle.writeFile(JSON.stringify(holder), "utf8");
    await handle.sync();
  } finally {
    await handle.close();
  }
  return true;
}

/**
 * Acquires the single-writer ingestion lock.
 *
 * Throws LockContentionError when a live process holds it. A lock left
 * behind by a dead process is reclaimed.
 */
export async function acquireRunLock(lockPath: string): Promise<RunLock> {
  await fs.mkdir(path.dirname(lockPath), { recursive: true });
  const holder: LockHolder = {
    pid: process.pid,
    acquiredAt: new Date().toISOString(),
    token: randomUUID(),
  };

  for (let attempt = 0; attempt < 3; attempt += 1) {
    if (await tryCreate(lockPath, holder)) {
      return createLease(lockPath, holder);
    }

    const existing = await readHolder(lockPath);
    if (existing && isProcessAlive(existing.pid)) {
      throw new LockContentionError(lockPath, existing.pid);
    }
    if (!existing && (await lockAgeMs(lockPath)) < FRESH_LOCK_GRACE_MS) {
      throw new LockContentionError(lockPath, null);
    }

    await reclaimStaleLock(lockPath, existing);
  }

  throw new LockContentionError(lockPath, null);
}

/**
 * Removes a lock observed as stale, but only if it is still the same lock.
 *
 * The lock is first renamed aside, which is atomic: of several runs racing
 * to reclaim, only one moves any given file. If the moved file turns out to
 * be a newer lock than the one observed, it is linked back into place (link
 * fails rather than overwrite a lock created meanwhile) and the caller sees
 * contention. Returns whether the observed lock was removed.
 */
export async function reclaimStaleLock(
  lockPath: string,
  observed: LockHolder | null,
): Promise<boolean> {
  const asidePath = `${lockPath}.stale.${process.pid}.${randomUUID()}`;
  try {
    await fs.rename(lockPath, asidePath);
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      // another run reclaimed it first
      return false;
    }
    throw err;
  }

  const moved = await readHolder(asidePath);
  const stillStale =
    observed === null
      ? moved === null && (await lockAgeMs(asidePath)) >= FRESH_LOCK_GRACE_MS
      : sameHolder(moved, observed);
  if (stillStale) {
    log.warn("Reclaimed stale ingestion lock", {
      path: lockPath,
      stalePid: observed?.pid ?? null,
      acquiredAt: observed?.acquiredAt ?? null,
    });
    await fs.rm(asidePath, { force: true });
    return true;
  }

  try {
    await fs.link(asidePath, lockPath);
  } catch (err) {
    if (errorCode(err) !== "EEXIST") {
      throw err;
    }
    log.error("Ingestion lock replaced while restoring it", {
      path: lockPath,
      displacedPid: moved?.pid ?? null,
    });
  } finally {
    await fs.rm(asidePath, { force: true });
  }
  throw new LockContentionError(lockPath, moved?.pid ?? null);
}

function createLease(lockPath: string, holder: LockHolder): RunLock {
  let released = false;
  return {
    path: lockPath,
    async release() {
      if (released) {
        return;
      }
      released = true;
      const current = await readHolder(lockPath);
      if (!sameHolder(current, holder)) {
        log.warn("Ingestion lock no longer ours at release, leaving it", { path: lockPath });
        return;
      }
      await fs.rm(lockPath, { force: true });
    },
  };
}
