import fs from "node:fs/promises";
import { z } from "zod";
import { CursorCorruptError } from "../errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { writeFileAtomic } from "../utils/atomic-write.js";

const log = createSubsystemLogger("ingest/cursor");

/**
 * Boundary between consumed and unconsumed log bytes.
 * `generation` changes only when an operator-approved truncation reset
 * restarts reading at offset 0.
 */
export type IngestCursor = {
  offset: number;
  generation: number;
};

export const INITIAL_CURSOR: IngestCursor = { offset: 0, generation: 0 };

/**
 * Durable cursor persistence. `write` must be durable before it resolves.
 */
export type CursorStore = {
  read(): Promise<IngestCursor>;
  write(cursor: IngestCursor): Promise<void>;
};

const cursorSchema = z.object({
  offset: z.number().int().nonnegative(),
  generation: z.number().int().nonnegative(),
});

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export function parseCursor(content: string): IngestCursor | null {
  const trimmed = content.trim();
  if (/^\d+$/.test(trimmed)) {
    const offset = Number(trimmed);
    return Number.isSafeInteger(offset) ? { offset, generation: 0 } : null;
  }
  try {
    const parsed = cursorSchema.safeParse(JSON.parse(trimmed));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/**
 * Cursor kept in a small JSON file, replaced atomically on every write.
 */
export class FileCursorStore implements CursorStore {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async read(): Promise<IngestCursor> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf8");
    } catch (err) {
      if (isMissing(err)) {
        return { ...INITIAL_CURSOR };
      }
      throw err;
    }

    const cursor = parseCursor(content);
    if (!cursor) {
      throw new CursorCorruptError(this.filePath, content);
    }
    return cursor;
  }

  async write(cursor: IngestCursor): Promise<void> {
    const checked = cursorSchema.parse(cursor);
    await writeFileAtomic(this.filePath, `${JSON.stringify(checked)}\n`);
    log.trace("Cursor written", { path: this.filePath, ...checked });
  }
}

/**
 * In-memory cursor, for tests and dry runs.
 */
export class MemoryCursorStore implements CursorStore {
  private cursor: IngestCursor;

  constructor(initial: IngestCursor = INITIAL_CURSOR) {
    this.cursor = { ...initial };
  }

  async read(): Promise<IngestCursor> {
    return { ...this.cursor };
  }

  async write(cursor: IngestCursor): Promise<void> {
    this.cursor = { ...cursor };
  }
}
