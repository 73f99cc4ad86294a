import fs from "node:fs/promises";
import type { RawLine } from "./parsers/index.js";
import { LogTruncatedError } from "../errors.js";

const DEFAULT_CHUNK_BYTES = 64 * 1024;
const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

/**
 * Snapshot of the log relative to a cursor.
 */
export type LogInspection = {
  /** Current file size (0 when the file does not exist) */
  size: number;
  /** Whether the cursor points past the end of the file */
  truncated: boolean;
  /** Bytes appended since the cursor */
  pending: number;
};

async function statSize(file: string): Promise<number> {
  try {
    const stat = await fs.stat(file);
    return stat.size;
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return 0;
    }
    throw err;
  }
}

export async function inspectLog(params: { file: string; cursor: number }): Promise<LogInspection> {
  const size = await statSize(params.file);
  return {
    size,
    truncated: params.cursor > size,
    pending: Math.max(0, size - params.cursor),
  };
}

function decodeLine(buffer: Buffer, start: number, newlineAt: number): string {
  let end = newlineAt;
  if (end > start && buffer[end - 1] === CARRIAGE_RETURN) {
    end -= 1;
  }
  return buffer.toString("utf8", start, end);
}

/**
 * Lazily yields complete lines appended after `cursor`.
 *
 * The read is bounded by the file size observed when it starts, so it never
 * waits for new data. A trailing line without its `\n` is left for the next
 * read. Once `maxBytes` have been consumed the generator stops at the next
 * line boundary; nothing is skipped.
 *
 * `cursor` must sit on a line boundary. A cursor past the end of the file
 * (rotation or truncation) throws LogTruncatedError.
 */
export async function* readLogLines(params: {
  file: string;
  cursor: number;
  maxBytes?: number;
  chunkBytes?: number;
}): AsyncGenerator<RawLine, void, undefined> {
  const cursor = params.cursor;
  if (!Number.isSafeInteger(cursor) || cursor < 0) {
    throw new RangeError(`Invalid log cursor: ${cursor}`);
  }
  const maxBytes = params.maxBytes ?? Number.POSITIVE_INFINITY;
  const chunkBytes = params.chunkBytes ?? DEFAULT_CHUNK_BYTES;

  const size = await statSize(params.file);
  if (cursor > size) {
    throw new LogTruncatedError({ file: params.file, cursor, size });
  }
  if (cursor === size) {
    return;
  }

  const handle = await fs.open(params.file, "r");
  try {
    let position = cursor;
    // Bytes of the line currently being assembled, and where it starts in the file
    let pending = Buffer.alloc(0);
    let pendingOffset = cursor;

    while (position < size) {
      const length = Math.min(chunkBytes, size - position);
      const chunk = Buffer.alloc(length);
      const { bytesRead } = await handle.read(chunk, 0, length, position);
      if (bytesRead === 0) {
        break;
      }
      position += bytesRead;

      const buffer =
        pending.length > 0
          ? Buffer.concat([pending, chunk.subarray(0, bytesRead)])
          : chunk.subarray(0, bytesRead);
      let lineStart = 0;
      let newlineAt = buffer.indexOf(NEWLINE, lineStart);

      while (newlineAt !== -1) {
        const offset = pendingOffset + lineStart;
        const byteLength = newlineAt - lineStart + 1;
        yield { offset, byteLength, text: decodeLine(buffer, lineStart, newlineAt) };

        if (offset + byteLength - cursor >= maxBytes) {
          return;
        }
        lineStart = newlineAt + 1;
        newlineAt = buffer.indexOf(NEWLINE, lineStart);
      }

      pending = Buffer.from(buffer.subarray(lineStart));
      pendingOffset += lineStart;
    }
  } finally {
    await handle.close();
  }
}
