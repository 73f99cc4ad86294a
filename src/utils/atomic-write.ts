import fs, { type FileHandle } from "node:fs/promises";
import path from "node:path";
import { createSubsystemLogger } from "../logging/subsystem.js";

const log = createSubsystemLogger("utils/atomic-write");

/**
 * Replaces `filePath` with `content` so readers see either the old or the
 * new file, never a partial one: temp file, fsync, rename, directory fsync.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });

  const tmpPath = `${filePath}.${process.pid}.tmp`;
  const handle = await fs.open(tmpPath, "w");
  try {
    await handle.writeFile(content, "utf8");
    await handle.sync();
  } finally {
    await handle.close();
  }
  await fs.rename(tmpPath, filePath);
  await syncDirectory(dir);
}

/**
 * Flushes a directory entry so a completed rename survives power loss.
 * Some platforms refuse to open directories; the rename itself is still atomic there.
 */
async function syncDirectory(dir: string): Promise<void> {
  let handle: FileHandle;
  try {
    handle = await fs.open(dir, "r");
  } catch (err) {
    log.debug(`Cannot open ${dir} for fsync: ${String(err)}`);
    return;
  }
  try {
    await handle.sync();
  } catch (err) {
    log.debug(`Directory fsync unsupported for ${dir}: ${String(err)}`);
  } finally {
    await handle.close();
  }
}
