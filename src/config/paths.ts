import os from "node:os";
import path from "node:path";

const DEFAULT_STATE_DIRNAME = ".honeytally";

/**
 * Directory holding the cursor, lock, event database and rendered report.
 * `HONEYTALLY_STATE_DIR` wins; otherwise `~/.honeytally`.
 */
export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.HONEYTALLY_STATE_DIR?.trim();
  if (override) {
    return path.resolve(resolveUserPath(override));
  }
  return path.join(os.homedir(), DEFAULT_STATE_DIRNAME);
}

/**
 * Expands a leading `~` to the current user's home directory.
 */
export function resolveUserPath(input: string): string {
  if (input === "~") {
    return os.homedir();
  }
  if (input.startsWith("~/")) {
    return path.join(os.homedir(), input.slice(2));
  }
  return input;
}

export function lockPathFor(cursorPath: string): string {
  return `${cursorPath}.lock`;
}
