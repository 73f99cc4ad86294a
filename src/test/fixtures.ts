import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { HoneypotEvent } from "../ingest/parsers/index.js";

/**
 * One OpenCanary JSON line (without newline). Defaults describe an SSH
 * login attempt; keys set to undefined are dropped.
 */
export function canaryLine(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    dst_host: "10.0.0.5",
    dst_port: 22,
    local_time: "2024-01-01 12:00:00.000000",
    utc_time: "2024-01-01 12:00:00.000000",
    logdata: { USERNAME: "root", PASSWORD: "toor" },
    logtype: 4002,
    node_id: "canary-1",
    src_host: "1.2.3.4",
    src_port: 51234,
    ...overrides,
  });
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "honeytally-"));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Stored-event factory for aggregation tests.
 */
export function makeEvent(
  sourceOffset: number,
  overrides: Partial<HoneypotEvent> = {},
): HoneypotEvent {
  return {
    sourceOffset,
    timestamp: "2024-01-01T12:00:00.000Z",
    eventType: "login-attempt",
    logtype: 4002,
    srcIp: "1.2.3.4",
    srcPort: 51234,
    dstPort: 22,
    username: "root",
    password: "toor",
    rawPayload: `{"offset":${sourceOffset}}`,
    ...overrides,
  };
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}
