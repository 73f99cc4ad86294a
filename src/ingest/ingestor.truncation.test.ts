import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { LogTruncatedError } from "../errors.js";
import { canaryLine, makeTempDir, removeTempDir } from "../test/fixtures.js";
import { MemoryCursorStore } from "./cursor-store.js";
import { EventStore } from "./event-store.js";
import { Ingestor } from "./ingestor.js";

// Simulates the log shrinking after inspection but before reading starts.
const shrinkBeforeRead = vi.hoisted(() => ({ enabled: false }));

vi.mock("./tail-reader.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("./tail-reader.js")>();
  return {
    ...actual,
    readLogLines(params: Parameters<typeof actual.readLogLines>[0]) {
      if (shrinkBeforeRead.enabled) {
        throw new LogTruncatedError({ file: params.file, cursor: params.cursor, size: 0 });
      }
      return actual.readLogLines(params);
    },
  };
});

describe("Ingestor when the log shrinks mid-read", () => {
  let dir: string;
  let logPath: string;
  let store: EventStore;
  let cursorStore: MemoryCursorStore;

  beforeEach(async () => {
    dir = await makeTempDir();
    logPath = path.join(dir, "opencanary.log");
    await fs.writeFile(logPath, `${canaryLine()}\n`);
    store = EventStore.open(":memory:");
    cursorStore = new MemoryCursorStore({ offset: 0, generation: 3 });
    shrinkBeforeRead.enabled = true;
  });

  afterEach(async () => {
    shrinkBeforeRead.enabled = false;
    store.close();
    await removeTempDir(dir);
  });

  function run(onTruncate: "halt" | "reset") {
    return new Ingestor({
      logPath,
      lockPath: path.join(dir, "ingest.cursor.lock"),
      cursorStore,
      eventWriter: store,
      onTruncate,
    }).run();
  }

  it("defers the reset to the next run under the reset policy", async () => {
    const result = await run("reset");

    expect(result.status).toBe("truncated");
    expect(result.reset).toBe(false);
    expect(result.truncation).toEqual({ cursor: 0, size: 0, action: "deferred" });
    expect(await cursorStore.read()).toEqual({ offset: 0, generation: 3 });
  });

  it("reports a halt under the halt policy", async () => {
    const result = await run("halt");

    expect(result.truncation).toEqual({ cursor: 0, size: 0, action: "halted" });
  });
});
