import fs from "node:fs";
import { z } from "zod";

const LOGTYPES_FILE = new URL("../../../data/opencanary-logtypes.json", import.meta.url);

const logTypeTableSchema = z.record(
  z.string().regex(/^\d+$/),
  z.object({
    name: z.string().min(1),
    category: z.enum([
      "system",
      "connection",
      "login-attempt",
      "request",
      "scan",
      "unusual-activity",
    ]),
  }),
);

export type LogTypeInfo = z.infer<typeof logTypeTableSchema>[string];

let table: Map<number, LogTypeInfo> | null = null;

function loadTable(): Map<number, LogTypeInfo> {
  const raw: unknown = JSON.parse(fs.readFileSync(LOGTYPES_FILE, "utf8"));
  const parsed = logTypeTableSchema.parse(raw);
  return new Map(Object.entries(parsed).map(([id, info]) => [Number(id), info]));
}

/**
 * Looks up an OpenCanary `logtype` code. Returns undefined for unknown codes.
 */
export function lookupLogType(logtype: number): LogTypeInfo | undefined {
  if (!table) {
    table = loadTable();
  }
  return table.get(logtype);
}
