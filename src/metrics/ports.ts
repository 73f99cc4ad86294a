import fs from "node:fs";
import { z } from "zod";

const PORT_NAMES_FILE = new URL("../../data/port-names.json", import.meta.url);

let portNames: Map<number, string> | null = null;

function loadPortNames(): Map<number, string> {
  const raw: unknown = JSON.parse(fs.readFileSync(PORT_NAMES_FILE, "utf8"));
  const parsed = z.record(z.string().regex(/^\d+$/), z.string().min(1)).parse(raw);
  return new Map(Object.entries(parsed).map(([port, name]) => [Number(port), name]));
}

/**
 * Well-known protocol served on `port`, or the port number itself.
 */
export function protocolName(port: number): string {
  if (!portNames) {
    portNames = loadPortNames();
  }
  return portNames.get(port) ?? String(port);
}
