import { describe, expect, it } from "vitest";
import type { RawLine } from "./index.js";
import { canaryLine } from "../../test/fixtures.js";
import { parseLines } from "./index.js";
import { parseCanaryLine } from "./opencanary.js";

function raw(text: string, offset = 0): RawLine {
  return { offset, byteLength: Buffer.byteLength(text) + 1, text };
}

describe("parsers", () => {
  describe("parseCanaryLine", () => {
    it("parses an SSH login attempt", () => {
      const line = canaryLine();
      const result = parseCanaryLine(raw(line, 128));

      expect(result).toEqual({
        ok: true,
        event: {
          sourceOffset: 128,
          timestamp: "2024-01-01T12:00:00.000Z",
          eventType: "login-attempt",
          logtype: 4002,
          srcIp: "1.2.3.4",
          srcPort: 51234,
          dstPort: 22,
          username: "root",
          password: "toor",
          rawPayload: line,
        },
      });
    });

    it("reads local_time in the source timezone when utc_time is missing", () => {
      const line = canaryLine({ utc_time: undefined, local_time: "2024-07-04 08:30:15.250000" });
      const result = parseCanaryLine(raw(line), { sourceTimezone: "America/New_York" });

      expect(result.ok && result.event.timestamp).toBe("2024-07-04T12:30:15.250Z");
    });

    it("prefers utc_time over local_time", () => {
      const line = canaryLine({
        local_time: "2024-07-04 08:30:15.000000",
        utc_time: "2024-07-04 12:30:15.000000",
      });
      const result = parseCanaryLine(raw(line), { sourceTimezone: "Europe/Berlin" });

      expect(result.ok && result.event.timestamp).toBe("2024-07-04T12:30:15.000Z");
    });

    it("keeps an empty password distinct from a missing one", () => {
      const empty = parseCanaryLine(
        raw(canaryLine({ logdata: { USERNAME: "admin", PASSWORD: "" } })),
      );
      const missing = parseCanaryLine(
        raw(canaryLine({ logtype: 4000, logdata: { SESSION: "1" } })),
      );

      expect(empty.ok && empty.event.password).toBe("");
      expect(missing.ok && missing.event.username).toBeUndefined();
      expect(missing.ok && missing.event.password).toBeUndefined();
      expect(missing.ok && missing.event.eventType).toBe("connection");
    });

    it("matches credential keys case-insensitively", () => {
      const result = parseCanaryLine(
        raw(canaryLine({ logtype: 6001, dst_port: 23, logdata: { user: "pi", Password: "raspberry" } })),
      );

      expect(result.ok && result.event.username).toBe("pi");
      expect(result.ok && result.event.password).toBe("raspberry");
    });

    it("falls back to top-level credential fields", () => {
      const result = parseCanaryLine(
        raw(canaryLine({ logdata: {}, username: "guest", password: 1234 })),
      );

      expect(result.ok && result.event.username).toBe("guest");
      expect(result.ok && result.event.password).toBe("1234");
    });

    it("treats src_port -1 as absent", () => {
      const result = parseCanaryLine(raw(canaryLine({ src_port: -1 })));
      expect(result.ok && result.event.srcPort).toBeUndefined();
    });

    it.each([
      ["plain text", "not json", "malformed"],
      ["broken JSON", '{"logtype": 4002', "malformed"],
      ["a JSON array", "[1, 2]", "malformed"],
      ["an empty line", "", "malformed"],
      ["a missing logtype", canaryLine({ logtype: undefined }), "malformed"],
      ["an unknown logtype", canaryLine({ logtype: 424242 }), "unknown-event-type"],
      ["a system message", canaryLine({ logtype: 1001, dst_port: -1 }), "not-an-event"],
      ["no destination port", canaryLine({ logtype: 5001, dst_port: -1 }), "not-an-event"],
      ["an out of range port", canaryLine({ dst_port: 70000 }), "invalid-field"],
      ["a missing port", canaryLine({ dst_port: undefined }), "invalid-field"],
      ["a hostname source", canaryLine({ src_host: "scanner.example" }), "invalid-field"],
      ["a missing timestamp", canaryLine({ utc_time: undefined, local_time: undefined }), "invalid-timestamp"],
      ["an impossible date", canaryLine({ utc_time: "2024-02-30 10:00:00" }), "invalid-timestamp"],
      ["an unparsable time", canaryLine({ utc_time: "yesterday" }), "invalid-timestamp"],
    ])("rejects %s", (_label, text, reason) => {
      const result = parseCanaryLine(raw(text, 77));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.reason).toBe(reason);
        expect(result.error.offset).toBe(77);
      }
    });
  });

  describe("parseLines", () => {
    it("splits events from errors in order", () => {
      const first = canaryLine();
      const second = canaryLine({ logdata: { USERNAME: "admin", PASSWORD: "1234" } });
      const lines = [raw(first, 0), raw("garbage", 200), raw(second, 300)];

      const { events, errors } = parseLines(lines);

      expect(events.map((e) => [e.sourceOffset, e.username])).toEqual([
        [0, "root"],
        [300, "admin"],
      ]);
      expect(errors).toHaveLength(1);
      expect(errors[0]?.offset).toBe(200);
      expect(errors[0]?.reason).toBe("malformed");
    });
  });
});
