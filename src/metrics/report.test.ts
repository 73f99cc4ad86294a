import { describe, expect, it } from "vitest";
import type { AllTimeMetrics, WindowMetrics } from "./aggregator.js";
import { escapeCell, renderReport, zoneLabel } from "./report.js";
import { civilDayWindow } from "./windows.js";

const EMPTY_BODY = {
  totalEvents: 0,
  distinctSources: 0,
  ports: [],
  countries: [],
  usernames: [],
  passwords: [],
  sources: [],
  eventTypes: [],
};

function allTime(overrides: Partial<AllTimeMetrics> = {}): AllTimeMetrics {
  return { scope: "all-time", ...EMPTY_BODY, ...overrides };
}

function snapshot(overrides: Partial<WindowMetrics> = {}): WindowMetrics {
  return {
    scope: "window",
    window: civilDayWindow("2024-03-09", "America/New_York"),
    ...EMPTY_BODY,
    ...overrides,
  };
}

describe("escapeCell", () => {
  it("marks empty values", () => {
    expect(escapeCell("")).toBe("_(empty)_");
  });

  it("escapes table and markup characters", () => {
    expect(escapeCell("a|b")).toBe("a\\|b");
    expect(escapeCell("<script>")).toBe("\\<script\\>");
    expect(escapeCell("*_`[x]\\")).toBe("\\*\\_\\`\\[x\\]\\\\");
  });

  it("flattens newlines", () => {
    expect(escapeCell("line1\r\nline2")).toBe("line1 line2");
  });
});

describe("zoneLabel", () => {
  it("abbreviates Eastern time only", () => {
    expect(zoneLabel("America/New_York")).toBe("ET");
    expect(zoneLabel("Europe/Berlin")).toBe("Europe/Berlin");
  });
});

describe("renderReport", () => {
  const generatedAt = new Date("2024-03-10T19:04:00Z");

  it("renders headers, tables and the snapshot day", () => {
    const report = renderReport({
      allTime: allTime({
        totalEvents: 1234,
        distinctSources: 2,
        ports: [{ port: 22, protocol: "SSH", count: 1200 }],
        countries: [{ key: "CN", count: 1234 }],
        usernames: [{ key: "root", count: 1000 }],
        passwords: [{ key: "pass|word", count: 3 }],
      }),
      snapshot: snapshot({ totalEvents: 5, distinctSources: 1 }),
      generatedAt,
      timezone: "America/New_York",
      topN: 10,
    });
    const lines = report.markdown.split("\n");

    expect(lines[0]).toBe("# Metrics Report");
    expect(lines).toContain("<small>All-Time Stats (Last Updated: March 10, 2024 @ 3:04 PM ET)</small>");
    expect(lines).toContain("| Total events | 1,234 |");
    expect(lines).toContain("| SSH | 22 | 1,200 |");
    expect(lines).toContain("| CN | 1,234 |");
    expect(lines).toContain("| root | 1,000 |");
    expect(lines).toContain("| pass\\|word | 3 |");
    expect(lines).toContain("## Daily Snapshot: 2024-03-09");
    expect(lines).toContain("| Total events | 5 |");
    expect(lines).toContain("### Ports Hit");
  });

  it("renders placeholders when there is no data", () => {
    const report = renderReport({
      allTime: allTime(),
      snapshot: snapshot(),
      generatedAt,
      timezone: "UTC",
      topN: 10,
    });

    expect(report.markdown.split("\n").filter((line) => line === "_No data yet_")).toHaveLength(8);
    expect(report.markdown).toContain("(Last Updated: March 10, 2024 @ 7:04 PM UTC)");
  });

  it("keeps only the top entries", () => {
    const report = renderReport({
      allTime: allTime({
        usernames: [
          { key: "root", count: 3 },
          { key: "admin", count: 2 },
          { key: "pi", count: 1 },
        ],
      }),
      snapshot: snapshot(),
      generatedAt,
      timezone: "UTC",
      topN: 2,
    });

    expect(report.markdown).toContain("| admin | 2 |");
    expect(report.markdown).not.toContain("| pi | 1 |");
  });

  it("carries the metrics alongside the markdown", () => {
    const report = renderReport({
      allTime: allTime({ totalEvents: 7 }),
      snapshot: snapshot(),
      generatedAt,
      timezone: "UTC",
      topN: 10,
    });

    expect(report.metrics.generatedAt).toBe("2024-03-10T19:04:00.000Z");
    expect(report.metrics.allTime.totalEvents).toBe(7);
    expect(report.metrics.snapshot.window.day).toBe("2024-03-09");
  });
});
