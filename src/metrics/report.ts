import type { AllTimeMetrics, CountEntry, PortCount, WindowMetrics } from "./aggregator.js";
import { formatReportTimestamp } from "./windows.js";

export type ReportInput = {
  allTime: AllTimeMetrics;
  snapshot: WindowMetrics;
  generatedAt: Date;
  timezone: string;
  topN: number;
};

/**
 * Rendered report plus the metrics it was rendered from.
 */
export type RenderedReport = {
  markdown: string;
  metrics: {
    generatedAt: string;
    timezone: string;
    allTime: AllTimeMetrics;
    snapshot: WindowMetrics;
  };
};

const NO_DATA = "_No data yet_";

export function zoneLabel(timezone: string): string {
  return timezone === "America/New_York" ? "ET" : timezone;
}

function formatCount(value: number): string {
  return value.toLocaleString("en-US");
}

/**
 * Escapes attacker-controlled text for a Markdown table cell.
 */
export function escapeCell(value: string): string {
  if (value === "") {
    return "_(empty)_";
  }
  return value.replace(/[\r\n]+/g, " ").replace(/[\\`*_[\]<>|]/g, (ch) => `\\${ch}`);
}

function summaryTable(metrics: { totalEvents: number; distinctSources: number }): string[] {
  return [
    "| Metric | Value |",
    "|--------|-------|",
    `| Total events | ${formatCount(metrics.totalEvents)} |`,
    `| Distinct IPs | ${formatCount(metrics.distinctSources)} |`,
  ];
}

function portTable(ports: PortCount[]): string[] {
  if (ports.length === 0) {
    return [NO_DATA];
  }
  return [
    "| Protocol | Port | Count |",
    "|----------|------|-------|",
    ...ports.map((p) => `| ${p.protocol} | ${p.port} | ${formatCount(p.count)} |`),
  ];
}

function countTable(heading: string, entries: CountEntry[], topN: number): string[] {
  if (entries.length === 0) {
    return [NO_DATA];
  }
  return [
    `| ${heading} | Count |`,
    `|${"-".repeat(heading.length + 2)}|-------|`,
    ...entries
      .slice(0, topN)
      .map((entry) => `| ${escapeCell(entry.key)} | ${formatCount(entry.count)} |`),
  ];
}

function breakdowns(metrics: AllTimeMetrics | WindowMetrics, topN: number, level: string): string[] {
  return [
    `${level} Ports Hit`,
    "",
    ...portTable(metrics.ports.slice(0, topN)),
    "",
    `${level} Top Source Countries`,
    "",
    ...countTable("Country", metrics.countries, topN),
    "",
    `${level} Most Common Usernames`,
    "",
    ...countTable("Username", metrics.usernames, topN),
    "",
    `${level} Most Common Passwords`,
    "",
    ...countTable("Password", metrics.passwords, topN),
  ];
}

/**
 * Renders the all-time section and the nightly snapshot as Markdown.
 */
export function renderReport(input: ReportInput): RenderedReport {
  const label = zoneLabel(input.timezone);
  const updated = formatReportTimestamp(input.generatedAt, input.timezone, label);
  const day = input.snapshot.window.day ?? input.snapshot.window.start.slice(0, 10);

  const lines = [
    "# Metrics Report",
    "",
    `Metrics are aggregated on calendar days at midnight ${label} to provide consistent daily snapshots.`,
    "",
    `<small>All-Time Stats (Last Updated: ${updated})</small>`,
    "",
    ...summaryTable(input.allTime),
    "",
    ...breakdowns(input.allTime, input.topN, "##"),
    "",
    `## Daily Snapshot: ${day}`,
    "",
    ...summaryTable(input.snapshot),
    "",
    ...breakdowns(input.snapshot, input.topN, "###"),
    "",
  ];

  return {
    markdown: lines.join("\n"),
    metrics: {
      generatedAt: input.generatedAt.toISOString(),
      timezone: input.timezone,
      allTime: input.allTime,
      snapshot: input.snapshot,
    },
  };
}
