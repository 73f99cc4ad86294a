import type { EventStore } from "../ingest/event-store.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { UNKNOWN_COUNTRY, type GeoResolver } from "./geo.js";
import { protocolName } from "./ports.js";
import { civilDayWindow, type CivilDayWindow, type TimeRange } from "./windows.js";

const log = createSubsystemLogger("metrics/aggregator");

const DEFAULT_TOP_N = 10;

export type CountEntry = {
  key: string;
  count: number;
};

export type PortCount = {
  port: number;
  protocol: string;
  count: number;
};

type MetricsBody = {
  totalEvents: number;
  distinctSources: number;
  ports: PortCount[];
  /** Every country seen, most frequent first */
  countries: CountEntry[];
  usernames: CountEntry[];
  passwords: CountEntry[];
  sources: CountEntry[];
  eventTypes: CountEntry[];
};

export type AllTimeMetrics = MetricsBody & {
  scope: "all-time";
};

export type WindowMetrics = MetricsBody & {
  scope: "window";
  window: TimeRange & { day?: string; timezone?: string };
};

/**
 * Read side of the event store the aggregator needs.
 */
export type EventReader = Pick<
  EventStore,
  "query" | "count" | "countDistinctSources" | "snapshot"
>;

export type AggregatorOptions = {
  topN?: number;
  /** Timezone whose calendar days define daily windows */
  timezone: string;
  ignoredUsernames?: string[];
  ignoredPasswords?: string[];
};

/**
 * Turns stored events into report metrics.
 *
 * Reads only; output for a given store state is deterministic (ties are
 * ordered by key), so repeated runs without ingestion agree.
 */
export class Aggregator {
  private readonly store: EventReader;
  private readonly geo: GeoResolver;
  private readonly topN: number;
  private readonly timezone: string;
  private readonly ignoredUsernames: string[];
  private readonly ignoredPasswords: string[];

  constructor(store: EventReader, geo: GeoResolver, options: AggregatorOptions) {
    this.store = store;
    this.geo = geo;
    this.topN = options.topN ?? DEFAULT_TOP_N;
    this.timezone = options.timezone;
    this.ignoredUsernames = options.ignoredUsernames ?? [];
    this.ignoredPasswords = options.ignoredPasswords ?? [];
  }

  async allTime(): Promise<AllTimeMetrics> {
    return { scope: "all-time", ...(await this.compute(undefined)) };
  }

  async forWindow(window: TimeRange | CivilDayWindow): Promise<WindowMetrics> {
    if (window.start >= window.end) {
      throw new RangeError(`Empty window ${window.start} .. ${window.end}`);
    }
    return { scope: "window", window, ...(await this.compute(window)) };
  }

  /**
   * Metrics for one calendar day (YYYY-MM-DD) in the configured timezone.
   */
  async forDay(day: string): Promise<WindowMetrics> {
    return this.forWindow(civilDayWindow(day, this.timezone));
  }

  private async compute(range: TimeRange | undefined): Promise<MetricsBody> {
    const started = Date.now();
    const limit = this.topN;

    // One read snapshot for every figure; geo lookups happen after it closes.
    const { body, sourceRows } = this.store.snapshot(() => {
      const sourceRows = this.store.query({ groupBy: "src_ip", range });
      const body: Omit<MetricsBody, "countries"> = {
        totalEvents: this.store.count({ range }),
        distinctSources: this.store.countDistinctSources({ range }),
        ports: this.store.query({ groupBy: "dst_port", range, limit }).map((row) => {
          const port = Number(row.key);
          return { port, protocol: protocolName(port), count: row.count };
        }),
        usernames: this.store.query({
          groupBy: "username",
          range,
          exclude: this.ignoredUsernames,
          foldExclude: true,
          limit,
        }),
        passwords: this.store.query({
          groupBy: "password",
          range,
          exclude: this.ignoredPasswords,
          limit,
        }),
        sources: sourceRows.slice(0, limit),
        eventTypes: this.store.query({ groupBy: "event_type", range }),
      };
      return { body, sourceRows };
    });

    const metrics: MetricsBody = { ...body, countries: await this.countries(sourceRows) };
    log.debug("Metrics computed", {
      range: range ? `${range.start}..${range.end}` : "all-time",
      totalEvents: metrics.totalEvents,
      ms: Date.now() - started,
    });
    return metrics;
  }

  /**
   * Per-country counts derived from per-IP counts at query time.
   */
  private async countries(sourceRows: CountEntry[]): Promise<CountEntry[]> {
    const totals = new Map<string, number>();
    for (const row of sourceRows) {
      const country = (await this.geo.lookup(row.key)) || UNKNOWN_COUNTRY;
      totals.set(country, (totals.get(country) ?? 0) + row.count);
    }
    return sortCounts(Array.from(totals, ([key, count]) => ({ key, count })));
  }
}

export function sortCounts(entries: CountEntry[]): CountEntry[] {
  return [...entries].sort((a, b) =>
    b.count !== a.count ? b.count - a.count : a.key < b.key ? -1 : a.key > b.key ? 1 : 0,
  );
}
