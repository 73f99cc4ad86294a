import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { EventStore } from "../ingest/event-store.js";
import { makeEvent } from "../test/fixtures.js";
import { Aggregator } from "./aggregator.js";
import { CachedGeoResolver, StaticGeoResolver, UNKNOWN_COUNTRY } from "./geo.js";

const GEO = new StaticGeoResolver({
  "1.2.3.4": "CN",
  "5.6.7.8": "US",
  "9.9.9.9": "US",
});

describe("Aggregator", () => {
  let store: EventStore;

  beforeEach(() => {
    store = EventStore.open(":memory:");
  });

  afterEach(() => {
    store.close();
  });

  it("counts events inside a DST-shortened local day only", async () => {
    store.append(
      [
        // 23:59 EST on March 9
        makeEvent(0, { timestamp: "2024-03-10T04:59:59.000Z" }),
        // 00:00 EST on March 10
        makeEvent(1, { timestamp: "2024-03-10T05:00:00.000Z" }),
        // 23:59 EDT on March 10
        makeEvent(2, { timestamp: "2024-03-11T03:59:59.000Z" }),
        // 00:00 EDT on March 11
        makeEvent(3, { timestamp: "2024-03-11T04:00:00.000Z" }),
      ],
      0,
    );
    const aggregator = new Aggregator(store, GEO, { timezone: "America/New_York" });

    const day = await aggregator.forDay("2024-03-10");

    expect(day.totalEvents).toBe(2);
    expect(day.window).toEqual({
      day: "2024-03-10",
      timezone: "America/New_York",
      start: "2024-03-10T05:00:00.000Z",
      end: "2024-03-11T04:00:00.000Z",
    });
    expect((await aggregator.allTime()).totalEvents).toBe(4);
  });

  it("breaks count ties by key so repeated runs agree", async () => {
    store.append(
      [
        makeEvent(0, { dstPort: 80 }),
        makeEvent(1, { dstPort: 22 }),
        makeEvent(2, { dstPort: 3389 }),
        makeEvent(3, { dstPort: 3389 }),
      ],
      0,
    );
    const aggregator = new Aggregator(store, GEO, { timezone: "UTC" });

    const first = await aggregator.allTime();
    const second = await aggregator.allTime();

    expect(first.ports).toEqual([
      { port: 3389, protocol: "RDP", count: 2 },
      { port: 22, protocol: "SSH", count: 1 },
      { port: 80, protocol: "HTTP", count: 1 },
    ]);
    expect(second).toEqual(first);
  });

  it("derives countries from source addresses", async () => {
    store.append(
      [
        makeEvent(0, { srcIp: "1.2.3.4" }),
        makeEvent(1, { srcIp: "5.6.7.8" }),
        makeEvent(2, { srcIp: "9.9.9.9" }),
        makeEvent(3, { srcIp: "10.0.0.1" }),
      ],
      0,
    );
    const aggregator = new Aggregator(store, new CachedGeoResolver(GEO), { timezone: "UTC" });

    const metrics = await aggregator.allTime();

    expect(metrics.countries).toEqual([
      { key: "US", count: 2 },
      { key: "CN", count: 1 },
      { key: UNKNOWN_COUNTRY, count: 1 },
    ]);
    expect(metrics.distinctSources).toBe(4);
  });

  it("leaves out placeholder credentials", async () => {
    store.append(
      [
        makeEvent(0, { username: "none", password: "<Password was not in the common list>" }),
        makeEvent(1, { username: "root", password: "123456" }),
        makeEvent(2, { username: "root", password: "" }),
      ],
      0,
    );
    const aggregator = new Aggregator(store, GEO, {
      timezone: "UTC",
      ignoredUsernames: ["none"],
      ignoredPasswords: ["<Password was not in the common list>"],
    });

    const metrics = await aggregator.allTime();

    expect(metrics.usernames).toEqual([{ key: "root", count: 2 }]);
    expect(metrics.passwords).toEqual([
      { key: "", count: 1 },
      { key: "123456", count: 1 },
    ]);
    expect(metrics.totalEvents).toBe(3);
  });

  it("matches ignored usernames regardless of case and padding", async () => {
    store.append(
      [
        makeEvent(0, { username: "None" }),
        makeEvent(1, { username: " NONE " }),
        makeEvent(2, { username: "admin" }),
      ],
      0,
    );
    const aggregator = new Aggregator(store, GEO, {
      timezone: "UTC",
      ignoredUsernames: ["none"],
    });

    const metrics = await aggregator.allTime();

    expect(metrics.usernames).toEqual([{ key: "admin", count: 1 }]);
  });

  it("keeps totals consistent when events arrive during geo lookups", async () => {
    store.append([makeEvent(0, { srcIp: "1.2.3.4" }), makeEvent(1, { srcIp: "5.6.7.8" })], 0);
    let nextOffset = 100;
    const appendingGeo = {
      lookup: (ip: string) => {
        store.append([makeEvent(nextOffset, { srcIp: "203.0.113.9" })], 0);
        nextOffset += 1;
        return GEO.lookup(ip);
      },
    };
    const aggregator = new Aggregator(store, appendingGeo, { timezone: "UTC" });

    const metrics = await aggregator.allTime();

    expect(metrics.totalEvents).toBe(2);
    expect(metrics.eventTypes.reduce((sum, e) => sum + e.count, 0)).toBe(2);
    expect(metrics.sources.map((e) => e.key)).toEqual(["1.2.3.4", "5.6.7.8"]);
    expect(metrics.countries).toEqual([
      { key: "CN", count: 1 },
      { key: "US", count: 1 },
    ]);
    expect(store.count()).toBe(4);
  });

  it("limits breakdowns to topN", async () => {
    store.append(
      ["a", "b", "c", "d"].map((username, i) => makeEvent(i, { username })),
      0,
    );
    const aggregator = new Aggregator(store, GEO, { timezone: "UTC", topN: 2 });

    const metrics = await aggregator.allTime();

    expect(metrics.usernames.map((e) => e.key)).toEqual(["a", "b"]);
  });

  it("reports an empty day as zeros", async () => {
    const aggregator = new Aggregator(store, GEO, { timezone: "UTC" });

    const metrics = await aggregator.forDay("2024-01-01");

    expect(metrics).toMatchObject({
      scope: "window",
      totalEvents: 0,
      distinctSources: 0,
      ports: [],
      countries: [],
      usernames: [],
      passwords: [],
    });
  });

  it("rejects an empty window", async () => {
    const aggregator = new Aggregator(store, GEO, { timezone: "UTC" });
    const instant = "2024-01-01T00:00:00.000Z";

    await expect(aggregator.forWindow({ start: instant, end: instant })).rejects.toThrow(
      RangeError,
    );
  });
});
