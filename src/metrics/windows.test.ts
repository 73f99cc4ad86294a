import { describe, expect, it } from "vitest";
import {
  civilDayOf,
  civilDayWindow,
  formatReportTimestamp,
  isCivilDay,
  isValidTimezone,
  previousCivilDay,
} from "./windows.js";

describe("civilDayWindow", () => {
  it("spans 24 hours on an ordinary day", () => {
    expect(civilDayWindow("2024-01-15", "America/New_York")).toEqual({
      day: "2024-01-15",
      timezone: "America/New_York",
      start: "2024-01-15T05:00:00.000Z",
      end: "2024-01-16T05:00:00.000Z",
    });
  });

  it("spans 23 hours on the spring-forward day", () => {
    const window = civilDayWindow("2024-03-10", "America/New_York");

    expect(window.start).toBe("2024-03-10T05:00:00.000Z");
    expect(window.end).toBe("2024-03-11T04:00:00.000Z");
  });

  it("spans 25 hours on the fall-back day", () => {
    const window = civilDayWindow("2024-11-03", "America/New_York");

    expect(window.start).toBe("2024-11-03T04:00:00.000Z");
    expect(window.end).toBe("2024-11-04T05:00:00.000Z");
  });

  it("uses UTC midnights for UTC", () => {
    const window = civilDayWindow("2024-02-29", "UTC");

    expect(window.start).toBe("2024-02-29T00:00:00.000Z");
    expect(window.end).toBe("2024-03-01T00:00:00.000Z");
  });

  it.each(["2024-02-30", "2024-3-1", "yesterday", ""])("rejects %j", (day) => {
    expect(() => civilDayWindow(day, "UTC")).toThrow(RangeError);
  });
});

describe("day helpers", () => {
  it("validates calendar days", () => {
    expect(isCivilDay("2024-02-29")).toBe(true);
    expect(isCivilDay("2023-02-29")).toBe(false);
  });

  it("validates timezones", () => {
    expect(isValidTimezone("America/New_York")).toBe(true);
    expect(isValidTimezone("UTC")).toBe(true);
    expect(isValidTimezone("Mars/Olympus_Mons")).toBe(false);
  });

  it("finds the local day of an instant", () => {
    const instant = new Date("2024-03-11T03:30:00Z");

    expect(civilDayOf(instant, "America/New_York")).toBe("2024-03-10");
    expect(civilDayOf(instant, "UTC")).toBe("2024-03-11");
  });

  it("picks the last complete local day", () => {
    const instant = new Date("2024-03-11T03:30:00Z");

    expect(previousCivilDay(instant, "America/New_York")).toBe("2024-03-09");
    expect(previousCivilDay(instant, "UTC")).toBe("2024-03-10");
    expect(previousCivilDay(new Date("2024-01-01T12:00:00Z"), "UTC")).toBe("2023-12-31");
  });

  it("formats report timestamps in local time", () => {
    expect(
      formatReportTimestamp(new Date("2024-03-10T19:04:00Z"), "America/New_York", "ET"),
    ).toBe("March 10, 2024 @ 3:04 PM ET");
  });
});
