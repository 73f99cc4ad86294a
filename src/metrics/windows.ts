import dayjs from "dayjs";
import timezone from "dayjs/plugin/timezone.js";
import utc from "dayjs/plugin/utc.js";

dayjs.extend(utc);
dayjs.extend(timezone);

/**
 * Half-open time range `[start, end)` in ISO-8601 UTC.
 */
export type TimeRange = {
  start: string;
  end: string;
};

export type CivilDayWindow = TimeRange & {
  /** Calendar day in the window's timezone (YYYY-MM-DD) */
  day: string;
  timezone: string;
};

const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function isValidTimezone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

export function isCivilDay(day: string): boolean {
  return DAY_PATTERN.test(day) && dayjs.utc(day).format("YYYY-MM-DD") === day;
}

/**
 * Local midnight of `day` in `zone`, as a UTC instant.
 */
function localMidnight(day: string, zone: string): string {
  return new Date(dayjs.tz(`${day} 00:00:00`, zone).valueOf()).toISOString();
}

/**
 * Window covering one calendar day in `zone`. Both ends are computed from
 * their own local midnight, so DST days span 23 or 25 hours.
 */
export function civilDayWindow(day: string, zone: string): CivilDayWindow {
  if (!isCivilDay(day)) {
    throw new RangeError(`Not a calendar day: ${day}`);
  }
  const next = dayjs.utc(day).add(1, "day").format("YYYY-MM-DD");
  return {
    day,
    timezone: zone,
    start: localMidnight(day, zone),
    end: localMidnight(next, zone),
  };
}

/**
 * Calendar day (YYYY-MM-DD) that `instant` falls on in `zone`.
 */
export function civilDayOf(instant: Date, zone: string): string {
  return dayjs(instant).tz(zone).format("YYYY-MM-DD");
}

/**
 * The most recent fully elapsed day in `zone`: the nightly snapshot day.
 */
export function previousCivilDay(now: Date, zone: string): string {
  return dayjs.utc(civilDayOf(now, zone)).subtract(1, "day").format("YYYY-MM-DD");
}

/**
 * Human timestamp for report headers, e.g. "March 10, 2024 @ 3:04 PM ET".
 */
export function formatReportTimestamp(instant: Date, zone: string, zoneLabel: string): string {
  return `${dayjs(instant).tz(zone).format("MMMM D, YYYY @ h:mm A")} ${zoneLabel}`;
}
