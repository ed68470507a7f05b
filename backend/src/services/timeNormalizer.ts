import type { RawTime } from "../models/domain";

/**
 * A GTFS service day. Clock times in static schedules are offsets from
 * "noon minus 12h" local time, which is midnight except on DST changeover days,
 * and may run past 24:00:00 for trips belonging to the previous day's service.
 */
export interface ServiceDay {
  serviceDate: string;
  startEpochSeconds: number;
  timeZone: string;
}

/** Epoch seconds, or null when the raw value cannot be interpreted. */
export type NormalizedTime = number | null;

export interface NormalizeOptions {
  /** Epoch seconds; enables the midnight rollover correction for clock times. */
  now?: number | undefined;
}

const SECONDS_PER_DAY = 86_400;
const ROLLOVER_LOOKBEHIND_SECONDS = 12 * 3600;
const EPOCH_MILLIS_THRESHOLD = 100_000_000_000;

const CLOCK_PATTERN = /^(\d{1,2}):([0-5]\d)(?::([0-5]\d))?$/;
const NUMERIC_PATTERN = /^\d+(?:\.\d+)?$/;
const ISO_PATTERN = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}/;

interface ZonedParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

const getFormatter = (timeZone: string) => {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
};

const zonedParts = (epochMs: number, timeZone: string): ZonedParts => {
  const parts = getFormatter(timeZone).formatToParts(new Date(epochMs));
  const read = (type: Intl.DateTimeFormatPartTypes) => Number(parts.find((part) => part.type === type)?.value ?? 0);
  return {
    year: read("year"),
    month: read("month"),
    day: read("day"),
    hour: read("hour"),
    minute: read("minute"),
    second: read("second"),
  };
};

const timeZoneOffsetMs = (epochMs: number, timeZone: string) => {
  const wholeSecond = Math.floor(epochMs / 1000) * 1000;
  const parts = zonedParts(wholeSecond, timeZone);
  const asUtc = Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second);
  return asUtc - wholeSecond;
};

const pad = (value: number) => String(value).padStart(2, "0");

/**
 * Resolves the service day active at `now` in `timeZone`. Before
 * `rolloverHour` local time the previous calendar day's service is still
 * running.
 */
export const resolveServiceDay = (now: Date, timeZone: string, rolloverHour = 3): ServiceDay => {
  const local = zonedParts(now.getTime(), timeZone);
  const calendarDay = new Date(
    Date.UTC(local.year, local.month - 1, local.day - (local.hour < rolloverHour ? 1 : 0)),
  );
  const year = calendarDay.getUTCFullYear();
  const month = calendarDay.getUTCMonth();
  const day = calendarDay.getUTCDate();

  const noonAsUtc = Date.UTC(year, month, day, 12);
  const localNoonMs = noonAsUtc - timeZoneOffsetMs(noonAsUtc, timeZone);

  return {
    serviceDate: `${year}${pad(month + 1)}${pad(day)}`,
    startEpochSeconds: Math.floor(localNoonMs / 1000) - 12 * 3600,
    timeZone,
  };
};

/** Coerces `H:MM` / `HH:MM` / `HH:MM:SS` into `HH:MM:SS`, or null. */
export const coerceClockTime = (raw: string): string | null => {
  const match = CLOCK_PATTERN.exec(raw.trim());
  if (!match) return null;
  const [, hours = "0", minutes = "0", seconds = "00"] = match;
  return `${pad(Number(hours))}:${minutes}:${seconds}`;
};

const clockToOffsetSeconds = (clock: string): number | null => {
  const match = CLOCK_PATTERN.exec(clock);
  if (!match) return null;
  const [, hours = "0", minutes = "0", seconds = "0"] = match;
  return Number(hours) * 3600 + Number(minutes) * 60 + Number(seconds);
};

const fromEpochNumber = (value: number): NormalizedTime => {
  if (!Number.isFinite(value) || value <= 0) return null;
  return value >= EPOCH_MILLIS_THRESHOLD ? Math.floor(value / 1000) : Math.floor(value);
};

/**
 * Converts a raw upstream time into epoch seconds.
 *
 * Clock times are resolved against `serviceDay`; with `options.now` set, a
 * clock time more than 12 hours behind `now` belongs to the next day (e.g.
 * "00:05" seen at 23:50). ISO timestamps and unix epochs ignore the service
 * day. Returns null for anything unparsable.
 */
export const normalizeTime = (
  raw: RawTime | null | undefined,
  serviceDay: ServiceDay,
  options: NormalizeOptions = {},
): NormalizedTime => {
  if (raw == null) return null;
  if (typeof raw === "number") return fromEpochNumber(raw);

  const value = raw.trim();
  if (!value) return null;

  const clock = coerceClockTime(value);
  if (clock) {
    const offset = clockToOffsetSeconds(clock);
    if (offset === null) return null;
    const resolved = serviceDay.startEpochSeconds + offset;
    if (options.now !== undefined && resolved < options.now - ROLLOVER_LOOKBEHIND_SECONDS) {
      return resolved + SECONDS_PER_DAY;
    }
    return resolved;
  }

  if (NUMERIC_PATTERN.test(value)) {
    return fromEpochNumber(Number(value));
  }

  if (ISO_PATTERN.test(value)) {
    const parsed = Date.parse(value);
    return Number.isFinite(parsed) ? Math.floor(parsed / 1000) : null;
  }

  return null;
};

export const formatEtaDisplay = (etaSeconds: number | null): string => {
  if (etaSeconds === null) return "Unknown";
  const total = Math.floor(etaSeconds);
  if (total <= 0) return "Due now";
  if (total < 60) return `${total}s`;
  if (total < 3600) {
    return `${Math.floor(total / 60)}m ${total % 60}s`;
  }
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  return `${hours}h ${minutes}m`;
};

/** Local `HH:MM:SS` of an epoch-seconds instant. */
export const formatClockTime = (epochSeconds: number, timeZone: string): string => {
  const parts = zonedParts(epochSeconds * 1000, timeZone);
  return `${pad(parts.hour)}:${pad(parts.minute)}:${pad(parts.second)}`;
};
