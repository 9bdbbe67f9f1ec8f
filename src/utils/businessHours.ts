import { DateTime } from "luxon";
import type { BusinessHoursConfig } from "../models/_types";
import { InputError } from "./errors";

const MS_PER_HOUR = 60 * 60 * 1000;
const MAX_DAYS_WALKED = 366 * 50;

export type Instant = string | Date | DateTime;

export function toDateTime(value: Instant, zone: string): DateTime {
  if (DateTime.isDateTime(value)) {
    return value.setZone(zone);
  }
  if (value instanceof Date) {
    return DateTime.fromJSDate(value, { zone });
  }
  return DateTime.fromISO(value, { zone });
}

function atHour(day: DateTime, hour: number): DateTime {
  if (hour >= 24) {
    return day.plus({ days: 1 }).startOf("day");
  }
  return day.set({ hour, minute: 0, second: 0, millisecond: 0 });
}

function hoursBetween(start: DateTime, end: DateTime): number {
  const ms = end.toMillis() - start.toMillis();
  return ms > 0 ? ms / MS_PER_HOUR : 0;
}

/**
 * Working hours inside `[start, end)`: each working weekday (in the configured zone)
 * contributes its overlap with the office window, capped at `maxHoursPerDay`.
 */
export function overlapHours(start: Instant, end: Instant, config: BusinessHoursConfig): number {
  const from = toDateTime(start, config.timezone);
  const to = toDateTime(end, config.timezone);
  if (!from.isValid || !to.isValid || to <= from) {
    return 0;
  }
  const workingDays = new Set(config.workingWeekdays);
  let total = 0;
  let day = from.startOf("day");
  let walked = 0;
  while (day < to) {
    if (walked++ > MAX_DAYS_WALKED) {
      throw new InputError("Interval is too long to measure in business hours.");
    }
    if (workingDays.has(day.weekday)) {
      const officeStart = atHour(day, config.officeStartHour);
      const officeEnd = atHour(day, config.officeEndHour);
      const sliceStart = from > officeStart ? from : officeStart;
      const sliceEnd = to < officeEnd ? to : officeEnd;
      total += Math.min(hoursBetween(sliceStart, sliceEnd), config.maxHoursPerDay);
    }
    day = day.plus({ days: 1 }).startOf("day");
  }
  return total;
}

export function wallClockHours(start: Instant, end: Instant): number {
  const from = toDateTime(start, "UTC");
  const to = toDateTime(end, "UTC");
  if (!from.isValid || !to.isValid) {
    return 0;
  }
  return hoursBetween(from, to);
}
