import { DateTime } from "luxon";
import type { AlertFrequency, BatchedFrequency } from "./types";

const MORNING_HOUR = 6;
const AFTERNOON_HOUR = 16;
const DIGEST_HOUR = 8;
const SUNDAY = 7; // luxon weekday

export function isBatched(frequency: AlertFrequency): frequency is BatchedFrequency {
  return frequency !== "immediate";
}

function atHour(day: DateTime, hour: number): DateTime {
  return day.set({ hour, minute: 0, second: 0, millisecond: 0 });
}

/**
 * Next allowed dispatch time for a batched frequency, strictly after `now`,
 * with wall-clock hours read in `zone`.
 */
export function nextDispatchAt(frequency: BatchedFrequency, now: Date, zone: string): Date {
  const local = DateTime.fromJSDate(now, { zone });
  const at = local.toMillis();

  switch (frequency) {
    case "morning_only": {
      const today = atHour(local, MORNING_HOUR);
      return (today.toMillis() > at ? today : atHour(local.plus({ days: 1 }), MORNING_HOUR)).toJSDate();
    }
    case "twice_daily": {
      const candidates = [atHour(local, MORNING_HOUR), atHour(local, AFTERNOON_HOUR)];
      const next = candidates.find((c) => c.toMillis() > at);
      return (next ?? atHour(local.plus({ days: 1 }), MORNING_HOUR)).toJSDate();
    }
    case "weekly_digest": {
      const daysToSunday = (SUNDAY - local.weekday) % 7;
      let candidate = atHour(local.plus({ days: daysToSunday }), DIGEST_HOUR);
      if (candidate.toMillis() <= at) candidate = atHour(candidate.plus({ days: 7 }), DIGEST_HOUR);
      return candidate.toJSDate();
    }
  }
}

/**
 * Scheduled time for an alert that is released immediately. Kept as a
 * separate function so callers never special-case "immediate" themselves.
 */
export function scheduleFor(frequency: AlertFrequency, now: Date, zone: string): Date {
  return isBatched(frequency) ? nextDispatchAt(frequency, now, zone) : now;
}
