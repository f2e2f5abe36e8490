import * as chrono from 'chrono-node';
import { DateTime } from 'luxon';
import { TimeWindow } from '../types/calendar';
import { BusinessHoursConfig, DEFAULT_BUSINESS_HOURS, atClockTime, hoursFor, nextWorkingWindows } from './businessHours';
import { formatInstant } from './slots';

export type PartOfDay = 'morning' | 'afternoon' | 'evening';

export const PART_OF_DAY_HOURS: Record<PartOfDay, { open: string; close: string }> = {
  morning: { open: '09:00', close: '12:00' },
  afternoon: { open: '14:00', close: '17:00' },
  evening: { open: '17:00', close: '20:00' },
};

const FLEXIBLE_PATTERN = /\b(any ?time|whenever|asap|as soon as possible|soonest|earliest|flexible)\b/i;
const CLOCK_PATTERN = /\b\d{1,2}(:\d{2})?\s*(am|pm)\b|\b\d{1,2}:\d{2}\b|\bnoon\b|\bmidday\b/i;

/** Length of the window opened around an exact requested time. */
const EXACT_TIME_WINDOW_MINUTES = 60;

export interface ResolveOptions {
  timezone: string;
  now: DateTime;
  hours?: BusinessHoursConfig;
}

/** Hours used for a named day the business is normally closed on. */
const CLOSED_DAY_HOURS = { open: '09:00', close: '17:00' };

export type ResolvedPreference =
  | { ok: true; window: TimeWindow }
  | { ok: false; reason: 'unrecognized' | 'past' };

export function detectPartOfDay(text: string): PartOfDay | null {
  const match = text.toLowerCase().match(/\b(morning|afternoon|evening)\b/);
  if (!match) return null;
  const part = match[1];
  return part === 'morning' || part === 'afternoon' || part === 'evening' ? part : null;
}

/** True when the text names a day, a time or a part of day. */
export function looksLikeTimePreference(text: string, now: DateTime = DateTime.now()): boolean {
  if (detectPartOfDay(text) || FLEXIBLE_PATTERN.test(text)) return true;
  return chrono.parse(text, now.toJSDate(), { forwardDate: true }).length > 0;
}

function toWindow(start: DateTime, end: DateTime, timezone: string): TimeWindow {
  return { start: formatInstant(start), end: formatInstant(end), timezone };
}

function earliestWorkingWindow(now: DateTime, hours: BusinessHoursConfig, timezone: string): TimeWindow | null {
  const today = hoursFor(now, hours);
  if (today) {
    const close = atClockTime(now, today.close);
    const open = atClockTime(now, today.open);
    if (close > now) {
      return toWindow(open > now ? open : now.startOf('minute'), close, timezone);
    }
  }
  return nextWorkingWindows(now, 1, hours)[0] ?? null;
}

/**
 * Turns a free-text preference ("tomorrow afternoon", "Friday at 3pm",
 * "whenever") into a concrete window in `timezone`.
 */
export function resolveTimePreference(text: string, options: ResolveOptions): ResolvedPreference {
  const { timezone } = options;
  const hours = options.hours ?? DEFAULT_BUSINESS_HOURS;
  const now = options.now.setZone(timezone);
  const partOfDay = detectPartOfDay(text);

  const results = chrono.parse(text, { instant: now.toJSDate(), timezone: now.offset }, { forwardDate: true });

  let window: TimeWindow | null = null;

  if (results.length > 0) {
    const parsed = results[0];
    const day = DateTime.fromObject(
      {
        year: parsed.start.get('year') ?? now.year,
        month: parsed.start.get('month') ?? now.month,
        day: parsed.start.get('day') ?? now.day,
      },
      { zone: timezone }
    );

    // chrono may pin an hour for "afternoon"; only an explicit clock time counts as exact
    const exactTime = parsed.start.isCertain('hour') && (partOfDay === null || CLOCK_PATTERN.test(parsed.text));

    if (exactTime) {
      const start = day.set({
        hour: parsed.start.get('hour') ?? 0,
        minute: parsed.start.get('minute') ?? 0,
        second: 0,
        millisecond: 0,
      });
      let end = start.plus({ minutes: EXACT_TIME_WINDOW_MINUTES });
      if (parsed.end && parsed.end.isCertain('hour')) {
        const stated = day.set({
          hour: parsed.end.get('hour') ?? 0,
          minute: parsed.end.get('minute') ?? 0,
          second: 0,
          millisecond: 0,
        });
        if (stated > start) end = stated;
      }
      window = toWindow(start, end, timezone);
    } else if (partOfDay) {
      const part = PART_OF_DAY_HOURS[partOfDay];
      window = toWindow(atClockTime(day, part.open), atClockTime(day, part.close), timezone);
    } else {
      const dayHours = hoursFor(day, hours) ?? CLOSED_DAY_HOURS;
      window = toWindow(atClockTime(day, dayHours.open), atClockTime(day, dayHours.close), timezone);
    }
  } else if (partOfDay) {
    const part = PART_OF_DAY_HOURS[partOfDay];
    const todayEnd = atClockTime(now, part.close);
    const day = todayEnd > now ? now : now.plus({ days: 1 });
    window = toWindow(atClockTime(day, part.open), atClockTime(day, part.close), timezone);
  } else if (FLEXIBLE_PATTERN.test(text)) {
    window = earliestWorkingWindow(now, hours, timezone);
  }

  if (!window) return { ok: false, reason: 'unrecognized' };
  if (DateTime.fromISO(window.end, { zone: timezone }) <= now) return { ok: false, reason: 'past' };
  return { ok: true, window };
}
