import { DateTime, IANAZone } from 'luxon';
import { BookingSlot, BusyInterval, TimeWindow } from '../types/calendar';
import { ValidationError } from './errors';

export const DEFAULT_SLOT_DURATION_MINUTES = 30;

interface Range {
  start: DateTime;
  end: DateTime;
}

export function assertTimezone(timezone: string): void {
  if (!IANAZone.isValidZone(timezone)) {
    throw new ValidationError(`Unknown timezone: ${timezone}`, 'timezone');
  }
}

/** Parses an ISO instant and expresses it in `timezone`; offsets in the input are honoured. */
export function parseInstant(iso: string, timezone: string): DateTime {
  const parsed = DateTime.fromISO(iso, { zone: timezone });
  if (!parsed.isValid) {
    throw new ValidationError(`Invalid instant "${iso}": ${parsed.invalidReason}`, 'instant');
  }
  return parsed;
}

export function formatInstant(dt: DateTime): string {
  const iso = dt.toISO({ suppressMilliseconds: true });
  if (!iso) {
    throw new ValidationError(`Cannot serialize instant: ${dt.invalidReason}`, 'instant');
  }
  return iso;
}

function toRange(interval: BusyInterval, timezone: string): Range {
  return { start: parseInstant(interval.start, timezone), end: parseInstant(interval.end, timezone) };
}

function later(a: DateTime, b: DateTime): DateTime {
  return a > b ? a : b;
}

function earlier(a: DateTime, b: DateTime): DateTime {
  return a < b ? a : b;
}

function clipToWindow(ranges: Range[], bounds: Range): Range[] {
  return ranges
    .map((range) => ({ start: later(range.start, bounds.start), end: earlier(range.end, bounds.end) }))
    .filter((range) => range.start < range.end);
}

/**
 * Sorts and folds ranges into maximal disjoint ranges. Ranges that overlap or
 * share an endpoint are merged.
 */
function mergeRanges(ranges: Range[]): Range[] {
  const sorted = [...ranges].sort(
    (a, b) => a.start.toMillis() - b.start.toMillis() || a.end.toMillis() - b.end.toMillis()
  );

  const merged: Range[] = [];
  for (const range of sorted) {
    const last = merged[merged.length - 1];
    if (last && range.start <= last.end) {
      last.end = later(last.end, range.end);
    } else {
      merged.push({ ...range });
    }
  }
  return merged;
}

function complement(busy: Range[], bounds: Range): Range[] {
  const free: Range[] = [];
  let cursor = bounds.start;

  for (const range of busy) {
    if (range.start > cursor) {
      free.push({ start: cursor, end: range.start });
    }
    cursor = later(cursor, range.end);
  }

  if (cursor < bounds.end) {
    free.push({ start: cursor, end: bounds.end });
  }
  return free;
}

function slotsWithin(range: Range, durationMinutes: number, timezone: string): BookingSlot[] {
  const slots: BookingSlot[] = [];
  let cursor = range.start;
  let next = cursor.plus({ minutes: durationMinutes });

  while (next <= range.end) {
    slots.push({ start: formatInstant(cursor), end: formatInstant(next), timezone });
    cursor = next;
    next = cursor.plus({ minutes: durationMinutes });
  }
  return slots;
}

/**
 * Splits the free time of `window` into fixed-length slots.
 *
 * Busy intervals are clipped to the window, merged, and complemented; each
 * free range yields back-to-back slots from its start, and a trailing
 * remainder shorter than the duration is dropped. Slots that only touch a
 * busy interval are kept.
 */
export function computeFreeSlots(
  window: TimeWindow,
  busy: BusyInterval[],
  slotDurationMinutes: number = DEFAULT_SLOT_DURATION_MINUTES
): BookingSlot[] {
  assertTimezone(window.timezone);
  if (!Number.isInteger(slotDurationMinutes) || slotDurationMinutes <= 0) {
    throw new ValidationError(
      `Slot duration must be a positive whole number of minutes, got ${slotDurationMinutes}`,
      'slotDurationMinutes'
    );
  }

  const { timezone } = window;
  const bounds: Range = {
    start: parseInstant(window.start, timezone),
    end: parseInstant(window.end, timezone),
  };
  if (bounds.start >= bounds.end) return [];

  const busyRanges = busy.map((interval) => toRange(interval, timezone)).filter((r) => r.start < r.end);
  const merged = mergeRanges(clipToWindow(busyRanges, bounds));

  return complement(merged, bounds).flatMap((range) => slotsWithin(range, slotDurationMinutes, timezone));
}

/** True when the slot shares any time with a busy interval; touching endpoints do not count. */
export function slotOverlapsBusy(slot: BookingSlot, busy: BusyInterval[]): boolean {
  const slotRange = toRange(slot, slot.timezone);
  return busy
    .map((interval) => toRange(interval, slot.timezone))
    .some((range) => range.start < slotRange.end && slotRange.start < range.end);
}

export function sameInstant(a: string, b: string): boolean {
  const left = DateTime.fromISO(a, { setZone: true });
  const right = DateTime.fromISO(b, { setZone: true });
  return left.isValid && right.isValid && left.toMillis() === right.toMillis();
}
