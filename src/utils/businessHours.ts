import { DateTime } from 'luxon';
import { TimeWindow } from '../types/calendar';
import { formatInstant } from './slots';

export interface DayHours {
  open: string;
  close: string;
}

export interface BusinessHoursConfig {
  monday: DayHours | null;
  tuesday: DayHours | null;
  wednesday: DayHours | null;
  thursday: DayHours | null;
  friday: DayHours | null;
  saturday: DayHours | null;
  sunday: DayHours | null;
}

export const DEFAULT_BUSINESS_HOURS: BusinessHoursConfig = {
  monday: { open: '09:00', close: '17:00' },
  tuesday: { open: '09:00', close: '17:00' },
  wednesday: { open: '09:00', close: '17:00' },
  thursday: { open: '09:00', close: '17:00' },
  friday: { open: '09:00', close: '17:00' },
  saturday: null,
  sunday: null,
};

const DAY_NAMES: (keyof BusinessHoursConfig)[] = [
  'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday',
];

/** Monday–Friday between `open` and `close`, weekends closed. */
export function weekdayHours(open: string, close: string): BusinessHoursConfig {
  const hours = { open, close };
  return {
    monday: hours,
    tuesday: hours,
    wednesday: hours,
    thursday: hours,
    friday: hours,
    saturday: null,
    sunday: null,
  };
}

export function atClockTime(day: DateTime, clock: string): DateTime {
  const [hour, minute] = clock.split(':').map(Number);
  return day.set({ hour, minute, second: 0, millisecond: 0 });
}

export function hoursFor(day: DateTime, config: BusinessHoursConfig = DEFAULT_BUSINESS_HOURS): DayHours | null {
  const dayName = DAY_NAMES[day.weekday - 1]; // Luxon weekday is 1-based (Mon=1)
  return config[dayName];
}

/** Working window of the calendar day containing `day`, or null when closed. */
export function workingWindowFor(
  day: DateTime,
  config: BusinessHoursConfig = DEFAULT_BUSINESS_HOURS
): TimeWindow | null {
  const dayHours = hoursFor(day, config);
  if (!dayHours) return null;

  const zone = day.zoneName ?? 'UTC';
  return {
    start: formatInstant(atClockTime(day, dayHours.open)),
    end: formatInstant(atClockTime(day, dayHours.close)),
    timezone: zone,
  };
}

/**
 * Working windows on the days after `day`, skipping closed days. Scans at
 * most two weeks ahead.
 */
export function nextWorkingWindows(
  day: DateTime,
  count: number,
  config: BusinessHoursConfig = DEFAULT_BUSINESS_HOURS
): TimeWindow[] {
  const windows: TimeWindow[] = [];
  let check = day.plus({ days: 1 }).startOf('day');

  for (let i = 0; i < 14 && windows.length < count; i++) {
    const window = workingWindowFor(check, config);
    if (window) windows.push(window);
    check = check.plus({ days: 1 });
  }

  return windows;
}
