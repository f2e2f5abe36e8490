import * as chrono from 'chrono-node';
import { DateTime } from 'luxon';
import { BookingSlot } from '../types/calendar';
import { SlotSelection } from '../types/conversation';
import { formatInstant, parseInstant } from './slots';

const ORDINALS: Record<string, number> = {
  first: 0,
  '1st': 0,
  second: 1,
  '2nd': 1,
  third: 2,
  '3rd': 2,
  fourth: 3,
  '4th': 3,
  fifth: 4,
  '5th': 4,
};

const ORDINAL_PATTERN = /\b(first|1st|second|2nd|third|3rd|fourth|4th|fifth|5th|last)\b/i;
const BARE_NUMBER_PATTERN = /^\s*(?:option|number|slot|no\.?|#)?\s*(\d{1,2})\s*[.)!]?\s*$/i;
const LABELLED_NUMBER_PATTERN = /(?:\b(?:option|number|slot|take|pick|choose)\s*|#)(\d{1,2})\b/i;
const MERIDIEM_TIME_PATTERN = /\b(\d{1,2})(?::(\d{2}))?\s*(am|pm)\b/i;
const CLOCK_TIME_PATTERN = /\b([01]?\d|2[0-3]):([0-5]\d)\b/;

const AFFIRMATIVE_PATTERN = /\b(yes|yeah|yep|yup|confirm|confirmed|sure|ok|okay|book it|book|go ahead|sounds good|perfect|do it)\b/i;
const NEGATIVE_PATTERN = /\b(no|nope|nah|cancel|wait|change|different|another|other)\b/i;
const EXIT_PATTERN = /\b(stop|quit|exit|never ?mind|forget it|not interested|bye|goodbye)\b/i;

export function isAffirmative(text: string): boolean {
  return AFFIRMATIVE_PATTERN.test(text) && !NEGATIVE_PATTERN.test(text);
}

export function isNegative(text: string): boolean {
  return NEGATIVE_PATTERN.test(text);
}

export function isExit(text: string): boolean {
  return EXIT_PATTERN.test(text);
}

function clockTimeIn(text: string): { hour: number; minute: number } | null {
  const meridiem = text.match(MERIDIEM_TIME_PATTERN);
  if (meridiem) {
    const hour = Number(meridiem[1]);
    if (hour < 1 || hour > 12) return null;
    const pm = meridiem[3].toLowerCase() === 'pm';
    return { hour: (hour % 12) + (pm ? 12 : 0), minute: Number(meridiem[2] ?? '0') };
  }

  const clock = text.match(CLOCK_TIME_PATTERN);
  if (clock) {
    return { hour: Number(clock[1]), minute: Number(clock[2]) };
  }
  return null;
}

/** The calendar day the text names ("tomorrow", "Wednesday", "Oct 21"), if any. */
function namedDay(text: string, now: DateTime): DateTime | null {
  const results = chrono.parse(text, { instant: now.toJSDate(), timezone: now.offset }, { forwardDate: true });
  if (results.length === 0) return null;

  const { start } = results[0];
  if (!start.isCertain('day') && !start.isCertain('weekday')) return null;

  return DateTime.fromObject(
    {
      year: start.get('year') ?? now.year,
      month: start.get('month') ?? now.month,
      day: start.get('day') ?? now.day,
    },
    { zone: now.zone }
  );
}

/**
 * Reads a choice among `slots` from a reply: a restated time ("10:30",
 * "2pm"), a number ("2", "option 3") or an ordinal ("the second one").
 * A restated time that matches no slot still yields a time selection so the
 * caller can reject it as stale.
 */
export function parseSlotSelection(
  text: string,
  slots: BookingSlot[],
  now: DateTime = DateTime.now()
): SlotSelection | null {
  if (slots.length === 0) return null;

  const time = clockTimeIn(text);
  if (time) {
    const first = slots[0];
    const day = namedDay(text, now.setZone(first.timezone));

    const matches = slots.filter((slot) => {
      const start = parseInstant(slot.start, slot.timezone);
      return start.hour === time.hour && start.minute === time.minute && (!day || start.hasSame(day, 'day'));
    });

    if (matches.length > 0) {
      return { by: 'time', start: matches[0].start };
    }

    const unmatched = (day ?? parseInstant(first.start, first.timezone)).set({
      hour: time.hour,
      minute: time.minute,
      second: 0,
      millisecond: 0,
    });
    return { by: 'time', start: formatInstant(unmatched) };
  }

  const number = text.match(BARE_NUMBER_PATTERN) ?? text.match(LABELLED_NUMBER_PATTERN);
  if (number) {
    return { by: 'index', index: Number(number[1]) - 1 };
  }

  const ordinal = text.match(ORDINAL_PATTERN);
  if (ordinal) {
    const word = ordinal[1].toLowerCase();
    return { by: 'index', index: word === 'last' ? slots.length - 1 : ORDINALS[word] };
  }

  return null;
}
