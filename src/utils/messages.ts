import { QualificationField, UserInfo } from '../types/booking';
import { BookingSlot } from '../types/calendar';
import { FieldIssue } from '../types/conversation';
import { parseInstant } from './slots';

const FIELD_LABELS: Record<QualificationField, string> = {
  name: 'your name',
  email: 'your email address',
  timePreference: 'a day or time that suits you',
};

const FIELD_QUESTIONS: Record<QualificationField, string> = {
  name: 'What name should I put on the invitation?',
  email: 'What email address should the invitation go to?',
  timePreference: 'When would you like to meet? For example "tomorrow afternoon" or "Friday at 3pm".',
};

function joinList(items: string[]): string {
  if (items.length <= 1) return items.join('');
  return `${items.slice(0, -1).join(', ')} and ${items[items.length - 1]}`;
}

/** "Tue, Oct 20, 10:00-10:30" in the slot's own timezone. */
export function formatSlot(slot: BookingSlot): string {
  const start = parseInstant(slot.start, slot.timezone);
  const end = parseInstant(slot.end, slot.timezone);
  return `${start.toFormat('ccc, LLL d')}, ${start.toFormat('HH:mm')}-${end.toFormat('HH:mm')}`;
}

export function listSlots(slots: BookingSlot[]): string {
  return slots.map((slot, i) => `${i + 1}. ${formatSlot(slot)}`).join('\n');
}

export function askForFields(missing: QualificationField[], issues: FieldIssue[] = []): string {
  const corrections = issues.map((issue) => issue.message);
  let question: string;

  if (missing.length === 0) {
    question = 'Could you tell me a bit more?';
  } else if (missing.length === 1) {
    question = FIELD_QUESTIONS[missing[0]];
  } else if (missing.length === 3 && issues.length === 0) {
    question = "I'd be happy to set up a meeting. Could you share your name, email, and a day or time that suits you?";
  } else {
    question = `Could you share ${joinList(missing.map((field) => FIELD_LABELS[field]))}?`;
  }

  return [...corrections, question].join(' ');
}

export function proposalMessage(slots: BookingSlot[], options: { widened: boolean; preference: string; note?: string }): string {
  const timezone = slots[0]?.timezone ?? '';
  const intro = options.widened
    ? `I couldn't find enough open times for "${options.preference}", so here are the closest ones (${timezone}):`
    : `Here are the open times I found (${timezone}):`;
  const lead = options.note ? `${options.note} ` : '';
  return `${lead}${intro}\n${listSlots(slots)}\nWhich one works best? Just reply with the number.`;
}

export function staleSelectionMessage(slots: BookingSlot[]): string {
  return `Sorry, that isn't one of the times I offered. These are still open:\n${listSlots(slots)}\nWhich one works best? Just reply with the number.`;
}

export function pickSlotMessage(slots: BookingSlot[]): string {
  return `${MESSAGES.pickSlot}\n${listSlots(slots)}`;
}

export function noAvailabilityMessage(preference: string): string {
  return `I don't see any open times for "${preference}" or the next few working days. What other day or time would suit you?`;
}

export function confirmationMessage(slot: BookingSlot, userInfo: UserInfo, summary: string): string {
  return (
    `Just to confirm: ${summary} on ${formatSlot(slot)} (${slot.timezone}) ` +
    `for ${userInfo.name} <${userInfo.email}>. Shall I book it? (yes/no)`
  );
}

export function bookedMessage(slot: BookingSlot, email: string, link: string | null): string {
  const base = `All set! You're booked for ${formatSlot(slot)} (${slot.timezone}). An invitation is on its way to ${email}.`;
  return link ? `${base}\nEvent: ${link}` : base;
}

export const MESSAGES = {
  pickSlot: "I didn't catch which time you'd like. Could you tell me the number?",
  confirmOrChange: "Should I book this meeting? Please say 'yes' to confirm or 'no' to choose a different time.",
  calendarUnavailable:
    "I couldn't reach the calendar just now. Send any message to try again, or suggest a different time.",
  bookingRetry:
    "I couldn't reach the calendar to finish the booking. Say 'yes' to try again, or pick a different time.",
  slotTaken: 'Sorry, that time just became unavailable.',
  failed:
    "I'm sorry, I couldn't complete the booking because of a problem on our side. Please contact our team and they'll set it up for you.",
  exited: "No problem, I haven't booked anything. Come back any time.",
  timedOut: 'This booking conversation timed out, so nothing was booked. Let me know if you would like to start again.',
  alreadyBooked: 'Your meeting is already booked.',
  askNewTime: 'No problem. What other day or time would suit you?',
  reshowing: 'No problem, here are the options again.',
  reconfirm: "I'm not sure the last booking attempt went through, so let me check again before booking.",
  knowledgeFallback:
    "I'm not able to answer that right now, but I can set up a call with our team. Would you like to book a meeting?",
} as const;
