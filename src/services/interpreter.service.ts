import { DateTime } from 'luxon';
import { LanguageUnderstanding } from '../types/agent';
import { BookingSlot } from '../types/calendar';
import { BookingEvent, ConversationState, SlotSelection, TERMINAL_STAGES } from '../types/conversation';
import { EMAIL_PATTERN, hasAnyField } from '../utils/extraction';
import { logger } from '../utils/logger';
import { isAffirmative, isExit, isNegative, parseSlotSelection } from '../utils/selection';
import { sameInstant } from '../utils/slots';
import { looksLikeTimePreference } from '../utils/timePreference';

const DAY_WORDS = /\b(today|tomorrow|tonight|next|this|mon|tue|wed|thu|fri|sat|sun|morning|afternoon|evening|week)/i;

function pointsAt(selection: SlotSelection, slots: BookingSlot[], slot: BookingSlot): boolean {
  const target = selection.by === 'index' ? slots[selection.index]?.start : selection.start;
  return target !== undefined && sameInstant(target, slot.start);
}

function matchesAnySlot(selection: SlotSelection, slots: BookingSlot[]): boolean {
  return selection.by === 'index'
    ? slots[selection.index] !== undefined
    : slots.some((slot) => sameInstant(slot.start, selection.start));
}

/** Turns one user message into the booking event it stands for, given where the conversation is. */
export class TurnInterpreter {
  constructor(
    private understanding: LanguageUnderstanding,
    private clock: () => DateTime = () => DateTime.now()
  ) {}

  async interpret(text: string, state: ConversationState): Promise<BookingEvent> {
    const event = await this.read(text.trim(), state);
    logger.debug('Turn interpreted', { sessionId: state.sessionId, stage: state.stage, event: event.type });
    return event;
  }

  private async read(text: string, state: ConversationState): Promise<BookingEvent> {
    if (TERMINAL_STAGES.includes(state.stage)) return { type: 'UNRECOGNIZED' };
    if (text.length === 0) return { type: 'UNRECOGNIZED' };
    if (isExit(text)) return { type: 'EXIT' };

    if (state.stage === 'QUALIFYING') {
      return this.readFields(text, state);
    }

    const slots = state.proposal?.slots ?? [];
    const selection = parseSlotSelection(text, slots, this.clock());

    if (selection) {
      const stale = !matchesAnySlot(selection, slots);
      if (stale && selection.by === 'time' && DAY_WORDS.test(text)) {
        return { type: 'CHANGE_PREFERENCE', timePreference: text };
      }
      if (!state.selectedSlot || !pointsAt(selection, slots, state.selectedSlot)) {
        return { type: 'SELECT_SLOT', selection };
      }
    }

    if (state.selectedSlot && isAffirmative(text)) return { type: 'CONFIRM' };

    if (EMAIL_PATTERN.test(text) || /\bmy name is\b/i.test(text)) {
      return this.readFields(text, state);
    }

    const mentionsTime = looksLikeTimePreference(text, this.clock());
    if (mentionsTime && !selection) return { type: 'CHANGE_PREFERENCE', timePreference: text };
    if (isNegative(text)) return { type: 'REJECT' };
    if (isAffirmative(text)) return { type: 'CONFIRM' };

    return { type: 'UNRECOGNIZED' };
  }

  private async readFields(text: string, state: ConversationState): Promise<BookingEvent> {
    const awaiting = (['name', 'email', 'timePreference'] as const).find((field) => !state.userInfo[field]);
    const fields = await this.understanding.extractFields(text, { awaiting, known: state.userInfo });
    return hasAnyField(fields) ? { type: 'PROVIDE_FIELDS', fields } : { type: 'UNRECOGNIZED' };
  }
}
