import { DateTime } from 'luxon';
import { BookingConfig } from '../config/booking';
import { BookingResult, FailedBooking } from '../types/booking';
import {
  AdvanceResult,
  BookingEvent,
  ConversationState,
  ExtractedFields,
  TERMINAL_STAGES,
} from '../types/conversation';
import { AvailabilityService } from './availability.service';
import { BookingService } from './booking.service';
import { QualificationService } from './qualification.service';
import {
  CalendarGatewayError,
  EmptyAvailabilityError,
  StaleSelectionError,
  errorMessage,
  isAuthFailure,
  isRetryable,
} from '../utils/errors';
import { logger } from '../utils/logger';
import {
  MESSAGES,
  askForFields,
  bookedMessage,
  confirmationMessage,
  formatSlot,
  noAvailabilityMessage,
  pickSlotMessage,
  proposalMessage,
  staleSelectionMessage,
} from '../utils/messages';
import { formatInstant } from '../utils/slots';

/**
 * Drives one booking conversation: QUALIFYING → PROPOSING → CONFIRMING →
 * BOOKING → DONE, with ABANDONED and FAILED reachable from any open stage.
 * State goes in and comes back out; nothing is held between calls.
 */
export class BookingStateMachine {
  constructor(
    private qualification: QualificationService,
    private availability: AvailabilityService,
    private booking: BookingService,
    private config: BookingConfig,
    private clock: () => DateTime = () => DateTime.now()
  ) {}

  createInitialState(sessionId: string): ConversationState {
    const now = formatInstant(this.now());
    return {
      sessionId,
      stage: 'QUALIFYING',
      userInfo: {},
      preferenceWindow: null,
      proposal: null,
      selectedSlot: null,
      result: null,
      ledger: {},
      gatewayFailures: 0,
      transcript: [],
      createdAt: now,
      updatedAt: now,
    };
  }

  /** True once the user has started giving booking details. */
  isInProgress(state: ConversationState): boolean {
    if (TERMINAL_STAGES.includes(state.stage)) return false;
    const { name, email, timePreference } = state.userInfo;
    return state.stage !== 'QUALIFYING' || Boolean(name || email || timePreference);
  }

  /** The prompt that picks the conversation back up from where it stands. */
  currentPrompt(state: ConversationState): string {
    switch (state.stage) {
      case 'QUALIFYING':
        return askForFields(this.qualification.missingFields(state.userInfo));
      case 'PROPOSING':
      case 'BOOKING':
        return MESSAGES.calendarUnavailable;
      case 'CONFIRMING':
        return this.confirmingReminder(state);
      default:
        return this.terminalPrompt(state);
    }
  }

  async advance(state: ConversationState, event: BookingEvent): Promise<AdvanceResult> {
    if (TERMINAL_STAGES.includes(state.stage)) {
      logger.debug('Event ignored in terminal stage', { sessionId: state.sessionId, stage: state.stage, event: event.type });
      return { prompt: this.terminalPrompt(state), state };
    }

    const outcome = await this.transition(state, event);
    const next: ConversationState = { ...outcome.state, updatedAt: formatInstant(this.now()) };

    if (next.stage !== state.stage) {
      logger.info('Booking stage changed', {
        sessionId: state.sessionId,
        from: state.stage,
        to: next.stage,
        event: event.type,
      });
    }

    return { prompt: outcome.prompt, state: next };
  }

  private now(): DateTime {
    return this.clock().setZone(this.config.timezone);
  }

  private async transition(state: ConversationState, event: BookingEvent): Promise<AdvanceResult> {
    switch (event.type) {
      case 'EXIT':
        return this.abandon(state, MESSAGES.exited);
      case 'TIMEOUT':
        return this.abandon(state, MESSAGES.timedOut);
      case 'PROVIDE_FIELDS':
        return this.applyFields(state, event.fields);
      case 'CHANGE_PREFERENCE':
        return this.applyFields(state, { timePreference: event.timePreference });
      default:
        break;
    }

    switch (state.stage) {
      case 'QUALIFYING':
        return { prompt: askForFields(this.qualification.missingFields(state.userInfo)), state };
      case 'PROPOSING':
        return this.propose(state);
      case 'BOOKING':
        return this.recoverInterruptedBooking(state);
      case 'CONFIRMING':
        return this.handleConfirming(state, event);
      default:
        return { prompt: this.terminalPrompt(state), state };
    }
  }

  private abandon(state: ConversationState, prompt: string): AdvanceResult {
    return {
      prompt,
      state: { ...state, stage: 'ABANDONED', proposal: null, selectedSlot: null },
    };
  }

  private fail(state: ConversationState, result: FailedBooking): AdvanceResult {
    return {
      prompt: MESSAGES.failed,
      state: { ...state, stage: 'FAILED', proposal: null, selectedSlot: null, result },
    };
  }

  private async applyFields(state: ConversationState, fields: ExtractedFields): Promise<AdvanceResult> {
    const update = this.qualification.merge(state.userInfo, fields, this.now());

    if (update.changed.length === 0) {
      if (state.stage === 'QUALIFYING') {
        return { prompt: askForFields(this.qualification.missingFields(state.userInfo), update.issues), state };
      }
      const corrections = update.issues.map((issue) => issue.message).join(' ');
      const reminder = this.currentPrompt(state);
      return { prompt: corrections ? `${corrections} ${reminder}` : reminder, state };
    }

    const next: ConversationState = {
      ...state,
      userInfo: update.userInfo,
      preferenceWindow: update.window ?? state.preferenceWindow,
      proposal: null,
      selectedSlot: null,
    };

    const missing = this.qualification.missingFields(next.userInfo);
    if (missing.length > 0 || !next.preferenceWindow) {
      return {
        prompt: askForFields(missing.length > 0 ? missing : ['timePreference'], update.issues),
        state: { ...next, stage: 'QUALIFYING' },
      };
    }

    return this.propose({ ...next, stage: 'PROPOSING' });
  }

  private async propose(state: ConversationState, note?: string): Promise<AdvanceResult> {
    const userInfo = this.qualification.complete(state.userInfo);
    const window = state.preferenceWindow;
    if (!userInfo || !window) {
      const missing = this.qualification.missingFields(state.userInfo);
      return {
        prompt: askForFields(missing.length > 0 ? missing : ['timePreference']),
        state: { ...state, stage: 'QUALIFYING', proposal: null, selectedSlot: null },
      };
    }

    const proposing: ConversationState = { ...state, stage: 'PROPOSING', proposal: null, selectedSlot: null };

    try {
      const proposal = await this.availability.propose(window, this.now());
      return {
        prompt: proposalMessage(proposal.slots, {
          widened: proposal.widened,
          preference: userInfo.timePreference,
          note,
        }),
        state: { ...proposing, stage: 'CONFIRMING', proposal },
      };
    } catch (error) {
      if (error instanceof EmptyAvailabilityError) {
        const message = noAvailabilityMessage(userInfo.timePreference);
        return {
          prompt: note ? `${note} ${message}` : message,
          state: {
            ...proposing,
            stage: 'QUALIFYING',
            userInfo: { name: userInfo.name, email: userInfo.email },
            preferenceWindow: null,
          },
        };
      }
      return this.gatewayFailure(proposing, error, MESSAGES.calendarUnavailable);
    }
  }

  /** Recoverable failures keep the stage until the per-session budget runs out. */
  private gatewayFailure(state: ConversationState, error: unknown, retryPrompt: string): AdvanceResult {
    if (isAuthFailure(error)) {
      logger.error('Calendar authentication failed', { sessionId: state.sessionId, error: errorMessage(error) });
      return this.fail(state, {
        status: 'failed',
        error: 'AUTH',
        recoverable: false,
        message: 'The calendar refused our credentials.',
      });
    }

    if (!isRetryable(error)) {
      if (!(error instanceof CalendarGatewayError)) throw error;
      return this.fail(state, {
        status: 'failed',
        error: 'REJECTED',
        recoverable: false,
        message: 'The calendar rejected the request.',
      });
    }

    const gatewayFailures = state.gatewayFailures + 1;
    logger.warn('Calendar unavailable', {
      sessionId: state.sessionId,
      gatewayFailures,
      error: errorMessage(error),
    });

    if (gatewayFailures > this.config.maxGatewayFailures) {
      return this.fail(
        { ...state, gatewayFailures },
        {
          status: 'failed',
          error: 'TRANSIENT',
          recoverable: false,
          message: 'The calendar stayed unavailable after repeated attempts.',
        }
      );
    }

    return { prompt: retryPrompt, state: { ...state, gatewayFailures } };
  }

  private async handleConfirming(state: ConversationState, event: BookingEvent): Promise<AdvanceResult> {
    const slots = state.proposal?.slots ?? [];

    switch (event.type) {
      case 'SELECT_SLOT': {
        try {
          const slot = this.availability.resolveSelection(state.proposal, event.selection);
          const selected: ConversationState = { ...state, selectedSlot: slot };
          return { prompt: this.confirmingReminder(selected), state: selected };
        } catch (error) {
          if (!(error instanceof StaleSelectionError)) throw error;
          logger.debug('Stale slot selection', { sessionId: state.sessionId, error: error.message });
          return { prompt: staleSelectionMessage(slots), state: { ...state, selectedSlot: null } };
        }
      }

      case 'CONFIRM':
        if (!state.selectedSlot) return { prompt: pickSlotMessage(slots), state };
        return this.commit(state);

      case 'REJECT':
        if (state.selectedSlot) {
          return this.propose({ ...state, selectedSlot: null }, MESSAGES.reshowing);
        }
        return {
          prompt: MESSAGES.askNewTime,
          state: {
            ...state,
            stage: 'QUALIFYING',
            userInfo: { name: state.userInfo.name, email: state.userInfo.email },
            preferenceWindow: null,
            proposal: null,
          },
        };

      default:
        return { prompt: this.confirmingReminder(state), state };
    }
  }

  private async commit(state: ConversationState): Promise<AdvanceResult> {
    const slot = state.selectedSlot;
    const userInfo = this.qualification.complete(state.userInfo);
    if (!slot || !userInfo) {
      return { prompt: this.currentPrompt(state), state };
    }

    logger.info('Booking stage changed', { sessionId: state.sessionId, from: state.stage, to: 'BOOKING', event: 'CONFIRM' });
    const booking: ConversationState = { ...state, stage: 'BOOKING' };

    const { result, ledger } = await this.booking.commit(
      { userInfo, slot, idempotencyToken: BookingService.fingerprint(state.sessionId, userInfo.email, slot) },
      state.ledger
    );
    const after: ConversationState = { ...booking, ledger };

    if (result.status === 'confirmed') {
      return {
        prompt: bookedMessage(result.slot, userInfo.email, result.link),
        state: { ...after, stage: 'DONE', result, proposal: null },
      };
    }

    switch (result.error) {
      case 'SLOT_CONFLICT':
        return this.propose({ ...after, selectedSlot: null }, MESSAGES.slotTaken);

      case 'TRANSIENT': {
        const gatewayFailures = after.gatewayFailures + 1;
        if (gatewayFailures > this.config.maxGatewayFailures) {
          return this.fail({ ...after, gatewayFailures }, { ...result, recoverable: false });
        }
        return {
          prompt: MESSAGES.bookingRetry,
          state: { ...after, stage: 'CONFIRMING', gatewayFailures },
        };
      }

      default:
        return this.fail(after, result);
    }
  }

  /** A stored BOOKING stage means a turn died mid-commit; ask again rather than book unprompted. */
  private recoverInterruptedBooking(state: ConversationState): AdvanceResult {
    const confirming: ConversationState = { ...state, stage: 'CONFIRMING' };
    return { prompt: `${MESSAGES.reconfirm} ${this.confirmingReminder(confirming)}`, state: confirming };
  }

  private confirmingReminder(state: ConversationState): string {
    const userInfo = this.qualification.complete(state.userInfo);
    if (state.selectedSlot && userInfo) {
      return confirmationMessage(state.selectedSlot, userInfo, this.config.meetingSummary);
    }
    return pickSlotMessage(state.proposal?.slots ?? []);
  }

  private terminalPrompt(state: ConversationState): string {
    const result: BookingResult | null = state.result;
    switch (state.stage) {
      case 'DONE':
        return result?.status === 'confirmed'
          ? `${MESSAGES.alreadyBooked} ${formatSlot(result.slot)} (${result.slot.timezone}).`
          : MESSAGES.alreadyBooked;
      case 'ABANDONED':
        return MESSAGES.exited;
      default:
        return MESSAGES.failed;
    }
  }
}
