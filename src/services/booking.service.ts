import { createHash } from 'crypto';
import { DateTime } from 'luxon';
import { BookingConfig } from '../config/booking';
import { BookingRequest, BookingResult, CommitLedger, FailedBooking } from '../types/booking';
import { BookingSlot, CalendarGateway } from '../types/calendar';
import { AvailabilityService } from './availability.service';
import {
  CalendarGatewayError,
  SlotConflictError,
  errorMessage,
  isAuthFailure,
  isRetryable,
  toGatewayError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { withRetry, withTimeout } from '../utils/retry';
import { formatInstant, parseInstant, slotOverlapsBusy } from '../utils/slots';

export interface CommitOutcome {
  result: BookingResult;
  /** Ledger with the result recorded when it is terminal. */
  ledger: CommitLedger;
  /** True when the result came from an earlier or concurrent commit with the same token. */
  replayed: boolean;
}

/** Confirmed bookings and non-recoverable failures never change on retry. */
export function isTerminalResult(result: BookingResult): boolean {
  return result.status === 'confirmed' || !result.recoverable;
}

export class BookingService {
  private inFlight = new Map<string, Promise<BookingResult>>();

  constructor(
    private gateway: CalendarGateway,
    private availability: AvailabilityService,
    private config: BookingConfig,
    private clock: () => DateTime = () => DateTime.now()
  ) {}

  /** Idempotency token for booking `slot` for `email` within one conversation. */
  static fingerprint(sessionId: string, email: string, slot: BookingSlot): string {
    const start = parseInstant(slot.start, slot.timezone).toUTC();
    const end = parseInstant(slot.end, slot.timezone).toUTC();
    return createHash('sha256')
      .update([sessionId, email.trim().toLowerCase(), formatInstant(start), formatInstant(end), slot.timezone].join('|'))
      .digest('hex');
  }

  /**
   * Re-checks the slot against fresh busy data and creates the event. A token
   * already in `ledger` returns the recorded result without touching the
   * calendar; concurrent commits with one token share a single attempt.
   */
  async commit(request: BookingRequest, ledger: CommitLedger = {}): Promise<CommitOutcome> {
    const token = request.idempotencyToken;

    const recorded = ledger[token];
    if (recorded) {
      logger.info('Booking commit replayed from ledger', { token, status: recorded.status });
      return { result: recorded, ledger, replayed: true };
    }

    const pending = this.inFlight.get(token);
    if (pending) {
      logger.info('Booking commit joined in-flight attempt', { token });
      const result = await pending;
      return { result, ledger: this.record(ledger, token, result), replayed: true };
    }

    const attempt = this.execute(request);
    this.inFlight.set(token, attempt);
    try {
      const result = await attempt;
      return { result, ledger: this.record(ledger, token, result), replayed: false };
    } finally {
      this.inFlight.delete(token);
    }
  }

  private record(ledger: CommitLedger, token: string, result: BookingResult): CommitLedger {
    return isTerminalResult(result) ? { ...ledger, [token]: result } : ledger;
  }

  private async execute(request: BookingRequest): Promise<BookingResult> {
    const { slot, userInfo, idempotencyToken } = request;

    try {
      if (parseInstant(slot.start, slot.timezone) <= this.clock()) {
        logger.info('Slot started before booking', { token: idempotencyToken, start: slot.start });
        throw new SlotConflictError(slot.start);
      }

      const busy = await this.availability.fetchBusy({
        start: slot.start,
        end: slot.end,
        timezone: slot.timezone,
      });

      if (slotOverlapsBusy(slot, busy)) {
        logger.info('Slot taken before booking', { token: idempotencyToken, start: slot.start });
        throw new SlotConflictError(slot.start);
      }

      const created = await withRetry(
        async () => {
          try {
            return await withTimeout(
              this.gateway.createEvent(slot, `${this.config.meetingSummary} with ${userInfo.name}`, userInfo.email, {
                idempotencyKey: idempotencyToken,
                description: `Booked by ${userInfo.name} <${userInfo.email}>`,
              }),
              this.config.gatewayTimeoutMs,
              'calendar.createEvent'
            );
          } catch (error) {
            throw toGatewayError(error, 'createEvent');
          }
        },
        {
          operation: 'calendar.createEvent',
          attempts: this.config.gatewayMaxAttempts,
          baseDelayMs: this.config.gatewayBackoffMs,
          shouldRetry: isRetryable,
        }
      );

      logger.info('Meeting booked', { token: idempotencyToken, eventId: created.eventId, start: slot.start });

      return {
        status: 'confirmed',
        eventId: created.eventId,
        link: created.link,
        slot,
        idempotencyToken,
        bookedAt: formatInstant(this.clock().setZone(this.config.timezone)),
      };
    } catch (error) {
      if (error instanceof SlotConflictError) {
        return {
          status: 'failed',
          error: 'SLOT_CONFLICT',
          recoverable: true,
          message: 'That time is no longer available.',
        };
      }

      const failure = this.classify(error);
      logger.error('Booking commit failed', {
        token: idempotencyToken,
        kind: failure.error,
        recoverable: failure.recoverable,
        error: errorMessage(error),
      });
      return failure;
    }
  }

  private classify(error: unknown): FailedBooking {
    if (isAuthFailure(error)) {
      return {
        status: 'failed',
        error: 'AUTH',
        recoverable: false,
        message: 'The calendar refused our credentials.',
      };
    }

    if (isRetryable(error)) {
      return {
        status: 'failed',
        error: 'TRANSIENT',
        recoverable: true,
        message: 'The calendar did not respond in time.',
      };
    }

    const detail = error instanceof CalendarGatewayError ? 'The calendar rejected the booking.' : 'The booking could not be completed.';
    return { status: 'failed', error: 'REJECTED', recoverable: false, message: detail };
  }
}
