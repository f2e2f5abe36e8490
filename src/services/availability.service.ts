import { DateTime } from 'luxon';
import { v4 as uuidv4 } from 'uuid';
import { BookingConfig } from '../config/booking';
import { SlotProposal } from '../types/booking';
import { BookingSlot, BusyInterval, CalendarGateway, TimeWindow } from '../types/calendar';
import { SlotSelection } from '../types/conversation';
import { nextWorkingWindows, workingWindowFor } from '../utils/businessHours';
import {
  EmptyAvailabilityError,
  StaleSelectionError,
  errorMessage,
  isAuthFailure,
  isRetryable,
  toGatewayError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { withRetry, withTimeout } from '../utils/retry';
import { computeFreeSlots, formatInstant, parseInstant, sameInstant } from '../utils/slots';

interface SearchStep {
  window: TimeWindow;
  widened: boolean;
}

export class AvailabilityService {
  constructor(
    private gateway: CalendarGateway,
    private config: BookingConfig
  ) {}

  /** Busy intervals for `window`, with the gateway timeout and retry budget applied. */
  async fetchBusy(window: TimeWindow): Promise<BusyInterval[]> {
    return withRetry(
      async () => {
        try {
          return await withTimeout(
            this.gateway.queryBusy(window),
            this.config.gatewayTimeoutMs,
            'calendar.queryBusy'
          );
        } catch (error) {
          throw toGatewayError(error, 'queryBusy');
        }
      },
      {
        operation: 'calendar.queryBusy',
        attempts: this.config.gatewayMaxAttempts,
        baseDelayMs: this.config.gatewayBackoffMs,
        shouldRetry: isRetryable,
      }
    );
  }

  /**
   * Builds a proposal for the preferred window. When it holds fewer than
   * `minProposalSize` future slots the search widens to the whole working day,
   * then to the following working days up to the horizon.
   */
  async propose(preference: TimeWindow, now: DateTime = DateTime.now()): Promise<SlotProposal> {
    const steps = this.searchSteps(preference);
    const preferred: BookingSlot[] = [];
    const widened: BookingSlot[] = [];
    const seen = new Set<number>();
    let windowsSearched = 0;

    for (const step of steps) {
      if (parseInstant(step.window.end, step.window.timezone) <= now) continue;

      let busy: BusyInterval[];
      try {
        busy = await this.fetchBusy(step.window);
      } catch (error) {
        // Already-found slots are still worth offering when a wider search fails
        if (!step.widened || isAuthFailure(error) || preferred.length + widened.length === 0) throw error;
        logger.warn('Widened availability search failed, proposing what was found', {
          window: step.window,
          error: errorMessage(error),
        });
        break;
      }
      windowsSearched++;

      for (const slot of computeFreeSlots(step.window, busy, this.config.slotDurationMinutes)) {
        const start = parseInstant(slot.start, slot.timezone);
        if (start < now || seen.has(start.toMillis())) continue;
        seen.add(start.toMillis());
        (step.widened ? widened : preferred).push(slot);
      }

      if (preferred.length + widened.length >= this.config.minProposalSize) break;
    }

    const chosen = [...preferred.slice(0, this.config.maxProposalSize)];
    for (const slot of widened) {
      if (chosen.length >= this.config.maxProposalSize) break;
      chosen.push(slot);
    }

    if (chosen.length === 0) {
      logger.info('No availability found', { preference, windowsSearched });
      throw new EmptyAvailabilityError(windowsSearched);
    }

    chosen.sort((a, b) => parseInstant(a.start, a.timezone).toMillis() - parseInstant(b.start, b.timezone).toMillis());

    const proposal: SlotProposal = {
      id: uuidv4(),
      slots: chosen,
      requestedWindow: preference,
      widened: chosen.length > preferred.length,
      generatedAt: formatInstant(now),
    };

    logger.info('Slot proposal generated', {
      proposalId: proposal.id,
      slotCount: chosen.length,
      widened: proposal.widened,
      windowsSearched,
    });

    return proposal;
  }

  /** Maps a selection onto the current proposal; anything outside it is stale. */
  resolveSelection(proposal: SlotProposal | null, selection: SlotSelection): BookingSlot {
    if (!proposal || proposal.slots.length === 0) {
      throw new StaleSelectionError('There is no current list of times to choose from');
    }

    if (selection.by === 'index') {
      const slot = proposal.slots[selection.index];
      if (!slot) {
        throw new StaleSelectionError(
          `Option ${selection.index + 1} is not one of the ${proposal.slots.length} times offered`
        );
      }
      return slot;
    }

    const slot = proposal.slots.find((candidate) => sameInstant(candidate.start, selection.start));
    if (!slot) {
      throw new StaleSelectionError(`${selection.start} is not one of the times offered`);
    }
    return slot;
  }

  private searchSteps(preference: TimeWindow): SearchStep[] {
    const { businessHours, searchHorizonDays, timezone } = this.config;
    const day = parseInstant(preference.start, timezone);
    const steps: SearchStep[] = [{ window: preference, widened: false }];

    const fullDay = workingWindowFor(day, businessHours);
    if (fullDay && !(sameInstant(fullDay.start, preference.start) && sameInstant(fullDay.end, preference.end))) {
      steps.push({ window: fullDay, widened: true });
    }

    for (const window of nextWorkingWindows(day, searchHorizonDays, businessHours)) {
      steps.push({ window, widened: true });
    }

    return steps;
  }
}
