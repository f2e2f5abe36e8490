jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { AvailabilityService } from '../../src/services/availability.service';
import { BookingService } from '../../src/services/booking.service';
import { QualificationService } from '../../src/services/qualification.service';
import { BookingStateMachine } from '../../src/services/state-machine.service';
import { ConversationState } from '../../src/types/conversation';
import { AuthError } from '../../src/utils/errors';
import { MESSAGES } from '../../src/utils/messages';
import { FakeCalendarGateway, TestClock, at, testConfig } from '../helpers/fakes';

const AFTERNOON_LIST =
  '1. Tue, Oct 20, 14:00-14:30\n' +
  '2. Tue, Oct 20, 14:30-15:00\n' +
  '3. Tue, Oct 20, 15:00-15:30\n' +
  '4. Tue, Oct 20, 15:30-16:00\n' +
  '5. Tue, Oct 20, 16:00-16:30';

const FIELDS = { name: 'Dana Whitfield', email: 'dana@example.com', timePreference: 'tomorrow afternoon' };

describe('BookingStateMachine', () => {
  let gateway: FakeCalendarGateway;
  let clock: TestClock;
  let machine: BookingStateMachine;

  beforeEach(() => {
    gateway = new FakeCalendarGateway();
    clock = new TestClock(at('2026-10-19T10:00:00'));
    const availability = new AvailabilityService(gateway, testConfig);
    machine = new BookingStateMachine(
      new QualificationService(testConfig),
      availability,
      new BookingService(gateway, availability, testConfig, clock.now),
      testConfig,
      clock.now
    );
  });

  async function proposed(): Promise<ConversationState> {
    const { state } = await machine.advance(machine.createInitialState('session-1'), {
      type: 'PROVIDE_FIELDS',
      fields: FIELDS,
    });
    return state;
  }

  async function selected(index = 0): Promise<ConversationState> {
    const { state } = await machine.advance(await proposed(), {
      type: 'SELECT_SLOT',
      selection: { by: 'index', index },
    });
    return state;
  }

  describe('qualifying', () => {
    it('should start with an empty qualifying state', () => {
      const state = machine.createInitialState('session-1');

      expect(state).toMatchObject({ stage: 'QUALIFYING', userInfo: {}, proposal: null, gatewayFailures: 0 });
      expect(state.createdAt).toBe('2026-10-19T10:00:00-04:00');
      expect(machine.isInProgress(state)).toBe(false);
    });

    it('should ask for the fields that are still missing', async () => {
      const { prompt, state } = await machine.advance(machine.createInitialState('session-1'), {
        type: 'PROVIDE_FIELDS',
        fields: { name: 'Dana' },
      });

      expect(state.stage).toBe('QUALIFYING');
      expect(state.userInfo).toEqual({ name: 'Dana' });
      expect(prompt).toBe('Could you share your email address and a day or time that suits you?');
      expect(machine.isInProgress(state)).toBe(true);
    });

    it('should propose slots once every field is known', async () => {
      const { prompt, state } = await machine.advance(machine.createInitialState('session-1'), {
        type: 'PROVIDE_FIELDS',
        fields: FIELDS,
      });

      expect(state.stage).toBe('CONFIRMING');
      expect(state.proposal?.slots).toHaveLength(5);
      expect(prompt).toBe(
        `Here are the open times I found (America/New_York):\n${AFTERNOON_LIST}\nWhich one works best? Just reply with the number.`
      );
    });

    it('should go back to qualifying without the preference when nothing is free', async () => {
      gateway.busy = [{ start: '2026-10-19T00:00:00-04:00', end: '2026-10-31T00:00:00-04:00' }];

      const { prompt, state } = await machine.advance(machine.createInitialState('session-1'), {
        type: 'PROVIDE_FIELDS',
        fields: FIELDS,
      });

      expect(state.stage).toBe('QUALIFYING');
      expect(state.userInfo).toEqual({ name: 'Dana Whitfield', email: 'dana@example.com' });
      expect(state.preferenceWindow).toBeNull();
      expect(prompt).toBe(
        'I don\'t see any open times for "tomorrow afternoon" or the next few working days. What other day or time would suit you?'
      );
    });
  });

  describe('confirming', () => {
    it('should restate the selected slot', async () => {
      const { prompt, state } = await machine.advance(await proposed(), {
        type: 'SELECT_SLOT',
        selection: { by: 'index', index: 1 },
      });

      expect(state.selectedSlot?.start).toBe('2026-10-20T14:30:00-04:00');
      expect(prompt).toBe(
        'Just to confirm: Intro call on Tue, Oct 20, 14:30-15:00 (America/New_York) for Dana Whitfield <dana@example.com>. Shall I book it? (yes/no)'
      );
    });

    it('should re-list the slots for a choice that was not offered', async () => {
      const { prompt, state } = await machine.advance(await proposed(), {
        type: 'SELECT_SLOT',
        selection: { by: 'index', index: 8 },
      });

      expect(state.stage).toBe('CONFIRMING');
      expect(state.selectedSlot).toBeNull();
      expect(prompt).toBe(
        `Sorry, that isn't one of the times I offered. These are still open:\n${AFTERNOON_LIST}\nWhich one works best? Just reply with the number.`
      );
    });

    it('should ask for a number when confirming without a choice', async () => {
      const { prompt } = await machine.advance(await proposed(), { type: 'CONFIRM' });

      expect(prompt).toBe(`${MESSAGES.pickSlot}\n${AFTERNOON_LIST}`);
    });

    it('should show the options again when the selected slot is refused', async () => {
      const { prompt, state } = await machine.advance(await selected(), { type: 'REJECT' });

      expect(state.stage).toBe('CONFIRMING');
      expect(state.selectedSlot).toBeNull();
      expect(prompt.startsWith('No problem, here are the options again. Here are the open times I found')).toBe(true);
    });

    it('should ask for a new time when the whole list is refused', async () => {
      const { prompt, state } = await machine.advance(await proposed(), { type: 'REJECT' });

      expect(state.stage).toBe('QUALIFYING');
      expect(state.userInfo).toEqual({ name: 'Dana Whitfield', email: 'dana@example.com' });
      expect(state.proposal).toBeNull();
      expect(prompt).toBe(MESSAGES.askNewTime);
    });

    it('should search again when the preference changes', async () => {
      const { state } = await machine.advance(await selected(), {
        type: 'CHANGE_PREFERENCE',
        timePreference: 'Wednesday morning',
      });

      expect(state.stage).toBe('CONFIRMING');
      expect(state.selectedSlot).toBeNull();
      expect(state.userInfo.timePreference).toBe('Wednesday morning');
      expect(state.proposal?.slots[0].start).toBe('2026-10-21T09:00:00-04:00');
    });

    it('should point out an invalid correction and keep the current choice', async () => {
      const { prompt, state } = await machine.advance(await proposed(), {
        type: 'PROVIDE_FIELDS',
        fields: { email: 'dana@' },
      });

      expect(state.userInfo.email).toBe('dana@example.com');
      expect(prompt).toBe(`"dana@" doesn't look like a valid email address. ${MESSAGES.pickSlot}\n${AFTERNOON_LIST}`);
    });
  });

  describe('booking', () => {
    it('should book the selected slot on confirmation', async () => {
      const { prompt, state } = await machine.advance(await selected(1), { type: 'CONFIRM' });

      expect(state.stage).toBe('DONE');
      expect(state.result).toMatchObject({ status: 'confirmed', eventId: 'evt-1' });
      expect(Object.keys(state.ledger)).toHaveLength(1);
      expect(prompt).toBe(
        "All set! You're booked for Tue, Oct 20, 14:30-15:00 (America/New_York). An invitation is on its way to dana@example.com.\n" +
          'Event: https://calendar.example.com/event/evt-1'
      );
    });

    it('should ignore events after the booking is done', async () => {
      const done = (await machine.advance(await selected(1), { type: 'CONFIRM' })).state;

      const { prompt, state } = await machine.advance(done, { type: 'CONFIRM' });

      expect(state).toBe(done);
      expect(prompt).toBe('Your meeting is already booked. Tue, Oct 20, 14:30-15:00 (America/New_York).');
      expect(gateway.createCalls).toBe(1);
    });

    it('should propose again when the slot was taken meanwhile', async () => {
      const state = await selected(0);
      gateway.busy.push({ start: '2026-10-20T14:00:00-04:00', end: '2026-10-20T14:30:00-04:00' });

      const next = await machine.advance(state, { type: 'CONFIRM' });

      expect(next.state.stage).toBe('CONFIRMING');
      expect(next.state.selectedSlot).toBeNull();
      expect(next.state.proposal?.slots[0].start).toBe('2026-10-20T14:30:00-04:00');
      expect(next.prompt.startsWith('Sorry, that time just became unavailable. Here are the open times I found')).toBe(
        true
      );
    });

    it('should not book a slot that started while the user was deciding', async () => {
      const state = await selected(0);
      clock.current = at('2026-10-20T14:15:00');

      const next = await machine.advance(state, { type: 'CONFIRM' });

      expect(gateway.createCalls).toBe(0);
      expect(next.state.stage).toBe('CONFIRMING');
      expect(next.state.selectedSlot).toBeNull();
      expect(next.state.proposal?.slots.map((slot) => slot.start)).toEqual([
        '2026-10-20T14:30:00-04:00',
        '2026-10-20T15:00:00-04:00',
        '2026-10-20T15:30:00-04:00',
        '2026-10-20T16:00:00-04:00',
        '2026-10-20T16:30:00-04:00',
      ]);
      expect(next.prompt.startsWith('Sorry, that time just became unavailable.')).toBe(true);
    });

    it('should keep the choice and ask again after a transient failure', async () => {
      gateway.createFailures = [new Error('ECONNRESET'), new Error('ECONNRESET')];

      const failed = await machine.advance(await selected(0), { type: 'CONFIRM' });

      expect(failed.state.stage).toBe('CONFIRMING');
      expect(failed.state.gatewayFailures).toBe(1);
      expect(failed.state.selectedSlot?.start).toBe('2026-10-20T14:00:00-04:00');
      expect(failed.prompt).toBe(MESSAGES.bookingRetry);

      const retried = await machine.advance(failed.state, { type: 'CONFIRM' });
      expect(retried.state.stage).toBe('DONE');
      expect(gateway.events.size).toBe(1);
    });

    it('should fail on an auth error', async () => {
      gateway.queryFailures = [new AuthError('GOOGLE_CALENDAR_CREDENTIALS not configured')];

      const { prompt, state } = await machine.advance(machine.createInitialState('session-1'), {
        type: 'PROVIDE_FIELDS',
        fields: FIELDS,
      });

      expect(state.stage).toBe('FAILED');
      expect(state.result).toEqual({
        status: 'failed',
        error: 'AUTH',
        recoverable: false,
        message: 'The calendar refused our credentials.',
      });
      expect(prompt).toBe(MESSAGES.failed);
    });

    it('should fail once the calendar stays unreachable', async () => {
      gateway.queryFailures = Array.from({ length: 8 }, () => new Error('ECONNRESET'));

      let outcome = await machine.advance(machine.createInitialState('session-1'), {
        type: 'PROVIDE_FIELDS',
        fields: FIELDS,
      });
      expect(outcome.state).toMatchObject({ stage: 'PROPOSING', gatewayFailures: 1 });
      expect(outcome.prompt).toBe(MESSAGES.calendarUnavailable);

      for (let i = 0; i < 3; i++) {
        outcome = await machine.advance(outcome.state, { type: 'UNRECOGNIZED' });
      }

      expect(outcome.state.stage).toBe('FAILED');
      expect(outcome.state.gatewayFailures).toBe(4);
      expect(outcome.state.result).toMatchObject({ error: 'TRANSIENT', recoverable: false });
    });
  });

  describe('leaving', () => {
    it('should abandon on exit from any open stage', async () => {
      const { prompt, state } = await machine.advance(await selected(), { type: 'EXIT' });

      expect(state.stage).toBe('ABANDONED');
      expect(state.proposal).toBeNull();
      expect(prompt).toBe(MESSAGES.exited);
    });

    it('should abandon on timeout', async () => {
      const { prompt, state } = await machine.advance(await proposed(), { type: 'TIMEOUT' });

      expect(state.stage).toBe('ABANDONED');
      expect(prompt).toBe(MESSAGES.timedOut);
    });

    it('should ask again instead of booking when a stored turn stopped mid-booking', async () => {
      const interrupted: ConversationState = { ...(await selected(0)), stage: 'BOOKING' };

      const { prompt, state } = await machine.advance(interrupted, { type: 'UNRECOGNIZED' });

      expect(state.stage).toBe('CONFIRMING');
      expect(gateway.createCalls).toBe(0);
      expect(prompt).toBe(
        `${MESSAGES.reconfirm} Just to confirm: Intro call on Tue, Oct 20, 14:00-14:30 (America/New_York) for Dana Whitfield <dana@example.com>. Shall I book it? (yes/no)`
      );
    });

    it('should stamp updatedAt from the clock', async () => {
      const state = await proposed();
      clock.advance(5);

      const next = await machine.advance(state, { type: 'UNRECOGNIZED' });

      expect(next.state.updatedAt).toBe('2026-10-19T10:05:00-04:00');
    });
  });
});
