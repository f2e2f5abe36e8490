jest.mock('../../src/config/env', () => ({
  env: {
    NODE_ENV: 'test',
    REDIS_URL: 'redis://localhost:6379',
    ANTHROPIC_API_KEY: 'test-key',
  },
}));

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

// Sessions and alerts are handed in-memory stand-ins below
jest.mock('../../src/config/redis', () => ({ redis: {} }));
jest.mock('../../src/config/queue', () => ({ addOperatorAlert: jest.fn() }));

jest.mock('@anthropic-ai/sdk', () => ({
  __esModule: true,
  default: jest.fn().mockImplementation(() => ({
    messages: { create: jest.fn() },
  })),
}));

import { AgentService } from '../../src/services/agent.service';
import { AnthropicService } from '../../src/services/anthropic.service';
import { AuthError, NotFoundError, ServiceError, SessionBusyError } from '../../src/utils/errors';
import { MESSAGES } from '../../src/utils/messages';
import { FakeCalendarGateway, InMemorySessionStore, TestClock, at, testConfig } from '../helpers/fakes';

const AFTERNOON_LIST =
  '1. Tue, Oct 20, 14:00-14:30\n' +
  '2. Tue, Oct 20, 14:30-15:00\n' +
  '3. Tue, Oct 20, 15:00-15:30\n' +
  '4. Tue, Oct 20, 15:30-16:00\n' +
  '5. Tue, Oct 20, 16:00-16:30';

const INTRODUCTION = "I'm Dana Whitfield, dana@example.com, tomorrow afternoon";

describe('Booking conversation', () => {
  let gateway: FakeCalendarGateway;
  let sessions: InMemorySessionStore;
  let clock: TestClock;
  let anthropic: AnthropicService;
  let alert: jest.Mock;
  let agent: AgentService;

  beforeEach(() => {
    gateway = new FakeCalendarGateway();
    sessions = new InMemorySessionStore();
    clock = new TestClock(at('2026-10-19T10:00:00'));
    anthropic = new AnthropicService();
    // The model is down for these conversations; heuristics and fallbacks take over
    jest
      .spyOn(anthropic, 'complete')
      .mockRejectedValue(new ServiceError('Anthropic', 'complete', new Error('overloaded')));
    alert = jest.fn().mockResolvedValue(undefined);

    agent = new AgentService({ config: testConfig, gateway, sessions, anthropic, alert, clock: clock.now });
  });

  async function introduce(): Promise<string> {
    const { session_id } = await agent.startSession();
    await agent.handleMessage({ session_id, message: INTRODUCTION });
    return session_id;
  }

  it('should open a session by asking for the booking details', async () => {
    const session = await agent.startSession();

    expect(session.stage).toBe('QUALIFYING');
    expect(session.prompt).toBe(
      "I'd be happy to set up a meeting. Could you share your name, email, and a day or time that suits you?"
    );
    expect(sessions.sessions.get(session.session_id)?.transcript).toEqual([
      { role: 'agent', content: session.prompt, created_at: '2026-10-19T10:00:00-04:00' },
    ]);
  });

  it('should book a meeting from introduction to confirmation', async () => {
    const { session_id } = await agent.startSession();

    const proposal = await agent.handleMessage({ session_id, message: INTRODUCTION });
    expect(proposal).toEqual({
      success: true,
      session_id,
      stage: 'CONFIRMING',
      response: `Here are the open times I found (America/New_York):\n${AFTERNOON_LIST}\nWhich one works best? Just reply with the number.`,
      action_taken: 'advanced',
      result: null,
    });

    const confirmation = await agent.handleMessage({ session_id, message: '2' });
    expect(confirmation.response).toBe(
      'Just to confirm: Intro call on Tue, Oct 20, 14:30-15:00 (America/New_York) for Dana Whitfield <dana@example.com>. Shall I book it? (yes/no)'
    );

    const booked = await agent.handleMessage({ session_id, message: 'yes' });
    expect(booked.stage).toBe('DONE');
    expect(booked.action_taken).toBe('booked');
    expect(booked.result).toMatchObject({ status: 'confirmed', eventId: 'evt-1' });
    expect(booked.response).toBe(
      "All set! You're booked for Tue, Oct 20, 14:30-15:00 (America/New_York). An invitation is on its way to dana@example.com.\n" +
        'Event: https://calendar.example.com/event/evt-1'
    );

    expect(gateway.events.size).toBe(1);
    expect(sessions.sessions.has(session_id)).toBe(false);
    expect(alert).toHaveBeenCalledWith({
      type: 'booking_confirmed',
      sessionId: session_id,
      message: 'Meeting booked for 2026-10-20T14:30:00-04:00',
      metadata: { eventId: 'evt-1', link: 'https://calendar.example.com/event/evt-1' },
    });
  });

  it('should keep the transcript of each turn', async () => {
    const sessionId = await introduce();

    const stored = sessions.sessions.get(sessionId);
    expect(stored?.transcript.map((m) => m.role)).toEqual(['agent', 'user', 'agent']);
    expect(stored?.transcript[1].content).toBe(INTRODUCTION);
  });

  it('should answer a question without a booking in progress', async () => {
    jest.spyOn(anthropic, 'answerQuestion').mockResolvedValue('We are open Monday to Friday, 9 to 5.');

    const reply = await agent.handleMessage({ message: 'What are your opening hours?' });

    expect(reply.action_taken).toBe('answered');
    expect(reply.stage).toBe('QUALIFYING');
    expect(reply.response).toBe('We are open Monday to Friday, 9 to 5.');
    expect(sessions.sessions.has(reply.session_id)).toBe(true);
  });

  it('should pick the booking back up after answering a question', async () => {
    const sessionId = await introduce();
    const answer = jest.spyOn(anthropic, 'answerQuestion').mockResolvedValue('Yes, all our calls are remote.');

    const reply = await agent.handleMessage({ session_id: sessionId, message: 'Do you offer remote calls?' });

    expect(reply.action_taken).toBe('answered');
    expect(reply.stage).toBe('CONFIRMING');
    expect(reply.response).toBe(`Yes, all our calls are remote.\n\n${MESSAGES.pickSlot}\n${AFTERNOON_LIST}`);
    expect(answer).toHaveBeenCalledWith(expect.any(Array), { bookingInProgress: true });
  });

  it('should start over after the session sat idle too long', async () => {
    const sessionId = await introduce();
    clock.advance(31);

    const reply = await agent.handleMessage({ session_id: sessionId, message: 'Dana' });

    expect(reply.stage).toBe('QUALIFYING');
    expect(reply.response).toBe(
      `${MESSAGES.timedOut}\n\nCould you share your email address and a day or time that suits you?`
    );
    expect(sessions.sessions.get(sessionId)?.userInfo).toEqual({ name: 'Dana' });
  });

  it('should refuse a second message while a turn is running', async () => {
    const sessionId = await introduce();
    sessions.locks.set(sessionId, 'lock-held');

    await expect(agent.handleMessage({ session_id: sessionId, message: '1' })).rejects.toBeInstanceOf(
      SessionBusyError
    );
    expect(sessions.locks.get(sessionId)).toBe('lock-held');
  });

  it('should abandon a session on request', async () => {
    const sessionId = await introduce();

    const reply = await agent.abandonSession(sessionId);

    expect(reply).toMatchObject({ stage: 'ABANDONED', action_taken: 'abandoned', response: MESSAGES.exited });
    expect(sessions.sessions.has(sessionId)).toBe(false);
    expect(sessions.locks.has(sessionId)).toBe(false);
    expect(alert).not.toHaveBeenCalled();
  });

  it('should report an unknown session when abandoning', async () => {
    await expect(agent.abandonSession('missing')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should fail the conversation and alert operators when calendar access is refused', async () => {
    gateway.queryFailures = [new AuthError('GOOGLE_CALENDAR_CREDENTIALS not configured')];
    const { session_id } = await agent.startSession();

    const reply = await agent.handleMessage({ session_id, message: INTRODUCTION });

    expect(reply).toMatchObject({ stage: 'FAILED', action_taken: 'failed', response: MESSAGES.failed });
    expect(alert).toHaveBeenCalledWith({
      type: 'auth_failure',
      sessionId: session_id,
      message: 'The calendar refused our credentials.',
      metadata: { error: 'AUTH' },
    });
    expect(sessions.sessions.has(session_id)).toBe(false);
  });

  it('should leave the user an exit at any point', async () => {
    const sessionId = await introduce();

    const reply = await agent.handleMessage({ session_id: sessionId, message: 'stop' });

    expect(reply).toMatchObject({ stage: 'ABANDONED', action_taken: 'abandoned', response: MESSAGES.exited });
    expect(gateway.createCalls).toBe(0);
  });
});
