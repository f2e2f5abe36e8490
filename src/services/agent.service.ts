import { DateTime } from 'luxon';
import { v4 as uuidv4 } from 'uuid';
import { AnthropicService } from './anthropic.service';
import { AvailabilityService } from './availability.service';
import { BookingService } from './booking.service';
import { CalendarFactory } from './calendar/calendar.factory';
import { TurnInterpreter } from './interpreter.service';
import { QualificationService } from './qualification.service';
import { SessionService, SessionStore } from './session.service';
import { BookingStateMachine } from './state-machine.service';
import { UnderstandingService } from './understanding.service';
import { BookingConfig, bookingConfigFromEnv, sessionLockSeconds } from '../config/booking';
import { env } from '../config/env';
import { OperatorAlertJobData, addOperatorAlert } from '../config/queue';
import { AgentResponse, IncomingMessage, LanguageUnderstanding } from '../types/agent';
import { CalendarGateway } from '../types/calendar';
import { BookingStage, ConversationState, Message, TERMINAL_STAGES } from '../types/conversation';
import { NotFoundError, SessionBusyError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { formatInstant, parseInstant } from '../utils/slots';

const MAX_TRANSCRIPT = 50;

export interface AgentDependencies {
  config: BookingConfig;
  gateway: CalendarGateway;
  sessions: SessionStore;
  anthropic: AnthropicService;
  understanding: LanguageUnderstanding;
  machine: BookingStateMachine;
  interpreter: TurnInterpreter;
  alert: (data: OperatorAlertJobData) => Promise<void>;
  clock: () => DateTime;
}

/** Wires the booking services from the environment; anything passed in is used as-is. */
export function createAgentDependencies(overrides: Partial<AgentDependencies> = {}): AgentDependencies {
  const config = overrides.config ?? bookingConfigFromEnv(env);
  const clock = overrides.clock ?? (() => DateTime.now());
  const gateway =
    overrides.gateway ??
    CalendarFactory.create(env.CALENDAR_PROVIDER, {
      credentials: env.GOOGLE_CALENDAR_CREDENTIALS,
      calendarId: env.GOOGLE_CALENDAR_ID,
      timeoutMs: config.gatewayTimeoutMs,
    });

  const availability = new AvailabilityService(gateway, config);
  const anthropic = overrides.anthropic ?? new AnthropicService();
  const understanding = overrides.understanding ?? new UnderstandingService(anthropic, clock);

  return {
    config,
    gateway,
    anthropic,
    understanding,
    clock,
    sessions: overrides.sessions ?? new SessionService(sessionLockSeconds(config)),
    machine:
      overrides.machine ??
      new BookingStateMachine(
        new QualificationService(config),
        availability,
        new BookingService(gateway, availability, config, clock),
        config,
        clock
      ),
    interpreter: overrides.interpreter ?? new TurnInterpreter(understanding, clock),
    alert: overrides.alert ?? addOperatorAlert,
  };
}

function actionFor(stage: BookingStage): AgentResponse['action_taken'] {
  switch (stage) {
    case 'DONE':
      return 'booked';
    case 'ABANDONED':
      return 'abandoned';
    case 'FAILED':
      return 'failed';
    default:
      return 'advanced';
  }
}

export class AgentService {
  private deps: AgentDependencies;

  constructor(overrides: Partial<AgentDependencies> = {}) {
    this.deps = createAgentDependencies(overrides);
  }

  async startSession(): Promise<{ session_id: string; stage: BookingStage; prompt: string }> {
    const { machine, sessions } = this.deps;
    const state = machine.createInitialState(uuidv4());
    const prompt = machine.currentPrompt(state);

    await sessions.save(this.appendMessage(state, 'agent', prompt));
    logger.info('Session started', { sessionId: state.sessionId });

    return { session_id: state.sessionId, stage: state.stage, prompt };
  }

  async handleMessage(incoming: IncomingMessage): Promise<AgentResponse> {
    const sessionId = incoming.session_id ?? uuidv4();
    const { sessions } = this.deps;

    const lock = await sessions.acquireLock(sessionId);
    if (!lock) {
      throw new SessionBusyError(sessionId);
    }

    try {
      return await this.runTurn(sessionId, incoming.message);
    } catch (error) {
      logger.error('Failed to handle message', { sessionId, error: errorMessage(error) });
      throw error;
    } finally {
      await sessions.releaseLock(sessionId, lock);
    }
  }

  async abandonSession(sessionId: string): Promise<AgentResponse> {
    const { machine, sessions } = this.deps;

    const lock = await sessions.acquireLock(sessionId);
    if (!lock) {
      throw new SessionBusyError(sessionId);
    }

    try {
      const state = await sessions.get(sessionId);
      if (!state) throw new NotFoundError(`Session ${sessionId} not found`);

      const { prompt, state: next } = await machine.advance(state, { type: 'EXIT' });
      await sessions.delete(sessionId);
      logger.info('Session abandoned on request', { sessionId, stage: state.stage });

      return {
        success: true,
        session_id: sessionId,
        stage: next.stage,
        response: prompt,
        action_taken: 'abandoned',
        result: next.result,
      };
    } finally {
      await sessions.releaseLock(sessionId, lock);
    }
  }

  private async runTurn(sessionId: string, message: string): Promise<AgentResponse> {
    const { machine, sessions, interpreter, understanding, anthropic } = this.deps;
    const notices: string[] = [];

    let state = (await sessions.get(sessionId)) ?? machine.createInitialState(sessionId);

    if (this.isIdle(state)) {
      const timedOut = await machine.advance(state, { type: 'TIMEOUT' });
      logger.info('Idle session abandoned', { sessionId, stage: state.stage, updatedAt: state.updatedAt });
      notices.push(timedOut.prompt);
      state = machine.createInitialState(sessionId);
    }

    state = this.appendMessage(state, 'user', message);
    const event = await interpreter.interpret(message, state);

    let response: string;
    let actionTaken: AgentResponse['action_taken'];

    if (event.type === 'UNRECOGNIZED' && (await understanding.classifyIntent(message)) === 'RAG') {
      const inProgress = machine.isInProgress(state);
      const answer = await anthropic.answerQuestion(state.transcript, { bookingInProgress: inProgress });
      response = inProgress ? `${answer}\n\n${machine.currentPrompt(state)}` : answer;
      actionTaken = 'answered';
    } else {
      const advanced = await machine.advance(state, event);
      state = advanced.state;
      response = advanced.prompt;
      actionTaken = actionFor(state.stage);
    }

    if (notices.length > 0) {
      response = [...notices, response].join('\n\n');
    }
    state = this.appendMessage(state, 'agent', response);

    if (TERMINAL_STAGES.includes(state.stage)) {
      await sessions.delete(sessionId);
      await this.raiseAlert(state);
    } else {
      await sessions.save(state);
    }

    logger.info('Message handled', { sessionId, stage: state.stage, event: event.type, actionTaken });

    return {
      success: true,
      session_id: sessionId,
      stage: state.stage,
      response,
      action_taken: actionTaken,
      result: state.result,
    };
  }

  /** Only a session with booking details in it can time out; an empty one just continues. */
  private isIdle(state: ConversationState): boolean {
    if (!this.deps.machine.isInProgress(state)) return false;
    const updatedAt = parseInstant(state.updatedAt, this.deps.config.timezone);
    const idleMinutes = this.deps.clock().diff(updatedAt, 'minutes').minutes;
    return idleMinutes > this.deps.config.sessionIdleTimeoutMinutes;
  }

  private appendMessage(state: ConversationState, role: Message['role'], content: string): ConversationState {
    const message: Message = { role, content, created_at: formatInstant(this.deps.clock()) };
    return { ...state, transcript: [...state.transcript, message].slice(-MAX_TRANSCRIPT) };
  }

  private async raiseAlert(state: ConversationState): Promise<void> {
    const { result, sessionId } = state;

    if (state.stage === 'DONE' && result?.status === 'confirmed') {
      await this.deps.alert({
        type: 'booking_confirmed',
        sessionId,
        message: `Meeting booked for ${result.slot.start}`,
        metadata: { eventId: result.eventId, link: result.link },
      });
    } else if (state.stage === 'FAILED' && result?.status === 'failed') {
      await this.deps.alert({
        type: result.error === 'AUTH' ? 'auth_failure' : 'booking_failed',
        sessionId,
        message: result.message,
        metadata: { error: result.error },
      });
    }
  }
}
