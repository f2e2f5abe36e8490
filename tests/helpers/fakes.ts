import { DateTime } from 'luxon';
import { BookingConfig, DEFAULT_BOOKING_CONFIG } from '../../src/config/booking';
import type { SessionStore } from '../../src/services/session.service';
import {
  BookingSlot,
  BusyInterval,
  CalendarGateway,
  CreateEventOptions,
  CreatedEvent,
  TimeWindow,
} from '../../src/types/calendar';
import { ConversationState } from '../../src/types/conversation';

export const TZ = 'America/New_York';

export const testConfig: BookingConfig = {
  ...DEFAULT_BOOKING_CONFIG,
  timezone: TZ,
  gatewayTimeoutMs: 1000,
  gatewayBackoffMs: 0,
};

export function at(iso: string): DateTime {
  return DateTime.fromISO(iso, { zone: TZ });
}

/** Clock that returns `current` until moved. */
export class TestClock {
  constructor(public current: DateTime) {}

  now = (): DateTime => this.current;

  advance(minutes: number): void {
    this.current = this.current.plus({ minutes });
  }
}

interface StoredEvent extends CreatedEvent {
  slot: BookingSlot;
  summary: string;
  attendeeEmail: string;
}

/**
 * Calendar held in memory. Events created with an idempotency key are
 * deduplicated the way the provider dedupes client-supplied event ids.
 */
export class FakeCalendarGateway implements CalendarGateway {
  busy: BusyInterval[] = [];
  events = new Map<string, StoredEvent>();
  queryCalls: TimeWindow[] = [];
  createCalls = 0;
  /** Consumed one per queryBusy call; undefined entries succeed. */
  queryFailures: (Error | undefined)[] = [];
  createFailures: (Error | undefined)[] = [];
  /** Calls that create the event but then fail as if the response was lost. */
  lostResponses = 0;

  async queryBusy(window: TimeWindow): Promise<BusyInterval[]> {
    this.queryCalls.push(window);
    const failure = this.queryFailures.shift();
    if (failure) throw failure;
    return [...this.busy];
  }

  async createEvent(
    slot: BookingSlot,
    summary: string,
    attendeeEmail: string,
    options: CreateEventOptions = {}
  ): Promise<CreatedEvent> {
    this.createCalls++;
    const failure = this.createFailures.shift();
    if (failure) throw failure;

    const key = options.idempotencyKey ?? `call-${this.createCalls}`;
    let event = this.events.get(key);
    if (!event) {
      const eventId = `evt-${this.events.size + 1}`;
      event = {
        eventId,
        link: `https://calendar.example.com/event/${eventId}`,
        status: 'confirmed',
        slot,
        summary,
        attendeeEmail,
      };
      this.events.set(key, event);
      this.busy.push({ start: slot.start, end: slot.end });
    }

    if (this.lostResponses > 0) {
      this.lostResponses--;
      throw new Error('socket hang up');
    }

    return { eventId: event.eventId, link: event.link, status: event.status };
  }
}

export class InMemorySessionStore implements SessionStore {
  sessions = new Map<string, ConversationState>();
  locks = new Map<string, string>();
  private lockCount = 0;

  async get(sessionId: string): Promise<ConversationState | null> {
    const stored = this.sessions.get(sessionId);
    return stored ? structuredClone(stored) : null;
  }

  async save(state: ConversationState): Promise<void> {
    this.sessions.set(state.sessionId, structuredClone(state));
  }

  async delete(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId);
  }

  async acquireLock(sessionId: string): Promise<string | null> {
    if (this.locks.has(sessionId)) return null;
    const owner = `lock-${++this.lockCount}`;
    this.locks.set(sessionId, owner);
    return owner;
  }

  async releaseLock(sessionId: string, owner: string): Promise<void> {
    if (this.locks.get(sessionId) === owner) this.locks.delete(sessionId);
  }
}
