import { google, calendar_v3 } from 'googleapis';
import { GoogleAuth } from 'google-auth-library';
import { z } from 'zod';
import {
  BookingSlot,
  BusyInterval,
  CalendarGateway,
  CreateEventOptions,
  CreatedEvent,
  TimeWindow,
} from '../../types/calendar';
import {
  AuthError,
  AvailabilityQueryError,
  BookingApiError,
  GatewayFailure,
  SlotConflictError,
  TimeoutError,
  errorMessage,
  httpStatus,
  networkCode,
  toError,
} from '../../utils/errors';
import { logger } from '../../utils/logger';
import { sameInstant } from '../../utils/slots';

export interface GoogleCalendarConfig {
  /** Base64-encoded service account JSON. */
  credentials: string | undefined;
  calendarId: string;
  timeoutMs: number;
}

const serviceAccountSchema = z
  .object({
    client_email: z.string().min(1),
    private_key: z.string().min(1),
  })
  .passthrough();

const TIMEOUT_CODES = ['ETIMEDOUT', 'ECONNABORTED', 'ESOCKETTIMEDOUT'];
const NETWORK_CODES = ['ECONNRESET', 'ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE'];

export function classifyGoogleFailure(error: unknown): GatewayFailure {
  if (error instanceof TimeoutError) return 'timeout';

  const code = networkCode(error);
  if (code && TIMEOUT_CODES.includes(code)) return 'timeout';
  if (code && NETWORK_CODES.includes(code)) return 'transient';

  const status = httpStatus(error);
  if (status === undefined) return 'transient';
  if (status === 429 || status >= 500) return 'transient';
  if (status === 403 && /rate ?limit/i.test(errorMessage(error))) return 'transient';
  if (status === 401 || status === 403) return 'auth';
  return 'rejected';
}

/** Client-supplied event ids must be base32hex (a-v, 0-9), 5 to 1024 characters. */
export function toEventId(key: string): string | undefined {
  const id = key.toLowerCase().replace(/[^a-v0-9]/g, '');
  return id.length >= 5 ? id.slice(0, 1024) : undefined;
}

export class GoogleCalendarAdapter implements CalendarGateway {
  private calendar: calendar_v3.Calendar | null = null;
  private calendarId: string;
  private timeoutMs: number;

  constructor(private config: GoogleCalendarConfig) {
    this.calendarId = config.calendarId;
    this.timeoutMs = config.timeoutMs;
  }

  /** Builds the authenticated client on first use; credential problems surface as AuthError. */
  private client(): calendar_v3.Calendar {
    if (this.calendar) return this.calendar;

    if (!this.config.credentials) {
      throw new AuthError('GOOGLE_CALENDAR_CREDENTIALS not configured');
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(Buffer.from(this.config.credentials, 'base64').toString('utf8'));
    } catch (error) {
      throw new AuthError('GOOGLE_CALENDAR_CREDENTIALS is not base64-encoded JSON', toError(error));
    }

    const credentials = serviceAccountSchema.safeParse(decoded);
    if (!credentials.success) {
      throw new AuthError('GOOGLE_CALENDAR_CREDENTIALS is missing client_email or private_key');
    }

    const auth = new GoogleAuth({
      credentials: credentials.data,
      scopes: ['https://www.googleapis.com/auth/calendar'],
    });

    this.calendar = google.calendar({ version: 'v3', auth });
    return this.calendar;
  }

  async queryBusy(window: TimeWindow): Promise<BusyInterval[]> {
    const calendar = this.client();
    const response = await calendar.freebusy
      .query(
        {
          requestBody: {
            timeMin: window.start,
            timeMax: window.end,
            timeZone: window.timezone,
            items: [{ id: this.calendarId }],
          },
        },
        { timeout: this.timeoutMs }
      )
      .catch((error: unknown) => {
        const failure = classifyGoogleFailure(error);
        logger.warn('Google Calendar free/busy query failed', { failure, error: errorMessage(error) });
        throw new AvailabilityQueryError(toError(error), failure);
      });

    const entry = response.data.calendars?.[this.calendarId];
    const calendarErrors = entry?.errors ?? [];
    if (calendarErrors.length > 0) {
      const reason = calendarErrors.map((e) => e.reason ?? 'unknown').join(', ');
      // notFound/forbidden here means the service account cannot see the calendar
      const failure: GatewayFailure = /notFound|forbidden/i.test(reason) ? 'auth' : 'transient';
      throw new AvailabilityQueryError(new Error(`Calendar ${this.calendarId} returned: ${reason}`), failure);
    }

    const busy: BusyInterval[] = [];
    for (const period of entry?.busy ?? []) {
      if (period.start && period.end) {
        busy.push({ start: period.start, end: period.end });
      }
    }

    logger.debug('Google Calendar busy periods fetched', {
      timeMin: window.start,
      timeMax: window.end,
      busyCount: busy.length,
    });

    return busy;
  }

  async createEvent(
    slot: BookingSlot,
    organizerSummary: string,
    attendeeEmail: string,
    options: CreateEventOptions = {}
  ): Promise<CreatedEvent> {
    const calendar = this.client();
    const eventId = options.idempotencyKey ? toEventId(options.idempotencyKey) : undefined;

    let created: calendar_v3.Schema$Event;
    try {
      const result = await calendar.events.insert(
        {
          calendarId: this.calendarId,
          sendUpdates: 'all',
          requestBody: {
            id: eventId,
            summary: organizerSummary,
            description: options.description,
            start: { dateTime: slot.start, timeZone: slot.timezone },
            end: { dateTime: slot.end, timeZone: slot.timezone },
            attendees: [{ email: attendeeEmail }],
          },
        },
        { timeout: this.timeoutMs }
      );
      created = result.data;
    } catch (error) {
      if (eventId && httpStatus(error) === 409) {
        return this.fetchExisting(calendar, eventId, slot, attendeeEmail);
      }

      const failure = classifyGoogleFailure(error);
      logger.warn('Google Calendar event creation failed', { failure, error: errorMessage(error) });
      throw new BookingApiError(toError(error), failure);
    }

    logger.info('Google Calendar event created', { eventId: created.id });
    return this.toCreatedEvent(created);
  }

  /**
   * A 409 on a client-supplied id means the id is taken. It only counts as our
   * earlier attempt when the event is live and matches the slot and attendee.
   */
  private async fetchExisting(
    calendar: calendar_v3.Calendar,
    eventId: string,
    slot: BookingSlot,
    attendeeEmail: string
  ): Promise<CreatedEvent> {
    const existing = await calendar.events
      .get({ calendarId: this.calendarId, eventId }, { timeout: this.timeoutMs })
      .catch((error: unknown) => {
        throw new BookingApiError(toError(error), classifyGoogleFailure(error));
      });

    const event = existing.data;
    const email = attendeeEmail.toLowerCase();
    const matches =
      event.status !== 'cancelled' &&
      sameInstant(event.start?.dateTime ?? '', slot.start) &&
      (event.attendees ?? []).some((attendee) => attendee.email?.toLowerCase() === email);

    if (!matches) {
      logger.warn('Event id already used by a different event', { eventId, status: event.status });
      throw new SlotConflictError(slot.start);
    }

    logger.info('Google Calendar event already existed for idempotency key', { eventId });
    return this.toCreatedEvent(event);
  }

  private toCreatedEvent(event: calendar_v3.Schema$Event): CreatedEvent {
    if (!event.id) {
      throw new BookingApiError(new Error('Calendar returned an event without an id'), 'rejected');
    }
    return {
      eventId: event.id,
      link: event.htmlLink ?? null,
      status: event.status ?? 'confirmed',
    };
  }
}
