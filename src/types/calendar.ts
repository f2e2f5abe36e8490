/** Half-open range [start, end) in an IANA timezone. Instants are ISO-8601 with offset. */
export interface TimeWindow {
  start: string;
  end: string;
  timezone: string;
}

export interface BusyInterval {
  start: string;
  end: string;
}

export interface BookingSlot {
  start: string;
  end: string;
  timezone: string;
}

export interface CreatedEvent {
  eventId: string;
  link: string | null;
  status: string;
}

export interface CreateEventOptions {
  /** Stable key for the create call; a repeated call with the same key must not produce a second event. */
  idempotencyKey?: string;
  description?: string;
}

export interface CalendarGateway {
  queryBusy(window: TimeWindow): Promise<BusyInterval[]>;
  createEvent(
    slot: BookingSlot,
    organizerSummary: string,
    attendeeEmail: string,
    options?: CreateEventOptions
  ): Promise<CreatedEvent>;
}
