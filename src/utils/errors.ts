export class AppError extends Error {
  constructor(
    public statusCode: number,
    public message: string,
    public isOperational: boolean = true
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

export class ServiceError extends Error {
  constructor(
    public service: string,
    public operation: string,
    public originalError: Error,
    public retryable: boolean = true
  ) {
    super(`${service}.${operation} failed: ${originalError.message}`);
    Object.setPrototypeOf(this, ServiceError.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, public field?: string) {
    super(400, message, true);
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/** Credentials for the calendar are missing, unreadable or rejected. Never retried. */
export class AuthError extends AppError {
  constructor(message: string, public originalError?: Error) {
    super(502, message, false);
    Object.setPrototypeOf(this, AuthError.prototype);
  }
}

export type GatewayFailure = 'transient' | 'timeout' | 'auth' | 'rejected';

export class CalendarGatewayError extends ServiceError {
  constructor(
    operation: string,
    originalError: Error,
    public failure: GatewayFailure
  ) {
    super('calendar', operation, originalError, failure === 'transient' || failure === 'timeout');
    Object.setPrototypeOf(this, CalendarGatewayError.prototype);
  }
}

export class AvailabilityQueryError extends CalendarGatewayError {
  constructor(originalError: Error, failure: GatewayFailure) {
    super('queryBusy', originalError, failure);
    Object.setPrototypeOf(this, AvailabilityQueryError.prototype);
  }
}

export class BookingApiError extends CalendarGatewayError {
  constructor(originalError: Error, failure: GatewayFailure) {
    super('createEvent', originalError, failure);
    Object.setPrototypeOf(this, BookingApiError.prototype);
  }
}

export class TimeoutError extends Error {
  constructor(public operation: string, public timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

export class EmptyAvailabilityError extends AppError {
  constructor(public windowsSearched: number) {
    super(404, 'No free slots in the requested window', true);
    Object.setPrototypeOf(this, EmptyAvailabilityError.prototype);
  }
}

export class StaleSelectionError extends AppError {
  constructor(message: string) {
    super(409, message, true);
    Object.setPrototypeOf(this, StaleSelectionError.prototype);
  }
}

export class SlotConflictError extends AppError {
  constructor(public slotStart: string) {
    super(409, `Slot starting ${slotStart} is no longer free`, true);
    Object.setPrototypeOf(this, SlotConflictError.prototype);
  }
}

export class SessionBusyError extends AppError {
  constructor(public sessionId: string) {
    super(409, 'Another message for this session is still being processed', true);
    Object.setPrototypeOf(this, SessionBusyError.prototype);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(404, message, true);
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export function isAuthFailure(error: unknown): boolean {
  return (
    error instanceof AuthError ||
    (error instanceof CalendarGatewayError && error.failure === 'auth')
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** HTTP status carried by SDK errors (gaxios `response.status`, numeric `code`, or `status`). */
export function httpStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;

  if (
    'response' in error &&
    typeof error.response === 'object' &&
    error.response !== null &&
    'status' in error.response &&
    typeof error.response.status === 'number'
  ) {
    return error.response.status;
  }
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('code' in error && typeof error.code === 'number') return error.code;
  return undefined;
}

/** Node/network error code such as ECONNRESET, when present. */
export function networkCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Normalizes whatever a gateway call threw into the calendar error taxonomy.
 * Timeouts become recoverable failures; unknown errors are treated as transient.
 */
export function toGatewayError(error: unknown, operation: 'queryBusy' | 'createEvent'): Error {
  if (error instanceof AuthError || error instanceof CalendarGatewayError || error instanceof SlotConflictError) {
    return error;
  }

  const failure: GatewayFailure = error instanceof TimeoutError ? 'timeout' : 'transient';
  return operation === 'queryBusy'
    ? new AvailabilityQueryError(toError(error), failure)
    : new BookingApiError(toError(error), failure);
}

export function isRetryable(error: unknown): boolean {
  return error instanceof ServiceError && error.retryable;
}
