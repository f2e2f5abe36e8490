import { BookingSlot, TimeWindow } from './calendar';

export type QualificationField = 'name' | 'email' | 'timePreference';

export interface UserInfo {
  name: string;
  email: string;
  timePreference: string;
}

export type UserInfoDraft = Partial<UserInfo>;

export interface SlotProposal {
  id: string;
  slots: BookingSlot[];
  /** Window the user asked for; slots may come from a wider search. */
  requestedWindow: TimeWindow;
  widened: boolean;
  generatedAt: string;
}

export interface BookingRequest {
  userInfo: UserInfo;
  slot: BookingSlot;
  idempotencyToken: string;
}

export type BookingErrorKind = 'SLOT_CONFLICT' | 'TRANSIENT' | 'AUTH' | 'REJECTED';

export interface ConfirmedBooking {
  status: 'confirmed';
  eventId: string;
  link: string | null;
  slot: BookingSlot;
  idempotencyToken: string;
  bookedAt: string;
}

export interface FailedBooking {
  status: 'failed';
  error: BookingErrorKind;
  recoverable: boolean;
  message: string;
}

export type BookingResult = ConfirmedBooking | FailedBooking;

/** Terminal results keyed by idempotency token, scoped to one conversation. */
export type CommitLedger = Record<string, BookingResult>;
