import { BookingSlot, TimeWindow } from './calendar';
import { BookingResult, CommitLedger, QualificationField, SlotProposal, UserInfoDraft } from './booking';

export type BookingStage =
  | 'QUALIFYING'
  | 'PROPOSING'
  | 'CONFIRMING'
  | 'BOOKING'
  | 'DONE'
  | 'ABANDONED'
  | 'FAILED';

export const TERMINAL_STAGES: readonly BookingStage[] = ['DONE', 'ABANDONED', 'FAILED'];

export interface Message {
  role: 'user' | 'agent';
  content: string;
  created_at: string;
}

export interface ConversationState {
  sessionId: string;
  stage: BookingStage;
  userInfo: UserInfoDraft;
  preferenceWindow: TimeWindow | null;
  proposal: SlotProposal | null;
  selectedSlot: BookingSlot | null;
  result: BookingResult | null;
  ledger: CommitLedger;
  gatewayFailures: number;
  transcript: Message[];
  createdAt: string;
  updatedAt: string;
}

export type SlotSelection = { by: 'index'; index: number } | { by: 'time'; start: string };

export interface ExtractedFields {
  name?: string | null;
  email?: string | null;
  timePreference?: string | null;
}

export type BookingEvent =
  | { type: 'PROVIDE_FIELDS'; fields: ExtractedFields }
  | { type: 'SELECT_SLOT'; selection: SlotSelection }
  | { type: 'CONFIRM' }
  | { type: 'REJECT' }
  | { type: 'CHANGE_PREFERENCE'; timePreference: string }
  | { type: 'EXIT' }
  | { type: 'TIMEOUT' }
  | { type: 'UNRECOGNIZED' };

export interface FieldIssue {
  field: QualificationField;
  message: string;
}

export interface AdvanceResult {
  prompt: string;
  state: ConversationState;
}
