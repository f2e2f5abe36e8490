import { BookingResult } from './booking';
import { BookingStage, ExtractedFields } from './conversation';

export type Intent = 'RAG' | 'BOOKING';

export interface ExtractionContext {
  /** Field the agent asked for last, used to read bare answers like "Dana". */
  awaiting?: 'name' | 'email' | 'timePreference';
  known: ExtractedFields;
}

export interface LanguageUnderstanding {
  classifyIntent(utterance: string): Promise<Intent>;
  extractFields(utterance: string, context?: ExtractionContext): Promise<ExtractedFields>;
}

export interface AgentResponse {
  success: boolean;
  session_id: string;
  stage: BookingStage | null;
  response: string;
  action_taken: 'answered' | 'advanced' | 'booked' | 'abandoned' | 'failed';
  result: BookingResult | null;
}

export interface IncomingMessage {
  session_id?: string;
  message: string;
}
