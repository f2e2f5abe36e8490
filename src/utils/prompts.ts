import { ExtractionContext } from '../types/agent';

const BASE_PROMPT = `You are a friendly, professional scheduling assistant. You answer questions about our services and help people book a meeting with our team.

RULES:
- Keep responses short: two or three sentences
- Be warm and helpful but concise
- Never invent meeting times; availability only comes from the calendar
- Never claim a meeting is booked
- If you don't know the answer, say so and offer to book a call with the team

TONE: Friendly, helpful, not pushy.`;

export interface KnowledgeContext {
  /** Passages retrieved for the question, if any. */
  passages?: string[];
  bookingInProgress?: boolean;
}

export function buildSystemPrompt(context?: KnowledgeContext | null): string {
  const parts: string[] = [BASE_PROMPT];

  if (context?.passages && context.passages.length > 0) {
    parts.push(`\nREFERENCE MATERIAL (answer from this where it applies):\n${context.passages.join('\n---\n')}`);
  }

  if (context?.bookingInProgress) {
    parts.push('\nThe user is in the middle of booking a meeting. Answer briefly and remind them where they left off.');
  }

  return parts.join('\n');
}

export const INTENT_PROMPT = `Classify the user's message for a scheduling assistant.

Reply with exactly one word:
- BOOKING if the user wants to book, schedule, arrange or reschedule a meeting or call, or is giving their name, email or a day/time for one
- RAG if the user is asking a question or making small talk

Reply with BOOKING or RAG only.`;

const FIELD_HINTS: Record<NonNullable<ExtractionContext['awaiting']>, string> = {
  name: 'The user is likely providing their NAME in response to a question.',
  email: 'The user is likely providing their EMAIL in response to a question.',
  timePreference: 'The user is likely providing their PREFERRED DATE/TIME.',
};

export function buildExtractionPrompt(utterance: string, context?: ExtractionContext): string {
  const known: string[] = [];
  if (context?.known.name) known.push(`Name already captured: ${context.known.name}`);
  if (context?.known.email) known.push(`Email provided: ${context.known.email}`);
  if (context?.known.timePreference) known.push(`Date requested: ${context.known.timePreference}`);

  const hint = context?.awaiting ? `\nIMPORTANT: ${FIELD_HINTS[context.awaiting]}` : '';
  const knownSection = known.length > 0 ? `\n\nBooking context:\n${known.join('\n')}` : '';

  return `You are extracting booking information from a user message. We are in the middle of a booking conversation.${hint}${knownSection}

User message: "${utterance}"

Return ONLY a valid JSON object with these exact fields:
{
  "name": "user's name (a first name alone is fine) or null",
  "email": "user's email address (must contain @) or null",
  "timePreference": "date/time preference in the user's words, like 'tomorrow afternoon' or 'Friday at 3pm', or null"
}

Rules:
- Only fill a field the user actually stated in this message
- If the message contains @, it's an email
- If the message contains day or time words (tomorrow, next week, 3pm), it's a time preference

Return ONLY the JSON, no other text:`;
}
