import { DateTime } from 'luxon';
import { ExtractionContext } from '../types/agent';
import { ExtractedFields } from '../types/conversation';
import { isAffirmative, isExit, isNegative } from './selection';
import { looksLikeTimePreference } from './timePreference';

export const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9-]+(?:\.[A-Za-z0-9-]+)*\.[A-Za-z]{2,}/;

// Intros that always introduce a name, and ones that only do when followed by a capitalized word
const STRONG_NAME_INTRO = /\b(?:my name is|my name's|name is|call me)\s+/i;
const WEAK_NAME_INTRO = /\b(?:i am|i'm|this is)\s+/i;
const NAME_BODY = /^([A-Za-z][A-Za-z'-]*(?:\s+[A-Z][A-Za-z'-]*){0,2})/;
const CAPITALIZED_NAME_BODY = /^([A-Z][A-Za-z'-]*(?:\s+[A-Z][A-Za-z'-]*){0,2})/;
const BARE_NAME = /^[A-Za-z][A-Za-z' .-]*$/;

const SEPARATORS = /^[\s,;:.!-]+|[\s,;:.!-]+$/g;

function nameAfter(text: string, intro: RegExp, body: RegExp): { name: string; phrase: string } | null {
  const introMatch = intro.exec(text);
  if (!introMatch) return null;

  const rest = text.slice(introMatch.index + introMatch[0].length);
  const bodyMatch = rest.match(body);
  if (!bodyMatch) return null;

  return { name: bodyMatch[1].trim(), phrase: introMatch[0] + bodyMatch[1] };
}

function looksLikeBareName(text: string, now: DateTime): boolean {
  const words = text.split(/\s+/);
  return (
    text.length > 1 &&
    text.length < 50 &&
    words.length <= 4 &&
    BARE_NAME.test(text) &&
    !isAffirmative(text) &&
    !isNegative(text) &&
    !isExit(text) &&
    !looksLikeTimePreference(text, now)
  );
}

/**
 * Pulls name, email and time preference out of a message with regexes and
 * date parsing. Used when the language model is unavailable and to fill
 * fields it missed.
 */
export function extractFieldsHeuristically(
  utterance: string,
  context: ExtractionContext | undefined,
  now: DateTime
): ExtractedFields {
  const fields: ExtractedFields = {};
  let remainder = utterance;

  const email = utterance.match(EMAIL_PATTERN);
  if (email) {
    fields.email = email[0];
    remainder = remainder.replace(email[0], ' ');
  }

  const introduced =
    nameAfter(remainder, STRONG_NAME_INTRO, NAME_BODY) ?? nameAfter(remainder, WEAK_NAME_INTRO, CAPITALIZED_NAME_BODY);
  if (introduced && !looksLikeTimePreference(introduced.name, now)) {
    fields.name = introduced.name;
    remainder = remainder.replace(introduced.phrase, ' ');
  }

  remainder = remainder.replace(/\s+/g, ' ').replace(SEPARATORS, '');

  if (remainder.length > 0 && looksLikeTimePreference(remainder, now)) {
    fields.timePreference = remainder;
    return fields;
  }

  // A short reply to a name question is the name itself
  const awaitingName = context?.awaiting === 'name' || (!context?.known.name && context?.known.email && context.known.timePreference);
  if (!fields.name && !fields.email && awaitingName && looksLikeBareName(remainder, now)) {
    fields.name = remainder;
  }

  return fields;
}

export function hasAnyField(fields: ExtractedFields): boolean {
  return Boolean(fields.name || fields.email || fields.timePreference);
}
