import { DateTime } from 'luxon';
import { z } from 'zod';
import { AnthropicService } from './anthropic.service';
import { ExtractionContext, Intent, LanguageUnderstanding } from '../types/agent';
import { ExtractedFields } from '../types/conversation';
import { errorMessage } from '../utils/errors';
import { EMAIL_PATTERN, extractFieldsHeuristically } from '../utils/extraction';
import { logger } from '../utils/logger';
import { INTENT_PROMPT, buildExtractionPrompt } from '../utils/prompts';
import { looksLikeTimePreference } from '../utils/timePreference';

const BOOKING_KEYWORDS = /\b(book|booking|schedule|reschedule|meeting|meet|call|appointment|demo|available|availability|slot)\b/i;

const NULLISH_WORDS = ['null', 'none', 'n/a', 'unknown', ''];

const llmField = z
  .union([z.string(), z.null()])
  .optional()
  .transform((value) => (value == null || NULLISH_WORDS.includes(value.trim().toLowerCase()) ? null : value.trim()));

const extractionSchema = z.object({
  name: llmField,
  email: llmField,
  timePreference: llmField,
  // older prompt wording
  preferred_date: llmField,
});

export class UnderstandingService implements LanguageUnderstanding {
  constructor(
    private anthropic: AnthropicService = new AnthropicService(),
    private clock: () => DateTime = () => DateTime.now()
  ) {}

  async classifyIntent(utterance: string): Promise<Intent> {
    try {
      const { content } = await this.anthropic.complete(
        INTENT_PROMPT,
        [{ role: 'user', content: utterance, created_at: this.clock().toISO() ?? '' }],
        { maxTokens: 5, temperature: 0 }
      );
      const answer = content.trim().toUpperCase();
      if (answer.startsWith('BOOKING')) return 'BOOKING';
      if (answer.startsWith('RAG')) return 'RAG';
      logger.warn('Unexpected intent label, using keyword fallback', { answer });
    } catch (error) {
      logger.warn('Intent classification failed, using keyword fallback', { error: errorMessage(error) });
    }
    return this.classifyByKeywords(utterance);
  }

  classifyByKeywords(utterance: string): Intent {
    if (BOOKING_KEYWORDS.test(utterance) || EMAIL_PATTERN.test(utterance)) return 'BOOKING';
    if (looksLikeTimePreference(utterance, this.clock())) return 'BOOKING';
    return 'RAG';
  }

  /**
   * Model extraction merged over the regex/date-parser result. The email
   * found literally in the text wins over the model's.
   */
  async extractFields(utterance: string, context?: ExtractionContext): Promise<ExtractedFields> {
    const heuristic = extractFieldsHeuristically(utterance, context, this.clock());

    let model: ExtractedFields = {};
    try {
      const { content } = await this.anthropic.complete(
        'You extract structured booking details and reply with JSON only.',
        [{ role: 'user', content: buildExtractionPrompt(utterance, context), created_at: this.clock().toISO() ?? '' }],
        { maxTokens: 200, temperature: 0 }
      );
      model = this.parseExtraction(content);
    } catch (error) {
      logger.warn('Field extraction via model failed, using heuristics', { error: errorMessage(error) });
    }

    const fields: ExtractedFields = {
      name: model.name ?? heuristic.name ?? null,
      email: heuristic.email ?? model.email ?? null,
      timePreference: model.timePreference ?? heuristic.timePreference ?? null,
    };

    logger.debug('Fields extracted', {
      name: Boolean(fields.name),
      email: Boolean(fields.email),
      timePreference: fields.timePreference,
    });

    return fields;
  }

  private parseExtraction(content: string): ExtractedFields {
    const jsonMatch = content.match(/\{[^{}]*\}/);
    if (!jsonMatch) {
      logger.warn('No JSON found in extraction response', { content: content.slice(0, 200) });
      return {};
    }

    let raw: unknown;
    try {
      raw = JSON.parse(jsonMatch[0]);
    } catch (error) {
      logger.warn('Extraction response was not valid JSON', { error: errorMessage(error) });
      return {};
    }

    const parsed = extractionSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn('Extraction response had an unexpected shape', { issues: parsed.error.issues.length });
      return {};
    }

    const { name, email, timePreference, preferred_date } = parsed.data;
    return { name, email, timePreference: timePreference ?? preferred_date };
  }
}
