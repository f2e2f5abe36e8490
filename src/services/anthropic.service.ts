import Anthropic from '@anthropic-ai/sdk';
import { env } from '../config/env';
import { logger } from '../utils/logger';
import { Message } from '../types/conversation';
import { ServiceError, errorMessage, httpStatus, toError } from '../utils/errors';
import { KnowledgeContext, buildSystemPrompt } from '../utils/prompts';
import { MESSAGES } from '../utils/messages';
import { sleep } from '../utils/retry';

const anthropic = new Anthropic({ apiKey: env.ANTHROPIC_API_KEY });

const DEFAULT_MODEL = 'claude-3-5-haiku-latest';
const HISTORY_LIMIT = 10;

export interface CompletionOptions {
  maxTokens?: number;
  temperature?: number;
}

export interface Completion {
  content: string;
  tokensUsed: { prompt: number; completion: number };
}

function toMessageParams(messages: Message[]): Anthropic.MessageParam[] {
  const recent = messages.slice(-HISTORY_LIMIT);
  // The conversation sent to the model has to open with a user turn
  const firstUser = recent.findIndex((m) => m.role === 'user');
  if (firstUser === -1) return [];

  return recent.slice(firstUser).map((m): Anthropic.MessageParam => ({
    role: m.role === 'user' ? 'user' : 'assistant',
    content: m.content,
  }));
}

export class AnthropicService {
  async complete(system: string, messages: Message[], options: CompletionOptions = {}): Promise<Completion> {
    const params = toMessageParams(messages);
    if (params.length === 0) {
      throw new ServiceError('Anthropic', 'complete', new Error('No user message to respond to'), false);
    }

    const maxRetries = 3;
    let lastError: Error = new Error('Anthropic was not called');

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      try {
        const response = await anthropic.messages.create({
          model: DEFAULT_MODEL,
          system,
          messages: params,
          temperature: options.temperature ?? 0.7,
          max_tokens: options.maxTokens ?? 200,
        });

        const content = response.content
          .map((block) => (block.type === 'text' ? block.text : ''))
          .join('')
          .trim();

        const tokensUsed = {
          prompt: response.usage?.input_tokens || 0,
          completion: response.usage?.output_tokens || 0,
        };

        logger.debug('Anthropic response generated', { tokens: tokensUsed, attempt });
        return { content, tokensUsed };
      } catch (error) {
        lastError = toError(error);
        const status = httpStatus(error);

        if (status === 429) {
          const delay = Math.pow(2, attempt) * 1000;
          logger.warn('Anthropic rate limited, backing off', { attempt, delay });
          await sleep(delay);
          continue;
        }

        if (status === 400 || status === 401) {
          throw new ServiceError('Anthropic', 'complete', lastError, false);
        }

        logger.error('Anthropic error', { attempt, error: errorMessage(error) });
      }
    }

    throw new ServiceError('Anthropic', 'complete', lastError, true);
  }

  /** Answers a general question from the conversation so far; never throws. */
  async answerQuestion(transcript: Message[], context?: KnowledgeContext): Promise<string> {
    try {
      const { content } = await this.complete(buildSystemPrompt(context), transcript, { maxTokens: 300 });
      return content || MESSAGES.knowledgeFallback;
    } catch (error) {
      logger.error('Anthropic failed, using fallback answer', { error: errorMessage(error) });
      return MESSAGES.knowledgeFallback;
    }
  }
}
