import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { redis } from '../config/redis';
import { ConversationState } from '../types/conversation';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const SESSION_TTL = 86400; // 24 hours
const DEFAULT_LOCK_TTL = 180;
const KEY_PREFIX = 'session:';
const LOCK_PREFIX = 'session-lock:';

// Deletes the lock only while it still carries the caller's owner token
const RELEASE_LOCK_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
end
return 0
`;

const slotSchema = z.object({
  start: z.string(),
  end: z.string(),
  timezone: z.string(),
});

const resultSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('confirmed'),
    eventId: z.string(),
    link: z.string().nullable(),
    slot: slotSchema,
    idempotencyToken: z.string(),
    bookedAt: z.string(),
  }),
  z.object({
    status: z.literal('failed'),
    error: z.enum(['SLOT_CONFLICT', 'TRANSIENT', 'AUTH', 'REJECTED']),
    recoverable: z.boolean(),
    message: z.string(),
  }),
]);

const stateSchema: z.ZodType<ConversationState> = z.object({
  sessionId: z.string(),
  stage: z.enum(['QUALIFYING', 'PROPOSING', 'CONFIRMING', 'BOOKING', 'DONE', 'ABANDONED', 'FAILED']),
  userInfo: z.object({
    name: z.string().optional(),
    email: z.string().optional(),
    timePreference: z.string().optional(),
  }),
  preferenceWindow: slotSchema.nullable(),
  proposal: z
    .object({
      id: z.string(),
      slots: z.array(slotSchema),
      requestedWindow: slotSchema,
      widened: z.boolean(),
      generatedAt: z.string(),
    })
    .nullable(),
  selectedSlot: slotSchema.nullable(),
  result: resultSchema.nullable(),
  ledger: z.record(resultSchema),
  gatewayFailures: z.number().int().min(0),
  transcript: z.array(
    z.object({
      role: z.enum(['user', 'agent']),
      content: z.string(),
      created_at: z.string(),
    })
  ),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export interface SessionStore {
  get(sessionId: string): Promise<ConversationState | null>;
  save(state: ConversationState): Promise<void>;
  delete(sessionId: string): Promise<void>;
  /** Owner token of the new lock, or null when another turn holds it. */
  acquireLock(sessionId: string): Promise<string | null>;
  releaseLock(sessionId: string, owner: string): Promise<void>;
}

/** ConversationState persisted in Redis under `session:<id>`. */
export class SessionService implements SessionStore {
  constructor(private lockTtlSeconds: number = DEFAULT_LOCK_TTL) {}

  async get(sessionId: string): Promise<ConversationState | null> {
    const data = await redis.get(`${KEY_PREFIX}${sessionId}`);
    if (!data) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch (error) {
      logger.warn('Discarding unreadable session', { sessionId, error: errorMessage(error) });
      return null;
    }

    const parsed = stateSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn('Discarding session with unexpected shape', { sessionId, issues: parsed.error.issues.length });
      return null;
    }
    return parsed.data;
  }

  async save(state: ConversationState): Promise<void> {
    await redis.set(`${KEY_PREFIX}${state.sessionId}`, JSON.stringify(state), { EX: SESSION_TTL });
  }

  async delete(sessionId: string): Promise<void> {
    await redis.del(`${KEY_PREFIX}${sessionId}`);
  }

  /** Claims the session for one turn. */
  async acquireLock(sessionId: string): Promise<string | null> {
    const owner = uuidv4();
    const result = await redis.set(`${LOCK_PREFIX}${sessionId}`, owner, { NX: true, EX: this.lockTtlSeconds });
    return result === 'OK' ? owner : null;
  }

  async releaseLock(sessionId: string, owner: string): Promise<void> {
    try {
      const released = await redis.eval(RELEASE_LOCK_SCRIPT, {
        keys: [`${LOCK_PREFIX}${sessionId}`],
        arguments: [owner],
      });
      if (released === 0) {
        logger.warn('Session lock expired before the turn released it', { sessionId });
      }
    } catch (error) {
      // The lock expires on its own after lockTtlSeconds
      logger.warn('Session lock release failed', { sessionId, error: errorMessage(error) });
    }
  }
}
