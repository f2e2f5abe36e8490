import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().min(1).optional()
);

const clockTime = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'expected HH:mm');

const envSchema = z.object({
  PORT: z.string().default('3000'),
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  REDIS_URL: z.string().min(1),
  ANTHROPIC_API_KEY: z.string().min(1),
  API_KEYS: optionalString,
  SENTRY_DSN: optionalString,
  CALENDAR_PROVIDER: z.enum(['google']).default('google'),
  GOOGLE_CALENDAR_CREDENTIALS: optionalString,
  GOOGLE_CALENDAR_ID: z.string().default('primary'),
  BOOKING_TIMEZONE: z.string().default('Europe/Kyiv'),
  SLOT_DURATION_MINUTES: z.coerce.number().int().positive().default(30),
  WORKDAY_START: clockTime.default('09:00'),
  WORKDAY_END: clockTime.default('17:00'),
  GATEWAY_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  GATEWAY_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(2),
  GATEWAY_BACKOFF_MS: z.coerce.number().int().min(0).default(500),
  SEARCH_HORIZON_DAYS: z.coerce.number().int().min(0).max(14).default(3),
  SESSION_IDLE_TIMEOUT_MINUTES: z.coerce.number().int().positive().default(30),
  MEETING_SUMMARY: z.string().default('Intro call'),
});

export type Env = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env: Env = parsed.data;
