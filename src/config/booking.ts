import { BusinessHoursConfig, DEFAULT_BUSINESS_HOURS, weekdayHours } from '../utils/businessHours';
import { DEFAULT_SLOT_DURATION_MINUTES } from '../utils/slots';
import type { Env } from './env';

export interface BookingConfig {
  timezone: string;
  slotDurationMinutes: number;
  businessHours: BusinessHoursConfig;
  /** Slots shown per proposal. */
  minProposalSize: number;
  maxProposalSize: number;
  /** Extra working days searched when the requested window is short of slots. */
  searchHorizonDays: number;
  gatewayTimeoutMs: number;
  gatewayMaxAttempts: number;
  gatewayBackoffMs: number;
  /** Recoverable gateway failures tolerated per session before it is failed. */
  maxGatewayFailures: number;
  sessionIdleTimeoutMinutes: number;
  meetingSummary: string;
}

export const DEFAULT_BOOKING_CONFIG: BookingConfig = {
  timezone: 'Europe/Kyiv',
  slotDurationMinutes: DEFAULT_SLOT_DURATION_MINUTES,
  businessHours: DEFAULT_BUSINESS_HOURS,
  minProposalSize: 3,
  maxProposalSize: 5,
  searchHorizonDays: 3,
  gatewayTimeoutMs: 10000,
  gatewayMaxAttempts: 2,
  gatewayBackoffMs: 500,
  maxGatewayFailures: 3,
  sessionIdleTimeoutMinutes: 30,
  meetingSummary: 'Intro call',
};

export function bookingConfigFromEnv(env: Env): BookingConfig {
  return {
    ...DEFAULT_BOOKING_CONFIG,
    timezone: env.BOOKING_TIMEZONE,
    slotDurationMinutes: env.SLOT_DURATION_MINUTES,
    businessHours: weekdayHours(env.WORKDAY_START, env.WORKDAY_END),
    searchHorizonDays: env.SEARCH_HORIZON_DAYS,
    gatewayTimeoutMs: env.GATEWAY_TIMEOUT_MS,
    gatewayMaxAttempts: env.GATEWAY_MAX_ATTEMPTS,
    gatewayBackoffMs: env.GATEWAY_BACKOFF_MS,
    sessionIdleTimeoutMinutes: env.SESSION_IDLE_TIMEOUT_MINUTES,
    meetingSummary: env.MEETING_SUMMARY,
  };
}

const LOCK_MARGIN_SECONDS = 30;

/**
 * Seconds one turn may hold its session lock: a commit's re-check and create,
 * then a fresh proposal across every search step, each call with its full
 * retry budget.
 */
export function sessionLockSeconds(config: BookingConfig): number {
  const backoffMs = config.gatewayBackoffMs * (Math.pow(2, config.gatewayMaxAttempts - 1) - 1);
  const perCallMs = config.gatewayTimeoutMs * config.gatewayMaxAttempts + backoffMs;
  const calls = 2 + 2 + config.searchHorizonDays;
  return Math.ceil((perCallMs * calls) / 1000) + LOCK_MARGIN_SECONDS;
}
