import { Queue, ConnectionOptions } from 'bullmq';
import { env } from './env';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

export const QUEUE_NAMES = {
  OPERATOR_ALERTS: 'operator-alerts',
} as const;

function parseRedisUrl(url: string): ConnectionOptions {
  const parsed = new URL(url);
  const host = parsed.hostname;
  const port = parsed.port ? parseInt(parsed.port, 10) : 6379;
  const password = parsed.password ? decodeURIComponent(parsed.password) : undefined;

  if (parsed.protocol === 'rediss:') {
    return { host, port, password, tls: {} };
  }
  return { host, port, password };
}

export const connection = parseRedisUrl(env.REDIS_URL);

export type OperatorAlertType = 'auth_failure' | 'booking_failed' | 'booking_confirmed';

export interface OperatorAlertJobData {
  type: OperatorAlertType;
  sessionId: string;
  message: string;
  metadata?: Record<string, unknown>;
}

export const alertQueue = new Queue<OperatorAlertJobData>(QUEUE_NAMES.OPERATOR_ALERTS, {
  connection,
  defaultJobOptions: {
    attempts: 3,
    backoff: { type: 'exponential', delay: 1000 },
    removeOnComplete: 100,
    removeOnFail: 500,
  },
});

alertQueue.on('error', (error) => {
  logger.error('Operator alert queue error', { error: error.message });
});

/** Queues an alert for the operators. A queue outage is logged, never surfaced to the user. */
export async function addOperatorAlert(data: OperatorAlertJobData): Promise<void> {
  try {
    await alertQueue.add(data.type, data);
    logger.info('Operator alert queued', { type: data.type, sessionId: data.sessionId });
  } catch (error) {
    logger.error('Failed to queue operator alert', { type: data.type, error: errorMessage(error) });
  }
}
