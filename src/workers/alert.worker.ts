import { Worker, Job } from 'bullmq';
import { OperatorAlertJobData, QUEUE_NAMES, connection } from '../config/queue';
import { logger } from '../utils/logger';

export type AlertJob = Pick<Job<OperatorAlertJobData>, 'data' | 'attemptsMade'>;

export async function processAlert(job: AlertJob): Promise<void> {
  const { type, sessionId, message, metadata } = job.data;
  const meta = { type, sessionId, attempt: job.attemptsMade + 1, ...metadata };

  switch (type) {
    case 'booking_confirmed':
      logger.info(`[Booking] ${message}`, meta);
      break;
    case 'auth_failure':
      logger.error(`[Calendar auth] ${message}`, meta);
      break;
    case 'booking_failed':
      logger.error(`[Booking failed] ${message}`, meta);
      break;
  }
}

export function startAlertWorker(): Worker<OperatorAlertJobData> {
  const worker = new Worker<OperatorAlertJobData>(QUEUE_NAMES.OPERATOR_ALERTS, processAlert, {
    connection,
    concurrency: 5,
  });

  worker.on('completed', (job) => {
    logger.debug('Operator alert processed', { jobId: job.id });
  });

  worker.on('failed', (job, error) => {
    logger.error('Operator alert job failed', { jobId: job?.id, error: error.message });
  });

  return worker;
}
