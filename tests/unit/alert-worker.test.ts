// Mock logger
jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

// Mock queue config (prevent real Redis connections)
jest.mock('../../src/config/queue', () => ({
  connection: { host: 'localhost', port: 6379 },
  QUEUE_NAMES: { OPERATOR_ALERTS: 'operator-alerts' },
}));

const mockWorkerOn = jest.fn();
jest.mock('bullmq', () => ({
  Worker: jest.fn().mockImplementation(() => ({
    on: mockWorkerOn,
  })),
}));

import { Worker } from 'bullmq';
import { OperatorAlertJobData } from '../../src/config/queue';
import { logger } from '../../src/utils/logger';
import { AlertJob, processAlert, startAlertWorker } from '../../src/workers/alert.worker';

function makeJob(data: OperatorAlertJobData, attemptsMade = 0): AlertJob {
  return { data, attemptsMade };
}

describe('Operator alert worker', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('processAlert', () => {
    it('should log a confirmed booking at info level', async () => {
      await processAlert(
        makeJob({
          type: 'booking_confirmed',
          sessionId: 'session-1',
          message: 'Meeting booked for 2026-10-20T10:00:00-04:00',
          metadata: { eventId: 'evt-1' },
        })
      );

      expect(logger.info).toHaveBeenCalledWith('[Booking] Meeting booked for 2026-10-20T10:00:00-04:00', {
        type: 'booking_confirmed',
        sessionId: 'session-1',
        attempt: 1,
        eventId: 'evt-1',
      });
    });

    it('should log an auth failure as an error', async () => {
      await processAlert(
        makeJob({ type: 'auth_failure', sessionId: 'session-2', message: 'The calendar refused our credentials.' }, 1)
      );

      expect(logger.error).toHaveBeenCalledWith('[Calendar auth] The calendar refused our credentials.', {
        type: 'auth_failure',
        sessionId: 'session-2',
        attempt: 2,
      });
    });

    it('should log a failed booking as an error', async () => {
      await processAlert(
        makeJob({ type: 'booking_failed', sessionId: 'session-3', message: 'The calendar rejected the booking.' })
      );

      expect(logger.error).toHaveBeenCalledWith('[Booking failed] The calendar rejected the booking.', {
        type: 'booking_failed',
        sessionId: 'session-3',
        attempt: 1,
      });
    });
  });

  describe('startAlertWorker', () => {
    it('should consume the operator-alerts queue and watch for failures', () => {
      startAlertWorker();

      expect(Worker).toHaveBeenCalledWith('operator-alerts', processAlert, {
        connection: { host: 'localhost', port: 6379 },
        concurrency: 5,
      });
      expect(mockWorkerOn.mock.calls.map((call: unknown[]) => call[0])).toEqual(['completed', 'failed']);
    });
  });
});
