import { Router, Request, Response } from 'express';
import { env } from '../config/env';
import { checkRedisHealth } from '../config/redis';

const router = Router();

router.get('/health', async (_req: Request, res: Response) => {
  const redisHealth = await checkRedisHealth();
  const calendar = {
    provider: env.CALENDAR_PROVIDER,
    status: env.GOOGLE_CALENDAR_CREDENTIALS ? 'configured' : 'missing_credentials',
  };

  const healthy = redisHealth.status === 'healthy' && calendar.status === 'configured';

  res.status(healthy ? 200 : 503).json({
    status: healthy ? 'healthy' : 'degraded',
    redis: redisHealth,
    calendar,
    timestamp: new Date().toISOString(),
  });
});

export default router;
