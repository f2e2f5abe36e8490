import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { AgentService } from '../services/agent.service';
import { ValidationError } from '../utils/errors';

const router = Router();
const agentService = new AgentService();

const chatMessageSchema = z.object({
  session_id: z.string().min(1).max(100).optional(),
  message: z.string().min(1).max(5000),
});

router.post('/sessions', async (_req: Request, res: Response, next: NextFunction) => {
  try {
    const session = await agentService.startSession();
    res.status(201).json({ success: true, ...session });
  } catch (error) {
    next(error);
  }
});

router.post('/message', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const parsed = chatMessageSchema.safeParse(req.body);
    if (!parsed.success) {
      throw new ValidationError(parsed.error.issues.map((i) => i.message).join(', '));
    }

    const result = await agentService.handleMessage(parsed.data);
    res.json(result);
  } catch (error) {
    next(error);
  }
});

router.delete('/sessions/:id', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const result = await agentService.abandonSession(req.params.id);
    res.json(result);
  } catch (error) {
    next(error);
  }
});

export default router;
