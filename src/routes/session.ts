import { addHours } from 'date-fns';
import express, { Request, Response } from 'express';
import { z } from 'zod';
import type { SessionRegistry } from '../services/session/SessionRegistry.js';
import { logger } from '../utils/logger.js';

const CreateSessionSchema = z.object({
  name: z.string().trim().min(1),
  description: z.string().default(''),
});

export interface SessionInfo {
  id: string;
  name: string;
  description: string;
  startDate: string;
  endDate: string;
  status: 'active';
}

export function createSessionRouter(registry: SessionRegistry, now: () => Date = () => new Date()): express.Router {
  const router = express.Router();

  router.post('/', (req: Request, res: Response) => {
    const parsed = CreateSessionSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ success: false, error: parsed.error.issues[0]?.message ?? 'Invalid request body' });
      return;
    }

    const context = registry.create();
    const startDate = now();
    const session: SessionInfo = {
      id: context.sessionId,
      name: parsed.data.name,
      description: parsed.data.description,
      startDate: startDate.toISOString(),
      endDate: addHours(startDate, 1).toISOString(),
      status: 'active',
    };

    logger.info(`🆕 Session "${session.name}" opened as ${session.id}`);
    res.status(201).json(session);
  });

  return router;
}
