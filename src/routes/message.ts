import express, { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import type { SchedulingAssistant } from '../conversation/SchedulingAssistant.js';
import { logger } from '../utils/logger.js';

const MessageBodySchema = z
  .object({
    sessionId: z.string().trim().min(1),
    message: z.string().optional(),
    /** Base64 encoded audio */
    audioData: z.string().optional(),
    isVoice: z.boolean().optional(),
  })
  .refine(body => body.message !== undefined || body.audioData !== undefined, {
    message: 'Either message or audioData is required',
  });

export function createMessageRouter(assistant: SchedulingAssistant): express.Router {
  const router = express.Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = MessageBodySchema.safeParse(req.body);
    if (!parsed.success) {
      logger.warn(`⚠️ Rejected message body: ${parsed.error.issues.map(issue => issue.message).join('; ')}`);
      res.status(400).json({ success: false, error: parsed.error.issues[0]?.message ?? 'Invalid request body' });
      return;
    }

    const { sessionId, message, audioData, isVoice } = parsed.data;
    try {
      const response = await assistant.handleMessage({
        sessionId,
        message,
        audio: audioData !== undefined ? Buffer.from(audioData, 'base64') : undefined,
        isVoice: isVoice ?? audioData !== undefined,
      });
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  router.get('/context/:sessionId', (req: Request, res: Response) => {
    const snapshot = assistant.getContext(req.params.sessionId);
    if (!snapshot) {
      res.status(404).json({ success: false, error: 'Session not found' });
      return;
    }
    res.json(snapshot);
  });

  router.delete('/context/:sessionId', (req: Request, res: Response) => {
    if (!assistant.clearContext(req.params.sessionId)) {
      res.status(404).json({ success: false, error: 'Session not found' });
      return;
    }
    res.json({ message: 'Conversation context cleared successfully' });
  });

  return router;
}
