import express, { Request, Response } from 'express';
import { AVAILABLE_VOICES } from '../services/voice/VoiceService.js';

export function createVoiceRouter(): express.Router {
  const router = express.Router();

  router.get('/voices', (_req: Request, res: Response) => {
    res.json({ voices: AVAILABLE_VOICES });
  });

  return router;
}
