import express, { NextFunction, Request, Response } from 'express';
import type { Server } from 'http';
import { loadConfig, type AppConfig, type Environment } from './config/environment.js';
import { getOpenAI } from './config/llm-config.js';
import { DialogueStateMachine } from './conversation/DialogueStateMachine.js';
import { SchedulingAssistant } from './conversation/SchedulingAssistant.js';
import { createMessageRouter } from './routes/message.js';
import { createSessionRouter } from './routes/session.js';
import { createVoiceRouter } from './routes/voice.js';
import { CalendarService } from './services/calendar/CalendarService.js';
import { LLMService } from './services/llm/LLMService.js';
import { UnderstandingService } from './services/llm/UnderstandingService.js';
import { SessionRegistry } from './services/session/SessionRegistry.js';
import { VoiceService } from './services/voice/VoiceService.js';
import { logger } from './utils/logger.js';

/** How often idle sessions are swept, at most */
const PRUNE_INTERVAL_MS = 10 * 60 * 1000;

export interface AppDependencies {
  assistant: SchedulingAssistant;
  registry: SessionRegistry;
  environment?: Environment;
}

export function createApp({ assistant, registry, environment = 'PRODUCTION' }: AppDependencies): express.Express {
  const app = express();

  if (environment === 'DEBUG') {
    app.use((req, _res, next) => {
      logger.debug(`[TRACE] INCOMING ${req.method} ${req.path}`);
      next();
    });
  }

  app.use(express.json({ limit: '10mb' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', sessions: registry.size, timestamp: new Date().toISOString() });
  });

  app.use('/message', createMessageRouter(assistant));
  app.use('/session', createSessionRouter(registry));
  app.use('/voice', createVoiceRouter());

  // Error handling middleware
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled error:', err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

/**
 * Wire the production collaborators from configuration.
 */
export function buildServices(config: AppConfig): AppDependencies {
  const openai = getOpenAI(config.OPENAI_API_KEY);
  const registry = new SessionRegistry({ historyLimit: config.HISTORY_LIMIT });

  const calendar = new CalendarService({
    clientId: config.GOOGLE_CLIENT_ID,
    clientSecret: config.GOOGLE_CLIENT_SECRET,
    redirectUri: config.GOOGLE_REDIRECT_URI,
    refreshToken: config.GOOGLE_REFRESH_TOKEN,
    calendarId: config.GOOGLE_CALENDAR_ID,
    timezone: config.CALENDAR_TIMEZONE,
  });

  const stateMachine = new DialogueStateMachine({
    availability: calendar,
    workingHours: {
      timezone: config.CALENDAR_TIMEZONE,
      startHour: config.WORKING_HOURS_START,
      endHour: config.WORKING_HOURS_END,
      workingDays: config.WORKING_DAYS,
    },
    timeoutMs: config.COLLABORATOR_TIMEOUT_MS,
  });

  const assistant = new SchedulingAssistant({
    registry,
    stateMachine,
    understanding: new UnderstandingService(new LLMService(openai, config.OPENAI_MODEL), {
      timezone: config.CALENDAR_TIMEZONE,
    }),
    speech: new VoiceService(openai, {
      transcriptionModel: config.TRANSCRIPTION_MODEL,
      ttsModel: config.TTS_MODEL,
    }),
    voice: { voiceId: config.VOICE_ID, speed: config.VOICE_SPEED },
    timeoutMs: config.COLLABORATOR_TIMEOUT_MS,
  });

  return { assistant, registry, environment: config.ENVIRONMENT };
}

export function startServer(config: AppConfig = loadConfig()): Server {
  if (!config.OPENAI_API_KEY) {
    logger.warn('⚠️  OPENAI_API_KEY is not set - understanding and voice calls will fail');
  }
  if (!config.GOOGLE_REFRESH_TOKEN) {
    logger.warn('⚠️  GOOGLE_REFRESH_TOKEN is not set - calendar calls will fail');
  }

  const services = buildServices(config);
  const app = createApp(services);

  let pruneTimer: NodeJS.Timeout | undefined;
  if (config.SESSION_IDLE_TTL_MS > 0) {
    pruneTimer = setInterval(
      () => services.registry.pruneIdle(config.SESSION_IDLE_TTL_MS),
      Math.min(config.SESSION_IDLE_TTL_MS, PRUNE_INTERVAL_MS)
    );
    pruneTimer.unref();
  }

  const server = app.listen(config.PORT, () => {
    logger.info(`🚀 Server running on port ${config.PORT} (${config.ENVIRONMENT})`);
  });
  server.on('close', () => {
    if (pruneTimer) clearInterval(pruneTimer);
  });

  return server;
}
