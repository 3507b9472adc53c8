import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

export type Environment = 'PRODUCTION' | 'DEBUG';

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

// "1,2,3,4,5" -> [1, 2, 3, 4, 5]; 0 = Sunday
const workingDaysFromEnv = z
  .string()
  .default('1,2,3,4,5')
  .transform(value =>
    value
      .split(',')
      .map(part => part.trim())
      .filter(part => part.length > 0)
      .map(part => Number(part))
  )
  .pipe(z.array(z.number().int().min(0).max(6)).min(1));

const EnvSchema = z.object({
  ENVIRONMENT: z
    .string()
    .default('PRODUCTION')
    .transform(value => value.toUpperCase())
    .pipe(z.enum(['PRODUCTION', 'DEBUG'])),
  PORT: intFromEnv(3000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  TRANSCRIPTION_MODEL: z.string().default('whisper-1'),
  TTS_MODEL: z.string().default('tts-1'),
  VOICE_ID: z.enum(['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer']).default('alloy'),
  VOICE_SPEED: z.coerce.number().min(0.25).max(4).default(1),

  CALENDAR_TIMEZONE: z.string().default('UTC'),
  WORKING_HOURS_START: z.coerce.number().int().min(0).max(23).default(9),
  WORKING_HOURS_END: z.coerce.number().int().min(1).max(24).default(17),
  WORKING_DAYS: workingDaysFromEnv,

  GOOGLE_CLIENT_ID: z.string().optional(),
  GOOGLE_CLIENT_SECRET: z.string().optional(),
  GOOGLE_REDIRECT_URI: z.string().optional(),
  GOOGLE_REFRESH_TOKEN: z.string().optional(),
  GOOGLE_CALENDAR_ID: z.string().default('primary'),

  COLLABORATOR_TIMEOUT_MS: intFromEnv(15000),
  HISTORY_LIMIT: z.coerce.number().int().min(2).default(20),
  SESSION_IDLE_TTL_MS: intFromEnv(12 * 60 * 60 * 1000),
});

export type AppConfig = z.infer<typeof EnvSchema>;

/**
 * Validate an env mapping. Throws with every offending key listed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  if (parsed.data.WORKING_HOURS_END <= parsed.data.WORKING_HOURS_START) {
    throw new Error(
      `Invalid working hours: WORKING_HOURS_END (${parsed.data.WORKING_HOURS_END}) must be after WORKING_HOURS_START (${parsed.data.WORKING_HOURS_START})`
    );
  }

  return parsed.data;
}
