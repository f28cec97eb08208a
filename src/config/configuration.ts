import { z } from 'zod';

import { TTS_VOICES } from '../openai/openai.constants';

/**
 * Environment configuration schema with zod validation.
 * The app will fail fast on startup if required variables are missing.
 */
const envSchema = z.object({
  // OpenAI
  OPENAI_API_KEY: z.string().min(1, 'OPENAI_API_KEY is required'),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  TTS_MODEL: z.string().default('tts-1'),
  TTS_VOICE: z.enum(TTS_VOICES).default('alloy'),
  STT_LANGUAGE: z.string().default('en'),
  COLLABORATOR_TIMEOUT_MS: z
    .string()
    .default('15000')
    .transform((v) => parseInt(v, 10)),

  // Storage
  STORAGE_DRIVER: z.enum(['memory', 'file']).default('file'),
  DATA_DIR: z.string().default('./data'),

  // Conversation
  RECENT_TURNS_LIMIT: z
    .string()
    .default('5')
    .transform((v) => parseInt(v, 10)),

  // Scheduler
  JOB_RETENTION_HOURS: z
    .string()
    .default('24')
    .transform((v) => parseInt(v, 10)),

  // Push
  FIREBASE_CREDENTIALS_PATH: z.string().optional(),

  // App
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Validate and parse environment variables.
 * Throws a descriptive error if validation fails.
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}

/**
 * NestJS configuration factory.
 * Called by ConfigModule.forRoot({ load: [configuration] })
 */
export default () => {
  const env = validateEnv();

  return {
    nodeEnv: env.NODE_ENV,

    openai: {
      apiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_MODEL,
      ttsModel: env.TTS_MODEL,
      ttsVoice: env.TTS_VOICE,
      sttLanguage: env.STT_LANGUAGE,
      timeoutMs: env.COLLABORATOR_TIMEOUT_MS,
    },

    storage: {
      driver: env.STORAGE_DRIVER,
      dataDir: env.DATA_DIR,
    },

    conversation: {
      recentTurnsLimit: env.RECENT_TURNS_LIMIT,
    },

    scheduler: {
      retentionHours: env.JOB_RETENTION_HOURS,
      dispatchTimeoutMs: env.COLLABORATOR_TIMEOUT_MS,
    },

    firebase: {
      credentialsPath: env.FIREBASE_CREDENTIALS_PATH,
    },
  };
};
