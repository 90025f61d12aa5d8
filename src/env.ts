import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return value;
};

const INSTRUCTIONLESS_TTS_MODELS = new Set(['tts-1', 'tts-1-hd']);

const EnvSchema = z.object({
  PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(8000)),
  HOST_URL: z.preprocess(emptyToUndefined, z.string().url().default('http://localhost:8000')),
  OPENAI_API_KEY: z.string().trim().min(1),
  OPENAI_BASE_URL: z.preprocess(
    emptyToUndefined,
    z.string().url().default('https://api.openai.com/v1'),
  ),
  OPENAI_TIMEOUT_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(30000),
  ),
  STATIC_DIR: z.preprocess(emptyToUndefined, z.string().min(1).default('static')),
  TRANSCRIPTION_MODEL: z.preprocess(emptyToUndefined, z.string().min(1).default('whisper-1')),
  COMPLETION_MODEL: z.preprocess(emptyToUndefined, z.string().min(1).default('gpt-3.5-turbo')),
  COMPLETION_MAX_TOKENS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(250),
  ),
  SYSTEM_PROMPT: z.preprocess(
    emptyToUndefined,
    z.string().min(1).default('You are a helpful assistant answering callers briefly.'),
  ),
  // tts-1 and tts-1-hd ignore `instructions`, which pins the spoken language.
  TTS_MODEL: z.preprocess(
    emptyToUndefined,
    z
      .string()
      .min(1)
      .default('gpt-4o-mini-tts')
      .refine((model) => !INSTRUCTIONLESS_TTS_MODELS.has(model), {
        message: 'model does not accept speech instructions',
      }),
  ),
  TTS_VOICE: z.preprocess(emptyToUndefined, z.string().min(1).default('alloy')),
  LOG_LEVEL: z.preprocess(
    emptyToUndefined,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  ),
});

export type LogLevel = z.infer<typeof EnvSchema>['LOG_LEVEL'];

export interface AppConfig {
  readonly port: number;
  /** Public base URL, no trailing slash. */
  readonly hostUrl: string;
  readonly staticDir: string;
  readonly logLevel: LogLevel;
  readonly openai: {
    readonly apiKey: string;
    readonly baseUrl: string;
    readonly timeoutMs: number;
    readonly transcriptionModel: string;
    readonly completionModel: string;
    readonly completionMaxTokens: number;
    readonly systemPrompt: string;
    readonly ttsModel: string;
    readonly ttsVoice: string;
  };
}

const trimTrailingSlash = (value: string): string => value.replace(/\/+$/, '');

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(source);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid environment variables: ${issues}`);
  }

  const env = parsed.data;
  return Object.freeze({
    port: env.PORT,
    hostUrl: trimTrailingSlash(env.HOST_URL),
    staticDir: env.STATIC_DIR,
    logLevel: env.LOG_LEVEL,
    openai: Object.freeze({
      apiKey: env.OPENAI_API_KEY,
      baseUrl: trimTrailingSlash(env.OPENAI_BASE_URL),
      timeoutMs: env.OPENAI_TIMEOUT_MS,
      transcriptionModel: env.TRANSCRIPTION_MODEL,
      completionModel: env.COMPLETION_MODEL,
      completionMaxTokens: env.COMPLETION_MAX_TOKENS,
      systemPrompt: env.SYSTEM_PROMPT,
      ttsModel: env.TTS_MODEL,
      ttsVoice: env.TTS_VOICE,
    }),
  });
}
