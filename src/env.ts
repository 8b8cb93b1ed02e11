import 'dotenv/config';
import { z } from 'zod';

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() !== '' ? v : undefined));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  // Without a key the canned prompts are sent as-is
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().min(1).default('gpt-4.1-nano'),
  OPENAI_FALLBACK_MODEL: z.string().min(1).default('gpt-4o-mini'),
  ONBOARDING_PERSIST_PATH: optionalString,
  REDIS_URL: optionalString,
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: Record<string, string | undefined>): Env {
  return EnvSchema.parse({
    PORT: source.PORT,
    HOST: source.HOST,
    LOG_LEVEL: source.LOG_LEVEL,
    OPENAI_API_KEY: source.OPENAI_API_KEY,
    OPENAI_MODEL: source.OPENAI_MODEL,
    OPENAI_FALLBACK_MODEL: source.OPENAI_FALLBACK_MODEL,
    ONBOARDING_PERSIST_PATH: source.ONBOARDING_PERSIST_PATH,
    REDIS_URL: source.REDIS_URL,
  });
}

export const env = parseEnv(process.env);
