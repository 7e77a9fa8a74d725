import type { Result } from '../types';

import { z } from 'zod';

import { TranslationError } from '../errors/translation-error';
import { err, ok } from '../types';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

/** Model id in `provider/model` form */
const modelIdSchema = z
  .string()
  .regex(/^[a-z]+\/.+$/, 'Expected a "provider/model" id');

const envSchema = z.object({
  GOOGLE_GENERATIVE_AI_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  VISION_MODEL: modelIdSchema.default('google/gemini-2.0-flash'),
  TRANSLATION_MODEL: modelIdSchema.default(
    'anthropic/claude-3-5-sonnet-20241022',
  ),
  MAX_CHUNK_SIZE: z.coerce.number().int().positive().default(2500),
  PAGE_CONCURRENCY: z.coerce.number().int().positive().default(3),
  API_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
  TRANSLATION_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface ProviderKeys {
  google?: string;
  anthropic?: string;
  openai?: string;
}

export interface TranslatorConfig {
  apiKeys: ProviderKeys;
  visionModel: string;
  translationModel: string;
  maxChunkSize: number;
  pageConcurrency: number;
  apiTimeoutMs: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
  logLevel: (typeof LOG_LEVELS)[number];
}

/**
 * Read the translator configuration from environment variables.
 *
 * Empty values count as unset. Any invalid value yields a CONFIG_ERROR
 * listing every offending variable.
 *
 * @example
 * ```typescript
 * const config = loadConfig(process.env);
 * if (!config.success) throw config.error;
 * ```
 */
export function loadConfig(
  env: Record<string, string | undefined>,
): Result<TranslatorConfig> {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    return err(
      new TranslationError('CONFIG_ERROR', `Invalid configuration: ${details}`),
    );
  }

  const values = parsed.data;
  return ok({
    apiKeys: {
      google: values.GOOGLE_GENERATIVE_AI_API_KEY,
      anthropic: values.ANTHROPIC_API_KEY,
      openai: values.OPENAI_API_KEY,
    },
    visionModel: values.VISION_MODEL,
    translationModel: values.TRANSLATION_MODEL,
    maxChunkSize: values.MAX_CHUNK_SIZE,
    pageConcurrency: values.PAGE_CONCURRENCY,
    apiTimeoutMs: values.API_TIMEOUT_MS,
    maxAttempts: values.TRANSLATION_MAX_ATTEMPTS,
    retryBaseDelayMs: values.RETRY_BASE_DELAY_MS,
    logLevel: values.LOG_LEVEL,
  });
}
