import { z } from 'zod';

import languageTable from './languages.json';

const languageEntrySchema = z.object({
  maxChunkSize: z.number().int().positive().optional(),
});

const languageTableSchema = z
  .record(z.string(), languageEntrySchema)
  .refine((table) => 'default' in table, 'Missing "default" entry');

const LANGUAGE_CONFIG = languageTableSchema.parse(languageTable);

export type LanguageConfig = z.infer<typeof languageEntrySchema>;

/**
 * Settings for a language code, or the `default` entry when it has none.
 * Region subtags are ignored (`pt-BR` resolves as `pt`).
 */
export function getLanguageConfig(language: string): LanguageConfig {
  const base = language.trim().toLowerCase().split(/[-_]/)[0];
  return LANGUAGE_CONFIG[base] ?? LANGUAGE_CONFIG.default ?? {};
}

/**
 * Chunk size for translating into `language`, falling back to the
 * configured maximum
 */
export function maxChunkSizeFor(
  language: string,
  config: { maxChunkSize: number },
): number {
  return getLanguageConfig(language).maxChunkSize ?? config.maxChunkSize;
}
