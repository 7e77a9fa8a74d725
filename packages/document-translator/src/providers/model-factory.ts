import type { LanguageModel } from 'ai';

import type { ProviderKeys } from '../config/config';
import type { Result } from '../types';

import { createAnthropic } from '@ai-sdk/anthropic';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createOpenAI } from '@ai-sdk/openai';

import { TranslationError } from '../errors/translation-error';
import { err, ok } from '../types';

type ProviderName = keyof ProviderKeys;

const KEY_VARIABLES: Record<ProviderName, string> = {
  google: 'GOOGLE_GENERATIVE_AI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
};

function isProviderName(value: string): value is ProviderName {
  return Object.hasOwn(KEY_VARIABLES, value);
}

/**
 * Converts model ID string to LanguageModel instance
 *
 * Model ID format: "provider/model-name"
 * Examples:
 *   - "google/gemini-2.0-flash"
 *   - "anthropic/claude-3-5-sonnet-20241022"
 *   - "openai/gpt-4o"
 *
 * Unknown providers and missing API keys are CONFIG_ERROR results.
 */
export function createModel(
  modelId: string,
  config: { apiKeys: ProviderKeys },
): Result<LanguageModel> {
  const [provider, ...rest] = modelId.split('/');
  const modelName = rest.join('/');

  if (!isProviderName(provider) || modelName.length === 0) {
    return err(
      new TranslationError('CONFIG_ERROR', `Unknown provider: ${provider}`),
    );
  }

  const apiKey = config.apiKeys[provider];
  if (!apiKey) {
    return err(
      new TranslationError(
        'CONFIG_ERROR',
        `${KEY_VARIABLES[provider]} is required for model ${modelId}`,
      ),
    );
  }

  switch (provider) {
    case 'google':
      return ok(createGoogleGenerativeAI({ apiKey })(modelName));
    case 'anthropic':
      return ok(createAnthropic({ apiKey })(modelName));
    case 'openai':
      return ok(createOpenAI({ apiKey })(modelName));
  }
}
