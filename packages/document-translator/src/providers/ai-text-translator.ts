import type { LoggerMethods } from '@pagelingo/logger';
import type { LLMTokenUsageAggregator } from '@pagelingo/shared';
import type { LanguageModel } from 'ai';

import type { BaseLLMComponentOptions } from '../core';
import type { GenerateOptions, TextTranslator } from '../types';

import { TextLLMComponent } from '../core';

/**
 * TextTranslator over the `ai` SDK
 *
 * Each call is one generateText request; retry on bad output is left to
 * ChunkTranslator.
 */
export class AiTextTranslator
  extends TextLLMComponent
  implements TextTranslator
{
  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    options?: BaseLLMComponentOptions,
    fallbackModel?: LanguageModel,
    aggregator?: LLMTokenUsageAggregator,
  ) {
    super(
      logger,
      model,
      'AiTextTranslator',
      options,
      fallbackModel,
      aggregator,
    );
  }

  async generate(
    systemPrompt: string,
    userPrompt: string,
    options?: GenerateOptions,
  ): Promise<string> {
    return this.callTextLLM(
      systemPrompt,
      userPrompt,
      'translation',
      options?.abortSignal,
    );
  }
}
