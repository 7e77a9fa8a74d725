import type { LoggerMethods } from '@pagelingo/logger';
import type { LLMTokenUsageAggregator } from '@pagelingo/shared';
import type { LanguageModel } from 'ai';

import type { VisionLLMComponentOptions } from '../core';
import type { GenerateOptions, VisionExtractor } from '../types';

import { VisionLLMComponent } from '../core';
import { PAGE_EXTRACTION_PROMPT } from '../extractors/page-extraction-prompt';

/**
 * VisionExtractor over the `ai` SDK
 *
 * Sends the page extraction instructions together with the page image in a
 * single user message.
 */
export class AiVisionExtractor
  extends VisionLLMComponent
  implements VisionExtractor
{
  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    options?: VisionLLMComponentOptions,
    fallbackModel?: LanguageModel,
    aggregator?: LLMTokenUsageAggregator,
  ) {
    super(
      logger,
      model,
      'AiVisionExtractor',
      options,
      fallbackModel,
      aggregator,
    );
  }

  async generate(
    image: Uint8Array,
    options?: GenerateOptions,
  ): Promise<string> {
    return this.callVisionLLM(
      [
        {
          role: 'user',
          content: [
            { type: 'text', text: PAGE_EXTRACTION_PROMPT },
            this.buildImageContent(image),
          ],
        },
      ],
      'extraction',
      options?.abortSignal,
    );
  }
}
