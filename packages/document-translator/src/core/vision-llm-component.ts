import type { LoggerMethods } from '@pagelingo/logger';
import type {
  LLMCallResult,
  LLMTokenUsageAggregator,
} from '@pagelingo/shared';
import type { ImagePart, LanguageModel, ModelMessage } from 'ai';

import { LLMCaller } from '@pagelingo/shared';

import {
  BaseLLMComponent,
  type BaseLLMComponentOptions,
} from './base-llm-component';

/**
 * Options for VisionLLMComponent
 */
export interface VisionLLMComponentOptions extends BaseLLMComponentOptions {
  /**
   * MIME type of the page images (default: 'image/png')
   */
  imageMimeType?: string;
}

/**
 * Abstract base class for vision-based LLM components
 *
 * Extends BaseLLMComponent with helpers for vision calls through
 * LLMCaller.callVision().
 *
 * Subclasses: AiVisionExtractor
 */
export abstract class VisionLLMComponent extends BaseLLMComponent {
  protected readonly imageMimeType: string;

  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    componentName: string,
    options?: VisionLLMComponentOptions,
    fallbackModel?: LanguageModel,
    aggregator?: LLMTokenUsageAggregator,
  ) {
    super(logger, model, componentName, options, fallbackModel, aggregator);
    this.imageMimeType = options?.imageMimeType ?? 'image/png';
  }

  /**
   * Call LLM with vision capabilities using LLMCaller.callVision()
   *
   * @param messages - Messages array including image content
   * @param phase - Phase name for tracking (e.g., 'extraction')
   * @returns Generated text
   */
  protected async callVisionLLM(
    messages: ModelMessage[],
    phase: string,
    abortSignal?: AbortSignal,
  ): Promise<string> {
    let result: LLMCallResult;
    try {
      result = await LLMCaller.callVision({
        messages,
        primaryModel: this.model,
        fallbackModel: this.fallbackModel,
        maxRetries: this.maxRetries,
        temperature: this.temperature,
        maxOutputTokens: this.maxOutputTokens,
        timeoutMs: this.timeoutMs,
        abortSignal,
        component: this.componentName,
        phase,
      });
    } catch (error) {
      throw this.classifyError(error);
    }

    this.trackUsage(result.usage);
    if (result.usedFallback) {
      this.log('warn', `Used fallback model ${result.usage.modelName}`);
    }

    return result.text;
  }

  /**
   * Build image content object for vision LLM messages
   */
  protected buildImageContent(image: Uint8Array): ImagePart {
    return {
      type: 'image',
      image,
      mediaType: this.imageMimeType,
    };
  }
}
