import type { LoggerMethods } from '@pagelingo/logger';
import type {
  LLMCallResult,
  LLMTokenUsageAggregator,
} from '@pagelingo/shared';
import type { LanguageModel } from 'ai';

import { LLMCaller } from '@pagelingo/shared';

import {
  BaseLLMComponent,
  type BaseLLMComponentOptions,
} from './base-llm-component';

export type { BaseLLMComponentOptions } from './base-llm-component';

/**
 * Abstract base class for text-based LLM components
 *
 * Extends BaseLLMComponent with a helper for text calls through
 * LLMCaller.call().
 *
 * Subclasses: AiTextTranslator
 */
export abstract class TextLLMComponent extends BaseLLMComponent {
  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    componentName: string,
    options?: BaseLLMComponentOptions,
    fallbackModel?: LanguageModel,
    aggregator?: LLMTokenUsageAggregator,
  ) {
    super(logger, model, componentName, options, fallbackModel, aggregator);
  }

  /**
   * Call LLM with text-based prompts using LLMCaller.call()
   *
   * @param phase - Phase name for tracking (e.g., 'translation')
   * @returns Generated text
   */
  protected async callTextLLM(
    systemPrompt: string,
    userPrompt: string,
    phase: string,
    abortSignal?: AbortSignal,
  ): Promise<string> {
    let result: LLMCallResult;
    try {
      result = await LLMCaller.call({
        systemPrompt,
        userPrompt,
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
}
