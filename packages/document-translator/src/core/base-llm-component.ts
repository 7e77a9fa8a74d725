import type { LoggerMethods } from '@pagelingo/logger';
import type {
  ExtendedTokenUsage,
  LLMTokenUsageAggregator,
} from '@pagelingo/shared';
import type { LanguageModel } from 'ai';

import { APICallError, LoadAPIKeyError } from 'ai';

import { TranslationError } from '../errors/translation-error';

/** HTTP statuses that mean the credentials are wrong, not that the call failed */
const AUTH_FAILURE_STATUSES = new Set([401, 403]);

/**
 * Base options for all LLM-based components
 */
export interface BaseLLMComponentOptions {
  /**
   * Transport retry count handed to the AI SDK (default: 3)
   */
  maxRetries?: number;

  /**
   * Temperature for LLM generation (default: 0)
   */
  temperature?: number;

  /**
   * Upper bound for output tokens (default: provider default)
   */
  maxOutputTokens?: number;

  /**
   * Per-call timeout in milliseconds (default: 120000)
   */
  timeoutMs?: number;
}

/**
 * Abstract base class for all LLM-based components
 *
 * Provides common functionality:
 * - Consistent logging with component name prefix
 * - Token usage tracking via optional aggregator
 * - Standard configuration (model, fallback, retries, temperature, timeout)
 */
export abstract class BaseLLMComponent {
  protected readonly logger: LoggerMethods;
  protected readonly model: LanguageModel;
  protected readonly fallbackModel?: LanguageModel;
  protected readonly maxRetries: number;
  protected readonly temperature: number;
  protected readonly maxOutputTokens?: number;
  protected readonly timeoutMs: number;
  protected readonly componentName: string;
  protected readonly aggregator?: LLMTokenUsageAggregator;

  /**
   * @param logger - Logger instance for logging
   * @param model - Primary language model for LLM calls
   * @param componentName - Name of the component for logging (e.g., "ChunkTranslator")
   * @param options - Optional configuration (maxRetries, temperature, timeout)
   * @param fallbackModel - Optional fallback model tried after the primary fails
   * @param aggregator - Optional token usage aggregator for tracking LLM calls
   */
  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    componentName: string,
    options?: BaseLLMComponentOptions,
    fallbackModel?: LanguageModel,
    aggregator?: LLMTokenUsageAggregator,
  ) {
    this.logger = logger;
    this.model = model;
    this.componentName = componentName;
    this.maxRetries = options?.maxRetries ?? 3;
    this.temperature = options?.temperature ?? 0;
    this.maxOutputTokens = options?.maxOutputTokens;
    this.timeoutMs = options?.timeoutMs ?? 120000;
    this.fallbackModel = fallbackModel;
    this.aggregator = aggregator;
  }

  /**
   * Log a message with consistent component name prefix
   */
  protected log(
    level: 'debug' | 'info' | 'warn' | 'error',
    message: string,
    ...args: unknown[]
  ): void {
    this.logger[level](`[${this.componentName}] ${message}`, ...args);
  }

  /**
   * Track token usage to aggregator if available
   */
  protected trackUsage(usage: ExtendedTokenUsage): void {
    if (this.aggregator) {
      this.aggregator.track(usage);
    }
  }

  /**
   * Turn credential failures from the provider into CONFIG_ERROR so callers
   * stop instead of retrying. Other errors are returned unchanged.
   */
  protected classifyError(error: unknown): unknown {
    if (LoadAPIKeyError.isInstance(error)) {
      return new TranslationError('CONFIG_ERROR', error.message, {
        cause: error,
      });
    }
    if (
      APICallError.isInstance(error) &&
      error.statusCode !== undefined &&
      AUTH_FAILURE_STATUSES.has(error.statusCode)
    ) {
      return new TranslationError(
        'CONFIG_ERROR',
        `${this.componentName} rejected by provider (${error.statusCode}): ${error.message}`,
        { cause: error },
      );
    }
    return error;
  }
}
