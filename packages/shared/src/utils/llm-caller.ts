import { type LanguageModel, type ModelMessage, generateText } from 'ai';

/**
 * Options shared by text and vision calls
 */
interface BaseCallConfig {
  /**
   * Primary model for the call (required)
   */
  primaryModel: LanguageModel;

  /**
   * Fallback model tried once after the primary model fails (optional)
   */
  fallbackModel?: LanguageModel;

  /**
   * Transport-level retry count handed to the AI SDK
   */
  maxRetries: number;

  /**
   * Temperature for generation (optional, 0-1)
   */
  temperature?: number;

  /**
   * Upper bound for output tokens (optional)
   */
  maxOutputTokens?: number;

  /**
   * Per-call timeout in milliseconds; the request is aborted when it elapses
   */
  timeoutMs?: number;

  /**
   * Abort signal for cancellation support
   */
  abortSignal?: AbortSignal;

  /**
   * Component name for tracking (e.g., 'ChunkTranslator', 'PageExtractor')
   */
  component: string;

  /**
   * Phase name for tracking (e.g., 'translation', 'extraction')
   */
  phase: string;
}

/**
 * Configuration for a text generation call
 */
export interface LLMCallConfig extends BaseCallConfig {
  systemPrompt: string;
  userPrompt: string;
}

/**
 * Configuration for a vision call with message format
 */
export interface LLMVisionCallConfig extends BaseCallConfig {
  /**
   * Messages array carrying text and image parts
   */
  messages: ModelMessage[];
}

/**
 * Token usage information with model tracking
 */
export interface ExtendedTokenUsage {
  component: string;
  phase: string;
  model: 'primary' | 'fallback';
  modelName: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Result of LLM call including usage information
 */
export interface LLMCallResult {
  text: string;
  usage: ExtendedTokenUsage;
  usedFallback: boolean;
}

interface GenerationResponse {
  text: string;
  usage?: {
    inputTokens?: number;
    outputTokens?: number;
    totalTokens?: number;
  };
}

/**
 * LLMCaller - Centralized LLM API caller with timeout and fallback support
 *
 * Wraps AI SDK's generateText:
 * 1. Try primary model (the SDK retries transport errors up to maxRetries)
 * 2. If it fails and fallbackModel is provided, try the fallback once
 * 3. Return the generated text with usage data and a model type indicator
 *
 * @example
 * ```typescript
 * const result = await LLMCaller.call({
 *   systemPrompt: 'You are translating HTML content.',
 *   userPrompt: 'Translate the text in this HTML from en to de.',
 *   primaryModel: anthropic('claude-3-5-sonnet-20241022'),
 *   maxRetries: 0,
 *   timeoutMs: 120000,
 *   component: 'ChunkTranslator',
 *   phase: 'translation',
 * });
 *
 * console.log(result.text);
 * ```
 */
export class LLMCaller {
  /**
   * Extract model name from LanguageModel
   */
  static extractModelName(model: LanguageModel): string {
    return typeof model === 'string' ? model : model.modelId;
  }

  private static buildUsage(
    config: BaseCallConfig,
    modelName: string,
    response: GenerationResponse,
    usedFallback: boolean,
  ): ExtendedTokenUsage {
    return {
      component: config.component,
      phase: config.phase,
      model: usedFallback ? 'fallback' : 'primary',
      modelName,
      inputTokens: response.usage?.inputTokens ?? 0,
      outputTokens: response.usage?.outputTokens ?? 0,
      totalTokens: response.usage?.totalTokens ?? 0,
    };
  }

  /**
   * Combine the caller's abort signal with the per-call timeout
   */
  private static buildAbortSignal(
    config: BaseCallConfig,
  ): AbortSignal | undefined {
    const signals: AbortSignal[] = [];
    if (config.abortSignal) signals.push(config.abortSignal);
    if (config.timeoutMs !== undefined) {
      signals.push(AbortSignal.timeout(config.timeoutMs));
    }

    if (signals.length === 0) return undefined;
    if (signals.length === 1) return signals[0];
    return AbortSignal.any(signals);
  }

  private static async executeWithFallback(
    config: BaseCallConfig,
    generateFn: (
      model: LanguageModel,
      abortSignal: AbortSignal | undefined,
    ) => Promise<GenerationResponse>,
  ): Promise<LLMCallResult> {
    const primaryModelName = this.extractModelName(config.primaryModel);

    try {
      const response = await generateFn(
        config.primaryModel,
        this.buildAbortSignal(config),
      );

      return {
        text: response.text,
        usage: this.buildUsage(config, primaryModelName, response, false),
        usedFallback: false,
      };
    } catch (primaryError) {
      // If aborted, don't try fallback - re-throw immediately
      if (config.abortSignal?.aborted) {
        throw primaryError;
      }

      if (!config.fallbackModel) {
        throw primaryError;
      }

      const fallbackModelName = this.extractModelName(config.fallbackModel);
      const response = await generateFn(
        config.fallbackModel,
        this.buildAbortSignal(config),
      );

      return {
        text: response.text,
        usage: this.buildUsage(config, fallbackModelName, response, true),
        usedFallback: true,
      };
    }
  }

  /**
   * Generate text from a system and user prompt
   *
   * @throws Error from the AI SDK when all attempts fail or the call times out
   */
  static async call(config: LLMCallConfig): Promise<LLMCallResult> {
    return this.executeWithFallback(config, (model, abortSignal) =>
      generateText({
        model,
        system: config.systemPrompt,
        prompt: config.userPrompt,
        temperature: config.temperature,
        maxOutputTokens: config.maxOutputTokens,
        maxRetries: config.maxRetries,
        abortSignal,
      }),
    );
  }

  /**
   * Generate text from messages that carry image parts
   *
   * Same timeout and fallback logic as call(), using message format instead
   * of system/user prompts.
   */
  static async callVision(config: LLMVisionCallConfig): Promise<LLMCallResult> {
    return this.executeWithFallback(config, (model, abortSignal) =>
      generateText({
        model,
        messages: config.messages,
        temperature: config.temperature,
        maxOutputTokens: config.maxOutputTokens,
        maxRetries: config.maxRetries,
        abortSignal,
      }),
    );
  }
}
