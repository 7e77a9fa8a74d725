import type { LoggerMethods } from '@pagelingo/logger';

import type { GenerateOptions, Result, SplitMode, TextTranslator } from '../types';

import { backoffDelay, sha256, sleep, withTimeout } from '@pagelingo/shared';

import { ModelOutputCleaner } from '../cleaners/model-output-cleaner';
import { TranslationError } from '../errors/translation-error';
import { ChunkSplitter } from '../splitters/chunk-splitter';
import { err, ok } from '../types';

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_BASE_DELAY_MS = 1000;
const DEFAULT_MAX_DELAY_MS = 30000;
const DEFAULT_TIMEOUT_MS = 120000;
const DEFAULT_MAX_CHUNK_SIZE = 2500;

/** Minimum length of a cleaned translation */
const MIN_TRANSLATION_LENGTH = 1;

export const TRANSLATION_SYSTEM_PROMPT = `You are translating HTML content. Your ONLY task is to translate the visible text inside the HTML from the source language to the target language.

RULES:
1. Output ONLY the translated HTML. No explanations, introductions or commentary.
2. Never add phrases such as "Here's the translation" or "Translated content".
3. Keep every tag and attribute exactly as in the input.
4. Keep document structure, layout, classes, ids and styling unchanged.
5. Keep table structures and form layouts exactly as they are.
6. Translate only text that is displayed to the reader.

Your whole response must be HTML that can be used as-is.`;

export interface ChunkTranslatorOptions {
  /** Total attempts per chunk (default: 3) */
  maxAttempts?: number;
  /** First backoff delay; doubles per attempt (default: 1000) */
  baseDelayMs?: number;
  /** Backoff ceiling (default: 30000) */
  maxDelayMs?: number;
  /** Timeout for one model call in milliseconds (default: 120000) */
  timeoutMs?: number;
}

export interface TranslateChunkOptions extends GenerateOptions {
  /** Overrides the translator's attempt count */
  maxAttempts?: number;
  /** Identifier used in logs (default: content hash prefix) */
  chunkId?: string;
}

export interface TranslatePageOptions extends GenerateOptions {
  /** Maximum chunk size in characters (default: 2500) */
  maxChunkSize?: number;
  /** Chunk boundary placement (default: 'sentence') */
  splitMode?: SplitMode;
  maxAttempts?: number;
}

/**
 * ChunkTranslator - translates markup chunks with retry and validation
 *
 * Model-call failures (PROVIDER_ERROR) and unusable output (CONTENT_ERROR)
 * are retried with exponential backoff. A CONFIG_ERROR is returned at once.
 * When every attempt fails the result is a TRANSLATION_ERROR whose cause is
 * the last underlying error.
 */
export class ChunkTranslator {
  private readonly logger: LoggerMethods;
  private readonly translator: TextTranslator;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly timeoutMs: number;

  constructor(
    logger: LoggerMethods,
    translator: TextTranslator,
    options?: ChunkTranslatorOptions,
  ) {
    this.logger = logger;
    this.translator = translator;
    this.maxAttempts = options?.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.baseDelayMs = options?.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
    this.maxDelayMs = options?.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  static buildUserPrompt(
    markup: string,
    fromLang: string,
    toLang: string,
  ): string {
    return `Translate the text in this HTML from ${fromLang} to ${toLang}.\n\n${markup}`;
  }

  async translateChunk(
    markup: string,
    fromLang: string,
    toLang: string,
    options?: TranslateChunkOptions,
  ): Promise<Result<string>> {
    if (markup.trim().length === 0) {
      return ok('');
    }

    const maxAttempts = Math.max(1, options?.maxAttempts ?? this.maxAttempts);
    const chunkId = options?.chunkId ?? sha256(markup).slice(0, 7);
    const abortSignal = options?.abortSignal;
    const startTime = Date.now();

    this.logger.info(
      `[ChunkTranslator] Translating chunk ${chunkId} (${markup.length} chars) from ${fromLang} to ${toLang}`,
    );

    let lastError: TranslationError | undefined;
    let attempts = 0;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      attempts = attempt;
      const outcome = await this.attempt(markup, fromLang, toLang, abortSignal);

      if (outcome.success) {
        this.logger.info(
          `[ChunkTranslator] Translated chunk ${chunkId} (${outcome.data.length} chars) in ${Date.now() - startTime}ms`,
        );
        return outcome;
      }

      lastError = outcome.error;
      this.logger.error(
        `[ChunkTranslator] Chunk ${chunkId} failed (attempt ${attempt}/${maxAttempts}): [${lastError.code}] ${lastError.message}`,
      );

      if (!TranslationError.isRetryable(lastError)) {
        return err(lastError);
      }

      if (attempt < maxAttempts) {
        const delay = backoffDelay(attempt, this.baseDelayMs, this.maxDelayMs);
        this.logger.info(
          `[ChunkTranslator] Retrying chunk ${chunkId} in ${delay}ms (attempt ${attempt + 1}/${maxAttempts})`,
        );
        const waited = await sleep(delay, abortSignal).then(
          () => true,
          () => false,
        );
        if (!waited) break;
      }
    }

    return err(
      new TranslationError(
        'TRANSLATION_ERROR',
        `Translation failed after ${attempts} attempts: ${lastError?.message ?? 'unknown error'}`,
        { cause: lastError },
      ),
    );
  }

  /**
   * Split a page into chunks, translate them in order and join the non-empty
   * results with newlines. Stops at the first chunk that fails.
   */
  async translatePage(
    markup: string,
    fromLang: string,
    toLang: string,
    options?: TranslatePageOptions,
  ): Promise<Result<string>> {
    const chunks = ChunkSplitter.split(
      markup,
      options?.maxChunkSize ?? DEFAULT_MAX_CHUNK_SIZE,
      { mode: options?.splitMode },
    );
    this.logger.info(`[ChunkTranslator] Split page into ${chunks.length} chunks`);

    const translated: string[] = [];
    for (const chunk of chunks) {
      const result = await this.translateChunk(chunk, fromLang, toLang, {
        maxAttempts: options?.maxAttempts,
        abortSignal: options?.abortSignal,
      });
      if (!result.success) return result;
      if (result.data.length > 0) translated.push(result.data);
    }

    return ok(translated.join('\n'));
  }

  private async attempt(
    markup: string,
    fromLang: string,
    toLang: string,
    abortSignal?: AbortSignal,
  ): Promise<Result<string>> {
    let raw: string;
    try {
      raw = await withTimeout(
        this.translator.generate(
          TRANSLATION_SYSTEM_PROMPT,
          ChunkTranslator.buildUserPrompt(markup, fromLang, toLang),
          { abortSignal },
        ),
        this.timeoutMs,
      );
    } catch (error) {
      if (error instanceof TranslationError) return err(error);
      return err(
        TranslationError.fromError('PROVIDER_ERROR', 'Model call failed', error),
      );
    }

    let cleaned = ModelOutputCleaner.stripPreamble(raw);
    if (!ModelOutputCleaner.startsWithTag(cleaned)) {
      this.logger.warn(
        "[ChunkTranslator] Response doesn't start with a tag, trimming to the first tag",
      );
      cleaned = ModelOutputCleaner.trimToFirstTag(cleaned);
    }

    if (cleaned.length < MIN_TRANSLATION_LENGTH) {
      return err(
        new TranslationError('CONTENT_ERROR', 'Empty translation result'),
      );
    }

    if (!ModelOutputCleaner.startsWithTag(cleaned)) {
      return err(
        new TranslationError(
          'CONTENT_ERROR',
          `Translation result is not markup: ${cleaned.slice(0, 100)}`,
        ),
      );
    }

    return ok(cleaned);
  }
}
