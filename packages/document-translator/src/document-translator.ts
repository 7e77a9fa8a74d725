import type { LoggerMethods } from '@pagelingo/logger';
import type { TranslationJob, TokenUsageReport } from '@pagelingo/model';

import type { TranslatorConfig } from './config/config';
import type { StartTranslationInput } from './progress/progress-tracker';
import type { TranslationStore } from './progress/translation-store';
import type {
  Result,
  SplitMode,
  TextTranslator,
  VisionExtractor,
} from './types';

import { ConcurrentPool, LLMTokenUsageAggregator } from '@pagelingo/shared';

import { maxChunkSizeFor } from './config/language-config';
import { TranslationError } from './errors/translation-error';
import { PageExtractor } from './extractors/page-extractor';
import { ProgressTracker } from './progress/progress-tracker';
import { AiTextTranslator } from './providers/ai-text-translator';
import { AiVisionExtractor } from './providers/ai-vision-extractor';
import { createModel } from './providers/model-factory';
import { ChunkTranslator } from './translators/chunk-translator';
import { err, ok } from './types';

/**
 * DocumentTranslator Options
 */
export interface DocumentTranslatorOptions {
  /**
   * Logger instance
   */
  logger: LoggerMethods;

  /**
   * Vision capability that turns a page image into markup
   */
  vision: VisionExtractor;

  /**
   * Text capability that translates markup chunks
   */
  translator: TextTranslator;

  /**
   * Persistence for jobs and page results
   */
  store: TranslationStore;

  /**
   * Number of pages processed at the same time, a positive integer
   * (default: 3)
   */
  pageConcurrency?: number;

  /**
   * Chunk size used when the target language has no entry of its own
   * (default: 2500)
   */
  maxChunkSize?: number;

  /**
   * Chunk boundary placement (default: 'sentence')
   */
  splitMode?: SplitMode;

  /**
   * Attempts per chunk before TRANSLATION_ERROR (default: 3)
   */
  maxAttempts?: number;

  /**
   * First backoff delay between chunk attempts (default: 1000)
   */
  retryBaseDelayMs?: number;

  /**
   * Timeout of one model call in milliseconds (default: 120000)
   */
  timeoutMs?: number;

  /**
   * Aggregator the model adapters report token usage to
   */
  aggregator?: LLMTokenUsageAggregator;

  /**
   * Called with the cumulative token usage report after each document
   */
  onTokenUsage?: (report: TokenUsageReport) => void;
}

/**
 * Everything a job needs except its page count, which comes from the pages
 */
export type TranslateDocumentRequest = Omit<StartTranslationInput, 'totalPages'>;

export interface TranslateDocumentOptions {
  /**
   * Stops scheduling new pages and cancels in-flight model calls. Recorded
   * pages are kept and the job stays in progress so a later call resumes it.
   */
  abortSignal?: AbortSignal;

  /**
   * Reopen the job when it exists and has failed, keeping its recorded pages.
   * Without it a failed job is INVALID_STATE.
   */
  retryFailed?: boolean;
}

/**
 * DocumentTranslator
 *
 * Runs the whole pipeline for one document:
 *
 * 1. Start the job, or resume it when it exists and is still in progress
 *    (or has failed and `retryFailed` is set)
 * 2. Skip pages already recorded
 * 3. For the remaining pages, through a worker pool:
 *    extract markup (vision) → translate chunks (text) → record the page
 * 4. Mark the job completed and return the combined document
 *
 * Any page failure stops scheduling further pages and marks the job failed.
 * A CONFIG_ERROR also cancels the pages in flight.
 *
 * @example
 * ```typescript
 * const config = loadConfig(process.env);
 * if (!config.success) throw config.error;
 *
 * const translator = DocumentTranslator.fromConfig(
 *   config.data,
 *   createConsoleLogger(config.data.logLevel),
 *   new JsonFileTranslationStore('./data/translations.json'),
 * );
 * if (!translator.success) throw translator.error;
 *
 * const result = await translator.data.translateDocument(
 *   {
 *     processId: 'doc-001',
 *     userId: 'user-1',
 *     fileName: 'report.pdf',
 *     sourceLanguage: 'en',
 *     targetLanguage: 'ko',
 *     fileType: 'pdf',
 *   },
 *   pageImages,
 * );
 * ```
 */
export class DocumentTranslator {
  private readonly logger: LoggerMethods;
  private readonly extractor: PageExtractor;
  private readonly chunkTranslator: ChunkTranslator;
  private readonly tracker: ProgressTracker;
  private readonly pageConcurrency: number;
  private readonly maxChunkSize: number;
  private readonly splitMode?: SplitMode;
  private readonly aggregator?: LLMTokenUsageAggregator;
  private readonly onTokenUsage?: (report: TokenUsageReport) => void;

  /**
   * @throws TranslationError (VALIDATION_ERROR) when pageConcurrency is not a
   * positive integer
   */
  constructor(options: DocumentTranslatorOptions) {
    const pageConcurrency = options.pageConcurrency ?? 3;
    if (!Number.isInteger(pageConcurrency) || pageConcurrency < 1) {
      throw new TranslationError(
        'VALIDATION_ERROR',
        `pageConcurrency must be a positive integer, got ${pageConcurrency}`,
      );
    }

    this.logger = options.logger;
    this.pageConcurrency = pageConcurrency;
    this.maxChunkSize = options.maxChunkSize ?? 2500;
    this.splitMode = options.splitMode;
    this.aggregator = options.aggregator;
    this.onTokenUsage = options.onTokenUsage;

    this.extractor = new PageExtractor(options.logger, options.vision, {
      timeoutMs: options.timeoutMs,
    });
    this.chunkTranslator = new ChunkTranslator(
      options.logger,
      options.translator,
      {
        maxAttempts: options.maxAttempts,
        baseDelayMs: options.retryBaseDelayMs,
        timeoutMs: options.timeoutMs,
      },
    );
    this.tracker = new ProgressTracker(options.logger, options.store);
  }

  /**
   * Build a translator whose capabilities are `ai` SDK models named in the
   * configuration. Missing keys or unknown providers are CONFIG_ERROR.
   */
  static fromConfig(
    config: TranslatorConfig,
    logger: LoggerMethods,
    store: TranslationStore,
    onTokenUsage?: (report: TokenUsageReport) => void,
  ): Result<DocumentTranslator> {
    const visionModel = createModel(config.visionModel, config);
    if (!visionModel.success) return visionModel;
    const translationModel = createModel(config.translationModel, config);
    if (!translationModel.success) return translationModel;

    const aggregator = new LLMTokenUsageAggregator();
    // Attempts are counted by ChunkTranslator alone
    const modelOptions = { timeoutMs: config.apiTimeoutMs, maxRetries: 0 };

    return ok(
      new DocumentTranslator({
        logger,
        vision: new AiVisionExtractor(
          logger,
          visionModel.data,
          modelOptions,
          undefined,
          aggregator,
        ),
        translator: new AiTextTranslator(
          logger,
          translationModel.data,
          modelOptions,
          undefined,
          aggregator,
        ),
        store,
        pageConcurrency: config.pageConcurrency,
        maxChunkSize: config.maxChunkSize,
        maxAttempts: config.maxAttempts,
        retryBaseDelayMs: config.retryBaseDelayMs,
        timeoutMs: config.apiTimeoutMs,
        aggregator,
        onTokenUsage,
      }),
    );
  }

  /**
   * Progress operations over the same store
   */
  get progress(): ProgressTracker {
    return this.tracker;
  }

  /**
   * Translate a document given as one rasterized image per page.
   *
   * @returns The combined translated document
   */
  async translateDocument(
    request: TranslateDocumentRequest,
    pages: readonly Uint8Array[],
    options?: TranslateDocumentOptions,
  ): Promise<Result<string>> {
    const { processId } = request;
    const startTime = Date.now();

    const job = await this.startOrResume(
      request,
      pages.length,
      options?.retryFailed ?? false,
    );
    if (!job.success) return job;

    const progress = await this.tracker.getProgress(processId);
    if (!progress.success) return progress;

    const done = new Set(progress.data.completedPages);
    const remaining = pages
      .map((_, index) => index + 1)
      .filter((pageNumber) => !done.has(pageNumber));

    this.logger.info(
      `[DocumentTranslator] Translating ${processId}: ${remaining.length} of ${pages.length} pages remaining`,
    );

    const failure = await this.translatePages(
      request,
      pages,
      remaining,
      options?.abortSignal,
    );

    this.reportTokenUsage();

    if (failure) {
      const failed = await this.tracker.fail(processId, {
        code: failure.code,
        message: failure.message,
      });
      if (!failed.success) {
        this.logger.error(
          `[DocumentTranslator] Could not mark ${processId} as failed: ${failed.error.message}`,
        );
      }
      return err(failure);
    }

    if (options?.abortSignal?.aborted) {
      this.logger.warn(
        `[DocumentTranslator] Translation of ${processId} aborted`,
      );
      return err(
        new TranslationError(
          'PROCESSING_ERROR',
          `Translation of ${processId} was aborted`,
        ),
      );
    }

    const recorded = await this.tracker.getProgress(processId);
    if (!recorded.success) return recorded;
    const recordedPages = new Set(recorded.data.completedPages);
    const missing = pages
      .map((_, index) => index + 1)
      .filter((pageNumber) => !recordedPages.has(pageNumber));
    if (missing.length > 0) {
      this.logger.warn(
        `[DocumentTranslator] ${processId} finished with pages missing: ${missing.join(', ')}`,
      );
      return err(
        new TranslationError(
          'PROCESSING_ERROR',
          `Translation of ${processId} is missing pages ${missing.join(', ')}`,
        ),
      );
    }

    const completed = await this.tracker.complete(processId);
    if (!completed.success) return completed;

    const document = await this.tracker.getDocument(processId);
    if (document.success) {
      this.logger.info(
        `[DocumentTranslator] Completed ${processId} (${pages.length} pages) in ${Date.now() - startTime}ms`,
      );
    }
    return document;
  }

  private async startOrResume(
    request: TranslateDocumentRequest,
    totalPages: number,
    retryFailed: boolean,
  ): Promise<Result<TranslationJob>> {
    const started = await this.tracker.start({ ...request, totalPages });
    if (started.success || started.error.code !== 'ALREADY_EXISTS') {
      return started;
    }

    const existing = await this.tracker.getProgress(request.processId);
    if (!existing.success) return existing;
    const { job } = existing.data;
    const retrying = retryFailed && job.status === 'failed';

    if (job.status !== 'in_progress' && !retrying) {
      return err(
        new TranslationError(
          'INVALID_STATE',
          `Translation job ${job.processId} is already ${job.status}`,
        ),
      );
    }
    if (job.totalPages !== totalPages) {
      return err(
        new TranslationError(
          'VALIDATION_ERROR',
          `Translation job ${job.processId} has ${job.totalPages} pages, got ${totalPages}`,
        ),
      );
    }

    const resumed = retrying ? await this.tracker.retry(job.processId) : ok(job);
    if (resumed.success) {
      this.logger.info(
        `[DocumentTranslator] Resuming ${job.processId} at ${job.progressPercent}%`,
      );
    }
    return resumed;
  }

  /**
   * Run the page pool. Resolves with the first page failure, if any.
   */
  private async translatePages(
    request: TranslateDocumentRequest,
    pages: readonly Uint8Array[],
    pageNumbers: number[],
    abortSignal?: AbortSignal,
  ): Promise<TranslationError | undefined> {
    const scheduling = new AbortController();
    const calls = new AbortController();
    const cancel = (): void => {
      scheduling.abort();
      calls.abort();
    };

    if (abortSignal?.aborted) {
      cancel();
    } else {
      abortSignal?.addEventListener('abort', cancel, { once: true });
    }

    let failure: TranslationError | undefined;
    const maxChunkSize = maxChunkSizeFor(request.targetLanguage, {
      maxChunkSize: this.maxChunkSize,
    });

    try {
      await ConcurrentPool.run(
        pageNumbers,
        this.pageConcurrency,
        async (pageNumber) => {
          const result = await this.translatePage(
            request,
            pages[pageNumber - 1],
            pageNumber,
            maxChunkSize,
            calls.signal,
          );
          if (result.success || abortSignal?.aborted) return;

          failure ??= result.error;
          scheduling.abort();
          if (result.error.code === 'CONFIG_ERROR') {
            calls.abort();
          }
        },
        { abortSignal: scheduling.signal },
      );
    } catch (error) {
      failure ??= TranslationError.fromError(
        'PROCESSING_ERROR',
        'Page processing failed',
        error,
      );
    } finally {
      abortSignal?.removeEventListener('abort', cancel);
    }

    return failure;
  }

  private async translatePage(
    request: TranslateDocumentRequest,
    pageBytes: Uint8Array,
    pageNumber: number,
    maxChunkSize: number,
    abortSignal: AbortSignal,
  ): Promise<Result<TranslationJob>> {
    const markup = await this.extractor.extractPage(pageBytes, {
      pageNumber,
      abortSignal,
    });
    if (!markup.success) return markup;

    const translated = await this.chunkTranslator.translatePage(
      markup.data,
      request.sourceLanguage,
      request.targetLanguage,
      { maxChunkSize, splitMode: this.splitMode, abortSignal },
    );
    if (!translated.success) return translated;

    return this.tracker.recordPage(
      request.processId,
      pageNumber,
      translated.data,
    );
  }

  private reportTokenUsage(): void {
    if (!this.aggregator) return;
    this.aggregator.logSummary(this.logger);
    this.onTokenUsage?.(this.aggregator.getReport());
  }
}
