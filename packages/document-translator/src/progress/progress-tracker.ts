import type { LoggerMethods } from '@pagelingo/logger';
import type {
  TranslationJob,
  TranslationProgress,
  TranslationStats,
} from '@pagelingo/model';

import type { Result } from '../types';
import type { TranslationStore } from './translation-store';

import { KeyedMutex } from '@pagelingo/shared';

import { DocumentAssembler } from '../assemblers/document-assembler';
import { TranslationError } from '../errors/translation-error';
import { err, ok } from '../types';

/** Default number of jobs returned by listRecent */
const DEFAULT_RECENT_LIMIT = 2;

export interface StartTranslationInput {
  processId: string;
  userId: string;
  totalPages: number;
  fileName: string;
  sourceLanguage: string;
  targetLanguage: string;
  fileType: string;
}

/**
 * Failure recorded on a job by `fail`
 */
export interface TranslationFailureInfo {
  code: string;
  message: string;
}

/**
 * ProgressTracker - owns every mutation of jobs and page results
 *
 * Mutations for one processId run one at a time through a KeyedMutex, so
 * pages finishing out of order never move `currentPage` backwards. Store
 * failures come back as PROCESSING_ERROR results.
 */
export class ProgressTracker {
  private readonly logger: LoggerMethods;
  private readonly store: TranslationStore;
  private readonly mutex: KeyedMutex;

  constructor(
    logger: LoggerMethods,
    store: TranslationStore,
    mutex: KeyedMutex = new KeyedMutex(),
  ) {
    this.logger = logger;
    this.store = store;
    this.mutex = mutex;
  }

  async start(input: StartTranslationInput): Promise<Result<TranslationJob>> {
    if (!Number.isInteger(input.totalPages) || input.totalPages < 1) {
      return err(
        new TranslationError(
          'VALIDATION_ERROR',
          `totalPages must be a positive integer, got ${input.totalPages}`,
        ),
      );
    }

    return this.exclusive(input.processId, 'start', async () => {
      const now = new Date().toISOString();
      const job: TranslationJob = {
        ...input,
        currentPage: 0,
        progressPercent: 0,
        status: 'in_progress',
        errorCode: null,
        errorMessage: null,
        createdAt: now,
        updatedAt: now,
      };

      const created = await this.store.createJob(job);
      if (!created) {
        return err(
          new TranslationError(
            'ALREADY_EXISTS',
            `Translation job ${input.processId} already exists`,
          ),
        );
      }

      this.logger.info(
        `[ProgressTracker] Started job ${input.processId} (${input.totalPages} pages, ${input.sourceLanguage} → ${input.targetLanguage})`,
      );
      return ok(job);
    });
  }

  /**
   * Store the translated markup of one page and advance the job.
   *
   * Recording a page twice overwrites the earlier result.
   */
  async recordPage(
    processId: string,
    pageNumber: number,
    content: string,
  ): Promise<Result<TranslationJob>> {
    return this.exclusive(processId, 'recordPage', async () => {
      const found = await this.loadActiveJob(processId);
      if (!found.success) return found;
      const job = found.data;

      if (
        !Number.isInteger(pageNumber) ||
        pageNumber < 1 ||
        pageNumber > job.totalPages
      ) {
        return err(
          new TranslationError(
            'VALIDATION_ERROR',
            `Page ${pageNumber} is outside 1..${job.totalPages}`,
          ),
        );
      }

      await this.store.upsertPage({ processId, pageNumber, content });

      const currentPage = Math.max(job.currentPage, pageNumber);
      const updated = await this.store.updateJob(processId, {
        currentPage,
        progressPercent: Math.round((currentPage / job.totalPages) * 100),
        updatedAt: new Date().toISOString(),
      });
      if (!updated) return this.notFound(processId);

      this.logger.debug(
        `[ProgressTracker] Recorded page ${pageNumber} of ${processId} (${updated.progressPercent}%)`,
      );
      return ok(updated);
    });
  }

  async complete(processId: string): Promise<Result<TranslationJob>> {
    return this.exclusive(processId, 'complete', async () => {
      const found = await this.loadActiveJob(processId);
      if (!found.success) return found;

      const updated = await this.store.updateJob(processId, {
        status: 'completed',
        progressPercent: 100,
        updatedAt: new Date().toISOString(),
      });
      if (!updated) return this.notFound(processId);

      this.logger.info(`[ProgressTracker] Completed job ${processId}`);
      return ok(updated);
    });
  }

  /**
   * Mark the job failed. Recorded pages stay in the store.
   */
  async fail(
    processId: string,
    failure: TranslationFailureInfo,
  ): Promise<Result<TranslationJob>> {
    return this.exclusive(processId, 'fail', async () => {
      const found = await this.loadActiveJob(processId);
      if (!found.success) return found;

      const updated = await this.store.updateJob(processId, {
        status: 'failed',
        errorCode: failure.code,
        errorMessage: failure.message,
        updatedAt: new Date().toISOString(),
      });
      if (!updated) return this.notFound(processId);

      this.logger.error(
        `[ProgressTracker] Job ${processId} failed: [${failure.code}] ${failure.message}`,
      );
      return ok(updated);
    });
  }

  /**
   * Move a failed job back to in progress and clear its error. Recorded pages
   * stay, so the next run only translates the missing ones. This is the only
   * way out of `failed`.
   */
  async retry(processId: string): Promise<Result<TranslationJob>> {
    return this.exclusive(processId, 'retry', async () => {
      const job = await this.store.getJob(processId);
      if (!job) return this.notFound(processId);

      if (job.status !== 'failed') {
        return err(
          new TranslationError(
            'INVALID_STATE',
            `Translation job ${processId} is ${job.status}, not failed`,
          ),
        );
      }

      const updated = await this.store.updateJob(processId, {
        status: 'in_progress',
        errorCode: null,
        errorMessage: null,
        updatedAt: new Date().toISOString(),
      });
      if (!updated) return this.notFound(processId);

      this.logger.info(
        `[ProgressTracker] Retrying job ${processId} after ${job.errorCode}`,
      );
      return ok(updated);
    });
  }

  async getProgress(processId: string): Promise<Result<TranslationProgress>> {
    return this.guard('getProgress', async () => {
      const job = await this.store.getJob(processId);
      if (!job) return this.notFound(processId);

      const pages = await this.store.listPages(processId);
      return ok({
        job,
        completedPages: pages.map((page) => page.pageNumber),
      });
    });
  }

  /**
   * Combine the stored pages of a job, in page order, into one document
   */
  async getDocument(processId: string): Promise<Result<string>> {
    return this.guard('getDocument', async () => {
      const job = await this.store.getJob(processId);
      if (!job) return this.notFound(processId);

      const pages = await this.store.listPages(processId);
      return ok(DocumentAssembler.combine(pages.map((page) => page.content)));
    });
  }

  async listRecent(
    userId: string,
    limit: number = DEFAULT_RECENT_LIMIT,
  ): Promise<Result<TranslationJob[]>> {
    return this.guard('listRecent', async () => {
      const jobs = await this.store.listJobsByUser(userId);
      return ok(jobs.slice(0, Math.max(0, limit)));
    });
  }

  async getStats(userId: string): Promise<Result<TranslationStats>> {
    return this.guard('getStats', async () => {
      const jobs = await this.store.listJobsByUser(userId);
      const stats: TranslationStats = {
        totalJobs: jobs.length,
        inProgress: 0,
        completed: 0,
        failed: 0,
        pagesTranslated: 0,
      };

      for (const job of jobs) {
        if (job.status === 'in_progress') stats.inProgress++;
        else if (job.status === 'completed') stats.completed++;
        else stats.failed++;

        const pages = await this.store.listPages(job.processId);
        stats.pagesTranslated += pages.length;
      }

      return ok(stats);
    });
  }

  private async loadActiveJob(
    processId: string,
  ): Promise<Result<TranslationJob>> {
    const job = await this.store.getJob(processId);
    if (!job) return this.notFound(processId);

    if (job.status !== 'in_progress') {
      return err(
        new TranslationError(
          'INVALID_STATE',
          `Translation job ${processId} is already ${job.status}`,
        ),
      );
    }
    return ok(job);
  }

  private notFound<T>(processId: string): Result<T> {
    return err(
      new TranslationError(
        'NOT_FOUND',
        `Translation job ${processId} not found`,
      ),
    );
  }

  private exclusive<T>(
    processId: string,
    operation: string,
    task: () => Promise<Result<T>>,
  ): Promise<Result<T>> {
    return this.guard(operation, () => this.mutex.runExclusive(processId, task));
  }

  private async guard<T>(
    operation: string,
    task: () => Promise<Result<T>>,
  ): Promise<Result<T>> {
    try {
      return await task();
    } catch (error) {
      this.logger.error(
        `[ProgressTracker] ${operation} failed: ${TranslationError.getErrorMessage(error)}`,
      );
      return err(
        TranslationError.fromError(
          'PROCESSING_ERROR',
          `Progress store ${operation} failed`,
          error,
        ),
      );
    }
  }
}
