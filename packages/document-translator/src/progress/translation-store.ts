import type { TranslationJob, TranslationPageResult } from '@pagelingo/model';

/**
 * Fields of a job that may change after creation
 */
export type TranslationJobUpdate = Partial<
  Omit<TranslationJob, 'processId' | 'userId' | 'createdAt'>
>;

export interface UpsertPageInput {
  processId: string;
  pageNumber: number;
  content: string;
}

/**
 * Persistence for jobs and page results
 *
 * ProgressTracker is the only writer. Implementations keep
 * (processId, pageNumber) unique.
 */
export interface TranslationStore {
  /**
   * Insert a job. Resolves false, without writing, when the processId exists.
   */
  createJob(job: TranslationJob): Promise<boolean>;

  getJob(processId: string): Promise<TranslationJob | null>;

  /**
   * Apply `update` and return the stored job, or null when it does not exist
   */
  updateJob(
    processId: string,
    update: TranslationJobUpdate,
  ): Promise<TranslationJob | null>;

  /**
   * Insert or overwrite the page result for (processId, pageNumber)
   */
  upsertPage(input: UpsertPageInput): Promise<TranslationPageResult>;

  /**
   * Page results of a job ordered by pageNumber
   */
  listPages(processId: string): Promise<TranslationPageResult[]>;

  /**
   * Jobs of a user, newest first
   */
  listJobsByUser(userId: string): Promise<TranslationJob[]>;
}
