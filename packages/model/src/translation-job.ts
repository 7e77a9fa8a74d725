/**
 * Translation job types
 *
 * A TranslationJob is the persisted progress record of one document
 * translation request. TranslationPageResults hold the translated markup of
 * each finished page and are what a resumed run reads to skip work.
 */

/**
 * Lifecycle status of a job
 *
 * Transitions only `in_progress → completed` or `in_progress → failed`.
 */
export type TranslationJobStatus = 'in_progress' | 'completed' | 'failed';

export interface TranslationJob {
  /** Unique key of the job */
  processId: string;
  userId: string;
  /** Number of pages in the source document (≥ 1) */
  totalPages: number;
  /** Highest page number recorded so far (0 before the first page) */
  currentPage: number;
  /** round(currentPage / totalPages * 100); 100 once completed */
  progressPercent: number;
  status: TranslationJobStatus;
  fileName: string;
  sourceLanguage: string;
  targetLanguage: string;
  fileType: string;
  /** Error code recorded when the job failed */
  errorCode: string | null;
  /** Error message recorded when the job failed */
  errorMessage: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface TranslationPageResult {
  id: string;
  processId: string;
  /** Translated markup for exactly one page */
  content: string;
  /** 1-based page number, unique per processId */
  pageNumber: number;
  createdAt: string;
}

/**
 * Job snapshot plus the page numbers already recorded, sorted ascending
 */
export interface TranslationProgress {
  job: TranslationJob;
  completedPages: number[];
}

/**
 * Per-user counters across all jobs
 */
export interface TranslationStats {
  totalJobs: number;
  inProgress: number;
  completed: number;
  failed: number;
  /** Sum of recorded page results across the user's jobs */
  pagesTranslated: number;
}
