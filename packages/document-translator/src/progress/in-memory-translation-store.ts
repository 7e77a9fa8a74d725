import type { TranslationJob, TranslationPageResult } from '@pagelingo/model';

import type {
  TranslationJobUpdate,
  TranslationStore,
  UpsertPageInput,
} from './translation-store';

import { randomUUID } from 'node:crypto';

/**
 * TranslationStore kept in process memory. Values are copied on the way in
 * and out so callers never share references with the store.
 */
export class InMemoryTranslationStore implements TranslationStore {
  private readonly jobs = new Map<string, TranslationJob>();
  private readonly pages = new Map<string, Map<number, TranslationPageResult>>();

  async createJob(job: TranslationJob): Promise<boolean> {
    if (this.jobs.has(job.processId)) return false;
    this.jobs.set(job.processId, { ...job });
    this.pages.set(job.processId, new Map());
    return true;
  }

  async getJob(processId: string): Promise<TranslationJob | null> {
    const job = this.jobs.get(processId);
    return job ? { ...job } : null;
  }

  async updateJob(
    processId: string,
    update: TranslationJobUpdate,
  ): Promise<TranslationJob | null> {
    const job = this.jobs.get(processId);
    if (!job) return null;

    const updated = { ...job, ...update };
    this.jobs.set(processId, updated);
    return { ...updated };
  }

  async upsertPage(input: UpsertPageInput): Promise<TranslationPageResult> {
    let jobPages = this.pages.get(input.processId);
    if (!jobPages) {
      jobPages = new Map();
      this.pages.set(input.processId, jobPages);
    }

    const existing = jobPages.get(input.pageNumber);
    const page: TranslationPageResult = {
      id: existing?.id ?? randomUUID(),
      processId: input.processId,
      pageNumber: input.pageNumber,
      content: input.content,
      createdAt: existing?.createdAt ?? new Date().toISOString(),
    };
    jobPages.set(input.pageNumber, page);
    return { ...page };
  }

  async listPages(processId: string): Promise<TranslationPageResult[]> {
    const jobPages = this.pages.get(processId);
    if (!jobPages) return [];
    return [...jobPages.values()]
      .sort((a, b) => a.pageNumber - b.pageNumber)
      .map((page) => ({ ...page }));
  }

  async listJobsByUser(userId: string): Promise<TranslationJob[]> {
    // Reversed first so jobs created in the same millisecond stay newest first
    return [...this.jobs.values()]
      .reverse()
      .filter((job) => job.userId === userId)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .map((job) => ({ ...job }));
  }
}
