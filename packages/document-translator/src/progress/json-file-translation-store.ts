import type { TranslationJob, TranslationPageResult } from '@pagelingo/model';

import type {
  TranslationJobUpdate,
  TranslationStore,
  UpsertPageInput,
} from './translation-store';

import { randomUUID } from 'node:crypto';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';

const jobRecordSchema = z.object({
  process_id: z.string(),
  user_id: z.string(),
  total_pages: z.number().int(),
  current_page: z.number().int(),
  progress_percent: z.number(),
  status: z.enum(['in_progress', 'completed', 'failed']),
  file_name: z.string(),
  source_language: z.string(),
  target_language: z.string(),
  file_type: z.string(),
  error_code: z.string().nullable(),
  error_message: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});

const pageRecordSchema = z.object({
  id: z.string(),
  process_id: z.string(),
  page_number: z.number().int(),
  content: z.string(),
  created_at: z.string(),
});

const databaseSchema = z.object({
  jobs: z.array(jobRecordSchema).default([]),
  pages: z.array(pageRecordSchema).default([]),
});

type JobRecord = z.infer<typeof jobRecordSchema>;
type PageRecord = z.infer<typeof pageRecordSchema>;
type Database = z.infer<typeof databaseSchema>;

function recordToJob(row: JobRecord): TranslationJob {
  return {
    processId: row.process_id,
    userId: row.user_id,
    totalPages: row.total_pages,
    currentPage: row.current_page,
    progressPercent: row.progress_percent,
    status: row.status,
    fileName: row.file_name,
    sourceLanguage: row.source_language,
    targetLanguage: row.target_language,
    fileType: row.file_type,
    errorCode: row.error_code,
    errorMessage: row.error_message,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function jobToRecord(job: TranslationJob): JobRecord {
  return {
    process_id: job.processId,
    user_id: job.userId,
    total_pages: job.totalPages,
    current_page: job.currentPage,
    progress_percent: job.progressPercent,
    status: job.status,
    file_name: job.fileName,
    source_language: job.sourceLanguage,
    target_language: job.targetLanguage,
    file_type: job.fileType,
    error_code: job.errorCode,
    error_message: job.errorMessage,
    created_at: job.createdAt,
    updated_at: job.updatedAt,
  };
}

function recordToPage(row: PageRecord): TranslationPageResult {
  return {
    id: row.id,
    processId: row.process_id,
    pageNumber: row.page_number,
    content: row.content,
    createdAt: row.created_at,
  };
}

/**
 * TranslationStore backed by one JSON file.
 *
 * Every operation reads the whole file and writes it back synchronously, so
 * one process sees its own writes in order. Not meant for several processes
 * sharing a file.
 */
export class JsonFileTranslationStore implements TranslationStore {
  constructor(private readonly filePath: string) {}

  private ensureDbExists(): void {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    if (!existsSync(this.filePath)) {
      const initialDb: Database = { jobs: [], pages: [] };
      writeFileSync(this.filePath, JSON.stringify(initialDb, null, 2));
    }
  }

  private readDatabase(): Database {
    this.ensureDbExists();
    const content = readFileSync(this.filePath, 'utf-8');
    return databaseSchema.parse(JSON.parse(content));
  }

  private writeDatabase(db: Database): void {
    this.ensureDbExists();
    writeFileSync(this.filePath, JSON.stringify(db, null, 2));
  }

  async createJob(job: TranslationJob): Promise<boolean> {
    const db = this.readDatabase();
    if (db.jobs.some((row) => row.process_id === job.processId)) {
      return false;
    }

    db.jobs.push(jobToRecord(job));
    this.writeDatabase(db);
    return true;
  }

  async getJob(processId: string): Promise<TranslationJob | null> {
    const db = this.readDatabase();
    const record = db.jobs.find((row) => row.process_id === processId);
    return record ? recordToJob(record) : null;
  }

  async updateJob(
    processId: string,
    update: TranslationJobUpdate,
  ): Promise<TranslationJob | null> {
    const db = this.readDatabase();
    const index = db.jobs.findIndex((row) => row.process_id === processId);
    if (index === -1) return null;

    const updated = { ...recordToJob(db.jobs[index]), ...update };
    db.jobs[index] = jobToRecord(updated);
    this.writeDatabase(db);
    return updated;
  }

  async upsertPage(input: UpsertPageInput): Promise<TranslationPageResult> {
    const db = this.readDatabase();
    const index = db.pages.findIndex(
      (row) =>
        row.process_id === input.processId &&
        row.page_number === input.pageNumber,
    );

    const existing = index === -1 ? undefined : db.pages[index];
    const record: PageRecord = {
      id: existing?.id ?? randomUUID(),
      process_id: input.processId,
      page_number: input.pageNumber,
      content: input.content,
      created_at: existing?.created_at ?? new Date().toISOString(),
    };

    if (index === -1) {
      db.pages.push(record);
    } else {
      db.pages[index] = record;
    }
    this.writeDatabase(db);

    return recordToPage(record);
  }

  async listPages(processId: string): Promise<TranslationPageResult[]> {
    const db = this.readDatabase();
    return db.pages
      .filter((row) => row.process_id === processId)
      .sort((a, b) => a.page_number - b.page_number)
      .map(recordToPage);
  }

  async listJobsByUser(userId: string): Promise<TranslationJob[]> {
    const db = this.readDatabase();
    return db.jobs
      .filter((row) => row.user_id === userId)
      .reverse()
      .sort((a, b) => b.created_at.localeCompare(a.created_at))
      .map(recordToJob);
  }
}
