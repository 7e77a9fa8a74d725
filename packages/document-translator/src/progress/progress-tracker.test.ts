import type { StartTranslationInput } from './progress-tracker';

import { beforeEach, describe, expect, test, vi } from 'vitest';

import { InMemoryTranslationStore } from './in-memory-translation-store';
import { ProgressTracker } from './progress-tracker';

function startInput(
  overrides: Partial<StartTranslationInput> = {},
): StartTranslationInput {
  return {
    processId: 'job-1',
    userId: 'user-1',
    totalPages: 3,
    fileName: 'report.pdf',
    sourceLanguage: 'en',
    targetLanguage: 'ko',
    fileType: 'pdf',
    ...overrides,
  };
}

describe('ProgressTracker', () => {
  const mockLogger = {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  };
  let store: InMemoryTranslationStore;
  let tracker: ProgressTracker;

  beforeEach(() => {
    store = new InMemoryTranslationStore();
    tracker = new ProgressTracker(mockLogger, store);
  });

  describe('start', () => {
    test('should create an in-progress job at page 0', async () => {
      const result = await tracker.start(startInput());

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data).toMatchObject({
        processId: 'job-1',
        userId: 'user-1',
        totalPages: 3,
        currentPage: 0,
        progressPercent: 0,
        status: 'in_progress',
        errorCode: null,
        errorMessage: null,
      });
      expect(result.data.createdAt).toBe(result.data.updatedAt);
      expect(await store.getJob('job-1')).toEqual(result.data);
    });

    test('should reject a processId that already exists', async () => {
      await tracker.start(startInput());

      const result = await tracker.start(startInput());

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('ALREADY_EXISTS');
    });

    test.each([0, -2, 1.5])(
      'should reject totalPages %s',
      async (totalPages) => {
        const result = await tracker.start(startInput({ totalPages }));

        expect(result.success).toBe(false);
        if (result.success) return;
        expect(result.error.code).toBe('VALIDATION_ERROR');
      },
    );
  });

  describe('recordPage', () => {
    beforeEach(async () => {
      await tracker.start(startInput());
    });

    test('should never move currentPage backwards', async () => {
      const afterTwo = await tracker.recordPage('job-1', 2, '<p>2</p>');
      const afterOne = await tracker.recordPage('job-1', 1, '<p>1</p>');
      const afterThree = await tracker.recordPage('job-1', 3, '<p>3</p>');

      expect(afterTwo).toMatchObject({
        success: true,
        data: { currentPage: 2, progressPercent: 67 },
      });
      expect(afterOne).toMatchObject({
        success: true,
        data: { currentPage: 2, progressPercent: 67 },
      });
      expect(afterThree).toMatchObject({
        success: true,
        data: { currentPage: 3, progressPercent: 100 },
      });
    });

    test('should report recorded pages in getProgress', async () => {
      await tracker.recordPage('job-1', 1, '<p>1</p>');
      await tracker.recordPage('job-1', 2, '<p>2</p>');

      const progress = await tracker.getProgress('job-1');

      expect(progress.success).toBe(true);
      if (!progress.success) return;
      expect(progress.data.job.progressPercent).toBe(67);
      expect(progress.data.completedPages).toEqual([1, 2]);
    });

    test('should overwrite a page recorded twice', async () => {
      await tracker.recordPage('job-1', 1, '<p>first</p>');
      const [first] = await store.listPages('job-1');

      await tracker.recordPage('job-1', 1, '<p>second</p>');
      const pages = await store.listPages('job-1');

      expect(pages).toHaveLength(1);
      expect(pages[0]).toEqual({ ...first, content: '<p>second</p>' });
    });

    test('should serialize concurrent recordings', async () => {
      await tracker.start(startInput({ processId: 'job-5', totalPages: 5 }));

      await Promise.all(
        [5, 3, 1, 4, 2].map((page) =>
          tracker.recordPage('job-5', page, `<p>${page}</p>`),
        ),
      );
      const progress = await tracker.getProgress('job-5');

      expect(progress).toMatchObject({
        success: true,
        data: {
          job: { currentPage: 5, progressPercent: 100 },
          completedPages: [1, 2, 3, 4, 5],
        },
      });
    });

    test('should return NOT_FOUND for an unknown job', async () => {
      const result = await tracker.recordPage('missing', 1, '<p>1</p>');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('NOT_FOUND');
    });

    test.each([0, 4, 1.5])(
      'should reject page number %s',
      async (pageNumber) => {
        const result = await tracker.recordPage('job-1', pageNumber, '<p>x</p>');

        expect(result.success).toBe(false);
        if (result.success) return;
        expect(result.error.code).toBe('VALIDATION_ERROR');
        expect(await store.listPages('job-1')).toEqual([]);
      },
    );

    test('should reject pages for a completed job', async () => {
      await tracker.complete('job-1');

      const result = await tracker.recordPage('job-1', 1, '<p>1</p>');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('INVALID_STATE');
      expect(result.error.message).toBe(
        'Translation job job-1 is already completed',
      );
    });
  });

  describe('complete', () => {
    test('should mark the job completed at 100 percent', async () => {
      await tracker.start(startInput());
      await tracker.recordPage('job-1', 1, '<p>1</p>');

      const result = await tracker.complete('job-1');

      expect(result).toMatchObject({
        success: true,
        data: { status: 'completed', progressPercent: 100, currentPage: 1 },
      });
    });

    test('should not complete a terminal job again', async () => {
      await tracker.start(startInput());
      await tracker.complete('job-1');

      const result = await tracker.complete('job-1');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('INVALID_STATE');
    });
  });

  describe('fail', () => {
    test('should record the error and keep pages', async () => {
      await tracker.start(startInput());
      await tracker.recordPage('job-1', 1, '<p>1</p>');

      const result = await tracker.fail('job-1', {
        code: 'TRANSLATION_ERROR',
        message: 'Translation failed after 3 attempts',
      });
      const progress = await tracker.getProgress('job-1');

      expect(result).toMatchObject({
        success: true,
        data: {
          status: 'failed',
          errorCode: 'TRANSLATION_ERROR',
          errorMessage: 'Translation failed after 3 attempts',
          progressPercent: 33,
        },
      });
      expect(progress).toMatchObject({
        success: true,
        data: { completedPages: [1] },
      });
    });

    test('should not fail a terminal job', async () => {
      await tracker.start(startInput());
      await tracker.fail('job-1', { code: 'PROCESSING_ERROR', message: 'x' });

      const result = await tracker.fail('job-1', {
        code: 'PROCESSING_ERROR',
        message: 'y',
      });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('INVALID_STATE');
    });
  });

  describe('retry', () => {
    test('should reopen a failed job and keep its pages', async () => {
      await tracker.start(startInput());
      await tracker.recordPage('job-1', 1, '<p>1</p>');
      await tracker.fail('job-1', { code: 'TRANSLATION_ERROR', message: 'x' });

      const result = await tracker.retry('job-1');
      const progress = await tracker.getProgress('job-1');

      expect(result).toMatchObject({
        success: true,
        data: {
          status: 'in_progress',
          errorCode: null,
          errorMessage: null,
          currentPage: 1,
          progressPercent: 33,
        },
      });
      expect(progress).toMatchObject({
        success: true,
        data: { completedPages: [1] },
      });
    });

    test('should accept pages again after a retry', async () => {
      await tracker.start(startInput());
      await tracker.fail('job-1', { code: 'PROVIDER_ERROR', message: 'x' });
      await tracker.retry('job-1');

      const result = await tracker.recordPage('job-1', 2, '<p>2</p>');

      expect(result).toMatchObject({
        success: true,
        data: { currentPage: 2, progressPercent: 67 },
      });
    });

    test.each(['in-progress', 'completed'] as const)(
      'should reject a %s job',
      async (state) => {
        await tracker.start(startInput());
        if (state === 'completed') await tracker.complete('job-1');

        const result = await tracker.retry('job-1');

        expect(result.success).toBe(false);
        if (result.success) return;
        expect(result.error.code).toBe('INVALID_STATE');
      },
    );

    test('should return NOT_FOUND for an unknown job', async () => {
      const result = await tracker.retry('missing');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('NOT_FOUND');
    });
  });

  describe('getProgress', () => {
    test('should return NOT_FOUND for an unknown job', async () => {
      const result = await tracker.getProgress('missing');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('NOT_FOUND');
    });

    test('should turn store failures into PROCESSING_ERROR', async () => {
      vi.spyOn(store, 'getJob').mockRejectedValue(new Error('disk full'));

      const result = await tracker.getProgress('job-1');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('PROCESSING_ERROR');
      expect(result.error.message).toBe(
        'Progress store getProgress failed: disk full',
      );
    });
  });

  describe('getDocument', () => {
    test('should combine stored pages in page order', async () => {
      await tracker.start(startInput({ totalPages: 2 }));
      await tracker.recordPage('job-1', 2, '<p>B</p>');
      await tracker.recordPage('job-1', 1, '<html><body><p>A</p></body></html>');

      const result = await tracker.getDocument('job-1');

      expect(result).toEqual({
        success: true,
        data:
          "<div class='document'>\n" +
          "<div class='page'>\n<p>A</p>\n</div>\n" +
          "<div class='page'>\n<p>B</p>\n</div>\n" +
          '</div>',
      });
    });

    test('should return NOT_FOUND for an unknown job', async () => {
      const result = await tracker.getDocument('missing');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('NOT_FOUND');
    });
  });

  describe('listRecent and getStats', () => {
    beforeEach(async () => {
      await tracker.start(startInput({ processId: 'job-1', totalPages: 1 }));
      await tracker.recordPage('job-1', 1, '<p>1</p>');
      await tracker.complete('job-1');

      await tracker.start(startInput({ processId: 'job-2' }));
      await tracker.fail('job-2', { code: 'CONTENT_ERROR', message: 'bad' });

      await tracker.start(startInput({ processId: 'job-3' }));
      await tracker.recordPage('job-3', 1, '<p>1</p>');

      await tracker.start(startInput({ processId: 'other', userId: 'user-2' }));
    });

    test('should list the two newest jobs by default', async () => {
      const result = await tracker.listRecent('user-1');

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.map((job) => job.processId)).toEqual([
        'job-3',
        'job-2',
      ]);
    });

    test('should honor the limit', async () => {
      const result = await tracker.listRecent('user-1', 5);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.map((job) => job.processId)).toEqual([
        'job-3',
        'job-2',
        'job-1',
      ]);
    });

    test('should count jobs per status and translated pages', async () => {
      const result = await tracker.getStats('user-1');

      expect(result).toEqual({
        success: true,
        data: {
          totalJobs: 3,
          inProgress: 1,
          completed: 1,
          failed: 1,
          pagesTranslated: 2,
        },
      });
    });

    test('should return zero counts for a user without jobs', async () => {
      const result = await tracker.getStats('nobody');

      expect(result).toEqual({
        success: true,
        data: {
          totalJobs: 0,
          inProgress: 0,
          completed: 0,
          failed: 0,
          pagesTranslated: 0,
        },
      });
    });
  });
});
