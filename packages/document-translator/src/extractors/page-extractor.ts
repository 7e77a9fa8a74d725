import type { LoggerMethods } from '@pagelingo/logger';

import type { GenerateOptions, Result, VisionExtractor } from '../types';

import { withTimeout } from '@pagelingo/shared';
import * as cheerio from 'cheerio';

import { ModelOutputCleaner } from '../cleaners/model-output-cleaner';
import { TranslationError } from '../errors/translation-error';
import { IndexNormalizer } from '../normalizers/index-normalizer';
import { err, ok } from '../types';
import { PAGE_STYLES } from './page-extraction-prompt';

/** Minimum length of the extracted markup, styles excluded */
const DEFAULT_MIN_CONTENT_LENGTH = 50;

/** Default timeout for one vision call */
const DEFAULT_TIMEOUT_MS = 120000;

export interface PageExtractorOptions {
  /** Minimum markup length accepted (default: 50) */
  minContentLength?: number;
  /** Timeout for the vision call in milliseconds (default: 120000) */
  timeoutMs?: number;
}

export interface ExtractPageOptions extends GenerateOptions {
  /** 1-based page number, used for logging only */
  pageNumber?: number;
}

/**
 * PageExtractor - turns one rasterized page into validated HTML
 *
 * Calls the vision model once (no retry), strips code fences, prepends page
 * styles and normalizes the text of `.index` nodes. Failures come back as
 * typed results: PROCESSING_ERROR when the model call fails, CONTENT_ERROR
 * when the output is not usable markup.
 */
export class PageExtractor {
  private readonly logger: LoggerMethods;
  private readonly vision: VisionExtractor;
  private readonly minContentLength: number;
  private readonly timeoutMs: number;

  constructor(
    logger: LoggerMethods,
    vision: VisionExtractor,
    options?: PageExtractorOptions,
  ) {
    this.logger = logger;
    this.vision = vision;
    this.minContentLength =
      options?.minContentLength ?? DEFAULT_MIN_CONTENT_LENGTH;
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async extractPage(
    pageBytes: Uint8Array,
    options?: ExtractPageOptions,
  ): Promise<Result<string>> {
    const label = options?.pageNumber ? `page ${options.pageNumber}` : 'page';
    const startTime = Date.now();
    this.logger.info(`[PageExtractor] Extracting content from ${label}`);

    let raw: string;
    try {
      raw = await withTimeout(
        this.vision.generate(pageBytes, { abortSignal: options?.abortSignal }),
        this.timeoutMs,
      );
    } catch (error) {
      this.logger.error(
        `[PageExtractor] Vision call failed for ${label}: ${TranslationError.getErrorMessage(error)}`,
      );
      if (error instanceof TranslationError && error.code === 'CONFIG_ERROR') {
        return err(error);
      }
      return err(
        new TranslationError(
          'PROCESSING_ERROR',
          `Failed to process ${label}: ${TranslationError.getErrorMessage(error)}`,
          { cause: error },
        ),
      );
    }

    const body = ModelOutputCleaner.trimToFirstTag(
      ModelOutputCleaner.stripCodeFences(raw),
    );

    if (body.length === 0 || body.length < this.minContentLength) {
      this.logger.error(`[PageExtractor] Empty or too short content on ${label}`);
      return err(
        new TranslationError(
          'CONTENT_ERROR',
          `Invalid or insufficient content extracted from ${label} (${body.length} chars)`,
        ),
      );
    }

    if (!ModelOutputCleaner.startsWithTag(body)) {
      this.logger.error(`[PageExtractor] No markup found on ${label}`);
      return err(
        new TranslationError(
          'CONTENT_ERROR',
          `Extracted content for ${label} is not markup`,
        ),
      );
    }

    const styled = body.includes('<style>') ? body : `${PAGE_STYLES}\n${body}`;
    const html = PageExtractor.normalizeIndexNodes(styled);

    this.logger.info(
      `[PageExtractor] Extracted ${html.length} chars from ${label} in ${Date.now() - startTime}ms`,
    );
    return ok(html);
  }

  /**
   * Apply IndexNormalizer to every `.index` node. The markup is
   * re-serialized only when a node actually changed.
   */
  static normalizeIndexNodes(html: string): string {
    const $ = cheerio.load(html, null, false);
    let changed = false;

    $('.index').each((_, element) => {
      const node = $(element);
      const text = node.text().trim();
      const corrected = IndexNormalizer.normalize(text);
      if (corrected !== text) {
        node.text(corrected);
        changed = true;
      }
    });

    return changed ? $.html() : html;
  }
}
