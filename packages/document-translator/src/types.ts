import type { TranslationError } from './errors/translation-error';

/**
 * Outcome of a core operation: the value, or the typed error that stopped it
 *
 * Mirrors zod's safeParse shape so callers branch on `success`.
 */
export type Result<T> =
  | { success: true; data: T }
  | { success: false; error: TranslationError };

export function ok<T>(data: T): Result<T> {
  return { success: true, data };
}

export function err<T = never>(error: TranslationError): Result<T> {
  return { success: false, error };
}

/**
 * Per-call options handed to the model capabilities
 */
export interface GenerateOptions {
  abortSignal?: AbortSignal;
}

/**
 * Vision-capable model that turns one rasterized page into text
 */
export interface VisionExtractor {
  generate(image: Uint8Array, options?: GenerateOptions): Promise<string>;
}

/**
 * Text-generation model used for translation
 */
export interface TextTranslator {
  generate(
    systemPrompt: string,
    userPrompt: string,
    options?: GenerateOptions,
  ): Promise<string>;
}

/**
 * How ChunkSplitter places chunk boundaries
 *
 * - sentence: split on every ". " (a boundary may fall inside a tag)
 * - markup: ignore ". " inside a tag
 */
export type SplitMode = 'sentence' | 'markup';
