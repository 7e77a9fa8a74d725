/**
 * @pagelingo/document-translator
 *
 * Translates multi-page documents: each page image is extracted into HTML by
 * a vision model, translated chunk by chunk by a text model, and the pages
 * are assembled into one document while progress is persisted for resuming.
 *
 * ## Key Features
 *
 * - Page extraction with index-marker normalization (Vision LLM)
 * - Size-bounded chunking and chunk translation with retry (LLM)
 * - Per-job progress tracking over a pluggable store
 * - Concurrent page pipeline with cancellation and resume
 *
 * @packageDocumentation
 */

export { DocumentTranslator } from './document-translator';
export type {
  DocumentTranslatorOptions,
  TranslateDocumentOptions,
  TranslateDocumentRequest,
} from './document-translator';
export { TranslationError } from './errors/translation-error';
export type { TranslationErrorCode } from './errors/translation-error';
export { err, ok } from './types';
export type {
  GenerateOptions,
  Result,
  SplitMode,
  TextTranslator,
  VisionExtractor,
} from './types';
export { IndexNormalizer, normalizeIndex } from './normalizers/index-normalizer';
export { ChunkSplitter, splitIntoChunks } from './splitters/chunk-splitter';
export type { ChunkSplitterOptions } from './splitters/chunk-splitter';
export { ModelOutputCleaner } from './cleaners/model-output-cleaner';
export { PageExtractor } from './extractors/page-extractor';
export type {
  ExtractPageOptions,
  PageExtractorOptions,
} from './extractors/page-extractor';
export {
  PAGE_EXTRACTION_PROMPT,
  PAGE_STYLES,
} from './extractors/page-extraction-prompt';
export {
  ChunkTranslator,
  TRANSLATION_SYSTEM_PROMPT,
} from './translators/chunk-translator';
export type {
  ChunkTranslatorOptions,
  TranslateChunkOptions,
  TranslatePageOptions,
} from './translators/chunk-translator';
export { DocumentAssembler, combine } from './assemblers/document-assembler';
export { ProgressTracker } from './progress/progress-tracker';
export type {
  StartTranslationInput,
  TranslationFailureInfo,
} from './progress/progress-tracker';
export type {
  TranslationJobUpdate,
  TranslationStore,
  UpsertPageInput,
} from './progress/translation-store';
export { InMemoryTranslationStore } from './progress/in-memory-translation-store';
export { JsonFileTranslationStore } from './progress/json-file-translation-store';
export { loadConfig } from './config/config';
export type { ProviderKeys, TranslatorConfig } from './config/config';
export { getLanguageConfig, maxChunkSizeFor } from './config/language-config';
export type { LanguageConfig } from './config/language-config';
export { createModel } from './providers/model-factory';
export { AiTextTranslator } from './providers/ai-text-translator';
export { AiVisionExtractor } from './providers/ai-vision-extractor';
export { BaseLLMComponent, TextLLMComponent, VisionLLMComponent } from './core';
export type { BaseLLMComponentOptions, VisionLLMComponentOptions } from './core';
