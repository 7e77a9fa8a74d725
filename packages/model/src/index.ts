export type {
  TranslationJob,
  TranslationJobStatus,
  TranslationPageResult,
  TranslationProgress,
  TranslationStats,
} from './translation-job';
export type {
  ComponentUsageReport,
  TokenUsageReport,
  TokenUsageSummary,
} from './token-usage-report';
