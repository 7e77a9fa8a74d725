/**
 * Token usage report types for document translation
 */

/**
 * Token counts
 */
export interface TokenUsageSummary {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Token usage for a specific component
 *
 * Examples: PageExtractor, ChunkTranslator
 */
export interface ComponentUsageReport {
  component: string;
  /** Number of model calls tracked */
  calls: number;
  /** Distinct model names used by the component */
  modelNames: string[];
  total: TokenUsageSummary;
}

/**
 * Token usage of one translation run, grouped by component in the order the
 * components first reported usage
 */
export interface TokenUsageReport {
  components: ComponentUsageReport[];
  total: TokenUsageSummary;
}
