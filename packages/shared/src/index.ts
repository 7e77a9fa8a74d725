export {
  AbortedError,
  TimeoutError,
  backoffDelay,
  sha256,
  sleep,
  withTimeout,
} from './utils/async-utils';
export {
  ConcurrentPool,
  type ConcurrentPoolOptions,
} from './utils/concurrent-pool';
export { KeyedMutex } from './utils/keyed-mutex';
export {
  LLMCaller,
  type ExtendedTokenUsage,
  type LLMCallConfig,
  type LLMCallResult,
  type LLMVisionCallConfig,
} from './utils/llm-caller';
export { LLMTokenUsageAggregator } from './utils/llm-token-usage-aggregator';
