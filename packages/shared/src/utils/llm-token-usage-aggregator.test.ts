import type { LoggerMethods } from '@pagelingo/logger';

import { beforeEach, describe, expect, test, vi } from 'vitest';

import type { ExtendedTokenUsage } from './llm-caller';

import { LLMTokenUsageAggregator } from './llm-token-usage-aggregator';

function usage(
  component: string,
  modelName: string,
  inputTokens: number,
  outputTokens: number,
): ExtendedTokenUsage {
  return {
    component,
    phase: 'test',
    model: 'primary',
    modelName,
    inputTokens,
    outputTokens,
    totalTokens: inputTokens + outputTokens,
  };
}

describe('LLMTokenUsageAggregator', () => {
  let logger: LoggerMethods;

  beforeEach(() => {
    logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  });

  test('should group usage by component in first-seen order', () => {
    const aggregator = new LLMTokenUsageAggregator();
    aggregator.track(usage('PageExtractor', 'gemini', 100, 20));
    aggregator.track(usage('ChunkTranslator', 'claude', 50, 50));
    aggregator.track(usage('PageExtractor', 'gemini', 10, 5));

    expect(aggregator.getReport()).toEqual({
      components: [
        {
          component: 'PageExtractor',
          calls: 2,
          modelNames: ['gemini'],
          total: { inputTokens: 110, outputTokens: 25, totalTokens: 135 },
        },
        {
          component: 'ChunkTranslator',
          calls: 1,
          modelNames: ['claude'],
          total: { inputTokens: 50, outputTokens: 50, totalTokens: 100 },
        },
      ],
      total: { inputTokens: 160, outputTokens: 75, totalTokens: 235 },
    });
  });

  test('should log a summary line per component and a grand total', () => {
    const aggregator = new LLMTokenUsageAggregator();
    aggregator.track(usage('ChunkTranslator', 'claude', 1500, 300));

    aggregator.logSummary(logger);

    expect(logger.info).toHaveBeenNthCalledWith(
      1,
      '[DocumentTranslator] Token usage summary:',
    );
    expect(logger.info).toHaveBeenNthCalledWith(
      2,
      '  ChunkTranslator (claude, 1 calls): 1500 input, 300 output, 1800 total',
    );
    expect(logger.info).toHaveBeenNthCalledWith(
      3,
      '  Grand total: 1500 input, 300 output, 1800 total',
    );
  });

  test('should report when nothing was tracked', () => {
    new LLMTokenUsageAggregator().logSummary(logger);

    expect(logger.info).toHaveBeenCalledWith(
      '[DocumentTranslator] No token usage to report',
    );
  });
});
