import type { LoggerMethods } from '@pagelingo/logger';
import type { TokenUsageReport, TokenUsageSummary } from '@pagelingo/model';

import type { ExtendedTokenUsage } from './llm-caller';

function formatTokens(usage: TokenUsageSummary): string {
  return `${usage.inputTokens} input, ${usage.outputTokens} output, ${usage.totalTokens} total`;
}

function emptySummary(): TokenUsageSummary {
  return { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
}

function addTo(target: TokenUsageSummary, usage: TokenUsageSummary): void {
  target.inputTokens += usage.inputTokens;
  target.outputTokens += usage.outputTokens;
  target.totalTokens += usage.totalTokens;
}

interface ComponentAggregate {
  component: string;
  calls: number;
  models: Set<string>;
  total: TokenUsageSummary;
}

/**
 * LLMTokenUsageAggregator - Aggregates token usage across all LLM calls
 *
 * Collects usage from every component of a translation run and produces a
 * report grouped by component, in the order components were first seen.
 *
 * @example
 * ```typescript
 * const aggregator = new LLMTokenUsageAggregator();
 * aggregator.track(result.usage);
 * aggregator.logSummary(logger);
 * // [DocumentTranslator] Token usage summary:
 * //   ChunkTranslator (claude-3-5-sonnet-20241022, 4 calls): 1500 input, 300 output, 1800 total
 * //   Grand total: 1500 input, 300 output, 1800 total
 * ```
 */
export class LLMTokenUsageAggregator {
  private readonly usage = new Map<string, ComponentAggregate>();

  track(usage: ExtendedTokenUsage): void {
    let component = this.usage.get(usage.component);
    if (!component) {
      component = {
        component: usage.component,
        calls: 0,
        models: new Set(),
        total: emptySummary(),
      };
      this.usage.set(usage.component, component);
    }

    component.calls++;
    component.models.add(usage.modelName);
    addTo(component.total, usage);
  }

  getReport(): TokenUsageReport {
    const total = emptySummary();
    const components = [...this.usage.values()].map((component) => {
      addTo(total, component.total);
      return {
        component: component.component,
        calls: component.calls,
        modelNames: [...component.models],
        total: { ...component.total },
      };
    });

    return { components, total };
  }

  logSummary(logger: LoggerMethods): void {
    const report = this.getReport();

    if (report.components.length === 0) {
      logger.info('[DocumentTranslator] No token usage to report');
      return;
    }

    logger.info('[DocumentTranslator] Token usage summary:');
    for (const component of report.components) {
      logger.info(
        `  ${component.component} (${component.modelNames.join(', ')}, ${component.calls} calls): ${formatTokens(component.total)}`,
      );
    }
    logger.info(`  Grand total: ${formatTokens(report.total)}`);
  }
}
