// src/ai/ai-usage.service.ts
import { Inject, Injectable } from '@nestjs/common';
import { AiUsageKind, AiUsageLogInput } from './ai.types';
import { LOGGER_SERVICE, type LoggerService } from '../shared/types';

export interface KindUsageStat {
  kind: AiUsageKind;
  callCount: number;
  totalTokens: number;
  totalCostUsd: number | null;
}

export interface AiUsageOverviewTotals {
  totalCalls: number;
  totalTokens: number;
  totalCostUsd: number;
  avgTokensPerCall: number;
  avgCostPerCall: number;
}

export interface AiUsageOverview {
  since: string;
  totals: AiUsageOverviewTotals;
  byKind: KindUsageStat[];
}

interface KindAccumulator {
  callCount: number;
  totalTokens: number;
  totalCostUsd: number;
  priced: boolean;
}

@Injectable()
export class AiUsageService {
  private readonly since = new Date().toISOString();
  private readonly byKind = new Map<AiUsageKind, KindAccumulator>();

  constructor(@Inject(LOGGER_SERVICE) private readonly logger: LoggerService) {}

  /**
   * Rough pricing calculator – update values if OpenAI prices change.
   * All prices are USD per 1M tokens.
   */
  computeCostUsd(
    model: string,
    inputTokens: number,
    outputTokens: number,
  ): number | null {
    const pricingPer1M: Record<string, { input: number; output: number }> = {
      'gpt-4.1-mini': { input: 0.4, output: 1.6 },
      'gpt-4o-mini': { input: 0.15, output: 0.6 },
      'gpt-4o': { input: 2.5, output: 10 },
      'text-embedding-3-small': { input: 0.02, output: 0 },
      'text-embedding-3-large': { input: 0.13, output: 0 },
      // fallback
      default: { input: 0.15, output: 0.6 },
    };

    const p = pricingPer1M[model] ?? pricingPer1M.default;

    const inputCost = (inputTokens / 1_000_000) * p.input;
    const outputCost = (outputTokens / 1_000_000) * p.output;

    const total = inputCost + outputCost;
    if (!isFinite(total) || total === 0) return null;
    return Number(total.toFixed(6));
  }

  record(input: AiUsageLogInput): void {
    const acc = this.byKind.get(input.kind) ?? {
      callCount: 0,
      totalTokens: 0,
      totalCostUsd: 0,
      priced: false,
    };

    acc.callCount += 1;
    acc.totalTokens += input.totalTokens;
    if (input.costUsd !== null) {
      acc.totalCostUsd += input.costUsd;
      acc.priced = true;
    }
    this.byKind.set(input.kind, acc);

    void this.logger.debug(
      `[AI] ${input.kind} model=${input.model} tokens=${input.totalTokens} cost=${input.costUsd ?? 'n/a'}` +
        (input.extra ? ` extra=${JSON.stringify(input.extra)}` : ''),
    );
  }

  getKindStats(): KindUsageStat[] {
    return Array.from(this.byKind.entries())
      .map(([kind, acc]) => ({
        kind,
        callCount: acc.callCount,
        totalTokens: acc.totalTokens,
        totalCostUsd: acc.priced ? Number(acc.totalCostUsd.toFixed(6)) : null,
      }))
      .sort((a, b) => a.kind.localeCompare(b.kind));
  }

  getOverview(): AiUsageOverview {
    const byKind = this.getKindStats();

    const base = byKind.reduce(
      (acc, row) => {
        acc.totalCalls += row.callCount;
        acc.totalTokens += row.totalTokens;
        acc.totalCostUsd += row.totalCostUsd ?? 0;
        return acc;
      },
      { totalCalls: 0, totalTokens: 0, totalCostUsd: 0 },
    );

    const avgTokensPerCall =
      base.totalCalls > 0 ? base.totalTokens / base.totalCalls : 0;

    const avgCostPerCall =
      base.totalCalls > 0 ? base.totalCostUsd / base.totalCalls : 0;

    return {
      since: this.since,
      byKind,
      totals: {
        totalCalls: base.totalCalls,
        totalTokens: base.totalTokens,
        totalCostUsd: Number(base.totalCostUsd.toFixed(6)),
        avgTokensPerCall,
        avgCostPerCall: Number(avgCostPerCall.toFixed(6)),
      },
    };
  }
}
