import { silentLogger } from '../testing/fakes';
import { AiUsageService } from './ai-usage.service';

describe('AiUsageService', () => {
  let usage: AiUsageService;

  beforeEach(() => {
    usage = new AiUsageService(silentLogger());
  });

  describe('computeCostUsd', () => {
    it('prices known models per million tokens', () => {
      expect(usage.computeCostUsd('gpt-4.1-mini', 1_000_000, 1_000_000)).toBe(2);
      expect(usage.computeCostUsd('text-embedding-3-small', 500_000, 0)).toBe(0.01);
    });

    it('falls back to default pricing and reports zero usage as unpriced', () => {
      expect(usage.computeCostUsd('some-new-model', 1000, 0)).toBe(0.00015);
      expect(usage.computeCostUsd('gpt-4o', 0, 0)).toBeNull();
    });
  });

  it('aggregates calls, tokens and cost per kind', () => {
    const base = { model: 'gpt-4.1-mini', inputTokens: 0, outputTokens: 0 };
    usage.record({ ...base, kind: 'completion', totalTokens: 120, costUsd: 0.001 });
    usage.record({ ...base, kind: 'completion', totalTokens: 80, costUsd: 0.002 });
    usage.record({ ...base, kind: 'embedding_error', totalTokens: 0, costUsd: null });

    const overview = usage.getOverview();

    expect(overview.byKind).toEqual([
      { kind: 'completion', callCount: 2, totalTokens: 200, totalCostUsd: 0.003 },
      { kind: 'embedding_error', callCount: 1, totalTokens: 0, totalCostUsd: null },
    ]);
    expect(overview.totals).toMatchObject({
      totalCalls: 3,
      totalTokens: 200,
      totalCostUsd: 0.003,
      avgCostPerCall: 0.001,
    });
    expect(overview.totals.avgTokensPerCall).toBeCloseTo(66.667, 3);
  });

  it('starts empty', () => {
    expect(usage.getOverview().totals.totalCalls).toBe(0);
    expect(usage.getKindStats()).toEqual([]);
  });
});
