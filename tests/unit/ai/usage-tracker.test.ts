import { describe, it, expect, vi } from 'vitest';

vi.mock('../../../src/utils/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import { UsageTracker } from '../../../src/services/ai/clients.js';

describe('UsageTracker', () => {
  it('accumulates totals and per-model stats', () => {
    const tracker = new UsageTracker();
    tracker.track('claude-test', { inputTokens: 100, outputTokens: 20, totalTokens: 120, cachedTokens: 10 }, 300);
    tracker.track('claude-test', { inputTokens: 50, outputTokens: 10, totalTokens: 60 }, 500);
    tracker.trackError('gemini-test');

    const stats = tracker.getStats();

    expect(stats).toMatchObject({
      totalInputTokens: 150,
      totalOutputTokens: 30,
      totalTokens: 180,
      totalCachedTokens: 10,
      requestCount: 2,
      errorCount: 1,
      totalLatencyMs: 800,
      avgLatencyMs: 400,
    });
    expect(stats.byModel['claude-test']).toEqual({
      inputTokens: 150,
      outputTokens: 30,
      totalTokens: 180,
      requestCount: 2,
      errorCount: 0,
      totalLatencyMs: 800,
    });
    expect(stats.byModel['gemini-test'].errorCount).toBe(1);
  });

  it('resets to zero', () => {
    const tracker = new UsageTracker();
    tracker.track('m', { inputTokens: 1, outputTokens: 1, totalTokens: 2 }, 10);
    tracker.reset();
    expect(tracker.getStats()).toMatchObject({ requestCount: 0, totalTokens: 0, byModel: {} });
  });
});
