import { describe, it, expect, vi } from 'vitest';

vi.mock('../../../src/utils/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import { createApi, type ApiDependencies } from '../../../src/api/index.js';
import { emptyCounts, type CycleSummary } from '../../../src/services/monitoring/monitor.js';
import type { DigestRun } from '../../../src/services/digest/scheduler.js';
import type { ThreadStore } from '../../../src/services/storage/thread-store.js';
import type { ThreadRecord, ThreadResult } from '../../../src/services/monitoring/types.js';
import { SourceFetchError } from '../../../src/utils/errors.js';
import type { UsageStats } from '../../../src/services/ai/types.js';
import { makeAssessment, makeRecord } from '../helpers.js';

const SUMMARY: CycleSummary = {
  startedAt: '2024-03-05T12:00:00.000Z',
  finishedAt: '2024-03-05T12:01:00.000Z',
  channels: ['autism'],
  counts: { ...emptyCounts(), high: 1 },
  stopped: false,
};

function fakeStore(records: ThreadRecord[] = []) {
  return {
    write: vi.fn(async () => {}),
    readRecent: vi.fn(async () => records),
    findBySubreddit: vi.fn(async () => records),
    findByUserType: vi.fn(async () => records),
    competitiveMentions: vi.fn(async (): Promise<Record<string, ThreadRecord[]>> => ({})),
  } satisfies ThreadStore;
}

function setup(overrides: Partial<ApiDependencies> = {}) {
  const store = fakeStore([makeRecord('p1')]);
  const monitor = {
    getStatus: vi.fn(() => ({ running: true, lastCycleAt: null, cycles: 0, counts: emptyCounts(), windowSize: 0 })),
    runCycle: vi.fn(async () => SUMMARY),
    analyzeThread: vi.fn(
      async (threadId: string): Promise<ThreadResult> => ({
        status: 'stored',
        threadId,
        source: 'autism',
        tier: 'high',
        analysisPath: 'fallback',
        assessment: makeAssessment(),
        drafted: true,
      }),
    ),
  };
  const digest = {
    trigger: vi.fn(async (): Promise<DigestRun> => ({ status: 'sent', count: 2, triggeredAt: '2024-03-06T08:00:00.000Z' })),
  };
  const app = createApi({ monitor, store, digest, requestLogging: false, ...overrides });
  return { app, store, monitor, digest };
}

const P1_SUMMARY = {
  threadId: 'p1',
  source: 'autism',
  tier: 'high',
  title: 'Thread p1',
  permalink: '/r/autism/comments/p1/thread/',
  author: 'poster',
  observedAt: '2024-03-05T12:00:00.000Z',
  analysisPath: 'fallback',
  assessment: {
    totalScore: 8,
    userType: 'parent',
    painPoints: [],
    keywordsFound: ['autism'],
    sentimentScore: 0,
    ageRelevance: false,
    urgencyLevel: 'low',
    competitiveMentions: [],
  },
  draftedResponse: 'Draft for p1',
  commentCount: 0,
};

describe('GET /health', () => {
  it('reports ok', async () => {
    const { app } = setup();
    const res = await app.request('/health');
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok' });
  });
});

describe('GET /api/status', () => {
  it('returns monitor status and AI usage when available', async () => {
    const stats: UsageStats = {
      totalInputTokens: 120,
      totalOutputTokens: 40,
      totalTokens: 160,
      totalCachedTokens: 0,
      requestCount: 1,
      errorCount: 0,
      totalLatencyMs: 900,
      avgLatencyMs: 900,
      byModel: {},
    };
    const { app } = setup({ usage: () => stats });

    const res = await app.request('/api/status');

    expect(await res.json()).toEqual({
      monitor: { running: true, lastCycleAt: null, cycles: 0, counts: emptyCounts(), windowSize: 0 },
      ai: stats,
    });
  });
});

describe('GET /api/threads/:tier', () => {
  it('returns summaries of recent records', async () => {
    const { app, store } = setup();

    const res = await app.request('/api/threads/high?limit=5');

    expect(res.status).toBe(200);
    expect(store.readRecent).toHaveBeenCalledWith('high', 5);
    expect(await res.json()).toEqual({ tier: 'high', count: 1, threads: [P1_SUMMARY] });
  });

  it('defaults the limit to 50', async () => {
    const { app, store } = setup();
    await app.request('/api/threads/medium');
    expect(store.readRecent).toHaveBeenCalledWith('medium', 50);
  });

  it('rejects an unknown tier', async () => {
    const { app, store } = setup();
    const res = await app.request('/api/threads/urgent');

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: 'Validation failed', details: [{ path: '' }] });
    expect(store.readRecent).not.toHaveBeenCalled();
  });

  it('rejects an out-of-range limit', async () => {
    const { app } = setup();
    const res = await app.request('/api/threads/high?limit=0');

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ details: [{ path: 'limit' }] });
  });
});

describe('GET /api/threads/by-subreddit/:name', () => {
  it('passes the optional tier filter', async () => {
    const { app, store } = setup();
    const res = await app.request('/api/threads/by-subreddit/autism?tier=low');

    expect(store.findBySubreddit).toHaveBeenCalledWith('autism', 'low');
    expect(await res.json()).toEqual({ subreddit: 'autism', count: 1, threads: [P1_SUMMARY] });
  });

  it('rejects malformed subreddit names', async () => {
    const { app } = setup();
    const res = await app.request('/api/threads/by-subreddit/a');
    expect(res.status).toBe(400);
  });
});

describe('GET /api/threads/by-user-type/:type', () => {
  it('queries by user type without a tier', async () => {
    const { app, store } = setup();
    const res = await app.request('/api/threads/by-user-type/teacher');

    expect(res.status).toBe(200);
    expect(store.findByUserType).toHaveBeenCalledWith('teacher', undefined);
    expect(await res.json()).toMatchObject({ userType: 'teacher', count: 1 });
  });

  it('rejects unknown user types', async () => {
    const { app } = setup();
    expect((await app.request('/api/threads/by-user-type/student')).status).toBe(400);
  });
});

describe('POST /api/threads/:id/analyze', () => {
  it('returns the assessment and tier of the analyzed thread', async () => {
    const { app, monitor } = setup();

    const res = await app.request('/api/threads/abc123/analyze', { method: 'POST' });

    expect(res.status).toBe(200);
    expect(monitor.analyzeThread).toHaveBeenCalledWith('abc123');
    expect(await res.json()).toEqual({
      status: 'stored',
      threadId: 'abc123',
      source: 'autism',
      tier: 'high',
      analysisPath: 'fallback',
      assessment: P1_SUMMARY.assessment,
      drafted: true,
    });
  });

  it('rejects a malformed thread id', async () => {
    const { app, monitor } = setup();

    const res = await app.request('/api/threads/ABC-1/analyze', { method: 'POST' });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ details: [{ message: 'invalid thread id' }] });
    expect(monitor.analyzeThread).not.toHaveBeenCalled();
  });

  it('returns 404 for a post the source cannot find', async () => {
    const { app, monitor } = setup();
    monitor.analyzeThread.mockRejectedValueOnce(new SourceFetchError('zz9', 'Post zz9 not found', 404));

    const res = await app.request('/api/threads/zz9/analyze', { method: 'POST' });

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Post zz9 not found' });
  });

  it('returns 502 when the source is unavailable', async () => {
    const { app, monitor } = setup();
    monitor.analyzeThread.mockRejectedValueOnce(new SourceFetchError('zz9', 'Reddit API error 503', 503));

    const res = await app.request('/api/threads/zz9/analyze', { method: 'POST' });

    expect(res.status).toBe(502);
  });

  it('returns 503 when the record could not be stored', async () => {
    const { app, monitor } = setup();
    monitor.analyzeThread.mockResolvedValueOnce({
      status: 'store_failed',
      threadId: 'p1',
      source: 'autism',
      tier: 'high',
      analysisPath: 'fallback',
      assessment: makeAssessment(),
      error: 'disk full',
    });

    const res = await app.request('/api/threads/p1/analyze', { method: 'POST' });

    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({ status: 'store_failed', error: 'disk full' });
  });
});

describe('GET /api/competitive-mentions', () => {
  it('lists each competitor with its threads', async () => {
    const record = makeRecord('p1', { assessment: makeAssessment({ competitiveMentions: ['boardmaker'] }) });
    const store = fakeStore();
    store.competitiveMentions.mockResolvedValueOnce({ boardmaker: [record] });
    const { app } = setup({ store });

    const res = await app.request('/api/competitive-mentions');

    expect(await res.json()).toMatchObject({
      mentions: [{ competitor: 'boardmaker', count: 1, threads: [{ threadId: 'p1' }] }],
    });
  });
});

describe('GET /api/digest/runs', () => {
  it('returns 404 without a run recorder', async () => {
    const { app } = setup();
    expect((await app.request('/api/digest/runs')).status).toBe(404);
  });

  it('returns recent runs', async () => {
    const runs: DigestRun[] = [{ status: 'empty', count: 0, triggeredAt: '2024-03-06T08:00:00.000Z' }];
    const recent = vi.fn(async () => runs);
    const { app } = setup({ digestRuns: { recent } });

    const res = await app.request('/api/digest/runs?limit=3');

    expect(recent).toHaveBeenCalledWith(3);
    expect(await res.json()).toEqual({ runs });
  });
});

describe('POST triggers', () => {
  it('runs a monitoring cycle', async () => {
    const { app, monitor } = setup();
    const res = await app.request('/api/monitor/trigger', { method: 'POST' });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual(SUMMARY);
    expect(monitor.runCycle).toHaveBeenCalledTimes(1);
  });

  it('rate limits manual cycles', async () => {
    const { app, monitor } = setup();
    await app.request('/api/monitor/trigger', { method: 'POST' });
    await app.request('/api/monitor/trigger', { method: 'POST' });
    const third = await app.request('/api/monitor/trigger', { method: 'POST' });

    expect(third.status).toBe(429);
    expect(third.headers.get('X-RateLimit-Remaining')).toBe('0');
    expect(third.headers.get('Retry-After')).toBe('60');
    expect(monitor.runCycle).toHaveBeenCalledTimes(2);
  });

  it('sends the digest', async () => {
    const { app, digest } = setup();
    const res = await app.request('/api/digest/trigger', { method: 'POST' });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'sent', count: 2, triggeredAt: '2024-03-06T08:00:00.000Z' });
    expect(digest.trigger).toHaveBeenCalledTimes(1);
  });

  it('returns 502 when the digest fails', async () => {
    const { app, digest } = setup();
    digest.trigger.mockResolvedValueOnce({
      status: 'failed',
      count: 1,
      error: 'SMTP send failed: connection refused',
      triggeredAt: '2024-03-06T08:00:00.000Z',
    });

    const res = await app.request('/api/digest/trigger', { method: 'POST' });

    expect(res.status).toBe(502);
    expect(await res.json()).toMatchObject({ status: 'failed', error: 'SMTP send failed: connection refused' });
  });
});

describe('error handling', () => {
  it('turns unexpected errors into a 500', async () => {
    const store = fakeStore();
    store.readRecent.mockRejectedValueOnce(new Error('database is locked'));
    const { app } = setup({ store });

    const res = await app.request('/api/threads/high');

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: 'Internal server error' });
  });
});
