import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger as honoLogger } from 'hono/logger';
import { createLogger } from '../utils/logger.js';
import { SourceFetchError } from '../utils/errors.js';
import type { ThreadMonitor } from '../services/monitoring/monitor.js';
import type { ThreadStore } from '../services/storage/thread-store.js';
import type { DigestRun, DigestScheduler } from '../services/digest/scheduler.js';
import type { ThreadRecord } from '../services/monitoring/types.js';
import type { UsageStats } from '../services/ai/types.js';
import { rateLimit } from './middleware/rate-limit.js';
import {
  DigestRunsQuerySchema,
  RecentThreadsQuerySchema,
  SubredditNameSchema,
  TierFilterQuerySchema,
  ThreadIdSchema,
  TierSchema,
  UserTypeSchema,
  validate,
} from './validation.js';

const logger = createLogger('api');

export interface ApiDependencies {
  monitor: Pick<ThreadMonitor, 'getStatus' | 'runCycle' | 'analyzeThread'>;
  store: ThreadStore;
  digest: Pick<DigestScheduler, 'trigger'>;
  digestRuns?: { recent(limit: number): Promise<DigestRun[]> };
  usage?: () => UsageStats;
  requestLogging?: boolean;
}

function summarize(record: ThreadRecord) {
  return {
    threadId: record.threadId,
    source: record.source,
    tier: record.tier,
    title: record.post.title,
    permalink: record.post.permalink,
    author: record.post.author,
    observedAt: record.observedAt,
    analysisPath: record.analysisPath,
    assessment: record.assessment,
    draftedResponse: record.draftedResponse ?? null,
    commentCount: record.comments.length,
  };
}

export function createApi(deps: ApiDependencies) {
  const app = new Hono();

  app.use('*', cors());
  if (deps.requestLogging ?? true) {
    app.use('*', honoLogger());
  }

  app.get('/health', (c) => c.json({ status: 'ok', timestamp: new Date().toISOString() }));

  app.get('/api/status', (c) =>
    c.json({
      monitor: deps.monitor.getStatus(),
      ...(deps.usage ? { ai: deps.usage() } : {}),
    }),
  );

  // -------------------------------------------------------------------------
  // Threads
  // -------------------------------------------------------------------------
  app.get('/api/threads/by-subreddit/:name', async (c) => {
    const name = validate(c, SubredditNameSchema, c.req.param('name'));
    if (!name.ok) return name.response;
    const query = validate(c, TierFilterQuerySchema, c.req.query());
    if (!query.ok) return query.response;

    const records = await deps.store.findBySubreddit(name.data, query.data.tier);
    return c.json({ subreddit: name.data, count: records.length, threads: records.map(summarize) });
  });

  app.get('/api/threads/by-user-type/:type', async (c) => {
    const userType = validate(c, UserTypeSchema, c.req.param('type'));
    if (!userType.ok) return userType.response;
    const query = validate(c, TierFilterQuerySchema, c.req.query());
    if (!query.ok) return query.response;

    const records = await deps.store.findByUserType(userType.data, query.data.tier);
    return c.json({ userType: userType.data, count: records.length, threads: records.map(summarize) });
  });

  app.get('/api/threads/:tier', async (c) => {
    const tier = validate(c, TierSchema, c.req.param('tier'));
    if (!tier.ok) return tier.response;
    const query = validate(c, RecentThreadsQuerySchema, c.req.query());
    if (!query.ok) return query.response;

    const records = await deps.store.readRecent(tier.data, query.data.limit);
    return c.json({ tier: tier.data, count: records.length, threads: records.map(summarize) });
  });

  app.use('/api/threads/:id/analyze', rateLimit(10, 60_000));

  app.post('/api/threads/:id/analyze', async (c) => {
    const id = validate(c, ThreadIdSchema, c.req.param('id'));
    if (!id.ok) return id.response;

    logger.info('On-demand analysis requested', { threadId: id.data });
    try {
      const result = await deps.monitor.analyzeThread(id.data);
      return c.json(result, result.status === 'store_failed' ? 503 : 200);
    } catch (error) {
      if (error instanceof SourceFetchError) {
        return c.json({ error: error.message }, error.status === 404 ? 404 : 502);
      }
      throw error;
    }
  });

  app.get('/api/competitive-mentions', async (c) => {
    const grouped = await deps.store.competitiveMentions();
    const mentions = Object.entries(grouped).map(([competitor, records]) => ({
      competitor,
      count: records.length,
      threads: records.map(summarize),
    }));
    return c.json({ mentions });
  });

  // -------------------------------------------------------------------------
  // Digest history
  // -------------------------------------------------------------------------
  app.get('/api/digest/runs', async (c) => {
    if (!deps.digestRuns) return c.json({ error: 'Digest history is not available' }, 404);
    const query = validate(c, DigestRunsQuerySchema, c.req.query());
    if (!query.ok) return query.response;
    return c.json({ runs: await deps.digestRuns.recent(query.data.limit) });
  });

  // -------------------------------------------------------------------------
  // Manual triggers
  // -------------------------------------------------------------------------
  app.use('/api/monitor/trigger', rateLimit(2, 60_000));
  app.use('/api/digest/trigger', rateLimit(2, 60_000));

  app.post('/api/monitor/trigger', async (c) => {
    logger.info('Manual monitoring cycle requested');
    const summary = await deps.monitor.runCycle();
    return c.json(summary);
  });

  app.post('/api/digest/trigger', async (c) => {
    logger.info('Manual digest requested');
    const run = await deps.digest.trigger();
    return c.json(run, run.status === 'failed' ? 502 : 200);
  });

  app.onError((error, c) => {
    logger.error('Unhandled API error', { path: c.req.path, error });
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}
