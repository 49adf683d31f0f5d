import { config, type AppConfig } from '../config.js';
import type { AppDatabase } from '../db/index.js';
import { createLogger } from '../utils/logger.js';
import { createRateLimiter } from '../utils/retry.js';
import { createCompletion, isProviderConfigured } from './ai/clients.js';
import { RedditSource } from './discovery/sources/reddit.js';
import type { ContentSource } from './discovery/types.js';
import { FallbackScorer } from './scoring/fallback-scorer.js';
import { PrimaryAnalyzer } from './scoring/analyzer.js';
import { RelevanceArbiter } from './scoring/arbiter.js';
import { ResponseDrafter } from './drafting/drafter.js';
import { DigestScheduler, DigestWindow, type DigestDelivery } from './digest/scheduler.js';
import { SmtpDelivery, createSmtpTransport } from './digest/mailer.js';
import { InMemoryDedupState, SqliteDedupState } from './monitoring/dedup.js';
import { ThreadMonitor } from './monitoring/monitor.js';
import { SqliteThreadStore } from './storage/thread-store.js';
import { SqliteDigestRunRecorder } from './storage/digest-runs.js';

const logger = createLogger('services');

export interface Services {
  monitor: ThreadMonitor;
  digest: DigestScheduler;
  store: SqliteThreadStore;
  digestRuns: SqliteDigestRunRecorder;
}

export interface ServiceOverrides {
  source?: ContentSource;
  delivery?: DigestDelivery;
}

/** Wires every collaborator from configuration. Overrides replace the network-facing ones. */
export function createServices(db: AppDatabase, cfg: AppConfig = config, overrides: ServiceOverrides = {}): Services {
  const source =
    overrides.source ??
    new RedditSource({
      baseUrl: cfg.reddit.baseUrl,
      userAgent: cfg.reddit.userAgent,
      rateLimiter: createRateLimiter({
        maxRequests: cfg.reddit.maxRequestsPerWindow,
        windowMs: cfg.reddit.windowMs,
        name: 'reddit',
      }),
    });

  const aiReady = isProviderConfigured(cfg.ai.provider);
  const complete = aiReady ? createCompletion(cfg.ai.provider) : null;
  if (!aiReady) {
    logger.warn('No AI provider key configured, using keyword scoring and template drafts', {
      provider: cfg.ai.provider,
    });
  }

  const fallback = new FallbackScorer({ multipliers: cfg.scoring });
  const primary = complete
    ? new PrimaryAnalyzer({ complete, maxContentChars: cfg.ai.analyzerMaxContentChars })
    : null;
  const arbiter = new RelevanceArbiter(fallback, primary);

  const drafter = new ResponseDrafter({
    complete,
    productName: cfg.drafting.productName,
    minScore: cfg.monitor.responseMinScore,
    variations: cfg.drafting.variations,
  });

  const store = new SqliteThreadStore(db);
  const digestRuns = new SqliteDigestRunRecorder(db);
  const dedup = cfg.monitor.persistDedup ? new SqliteDedupState(db) : new InMemoryDedupState();
  const window = new DigestWindow(cfg.digest.windowHours * 60 * 60 * 1000);

  const delivery =
    overrides.delivery ??
    new SmtpDelivery({
      transport: createSmtpTransport(cfg.smtp),
      from: cfg.digest.from,
      to: cfg.digest.to,
    });

  const digest = new DigestScheduler({
    window,
    delivery,
    cronExpression: cfg.digest.cron,
    recorder: digestRuns,
  });

  const monitor = new ThreadMonitor({
    source,
    schedule: cfg.sources,
    arbiter,
    dedup,
    store,
    window,
    drafter,
    thresholds: cfg.tiers,
    responseMinScore: cfg.monitor.responseMinScore,
    intervalMs: cfg.monitor.intervalMs,
    postsPerSource: cfg.reddit.postsPerSubreddit,
    commentsPerPost: cfg.reddit.commentsPerPost,
  });

  return { monitor, digest, store, digestRuns };
}
