import { createLogger } from '../../utils/logger.js';
import { DuplicateRecordError, MonitorError, errorMessage } from '../../utils/errors.js';
import { threadText } from '../content/normalizer.js';
import { toThreadComments, toThreadPost } from '../discovery/thread.js';
import type {
  ContentSource,
  RawPost,
  SourceSchedule,
  SourceTier,
  ThreadComment,
  ThreadPost,
} from '../discovery/types.js';
import type { RelevanceArbiter } from '../scoring/arbiter.js';
import type { ResponseDrafter } from '../drafting/drafter.js';
import type { DigestWindow } from '../digest/scheduler.js';
import type { ThreadStore } from '../storage/thread-store.js';
import type { DedupState } from './dedup.js';
import { classifyTier, DEFAULT_TIER_THRESHOLDS, type TierThresholds } from './priority.js';
import type { MonitorCounts, MonitorStatus, ThreadRecord, ThreadResult } from './types.js';

const logger = createLogger('monitor');

export interface ThreadMonitorOptions {
  source: ContentSource;
  schedule: SourceSchedule;
  arbiter: RelevanceArbiter;
  dedup: DedupState;
  store: ThreadStore;
  window: DigestWindow;
  drafter?: Pick<ResponseDrafter, 'draft'> | null;
  thresholds?: TierThresholds;
  responseMinScore?: number;
  intervalMs?: number;
  postsPerSource?: number;
  commentsPerPost?: number;
  now?: () => Date;
}

export interface CycleSummary {
  startedAt: string;
  finishedAt: string;
  channels: string[];
  counts: MonitorCounts;
  stopped: boolean;
}

const COUNT_KEYS = [
  'high', 'medium', 'low', 'discarded', 'duplicates', 'skipped', 'errors', 'fallbacks', 'drafted',
] as const satisfies readonly (keyof MonitorCounts)[];

export function emptyCounts(): MonitorCounts {
  return { high: 0, medium: 0, low: 0, discarded: 0, duplicates: 0, skipped: 0, errors: 0, fallbacks: 0, drafted: 0 };
}

/**
 * Channels to visit on a given day: primary every cycle, secondary on every
 * third weekday counting from Monday, tertiary on Mondays only. Uses UTC.
 */
export interface ScheduledChannel {
  channel: string;
  tier: SourceTier;
}

export function channelsFor(schedule: SourceSchedule, date: Date): ScheduledChannel[] {
  const mondayBased = (date.getUTCDay() + 6) % 7;
  const channels: ScheduledChannel[] = schedule.primary.map((channel): ScheduledChannel => ({ channel, tier: 'primary' }));
  if (mondayBased % 3 === 0) {
    channels.push(...schedule.secondary.map((channel): ScheduledChannel => ({ channel, tier: 'secondary' })));
  }
  if (mondayBased === 0) {
    channels.push(...schedule.tertiary.map((channel): ScheduledChannel => ({ channel, tier: 'tertiary' })));
  }
  return channels;
}

/**
 * Single cooperative polling loop. All dedup and window mutation happens
 * here, one thread at a time, so neither needs locking.
 */
export class ThreadMonitor {
  private readonly source: ContentSource;
  private readonly schedule: SourceSchedule;
  private readonly arbiter: RelevanceArbiter;
  private readonly dedup: DedupState;
  private readonly store: ThreadStore;
  private readonly window: DigestWindow;
  private readonly drafter: Pick<ResponseDrafter, 'draft'> | null;
  private readonly thresholds: TierThresholds;
  private readonly responseMinScore: number;
  private readonly intervalMs: number;
  private readonly postsPerSource: number;
  private readonly commentsPerPost: number;
  private readonly now: () => Date;

  private running = false;
  private stopRequested = false;
  private loopPromise: Promise<void> | null = null;
  private cycleInFlight: Promise<CycleSummary> | null = null;
  private wake: (() => void) | null = null;
  private cycles = 0;
  private lastCycleAt: string | null = null;
  private readonly totals: MonitorCounts = emptyCounts();

  constructor(options: ThreadMonitorOptions) {
    this.source = options.source;
    this.schedule = options.schedule;
    this.arbiter = options.arbiter;
    this.dedup = options.dedup;
    this.store = options.store;
    this.window = options.window;
    this.drafter = options.drafter ?? null;
    this.thresholds = options.thresholds ?? DEFAULT_TIER_THRESHOLDS;
    this.responseMinScore = options.responseMinScore ?? 6;
    this.intervalMs = options.intervalMs ?? 300_000;
    this.postsPerSource = options.postsPerSource ?? 50;
    this.commentsPerPost = options.commentsPerPost ?? 100;
    this.now = options.now ?? (() => new Date());
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.stopRequested = false;
    logger.info('Monitor started', { intervalMs: this.intervalMs, primary: this.schedule.primary.length });
    this.loopPromise = this.loop();
  }

  /** Lets the current thread finish, then resolves once the loop has exited. */
  async stop(): Promise<void> {
    if (!this.running) return;
    logger.info('Stop requested, finishing current thread');
    this.stopRequested = true;
    this.wake?.();
    await this.loopPromise;
  }

  getStatus(): MonitorStatus {
    return {
      running: this.running,
      lastCycleAt: this.lastCycleAt,
      cycles: this.cycles,
      counts: { ...this.totals },
      windowSize: this.window.size,
    };
  }

  /** Runs one cycle now. A call made while a cycle is in progress joins that cycle. */
  runCycle(): Promise<CycleSummary> {
    if (!this.cycleInFlight) {
      this.cycleInFlight = this.executeCycle().finally(() => {
        this.cycleInFlight = null;
      });
    }
    return this.cycleInFlight;
  }

  /**
   * Fetches one thread by id and sends it through the same pipeline as a
   * cycle, dedup gate included. Errors fetching the post itself propagate.
   */
  async analyzeThread(postId: string): Promise<ThreadResult> {
    const raw = await this.source.fetchPost(postId);
    const counts = emptyCounts();
    const result = await this.processPost(raw, raw.subreddit ?? this.source.name, counts);
    this.addToTotals(counts);
    logger.info('Analyzed thread on demand', { threadId: postId, status: result.status });
    return result;
  }

  // -------------------------------------------------------------------------
  // Loop
  // -------------------------------------------------------------------------

  private async loop(): Promise<void> {
    try {
      while (!this.stopRequested) {
        try {
          await this.runCycle();
        } catch (error) {
          logger.error('Monitoring cycle failed', { error });
        }
        if (this.stopRequested) break;
        await this.pause(this.intervalMs);
      }
    } finally {
      this.running = false;
      this.stopRequested = false;
      this.loopPromise = null;
      logger.info('Monitor stopped', { cycles: this.cycles });
    }
  }

  private pause(ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const timer = setTimeout(resolve, ms);
      this.wake = () => {
        clearTimeout(timer);
        resolve();
      };
    }).finally(() => {
      this.wake = null;
    });
  }

  private async executeCycle(): Promise<CycleSummary> {
    const started = this.now();
    const channels = channelsFor(this.schedule, started);
    const counts = emptyCounts();
    const endTimer = logger.time('monitor-cycle');
    let stopped = false;

    logger.info('Starting cycle', { channels: channels.length });

    try {
      for (const { channel, tier } of channels) {
        if (this.stopRequested) {
          stopped = true;
          break;
        }
        stopped = await this.visitChannel(channel, tier, counts);
        if (stopped) break;
      }
    } finally {
      endTimer();
    }

    const finished = this.now();
    this.cycles++;
    this.lastCycleAt = finished.toISOString();
    this.addToTotals(counts);

    logger.info('Cycle complete', { ...counts, stopped, windowSize: this.window.size });
    return {
      startedAt: started.toISOString(),
      finishedAt: this.lastCycleAt,
      channels: channels.map((c) => c.channel),
      counts,
      stopped,
    };
  }

  private addToTotals(counts: MonitorCounts): void {
    for (const key of COUNT_KEYS) {
      this.totals[key] += counts[key];
    }
  }

  /** Returns true if a stop was requested while visiting the channel. */
  private async visitChannel(channel: string, tier: SourceTier, counts: MonitorCounts): Promise<boolean> {
    let posts: RawPost[];
    try {
      posts = await this.source.fetchPosts(channel, { limit: this.postsPerSource });
    } catch (error) {
      counts.errors++;
      logger.error('Skipping source for this cycle', {
        source: channel,
        tier,
        kind: error instanceof MonitorError ? error.kind : 'source_fetch',
        error,
      });
      return false;
    }

    logger.debug(`Visiting ${posts.length} posts`, { source: channel, tier });

    for (const raw of posts) {
      if (this.stopRequested) return true;
      try {
        await this.processPost(raw, channel, counts);
      } catch (error) {
        counts.errors++;
        logger.error('Unexpected error processing thread', { threadId: raw.id, source: channel, error });
      }
    }
    return false;
  }

  // -------------------------------------------------------------------------
  // Per-thread pipeline
  // -------------------------------------------------------------------------

  private async processPost(raw: RawPost, channel: string, counts: MonitorCounts): Promise<ThreadResult> {
    let post: ThreadPost;
    try {
      post = toThreadPost(raw, channel);
    } catch (error) {
      counts.skipped++;
      logger.warn('Skipping malformed thread', {
        threadId: raw.id,
        source: channel,
        kind: 'malformed_thread',
        error: errorMessage(error),
      });
      return { status: 'malformed', threadId: raw.id ?? 'unknown', error: errorMessage(error) };
    }

    const context = { threadId: post.id, source: channel };

    // Checked before the comment fetch to save a request; claimed after it so
    // a failed fetch leaves the thread eligible next cycle.
    if (this.dedup.has(post.id)) {
      counts.duplicates++;
      return { status: 'duplicate', threadId: post.id };
    }

    let comments: ThreadComment[];
    try {
      comments = toThreadComments(await this.source.fetchComments(post.id, this.commentsPerPost));
    } catch (error) {
      counts.errors++;
      logger.error('Skipping thread, comments unavailable', { ...context, kind: 'source_fetch', error });
      return { status: 'comments_unavailable', threadId: post.id, error: errorMessage(error) };
    }

    if (!this.dedup.markScored(post.id)) {
      counts.duplicates++;
      return { status: 'duplicate', threadId: post.id };
    }

    const outcome = await this.arbiter.assess(threadText(post, comments), context);
    if (outcome.path === 'fallback') counts.fallbacks++;

    const { assessment } = outcome;
    const analyzed = { threadId: post.id, source: channel, assessment, analysisPath: outcome.path };
    const tier = classifyTier(assessment.totalScore, this.thresholds);
    if (!tier) {
      counts.discarded++;
      this.dedup.resolve(post.id, { kind: 'discarded' });
      logger.debug('Discarded thread', { ...context, score: assessment.totalScore });
      return { ...analyzed, status: 'discarded' };
    }

    let draftedResponse: string | null = null;
    if (this.drafter && assessment.totalScore >= this.responseMinScore) {
      try {
        draftedResponse = await this.drafter.draft({ threadId: post.id, source: channel, post, comments, assessment });
      } catch (error) {
        logger.warn('Drafting failed', { ...context, error: errorMessage(error) });
      }
    }

    const record: ThreadRecord = Object.freeze({
      threadId: post.id,
      source: channel,
      post,
      comments: Object.freeze([...comments]),
      assessment,
      tier,
      analysisPath: outcome.path,
      observedAt: this.now().toISOString(),
      ...(draftedResponse ? { draftedResponse } : {}),
    });

    try {
      await this.store.write(tier, record);
      counts[tier]++;
      this.dedup.resolve(post.id, { kind: 'stored', tier });
      logger.info('Stored thread', { ...context, tier, score: assessment.totalScore, path: outcome.path });
    } catch (error) {
      if (error instanceof DuplicateRecordError) {
        counts.duplicates++;
        this.dedup.resolve(post.id, { kind: 'stored', tier });
        logger.debug('Thread already in store', context);
        return { status: 'duplicate', threadId: post.id };
      }
      counts.errors++;
      this.dedup.release(post.id);
      logger.error('Failed to store thread, will retry next cycle', { ...context, kind: 'storage', error });
      return { ...analyzed, status: 'store_failed', tier, error: errorMessage(error) };
    }

    const drafted = record.draftedResponse !== undefined && this.window.append(record);
    if (drafted) counts.drafted++;
    return { ...analyzed, status: 'stored', tier, drafted };
  }
}
