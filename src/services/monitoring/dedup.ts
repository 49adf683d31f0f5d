import { and, eq, count } from 'drizzle-orm';
import type { AppDatabase } from '../../db/index.js';
import { seenThreads } from '../../db/schema.js';
import { createLogger } from '../../utils/logger.js';
import { isPriorityTier, type PriorityTier } from './types.js';

const logger = createLogger('monitoring:dedup');

export type DedupOutcome = { kind: 'discarded' } | { kind: 'stored'; tier: PriorityTier };

export type DedupStatus = { kind: 'unseen' } | { kind: 'scored' } | DedupOutcome;

/**
 * Per-thread state machine: unseen -> scored -> discarded | stored(tier).
 * A scored id can be released back to unseen when its record could not be
 * stored; resolved ids are never removed.
 */
export interface DedupState {
  has(threadId: string): boolean;
  /** Returns false when the id was already seen; the caller must not process it again. */
  markScored(threadId: string): boolean;
  resolve(threadId: string, outcome: DedupOutcome): void;
  /** Forgets a claim that is still in scored state. Returns false otherwise. */
  release(threadId: string): boolean;
  status(threadId: string): DedupStatus;
  readonly size: number;
}

export class InMemoryDedupState implements DedupState {
  private readonly states = new Map<string, DedupStatus>();

  has(threadId: string): boolean {
    return this.states.has(threadId);
  }

  markScored(threadId: string): boolean {
    if (this.states.has(threadId)) return false;
    this.states.set(threadId, { kind: 'scored' });
    return true;
  }

  resolve(threadId: string, outcome: DedupOutcome): void {
    const current = this.states.get(threadId);
    if (current?.kind !== 'scored') {
      logger.warn('Ignoring resolve for thread that is not in scored state', {
        threadId,
        current: current?.kind ?? 'unseen',
      });
      return;
    }
    this.states.set(threadId, outcome);
  }

  release(threadId: string): boolean {
    if (this.states.get(threadId)?.kind !== 'scored') return false;
    return this.states.delete(threadId);
  }

  status(threadId: string): DedupStatus {
    return this.states.get(threadId) ?? { kind: 'unseen' };
  }

  get size(): number {
    return this.states.size;
  }
}

/** Same state machine backed by the `seen_threads` table so it survives restarts. */
export class SqliteDedupState implements DedupState {
  constructor(private readonly db: AppDatabase) {}

  has(threadId: string): boolean {
    return this.status(threadId).kind !== 'unseen';
  }

  markScored(threadId: string): boolean {
    const now = new Date().toISOString();
    const inserted = this.db
      .insert(seenThreads)
      .values({ threadId, status: 'scored', firstSeenAt: now, updatedAt: now })
      .onConflictDoNothing()
      .run();
    return inserted.changes > 0;
  }

  resolve(threadId: string, outcome: DedupOutcome): void {
    const current = this.status(threadId);
    if (current.kind !== 'scored') {
      logger.warn('Ignoring resolve for thread that is not in scored state', {
        threadId,
        current: current.kind,
      });
      return;
    }
    this.db
      .update(seenThreads)
      .set({
        status: outcome.kind,
        tier: outcome.kind === 'stored' ? outcome.tier : null,
        updatedAt: new Date().toISOString(),
      })
      .where(eq(seenThreads.threadId, threadId))
      .run();
  }

  release(threadId: string): boolean {
    const deleted = this.db
      .delete(seenThreads)
      .where(and(eq(seenThreads.threadId, threadId), eq(seenThreads.status, 'scored')))
      .run();
    return deleted.changes > 0;
  }

  status(threadId: string): DedupStatus {
    const row = this.db.select().from(seenThreads).where(eq(seenThreads.threadId, threadId)).get();
    if (!row) return { kind: 'unseen' };

    switch (row.status) {
      case 'discarded':
        return { kind: 'discarded' };
      case 'stored':
        if (row.tier && isPriorityTier(row.tier)) return { kind: 'stored', tier: row.tier };
        return { kind: 'scored' };
      default:
        return { kind: 'scored' };
    }
  }

  get size(): number {
    const row = this.db.select({ value: count() }).from(seenThreads).get();
    return row?.value ?? 0;
  }
}
