import type { ThreadComment, ThreadPost } from '../discovery/types.js';
import type { AssessmentPath } from '../scoring/arbiter.js';
import type { RelevanceAssessment } from '../scoring/types.js';

export const PRIORITY_TIERS = ['high', 'medium', 'low'] as const;
export type PriorityTier = (typeof PRIORITY_TIERS)[number];

export function isPriorityTier(value: string): value is PriorityTier {
  return PRIORITY_TIERS.some((tier) => tier === value);
}

/** One monitored thread as persisted. Never mutated after the store write. */
export interface ThreadRecord {
  readonly threadId: string;
  readonly source: string;
  readonly post: ThreadPost;
  readonly comments: readonly ThreadComment[];
  readonly assessment: RelevanceAssessment;
  readonly tier: PriorityTier;
  readonly analysisPath: AssessmentPath;
  readonly observedAt: string;
  readonly draftedResponse?: string;
}

export interface MonitorCounts {
  high: number;
  medium: number;
  low: number;
  discarded: number;
  duplicates: number;
  skipped: number;
  errors: number;
  fallbacks: number;
  drafted: number;
}

export interface MonitorStatus {
  running: boolean;
  lastCycleAt: string | null;
  cycles: number;
  counts: MonitorCounts;
  windowSize: number;
}

interface AnalyzedThread {
  threadId: string;
  source: string;
  assessment: RelevanceAssessment;
  analysisPath: AssessmentPath;
}

/** What happened to one thread on its way through the monitor. */
export type ThreadResult =
  | { status: 'malformed'; threadId: string; error: string }
  | { status: 'duplicate'; threadId: string }
  | { status: 'comments_unavailable'; threadId: string; error: string }
  | (AnalyzedThread & { status: 'discarded' })
  | (AnalyzedThread & { status: 'stored'; tier: PriorityTier; drafted: boolean })
  | (AnalyzedThread & { status: 'store_failed'; tier: PriorityTier; error: string });
