import { and, desc, eq, ne, type SQL } from 'drizzle-orm';
import { z } from 'zod';
import type { AppDatabase } from '../../db/index.js';
import { threadRecords } from '../../db/schema.js';
import { createLogger } from '../../utils/logger.js';
import { DuplicateRecordError, MonitorError } from '../../utils/errors.js';
import { freezeAssessment, USER_TYPES, URGENCY_LEVELS, type UserType } from '../scoring/types.js';
import { PRIORITY_TIERS, type PriorityTier, type ThreadRecord } from '../monitoring/types.js';

const logger = createLogger('storage:threads');

/** Persisted records, keyed by tier and observation time. Single writer. */
export interface ThreadStore {
  write(tier: PriorityTier, record: ThreadRecord): Promise<void>;
  readRecent(tier: PriorityTier, limit: number): Promise<ThreadRecord[]>;
  findBySubreddit(subreddit: string, tier?: PriorityTier): Promise<ThreadRecord[]>;
  findByUserType(userType: UserType, tier?: PriorityTier): Promise<ThreadRecord[]>;
  competitiveMentions(): Promise<Record<string, ThreadRecord[]>>;
}

// ---------------------------------------------------------------------------
// Row decoding
// ---------------------------------------------------------------------------
const PostSchema = z.object({
  id: z.string(),
  source: z.string(),
  title: z.string(),
  selftext: z.string(),
  author: z.string(),
  permalink: z.string(),
  url: z.string(),
  score: z.number(),
  numComments: z.number(),
  createdAt: z.string(),
});

const CommentSchema = z.object({
  id: z.string(),
  author: z.string(),
  body: z.string(),
  score: z.number(),
  createdAt: z.string(),
});

const AssessmentSchema = z.object({
  totalScore: z.number(),
  userType: z.enum(USER_TYPES),
  painPoints: z.array(z.string()),
  keywordsFound: z.array(z.string()),
  sentimentScore: z.number(),
  ageRelevance: z.boolean(),
  urgencyLevel: z.enum(URGENCY_LEVELS),
  competitiveMentions: z.array(z.string()),
});

type ThreadRow = typeof threadRecords.$inferSelect;

function decodeRow(row: ThreadRow): ThreadRecord {
  try {
    return Object.freeze({
      threadId: row.threadId,
      source: row.source,
      post: PostSchema.parse(JSON.parse(row.post)),
      comments: z.array(CommentSchema).parse(JSON.parse(row.comments)),
      assessment: freezeAssessment(AssessmentSchema.parse(JSON.parse(row.assessment))),
      tier: z.enum(PRIORITY_TIERS).parse(row.tier),
      analysisPath: z.enum(['primary', 'fallback']).parse(row.analysisPath),
      observedAt: row.observedAt,
      ...(row.draftedResponse !== null ? { draftedResponse: row.draftedResponse } : {}),
    });
  } catch (error) {
    throw new MonitorError('storage', `Stored record ${row.threadId} could not be decoded`, { cause: error });
  }
}

// ---------------------------------------------------------------------------
// SQLite implementation
// ---------------------------------------------------------------------------
export class SqliteThreadStore implements ThreadStore {
  constructor(private readonly db: AppDatabase) {}

  async write(tier: PriorityTier, record: ThreadRecord): Promise<void> {
    const existing = this.db
      .select({ threadId: threadRecords.threadId })
      .from(threadRecords)
      .where(eq(threadRecords.threadId, record.threadId))
      .get();
    if (existing) {
      throw new DuplicateRecordError(record.threadId);
    }

    try {
      this.db
        .insert(threadRecords)
        .values({
          threadId: record.threadId,
          source: record.source,
          tier,
          totalScore: record.assessment.totalScore,
          userType: record.assessment.userType,
          analysisPath: record.analysisPath,
          post: JSON.stringify(record.post),
          comments: JSON.stringify(record.comments),
          assessment: JSON.stringify(record.assessment),
          competitors: JSON.stringify(record.assessment.competitiveMentions),
          draftedResponse: record.draftedResponse ?? null,
          observedAt: record.observedAt,
          createdAt: new Date().toISOString(),
        })
        .run();
    } catch (error) {
      throw new MonitorError('storage', `Failed to write record ${record.threadId}`, { cause: error });
    }

    logger.debug('Stored thread record', { threadId: record.threadId, tier });
  }

  async readRecent(tier: PriorityTier, limit: number): Promise<ThreadRecord[]> {
    const rows = this.db
      .select()
      .from(threadRecords)
      .where(eq(threadRecords.tier, tier))
      .orderBy(desc(threadRecords.observedAt))
      .limit(limit)
      .all();
    return rows.map(decodeRow);
  }

  async findBySubreddit(subreddit: string, tier?: PriorityTier): Promise<ThreadRecord[]> {
    return this.findWhere(eq(threadRecords.source, subreddit), tier);
  }

  async findByUserType(userType: UserType, tier?: PriorityTier): Promise<ThreadRecord[]> {
    return this.findWhere(eq(threadRecords.userType, userType), tier);
  }

  /** Records grouped by each competitor they mention, newest first within a group. */
  async competitiveMentions(): Promise<Record<string, ThreadRecord[]>> {
    const rows = this.db
      .select()
      .from(threadRecords)
      .where(ne(threadRecords.competitors, '[]'))
      .orderBy(desc(threadRecords.observedAt))
      .all();

    const grouped: Record<string, ThreadRecord[]> = {};
    for (const record of rows.map(decodeRow)) {
      for (const competitor of record.assessment.competitiveMentions) {
        (grouped[competitor] ??= []).push(record);
      }
    }
    return grouped;
  }

  private findWhere(condition: SQL, tier?: PriorityTier): ThreadRecord[] {
    const rows = this.db
      .select()
      .from(threadRecords)
      .where(tier ? and(condition, eq(threadRecords.tier, tier)) : condition)
      .orderBy(desc(threadRecords.observedAt))
      .all();
    return rows.map(decodeRow);
  }
}
