import { sqliteTable, text, integer, real, index } from 'drizzle-orm/sqlite-core';

// ============================================================================
// Table 1: thread_records (one row per stored thread, keyed by tier + time)
// ============================================================================
export const threadRecords = sqliteTable(
  'thread_records',
  {
    threadId: text('thread_id').primaryKey(),
    source: text('source').notNull(),
    tier: text('tier').notNull(),
    totalScore: real('total_score').notNull(),
    userType: text('user_type').notNull(),
    analysisPath: text('analysis_path').notNull(),
    post: text('post').notNull(), // JSON ThreadPost
    comments: text('comments').notNull(), // JSON ThreadComment[]
    assessment: text('assessment').notNull(), // JSON RelevanceAssessment
    competitors: text('competitors').notNull().default('[]'), // JSON string[]
    draftedResponse: text('drafted_response'),
    observedAt: text('observed_at').notNull(),
    createdAt: text('created_at').notNull().$defaultFn(() => new Date().toISOString()),
  },
  (table) => [
    index('thread_records_tier_observed_idx').on(table.tier, table.observedAt),
    index('thread_records_source_idx').on(table.source),
  ],
);

// ============================================================================
// Table 2: seen_threads (dedup state that outlives the process)
// ============================================================================
export const seenThreads = sqliteTable('seen_threads', {
  threadId: text('thread_id').primaryKey(),
  status: text('status').notNull(), // scored | discarded | stored
  tier: text('tier'),
  firstSeenAt: text('first_seen_at').notNull().$defaultFn(() => new Date().toISOString()),
  updatedAt: text('updated_at').notNull().$defaultFn(() => new Date().toISOString()),
});

// ============================================================================
// Table 3: digest_runs
// ============================================================================
export const digestRuns = sqliteTable('digest_runs', {
  id: text('id').primaryKey(),
  status: text('status').notNull(), // sent | failed | empty
  recordCount: integer('record_count').notNull().default(0),
  errorMessage: text('error_message'),
  triggeredAt: text('triggered_at').notNull(),
});

// ============================================================================
// DDL, applied idempotently on start
// ============================================================================
export const SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS thread_records (
  thread_id TEXT PRIMARY KEY,
  source TEXT NOT NULL,
  tier TEXT NOT NULL,
  total_score REAL NOT NULL,
  user_type TEXT NOT NULL,
  analysis_path TEXT NOT NULL,
  post TEXT NOT NULL,
  comments TEXT NOT NULL,
  assessment TEXT NOT NULL,
  competitors TEXT NOT NULL DEFAULT '[]',
  drafted_response TEXT,
  observed_at TEXT NOT NULL,
  created_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS thread_records_tier_observed_idx ON thread_records (tier, observed_at);
CREATE INDEX IF NOT EXISTS thread_records_source_idx ON thread_records (source);

CREATE TABLE IF NOT EXISTS seen_threads (
  thread_id TEXT PRIMARY KEY,
  status TEXT NOT NULL,
  tier TEXT,
  first_seen_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS digest_runs (
  id TEXT PRIMARY KEY,
  status TEXT NOT NULL,
  record_count INTEGER NOT NULL DEFAULT 0,
  error_message TEXT,
  triggered_at TEXT NOT NULL
);
`;
