import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../../src/utils/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import type Database from 'better-sqlite3';
import { openDatabase, type AppDatabase } from '../../../src/db/index.js';
import { SqliteThreadStore } from '../../../src/services/storage/thread-store.js';
import { SqliteDigestRunRecorder } from '../../../src/services/storage/digest-runs.js';
import { DuplicateRecordError } from '../../../src/utils/errors.js';
import { makeAssessment, makeRecord } from '../helpers.js';

let db: AppDatabase;
let sqlite: Database.Database;

beforeEach(() => {
  ({ db, sqlite } = openDatabase(':memory:'));
});

afterEach(() => {
  sqlite.close();
});

describe('SqliteThreadStore', () => {
  it('round-trips a record', async () => {
    const store = new SqliteThreadStore(db);
    const record = makeRecord('p1', {
      comments: [{ id: 'c1', author: 'a', body: 'Same here', score: 2, createdAt: '2024-03-05T09:00:00.000Z' }],
      assessment: makeAssessment({ painPoints: ['mornings are hard'], competitiveMentions: ['boardmaker'] }),
    });

    await store.write('high', record);
    const [stored] = await store.readRecent('high', 10);

    expect(stored).toEqual(record);
    expect(Object.isFrozen(stored)).toBe(true);
  });

  it('keeps records without a draft', async () => {
    const store = new SqliteThreadStore(db);
    await store.write('low', makeRecord('p1', { tier: 'low', draftedResponse: undefined }));

    const [stored] = await store.readRecent('low', 10);
    expect(stored.draftedResponse).toBeUndefined();
    expect('draftedResponse' in stored).toBe(false);
  });

  it('refuses a second write for the same thread', async () => {
    const store = new SqliteThreadStore(db);
    await store.write('high', makeRecord('p1'));

    await expect(store.write('medium', makeRecord('p1', { tier: 'medium' }))).rejects.toBeInstanceOf(
      DuplicateRecordError,
    );
    expect(await store.readRecent('medium', 10)).toEqual([]);
  });

  it('reads a tier newest first up to the limit', async () => {
    const store = new SqliteThreadStore(db);
    await store.write('high', makeRecord('old', { observedAt: '2024-03-05T08:00:00.000Z' }));
    await store.write('high', makeRecord('new', { observedAt: '2024-03-05T10:00:00.000Z' }));
    await store.write('high', makeRecord('mid', { observedAt: '2024-03-05T09:00:00.000Z' }));
    await store.write('medium', makeRecord('other', { tier: 'medium' }));

    const recent = await store.readRecent('high', 2);
    expect(recent.map((r) => r.threadId)).toEqual(['new', 'mid']);
  });

  it('finds records by subreddit and tier', async () => {
    const store = new SqliteThreadStore(db);
    await store.write('high', makeRecord('a1'));
    await store.write('low', makeRecord('a2', { tier: 'low', observedAt: '2024-03-05T13:00:00.000Z' }));
    await store.write('high', makeRecord('t1', { source: 'teachers' }));

    expect((await store.findBySubreddit('autism')).map((r) => r.threadId)).toEqual(['a2', 'a1']);
    expect((await store.findBySubreddit('autism', 'high')).map((r) => r.threadId)).toEqual(['a1']);
    expect(await store.findBySubreddit('slp')).toEqual([]);
  });

  it('finds records by user type', async () => {
    const store = new SqliteThreadStore(db);
    await store.write('high', makeRecord('p1', { assessment: makeAssessment({ userType: 'teacher' }) }));
    await store.write('high', makeRecord('p2'));

    expect((await store.findByUserType('teacher')).map((r) => r.threadId)).toEqual(['p1']);
    expect(await store.findByUserType('teacher', 'low')).toEqual([]);
  });

  it('groups competitor mentions', async () => {
    const store = new SqliteThreadStore(db);
    await store.write(
      'high',
      makeRecord('r1', {
        observedAt: '2024-03-05T10:00:00.000Z',
        assessment: makeAssessment({ competitiveMentions: ['boardmaker'] }),
      }),
    );
    await store.write(
      'medium',
      makeRecord('r2', {
        tier: 'medium',
        observedAt: '2024-03-05T11:00:00.000Z',
        assessment: makeAssessment({ competitiveMentions: ['boardmaker', 'learning app'] }),
      }),
    );
    await store.write('high', makeRecord('r3'));

    const mentions = await store.competitiveMentions();

    expect(Object.keys(mentions).sort()).toEqual(['boardmaker', 'learning app']);
    expect(mentions.boardmaker.map((r) => r.threadId)).toEqual(['r2', 'r1']);
    expect(mentions['learning app'].map((r) => r.threadId)).toEqual(['r2']);
  });

  it('raises a storage error for rows it cannot decode', async () => {
    const store = new SqliteThreadStore(db);
    sqlite
      .prepare(
        `INSERT INTO thread_records (thread_id, source, tier, total_score, user_type, analysis_path, post, comments, assessment, observed_at, created_at)
         VALUES ('bad', 'autism', 'high', 9, 'parent', 'primary', '{}', '[]', '{}', '2024-03-05T12:00:00.000Z', '2024-03-05T12:00:00.000Z')`,
      )
      .run();

    await expect(store.readRecent('high', 10)).rejects.toThrow('Stored record bad could not be decoded');
  });
});

describe('SqliteDigestRunRecorder', () => {
  it('returns runs newest first', async () => {
    const recorder = new SqliteDigestRunRecorder(db);
    await recorder.record({ status: 'sent', count: 3, triggeredAt: '2024-03-05T08:00:00.000Z' });
    await recorder.record({
      status: 'failed',
      count: 1,
      error: 'SMTP send failed: connection refused',
      triggeredAt: '2024-03-06T08:00:00.000Z',
    });

    expect(await recorder.recent(10)).toEqual([
      { status: 'failed', count: 1, error: 'SMTP send failed: connection refused', triggeredAt: '2024-03-06T08:00:00.000Z' },
      { status: 'sent', count: 3, triggeredAt: '2024-03-05T08:00:00.000Z' },
    ]);
    expect(await recorder.recent(1)).toHaveLength(1);
  });
});
