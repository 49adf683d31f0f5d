import { desc } from 'drizzle-orm';
import type { AppDatabase } from '../../db/index.js';
import { digestRuns } from '../../db/schema.js';
import { generateId } from '../../utils/hash.js';
import type { DigestRun, DigestRunRecorder, DigestRunStatus } from '../digest/scheduler.js';

function isRunStatus(value: string): value is DigestRunStatus {
  return value === 'sent' || value === 'failed' || value === 'empty';
}

export class SqliteDigestRunRecorder implements DigestRunRecorder {
  constructor(private readonly db: AppDatabase) {}

  async record(run: DigestRun): Promise<void> {
    this.db
      .insert(digestRuns)
      .values({
        id: generateId(),
        status: run.status,
        recordCount: run.count,
        errorMessage: run.error ?? null,
        triggeredAt: run.triggeredAt,
      })
      .run();
  }

  async recent(limit: number): Promise<DigestRun[]> {
    const rows = this.db.select().from(digestRuns).orderBy(desc(digestRuns.triggeredAt)).limit(limit).all();
    return rows.map((row) => ({
      status: isRunStatus(row.status) ? row.status : 'failed',
      count: row.recordCount,
      triggeredAt: row.triggeredAt,
      ...(row.errorMessage !== null ? { error: row.errorMessage } : {}),
    }));
  }
}
