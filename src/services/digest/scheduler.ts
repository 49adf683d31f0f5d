import cron from 'node-cron';
import { createLogger } from '../../utils/logger.js';
import { DeliveryError, errorMessage } from '../../utils/errors.js';
import type { ThreadRecord } from '../monitoring/types.js';

const logger = createLogger('digest');

export const DIGEST_WINDOW_MS = 24 * 60 * 60 * 1000;

export type DeliveryResult = { ok: true; messageId?: string } | { ok: false; error: DeliveryError };

/** Sends one batch of drafted responses. */
export interface DigestDelivery {
  sendBatch(records: readonly ThreadRecord[]): Promise<DeliveryResult>;
}

export type DigestRunStatus = 'sent' | 'failed' | 'empty';

export interface DigestRun {
  status: DigestRunStatus;
  count: number;
  error?: string;
  triggeredAt: string;
}

export interface DigestRunRecorder {
  record(run: DigestRun): Promise<void>;
}

// ---------------------------------------------------------------------------
// Window
// ---------------------------------------------------------------------------

/** Drafted records waiting for the next digest. Single writer. */
export class DigestWindow {
  private records: ThreadRecord[] = [];

  constructor(private readonly windowMs: number = DIGEST_WINDOW_MS) {}

  append(record: ThreadRecord): boolean {
    if (!record.draftedResponse) {
      logger.warn('Refusing to add a record without a drafted response', { threadId: record.threadId });
      return false;
    }
    this.records.push(record);
    return true;
  }

  /** Records observed in (now - window, now]. Older ones are left out, not removed. */
  select(now: Date): ThreadRecord[] {
    return this.records.filter((record) => this.inWindow(record, now));
  }

  /**
   * Takes everything out of the window and returns the records that fall in
   * (now - window, now]. Records appended afterwards stay for the next digest.
   */
  drain(now: Date): ThreadRecord[] {
    const taken = this.records;
    this.records = [];
    return taken.filter((record) => this.inWindow(record, now));
  }

  get size(): number {
    return this.records.length;
  }

  private inWindow(record: ThreadRecord, now: Date): boolean {
    const end = now.getTime();
    const observed = Date.parse(record.observedAt);
    return observed > end - this.windowMs && observed <= end;
  }
}

// ---------------------------------------------------------------------------
// Scheduler
// ---------------------------------------------------------------------------

export interface DigestSchedulerOptions {
  window: DigestWindow;
  delivery: DigestDelivery;
  cronExpression?: string;
  timezone?: string;
  recorder?: DigestRunRecorder;
  now?: () => Date;
}

export class DigestScheduler {
  private readonly window: DigestWindow;
  private readonly delivery: DigestDelivery;
  private readonly cronExpression: string;
  private readonly timezone?: string;
  private readonly recorder?: DigestRunRecorder;
  private readonly now: () => Date;
  private task: cron.ScheduledTask | null = null;

  constructor(options: DigestSchedulerOptions) {
    this.window = options.window;
    this.delivery = options.delivery;
    this.cronExpression = options.cronExpression ?? '0 8 * * *';
    this.timezone = options.timezone;
    this.recorder = options.recorder;
    this.now = options.now ?? (() => new Date());

    if (!cron.validate(this.cronExpression)) {
      throw new Error(`Invalid digest cron expression: ${this.cronExpression}`);
    }
  }

  start(): void {
    if (this.task) return;
    this.task = cron.schedule(
      this.cronExpression,
      async () => {
        logger.info('Running scheduled digest');
        try {
          await this.trigger();
        } catch (error) {
          logger.error('Scheduled digest failed', { error });
        }
      },
      { scheduled: true, ...(this.timezone ? { timezone: this.timezone } : {}) },
    );
    logger.info('Digest scheduler started', { cron: this.cronExpression, timezone: this.timezone ?? 'local' });
  }

  stop(): void {
    if (!this.task) return;
    this.task.stop();
    this.task = null;
    logger.info('Digest scheduler stopped');
  }

  get isScheduled(): boolean {
    return this.task !== null;
  }

  /**
   * Drains the window and sends the in-window records as one batch. The
   * drained records are gone whether or not delivery succeeds.
   */
  async trigger(now: Date = this.now()): Promise<DigestRun> {
    const batch = this.window.drain(now);
    const triggeredAt = now.toISOString();
    let run: DigestRun;

    if (batch.length === 0) {
      logger.info('Digest window is empty, nothing to send');
      run = { status: 'empty', count: 0, triggeredAt };
    } else {
      let result: DeliveryResult;
      try {
        result = await this.delivery.sendBatch(batch);
      } catch (error) {
        result = {
          ok: false,
          error: error instanceof DeliveryError ? error : new DeliveryError(errorMessage(error), { cause: error }),
        };
      }

      if (result.ok) {
        logger.info('Digest sent', { count: batch.length, messageId: result.messageId });
        run = { status: 'sent', count: batch.length, triggeredAt };
      } else {
        logger.error('Digest delivery failed', { count: batch.length, kind: result.error.kind, error: result.error });
        run = { status: 'failed', count: batch.length, error: result.error.message, triggeredAt };
      }
    }

    await this.recordRun(run);
    return run;
  }

  private async recordRun(run: DigestRun): Promise<void> {
    if (!this.recorder) return;
    try {
      await this.recorder.record(run);
    } catch (error) {
      logger.warn('Failed to record digest run', { status: run.status, error: errorMessage(error) });
    }
  }
}
