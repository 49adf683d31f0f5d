import { createLogger } from '../../utils/logger.js';
import type { FallbackScorer } from './fallback-scorer.js';
import { errorMessage } from '../../utils/errors.js';
import type { AnalysisFailureReason, AnalysisParseResult, RelevanceAssessment } from './types.js';

const logger = createLogger('scoring:arbiter');

export type AssessmentPath = 'primary' | 'fallback';

export interface ArbiterOutcome {
  assessment: RelevanceAssessment;
  path: AssessmentPath;
  reason?: AnalysisFailureReason | 'not_configured';
}

/** Anything that can attempt an assessment; `PrimaryAnalyzer` in production. */
export interface AssessmentAnalyzer {
  analyze(content: string): Promise<AnalysisParseResult>;
}

export interface AssessmentContext {
  threadId?: string;
  source?: string;
}

/**
 * Produces exactly one assessment per thread: one attempt at the primary
 * analyzer, then the keyword scorer. Retries live in the AI client's transport.
 */
export class RelevanceArbiter {
  constructor(
    private readonly fallback: FallbackScorer,
    private readonly primary: AssessmentAnalyzer | null = null,
  ) {}

  async assess(content: string, context: AssessmentContext = {}): Promise<ArbiterOutcome> {
    if (!this.primary) {
      logger.debug('No primary analyzer configured, using fallback scorer', { ...context });
      return { assessment: this.fallback.score(content), path: 'fallback', reason: 'not_configured' };
    }

    let result: AnalysisParseResult;
    try {
      result = await this.primary.analyze(content);
    } catch (error) {
      result = { ok: false, reason: 'request_failed', detail: errorMessage(error) };
    }
    if (result.ok) {
      logger.debug('Assessed by primary analyzer', { ...context, score: result.assessment.totalScore });
      return { assessment: result.assessment, path: 'primary' };
    }

    logger.info('Primary analyzer unavailable, using fallback scorer', {
      ...context,
      reason: result.reason,
      detail: result.detail,
    });
    return { assessment: this.fallback.score(content), path: 'fallback', reason: result.reason };
  }
}
