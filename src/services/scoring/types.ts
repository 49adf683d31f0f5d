export const USER_TYPES = ['parent', 'teacher', 'therapist', 'administrator', 'other'] as const;
export type UserType = (typeof USER_TYPES)[number];

export const URGENCY_LEVELS = ['low', 'medium', 'high'] as const;
export type UrgencyLevel = (typeof URGENCY_LEVELS)[number];

/**
 * Structured relevance judgment for one thread. Produced by either the
 * primary analyzer or the keyword scorer and never mutated afterwards.
 */
export interface RelevanceAssessment {
  readonly totalScore: number;              // 0-10
  readonly userType: UserType;
  readonly painPoints: readonly string[];
  readonly keywordsFound: readonly string[];
  readonly sentimentScore: number;          // -1..1
  readonly ageRelevance: boolean;
  readonly urgencyLevel: UrgencyLevel;
  readonly competitiveMentions: readonly string[];
}

export type AnalysisFailureReason = 'request_failed' | 'missing_score' | 'empty_reply';

export type AnalysisParseResult =
  | { ok: true; assessment: RelevanceAssessment }
  | { ok: false; reason: AnalysisFailureReason; detail?: string };

export interface ScoringMultipliers {
  negativeSentimentThreshold: number;
  negativeSentimentMultiplier: number;
  ageRelevanceMultiplier: number;
  highUrgencyMultiplier: number;
  mediumUrgencyMultiplier: number;
}

export const DEFAULT_SCORING_MULTIPLIERS: ScoringMultipliers = {
  negativeSentimentThreshold: -0.5,
  negativeSentimentMultiplier: 1.2,
  ageRelevanceMultiplier: 1.1,
  highUrgencyMultiplier: 1.3,
  mediumUrgencyMultiplier: 1.1,
};

export const MAX_SCORE = 10;

export function clamp(value: number, min: number, max: number): number {
  const v = Number.isNaN(value) ? 0 : value;
  return Math.min(max, Math.max(min, v));
}

export function freezeAssessment(assessment: RelevanceAssessment): RelevanceAssessment {
  return Object.freeze({
    ...assessment,
    totalScore: clamp(assessment.totalScore, 0, MAX_SCORE),
    sentimentScore: clamp(assessment.sentimentScore, -1, 1),
    painPoints: Object.freeze([...assessment.painPoints]),
    keywordsFound: Object.freeze([...new Set(assessment.keywordsFound)]),
    competitiveMentions: Object.freeze([...new Set(assessment.competitiveMentions)]),
  });
}
