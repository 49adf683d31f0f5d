import { createLogger } from '../../utils/logger.js';
import { loadTermTables, type Term, type TermTables } from './term-tables.js';
import { createAfinnSentimentAnalyzer, type SentimentAnalyzer } from './sentiment.js';
import {
  DEFAULT_SCORING_MULTIPLIERS,
  MAX_SCORE,
  freezeAssessment,
  type RelevanceAssessment,
  type ScoringMultipliers,
  type UrgencyLevel,
  type UserType,
} from './types.js';

const logger = createLogger('scoring:fallback');

// Declaration order breaks ties between user types with equal counts.
const DETECTABLE_USER_TYPES = ['parent', 'teacher', 'therapist', 'administrator'] as const;

export interface FallbackScorerOptions {
  tables?: TermTables;
  sentiment?: SentimentAnalyzer;
  multipliers?: Partial<ScoringMultipliers>;
}

/**
 * Keyword and heuristic relevance scorer. Needs no network and never throws,
 * so the pipeline always has an assessment to work with.
 */
export class FallbackScorer {
  private readonly tables: TermTables;
  private readonly sentiment: SentimentAnalyzer;
  private readonly multipliers: ScoringMultipliers;

  constructor(options: FallbackScorerOptions = {}) {
    this.tables = options.tables ?? loadTermTables();
    this.sentiment = options.sentiment ?? createAfinnSentimentAnalyzer();
    this.multipliers = { ...DEFAULT_SCORING_MULTIPLIERS, ...options.multipliers };
  }

  score(content: string): RelevanceAssessment {
    const text = typeof content === 'string' ? content : '';
    const lower = text.toLowerCase();

    const keywordScore = this.keywordScore(lower);
    const sentimentScore = this.safeSentiment(text);
    const ageRelevance = this.detectAgeRelevance(lower);
    const urgencyLevel = this.detectUrgency(lower);

    return freezeAssessment({
      totalScore: this.finalScore(keywordScore, sentimentScore, ageRelevance, urgencyLevel),
      userType: this.detectUserType(lower),
      painPoints: this.extractPainPoints(lower),
      keywordsFound: this.keywordsFound(lower),
      sentimentScore,
      ageRelevance,
      urgencyLevel,
      competitiveMentions: matchedPhrases(this.tables.competitors, lower),
    });
  }

  keywordScore(lower: string): number {
    return (
      weightOf(this.tables.highValue, lower) +
      weightOf(this.tables.mediumValue, lower) +
      weightOf(this.tables.problemIndicators, lower)
    );
  }

  detectUserType(lower: string): UserType {
    let best: UserType = 'other';
    let bestCount = 0;
    for (const type of DETECTABLE_USER_TYPES) {
      const count = this.tables.userTypeIndicators[type].filter((t) => t.matches(lower)).length;
      if (count > bestCount) {
        best = type;
        bestCount = count;
      }
    }
    return best;
  }

  extractPainPoints(lower: string): string[] {
    const sentences = lower.split('.');
    const painPoints: string[] = [];
    for (const indicator of this.tables.problemIndicators) {
      if (!indicator.matches(lower)) continue;
      for (const sentence of sentences) {
        if (indicator.matches(sentence)) painPoints.push(sentence.trim());
      }
    }
    return painPoints;
  }

  detectAgeRelevance(lower: string): boolean {
    return this.tables.agePatterns.some((pattern) => pattern.test(lower));
  }

  detectUrgency(lower: string): UrgencyLevel {
    let max = 0;
    for (const term of this.tables.urgency) {
      if (term.matches(lower)) max = Math.max(max, term.weight);
    }
    if (max >= 3) return 'high';
    if (max >= 2) return 'medium';
    return 'low';
  }

  keywordsFound(lower: string): string[] {
    return [
      ...matchedPhrases(this.tables.highValue, lower),
      ...matchedPhrases(this.tables.mediumValue, lower),
    ];
  }

  /** Multipliers compose in a fixed order: sentiment, age, urgency. */
  finalScore(keywordScore: number, sentiment: number, ageRelevant: boolean, urgency: UrgencyLevel): number {
    const m = this.multipliers;
    let score = keywordScore;
    if (sentiment < m.negativeSentimentThreshold) score *= m.negativeSentimentMultiplier;
    if (ageRelevant) score *= m.ageRelevanceMultiplier;
    if (urgency === 'high') score *= m.highUrgencyMultiplier;
    else if (urgency === 'medium') score *= m.mediumUrgencyMultiplier;
    return Math.min(Math.max(score, 0), MAX_SCORE);
  }

  private safeSentiment(text: string): number {
    if (text.trim().length === 0) return 0;
    try {
      return this.sentiment(text);
    } catch (error) {
      logger.warn('Sentiment analysis failed, treating as neutral', { error });
      return 0;
    }
  }
}

function weightOf(terms: readonly Term[], lower: string): number {
  let total = 0;
  for (const term of terms) {
    if (term.matches(lower)) total += term.weight;
  }
  return total;
}

function matchedPhrases(terms: readonly Term[], lower: string): string[] {
  return terms.filter((t) => t.matches(lower)).map((t) => t.phrase);
}
