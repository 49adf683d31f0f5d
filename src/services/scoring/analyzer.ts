import { createLogger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { normalizeUserType } from './user-type.js';
import { clamp, freezeAssessment, MAX_SCORE, type AnalysisParseResult, type UrgencyLevel } from './types.js';

const logger = createLogger('scoring:analyzer');

export interface CompletionOptions {
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
}

/** Text-in, text-out call into the generative service. */
export type CompletionFn = (prompt: string, options?: CompletionOptions) => Promise<string>;

export const ANALYZER_SYSTEM_PROMPT = `You assess online discussion threads for an early-learning company that builds personalized, inclusive learning tools for children aged 2-8 (SEL, special needs, speech and occupational therapy support).
Judge how relevant the thread is to that offering and who is writing. Answer only in the requested format.`;

export function buildAnalysisPrompt(content: string, maxChars: number): string {
  const body = content.length > maxChars ? `${content.slice(0, maxChars)}…` : content;
  return `Analyze this thread (post followed by its comments):

"""
${body}
"""

Reply with exactly these lines and nothing else:
SCORE: <relevance from 0 to 10>
TYPE: <parent | teacher | therapist | administrator | other>
PAIN: <comma-separated pain points, or none>
KEYWORDS: <comma-separated relevant keywords, or none>
SENTIMENT: <number from -1 (very negative) to 1 (very positive)>
AGE: <yes if the thread concerns children aged 2-8, otherwise no>
URGENCY: <low | medium | high>
COMPETITORS: <comma-separated competing products or apps mentioned, or none>`;
}

const EMPTY_LIST_VALUES = new Set(['none', 'n/a', 'na', '-', 'null']);

function field(text: string, label: string): string | undefined {
  // Tolerates markdown bullets/bold around the label: "- **SCORE:** 7"
  const pattern = new RegExp(`^[ \\t>*#-]*${label}[ \\t*]*[:=][ \\t*]*(.*)$`, 'im');
  const match = pattern.exec(text);
  return match ? match[1].trim() : undefined;
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const match = /[-+]?\d+(?:\.\d+)?/.exec(value);
  return match ? parseFloat(match[0]) : undefined;
}

export function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0 && !EMPTY_LIST_VALUES.has(item.toLowerCase()));
}

function parseBool(value: string | undefined): boolean {
  if (!value) return false;
  return /^(yes|y|true|1)\b/i.test(value.trim());
}

function parseUrgency(value: string | undefined): UrgencyLevel {
  const match = value ? /\b(low|medium|high)\b/i.exec(value) : null;
  if (!match) return 'low';
  const level = match[1].toLowerCase();
  return level === 'high' ? 'high' : level === 'medium' ? 'medium' : 'low';
}

/**
 * Decode the labelled reply. Every field except SCORE has a default; a reply
 * without a numeric score is a parse failure so the caller can fall back.
 */
export function parseAnalysisReply(text: string): AnalysisParseResult {
  if (!text || text.trim().length === 0) {
    return { ok: false, reason: 'empty_reply' };
  }

  const score = parseNumber(field(text, 'SCORE'));
  if (score === undefined) {
    return { ok: false, reason: 'missing_score', detail: text.slice(0, 200) };
  }

  return {
    ok: true,
    assessment: freezeAssessment({
      totalScore: clamp(score, 0, MAX_SCORE),
      userType: normalizeUserType(field(text, 'TYPE')),
      painPoints: parseList(field(text, 'PAIN')),
      keywordsFound: parseList(field(text, 'KEYWORDS')),
      sentimentScore: clamp(parseNumber(field(text, 'SENTIMENT')) ?? 0, -1, 1),
      ageRelevance: parseBool(field(text, 'AGE')),
      urgencyLevel: parseUrgency(field(text, 'URGENCY')),
      competitiveMentions: parseList(field(text, 'COMPETITORS')),
    }),
  };
}

export interface PrimaryAnalyzerOptions {
  complete: CompletionFn;
  maxContentChars?: number;
}

export class PrimaryAnalyzer {
  private readonly complete: CompletionFn;
  private readonly maxContentChars: number;

  constructor(options: PrimaryAnalyzerOptions) {
    this.complete = options.complete;
    this.maxContentChars = options.maxContentChars ?? 6000;
  }

  /** Never throws: transport failures come back as `request_failed`. */
  async analyze(content: string): Promise<AnalysisParseResult> {
    let reply: string;
    try {
      reply = await this.complete(buildAnalysisPrompt(content, this.maxContentChars), {
        systemPrompt: ANALYZER_SYSTEM_PROMPT,
        temperature: 0.2,
        maxTokens: 400,
      });
    } catch (error) {
      logger.warn('Analyzer request failed', { error });
      return { ok: false, reason: 'request_failed', detail: errorMessage(error) };
    }

    const result = parseAnalysisReply(reply);
    if (!result.ok) {
      logger.warn('Analyzer reply could not be parsed', { reason: result.reason, replyLength: reply.length });
    }
    return result;
  }
}
