import { createLogger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import type { CompletionFn } from '../scoring/analyzer.js';
import type { ThreadRecord } from '../monitoring/types.js';
import { postText } from '../content/normalizer.js';
import { buildDraftPrompt, buildDrafterSystemPrompt } from './prompts.js';
import {
  childPronoun,
  extractTopicKeywords,
  fillTemplate,
  isTemplatedUserType,
  loadTemplateLibrary,
  selectFeature,
  selectResources,
  selectTemplate,
  type TemplateLibrary,
  type TemplatedUserType,
} from './templates.js';

const logger = createLogger('drafting');

/** What the drafter needs from a thread; the record itself is built after drafting. */
export type DraftInput = Pick<ThreadRecord, 'threadId' | 'source' | 'post' | 'comments' | 'assessment'>;

export interface DraftVariation {
  text: string;
  score: number;
}

export interface ResponseDrafterOptions {
  complete?: CompletionFn | null;
  templates?: TemplateLibrary;
  productName: string;
  minScore?: number;
  variations?: number;
}

const SCORE_LINE = /^[ \t*_]*relevance score[ \t*_]*:[ \t*_]*([-+]?\d+(?:\.\d+)?)/i;
const VARIATION_HEADER = /^[ \t*_#]*(?:response|variation|option)\s*\d+[ \t*_]*:?[ \t*_]*$/i;

/**
 * Splits a multi-variation reply on its "Relevance Score:" lines. Text after
 * the last score line has no score and is dropped.
 */
export function parseVariations(reply: string): DraftVariation[] {
  const variations: DraftVariation[] = [];
  let buffer: string[] = [];

  for (const line of reply.split('\n')) {
    const score = SCORE_LINE.exec(line);
    if (score) {
      const text = buffer.join('\n').trim();
      if (text) variations.push({ text, score: parseFloat(score[1]) });
      buffer = [];
      continue;
    }
    if (VARIATION_HEADER.test(line)) continue;
    buffer.push(line);
  }

  return variations;
}

/** Highest score wins; ties keep the earlier variation. */
export function pickBestVariation(variations: readonly DraftVariation[]): DraftVariation | null {
  let best: DraftVariation | null = null;
  for (const variation of variations) {
    if (!best || variation.score > best.score) best = variation;
  }
  return best;
}

export class ResponseDrafter {
  private readonly complete: CompletionFn | null;
  private readonly templates: TemplateLibrary;
  private readonly productName: string;
  private readonly minScore: number;
  private readonly variations: number;

  constructor(options: ResponseDrafterOptions) {
    this.complete = options.complete ?? null;
    this.templates = options.templates ?? loadTemplateLibrary();
    this.productName = options.productName;
    this.minScore = options.minScore ?? 6;
    this.variations = options.variations ?? 3;
  }

  /** Returns null when the thread doesn't warrant a response or no draft could be produced. */
  async draft(input: DraftInput): Promise<string | null> {
    const { assessment } = input;
    if (assessment.totalScore < this.minScore) return null;
    if (!isTemplatedUserType(assessment.userType)) {
      logger.debug('No response style for user type', { threadId: input.threadId, userType: assessment.userType });
      return null;
    }

    const generated = await this.generate(input);
    if (generated) return generated;

    return this.fromTemplate(input, assessment.userType);
  }

  private async generate(input: DraftInput): Promise<string | null> {
    if (!this.complete) return null;

    try {
      const reply = await this.complete(buildDraftPrompt(input, this.variations), {
        systemPrompt: buildDrafterSystemPrompt(this.productName),
        temperature: 0.7,
        maxTokens: 1000,
      });
      const best = pickBestVariation(parseVariations(reply));
      if (!best) {
        logger.warn('Draft reply had no scored variations', { threadId: input.threadId });
        return null;
      }
      logger.debug('Drafted response', { threadId: input.threadId, score: best.score });
      return best.text;
    } catch (error) {
      logger.warn('Draft generation failed, using template', { threadId: input.threadId, error: errorMessage(error) });
      return null;
    }
  }

  private fromTemplate(input: DraftInput, userType: TemplatedUserType): string | null {
    const text = postText(input.post);
    const keywords = extractTopicKeywords(this.templates, text);
    const template = selectTemplate(this.templates, userType, keywords);
    const [resource1, resource2] = selectResources(this.templates, keywords);

    const body = fillTemplate(template, {
      specific_issue: keywords[0] ?? 'these challenges',
      specific_situation: keywords[0] ?? 'facing these challenges',
      free_resource_1: resource1,
      free_resource_2: resource2,
      specific_feature: selectFeature(this.templates, keywords),
      child_pronoun: childPronoun(text),
      product_name: this.productName,
    });

    if (body) {
      logger.debug('Drafted response from template', { threadId: input.threadId, template: template.id });
    }
    return body;
  }
}
