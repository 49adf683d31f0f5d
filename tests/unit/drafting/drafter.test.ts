import { describe, it, expect, vi } from 'vitest';

vi.mock('../../../src/utils/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import {
  ResponseDrafter,
  parseVariations,
  pickBestVariation,
  type DraftInput,
} from '../../../src/services/drafting/drafter.js';
import { buildDraftPrompt } from '../../../src/services/drafting/prompts.js';
import { fillTemplate } from '../../../src/services/drafting/templates.js';
import type { CompletionFn } from '../../../src/services/scoring/analyzer.js';
import { makeAssessment, makePost } from '../helpers.js';

function input(title: string, selftext: string, overrides: Partial<DraftInput> = {}): DraftInput {
  return {
    threadId: 't1',
    source: 'Parenting',
    post: makePost('t1', { title, selftext }),
    comments: [],
    assessment: makeAssessment({ totalScore: 8, userType: 'parent' }),
    ...overrides,
  };
}

const REPLY = [
  '**Response 1:**',
  'First reply text.',
  'Relevance Score: 0.6',
  '',
  'Response 2:',
  'Second reply',
  'spans two lines.',
  '**Relevance Score:** 0.9',
  '',
  'Trailing text without a score',
].join('\n');

describe('parseVariations', () => {
  it('splits on score lines and drops headers and unscored text', () => {
    expect(parseVariations(REPLY)).toEqual([
      { text: 'First reply text.', score: 0.6 },
      { text: 'Second reply\nspans two lines.', score: 0.9 },
    ]);
  });

  it('returns nothing for a reply without scores', () => {
    expect(parseVariations('Just some text\nwith no scores')).toEqual([]);
  });
});

describe('pickBestVariation', () => {
  it('keeps the earlier variation on a tie', () => {
    expect(pickBestVariation([{ text: 'a', score: 0.5 }, { text: 'b', score: 0.5 }])?.text).toBe('a');
  });

  it('returns null for no variations', () => {
    expect(pickBestVariation([])).toBeNull();
  });
});

describe('ResponseDrafter', () => {
  it('skips threads below the minimum score', async () => {
    const complete = vi.fn<CompletionFn>();
    const drafter = new ResponseDrafter({ complete, productName: 'TestProduct' });

    const draft = await drafter.draft(input('t', 'autism', { assessment: makeAssessment({ totalScore: 5.9 }) }));

    expect(draft).toBeNull();
    expect(complete).not.toHaveBeenCalled();
  });

  it('skips user types without a response style', async () => {
    const drafter = new ResponseDrafter({ productName: 'TestProduct' });
    const draft = await drafter.draft(
      input('t', 'autism', { assessment: makeAssessment({ userType: 'administrator' }) }),
    );
    expect(draft).toBeNull();
  });

  it('returns the best generated variation', async () => {
    const complete = vi.fn<CompletionFn>().mockResolvedValue(REPLY);
    const drafter = new ResponseDrafter({ complete, productName: 'TestProduct', variations: 2 });

    const draft = await drafter.draft(input('Mornings', 'Help with autism routines'));

    expect(draft).toBe('Second reply\nspans two lines.');
    expect(complete).toHaveBeenCalledTimes(1);
    const [prompt, options] = complete.mock.calls[0];
    expect(prompt).toContain('Write 2 different response variations');
    expect(options).toMatchObject({ temperature: 0.7, maxTokens: 1000 });
    expect(options?.systemPrompt).toContain('Only mention TestProduct if it directly solves their problem');
  });

  it('fills a template when generation fails', async () => {
    const complete = vi.fn<CompletionFn>().mockRejectedValue(new Error('529 overloaded'));
    const drafter = new ResponseDrafter({ complete, productName: 'TestProduct' });

    const draft = await drafter.draft(
      input('Meltdowns every morning', 'My son has autism and his emotional regulation is hard.'),
    );

    expect(draft?.split('\n\n')).toEqual([
      "I understand you're dealing with autism and looking for support. As a parent who's been through similar challenges, I wanted to share some resources that have helped us.",
      'First, here are some free resources that might help:\n' +
        '- Visual Schedule Creator - A free tool to create and print visual schedules for daily routines\n' +
        '- Parent Support Guide - A comprehensive guide for parents dealing with challenging behaviors',
      "I've found that having a structured approach to autism makes a big difference. That's why I wanted to mention TestProduct - it's been really helpful for us, especially their visual schedule creator that helps create and maintain daily routines feature. It's not a magic solution, but it has made our daily routines much smoother.",
      "Would you like to know more about any of these resources? I'm happy to share more specific details about what's worked for us.",
    ]);
  });

  it('falls back to a template when the reply has no scored variations', async () => {
    const complete = vi.fn<CompletionFn>().mockResolvedValue('Here is a reply with no score line.');
    const drafter = new ResponseDrafter({ complete, productName: 'TestProduct' });

    const draft = await drafter.draft(input('', 'She struggles with emotional regulation at bedtime.'));

    expect(draft).toContain('I hear you about the challenges with emotional.');
    expect(draft).toContain('a more supportive environment for her.');
    expect(draft).toContain('- Emotional Regulation Toolkit - Free resources for teaching emotional regulation skills\n');
  });

  it('uses generic wording when no topic keyword is present', async () => {
    const drafter = new ResponseDrafter({ productName: 'TestProduct' });

    const draft = await drafter.draft(
      input('', 'Any tips for a new year?', { assessment: makeAssessment({ userType: 'teacher' }) }),
    );

    const paragraphs = draft?.split('\n\n') ?? [];
    expect(paragraphs[0]).toBe(
      "I understand you're dealing with these challenges in your classroom. It's a common challenge that many educators face.",
    );
    expect(paragraphs[1]).toBe(
      'Here are some free resources that might help:\n' +
        '- Parent Support Guide - A comprehensive guide for parents dealing with challenging behaviors\n' +
        '- Visual Schedule Creator - A free tool to create and print visual schedules for daily routines',
    );
    expect(paragraphs[2]).toContain('a structured approach to facing these challenges makes a big difference');
  });
});

describe('fillTemplate', () => {
  it('returns null when a placeholder has no value', () => {
    const template = { id: 'x', triggers: [], paragraphs: ['Hello {name}', 'Bye {other}'] };
    expect(fillTemplate(template, { name: 'there' })).toBeNull();
    expect(fillTemplate(template, { name: 'there', other: 'now' })).toBe('Hello there\n\nBye now');
  });
});

describe('buildDraftPrompt', () => {
  it('includes at most five comments, truncated', () => {
    const comments = Array.from({ length: 7 }, (_, i) => ({
      id: `c${i}`,
      author: 'a',
      body: i === 0 ? 'x'.repeat(600) : `comment ${i}`,
      score: 0,
      createdAt: '2024-03-05T08:00:00.000Z',
    }));

    const prompt = buildDraftPrompt(input('Title', 'Body', { comments }), 3);

    expect(prompt).toContain(`- ${'x'.repeat(500)}…\n- comment 1\n`);
    expect(prompt).toContain('- comment 4\n\nUSER TYPE: parent');
    expect(prompt).not.toContain('comment 5');
    expect(prompt).toContain('PAIN POINTS: none identified');
  });
});
