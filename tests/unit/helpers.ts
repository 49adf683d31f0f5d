import { freezeAssessment, type RelevanceAssessment } from '../../src/services/scoring/types.js';
import type { ThreadPost } from '../../src/services/discovery/types.js';
import type { ThreadRecord } from '../../src/services/monitoring/types.js';

export function makeAssessment(overrides: Partial<RelevanceAssessment> = {}): RelevanceAssessment {
  return freezeAssessment({
    totalScore: 8,
    userType: 'parent',
    painPoints: [],
    keywordsFound: ['autism'],
    sentimentScore: 0,
    ageRelevance: false,
    urgencyLevel: 'low',
    competitiveMentions: [],
    ...overrides,
  });
}

export function makePost(id: string, overrides: Partial<ThreadPost> = {}): ThreadPost {
  return {
    id,
    source: 'autism',
    title: `Thread ${id}`,
    selftext: 'Body text',
    author: 'poster',
    permalink: `/r/autism/comments/${id}/thread/`,
    url: `https://www.reddit.com/r/autism/comments/${id}/thread/`,
    score: 1,
    numComments: 0,
    createdAt: '2024-03-05T08:00:00.000Z',
    ...overrides,
  };
}

export function makeRecord(
  id: string,
  overrides: Partial<Omit<ThreadRecord, 'threadId'>> = {},
): ThreadRecord {
  return {
    threadId: id,
    source: 'autism',
    post: makePost(id),
    comments: [],
    assessment: makeAssessment(),
    tier: 'high',
    analysisPath: 'fallback',
    observedAt: '2024-03-05T12:00:00.000Z',
    draftedResponse: `Draft for ${id}`,
    ...overrides,
  };
}
