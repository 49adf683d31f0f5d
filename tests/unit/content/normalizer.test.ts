import { describe, it, expect } from 'vitest';
import { normalizeThreadContent, postText, threadText } from '../../../src/services/content/normalizer.js';
import type { ThreadPost } from '../../../src/services/discovery/types.js';

const post: ThreadPost = {
  id: 'abc123',
  source: 'Parenting',
  title: 'Bedtime battles',
  selftext: 'My kid will not settle.',
  author: 'someone',
  permalink: '/r/Parenting/comments/abc123/bedtime_battles/',
  url: 'https://www.reddit.com/r/Parenting/comments/abc123/bedtime_battles/',
  score: 12,
  numComments: 2,
  createdAt: '2024-03-01T10:00:00.000Z',
};

describe('normalizeThreadContent', () => {
  it('joins post and comments with single spaces', () => {
    expect(normalizeThreadContent('post', ['one', 'two'])).toBe('post one two');
  });

  it('returns the post alone when there are no comments', () => {
    expect(normalizeThreadContent('post', [])).toBe('post');
  });

  it('does not filter or trim anything', () => {
    expect(normalizeThreadContent(' post ', ['', 'x'])).toBe(' post   x');
  });
});

describe('postText', () => {
  it('prefixes the title', () => {
    expect(postText(post)).toBe('Bedtime battles. My kid will not settle.');
  });

  it('uses the body alone when the title is blank', () => {
    expect(postText({ title: '  ', selftext: 'Body only' })).toBe('Body only');
  });
});

describe('threadText', () => {
  it('appends comment bodies in order', () => {
    const comments = [
      { id: 'c1', author: 'a', body: 'Try a visual schedule.', score: 3, createdAt: post.createdAt },
      { id: 'c2', author: 'b', body: 'Same here.', score: 1, createdAt: post.createdAt },
    ];
    expect(threadText(post, comments)).toBe(
      'Bedtime battles. My kid will not settle. Try a visual schedule. Same here.',
    );
  });
});
