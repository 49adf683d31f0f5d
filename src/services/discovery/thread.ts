import { MalformedThreadError } from '../../utils/errors.js';
import type { RawComment, RawPost, ThreadComment, ThreadPost } from './types.js';

function isoFromEpoch(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}

/**
 * Enforce the fields every thread must carry: id, body text and creation
 * time. Throws `MalformedThreadError` naming what is missing.
 */
export function toThreadPost(raw: RawPost, channel: string): ThreadPost {
  const missing: string[] = [];
  if (!raw.id) missing.push('id');
  if (raw.selftext === undefined) missing.push('selftext');
  if (raw.created_utc === undefined) missing.push('created_utc');

  if (!raw.id || raw.selftext === undefined || raw.created_utc === undefined) {
    throw new MalformedThreadError(raw.id ?? 'unknown', missing);
  }

  return {
    id: raw.id,
    source: raw.subreddit ?? channel,
    title: raw.title ?? '',
    selftext: raw.selftext,
    author: raw.author ?? '[deleted]',
    permalink: raw.permalink ?? '',
    url: raw.url ?? '',
    score: raw.score ?? 0,
    numComments: raw.num_comments ?? 0,
    createdAt: isoFromEpoch(raw.created_utc),
  };
}

/** Comments without a body or id are dropped rather than failing the thread. */
export function toThreadComments(raws: readonly RawComment[]): ThreadComment[] {
  const comments: ThreadComment[] = [];
  for (const raw of raws) {
    if (!raw.id || raw.body === undefined || raw.created_utc === undefined) continue;
    comments.push({
      id: raw.id,
      author: raw.author ?? '[deleted]',
      body: raw.body,
      score: raw.score ?? 0,
      createdAt: isoFromEpoch(raw.created_utc),
    });
  }
  return comments;
}
