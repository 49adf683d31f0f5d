import type { ThreadComment, ThreadPost } from '../discovery/types.js';

/**
 * Post text followed by every comment, space-joined. No filtering or
 * truncation; analyzers that need a length cap apply their own.
 */
export function normalizeThreadContent(postText: string, commentTexts: readonly string[]): string {
  return [postText, ...commentTexts].join(' ');
}

export function postText(post: Pick<ThreadPost, 'title' | 'selftext'>): string {
  const title = post.title.trim();
  return title ? `${title}. ${post.selftext}` : post.selftext;
}

export function threadText(post: ThreadPost, comments: readonly ThreadComment[]): string {
  return normalizeThreadContent(postText(post), comments.map((c) => c.body));
}
