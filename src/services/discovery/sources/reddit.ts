import { createLogger } from '../../../utils/logger.js';
import { SourceFetchError } from '../../../utils/errors.js';
import { createRateLimiter, withRetry, type RateLimiter } from '../../../utils/retry.js';
import {
  ListingSchema,
  RawCommentSchema,
  RawPostSchema,
  type ContentSource,
  type FetchPostsOptions,
  type Listing,
  type RawComment,
  type RawPost,
} from '../types.js';

const logger = createLogger('discovery:reddit');

export interface RedditSourceOptions {
  baseUrl?: string;
  userAgent: string;
  rateLimiter?: RateLimiter;
  fetchImpl?: typeof fetch;
  maxRetries?: number;
}

/**
 * Reads the public Reddit JSON listings. Every request takes a slot from the
 * shared rate limiter first, so a busy cycle slows down instead of failing.
 */
export class RedditSource implements ContentSource {
  readonly name = 'reddit';
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly limiter: RateLimiter;
  private readonly fetchImpl: typeof fetch;
  private readonly maxRetries: number;

  constructor(options: RedditSourceOptions) {
    this.baseUrl = (options.baseUrl ?? 'https://www.reddit.com').replace(/\/+$/, '');
    this.userAgent = options.userAgent;
    this.limiter = options.rateLimiter ?? createRateLimiter({ maxRequests: 60, windowMs: 60_000, name: 'reddit' });
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.maxRetries = options.maxRetries ?? 2;
  }

  async fetchPosts(subreddit: string, options: FetchPostsOptions): Promise<RawPost[]> {
    const params = new URLSearchParams({ limit: String(options.limit), raw_json: '1' });
    let path = `/r/${encodeURIComponent(subreddit)}/new.json`;
    if (options.query) {
      path = `/r/${encodeURIComponent(subreddit)}/search.json`;
      params.set('q', options.query);
      params.set('restrict_sr', '1');
      params.set('sort', 'new');
    }

    const body = await this.getJson(`${path}?${params.toString()}`, subreddit);
    const listing = ListingSchema.safeParse(body);
    if (!listing.success) {
      throw new SourceFetchError(subreddit, `Unexpected listing shape for r/${subreddit}`);
    }

    const posts = listing.data.data.children
      .filter((child) => child.kind === 't3')
      .map((child) => {
        // A malformed entry stays in the list as an empty record so the monitor can count it.
        const parsed = RawPostSchema.safeParse(child.data);
        return parsed.success ? parsed.data : {};
      });

    logger.debug(`Fetched ${posts.length} posts`, { subreddit, query: options.query });
    return posts;
  }

  /** The post half of `/comments/{id}.json`. */
  async fetchPost(postId: string): Promise<RawPost> {
    const body = await this.getThreadJson(postId, 1);
    const listing = ListingSchema.safeParse(body[0]);
    const child = listing.success ? listing.data.data.children.find((c) => c.kind === 't3') : undefined;
    if (!child) {
      throw new SourceFetchError(postId, `Post ${postId} not found`, 404);
    }
    const parsed = RawPostSchema.safeParse(child.data);
    return parsed.success ? parsed.data : {};
  }

  async fetchComments(postId: string, limit: number): Promise<RawComment[]> {
    const body = await this.getThreadJson(postId, limit);
    const listing = ListingSchema.safeParse(body[1]);
    if (!listing.success) {
      throw new SourceFetchError(postId, `Unexpected comments listing for post ${postId}`);
    }

    const comments: RawComment[] = [];
    flattenComments(listing.data, comments);
    return comments.slice(0, limit);
  }

  private async getThreadJson(postId: string, limit: number): Promise<unknown[]> {
    const params = new URLSearchParams({ limit: String(limit), raw_json: '1' });
    const body = await this.getJson(`/comments/${encodeURIComponent(postId)}.json?${params.toString()}`, postId);
    if (!Array.isArray(body) || body.length < 2) {
      throw new SourceFetchError(postId, `Unexpected comments payload for post ${postId}`);
    }
    return body;
  }

  private async getJson(pathAndQuery: string, source: string): Promise<unknown> {
    const url = `${this.baseUrl}${pathAndQuery}`;

    return withRetry(
      async () => {
        await this.limiter.acquire();

        let response: Response;
        try {
          response = await this.fetchImpl(url, { headers: { 'User-Agent': this.userAgent } });
        } catch (error) {
          throw new SourceFetchError(source, `Request to ${url} failed`, undefined, { cause: error });
        }

        if (!response.ok) {
          throw new SourceFetchError(source, `Reddit API error ${response.status} for ${url}`, response.status);
        }
        const body: unknown = await response.json();
        return body;
      },
      {
        maxRetries: this.maxRetries,
        baseDelayMs: 2000,
        retryOn: (error) =>
          error instanceof SourceFetchError &&
          (error.status === undefined || error.status === 429 || error.status >= 500),
      },
    );
  }
}

// Depth-first: a comment, then its replies, then its next sibling.
function flattenComments(listing: Listing, out: RawComment[]): void {
  for (const child of listing.data.children) {
    if (child.kind !== 't1') continue;
    const parsed = RawCommentSchema.safeParse(child.data);
    if (!parsed.success) continue;
    const { replies, ...comment } = parsed.data;
    out.push(comment);

    const nested = ListingSchema.safeParse(replies);
    if (nested.success) flattenComments(nested.data, out);
  }
}
