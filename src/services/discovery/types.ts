import { z } from 'zod';

// Each field is optional and falls back to undefined on a type mismatch, so a
// single odd listing entry can't fail the whole page. Required fields are
// enforced later by `toThreadPost` / `toThreadComment`.
const optionalString = z.string().optional().catch(undefined);
const optionalNumber = z.number().optional().catch(undefined);

export const RawPostSchema = z.object({
  id: optionalString,
  title: optionalString,
  selftext: optionalString,
  author: optionalString,
  subreddit: optionalString,
  permalink: optionalString,
  url: optionalString,
  score: optionalNumber,
  num_comments: optionalNumber,
  created_utc: optionalNumber,
});

export const RawCommentSchema = z.object({
  id: optionalString,
  author: optionalString,
  body: optionalString,
  score: optionalNumber,
  permalink: optionalString,
  created_utc: optionalNumber,
  replies: z.unknown().optional(),
});

export const ListingSchema = z.object({
  data: z.object({
    after: z.string().nullable().optional(),
    children: z.array(z.object({ kind: z.string(), data: z.unknown() })),
  }),
});

export type RawPost = z.infer<typeof RawPostSchema>;
export type RawComment = Omit<z.infer<typeof RawCommentSchema>, 'replies'>;
export type Listing = z.infer<typeof ListingSchema>;

/** A post that has passed required-field validation. */
export interface ThreadPost {
  id: string;
  source: string;
  title: string;
  selftext: string;
  author: string;
  permalink: string;
  url: string;
  score: number;
  numComments: number;
  createdAt: string;
}

export interface ThreadComment {
  id: string;
  author: string;
  body: string;
  score: number;
  createdAt: string;
}

export interface FetchPostsOptions {
  query?: string;
  limit: number;
}

/** Where threads come from. Implementations rate-limit their own calls. */
export interface ContentSource {
  readonly name: string;
  fetchPosts(channel: string, options: FetchPostsOptions): Promise<RawPost[]>;
  fetchPost(postId: string): Promise<RawPost>;
  fetchComments(postId: string, limit: number): Promise<RawComment[]>;
}

export type SourceTier = 'primary' | 'secondary' | 'tertiary';

export interface SourceSchedule {
  primary: readonly string[];
  secondary: readonly string[];
  tertiary: readonly string[];
}
