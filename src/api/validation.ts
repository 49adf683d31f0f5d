import { z } from 'zod';
import type { Context } from 'hono';
import { PRIORITY_TIERS } from '../services/monitoring/types.js';
import { USER_TYPES } from '../services/scoring/types.js';

export const TierSchema = z.enum(PRIORITY_TIERS);
export const UserTypeSchema = z.enum(USER_TYPES);

// GET /api/threads/:tier
export const RecentThreadsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

// GET /api/threads/by-subreddit/:name, /api/threads/by-user-type/:type
export const TierFilterQuerySchema = z.object({
  tier: TierSchema.optional(),
});

// GET /api/digest/runs
export const DigestRunsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// POST /api/threads/:id/analyze
export const ThreadIdSchema = z.string().regex(/^[a-z0-9]{1,12}$/, 'invalid thread id');

export const SubredditNameSchema = z.string().regex(/^[A-Za-z0-9_]{2,21}$/, 'invalid subreddit name');

export type ValidationResult<T> = { ok: true; data: T } | { ok: false; response: Response };

export function validate<T>(c: Context, schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): ValidationResult<T> {
  const result = schema.safeParse(input);
  if (result.success) return { ok: true, data: result.data };
  return { ok: false, response: validationError(c, result.error) };
}

export function validationError(c: Context, error: z.ZodError): Response {
  return c.json(
    {
      error: 'Validation failed',
      details: error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    },
    400,
  );
}
