/**
 * Response models, validated with zod at the transport boundary.
 * Unknown fields are stripped; only what the tool reads is kept.
 */

import { z } from 'zod';

export const userSchema = z.object({
  login: z.string(),
  id: z.number().int(),
});

export type User = z.infer<typeof userSchema>;

export const extendedUserSchema = userSchema.extend({
  created_at: z.string().datetime({ offset: true }),
});

export type ExtendedUser = z.infer<typeof extendedUserSchema>;

/** Profile fields returned by the batched GraphQL user query. */
export const userInfoSchema = z.object({
  login: z.string(),
  createdAt: z.string().datetime({ offset: true }),
  name: z.string().nullish(),
  twitterUsername: z.string().nullish(),
});

export type UserInfo = z.infer<typeof userInfoSchema>;

export const pullRequestSchema = z.object({
  number: z.number().int(),
  state: z.string(),
  created_at: z.string().datetime({ offset: true }),
  user: userSchema,
});

export type PullRequest = z.infer<typeof pullRequestSchema>;
