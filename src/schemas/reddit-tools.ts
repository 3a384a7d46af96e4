import { z } from 'zod';

import { LISTING_KINDS, TIME_FILTERS } from '../clients/reddit.js';
import { TOPIC } from '../config/index.js';

const subredditSchema = z
  .string({ required_error: 'Subreddit is required' })
  .trim()
  .min(1, { message: 'Subreddit cannot be empty' })
  .max(50, { message: 'Subreddit name too long' })
  .regex(/^(\/?r\/)?[A-Za-z0-9_]+\/?$/, { message: 'Subreddit must be a name like "programming" or "r/programming"' })
  .describe('Subreddit name (without r/)');

const limitSchema = (fallback: number) =>
  z.number().int().min(1).max(100).default(fallback).describe(`Posts to fetch (default: ${fallback})`);

const timeFilterSchema = z.enum(TIME_FILTERS);

// ============================================================================
// Subreddit listings (reddit_hot / reddit_new / reddit_rising)
// ============================================================================

export const subredditListingParamsSchema = z.object({
  subreddit: subredditSchema,
  limit: limitSchema(10),
});
export type SubredditListingParams = z.infer<typeof subredditListingParamsSchema>;

export const topPostsParamsSchema = z.object({
  subreddit: subredditSchema,
  time_period: timeFilterSchema.default('week').describe('hour/day/week/month/year/all'),
  limit: limitSchema(10),
});
export type TopPostsParams = z.infer<typeof topPostsParamsSchema>;

export const frontPageParamsSchema = z.object({
  sort: z.enum(['hot', 'new', 'top']).default('hot').describe('hot, top, or new (default: hot)'),
  limit: limitSchema(10),
  time_filter: timeFilterSchema.default('day').describe('hour/day/week/month/year/all (only for top)'),
});
export type FrontPageParams = z.infer<typeof frontPageParamsSchema>;

// ============================================================================
// Single post / subreddit
// ============================================================================

export const postParamsSchema = z.object({
  post_id: z
    .string({ required_error: 'post_id is required' })
    .trim()
    .min(1, { message: 'post_id cannot be empty' })
    .describe('Reddit post ID, t3_ fullname, or post URL'),
  comment_limit: z.number().int().min(1).max(500).default(20).describe('Comments to fetch (default: 20)'),
  comment_depth: z.number().int().min(1).max(10).default(3).describe('Thread depth (default: 3)'),
});
export type PostParams = z.infer<typeof postParamsSchema>;

export const subredditInfoParamsSchema = z.object({
  subreddit: subredditSchema,
});
export type SubredditInfoParams = z.infer<typeof subredditInfoParamsSchema>;

// ============================================================================
// Topics
// ============================================================================

export const topicParamsSchema = z.object({
  topic: z
    .string({ required_error: 'topic is required' })
    .trim()
    .min(1, { message: 'topic cannot be empty' })
    .describe('Topic name (e.g. Programming). Use reddit_topics to list them.'),
  listing: z.enum(LISTING_KINDS).default('hot').describe('Listing to pull from each subreddit'),
  time_period: timeFilterSchema.default('week').describe('Time window when listing is "top"'),
  limit_per_subreddit: z
    .number()
    .int()
    .positive()
    .max(100)
    .default(TOPIC.DEFAULT_PER_SUBREDDIT_LIMIT)
    .describe(`Posts requested from each subreddit (default: ${TOPIC.DEFAULT_PER_SUBREDDIT_LIMIT})`),
  max_subreddits: z
    .number()
    .int()
    .positive()
    .default(TOPIC.DEFAULT_MAX_SUBREDDITS)
    .describe(`Max subreddits to query (default: ${TOPIC.DEFAULT_MAX_SUBREDDITS})`),
  max_posts: z
    .number()
    .int()
    .positive()
    .max(500)
    .default(TOPIC.DEFAULT_MAX_POSTS)
    .describe(`Max merged posts returned (default: ${TOPIC.DEFAULT_MAX_POSTS})`),
});
export type TopicParams = z.infer<typeof topicParamsSchema>;

export const listTopicsParamsSchema = z.object({});
export type ListTopicsParams = z.infer<typeof listTopicsParamsSchema>;
