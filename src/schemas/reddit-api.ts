import { z } from 'zod';

// Only the fields we read; Reddit sends many more and passthrough is not needed.

export const redditLinkSchema = z.object({
  id: z.string(),
  title: z.string(),
  author: z.string().nullish(),
  subreddit: z.string(),
  score: z.number().default(0),
  num_comments: z.number().default(0),
  created_utc: z.number().default(0),
  permalink: z.string(),
  url: z.string().nullish(),
  domain: z.string().nullish(),
  is_self: z.boolean().default(false),
  selftext: z.string().nullish(),
  link_flair_text: z.string().nullish(),
  upvote_ratio: z.number().nullish(),
  over_18: z.boolean().default(false),
});

export type RedditLinkData = z.infer<typeof redditLinkSchema>;

export const listingSchema = <T extends z.ZodTypeAny>(child: T) =>
  z.object({
    kind: z.literal('Listing'),
    data: z.object({
      after: z.string().nullish(),
      children: z.array(child),
    }),
  });

export const linkListingSchema = listingSchema(
  z.object({ kind: z.literal('t3'), data: redditLinkSchema })
);

// Comments nest their replies as another Listing, or '' when there are none.
export interface RawCommentThing {
  kind: string;
  data: {
    author?: string | null;
    body?: string | null;
    score?: number | null;
    replies?: RawCommentListing | '' | null;
  };
}

export interface RawCommentListing {
  kind: 'Listing';
  data: { children: RawCommentThing[] };
}

export const commentThingSchema: z.ZodType<RawCommentThing> = z.lazy(() =>
  z.object({
    kind: z.string(),
    data: z.object({
      author: z.string().nullish(),
      body: z.string().nullish(),
      score: z.number().nullish(),
      replies: z.union([commentListingSchema, z.literal(''), z.null()]).optional(),
    }),
  })
);

export const commentListingSchema: z.ZodType<RawCommentListing> = z.lazy(() =>
  z.object({
    kind: z.literal('Listing'),
    data: z.object({ children: z.array(commentThingSchema) }),
  })
);

export const postWithCommentsSchema = z.tuple([linkListingSchema, commentListingSchema]);

export const subredditAboutSchema = z.object({
  kind: z.literal('t5'),
  data: z.object({
    display_name: z.string(),
    title: z.string().default(''),
    public_description: z.string().nullish(),
    subscribers: z.number().nullish(),
    active_user_count: z.number().nullish(),
    created_utc: z.number().default(0),
    over18: z.boolean().default(false),
    subreddit_type: z.string().default('public'),
    url: z.string().default(''),
  }),
});

export const accessTokenSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive(),
});
