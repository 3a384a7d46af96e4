/**
 * Reddit OAuth API client
 * Listings, posts with comment trees, and subreddit info from oauth.reddit.com
 */

import type { z } from 'zod';

import { REDDIT } from '../config/index.js';
import {
  RedditApiError,
  calculateBackoff,
  classifyError,
  fetchWithTimeout,
  sleep,
} from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import {
  accessTokenSchema,
  linkListingSchema,
  postWithCommentsSchema,
  subredditAboutSchema,
  type RawCommentThing,
  type RedditLinkData,
} from '../schemas/reddit-api.js';

const log = createLogger('reddit');

// ============================================================================
// Types
// ============================================================================

export const LISTING_KINDS = ['hot', 'new', 'rising', 'top'] as const;
export type ListingKind = typeof LISTING_KINDS[number];

export const TIME_FILTERS = ['hour', 'day', 'week', 'month', 'year', 'all'] as const;
export type TimeFilter = typeof TIME_FILTERS[number];

export type FrontPageSort = 'hot' | 'new' | 'top';

export interface PostSummary {
  id: string;
  title: string;
  author: string;
  score: number;
  commentCount: number;
  /** Seconds since epoch, 0 when Reddit did not send one */
  createdUtc: number;
  permalink: string;
  subreddit: string;
  url: string;
  domain: string;
  isSelf: boolean;
  body: string;
  flair: string;
  upvoteRatio: number;
  over18: boolean;
}

export interface Comment {
  author: string;
  body: string;
  score: number;
  depth: number;
  isOP: boolean;
}

export interface PostResult {
  post: PostSummary;
  comments: Comment[];
}

export interface SubredditInfo {
  name: string;
  title: string;
  description: string;
  subscribers: number;
  activeUsers?: number;
  createdUtc: number;
  over18: boolean;
  type: string;
  url: string;
}

export interface ListingRequestOptions {
  signal?: AbortSignal;
  timeFilter?: TimeFilter;
}

/**
 * Anything able to return one page of a subreddit listing
 * Implementations reject with an error classifiable by classifyError()
 */
export interface ListingFetcher {
  fetchListing(
    subreddit: string,
    kind: ListingKind,
    limit: number,
    options?: ListingRequestOptions
  ): Promise<PostSummary[]>;
}

/**
 * Everything the tool handlers read from Reddit
 */
export interface RedditReader extends ListingFetcher {
  fetchFrontPage(sort: FrontPageSort, limit: number, options?: ListingRequestOptions): Promise<PostSummary[]>;
  fetchPost(idOrUrl: string, commentLimit?: number, depth?: number, signal?: AbortSignal): Promise<PostResult>;
  fetchSubredditInfo(subreddit: string, signal?: AbortSignal): Promise<SubredditInfo>;
}

export interface RedditCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken?: string;
  userAgent: string;
}

// ============================================================================
// Helpers
// ============================================================================

export function toPostSummary(p: RedditLinkData): PostSummary {
  return {
    id: p.id,
    title: p.title,
    author: p.author || '[deleted]',
    score: p.score,
    commentCount: p.num_comments,
    createdUtc: p.created_utc,
    permalink: p.permalink,
    subreddit: p.subreddit,
    url: p.url ?? '',
    domain: p.domain ?? '',
    isSelf: p.is_self,
    body: p.selftext ?? '',
    flair: p.link_flair_text ?? '',
    upvoteRatio: p.upvote_ratio ?? 0,
    over18: p.over_18,
  };
}

/**
 * Strip `r/`, `/r/` and slashes from a subreddit name
 */
export function normalizeSubredditName(name: string): string {
  return name.trim().replace(/^\/?r\//i, '').replace(/\//g, '').trim();
}

/**
 * Accept a bare post id, a `t3_` fullname, or any reddit.com / redd.it post URL
 */
export function parsePostId(input: string): string | null {
  const trimmed = input.trim();
  const fromUrl = trimmed.match(/reddit\.com\/(?:r\/[^/]+\/)?comments\/([a-z0-9]+)/i)
    ?? trimmed.match(/redd\.it\/([a-z0-9]+)/i);
  if (fromUrl) return fromUrl[1].toLowerCase();
  const bare = trimmed.replace(/^t3_/i, '');
  return /^[a-z0-9]+$/i.test(bare) ? bare.toLowerCase() : null;
}

function flattenComments(
  children: RawCommentThing[],
  opAuthor: string,
  maxComments: number,
  maxDepth: number,
  out: Comment[] = [],
  depth = 0
): Comment[] {
  // Highest score first at every level
  const sorted = [...children].sort((a, b) => (b.data.score ?? 0) - (a.data.score ?? 0));
  for (const c of sorted) {
    if (out.length >= maxComments) return out;
    if (c.kind !== 't1' || !c.data.author || c.data.author === '[deleted]') continue;
    out.push({
      author: c.data.author,
      body: c.data.body ?? '',
      score: c.data.score ?? 0,
      depth,
      isOP: c.data.author === opAuthor,
    });
    const replies = c.data.replies;
    if (replies && depth + 1 < maxDepth) {
      flattenComments(replies.data.children, opAuthor, maxComments, maxDepth, out, depth + 1);
    }
  }
  return out;
}

// ============================================================================
// Client
// ============================================================================

export class RedditClient implements RedditReader {
  private token: string | null = null;
  private tokenExpiry = 0;
  private pendingAuth: Promise<string> | null = null;

  constructor(private credentials: RedditCredentials) {}

  private async auth(): Promise<string> {
    if (this.token && Date.now() < this.tokenExpiry - 60000) return this.token;
    // Concurrent fan-out requests share one token request
    if (!this.pendingAuth) {
      this.pendingAuth = this.requestToken().finally(() => {
        this.pendingAuth = null;
      });
    }
    return this.pendingAuth;
  }

  private async requestToken(): Promise<string> {
    const { clientId, clientSecret, refreshToken, userAgent } = this.credentials;
    const body = refreshToken
      ? new URLSearchParams({ grant_type: 'refresh_token', refresh_token: refreshToken })
      : new URLSearchParams({ grant_type: 'client_credentials' });

    const res = await fetchWithTimeout(REDDIT.AUTH_URL, {
      method: 'POST',
      headers: {
        Authorization: `Basic ${Buffer.from(`${clientId}:${clientSecret}`).toString('base64')}`,
        'Content-Type': 'application/x-www-form-urlencoded',
        'User-Agent': userAgent,
      },
      body: body.toString(),
      timeoutMs: REDDIT.REQUEST_TIMEOUT_MS,
    });

    if (!res.ok) throw new RedditApiError(res.status, `Reddit auth failed: ${res.status}`);
    const data = accessTokenSchema.parse(await res.json());
    this.token = data.access_token;
    this.tokenExpiry = Date.now() + data.expires_in * 1000;
    log.debug('Obtained access token', { grant: refreshToken ? 'refresh_token' : 'client_credentials' });
    return data.access_token;
  }

  /**
   * GET an oauth.reddit.com path and validate the JSON body
   * 429 and 5xx are retried with backoff, everything else is thrown as RedditApiError
   */
  private async get<T extends z.ZodTypeAny>(
    path: string,
    schema: T,
    signal?: AbortSignal
  ): Promise<z.infer<T>> {
    for (let attempt = 0; ; attempt++) {
      const token = await this.auth();
      const res = await fetchWithTimeout(`${REDDIT.API_BASE}${path}`, {
        headers: { Authorization: `Bearer ${token}`, 'User-Agent': this.credentials.userAgent },
        redirect: 'manual',
        signal,
        timeoutMs: REDDIT.REQUEST_TIMEOUT_MS,
      });

      if (res.ok) {
        return schema.parse(await res.json());
      }

      if (res.status === 401) {
        // Token revoked or expired early; next attempt re-authenticates
        this.token = null;
      }

      const error = new RedditApiError(res.status, `Reddit API error: ${res.status} for ${path}`);
      const structured = classifyError(error);
      const retryable = structured.retryable || (res.status === 401 && attempt === 0);
      if (!retryable || attempt >= REDDIT.MAX_RETRIES) throw error;

      const delayMs = calculateBackoff(attempt, {
        baseDelayMs: REDDIT.RETRY_BASE_DELAY_MS,
        maxDelayMs: REDDIT.RETRY_MAX_DELAY_MS,
      });
      log.warn(`${structured.code} on ${path}, retrying in ${Math.round(delayMs)}ms`, { attempt: attempt + 1 });
      await sleep(delayMs, signal);
    }
  }

  async fetchListing(
    subreddit: string,
    kind: ListingKind,
    limit: number,
    options: ListingRequestOptions = {}
  ): Promise<PostSummary[]> {
    const name = encodeURIComponent(normalizeSubredditName(subreddit));
    const params = new URLSearchParams({
      limit: String(Math.min(Math.max(1, limit), REDDIT.MAX_LISTING_LIMIT)),
      raw_json: '1',
    });
    if (kind === 'top') params.set('t', options.timeFilter ?? 'week');

    const listing = await this.get(`/r/${name}/${kind}?${params}`, linkListingSchema, options.signal);
    return listing.data.children.map((c) => toPostSummary(c.data));
  }

  async fetchFrontPage(
    sort: FrontPageSort,
    limit: number,
    options: ListingRequestOptions = {}
  ): Promise<PostSummary[]> {
    const params = new URLSearchParams({
      limit: String(Math.min(Math.max(1, limit), REDDIT.MAX_LISTING_LIMIT)),
      raw_json: '1',
    });
    if (sort === 'top') params.set('t', options.timeFilter ?? 'day');

    const listing = await this.get(`/${sort}?${params}`, linkListingSchema, options.signal);
    return listing.data.children.map((c) => toPostSummary(c.data));
  }

  /**
   * Fetch a post with its comment tree
   * @param idOrUrl Post id, t3_ fullname or Reddit URL
   * @param commentLimit Maximum comments returned (flattened)
   * @param depth Thread depth to follow
   */
  async fetchPost(
    idOrUrl: string,
    commentLimit = 20,
    depth = 3,
    signal?: AbortSignal
  ): Promise<PostResult> {
    const id = parsePostId(idOrUrl);
    if (!id) throw new RedditApiError(400, `Invalid Reddit post id or URL: ${idOrUrl}`);

    const limit = Math.min(Math.max(1, commentLimit), REDDIT.MAX_COMMENT_LIMIT);
    const maxDepth = Math.min(Math.max(1, depth), REDDIT.MAX_COMMENT_DEPTH);
    const params = new URLSearchParams({
      sort: 'top',
      limit: String(limit),
      depth: String(maxDepth),
      raw_json: '1',
    });

    const [postListing, commentListing] = await this.get(
      `/comments/${id}?${params}`,
      postWithCommentsSchema,
      signal
    );

    const first = postListing.data.children[0];
    if (!first) throw new RedditApiError(404, `Post not found: ${idOrUrl}`);

    const post = toPostSummary(first.data);
    const comments = flattenComments(commentListing.data.children, post.author, limit, maxDepth);
    return { post, comments };
  }

  async fetchSubredditInfo(subreddit: string, signal?: AbortSignal): Promise<SubredditInfo> {
    const name = encodeURIComponent(normalizeSubredditName(subreddit));
    const about = await this.get(`/r/${name}/about?raw_json=1`, subredditAboutSchema, signal);
    const d = about.data;
    return {
      name: d.display_name,
      title: d.title,
      description: d.public_description ?? '',
      subscribers: d.subscribers ?? 0,
      activeUsers: d.active_user_count ?? undefined,
      createdUtc: d.created_utc,
      over18: d.over18,
      type: d.subreddit_type,
      url: d.url,
    };
  }
}
