/**
 * Topic Aggregator
 * Fans one topic request out to every mapped subreddit, then merges the listings
 * into a single deduplicated, deterministically ordered result.
 *
 * Per-subreddit failures (including per-subreddit timeouts) are recorded in
 * `failures` and never abort sibling fetches. Only an unknown topic, invalid
 * arguments, or caller cancellation fail the call.
 */

import {
  LISTING_KINDS,
  type ListingFetcher,
  type ListingKind,
  type PostSummary,
  type TimeFilter,
} from '../clients/reddit.js';
import { resolveTopicName, type TopicMapping } from '../config/topics.js';
import {
  TimeoutError,
  UnknownTopicError,
  classifyError,
  type ErrorCodeType,
  type StructuredError,
} from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('topic');

// ============================================================================
// Types
// ============================================================================

export type PostFilter = (post: PostSummary) => boolean;

export interface SubredditFailure {
  subreddit: string;
  code: ErrorCodeType;
  message: string;
  retryable: boolean;
}

export interface AggregatedResult {
  topic: string;
  kind: ListingKind;
  /** Subreddits queried, in mapping order */
  subreddits: string[];
  posts: PostSummary[];
  /** In mapping order */
  failures: SubredditFailure[];
}

export interface TopicAggregatorOptions {
  /** Ceiling for a single subreddit fetch */
  subredditTimeoutMs?: number;
  /** Applied to fetched posts before merging; defaults to isReadablePost */
  filter?: PostFilter;
}

export interface FetchTopicOptions {
  /** Aborting fails the whole call with TimeoutError */
  signal?: AbortSignal;
  /** Overall deadline for the call; same effect as an aborted signal */
  deadlineMs?: number;
  timeFilter?: TimeFilter;
  /** Only query the first N mapped subreddits */
  maxSubreddits?: number;
  /** Truncate the merged list */
  maxPosts?: number;
}

export type SubredditOutcome =
  | { subreddit: string; ok: true; posts: PostSummary[] }
  | { subreddit: string; ok: false; error: StructuredError };

export const DEFAULT_SUBREDDIT_TIMEOUT_MS = 10000;

// ============================================================================
// Filtering & Ordering
// ============================================================================

const SPAM_PATTERNS = ['spam', 'casino', 'gambling', 'porn', 'xxx', 'adult', 'malware', 'phishing', 'scam'];

/**
 * Keeps self posts and every link post whose url/domain carries no spam marker
 * Runs after the fetch, so a subreddit may contribute fewer than
 * perSubredditLimit posts; the request size itself is never raised.
 */
export function isReadablePost(post: PostSummary): boolean {
  if (post.isSelf) return true;
  const haystack = `${post.url} ${post.domain}`.toLowerCase();
  return !SPAM_PATTERNS.some((pattern) => haystack.includes(pattern));
}

/**
 * Score desc, then newest first, then subreddit name asc
 */
export function comparePosts(a: PostSummary, b: PostSummary): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.createdUtc !== b.createdUtc) return b.createdUtc - a.createdUtc;
  if (a.subreddit < b.subreddit) return -1;
  if (a.subreddit > b.subreddit) return 1;
  return 0;
}

/**
 * Merge per-subreddit outcomes (in mapping order) into one listing
 * The first occurrence of a post id wins; the sort is stable.
 */
export function mergeOutcomes(
  outcomes: readonly SubredditOutcome[],
  filter: PostFilter = isReadablePost
): { posts: PostSummary[]; failures: SubredditFailure[] } {
  const byId = new Map<string, PostSummary>();
  const failures: SubredditFailure[] = [];

  for (const outcome of outcomes) {
    if (!outcome.ok) {
      failures.push({
        subreddit: outcome.subreddit,
        code: outcome.error.code,
        message: outcome.error.message,
        retryable: outcome.error.retryable,
      });
      continue;
    }
    for (const post of outcome.posts) {
      if (byId.has(post.id) || !filter(post)) continue;
      byId.set(post.id, { ...post, subreddit: outcome.subreddit });
    }
  }

  return { posts: [...byId.values()].sort(comparePosts), failures };
}

// ============================================================================
// Cancellation
// ============================================================================

interface CallScope {
  controller: AbortController;
  cancelled: Promise<never>;
  dispose(): void;
}

function openCallScope(signal: AbortSignal | undefined, deadlineMs: number | undefined): CallScope {
  const controller = new AbortController();
  let dispose: () => void = () => {};

  const cancelled = new Promise<never>((_, reject) => {
    const cancel = (reason: string) => {
      reject(new TimeoutError(reason));
      controller.abort();
    };
    const onAbort = () => cancel('Topic fetch cancelled by caller');
    const timer =
      deadlineMs === undefined
        ? undefined
        : setTimeout(() => cancel(`Topic fetch exceeded its ${deadlineMs}ms deadline`), deadlineMs);

    signal?.addEventListener('abort', onAbort, { once: true });
    dispose = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };
  });

  return { controller, cancelled, dispose: () => dispose() };
}

// ============================================================================
// Aggregator
// ============================================================================

export class TopicAggregator {
  private readonly subredditTimeoutMs: number;
  private readonly filter: PostFilter;

  constructor(
    private readonly mapping: TopicMapping,
    private readonly fetcher: ListingFetcher,
    options: TopicAggregatorOptions = {}
  ) {
    this.subredditTimeoutMs = options.subredditTimeoutMs ?? DEFAULT_SUBREDDIT_TIMEOUT_MS;
    this.filter = options.filter ?? isReadablePost;
  }

  get topics(): string[] {
    return [...this.mapping.keys()];
  }

  async fetchTopic(
    topicName: string,
    kind: ListingKind,
    perSubredditLimit: number,
    options: FetchTopicOptions = {}
  ): Promise<AggregatedResult> {
    const topic = resolveTopicName(this.mapping, topicName);
    const mapped = topic === undefined ? undefined : this.mapping.get(topic);
    if (topic === undefined || !mapped) {
      throw new UnknownTopicError(topicName, this.topics);
    }
    if (!LISTING_KINDS.includes(kind)) {
      throw new RangeError(`Unsupported listing kind: ${kind}`);
    }
    if (!Number.isInteger(perSubredditLimit) || perSubredditLimit <= 0) {
      throw new RangeError(`perSubredditLimit must be a positive integer, got ${perSubredditLimit}`);
    }
    if (options.signal?.aborted) {
      throw new TimeoutError('Topic fetch cancelled by caller');
    }

    const subreddits =
      options.maxSubreddits !== undefined && options.maxSubreddits > 0
        ? mapped.slice(0, options.maxSubreddits)
        : [...mapped];

    const scope = openCallScope(options.signal, options.deadlineMs);
    const started = Date.now();
    log.debug(`Fetching ${kind} for "${topic}" from ${subreddits.length} subreddits`);

    try {
      const outcomes = await Promise.race([
        Promise.all(
          subreddits.map((subreddit) =>
            this.fetchSubreddit(subreddit, kind, perSubredditLimit, options.timeFilter, scope.controller.signal)
          )
        ),
        scope.cancelled,
      ]);

      const { posts, failures } = mergeOutcomes(outcomes, this.filter);
      const limited = options.maxPosts !== undefined && options.maxPosts > 0 ? posts.slice(0, options.maxPosts) : posts;

      log.info(`Topic "${topic}" (${kind}): ${limited.length} posts`, {
        subreddits: subreddits.length,
        failed: failures.length,
        elapsedMs: Date.now() - started,
      });

      return { topic, kind, subreddits, posts: limited, failures };
    } finally {
      scope.dispose();
    }
  }

  /**
   * One isolated fetch; resolves with the failure instead of rejecting
   */
  private async fetchSubreddit(
    subreddit: string,
    kind: ListingKind,
    limit: number,
    timeFilter: TimeFilter | undefined,
    parent: AbortSignal
  ): Promise<SubredditOutcome> {
    const controller = new AbortController();
    const onParentAbort = () => controller.abort();
    parent.addEventListener('abort', onParentAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // Reject before aborting so the race settles with the timeout, not the abort
        reject(new TimeoutError(`r/${subreddit} timed out after ${this.subredditTimeoutMs}ms`));
        controller.abort();
      }, this.subredditTimeoutMs);
    });

    try {
      const posts = await Promise.race([
        this.fetcher.fetchListing(subreddit, kind, limit, { signal: controller.signal, timeFilter }),
        deadline,
      ]);
      return { subreddit, ok: true, posts };
    } catch (error) {
      const structured = classifyError(error);
      if (!parent.aborted) {
        log.warn(`Failed to fetch r/${subreddit}: ${structured.message}`, { code: structured.code });
      }
      return { subreddit, ok: false, error: structured };
    } finally {
      clearTimeout(timer);
      parent.removeEventListener('abort', onParentAbort);
    }
  }
}
