import type { ListingFetcher, ListingKind, ListingRequestOptions, PostSummary } from '../src/clients/reddit.js';

export function makePost(overrides: Partial<PostSummary> & Pick<PostSummary, 'id'>): PostSummary {
  return {
    title: `Post ${overrides.id}`,
    author: 'someone',
    score: 1,
    commentCount: 0,
    createdUtc: 1700000000,
    permalink: `/r/test/comments/${overrides.id}/post/`,
    subreddit: 'test',
    url: '',
    domain: 'self.test',
    isSelf: true,
    body: '',
    flair: '',
    upvoteRatio: 1,
    over18: false,
    ...overrides,
  };
}

export type FakeResponse =
  | PostSummary[]
  | Error
  | { delayMs: number; posts: PostSummary[] }
  | 'hang';

export interface FakeCall {
  subreddit: string;
  kind: ListingKind;
  limit: number;
  options?: ListingRequestOptions;
}

/**
 * In-process ListingFetcher keyed by subreddit name
 * 'hang' never settles unless the request signal aborts
 */
export class FakeFetcher implements ListingFetcher {
  readonly calls: FakeCall[] = [];

  constructor(private responses: Record<string, FakeResponse>) {}

  fetchListing(
    subreddit: string,
    kind: ListingKind,
    limit: number,
    options?: ListingRequestOptions
  ): Promise<PostSummary[]> {
    this.calls.push({ subreddit, kind, limit, options });
    const response = this.responses[subreddit];

    if (response === undefined) return Promise.resolve([]);
    if (response instanceof Error) return Promise.reject(response);
    if (Array.isArray(response)) return Promise.resolve(response);
    if (response === 'hang') {
      return new Promise((_, reject) => {
        options?.signal?.addEventListener('abort', () => {
          const error = new Error('Aborted');
          error.name = 'AbortError';
          reject(error);
        });
      });
    }
    const { delayMs, posts } = response;
    return new Promise((resolve) => setTimeout(() => resolve(posts), delayMs));
  }
}
