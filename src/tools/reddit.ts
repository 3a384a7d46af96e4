/**
 * Reddit Tools - Listings, Posts, Subreddits and Topics
 * NEVER throws - failures come back as markdown error responses
 */

import type {
  Comment,
  FrontPageSort,
  ListingKind,
  ListingRequestOptions,
  PostResult,
  PostSummary,
  RedditReader,
  SubredditInfo,
  TimeFilter,
} from '../clients/reddit.js';
import { normalizeSubredditName } from '../clients/reddit.js';
import type { AggregatedResult, TopicAggregator } from '../services/topic-aggregator.js';
import type { TopicMapping } from '../config/topics.js';
import { UnknownTopicError, classifyError } from '../utils/errors.js';
import { buildStatusLine, formatPostBlock, formatScore, formatTimestamp, formatToolError } from './utils.js';

const CREDENTIALS_TIP = 'Make sure REDDIT_CLIENT_ID and REDDIT_CLIENT_SECRET are set in your environment variables.';

const LISTING_TITLES: Record<ListingKind, string> = {
  hot: '🔥 Hot posts',
  new: '🆕 Newest posts',
  rising: '📈 Rising posts',
  top: '🏆 Top posts',
};

// ============================================================================
// Formatters
// ============================================================================

function formatPostList(posts: PostSummary[], showSubreddit = false): string {
  if (posts.length === 0) return '_No posts found._';
  return posts.map((post, i) => formatPostBlock(post, i + 1, showSubreddit)).join('\n---\n\n');
}

export function formatComments(comments: Comment[]): string {
  let md = '';
  for (const c of comments) {
    const indent = '  '.repeat(c.depth);
    const op = c.isOP ? ' **[OP]**' : '';
    md += `${indent}- **u/${c.author}**${op} _(${formatScore(c.score)})_\n`;
    const bodyLines = c.body.split('\n').map((line) => `${indent}  ${line}`).join('\n');
    md += `${bodyLines}\n\n`;
  }
  return md;
}

export function formatPost(result: PostResult): string {
  const { post, comments } = result;
  let md = `# ${post.title}\n\n`;
  md += `**r/${post.subreddit}** • u/${post.author} • ⬆️ ${post.score} • 💬 ${post.commentCount} comments • 📅 ${formatTimestamp(post.createdUtc)}\n`;
  md += `🔗 https://reddit.com${post.permalink}\n\n`;

  if (post.isSelf && post.body) {
    md += `## Post Content\n\n${post.body}\n\n`;
  } else if (!post.isSelf && post.url) {
    md += `## Link\n\n${post.url}\n\n`;
  }

  if (comments.length > 0) {
    md += `## Top Comments (${comments.length}/${post.commentCount} shown, sorted by score)\n\n`;
    md += formatComments(comments);
  } else {
    md += '_No comments found._\n';
  }

  return md.trim();
}

export function formatSubredditInfo(info: SubredditInfo): string {
  const lines = [
    `# r/${info.name}`,
    '',
    `**Title:** ${info.title || '_none_'}`,
    `**Subscribers:** ${info.subscribers.toLocaleString('en-US')}`,
  ];
  if (info.activeUsers !== undefined) {
    lines.push(`**Active users:** ${info.activeUsers.toLocaleString('en-US')}`);
  }
  lines.push(
    `**Created:** ${formatTimestamp(info.createdUtc)}`,
    `**NSFW:** ${info.over18 ? 'Yes' : 'No'}`,
    `**Type:** ${info.type}`,
    '',
    `**Description:** ${info.description || 'No description available'}`
  );
  return lines.join('\n');
}

export function formatTopicResult(result: AggregatedResult): string {
  const succeeded = result.subreddits.length - result.failures.length;
  const sourceCount = new Set(result.posts.map((p) => p.subreddit)).size;

  let md = `# 🧭 Topic: ${result.topic} (${result.kind})\n\n`;
  md += `${buildStatusLine(succeeded, result.failures.length, [`📚 ${result.subreddits.length} subreddits queried`])}\n`;
  md += `**Posts:** ${result.posts.length} from ${sourceCount} subreddits (deduplicated, sorted by score then recency)\n\n`;
  md += '---\n\n';
  md += formatPostList(result.posts, true);

  if (result.failures.length > 0) {
    md += '\n\n---\n\n## ⚠️ Failed Subreddits\n\n';
    md += result.failures.map((f) => `- **r/${f.subreddit}**: ${f.code} (${f.message})`).join('\n');
  }

  return md.trim();
}

// ============================================================================
// Listing Handlers
// ============================================================================

export async function handleSubredditListing(
  reader: RedditReader,
  toolName: string,
  subreddit: string,
  kind: ListingKind,
  limit: number,
  options: ListingRequestOptions = {}
): Promise<string> {
  const name = normalizeSubredditName(subreddit);
  try {
    const posts = await reader.fetchListing(name, kind, limit, options);
    const window = kind === 'top' ? ` (${options.timeFilter ?? 'week'})` : '';
    return `# ${LISTING_TITLES[kind]} from r/${name}${window}\n\n${formatPostList(posts)}`.trim();
  } catch (error) {
    const structured = classifyError(error);
    return formatToolError(toolName, structured.code, `r/${name}: ${structured.message}`, structured.retryable, CREDENTIALS_TIP);
  }
}

export async function handleFrontPage(
  reader: RedditReader,
  sort: FrontPageSort,
  limit: number,
  timeFilter: TimeFilter,
  signal?: AbortSignal
): Promise<string> {
  try {
    const posts = await reader.fetchFrontPage(sort, limit, { timeFilter, signal });
    const window = sort === 'top' ? ` (${timeFilter})` : '';
    return `# 🏠 Front page: ${sort}${window}\n\n${formatPostList(posts, true)}`.trim();
  } catch (error) {
    const structured = classifyError(error);
    return formatToolError('reddit_front', structured.code, structured.message, structured.retryable, CREDENTIALS_TIP);
  }
}

// ============================================================================
// Post & Subreddit Handlers
// ============================================================================

export async function handleGetPost(
  reader: RedditReader,
  postId: string,
  commentLimit: number,
  commentDepth: number,
  signal?: AbortSignal
): Promise<string> {
  try {
    const result = await reader.fetchPost(postId, commentLimit, commentDepth, signal);
    return formatPost(result);
  } catch (error) {
    const structured = classifyError(error);
    return formatToolError('reddit_post', structured.code, structured.message, structured.retryable);
  }
}

export async function handleSubredditInfo(
  reader: RedditReader,
  subreddit: string,
  signal?: AbortSignal
): Promise<string> {
  const name = normalizeSubredditName(subreddit);
  try {
    return formatSubredditInfo(await reader.fetchSubredditInfo(name, signal));
  } catch (error) {
    const structured = classifyError(error);
    return formatToolError('reddit_info', structured.code, `r/${name}: ${structured.message}`, structured.retryable);
  }
}

// ============================================================================
// Topic Handlers
// ============================================================================

export interface TopicRequest {
  topic: string;
  listing: ListingKind;
  timePeriod: TimeFilter;
  limitPerSubreddit: number;
  maxSubreddits: number;
  maxPosts: number;
}

/**
 * Aborting `signal` cancels every in-flight subreddit fetch; the call then
 * reports TIMEOUT instead of a partial result
 */
export async function handleTopic(
  aggregator: TopicAggregator,
  request: TopicRequest,
  signal?: AbortSignal
): Promise<string> {
  try {
    const result = await aggregator.fetchTopic(request.topic, request.listing, request.limitPerSubreddit, {
      signal,
      timeFilter: request.timePeriod,
      maxSubreddits: request.maxSubreddits,
      maxPosts: request.maxPosts,
    });
    return formatTopicResult(result);
  } catch (error) {
    if (error instanceof UnknownTopicError) {
      const available = error.availableTopics.slice(0, 10).join(', ');
      const more = error.availableTopics.length > 10 ? ', ...' : '';
      return `# ❌ reddit_topic: Unknown Topic\n\nTopic '${error.topic}' not found. Available topics: ${available}${more}`;
    }
    const structured = classifyError(error);
    return formatToolError('reddit_topic', structured.code, structured.message, structured.retryable);
  }
}

export function handleListTopics(mapping: TopicMapping): string {
  if (mapping.size === 0) {
    return '# 🧭 Available Topics\n\n_No topics configured._';
  }
  let md = `# 🧭 Available Topics (${mapping.size})\n\n`;
  for (const [topic, subreddits] of mapping) {
    md += `- **${topic}** (${subreddits.length}): ${subreddits.map((s) => `r/${s}`).join(', ')}\n`;
  }
  return md.trim();
}
