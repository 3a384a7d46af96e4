/**
 * Shared Tool Utilities
 * Markdown helpers used by every Reddit tool handler
 */

import type { PostSummary } from '../clients/reddit.js';
import { TOPIC } from '../config/index.js';

// ============================================================================
// Error Formatting
// ============================================================================

/**
 * Format retry hint based on error retryability
 */
export function formatRetryHint(retryable: boolean): string {
  return retryable
    ? '\n\n💡 This error may be temporary. Try again in a moment.'
    : '';
}

/**
 * Create a standard error markdown response
 *
 * @param toolName - Name of the tool that errored
 * @param errorCode - Error code
 * @param message - Error message
 * @param retryable - Whether error is retryable
 * @param tip - Optional tip for resolution
 */
export function formatToolError(
  toolName: string,
  errorCode: string,
  message: string,
  retryable: boolean,
  tip?: string
): string {
  const retryHint = formatRetryHint(retryable);
  const tipSection = tip ? `\n\n**Tip:** ${tip}` : '';
  return `# ❌ ${toolName}: Operation Failed\n\n**${errorCode}:** ${message}${retryHint}${tipSection}`;
}

export function isErrorOutput(result: string): boolean {
  return result.startsWith('# ❌');
}

// ============================================================================
// Post Formatting
// ============================================================================

export function formatTimestamp(createdUtc: number): string {
  if (!createdUtc || createdUtc <= 0) return 'unknown';
  return `${new Date(createdUtc * 1000).toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}

export function formatScore(score: number): string {
  return score >= 0 ? `+${score}` : `${score}`;
}

export function postType(post: PostSummary): 'text' | 'link' {
  return post.isSelf ? 'text' : 'link';
}

export function truncate(text: string, max: number = TOPIC.CONTENT_PREVIEW_CHARS): string {
  const clean = text.trim();
  return clean.length > max ? `${clean.slice(0, max)}...` : clean;
}

/**
 * One numbered post block
 * `showSubreddit` prefixes the title with [r/name], used for multi-subreddit listings
 */
export function formatPostBlock(post: PostSummary, index: number, showSubreddit = false): string {
  const prefix = showSubreddit ? `[r/${post.subreddit}] ` : '';
  let md = `### ${index}. ${prefix}${post.title}\n\n`;
  md += `**r/${post.subreddit}** • u/${post.author} • ⬆️ ${post.score} • 💬 ${post.commentCount} comments • 📅 ${formatTimestamp(post.createdUtc)}\n`;

  const meta = [`Type: ${postType(post)}`];
  if (!post.isSelf && post.domain) meta.push(`Domain: ${post.domain}`);
  if (post.flair) meta.push(`Flair: ${post.flair}`);
  if (post.over18) meta.push('NSFW');
  md += `🏷️ ${meta.join(' | ')}\n`;

  const content = post.isSelf ? truncate(post.body) : post.url;
  if (content) {
    md += `\n> ${content.split('\n').join('\n> ')}\n`;
  }

  md += `\n🔗 https://reddit.com${post.permalink}\n`;
  return md;
}

/**
 * Build status line for fan-out results
 */
export function buildStatusLine(successful: number, failed: number, extras?: string[]): string {
  let status = `**Status:** ✅ ${successful} successful | ❌ ${failed} failed`;
  if (extras && extras.length > 0) {
    status += ` | ${extras.join(' | ')}`;
  }
  return status;
}
