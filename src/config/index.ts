/**
 * Environment configuration and capability detection
 */

import { z } from 'zod';

// ============================================================================
// Environment
// ============================================================================

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined));

const envSchema = z.object({
  REDDIT_CLIENT_ID: optionalString,
  REDDIT_CLIENT_SECRET: optionalString,
  REDDIT_REFRESH_TOKEN: optionalString,
  REDDIT_USER_AGENT: optionalString.transform((v) => v ?? 'reddit-topics-mcp/1.0'),
  TOPICS_FILE: optionalString,
  REDDIT_SUBREDDIT_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  // Unknown levels fall back to info, matching createLogger()
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).catch('info'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse and validate process.env (or a supplied record)
 * Throws a ZodError describing every invalid variable
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return envSchema.parse({
    ...source,
    LOG_LEVEL: source.LOG_LEVEL?.toLowerCase() || undefined,
    REDDIT_SUBREDDIT_TIMEOUT_MS: source.REDDIT_SUBREDDIT_TIMEOUT_MS || undefined,
  });
}

// ============================================================================
// Capabilities
// ============================================================================

export interface Capabilities {
  reddit: boolean;
}

export function getCapabilities(env: Env = parseEnv()): Capabilities {
  return {
    reddit: Boolean(env.REDDIT_CLIENT_ID && env.REDDIT_CLIENT_SECRET),
  };
}

export function getMissingEnvMessage(capability: keyof Capabilities): string {
  switch (capability) {
    case 'reddit':
      return [
        '# ❌ Reddit API not configured',
        '',
        'Set `REDDIT_CLIENT_ID` and `REDDIT_CLIENT_SECRET` in your environment (create an app at https://www.reddit.com/prefs/apps).',
        'Optionally set `REDDIT_REFRESH_TOKEN` to act on behalf of a user.',
      ].join('\n');
  }
}

// ============================================================================
// Limits
// ============================================================================

export const REDDIT = {
  API_BASE: 'https://oauth.reddit.com',
  AUTH_URL: 'https://www.reddit.com/api/v1/access_token',
  REQUEST_TIMEOUT_MS: 15000,
  MAX_RETRIES: 2,
  RETRY_BASE_DELAY_MS: 500,
  RETRY_MAX_DELAY_MS: 4000,
  MAX_LISTING_LIMIT: 100,
  MAX_COMMENT_LIMIT: 500,
  MAX_COMMENT_DEPTH: 10,
} as const;

export const TOPIC = {
  DEFAULT_PER_SUBREDDIT_LIMIT: 10,
  DEFAULT_MAX_SUBREDDITS: 20,
  DEFAULT_MAX_POSTS: 50,
  CONTENT_PREVIEW_CHARS: 300,
} as const;
