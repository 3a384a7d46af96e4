/**
 * Handler Registry - Central tool registration and execution
 * Eliminates repetitive if/else routing with declarative registration
 */

import { z, type ZodError } from 'zod';
import { McpError, ErrorCode as McpErrorCode } from '@modelcontextprotocol/sdk/types.js';

import { getCapabilities, getMissingEnvMessage, type Capabilities } from '../config/index.js';
import type { TopicMapping } from '../config/topics.js';
import type { RedditReader } from '../clients/reddit.js';
import { TopicAggregator } from '../services/topic-aggregator.js';
import { classifyError, createToolErrorFromStructured } from '../utils/errors.js';
import {
  frontPageParamsSchema,
  listTopicsParamsSchema,
  postParamsSchema,
  subredditInfoParamsSchema,
  subredditListingParamsSchema,
  topicParamsSchema,
  topPostsParamsSchema,
} from '../schemas/reddit-tools.js';
import {
  handleFrontPage,
  handleGetPost,
  handleListTopics,
  handleSubredditInfo,
  handleSubredditListing,
  handleTopic,
} from './reddit.js';
import { isErrorOutput } from './utils.js';

// ============================================================================
// Types
// ============================================================================

/**
 * MCP-compliant tool result with index signature for SDK compatibility
 */
export interface CallToolResult {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
  [key: string]: unknown;
}

/**
 * Collaborators a handler may use; built once at startup
 */
export interface ToolDependencies {
  reddit: RedditReader;
  topics: TopicMapping;
  subredditTimeoutMs: number;
}

/**
 * Per-call state supplied by the transport
 */
export interface ToolContext {
  /** Aborted when the client cancels the request */
  signal?: AbortSignal;
}

/**
 * Result of validating raw arguments against a tool's schema
 */
export type PreparedCall =
  | { success: true; run: (deps: ToolDependencies, context: ToolContext) => Promise<string> }
  | { success: false; error: ZodError };

/**
 * Configuration for a registered tool
 */
export interface ToolRegistration {
  name: string;
  capability?: keyof Capabilities;
  schema: z.ZodTypeAny;
  prepare: (args: unknown) => PreparedCall;
  transformResponse: (result: string) => { content: string; isError?: boolean };
}

/**
 * Registry type
 */
export type ToolRegistry = Record<string, ToolRegistration>;

/**
 * Bind a handler to its schema; arguments are validated once, in prepare()
 */
function defineTool<S extends z.ZodTypeAny>(tool: {
  name: string;
  capability?: keyof Capabilities;
  schema: S;
  handler: (params: z.output<S>, deps: ToolDependencies, context: ToolContext) => Promise<string>;
}): ToolRegistration {
  return {
    name: tool.name,
    capability: tool.capability,
    schema: tool.schema,
    prepare: (args) => {
      const parsed = tool.schema.safeParse(args);
      if (!parsed.success) return { success: false, error: parsed.error };
      const params: z.output<S> = parsed.data;
      return { success: true, run: (deps, context) => tool.handler(params, deps, context) };
    },
    transformResponse: (result) => ({ content: result, isError: isErrorOutput(result) }),
  };
}

// ============================================================================
// Tool Registry
// ============================================================================

/**
 * Central registry of all MCP tools
 */
export const toolRegistry: ToolRegistry = {
  reddit_hot: defineTool({
    name: 'reddit_hot',
    capability: 'reddit',
    schema: subredditListingParamsSchema,
    handler: (p, deps, { signal }) =>
      handleSubredditListing(deps.reddit, 'reddit_hot', p.subreddit, 'hot', p.limit, { signal }),
  }),

  reddit_new: defineTool({
    name: 'reddit_new',
    capability: 'reddit',
    schema: subredditListingParamsSchema,
    handler: (p, deps, { signal }) =>
      handleSubredditListing(deps.reddit, 'reddit_new', p.subreddit, 'new', p.limit, { signal }),
  }),

  reddit_rising: defineTool({
    name: 'reddit_rising',
    capability: 'reddit',
    schema: subredditListingParamsSchema,
    handler: (p, deps, { signal }) =>
      handleSubredditListing(deps.reddit, 'reddit_rising', p.subreddit, 'rising', p.limit, { signal }),
  }),

  reddit_top: defineTool({
    name: 'reddit_top',
    capability: 'reddit',
    schema: topPostsParamsSchema,
    handler: (p, deps, { signal }) =>
      handleSubredditListing(deps.reddit, 'reddit_top', p.subreddit, 'top', p.limit, {
        timeFilter: p.time_period,
        signal,
      }),
  }),

  reddit_front: defineTool({
    name: 'reddit_front',
    capability: 'reddit',
    schema: frontPageParamsSchema,
    handler: (p, deps, { signal }) => handleFrontPage(deps.reddit, p.sort, p.limit, p.time_filter, signal),
  }),

  reddit_post: defineTool({
    name: 'reddit_post',
    capability: 'reddit',
    schema: postParamsSchema,
    handler: (p, deps, { signal }) =>
      handleGetPost(deps.reddit, p.post_id, p.comment_limit, p.comment_depth, signal),
  }),

  reddit_info: defineTool({
    name: 'reddit_info',
    capability: 'reddit',
    schema: subredditInfoParamsSchema,
    handler: (p, deps, { signal }) => handleSubredditInfo(deps.reddit, p.subreddit, signal),
  }),

  reddit_topic: defineTool({
    name: 'reddit_topic',
    capability: 'reddit',
    schema: topicParamsSchema,
    handler: (p, deps, { signal }) =>
      handleTopic(
        new TopicAggregator(deps.topics, deps.reddit, { subredditTimeoutMs: deps.subredditTimeoutMs }),
        {
          topic: p.topic,
          listing: p.listing,
          timePeriod: p.time_period,
          limitPerSubreddit: p.limit_per_subreddit,
          maxSubreddits: p.max_subreddits,
          maxPosts: p.max_posts,
        },
        signal
      ),
  }),

  reddit_topics: defineTool({
    name: 'reddit_topics',
    schema: listTopicsParamsSchema,
    handler: async (_p, deps) => handleListTopics(deps.topics),
  }),
};

// ============================================================================
// Execute Tool (Main Entry Point)
// ============================================================================

/**
 * Execute a tool by name with full middleware chain
 *
 * Middleware steps:
 * 1. Lookup tool in registry (throw McpError if not found)
 * 2. Check capability (return error response if missing)
 * 3. Validate params with Zod (return error response if invalid)
 * 4. Execute handler (catch and format any errors)
 * 5. Transform response
 */
export async function executeTool(
  name: string,
  args: unknown,
  capabilities: Capabilities,
  deps: ToolDependencies,
  context: ToolContext = {}
): Promise<CallToolResult> {
  // Step 1: Lookup tool
  const tool = toolRegistry[name];
  if (!tool) {
    throw new McpError(
      McpErrorCode.MethodNotFound,
      `Method not found: ${name}. Available tools: ${Object.keys(toolRegistry).join(', ')}`
    );
  }

  // Step 2: Check capability
  if (tool.capability && !capabilities[tool.capability]) {
    return {
      content: [{ type: 'text', text: getMissingEnvMessage(tool.capability) }],
      isError: true,
    };
  }

  // Step 3: Validate params with Zod
  const prepared = tool.prepare(args ?? {});
  if (!prepared.success) {
    const issues = prepared.error.issues
      .map((i) => `- **${i.path.join('.') || 'root'}**: ${i.message}`)
      .join('\n');
    return {
      content: [{ type: 'text', text: `# ❌ Validation Error\n\n${issues}` }],
      isError: true,
    };
  }

  // Step 4: Execute handler
  let result: string;
  try {
    result = await prepared.run(deps, context);
  } catch (error) {
    // Handler threw (shouldn't happen if handlers follow "never throw" pattern)
    const structured = classifyError(error);
    return createToolErrorFromStructured(structured);
  }

  // Step 5: Transform response
  const transformed = tool.transformResponse(result);
  return {
    content: [{ type: 'text', text: transformed.content }],
    isError: transformed.isError,
  };
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Get list of all registered tool names
 */
export function getRegisteredToolNames(): string[] {
  return Object.keys(toolRegistry);
}

/**
 * Get tool capabilities for logging
 */
export function getToolCapabilities(caps: Capabilities = getCapabilities()): { enabled: string[]; disabled: string[] } {
  const enabled: string[] = [];
  const disabled: string[] = [];

  for (const [name, tool] of Object.entries(toolRegistry)) {
    const capKey = tool.capability;
    if (!capKey || caps[capKey]) {
      enabled.push(name);
    } else {
      disabled.push(name);
    }
  }

  return { enabled, disabled };
}
