#!/usr/bin/env node

import 'dotenv/config';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import { parseEnv, getCapabilities } from './config/index.js';
import { loadTopicMapping, DEFAULT_TOPICS_PATH } from './config/topics.js';
import { RedditClient } from './clients/reddit.js';
import { TOOLS } from './tools/definitions.js';
import { executeTool, getToolCapabilities, type ToolDependencies } from './tools/registry.js';
import { createLogger } from './utils/logger.js';

const SERVER_NAME = 'reddit-topics-mcp';
const SERVER_VERSION = '1.0.0';

const log = createLogger('server');

async function main(): Promise<void> {
  const env = parseEnv();
  const capabilities = getCapabilities(env);
  const topics = loadTopicMapping(env.TOPICS_FILE ?? DEFAULT_TOPICS_PATH);

  const deps: ToolDependencies = {
    reddit: new RedditClient({
      clientId: env.REDDIT_CLIENT_ID ?? '',
      clientSecret: env.REDDIT_CLIENT_SECRET ?? '',
      refreshToken: env.REDDIT_REFRESH_TOKEN,
      userAgent: env.REDDIT_USER_AGENT,
    }),
    topics,
    subredditTimeoutMs: env.REDDIT_SUBREDDIT_TIMEOUT_MS,
  };

  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;
    // extra.signal is aborted when the client sends notifications/cancelled
    return executeTool(name, args, capabilities, deps, { signal: extra.signal });
  });

  const { enabled, disabled } = getToolCapabilities(capabilities);
  if (disabled.length > 0) {
    log.warn(`Tools disabled until REDDIT_CLIENT_ID and REDDIT_CLIENT_SECRET are set: ${disabled.join(', ')}`);
  }

  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info(`${SERVER_NAME} v${SERVER_VERSION} started`, { tools: enabled.length, topics: topics.size });
}

main().catch((error: unknown) => {
  const msg = error instanceof Error ? error.message : String(error);
  log.error(`Failed to start: ${msg}`);
  process.exit(1);
});
