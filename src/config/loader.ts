/**
 * YAML Configuration Loader
 * Loads tools.yaml and generates MCP-compatible tool definitions
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

import type { YamlConfig, YamlToolConfig, McpTool } from './types.js';
import {
  frontPageParamsSchema,
  listTopicsParamsSchema,
  postParamsSchema,
  subredditInfoParamsSchema,
  subredditListingParamsSchema,
  topicParamsSchema,
  topPostsParamsSchema,
} from '../schemas/reddit-tools.js';
import { createLogger } from '../utils/logger.js';

// Get directory of this file for relative YAML path
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const log = createLogger('loader');

// ============================================================================
// YAML Validation
// ============================================================================

const yamlToolSchema = z.object({
  name: z.string().min(1),
  category: z.string().optional(),
  capability: z.literal('reddit').optional(),
  description: z.string().min(1),
  zodSchemaRef: z.string().min(1),
  schemaDescriptions: z.record(z.string(), z.string()).optional(),
});

const yamlConfigSchema: z.ZodType<YamlConfig> = z.object({
  version: z.string(),
  metadata: z.object({
    name: z.string(),
    description: z.string(),
  }),
  tools: z.array(yamlToolSchema),
});

// ============================================================================
// Zod Schema Registry
// ============================================================================

/**
 * Registry of Zod schemas referenced from tools.yaml
 */
const zodSchemaRegistry: Record<string, z.ZodTypeAny> = {
  subredditListingParamsSchema,
  topPostsParamsSchema,
  frontPageParamsSchema,
  postParamsSchema,
  subredditInfoParamsSchema,
  topicParamsSchema,
  listTopicsParamsSchema,
};

/**
 * Get Zod schema by reference name
 */
export function getZodSchemaByRef(ref: string): z.ZodTypeAny | undefined {
  return zodSchemaRegistry[ref];
}

// ============================================================================
// JSON Schema Conversion
// ============================================================================

const jsonObjectSchema = z.object({
  properties: z.record(z.string(), z.unknown()).default({}),
  required: z.array(z.string()).optional(),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert Zod schema to JSON Schema for MCP inputSchema
 */
export function zodToMcpInputSchema(
  schema: z.ZodTypeAny,
  descriptions: Record<string, string> = {}
): McpTool['inputSchema'] {
  const parsed = jsonObjectSchema.safeParse(zodToJsonSchema(schema, { $refStrategy: 'none' }));
  if (!parsed.success) {
    return { type: 'object', properties: {} };
  }

  const properties: Record<string, unknown> = { ...parsed.data.properties };
  for (const [key, description] of Object.entries(descriptions)) {
    const property = properties[key];
    if (isRecord(property)) {
      properties[key] = { ...property, description };
    }
  }

  return {
    type: 'object',
    properties,
    required: parsed.data.required,
  };
}

// ============================================================================
// Tool Loading
// ============================================================================

let cachedConfig: YamlConfig | undefined;

/**
 * Load and parse tools.yaml (once per process)
 */
export function loadYamlConfig(): YamlConfig {
  if (!cachedConfig) {
    const yamlPath = join(__dirname, 'yaml', 'tools.yaml');
    const yamlContent = readFileSync(yamlPath, 'utf8');
    cachedConfig = yamlConfigSchema.parse(parseYaml(yamlContent));
  }
  return cachedConfig;
}

/**
 * Get tool configuration by name
 */
export function getToolConfig(name: string): YamlToolConfig | undefined {
  return loadYamlConfig().tools.find((t) => t.name === name);
}

/**
 * Generate complete MCP tools list with all schemas resolved
 */
export function generateMcpTools(): McpTool[] {
  return loadYamlConfig().tools.map((tool) => {
    const schema = getZodSchemaByRef(tool.zodSchemaRef);
    if (!schema) {
      log.error(`Schema not found: ${tool.zodSchemaRef}`, { tool: tool.name });
      return {
        name: tool.name,
        description: tool.description.trim(),
        inputSchema: { type: 'object', properties: {} },
      };
    }

    return {
      name: tool.name,
      description: tool.description.trim(),
      inputSchema: zodToMcpInputSchema(schema, tool.schemaDescriptions),
    };
  });
}
