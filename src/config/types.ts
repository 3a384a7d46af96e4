/**
 * TypeScript interfaces for YAML tool configuration
 * Matches structure defined in yaml/tools.yaml
 */

import type { Capabilities } from './index.js';

/**
 * Tool definition in YAML
 */
export interface YamlToolConfig {
  name: string;
  category?: string;
  capability?: keyof Capabilities;
  description: string;

  // Name of a schema in the loader's Zod schema registry
  zodSchemaRef: string;

  // Description overrides for properties of the Zod schema
  schemaDescriptions?: Record<string, string>;
}

/**
 * Root YAML configuration structure
 */
export interface YamlConfig {
  version: string;
  metadata: {
    name: string;
    description: string;
  };
  tools: YamlToolConfig[];
}

/**
 * MCP Tool definition (matches SDK)
 */
export interface McpTool {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}
