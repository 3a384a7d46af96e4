/**
 * MCP Tool Definitions
 * Generated from YAML configuration for consistency
 */

import { generateMcpTools } from '../config/loader.js';

/**
 * Descriptions and categories come from src/config/yaml/tools.yaml,
 * input schemas from the Zod schemas each tool references there
 */
export const TOOLS = generateMcpTools();
