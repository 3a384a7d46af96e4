import { describe, expect, it } from 'vitest';
import { z } from 'zod';

import { generateMcpTools, getToolConfig, getZodSchemaByRef, zodToMcpInputSchema } from '../src/config/loader.js';
import { getRegisteredToolNames } from '../src/tools/registry.js';

describe('generateMcpTools', () => {
  const tools = generateMcpTools();

  it('describes every registered tool', () => {
    expect(tools.map((t) => t.name).sort()).toEqual(getRegisteredToolNames().sort());
    for (const tool of tools) {
      expect(tool.description.length).toBeGreaterThan(0);
      expect(tool.inputSchema.type).toBe('object');
    }
  });

  it('builds the topic tool schema with description overrides', () => {
    const topicTool = tools.find((t) => t.name === 'reddit_topic');

    expect(topicTool?.inputSchema.required).toEqual(['topic']);
    expect(topicTool?.inputSchema.properties.topic).toMatchObject({
      type: 'string',
      description: 'Topic name as listed by reddit_topics (case-insensitive)',
    });
    expect(topicTool?.inputSchema.properties.listing).toMatchObject({
      type: 'string',
      enum: ['hot', 'new', 'rising', 'top'],
      default: 'hot',
    });
  });

  it('gives reddit_topics an empty object schema', () => {
    const listTool = tools.find((t) => t.name === 'reddit_topics');
    expect(listTool?.inputSchema).toEqual({ type: 'object', properties: {} });
  });
});

describe('getToolConfig', () => {
  it('reads capability and schema reference from tools.yaml', () => {
    expect(getToolConfig('reddit_topic')).toMatchObject({
      capability: 'reddit',
      zodSchemaRef: 'topicParamsSchema',
    });
    expect(getToolConfig('reddit_topics')?.capability).toBeUndefined();
    expect(getToolConfig('missing')).toBeUndefined();
  });
});

describe('zodToMcpInputSchema', () => {
  it('only overrides descriptions of existing properties', () => {
    const schema = z.object({ a: z.string(), b: z.number().default(1) });

    expect(zodToMcpInputSchema(schema, { a: 'Alpha', c: 'ignored' })).toEqual({
      type: 'object',
      properties: {
        a: { type: 'string', description: 'Alpha' },
        b: { type: 'number', default: 1 },
      },
      required: ['a'],
    });
  });

  it('resolves schema references by name', () => {
    expect(getZodSchemaByRef('topicParamsSchema')).toBeDefined();
    expect(getZodSchemaByRef('nope')).toBeUndefined();
  });
});
