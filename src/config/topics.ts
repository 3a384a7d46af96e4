/**
 * Topic → subreddit mapping
 * Loaded once at startup and frozen; the aggregator only ever reads it.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, extname, join, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { normalizeSubredditName } from '../clients/reddit.js';
import { TopicConfigError } from '../utils/errors.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

export const DEFAULT_TOPICS_PATH = join(__dirname, 'yaml', 'topics.yaml');

export type TopicMapping = ReadonlyMap<string, readonly string[]>;

const topicsFileSchema = z.object({
  topics: z.record(z.string(), z.array(z.string()).nullable()),
});

/**
 * Build a validated, frozen mapping from raw topic → names entries
 * Every topic needs at least one subreddit; names are unique per topic (case-insensitive)
 */
export function createTopicMapping(entries: Iterable<[string, readonly string[]]>): TopicMapping {
  const mapping = new Map<string, readonly string[]>();

  for (const [rawTopic, rawNames] of entries) {
    const topic = rawTopic.trim();
    if (!topic) throw new TopicConfigError('Topic names must not be empty');
    if (mapping.has(topic)) throw new TopicConfigError(`Duplicate topic: ${topic}`);

    const names: string[] = [];
    const seen = new Set<string>();
    for (const raw of rawNames) {
      const name = normalizeSubredditName(raw);
      if (!name) continue;
      const key = name.toLowerCase();
      if (seen.has(key)) {
        throw new TopicConfigError(`Topic '${topic}' lists r/${name} more than once`);
      }
      seen.add(key);
      names.push(name);
    }

    if (names.length === 0) {
      throw new TopicConfigError(`Topic '${topic}' must map to at least one subreddit`);
    }
    mapping.set(topic, Object.freeze(names));
  }

  return mapping;
}

/**
 * Parse the YAML form:
 *
 *   topics:
 *     Programming: [programming, coding]
 */
export function parseTopicsYaml(text: string): TopicMapping {
  const parsed = topicsFileSchema.safeParse(parseYaml(text));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new TopicConfigError(`Invalid topics file at ${issue.path.join('.') || 'root'}: ${issue.message}`);
  }
  return createTopicMapping(
    Object.entries(parsed.data.topics).map(([topic, names]): [string, string[]] => [topic, names ?? []])
  );
}

/**
 * Parse the plain list form: `# Topic` header lines, each followed by `/r/name/` lines
 */
export function parseTopicList(text: string): TopicMapping {
  const entries: Array<[string, string[]]> = [];
  let current: string[] | null = null;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.startsWith('#') && !line.endsWith('#')) {
      current = [];
      entries.push([line.slice(1).trim(), current]);
    } else if (/^\/?r\//i.test(line) && current) {
      current.push(line);
    }
  }

  return createTopicMapping(entries);
}

/**
 * Load the mapping from a `.yaml`/`.yml` or `.txt` file
 */
export function loadTopicMapping(path: string = DEFAULT_TOPICS_PATH): TopicMapping {
  const absolute = resolve(path);
  let text: string;
  try {
    text = readFileSync(absolute, 'utf8');
  } catch (error) {
    throw new TopicConfigError(
      `Cannot read topics file ${absolute}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return extname(absolute).toLowerCase() === '.txt' ? parseTopicList(text) : parseTopicsYaml(text);
}

/**
 * Exact match first, then case-insensitive
 */
export function resolveTopicName(mapping: TopicMapping, name: string): string | undefined {
  const wanted = name.trim();
  if (mapping.has(wanted)) return wanted;
  const lower = wanted.toLowerCase();
  for (const topic of mapping.keys()) {
    if (topic.toLowerCase() === lower) return topic;
  }
  return undefined;
}
