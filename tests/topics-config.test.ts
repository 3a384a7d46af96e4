import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, describe, expect, it } from 'vitest';

import {
  createTopicMapping,
  loadTopicMapping,
  parseTopicList,
  parseTopicsYaml,
  resolveTopicName,
} from '../src/config/topics.js';
import { TopicConfigError } from '../src/utils/errors.js';

describe('createTopicMapping', () => {
  it('normalizes subreddit names and keeps their order', () => {
    const mapping = createTopicMapping([[' Programming ', ['r/programming', '/r/coding/', 'webdev']]]);

    expect([...mapping.keys()]).toEqual(['Programming']);
    expect(mapping.get('Programming')).toEqual(['programming', 'coding', 'webdev']);
  });

  it('rejects a topic without subreddits', () => {
    expect(() => createTopicMapping([['Empty', ['  ']]])).toThrow(
      new TopicConfigError("Topic 'Empty' must map to at least one subreddit")
    );
  });

  it('rejects the same subreddit twice in one topic, ignoring case', () => {
    expect(() => createTopicMapping([['Dev', ['DevOps', 'r/devops']]])).toThrow(
      "Topic 'Dev' lists r/devops more than once"
    );
  });

  it('allows one subreddit under several topics', () => {
    const mapping = createTopicMapping([
      ['A', ['shared']],
      ['B', ['shared', 'other']],
    ]);
    expect(mapping.get('A')).toEqual(['shared']);
    expect(mapping.get('B')).toEqual(['shared', 'other']);
  });

  it('rejects duplicate and empty topic names', () => {
    expect(() => createTopicMapping([['X', ['a']], ['X', ['b']]])).toThrow('Duplicate topic: X');
    expect(() => createTopicMapping([['  ', ['a']]])).toThrow('Topic names must not be empty');
  });

  it('freezes subreddit lists', () => {
    const mapping = createTopicMapping([['A', ['one']]]);
    expect(Object.isFrozen(mapping.get('A'))).toBe(true);
  });
});

describe('parseTopicsYaml', () => {
  it('reads the topics record', () => {
    const mapping = parseTopicsYaml(['topics:', '  Science: [science, askscience]', '  Gaming:', '    - gaming'].join('\n'));

    expect(mapping.get('Science')).toEqual(['science', 'askscience']);
    expect(mapping.get('Gaming')).toEqual(['gaming']);
  });

  it('reports the offending path for malformed files', () => {
    expect(() => parseTopicsYaml('topics:\n  Broken: just-a-string\n')).toThrow(
      /^Invalid topics file at topics\.Broken: /
    );
  });

  it('rejects a topic with a null subreddit list', () => {
    expect(() => parseTopicsYaml('topics:\n  Empty:\n')).toThrow(
      "Topic 'Empty' must map to at least one subreddit"
    );
  });
});

describe('parseTopicList', () => {
  it('groups /r/ lines under the preceding header', () => {
    const text = [
      '# Artificial Intelligence',
      '/r/MachineLearning/',
      '/r/artificial/',
      '',
      '#####',
      'not a subreddit',
      '# Science',
      'r/science',
    ].join('\n');

    const mapping = parseTopicList(text);

    expect([...mapping.entries()]).toEqual([
      ['Artificial Intelligence', ['MachineLearning', 'artificial']],
      ['Science', ['science']],
    ]);
  });

  it('ignores subreddit lines before the first header', () => {
    const mapping = parseTopicList('/r/orphan/\n# Only\n/r/kept/\n');
    expect([...mapping.keys()]).toEqual(['Only']);
    expect(mapping.get('Only')).toEqual(['kept']);
  });
});

describe('loadTopicMapping', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('loads the bundled topics file', () => {
    const mapping = loadTopicMapping();
    expect(mapping.get('Programming')).toContain('programming');
    expect(mapping.size).toBe(8);
  });

  it('picks the list parser for .txt files', () => {
    dir = mkdtempSync(join(tmpdir(), 'topics-'));
    const file = join(dir, 'topics.txt');
    writeFileSync(file, '# Rust\n/r/rust/\n');

    expect(loadTopicMapping(file).get('Rust')).toEqual(['rust']);
  });

  it('wraps a missing file in TopicConfigError', () => {
    expect(() => loadTopicMapping(join(tmpdir(), 'does-not-exist', 'topics.yaml'))).toThrow(TopicConfigError);
  });
});

describe('resolveTopicName', () => {
  const mapping = createTopicMapping([
    ['Gaming', ['gaming']],
    ['gaming', ['pcgaming']],
  ]);

  it('prefers an exact match', () => {
    expect(resolveTopicName(mapping, 'gaming')).toBe('gaming');
    expect(resolveTopicName(mapping, 'Gaming')).toBe('Gaming');
  });

  it('falls back to a case-insensitive match', () => {
    expect(resolveTopicName(mapping, 'GAMING')).toBe('Gaming');
    expect(resolveTopicName(mapping, 'missing')).toBeUndefined();
  });
});
