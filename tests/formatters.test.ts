import { describe, expect, it } from 'vitest';

import { createTopicMapping } from '../src/config/topics.js';
import { formatComments, formatSubredditInfo, formatTopicResult, handleListTopics } from '../src/tools/reddit.js';
import { buildStatusLine, formatPostBlock, formatScore, formatTimestamp, isErrorOutput, truncate } from '../src/tools/utils.js';
import { makePost } from './helpers.js';

describe('formatTimestamp', () => {
  it('renders UTC minutes', () => {
    expect(formatTimestamp(1700000000)).toBe('2023-11-14 22:13 UTC');
  });

  it('marks missing timestamps', () => {
    expect(formatTimestamp(0)).toBe('unknown');
  });
});

describe('formatPostBlock', () => {
  it('quotes the body of a text post', () => {
    const post = makePost({
      id: 'a',
      title: 'Hi',
      author: 'u1',
      score: 5,
      commentCount: 2,
      subreddit: 'rust',
      permalink: '/r/rust/comments/a/hi/',
      body: 'Hello\nworld',
    });

    expect(formatPostBlock(post, 1, true)).toBe(
      '### 1. [r/rust] Hi\n\n' +
        '**r/rust** • u/u1 • ⬆️ 5 • 💬 2 comments • 📅 2023-11-14 22:13 UTC\n' +
        '🏷️ Type: text\n' +
        '\n> Hello\n> world\n' +
        '\n🔗 https://reddit.com/r/rust/comments/a/hi/\n'
    );
  });

  it('shows domain, flair and NSFW for link posts', () => {
    const post = makePost({
      id: 'b',
      isSelf: false,
      url: 'https://example.com',
      domain: 'example.com',
      flair: 'News',
      over18: true,
    });

    expect(formatPostBlock(post, 3)).toBe(
      '### 3. Post b\n\n' +
        '**r/test** • u/someone • ⬆️ 1 • 💬 0 comments • 📅 2023-11-14 22:13 UTC\n' +
        '🏷️ Type: link | Domain: example.com | Flair: News | NSFW\n' +
        '\n> https://example.com\n' +
        '\n🔗 https://reddit.com/r/test/comments/b/post/\n'
    );
  });
});

describe('small helpers', () => {
  it('formats scores, truncates previews and builds status lines', () => {
    expect(formatScore(4)).toBe('+4');
    expect(formatScore(-3)).toBe('-3');
    expect(truncate(`  ${'x'.repeat(305)}  `)).toBe(`${'x'.repeat(300)}...`);
    expect(truncate('short')).toBe('short');
    expect(buildStatusLine(2, 1)).toBe('**Status:** ✅ 2 successful | ❌ 1 failed');
    expect(isErrorOutput('# ❌ Error')).toBe(true);
    expect(isErrorOutput('# 🧭 Topic')).toBe(false);
  });
});

describe('formatTopicResult', () => {
  it('lists failures after an empty post list', () => {
    const text = formatTopicResult({
      topic: 'Science',
      kind: 'new',
      subreddits: ['science', 'space'],
      posts: [],
      failures: [{ subreddit: 'space', code: 'TIMEOUT', message: 'r/space timed out after 10ms', retryable: true }],
    });

    expect(text).toBe(
      '# 🧭 Topic: Science (new)\n\n' +
        '**Status:** ✅ 1 successful | ❌ 1 failed | 📚 2 subreddits queried\n' +
        '**Posts:** 0 from 0 subreddits (deduplicated, sorted by score then recency)\n\n' +
        '---\n\n' +
        '_No posts found._\n\n' +
        '---\n\n' +
        '## ⚠️ Failed Subreddits\n\n' +
        '- **r/space**: TIMEOUT (r/space timed out after 10ms)'
    );
  });

  it('separates posts with rules', () => {
    const text = formatTopicResult({
      topic: 'Science',
      kind: 'hot',
      subreddits: ['science'],
      posts: [makePost({ id: 'a', subreddit: 'science' }), makePost({ id: 'b', subreddit: 'science' })],
      failures: [],
    });

    expect(text.match(/^### \d\. /gm)).toEqual(['### 1. ', '### 2. ']);
    expect(text).toContain('\n---\n\n### 2. [r/science] Post b');
    expect(text).not.toContain('Failed Subreddits');
  });
});

describe('formatComments', () => {
  it('indents replies and marks the OP', () => {
    expect(formatComments([{ author: 'a', body: 'l1\nl2', score: 3, depth: 1, isOP: true }])).toBe(
      '  - **u/a** **[OP]** _(+3)_\n    l1\n    l2\n\n'
    );
  });
});

describe('formatSubredditInfo', () => {
  it('fills in blanks', () => {
    expect(
      formatSubredditInfo({
        name: 'rust',
        title: 'Rust',
        description: '',
        subscribers: 1234567,
        createdUtc: 0,
        over18: false,
        type: 'public',
        url: '',
      })
    ).toBe(
      [
        '# r/rust',
        '',
        '**Title:** Rust',
        '**Subscribers:** 1,234,567',
        '**Created:** unknown',
        '**NSFW:** No',
        '**Type:** public',
        '',
        '**Description:** No description available',
      ].join('\n')
    );
  });
});

describe('handleListTopics', () => {
  it('handles an empty mapping', () => {
    expect(handleListTopics(createTopicMapping([]))).toBe('# 🧭 Available Topics\n\n_No topics configured._');
  });
});
