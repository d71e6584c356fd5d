import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { FALLBACK_PREFIX, FALLBACK_SUFFIX, buildFallbackFragment, formatTurns, truncateCodePoints } from './fallback.js';
import type { Turn } from './types.js';

const turns: Turn[] = [
  { sequence: 1, userText: 'My name is Ada', assistantText: 'Nice to meet you, Ada' },
  { sequence: 2, userText: 'I like tea', assistantText: 'Noted' },
];

describe('formatTurns', () => {
  it('renders each turn as a User/Assistant block', () => {
    assert.strictEqual(
      formatTurns(turns),
      'User: My name is Ada\nAssistant: Nice to meet you, Ada\n\nUser: I like tea\nAssistant: Noted\n\n'
    );
  });

  it('renders nothing for no turns', () => {
    assert.strictEqual(formatTurns([]), '');
  });
});

describe('truncateCodePoints', () => {
  it('counts code points rather than UTF-16 units', () => {
    assert.strictEqual(truncateCodePoints('ab\u{1F600}cd', 3), 'ab\u{1F600}');
  });

  it('returns short text unchanged', () => {
    assert.strictEqual(truncateCodePoints('abc', 10), 'abc');
  });
});

describe('buildFallbackFragment', () => {
  it('wraps the full dialogue when it fits the preview', () => {
    assert.strictEqual(
      buildFallbackFragment(turns, 200),
      `${FALLBACK_PREFIX}${formatTurns(turns)}${FALLBACK_SUFFIX}`
    );
  });

  it('cuts the dialogue at the preview length', () => {
    assert.strictEqual(
      buildFallbackFragment(turns, 12),
      'Previous conversation included discussion about: User: My nam...'
    );
  });

  it('does not split a character outside the basic plane', () => {
    const emoji: Turn[] = [{ sequence: 1, userText: 'xxxxx\u{1F600}', assistantText: 'ok' }];
    assert.strictEqual(
      buildFallbackFragment(emoji, 12),
      `${FALLBACK_PREFIX}User: xxxxx\u{1F600}${FALLBACK_SUFFIX}`
    );
    assert.strictEqual(
      buildFallbackFragment(emoji, 11),
      `${FALLBACK_PREFIX}User: xxxxx${FALLBACK_SUFFIX}`
    );
  });

  it('is deterministic', () => {
    assert.strictEqual(buildFallbackFragment(turns, 30), buildFallbackFragment(turns, 30));
  });

  it('never exceeds prefix + preview + suffix', () => {
    const long: Turn[] = [{ sequence: 7, userText: 'q'.repeat(1000), assistantText: 'r'.repeat(1000) }];
    const fragment = buildFallbackFragment(long, 200);
    assert.strictEqual(fragment.length, FALLBACK_PREFIX.length + 200 + FALLBACK_SUFFIX.length);
  });
});
