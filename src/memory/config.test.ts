import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { MAX_TIMER_DELAY_MS, MemoryConfigurationError, normalizeMemoryConfig } from './config.js';

describe('normalizeMemoryConfig', () => {
  it('fills defaults', () => {
    assert.deepStrictEqual(normalizeMemoryConfig(), {
      maxPairs: 5,
      evictionBatchSize: 2,
      summarySeparator: '\n\n',
      fallbackPreviewLength: 200,
      summarizerTimeoutMs: 30000,
      maxSummaryLength: undefined,
    });
  });

  it('caps the default batch size at maxPairs', () => {
    const config = normalizeMemoryConfig({ maxPairs: 1 });
    assert.strictEqual(config.evictionBatchSize, 1);
  });

  it('accepts evictionBatchSize equal to maxPairs', () => {
    const config = normalizeMemoryConfig({ maxPairs: 3, evictionBatchSize: 3 });
    assert.strictEqual(config.evictionBatchSize, 3);
  });

  it('keeps explicit values', () => {
    const config = normalizeMemoryConfig({
      maxPairs: 8,
      evictionBatchSize: 4,
      summarySeparator: '\n',
      fallbackPreviewLength: 80,
      summarizerTimeoutMs: 500,
      maxSummaryLength: 4000,
    });
    assert.deepStrictEqual(config, {
      maxPairs: 8,
      evictionBatchSize: 4,
      summarySeparator: '\n',
      fallbackPreviewLength: 80,
      summarizerTimeoutMs: 500,
      maxSummaryLength: 4000,
    });
  });

  it('rejects non-positive maxPairs', () => {
    assert.throws(
      () => normalizeMemoryConfig({ maxPairs: 0 }),
      (err: unknown) => {
        assert.ok(err instanceof MemoryConfigurationError);
        assert.ok(err.issues.some((issue) => issue.startsWith('maxPairs:')));
        return true;
      }
    );
  });

  it('rejects fractional maxPairs', () => {
    assert.throws(() => normalizeMemoryConfig({ maxPairs: 2.5 }), MemoryConfigurationError);
  });

  it('rejects evictionBatchSize of zero', () => {
    assert.throws(
      () => normalizeMemoryConfig({ maxPairs: 3, evictionBatchSize: 0 }),
      MemoryConfigurationError
    );
  });

  it('rejects evictionBatchSize above maxPairs', () => {
    assert.throws(
      () => normalizeMemoryConfig({ maxPairs: 3, evictionBatchSize: 4 }),
      (err: unknown) => {
        assert.ok(err instanceof MemoryConfigurationError);
        assert.deepStrictEqual(err.issues, [
          'evictionBatchSize: evictionBatchSize must not exceed maxPairs',
        ]);
        assert.strictEqual(
          err.message,
          'Invalid memory configuration: evictionBatchSize: evictionBatchSize must not exceed maxPairs'
        );
        return true;
      }
    );
  });

  it('rejects a non-positive summarizer timeout', () => {
    assert.throws(
      () => normalizeMemoryConfig({ summarizerTimeoutMs: -1 }),
      MemoryConfigurationError
    );
  });

  it('rejects a summarizer timeout beyond the timer range', () => {
    assert.throws(
      () => normalizeMemoryConfig({ summarizerTimeoutMs: 3_000_000_000 }),
      /summarizerTimeoutMs: /
    );
  });

  it('accepts the largest timer delay', () => {
    const config = normalizeMemoryConfig({ summarizerTimeoutMs: MAX_TIMER_DELAY_MS });
    assert.strictEqual(config.summarizerTimeoutMs, 2_147_483_647);
  });
});
