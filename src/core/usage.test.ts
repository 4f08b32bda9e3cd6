import { describe, it } from 'node:test';
import assert from 'node:assert';
import { estimateCost, estimateTokens, estimateUsage } from './usage';

describe('estimateTokens', () => {
    it('uses four characters per token, rounded down', () => {
        assert.strictEqual(estimateTokens(''), 0);
        assert.strictEqual(estimateTokens('abc'), 0);
        assert.strictEqual(estimateTokens('abcdefghi'), 2);
    });

    it('sums prompt and completion', () => {
        assert.deepStrictEqual(estimateUsage('a'.repeat(40), 'b'.repeat(8)), {
            promptTokens: 10,
            completionTokens: 2,
            totalTokens: 12,
        });
    });
});

describe('estimateCost', () => {
    it('prices known models per 1K tokens', () => {
        assert.strictEqual(estimateCost('gpt-4o', 1000, 1000), '$0.0125');
        assert.strictEqual(estimateCost('gpt-3.5-turbo', 2000, 0), '$0.0010');
    });

    it('returns Unknown for unpriced models', () => {
        assert.strictEqual(estimateCost('llama3', 1000, 1000), 'Unknown');
        assert.strictEqual(estimateCost('constructor', 1, 1), 'Unknown');
    });
});
