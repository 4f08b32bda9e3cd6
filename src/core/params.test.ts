import { describe, it } from 'node:test';
import assert from 'node:assert';
import { FALLBACK_PARAMS, resolveModelParams, validateModelParams } from './params';

describe('resolveModelParams', () => {
    it('falls back to built-in defaults', () => {
        assert.deepStrictEqual(resolveModelParams(), FALLBACK_PARAMS);
    });

    it('lets the narrowest layer win per field', () => {
        const resolved = resolveModelParams(
            { model: 'user-model', temperature: 0.2, maxTokens: 500, provider: 'ollama' },
            undefined,
            { model: 'chain-model' },
            { temperature: 0 }
        );
        assert.deepStrictEqual(resolved, { provider: 'ollama', model: 'chain-model', temperature: 0, maxTokens: 500 });
    });
});

describe('validateModelParams', () => {
    it('accepts the boundaries', () => {
        assert.deepStrictEqual(validateModelParams({ temperature: 0, maxTokens: 1 }), []);
        assert.deepStrictEqual(validateModelParams({ temperature: 2 }), []);
    });

    it('rejects out-of-range values', () => {
        assert.deepStrictEqual(validateModelParams({ temperature: -0.1, maxTokens: 0, model: ' ' }), [
            'temperature must be between 0 and 2 (got -0.1)',
            'maxTokens must be a positive integer (got 0)',
            'model must not be empty',
        ]);
    });
});
