/**
 * CORE: Interpolation Engine Tests
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import path from 'path';
import os from 'os';
import fs from 'fs-extra';
import { formatInterpolationIssues, hasIssues, interpolate } from './interpolate';
import { extractVariables } from './tokenizer';
import { fileVariable, valueVariable } from './variables';
import { DEFAULT_DELIMITERS, type VariableNamespace } from './types';

describe('interpolate', () => {
    const root = path.join(os.tmpdir(), `pwb-interp-test-${Date.now()}`);

    before(async () => {
        await fs.outputFile(path.join(root, 'src', 'main.py'), 'def main():\n    pass\n');
    });

    after(async () => {
        await fs.remove(root).catch(() => {});
    });

    it('substitutes a mapped value', () => {
        const result = interpolate('Hello {name}', { name: valueVariable('World') }, root);
        assert.strictEqual(result.text, 'Hello World');
        assert.deepStrictEqual([...result.substituted], ['name']);
        assert.strictEqual(result.unmapped.size, 0);
        assert.strictEqual(result.errors.size, 0);
    });

    it('leaves unmapped placeholders visible', () => {
        const result = interpolate('Hi {name}, {missing}', { name: valueVariable('Bob') }, root);
        assert.strictEqual(result.text, 'Hi Bob, {missing}');
        assert.deepStrictEqual([...result.unmapped], ['missing']);
    });

    it('keeps the raw token when a file cannot be found', () => {
        const result = interpolate('{code}', { code: fileVariable('no/such/file.txt') }, root);
        assert.strictEqual(result.text, '{code}');
        assert.strictEqual(result.errors.get('code')?.kind, 'FileNotFound');
        assert.strictEqual(result.substituted.size, 0);
        assert.strictEqual(result.unmapped.size, 0);
    });

    it('inlines file contents at every occurrence', () => {
        const result = interpolate('A:\n{code}\nB:\n{code}', { code: fileVariable('src/main.py') }, root);
        assert.strictEqual(result.text, 'A:\ndef main():\n    pass\n\nB:\ndef main():\n    pass\n');
    });

    it('does not expand placeholders inside substituted values', () => {
        const namespace: VariableNamespace = {
            outer: valueVariable('see {inner}'),
            inner: valueVariable('SECRET'),
        };
        const result = interpolate('{outer}', namespace, root);
        assert.strictEqual(result.text, 'see {inner}');
        assert.deepStrictEqual([...result.substituted], ['outer']);
    });

    it('does not touch tokens that appear only inside values', () => {
        const result = interpolate('{a}{b}', { a: valueVariable('{b}'), b: valueVariable('x') }, root);
        assert.strictEqual(result.text, '{b}x');
    });

    it('returns placeholder-free templates unchanged', () => {
        const template = 'No placeholders here: { not one } {}';
        const result = interpolate(template, { x: valueVariable('y') }, root);
        assert.strictEqual(result.text, template);
        assert.strictEqual(result.unmapped.size, 0);
        assert.strictEqual(result.errors.size, 0);
        assert.strictEqual(hasIssues(result), false);
    });

    it('returns an empty result for an empty template', () => {
        const result = interpolate('', {}, root);
        assert.strictEqual(result.text, '');
        assert.strictEqual(hasIssues(result), false);
    });

    it('accepts empty values as substitutions', () => {
        const result = interpolate('[{blank}]', { blank: valueVariable('') }, root);
        assert.strictEqual(result.text, '[]');
        assert.deepStrictEqual([...result.substituted], ['blank']);
    });

    it('places every identifier in exactly one outcome', () => {
        const template = '{ok} {gone} {broken} {ok} {gone}';
        const namespace: VariableNamespace = {
            ok: valueVariable('fine'),
            broken: fileVariable('missing.txt'),
        };
        const result = interpolate(template, namespace, root);

        for (const name of extractVariables(template, DEFAULT_DELIMITERS)) {
            const hits = [result.substituted.has(name), result.unmapped.has(name), result.errors.has(name)].filter(Boolean);
            assert.strictEqual(hits.length, 1, name);
        }
        assert.strictEqual(result.text, 'fine {gone} {broken} fine {gone}');
    });

    it('honors custom delimiters', () => {
        const result = interpolate('Dear <<who>>, {who}', { who: valueVariable('Ada') }, root, {
            delimiters: { start: '<<', end: '>>' },
        });
        assert.strictEqual(result.text, 'Dear Ada, {who}');
    });

    it('does not treat inherited object keys as mapped', () => {
        const result = interpolate('{constructor}', {}, root);
        assert.deepStrictEqual([...result.unmapped], ['constructor']);
    });
});

describe('formatInterpolationIssues', () => {
    it('lists unmapped names and errors', () => {
        const result = interpolate('{a} {b}', { b: fileVariable('nope.txt') }, '/tmp/pwb-none');
        assert.deepStrictEqual(formatInterpolationIssues(result), [
            'Unmapped variables: a',
            `b: FileNotFound (File not found: ${path.resolve('/tmp/pwb-none', 'nope.txt')})`,
        ]);
    });
});
