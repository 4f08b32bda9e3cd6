/**
 * SHELL: Store Tests
 * Defaults for missing files, validation on read and write, atomic update.
 */

import { describe, it, after } from 'node:test';
import assert from 'node:assert';
import path from 'path';
import os from 'os';
import fs from 'fs-extra';
import { YamlStore } from './store';
import { WorkspaceConfigSchema } from './config-schema';
import { ConfigError } from '../core/errors';

describe('YamlStore', () => {
    const tmpDir = path.join(os.tmpdir(), `pwb-store-test-${Date.now()}`);

    after(async () => {
        await fs.remove(tmpDir).catch(() => {});
    });

    it('read() fills schema defaults for a missing file', async () => {
        const store = new YamlStore(path.join(tmpDir, 'missing', 'workspace.yaml'), WorkspaceConfigSchema);
        const config = await store.read();

        assert.strictEqual(config.name, 'My Workspace');
        assert.strictEqual(config.paths.prompts, 'prompts');
        assert.deepStrictEqual(config.template.delimiters, { start: '{', end: '}' });
        assert.deepStrictEqual(config.template.naming.roles, ['system', 'user']);
        assert.strictEqual(await store.exists(), false);
    });

    it('read() turns variable shorthand into value specs', async () => {
        const file = path.join(tmpDir, 'shorthand', 'workspace.yaml');
        await fs.outputFile(file, [
            'name: Demo',
            'variables:',
            '  name: World',
            '  code:',
            '    type: file',
            '    path: src/main.ts',
            '',
        ].join('\n'));

        const config = await new YamlStore(file, WorkspaceConfigSchema).read();
        assert.deepStrictEqual(config.variables, {
            name: { type: 'value', content: 'World' },
            code: { type: 'file', path: 'src/main.ts' },
        });
    });

    it('parse() rejects malformed YAML with a ConfigError', () => {
        const store = new YamlStore(path.join(tmpDir, 'bad.yaml'), WorkspaceConfigSchema);
        assert.throws(
            () => store.parse('name: [unclosed'),
            (err: unknown) => err instanceof ConfigError && err.message.startsWith('Invalid YAML in ')
        );
    });

    it('parse() lists schema issues by path', () => {
        const store = new YamlStore(path.join(tmpDir, 'bad.yaml'), WorkspaceConfigSchema);
        assert.throws(
            () => store.parse('defaults:\n  temperature: 5\n'),
            (err: unknown) => err instanceof ConfigError
                && err.issues.length === 1
                && err.issues[0].startsWith('defaults.temperature: ')
        );
    });

    it('write() then read() returns the same config and leaves no .tmp', async () => {
        const file = path.join(tmpDir, 'roundtrip', 'workspace.yaml');
        const store = new YamlStore(file, WorkspaceConfigSchema);
        const config = WorkspaceConfigSchema.parse({ name: 'Roundtrip', defaults: { model: 'gpt-4o-mini' } });

        await store.write(config);

        assert.deepStrictEqual(await store.read(), config);
        assert.strictEqual(await fs.pathExists(file + '.tmp'), false);
    });

    it('update() applies the updater under the lock and persists it', async () => {
        const file = path.join(tmpDir, 'update', 'workspace.yaml');
        const store = new YamlStore(file, WorkspaceConfigSchema);
        await store.write(WorkspaceConfigSchema.parse({ name: 'Before' }));

        const next = await store.update(config => ({ ...config, name: 'After' }));

        assert.strictEqual(next.name, 'After');
        assert.strictEqual((await store.read()).name, 'After');
    });

    it('concurrent updates are serialized', async () => {
        const file = path.join(tmpDir, 'concurrent', 'workspace.yaml');
        const store = new YamlStore(file, WorkspaceConfigSchema);
        await store.write(WorkspaceConfigSchema.parse({ name: 'n' }));

        await Promise.all([
            store.update(config => ({ ...config, name: config.name + 'a' })),
            store.update(config => ({ ...config, name: config.name + 'b' })),
        ]);

        assert.strictEqual((await store.read()).name.length, 3);
    });
});
