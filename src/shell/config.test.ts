/**
 * SHELL: Configuration Tests
 */

import { describe, it, after } from 'node:test';
import assert from 'node:assert';
import path from 'path';
import os from 'os';
import fs from 'fs-extra';
import {
    applyEnvOverrides,
    ConfigLoader,
    detectProjectType,
    isWorkspacePreset,
    validateUserConfig,
    validateWorkspaceConfig,
    withProvider,
    workspacePreset,
} from './config';
import { UserConfigSchema, WorkspaceConfigSchema } from './config-schema';
import { ConfigError } from '../core/errors';

describe('ConfigLoader', () => {
    const tmpDir = path.join(os.tmpdir(), `pwb-config-test-${Date.now()}`);
    const env = { PWB_HOME: path.join(tmpDir, 'home') };

    after(async () => {
        await fs.remove(tmpDir).catch(() => {});
    });

    it('loadWorkspace() throws ConfigError when no workspace.yaml exists', async () => {
        const loader = new ConfigLoader(path.join(tmpDir, 'empty'), env);
        await assert.rejects(() => loader.loadWorkspace(), ConfigError);
    });

    it('saveWorkspace() writes under .prompt-workbench and loads back', async () => {
        const root = path.join(tmpDir, 'ws');
        const loader = new ConfigLoader(root, env);
        await loader.saveWorkspace(workspacePreset('nodejs', 'Demo'));

        assert.ok(await fs.pathExists(path.join(root, '.prompt-workbench', 'workspace.yaml')));
        const config = await loader.loadWorkspace();
        assert.strictEqual(config.name, 'Demo');
        assert.strictEqual(config.paths.prompts, 'src/prompts');
        assert.strictEqual(config.template.naming.pattern, '{role}-{name}.txt');
    });

    it('loadUser() returns defaults without a file and applies env overrides', async () => {
        const loader = new ConfigLoader(path.join(tmpDir, 'ws'), {
            ...env,
            OPENAI_API_KEY: 'test-secret',
            PWB_MODEL: 'gpt-4o-mini',
        });
        const user = await loader.loadUser();

        assert.strictEqual(user.provider, 'openai');
        assert.strictEqual(user.apiKey, 'test-secret');
        assert.strictEqual(user.defaults.model, 'gpt-4o-mini');

        const stored = await loader.loadStoredUser();
        assert.strictEqual(stored.apiKey, undefined);
    });

    it('updateUser() persists to PWB_HOME', async () => {
        const loader = new ConfigLoader(path.join(tmpDir, 'ws'), env);
        await loader.updateUser(config => withProvider(config, 'ollama'));

        assert.strictEqual(loader.userConfigPath(), path.join(tmpDir, 'home', 'config.yaml'));
        const user = await loader.loadStoredUser();
        assert.strictEqual(user.provider, 'ollama');
        assert.strictEqual(user.baseUrl, 'http://localhost:11434/v1');
    });

    it('defaultParams() orders user before workspace', async () => {
        const root = path.join(tmpDir, 'params');
        const loader = new ConfigLoader(root, { PWB_HOME: path.join(tmpDir, 'params-home') });
        await loader.saveWorkspace(WorkspaceConfigSchema.parse({ defaults: { model: 'ws-model' } }));
        await loader.updateUser(config => ({ ...config, defaults: { model: 'user-model', temperature: 0.1 } }));

        const [user, workspace] = await loader.defaultParams();
        assert.deepStrictEqual(user, { provider: 'openai', model: 'user-model', temperature: 0.1 });
        assert.deepStrictEqual(workspace, { model: 'ws-model' });
    });
});

describe('applyEnvOverrides', () => {
    it('leaves the input untouched', () => {
        const config = UserConfigSchema.parse({});
        const next = applyEnvOverrides(config, { OPENAI_BASE_URL: 'http://localhost:1234/v1', PWB_MODEL: 'local' });

        assert.strictEqual(next.baseUrl, 'http://localhost:1234/v1');
        assert.strictEqual(next.defaults.model, 'local');
        assert.strictEqual(config.baseUrl, undefined);
        assert.strictEqual(config.defaults.model, undefined);
    });
});

describe('validateUserConfig', () => {
    it('requires an API key for openai', () => {
        const issues = validateUserConfig(UserConfigSchema.parse({}));
        assert.deepStrictEqual(issues, ["API key or base URL required for provider 'openai'"]);
    });

    it('accepts a keyless local provider', () => {
        const config = withProvider(UserConfigSchema.parse({}), 'ollama');
        assert.deepStrictEqual(validateUserConfig(config), []);
    });

    it('flags unknown providers without a base URL and without models', () => {
        const issues = validateUserConfig(UserConfigSchema.parse({ provider: 'acme' }));
        assert.deepStrictEqual(issues, [
            "Unknown provider 'acme' needs a baseUrl",
            'No models configured',
        ]);
    });
});

describe('validateWorkspaceConfig', () => {
    const root = path.join(os.tmpdir(), `pwb-config-validate-${Date.now()}`);

    after(async () => {
        await fs.remove(root).catch(() => {});
    });

    it('reports the missing prompt dir, bad pattern and missing file variables', async () => {
        const config = WorkspaceConfigSchema.parse({
            template: { naming: { pattern: '{name}.st' } },
            variables: { code: { type: 'file', path: 'src/missing.ts' } },
        });

        const issues = await validateWorkspaceConfig(root, config);
        assert.deepStrictEqual(issues, [
            'Prompt directory not found: prompts',
            'Naming pattern must contain {role} and {name}: {name}.st',
            "Variable 'code': file not found: src/missing.ts",
        ]);
    });

    it('passes a complete workspace', async () => {
        await fs.ensureDir(path.join(root, 'prompts'));
        await fs.outputFile(path.join(root, 'src', 'main.ts'), 'export {};\n');
        const config = WorkspaceConfigSchema.parse({
            variables: { code: { type: 'file', path: 'src/main.ts' } },
        });

        assert.deepStrictEqual(await validateWorkspaceConfig(root, config), []);
    });
});

describe('withProvider', () => {
    it('replaces models when switching provider', () => {
        const config = UserConfigSchema.parse({ models: ['gpt-4o'] });
        const next = withProvider(config, 'openrouter');

        assert.strictEqual(next.provider, 'openrouter');
        assert.strictEqual(next.baseUrl, 'https://openrouter.ai/api/v1');
        assert.deepStrictEqual(next.models, ['anthropic/claude-3.5-sonnet', 'openai/gpt-4o']);
    });

    it('rejects unknown presets', () => {
        assert.throws(() => withProvider(UserConfigSchema.parse({}), 'acme'), ConfigError);
    });
});

describe('presets', () => {
    const root = path.join(os.tmpdir(), `pwb-config-detect-${Date.now()}`);

    after(async () => {
        await fs.remove(root).catch(() => {});
    });

    it('recognises preset names', () => {
        assert.strictEqual(isWorkspacePreset('springboot'), true);
        assert.strictEqual(isWorkspacePreset('toString'), false);
    });

    it('detectProjectType() looks at marker files', async () => {
        await fs.ensureDir(root);
        assert.strictEqual(await detectProjectType(root), 'custom');

        await fs.writeFile(path.join(root, 'requirements.txt'), '');
        assert.strictEqual(await detectProjectType(root), 'python');

        await fs.writeFile(path.join(root, 'pom.xml'), '<project/>');
        assert.strictEqual(await detectProjectType(root), 'springboot');
    });

    it('springboot keeps .st templates', () => {
        const config = workspacePreset('springboot');
        assert.strictEqual(config.name, 'SpringBoot Project');
        assert.strictEqual(config.template.naming.pattern, '{role}-{name}.st');
    });
});
