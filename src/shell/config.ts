/**
 * SHELL: Configuration
 * Workspace config at <root>/.prompt-workbench/workspace.yaml,
 * user config at ~/.prompt-workbench/config.yaml (PWB_HOME overrides).
 */

import fs from 'fs-extra';
import path from 'path';
import { YamlStore } from './store';
import {
    UserConfigSchema,
    WorkspaceConfigSchema,
    type UserConfig,
    type WorkspaceConfig,
} from './config-schema';
import { getProviderPreset } from './providers';
import { getUserConfigPath, getWorkspaceConfigPath, resolveWorkspacePath } from '../core/paths';
import { ConfigError } from '../core/errors';
import { validateDelimiters } from '../core/tokenizer';
import { compileNamingPattern } from '../core/discovery';
import { resolveVariablePath } from '../core/variables';
import type { ModelParams } from '../core/types';

export type WorkspacePresetName = 'springboot' | 'python' | 'nodejs' | 'custom';

const WORKSPACE_PRESETS: Record<WorkspacePresetName, { name: string; prompts: string; vars: string; chains: string; ext: string }> = {
    springboot: {
        name: 'SpringBoot Project',
        prompts: 'src/main/resources/prompts',
        vars: 'src/test/resources/prompts/vars',
        chains: 'src/test/resources/prompts/chains',
        ext: '.st',
    },
    python: { name: 'Python Project', prompts: 'app/prompts', vars: 'app/prompts/vars', chains: 'app/prompts/chains', ext: '.txt' },
    nodejs: { name: 'Node.js Project', prompts: 'src/prompts', vars: 'src/prompts/vars', chains: 'src/prompts/chains', ext: '.txt' },
    custom: { name: 'Custom Project', prompts: 'prompts', vars: 'prompts/vars', chains: 'chains', ext: '.st' },
};

export const WORKSPACE_PRESET_NAMES: readonly WorkspacePresetName[] = ['springboot', 'python', 'nodejs', 'custom'];

export function isWorkspacePreset(name: string): name is WorkspacePresetName {
    return Object.prototype.hasOwnProperty.call(WORKSPACE_PRESETS, name);
}

export function workspacePreset(preset: WorkspacePresetName, name?: string): WorkspaceConfig {
    const p = WORKSPACE_PRESETS[preset];
    return WorkspaceConfigSchema.parse({
        name: name ?? p.name,
        paths: { prompts: p.prompts, vars: p.vars, chains: p.chains },
        template: { naming: { pattern: `{role}-{name}${p.ext}` } },
    });
}

/** Guess a preset from the files already in the project. */
export async function detectProjectType(root: string): Promise<WorkspacePresetName> {
    if (await fs.pathExists(path.join(root, 'pom.xml')) || await fs.pathExists(path.join(root, 'build.gradle'))) {
        return 'springboot';
    }
    if (await fs.pathExists(path.join(root, 'package.json'))) return 'nodejs';
    if (await fs.pathExists(path.join(root, 'pyproject.toml')) || await fs.pathExists(path.join(root, 'requirements.txt'))) {
        return 'python';
    }
    return 'custom';
}

export class ConfigLoader {
    private workspace: YamlStore<WorkspaceConfig>;
    private user: YamlStore<UserConfig>;
    private env: NodeJS.ProcessEnv;

    constructor(root: string, env: NodeJS.ProcessEnv = process.env) {
        this.env = env;
        this.workspace = new YamlStore(getWorkspaceConfigPath(root), WorkspaceConfigSchema);
        this.user = new YamlStore(getUserConfigPath(env), UserConfigSchema);
    }

    async loadWorkspace(): Promise<WorkspaceConfig> {
        if (!(await this.workspace.exists())) {
            throw new ConfigError(`Workspace config not found: ${this.workspace.getPath()}`);
        }
        return this.workspace.read();
    }

    async saveWorkspace(config: WorkspaceConfig): Promise<void> {
        await this.workspace.write(config);
    }

    /** Missing file yields defaults; env overrides are applied on top and never saved. */
    async loadUser(): Promise<UserConfig> {
        return applyEnvOverrides(await this.user.read(), this.env);
    }

    async loadStoredUser(): Promise<UserConfig> {
        return this.user.read();
    }

    async updateUser(updater: (config: UserConfig) => UserConfig): Promise<UserConfig> {
        return this.user.update(updater);
    }

    userConfigPath(): string {
        return this.user.getPath();
    }

    /** user < workspace */
    async defaultParams(): Promise<ModelParams[]> {
        const [user, workspace] = await Promise.all([this.loadUser(), this.loadWorkspace()]);
        return [{ provider: user.provider, ...user.defaults }, workspace.defaults];
    }
}

export function applyEnvOverrides(config: UserConfig, env: NodeJS.ProcessEnv): UserConfig {
    const next: UserConfig = { ...config, defaults: { ...config.defaults } };
    if (env.OPENAI_API_KEY) next.apiKey = env.OPENAI_API_KEY;
    if (env.OPENAI_BASE_URL) next.baseUrl = env.OPENAI_BASE_URL;
    if (env.PWB_MODEL) next.defaults.model = env.PWB_MODEL;
    return next;
}

export function validateUserConfig(config: UserConfig): string[] {
    const issues: string[] = [];
    if (!config.provider) issues.push('Provider is required');

    const preset = getProviderPreset(config.provider);
    if (preset?.apiKeyRequired && !config.apiKey && !config.baseUrl) {
        issues.push(`API key or base URL required for provider '${config.provider}'`);
    }
    if (!preset && !config.baseUrl) {
        issues.push(`Unknown provider '${config.provider}' needs a baseUrl`);
    }
    if (config.models.length === 0 && !preset?.defaultModels.length) {
        issues.push('No models configured');
    }
    return issues;
}

export async function validateWorkspaceConfig(root: string, config: WorkspaceConfig): Promise<string[]> {
    const issues: string[] = [];

    const promptDir = resolveWorkspacePath(root, config.paths.prompts);
    if (!(await fs.pathExists(promptDir))) {
        issues.push(`Prompt directory not found: ${config.paths.prompts}`);
    }

    issues.push(...validateDelimiters(config.template.delimiters));

    try {
        compileNamingPattern(config.template.naming.pattern);
    } catch (err) {
        issues.push(err instanceof Error ? err.message : String(err));
    }

    for (const [name, spec] of Object.entries(config.variables)) {
        if (spec.type === 'file' && !(await fs.pathExists(resolveVariablePath(spec, root)))) {
            issues.push(`Variable '${name}': file not found: ${spec.path}`);
        }
    }
    return issues;
}

/** Apply a provider preset to a user config, keeping models the user already listed. */
export function withProvider(config: UserConfig, provider: string): UserConfig {
    const preset = getProviderPreset(provider);
    if (!preset) {
        throw new ConfigError(`Unknown provider preset: ${provider}`);
    }
    return {
        ...config,
        provider,
        baseUrl: preset.baseUrl,
        models: config.models.length > 0 && config.provider === provider ? config.models : [...preset.defaultModels],
    };
}
