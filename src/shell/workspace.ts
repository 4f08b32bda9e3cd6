/**
 * SHELL: Workspace
 * Ties config, prompt files, discovery, variables and chains to one root.
 *
 * Single prompts go through a two-state request: `prepare` interpolates and
 * collects issues without refusing anything, `execute` refuses a request
 * that still has issues.
 */

import fs from 'fs-extra';
import path from 'path';
import { ConfigLoader } from './config';
import { NamespaceSchema, type WorkspaceConfig } from './config-schema';
import { YamlStore } from './store';
import { listPromptFiles, loadPromptFile, savePromptFile } from './prompt-files';
import { listChains, loadChain } from './chain-files';
import { PromptNotReadyError } from '../core/errors';
import { compileNamingPattern, discover, ORPHAN_ROLE, type DiscoveryResult, type PromptGroup } from '../core/discovery';
import { formatInterpolationIssues, interpolate } from '../core/interpolate';
import { mergeNamespaces } from '../core/variables';
import { resolveModelParams } from '../core/params';
import { estimateCost, estimateUsage } from '../core/usage';
import { requireWorkspaceRoot } from '../core/resolver';
import { getPackageRoot, resolveWorkspacePath, toPosix } from '../core/paths';
import { runChain, type ChainDefinition, type ChainRun, type ChainRunOptions } from '../core/chain';
import {
    MESSAGE_ROLES,
    type ChatMessage,
    type CompleteFn,
    type Completion,
    type MessageRole,
    type ModelParams,
    type ResolvedModelParams,
    type TokenUsage,
    type VariableNamespace,
} from '../core/types';

export interface PreparedRequest {
    group: PromptGroup;
    messages: ChatMessage[];
    /** Non-empty means `execute` will refuse the request. */
    issues: string[];
    params: ResolvedModelParams;
}

export interface ExecutedRequest {
    prepared: PreparedRequest;
    result: Completion;
    usage: TokenUsage;
    cost: string;
}

export type WorkspaceChainOptions = Omit<ChainRunOptions, 'workspaceRoot' | 'delimiters' | 'defaults'> & {
    overrides?: ModelParams;
};

const SAMPLE_DIR = 'templates/sample';

export class Workspace {
    private constructor(
        public readonly root: string,
        public readonly config: WorkspaceConfig,
        private loader: ConfigLoader
    ) {}

    /** Walks up from `startDir` to the nearest workspace. */
    static async open(startDir: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): Promise<Workspace> {
        const root = requireWorkspaceRoot(startDir);
        const loader = new ConfigLoader(root, env);
        return new Workspace(root, await loader.loadWorkspace(), loader);
    }

    /**
     * Writes the config and creates the configured directories. Sample prompts,
     * variables and a chain are added only when the prompt directory is empty.
     */
    static async init(root: string, config: WorkspaceConfig, env: NodeJS.ProcessEnv = process.env): Promise<Workspace> {
        const loader = new ConfigLoader(root, env);
        await loader.saveWorkspace(config);

        const workspace = new Workspace(root, config, loader);
        const empty = (await listPromptFiles(workspace.promptDir)).length === 0;
        await fs.ensureDir(workspace.promptDir);
        await fs.ensureDir(workspace.varsDir);
        await fs.ensureDir(workspace.chainsDir);
        if (empty) await workspace.writeSamples();
        return workspace;
    }

    get promptDir(): string {
        return resolveWorkspacePath(this.root, this.config.paths.prompts);
    }

    get varsDir(): string {
        return resolveWorkspacePath(this.root, this.config.paths.vars);
    }

    get chainsDir(): string {
        return resolveWorkspacePath(this.root, this.config.paths.chains);
    }

    getConfigLoader(): ConfigLoader {
        return this.loader;
    }

    /** Vars files live under the prompt dir in most presets, so they are left out. */
    async listPromptFiles(): Promise<string[]> {
        const files = await listPromptFiles(this.promptDir);
        const varsPrefix = toPosix(path.relative(this.promptDir, this.varsDir));
        if (!varsPrefix || varsPrefix.startsWith('..')) return files;
        return files.filter(file => !file.startsWith(`${varsPrefix}/`));
    }

    async loadPromptFile(relative: string): Promise<string> {
        return loadPromptFile(this.promptDir, relative);
    }

    async savePromptFile(relative: string, content: string): Promise<string> {
        return savePromptFile(this.promptDir, relative, content);
    }

    async listVarFiles(): Promise<string[]> {
        const ext = this.config.template.naming.varsExtension;
        return (await listPromptFiles(this.varsDir)).filter(file => file.endsWith(ext));
    }

    /**
     * Groups prompt files by the naming pattern. When a vars directory exists,
     * groups without a vars file are orphans.
     */
    async discover(): Promise<DiscoveryResult> {
        const { naming } = this.config.template;
        const varFiles = (await fs.pathExists(this.varsDir)) ? await this.listVarFiles() : undefined;
        return discover(await this.listPromptFiles(), naming.pattern, {
            roles: naming.roles,
            varFiles,
            varExtension: naming.varsExtension,
        });
    }

    async findGroup(name: string): Promise<PromptGroup | undefined> {
        const { groups } = await this.discover();
        return groups.find(group => group.name === name);
    }

    varFilePath(groupName: string): string {
        return path.join(this.varsDir, `${groupName}${this.config.template.naming.varsExtension}`);
    }

    /** workspace variables < `<vars>/<group>.yaml` */
    async loadVariables(groupName: string): Promise<VariableNamespace> {
        const file = this.varFilePath(groupName);
        if (!(await fs.pathExists(file))) return { ...this.config.variables };
        const fileVars = await new YamlStore(file, NamespaceSchema).read();
        return mergeNamespaces(this.config.variables, fileVars);
    }

    /** Narrowest last: user < workspace < overrides. */
    async resolveParams(...overrides: Array<ModelParams | undefined>): Promise<ResolvedModelParams> {
        return resolveModelParams(...(await this.loader.defaultParams()), ...overrides);
    }

    /** Interpolates one template file against its group's variables. */
    async previewFile(relative: string, groupName?: string): Promise<{ text: string; issues: string[] }> {
        const template = await this.loadPromptFile(relative);
        const matched = compileNamingPattern(this.config.template.naming.pattern).match(path.basename(relative));
        const name = groupName ?? matched?.name ?? path.parse(relative).name;
        const result = interpolate(template, await this.loadVariables(name), this.root, {
            delimiters: this.config.template.delimiters,
        });
        return { text: result.text, issues: formatInterpolationIssues(result) };
    }

    private templateFiles(group: PromptGroup): Array<[MessageRole, string]> {
        const files: Array<[MessageRole, string]> = [];
        for (const role of MESSAGE_ROLES) {
            const file = group.roles[role];
            if (file !== undefined) files.push([role, file]);
        }
        // A lone orphan file is sent as the user message.
        const orphanFile = group.roles[ORPHAN_ROLE];
        if (files.length === 0 && orphanFile !== undefined) files.push(['user', orphanFile]);
        return files;
    }

    async prepare(group: PromptGroup, overrides?: ModelParams): Promise<PreparedRequest> {
        const namespace = await this.loadVariables(group.name);
        const messages: ChatMessage[] = [];
        const issues: string[] = [];

        const files = this.templateFiles(group);
        if (files.length === 0) {
            issues.push(`Group '${group.name}' has no system, user or assistant template`);
        }

        for (const [role, file] of files) {
            const result = interpolate(await this.loadPromptFile(file), namespace, this.root, {
                delimiters: this.config.template.delimiters,
            });
            messages.push({ role, content: result.text });
            issues.push(...formatInterpolationIssues(result).map(issue => `${role} (${file}): ${issue}`));
        }

        return { group, messages, issues, params: await this.resolveParams(overrides) };
    }

    async execute(prepared: PreparedRequest, complete: CompleteFn, signal?: AbortSignal): Promise<ExecutedRequest> {
        if (prepared.issues.length > 0) {
            throw new PromptNotReadyError(prepared.issues);
        }

        const result = await complete(prepared.messages, prepared.params, signal);
        const promptText = prepared.messages.map(message => message.content).join('\n');
        const usage = result.usage ?? estimateUsage(promptText, result.text);

        return {
            prepared,
            result,
            usage,
            cost: estimateCost(prepared.params.model, usage.promptTokens, usage.completionTokens),
        };
    }

    async listChains(): Promise<string[]> {
        return listChains(this.chainsDir);
    }

    async loadChain(name: string): Promise<ChainDefinition> {
        return loadChain(this.chainsDir, this.promptDir, name);
    }

    /**
     * Workspace variables are shared by every step, under the chain's own.
     * `overrides` apply on top of user and workspace defaults only, so chain
     * and step params still win.
     */
    async runChain(chain: ChainDefinition, options: WorkspaceChainOptions): Promise<ChainRun> {
        const { overrides, ...rest } = options;
        const defaults = [...(await this.loader.defaultParams()), ...(overrides ? [overrides] : [])];
        return runChain(
            { ...chain, variables: mergeNamespaces(this.config.variables, chain.variables) },
            { ...rest, workspaceRoot: this.root, delimiters: this.config.template.delimiters, defaults }
        );
    }

    private async writeSamples(): Promise<void> {
        const sampleRoot = path.join(getPackageRoot(), SAMPLE_DIR);
        if (!(await fs.pathExists(sampleRoot))) return;

        const { naming, delimiters } = this.config.template;
        const render = (text: string): string => text
            .split('{{').join(delimiters.start)
            .split('}}').join(delimiters.end);

        for (const role of ['system', 'user']) {
            const source = path.join(sampleRoot, 'prompts', `${role}.txt`);
            const target = naming.pattern
                .replace('{role}', role)
                .replace('{name}', 'summarize')
                .replace('{ext}', 'txt');
            await fs.outputFile(path.join(this.promptDir, target), render(await fs.readFile(source, 'utf-8')));
        }
        await fs.copy(
            path.join(sampleRoot, 'vars', 'summarize.yaml'),
            path.join(this.varsDir, `summarize${naming.varsExtension}`)
        );
        await fs.outputFile(
            path.join(this.chainsDir, 'review.yaml'),
            render(await fs.readFile(path.join(sampleRoot, 'chains', 'review.yaml'), 'utf-8'))
        );
    }
}
