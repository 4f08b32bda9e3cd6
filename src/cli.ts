#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import fs from 'fs-extra';
import path from 'path';
import inquirer from 'inquirer';
import { z } from 'zod';
import { Workspace } from './shell/workspace';
import {
    ConfigLoader,
    detectProjectType,
    isWorkspacePreset,
    validateUserConfig,
    validateWorkspaceConfig,
    withProvider,
    workspacePreset,
    WORKSPACE_PRESET_NAMES,
} from './shell/config';
import type { UserConfig } from './shell/config-schema';
import { LlmClient } from './shell/llm';
import { getProviderPreset, PROVIDER_PRESETS } from './shell/providers';
import { findWorkspaceRoot } from './core/resolver';
import { getPackageRoot } from './core/paths';
import { ConsoleLogger, type WorkbenchLogger } from './core/logger';
import { ConfigError, logError } from './core/errors';
import { describeVariable } from './core/variables';
import { groupRoles } from './core/discovery';
import { formatThinking } from './core/thinking';
import { describeState } from './core/state';
import { ChainEvents } from './core/events';
import type { ModelParams } from './core/types';

const PackageJsonSchema = z.object({ version: z.string() });
const pkg = PackageJsonSchema.parse(fs.readJsonSync(path.join(getPackageRoot(), 'package.json')));

const logger = new ConsoleLogger();
const program = new Command();

program
    .name('pwb')
    .description('Prompt template workbench: variables, auto-matching and chains')
    .version(pkg.version)
    .option('--root <dir>', 'Start the workspace search from this directory');

interface GlobalOptions {
    root?: string;
}

interface ModelOptions {
    provider?: string;
    model?: string;
    temperature?: number;
    maxTokens?: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

function startDir(): string {
    return path.resolve(program.opts<GlobalOptions>().root ?? process.cwd());
}

function parseNumber(value: string): number {
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
        throw new InvalidArgumentError('Not a number.');
    }
    return parsed;
}

function parseInteger(value: string): number {
    const parsed = parseNumber(value);
    if (!Number.isInteger(parsed)) {
        throw new InvalidArgumentError('Not an integer.');
    }
    return parsed;
}

function withModelOptions(command: Command): Command {
    return command
        .option('--provider <preset>', `Provider preset (${Object.keys(PROVIDER_PRESETS).join(', ')})`)
        .option('--model <id>', 'Model id')
        .option('--temperature <n>', 'Sampling temperature (0-2)', parseNumber)
        .option('--max-tokens <n>', 'Completion token limit', parseInteger);
}

function toOverrides(options: ModelOptions): ModelParams {
    const overrides: ModelParams = {};
    if (options.provider !== undefined) overrides.provider = options.provider;
    if (options.model !== undefined) overrides.model = options.model;
    if (options.temperature !== undefined) overrides.temperature = options.temperature;
    if (options.maxTokens !== undefined) overrides.maxTokens = options.maxTokens;
    return overrides;
}

/** A provider other than the configured one is reached through its preset URL. */
function createClient(user: UserConfig, log: WorkbenchLogger, provider?: string): LlmClient {
    if (!provider || provider === user.provider) {
        return new LlmClient({ apiKey: user.apiKey, baseUrl: user.baseUrl, logger: log });
    }
    const preset = getProviderPreset(provider);
    if (!preset) {
        throw new ConfigError(`Unknown provider preset: ${provider}`);
    }
    return new LlmClient({ apiKey: user.apiKey, baseUrl: preset.baseUrl, logger: log });
}

/** Errors stop at the command boundary: logged with their hint, exit code 1. */
function action<A extends unknown[]>(fn: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
    return async (...args: A) => {
        try {
            await fn(...args);
        } catch (err) {
            logError(logger, err);
            process.exitCode = 1;
        }
    };
}

function abortOnSigint(notice: string): { signal: AbortSignal; dispose: () => void } {
    const controller = new AbortController();
    const onSigint = (): void => {
        logger.warn(`\n${notice}`);
        controller.abort();
    };
    process.once('SIGINT', onSigint);
    return { signal: controller.signal, dispose: () => process.off('SIGINT', onSigint) };
}

// ═══════════════════════════════════════════════════════════════════════════
// INIT COMMAND
// ═══════════════════════════════════════════════════════════════════════════

program
    .command('init [name]')
    .description('Create .prompt-workbench/workspace.yaml in the current directory')
    .option('--preset <preset>', `Layout preset (${WORKSPACE_PRESET_NAMES.join(', ')}); detected when omitted`)
    .action(action(async (name: string | undefined, options: { preset?: string }) => {
        const root = startDir();
        if (findWorkspaceRoot(root) === root) {
            logger.info(`Already initialized: ${root}`);
            return;
        }

        const preset = options.preset ?? await detectProjectType(root);
        if (!isWorkspacePreset(preset)) {
            throw new ConfigError(`Unknown preset '${preset}'`, [`Choose one of: ${WORKSPACE_PRESET_NAMES.join(', ')}`]);
        }

        const workspace = await Workspace.init(root, workspacePreset(preset, name), process.env);
        logger.success(`✓ Initialized ${workspace.config.name} (${preset})`);
        logger.info(`  prompts: ${workspace.config.paths.prompts}`);
        logger.info(`  vars:    ${workspace.config.paths.vars}`);
        logger.info(`  chains:  ${workspace.config.paths.chains}`);
        logger.info(`\nNext: pwb groups`);
    }));

// ═══════════════════════════════════════════════════════════════════════════
// BROWSE COMMANDS
// ═══════════════════════════════════════════════════════════════════════════

program
    .command('prompts')
    .description('List prompt files')
    .action(action(async () => {
        const workspace = await Workspace.open(startDir());
        const files = await workspace.listPromptFiles();
        if (files.length === 0) {
            logger.info(`No prompt files in ${workspace.config.paths.prompts}`);
            return;
        }
        for (const file of files) logger.info(file);
    }));

program
    .command('groups')
    .description('Group prompt files by the naming pattern')
    .action(action(async () => {
        const workspace = await Workspace.open(startDir());
        const { groups, duplicates } = await workspace.discover();
        const roles = workspace.config.template.naming.roles;

        logger.info(`Pattern: ${workspace.config.template.naming.pattern}\n`);
        for (const group of groups.filter(g => !g.isOrphan)) {
            const { present, missing } = groupRoles(group, roles);
            const gaps = missing.length > 0 ? `  (missing: ${missing.join(', ')})` : '';
            logger.info(`${group.name}: ${present.join(', ')}${gaps}`);
        }

        const orphans = groups.filter(g => g.isOrphan);
        if (orphans.length > 0 && workspace.config.matching.warnOrphans) {
            logger.warn(`\n${orphans.length} orphan(s):`);
            for (const orphan of orphans) {
                logger.warn(`  ${Object.values(orphan.roles).join(', ')}${orphan.varFile ? '' : '  (no vars file)'}`);
            }
        }
        for (const dup of duplicates) {
            logger.warn(`Duplicate ${dup.role} for '${dup.name}': using ${dup.kept}, ignoring ${dup.ignored}`);
        }
    }));

program
    .command('vars [group]')
    .description('Show workspace variables, merged with a group vars file when given')
    .action(action(async (group: string | undefined) => {
        const workspace = await Workspace.open(startDir());
        const namespace = group ? await workspace.loadVariables(group) : workspace.config.variables;
        const names = Object.keys(namespace).sort();
        if (names.length === 0) {
            logger.info('No variables defined.');
            return;
        }
        for (const name of names) {
            logger.info(`${name}: ${describeVariable(namespace[name])}`);
        }
    }));

program
    .command('preview <file>')
    .description('Interpolate one prompt file and show what is left unresolved')
    .option('--group <name>', 'Use this group\'s vars file')
    .action(action(async (file: string, options: { group?: string }) => {
        const workspace = await Workspace.open(startDir());
        const { text, issues } = await workspace.previewFile(file, options.group);
        logger.info(text);
        for (const issue of issues) logger.warn(`⚠️  ${issue}`);
    }));

// ═══════════════════════════════════════════════════════════════════════════
// RUN COMMAND
// ═══════════════════════════════════════════════════════════════════════════

withModelOptions(
    program
        .command('run [group]')
        .description('Send one prompt group to the model')
).action(action(async (groupName: string | undefined, options: ModelOptions) => {
    const workspace = await Workspace.open(startDir());
    const { groups } = await workspace.discover();
    if (groups.length === 0) {
        throw new ConfigError(`No prompt files in ${workspace.config.paths.prompts}`);
    }

    let name = groupName;
    if (!name) {
        const answer = await inquirer.prompt<{ group: string }>({
            type: 'list',
            name: 'group',
            message: 'GROUP?',
            choices: groups.map(g => ({ name: g.isOrphan ? `${g.name} (orphan)` : g.name, value: g.name })),
        });
        name = answer.group;
    }

    const group = groups.find(g => g.name === name);
    if (!group) {
        throw new ConfigError(`Group '${name}' not found`, [`Known groups: ${groups.map(g => g.name).join(', ')}`]);
    }

    const prepared = await workspace.prepare(group, toOverrides(options));
    const user = await workspace.getConfigLoader().loadUser();
    const client = createClient(user, logger, prepared.params.provider);

    logger.info(`═══ ${group.name} → ${client.providerName()} ${prepared.params.model} ═══`);
    const { signal, dispose } = abortOnSigint('Cancelling request...');
    try {
        const executed = await workspace.execute(prepared, client.asCompleteFn(), signal);
        logger.info(formatThinking(executed.result.rawText));
        logger.info(`\n═══ ${executed.usage.promptTokens} in / ${executed.usage.completionTokens} out · ${executed.cost} ═══`);
    } finally {
        dispose();
    }
}));

// ═══════════════════════════════════════════════════════════════════════════
// CHAIN COMMAND
// ═══════════════════════════════════════════════════════════════════════════

withModelOptions(
    program
        .command('chain [name]')
        .description('Run a chain file from the chains directory')
).action(action(async (chainName: string | undefined, options: ModelOptions) => {
    const workspace = await Workspace.open(startDir());

    let name = chainName;
    if (!name) {
        const chains = await workspace.listChains();
        if (chains.length === 0) {
            throw new ConfigError(`No chains in ${workspace.config.paths.chains}`);
        }
        const answer = await inquirer.prompt<{ chain: string }>({
            type: 'list',
            name: 'chain',
            message: 'CHAIN?',
            choices: chains,
        });
        name = answer.chain;
    }

    const chain = await workspace.loadChain(name);
    const overrides = toOverrides(options);
    const user = await workspace.getConfigLoader().loadUser();
    const client = createClient(user, logger, overrides.provider ?? chain.params?.provider);

    const events = new ChainEvents();
    events.on('stepStarted', ({ stepIndex, stepName }) => {
        logger.info(`\n═══ Step ${stepIndex + 1}/${chain.steps.length}: ${stepName} ═══`);
    });
    events.on('stepCompleted', record => {
        logger.info(formatThinking(record.completion.rawText));
        logger.debug(`→ ${record.outputVar} (${record.params.model})`);
    });

    const { signal, dispose } = abortOnSigint('Cancelling after the current step...');
    try {
        const run = await workspace.runChain(chain, {
            complete: client.asCompleteFn(),
            overrides,
            events,
            signal,
            logger,
        });

        logger.info(`\n═══ ${describeState(run.state)} ═══`);
        if (run.state.status === 'failed') {
            logger.error(run.state.reason.message);
            process.exitCode = 1;
        }
    } finally {
        dispose();
    }
}));

// ═══════════════════════════════════════════════════════════════════════════
// PROVIDER & CONFIG COMMANDS
// ═══════════════════════════════════════════════════════════════════════════

program
    .command('models')
    .description('List models served by the configured provider')
    .option('--provider <preset>', 'Query this provider preset instead')
    .action(action(async (options: { provider?: string }) => {
        const loader = new ConfigLoader(findWorkspaceRoot(startDir()) ?? startDir());
        const user = await loader.loadUser();
        const client = createClient(user, logger, options.provider);

        const models = await client.listModels();
        logger.info(`${client.providerName()}: ${models.length} model(s)`);
        for (const model of models) logger.info(`  ${model}`);
    }));

const configCommand = program
    .command('config')
    .description('Inspect and change configuration');

configCommand
    .command('validate')
    .description('Check the user config and, inside a workspace, the workspace config')
    .action(action(async () => {
        const root = findWorkspaceRoot(startDir());
        const loader = new ConfigLoader(root ?? startDir());

        const issues = validateUserConfig(await loader.loadUser()).map(issue => `user: ${issue}`);
        if (root) {
            const workspaceIssues = await validateWorkspaceConfig(root, await loader.loadWorkspace());
            issues.push(...workspaceIssues.map(issue => `workspace: ${issue}`));
        } else {
            logger.warn('No workspace found; checked the user config only.');
        }

        if (issues.length === 0) {
            logger.success('✓ Configuration is valid');
            return;
        }
        for (const issue of issues) logger.error(`  - ${issue}`);
        process.exitCode = 1;
    }));

configCommand
    .command('set-provider <preset>')
    .description(`Point the user config at a provider preset (${Object.keys(PROVIDER_PRESETS).join(', ')})`)
    .action(action(async (preset: string) => {
        const loader = new ConfigLoader(findWorkspaceRoot(startDir()) ?? startDir());
        const user = await loader.updateUser(config => withProvider(config, preset));
        logger.success(`✓ Provider set to ${user.provider}${user.baseUrl ? ` (${user.baseUrl})` : ''}`);
        logger.info(`  Saved to ${loader.userConfigPath()}`);
    }));

program.parseAsync(process.argv).catch((err: unknown) => {
    logError(logger, err);
    process.exitCode = 1;
});
