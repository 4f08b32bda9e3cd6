/**
 * SHELL: Chain Files
 * <chains>/<name>.yaml -> ChainDefinition.
 * Prompt file references are read relative to the prompt directory;
 * inline templates win for the same role.
 */

import fs from 'fs-extra';
import path from 'path';
import { YamlStore } from './store';
import { ChainFileSchema, type ChainFile, type ChainStepFile } from './config-schema';
import { ChainDefinitionError } from '../core/errors';
import { getChainPath } from '../core/paths';
import { MESSAGE_ROLES, type MessageRole } from '../core/types';
import type { ChainDefinition, ChainStep } from '../core/chain';

const CHAIN_EXTENSION = '.yaml';

/** Chain names (file stems) in the chains directory, sorted. */
export async function listChains(chainsDir: string): Promise<string[]> {
    if (!(await fs.pathExists(chainsDir))) return [];
    const names = await fs.readdir(chainsDir);
    return names
        .filter(name => name.endsWith(CHAIN_EXTENSION) && !name.startsWith('.'))
        .map(name => name.slice(0, -CHAIN_EXTENSION.length))
        .sort();
}

export async function readChainFile(chainsDir: string, name: string): Promise<ChainFile> {
    const filePath = getChainPath(chainsDir, name);
    if (!(await fs.pathExists(filePath))) {
        throw new ChainDefinitionError(`Chain not found: ${filePath}`);
    }
    return new YamlStore(filePath, ChainFileSchema).read();
}

async function loadStepTemplates(
    step: ChainStepFile,
    index: number,
    promptDir: string
): Promise<Partial<Record<MessageRole, string>>> {
    const templates: Partial<Record<MessageRole, string>> = {};
    const missing: string[] = [];

    for (const role of MESSAGE_ROLES) {
        const inline = step.templates[role];
        if (inline !== undefined) {
            templates[role] = inline;
            continue;
        }
        const ref = step.prompts[role];
        if (ref === undefined) continue;

        const full = path.resolve(promptDir, ref);
        if (!(await fs.pathExists(full))) {
            missing.push(`Step ${index + 1} (${step.name}): ${role} prompt not found: ${ref}`);
            continue;
        }
        templates[role] = await fs.readFile(full, 'utf-8');
    }

    if (missing.length > 0) {
        throw new ChainDefinitionError(`Chain step '${step.name}' references missing prompt files`, missing);
    }
    return templates;
}

export async function toChainDefinition(file: ChainFile, promptDir: string): Promise<ChainDefinition> {
    const steps: ChainStep[] = [];
    for (const [i, step] of file.steps.entries()) {
        steps.push({
            name: step.name,
            templates: await loadStepTemplates(step, i, promptDir),
            variables: step.variables,
            outputVar: step.output,
            params: step.params,
        });
    }

    return {
        name: file.name,
        description: file.description,
        variables: file.variables,
        params: file.defaults,
        steps,
    };
}

export async function loadChain(chainsDir: string, promptDir: string, name: string): Promise<ChainDefinition> {
    return toChainDefinition(await readChainFile(chainsDir, name), promptDir);
}
