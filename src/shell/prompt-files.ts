/**
 * SHELL: Prompt Files
 * Listing, loading and saving template files under the prompt directory.
 */

import fs from 'fs-extra';
import path from 'path';
import { toPosix } from '../core/paths';

/**
 * Relative, forward-slash paths of every non-hidden file below `dir`.
 * Root-level files come first, then nested ones, each group sorted.
 */
export async function listPromptFiles(dir: string): Promise<string[]> {
    if (!(await fs.pathExists(dir))) return [];

    const files: string[] = [];
    const walk = async (current: string): Promise<void> => {
        const names = await fs.readdir(current);
        for (const name of names) {
            if (name.startsWith('.')) continue;
            const full = path.join(current, name);
            const stats = await fs.stat(full);
            if (stats.isDirectory()) {
                await walk(full);
            } else if (stats.isFile()) {
                files.push(toPosix(path.relative(dir, full)));
            }
        }
    };
    await walk(dir);

    const depth = (file: string): number => (file.includes('/') ? 1 : 0);
    return files.sort((a, b) => depth(a) - depth(b) || (a < b ? -1 : a > b ? 1 : 0));
}

function resolveInside(dir: string, relative: string): string {
    if (!relative) {
        throw new Error('Prompt file name is required');
    }
    return path.resolve(dir, relative);
}

export async function loadPromptFile(dir: string, relative: string): Promise<string> {
    const full = resolveInside(dir, relative);
    if (!(await fs.pathExists(full))) {
        throw new Error(`Prompt file not found: ${full}`);
    }
    return fs.readFile(full, 'utf-8');
}

/** Creates parent directories as needed. Returns the absolute path written. */
export async function savePromptFile(dir: string, relative: string, content: string): Promise<string> {
    const full = resolveInside(dir, relative);
    await fs.outputFile(full, content, 'utf-8');
    return full;
}
