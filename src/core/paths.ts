/**
 * CORE: Path Logic
 * Pure path generation.
 * Chain and prompt names become file names, so they are whitelisted.
 */

import path from 'path';
import os from 'os';

export const WORKSPACE_DIR = '.prompt-workbench';
export const WORKSPACE_FILE = 'workspace.yaml';
export const USER_CONFIG_FILE = 'config.yaml';

const NAME_REGEX = /^[a-zA-Z0-9_-]+$/;

const MAX_NAME_LEN = 64;

export function validateName(name: string, label = 'name'): void {
    if (!NAME_REGEX.test(name)) {
        throw new Error(`Invalid ${label}: must match ^[a-zA-Z0-9_-]+$`);
    }
    if (name.length > MAX_NAME_LEN) {
        throw new Error(`Invalid ${label}: length exceeds ${MAX_NAME_LEN} characters`);
    }
}

export function getWorkspaceDir(root: string): string {
    return path.join(root, WORKSPACE_DIR);
}

export function getWorkspaceConfigPath(root: string): string {
    return path.join(root, WORKSPACE_DIR, WORKSPACE_FILE);
}

/** PWB_HOME overrides ~/.prompt-workbench */
export function getUserConfigDir(env: NodeJS.ProcessEnv = process.env): string {
    return env.PWB_HOME ? path.resolve(env.PWB_HOME) : path.join(os.homedir(), WORKSPACE_DIR);
}

export function getUserConfigPath(env: NodeJS.ProcessEnv = process.env): string {
    return path.join(getUserConfigDir(env), USER_CONFIG_FILE);
}

/**
 * <chainsDir>/<name>.yaml
 * Validates name before building the path.
 */
export function getChainPath(chainsDir: string, name: string): string {
    validateName(name, 'chain name');
    return path.join(chainsDir, `${name}.yaml`);
}

/** Relative paths from config are resolved against the workspace root. */
export function resolveWorkspacePath(root: string, relative: string): string {
    return path.resolve(root, relative);
}

export function toPosix(relative: string): string {
    return relative.split(path.sep).join('/');
}

/** Directory holding package.json and templates/, from both src/core and dist/core. */
export function getPackageRoot(): string {
    return path.join(__dirname, '..', '..');
}
