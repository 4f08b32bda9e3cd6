import fs from 'fs-extra';
import path from 'path';
import { getWorkspaceConfigPath } from './paths';
import { WorkspaceNotFoundError } from './errors';

/**
 * Find the workspace root by walking up the directory tree
 * Similar to how git finds .git. The marker is the workspace.yaml file, since
 * ~/.prompt-workbench holds the user config and is not a workspace on its own.
 */
export function findWorkspaceRoot(startDir: string = process.cwd()): string | null {
    let current = path.resolve(startDir);

    for (;;) {
        const marker = getWorkspaceConfigPath(current);
        if (fs.existsSync(marker) && fs.statSync(marker).isFile()) {
            return current;
        }

        const parent = path.dirname(current);
        if (parent === current) return null;
        current = parent;
    }
}

/**
 * Require a workspace root or throw with an init hint
 */
export function requireWorkspaceRoot(startDir: string = process.cwd()): string {
    const root = findWorkspaceRoot(startDir);
    if (!root) {
        throw new WorkspaceNotFoundError(path.resolve(startDir));
    }
    return root;
}
