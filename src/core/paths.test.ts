/**
 * CORE: Path Logic Tests
 * Names become file names, so they are whitelisted.
 */

import { describe, it, after } from 'node:test';
import assert from 'node:assert';
import path from 'path';
import os from 'os';
import fs from 'fs-extra';
import { getChainPath, getUserConfigPath, validateName } from './paths';
import { findWorkspaceRoot, requireWorkspaceRoot } from './resolver';
import { WorkspaceNotFoundError } from './errors';

describe('validateName', () => {
    it('accepts valid names', () => {
        assert.doesNotThrow(() => validateName('code-review'));
        assert.doesNotThrow(() => validateName('step_2'));
    });

    it('rejects path traversal attempts', () => {
        assert.throws(() => validateName('../../../etc/passwd'), /Invalid name/);
        assert.throws(() => validateName('a/b', 'chain name'), /Invalid chain name/);
    });

    it('rejects names exceeding max length', () => {
        assert.throws(() => validateName('a'.repeat(65)), /length exceeds 64/);
        assert.doesNotThrow(() => validateName('a'.repeat(64)));
    });
});

describe('getChainPath', () => {
    it('builds <chains>/<name>.yaml', () => {
        assert.strictEqual(getChainPath('/ws/chains', 'review'), path.join('/ws/chains', 'review.yaml'));
        assert.throws(() => getChainPath('/ws/chains', '..'), /Invalid chain name/);
    });
});

describe('getUserConfigPath', () => {
    it('honors PWB_HOME', () => {
        assert.strictEqual(getUserConfigPath({ PWB_HOME: '/opt/pwb' }), path.join('/opt/pwb', 'config.yaml'));
    });

    it('defaults to the home directory', () => {
        assert.strictEqual(getUserConfigPath({}), path.join(os.homedir(), '.prompt-workbench', 'config.yaml'));
    });
});

describe('findWorkspaceRoot', () => {
    const root = path.join(os.tmpdir(), `pwb-root-test-${Date.now()}`);

    after(async () => {
        await fs.remove(root).catch(() => {});
    });

    it('walks up to the directory holding workspace.yaml', async () => {
        await fs.outputFile(path.join(root, '.prompt-workbench', 'workspace.yaml'), 'name: test\n');
        const nested = path.join(root, 'prompts', 'deep');
        await fs.ensureDir(nested);

        assert.strictEqual(findWorkspaceRoot(nested), root);
        assert.strictEqual(requireWorkspaceRoot(root), root);
    });

    it('throws a hinted error when nothing is found', () => {
        const fsRoot = path.parse(os.tmpdir()).root;
        if (findWorkspaceRoot(fsRoot) !== null) return;
        assert.throws(() => requireWorkspaceRoot(fsRoot), WorkspaceNotFoundError);
    });
});
