import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import path from 'path';
import os from 'os';
import fs from 'fs-extra';
import { listPromptFiles, loadPromptFile, savePromptFile } from './prompt-files';

describe('prompt files', () => {
    const dir = path.join(os.tmpdir(), `pwb-prompts-test-${Date.now()}`);

    before(async () => {
        await fs.outputFile(path.join(dir, 'user-b.st'), 'B');
        await fs.outputFile(path.join(dir, 'system-a.st'), 'A');
        await fs.outputFile(path.join(dir, 'nested', 'user-c.st'), 'C');
        await fs.outputFile(path.join(dir, '.hidden', 'user-d.st'), 'D');
        await fs.outputFile(path.join(dir, '.draft.st'), 'draft');
    });

    after(async () => {
        await fs.remove(dir).catch(() => {});
    });

    it('lists root files first, skipping hidden entries', async () => {
        assert.deepStrictEqual(await listPromptFiles(dir), ['system-a.st', 'user-b.st', 'nested/user-c.st']);
    });

    it('returns an empty list for a missing directory', async () => {
        assert.deepStrictEqual(await listPromptFiles(path.join(dir, 'absent')), []);
    });

    it('saves into new subdirectories and loads back', async () => {
        const written = await savePromptFile(dir, 'more/system-x.st', 'You are {role}.');

        assert.strictEqual(written, path.join(dir, 'more', 'system-x.st'));
        assert.strictEqual(await loadPromptFile(dir, 'more/system-x.st'), 'You are {role}.');
    });

    it('reports missing files with the full path', async () => {
        await assert.rejects(
            () => loadPromptFile(dir, 'nope.st'),
            { message: `Prompt file not found: ${path.join(dir, 'nope.st')}` }
        );
    });

    it('requires a file name', async () => {
        await assert.rejects(() => loadPromptFile(dir, ''), /Prompt file name is required/);
    });
});
