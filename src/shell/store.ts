/**
 * SHELL: YAML Store Adapter
 * Validated, lock-protected persistence of one YAML document.
 */

import fs from 'fs-extra';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { z } from 'zod';
import { LockManager } from './lock';
import { ConfigError } from '../core/errors';
import { formatZodIssues } from './config-schema';

export class YamlStore<T> {
    private filePath: string;
    private schema: z.ZodType<T, z.ZodTypeDef, unknown>;
    private lock: LockManager;

    constructor(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
        this.filePath = filePath;
        this.schema = schema;
        this.lock = new LockManager(filePath);
    }

    getPath(): string {
        return this.filePath;
    }

    async exists(): Promise<boolean> {
        return fs.pathExists(this.filePath);
    }

    /** Parse and validate. A missing or empty file yields the schema defaults. */
    async read(): Promise<T> {
        const text = (await fs.pathExists(this.filePath)) ? await fs.readFile(this.filePath, 'utf-8') : '';
        return this.parse(text);
    }

    parse(text: string): T {
        let data: unknown;
        try {
            data = text.trim() ? parseYaml(text) : {};
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            throw new ConfigError(`Invalid YAML in ${this.filePath}: ${reason}`);
        }

        const result = this.schema.safeParse(data ?? {});
        if (!result.success) {
            throw new ConfigError(`Invalid configuration in ${this.filePath}`, formatZodIssues(result.error));
        }
        return result.data;
    }

    /**
     * Atomic Update: Lock -> Read -> Update -> Write -> Unlock
     */
    async update(updater: (value: T) => T): Promise<T> {
        await fs.ensureFile(this.filePath);
        return this.lock.withLock(async () => {
            const next = updater(await this.read());
            await this.writeUnlocked(next);
            return next;
        });
    }

    async write(value: T): Promise<void> {
        await fs.ensureFile(this.filePath);
        await this.lock.withLock(() => this.writeUnlocked(value));
    }

    /** Write to .tmp then rename. */
    private async writeUnlocked(value: T): Promise<void> {
        const validated = this.schema.parse(value);
        const tmpPath = this.filePath + '.tmp';
        await fs.writeFile(tmpPath, stringifyYaml(validated), 'utf-8');
        await fs.move(tmpPath, this.filePath, { overwrite: true });
    }
}
