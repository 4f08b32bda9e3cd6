/**
 * SHELL: File Lock
 * proper-lockfile guards config writes against a second workbench process.
 * The lock is refreshed every 5s and considered stale after 30s, so work done
 * inside `withLock` must not block the event loop for that long.
 */

import lockfile from 'proper-lockfile';
import fs from 'fs-extra';
import path from 'path';
import { WorkbenchError } from '../core/errors';

const BACKOFF_BASE_MS = 50;
const BACKOFF_CAP_MS = 2000;
const STALE_MS = 30_000;
const REFRESH_MS = 5_000;
/** Retrying cannot fix these. */
const FATAL_CODES = new Set(['EACCES', 'EPERM', 'EROFS', 'ENOTDIR', 'ENAMETOOLONG']);

export type ReleaseFn = () => Promise<void>;

export class LockError extends WorkbenchError {
    constructor(message: string, public code?: string) {
        super(message, 'Another workbench process may be writing this file. Retry, or remove a stale .lock directory.');
        this.name = 'LockError';
    }
}

function errorCode(err: unknown): string | undefined {
    if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
    return undefined;
}

/** Exponential with jitter, never past the cap or the time left. */
function backoff(attempt: number, remainingMs: number): number {
    const exponential = BACKOFF_BASE_MS * 2 ** attempt + Math.random() * BACKOFF_BASE_MS;
    return Math.max(0, Math.min(exponential, BACKOFF_CAP_MS, remainingMs));
}

export class LockManager {
    /** `filePath` must exist before acquire(). */
    constructor(private filePath: string) {}

    /** Caller releases in a finally block. */
    async acquire(timeoutMs = 5000): Promise<ReleaseFn> {
        await fs.ensureDir(path.dirname(this.filePath));
        const deadline = Date.now() + timeoutMs;

        for (let attempt = 0; ; attempt++) {
            try {
                return await lockfile.lock(this.filePath, {
                    stale: STALE_MS,
                    update: REFRESH_MS,
                    retries: { retries: 0 },
                });
            } catch (err) {
                const code = errorCode(err);
                if (code && FATAL_CODES.has(code)) {
                    throw new LockError(`Cannot acquire lock: ${code}. Check permissions on ${path.dirname(this.filePath)}.`, code);
                }

                const remaining = deadline - Date.now();
                if (remaining <= 0) {
                    throw code === 'ENOENT'
                        ? new LockError(`Cannot lock ${this.filePath}: file does not exist.`, code)
                        : new LockError(`Could not acquire lock on ${path.basename(this.filePath)} after ${timeoutMs}ms.`, code);
                }
                await new Promise(resolve => setTimeout(resolve, backoff(attempt, remaining)));
            }
        }
    }

    async withLock<T>(fn: () => Promise<T>, timeoutMs?: number): Promise<T> {
        const release = await this.acquire(timeoutMs);
        try {
            return await fn();
        } finally {
            await release();
        }
    }
}
