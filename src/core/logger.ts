export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
    return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function levelFromEnv(fallback: LogLevel = 'info'): LogLevel {
    const raw = process.env.PWB_LOG_LEVEL?.toLowerCase();
    return isLogLevel(raw) ? raw : fallback;
}

export interface WorkbenchLogger {
    debug(msg: string, ...args: unknown[]): void;
    info(msg: string, ...args: unknown[]): void;
    error(msg: string, ...args: unknown[]): void;
    success(msg: string, ...args: unknown[]): void;
    warn(msg: string, ...args: unknown[]): void;
}

export class ConsoleLogger implements WorkbenchLogger {
    private threshold: number;

    constructor(level: LogLevel = levelFromEnv()) {
        this.threshold = LEVEL_ORDER[level];
    }

    private enabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= this.threshold;
    }

    debug(msg: string, ...args: unknown[]): void {
        if (this.enabled('debug')) console.log(msg, ...args);
    }

    info(msg: string, ...args: unknown[]): void {
        if (this.enabled('info')) console.log(msg, ...args);
    }

    error(msg: string, ...args: unknown[]): void {
        if (this.enabled('error')) console.error(msg, ...args);
    }

    success(msg: string, ...args: unknown[]): void {
        if (this.enabled('info')) console.log(msg, ...args);
    }

    warn(msg: string, ...args: unknown[]): void {
        if (this.enabled('warn')) console.warn(msg, ...args);
    }
}

/** Collects lines instead of printing. Used by tests. */
export class MemoryLogger implements WorkbenchLogger {
    lines: Array<{ level: Exclude<LogLevel, 'silent'> | 'success'; msg: string }> = [];

    debug(msg: string): void {
        this.lines.push({ level: 'debug', msg });
    }

    info(msg: string): void {
        this.lines.push({ level: 'info', msg });
    }

    error(msg: string): void {
        this.lines.push({ level: 'error', msg });
    }

    success(msg: string): void {
        this.lines.push({ level: 'success', msg });
    }

    warn(msg: string): void {
        this.lines.push({ level: 'warn', msg });
    }
}
