import type { WorkbenchLogger } from './logger';

/**
 * Base error class for the workbench with recovery hints
 */
export class WorkbenchError extends Error {
    constructor(message: string, public recoveryHint?: string) {
        super(message);
        this.name = 'WorkbenchError';
    }

    toString(): string {
        if (this.recoveryHint) {
            return `${this.message}\n💡 Hint: ${this.recoveryHint}`;
        }
        return this.message;
    }
}

/**
 * Malformed or invalid workspace/user configuration
 */
export class ConfigError extends WorkbenchError {
    constructor(message: string, public issues: string[] = []) {
        super(
            issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message,
            'Fix the YAML file, or run: pwb config validate'
        );
        this.name = 'ConfigError';
    }
}

/**
 * No .prompt-workbench folder found walking up from the start directory
 */
export class WorkspaceNotFoundError extends WorkbenchError {
    constructor(startDir: string) {
        super(`No workspace found from ${startDir}`, 'Run: pwb init');
        this.name = 'WorkspaceNotFoundError';
    }
}

/**
 * Chain file that cannot be turned into a runnable chain
 */
export class ChainDefinitionError extends WorkbenchError {
    constructor(message: string, public issues: string[] = []) {
        super(
            issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message,
            'Step names and output variables must be unique, and every step needs a template.'
        );
        this.name = 'ChainDefinitionError';
    }
}

/**
 * Execution attempted on a prepared request that still has unresolved placeholders
 */
export class PromptNotReadyError extends WorkbenchError {
    constructor(public issues: string[]) {
        super(`Prompt has unresolved placeholders:\n  - ${issues.join('\n  - ')}`, 'Map the variables in workspace.yaml or the vars file.');
        this.name = 'PromptNotReadyError';
    }
}

export type LlmErrorKind =
    | 'Connection'
    | 'Authentication'
    | 'Authorization'
    | 'RateLimit'
    | 'ModelNotFound'
    | 'Api';

const LLM_HINTS: Record<LlmErrorKind, string> = {
    Connection: 'Check that the provider is running and the base URL is correct.',
    Authentication: 'Check the API key (OPENAI_API_KEY or apiKey in the user config).',
    Authorization: 'The API key lacks permission for this model or endpoint.',
    RateLimit: 'Wait a moment and retry, or lower the request rate.',
    ModelNotFound: 'Run: pwb models, to list the models this provider serves.',
    Api: 'See the provider response above.',
};

/**
 * Classified failure from the chat completion adapter
 */
export class LlmError extends WorkbenchError {
    constructor(public kind: LlmErrorKind, message: string, public status?: number) {
        super(message, LLM_HINTS[kind]);
        this.name = 'LlmError';
    }
}

/**
 * Log error with recovery hint
 */
export function logError(logger: WorkbenchLogger, error: unknown): void {
    if (error instanceof WorkbenchError) {
        logger.error(`[ERROR] ${error.message}`);
        if (error.recoveryHint) {
            logger.info(`💡 Hint: ${error.recoveryHint}`);
        }
    } else if (error instanceof Error) {
        logger.error(`[ERROR] ${error.message}`);
    } else {
        logger.error(`[ERROR] ${String(error)}`);
    }
}
