/**
 * CORE: Shared Types
 * Value types passed between the tokenizer, resolver, interpolation and chain layers.
 */

export interface Delimiters {
    start: string;
    end: string;
}

export const DEFAULT_DELIMITERS: Delimiters = { start: '{', end: '}' };

/** Inline text, or a path relative to the workspace root read at resolution time. */
export type VariableSpec =
    | { type: 'value'; content: string }
    | { type: 'file'; path: string };

/** Identifier -> spec. Lookup is exact and case-sensitive. */
export type VariableNamespace = Record<string, VariableSpec>;

export type MessageRole = 'system' | 'user' | 'assistant';

export const MESSAGE_ROLES: readonly MessageRole[] = ['system', 'user', 'assistant'];

export interface ChatMessage {
    role: MessageRole;
    content: string;
}

export interface ModelParams {
    provider?: string;
    model?: string;
    temperature?: number;
    maxTokens?: number;
}

export type ResolvedModelParams = Required<Pick<ModelParams, 'model' | 'temperature' | 'maxTokens'>> &
    Pick<ModelParams, 'provider'>;

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export interface TokenUsage {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
}

export interface Completion {
    /** Answer text with reasoning sections removed. */
    text: string;
    /** Content exactly as the model returned it. */
    rawText: string;
    rawRequest: unknown;
    rawResponse: unknown;
    usage?: TokenUsage;
}

/** Chat completion adapter. Rejects with LlmError on failure. */
export type CompleteFn = (
    messages: ChatMessage[],
    params: ResolvedModelParams,
    signal?: AbortSignal
) => Promise<Completion>;
