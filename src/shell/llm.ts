/**
 * SHELL: LLM Adapter
 * OpenAI-compatible chat completions through the official SDK.
 * Every failure leaves here as an LlmError with a classified kind. No retries.
 */

import OpenAI from 'openai';
import { LlmError, type LlmErrorKind } from '../core/errors';
import { stripThinking } from '../core/thinking';
import type { WorkbenchLogger } from '../core/logger';
import type { ChatMessage, CompleteFn, Completion, ResolvedModelParams, TokenUsage } from '../core/types';
import { providerNameFromUrl } from './providers';

export interface CompletionRequestBody {
    model: string;
    messages: ChatMessage[];
    temperature: number;
    max_tokens: number;
}

/** The part of a chat completion the workbench reads. */
export interface CompletionResponseBody {
    id?: string;
    model?: string;
    choices: Array<{ message: { content: string | null }; finish_reason?: string | null }>;
    usage?: { prompt_tokens: number; completion_tokens: number; total_tokens: number } | null;
}

/** Seam between the adapter and the SDK, so tests can stand in for the network. */
export interface ChatBackend {
    createCompletion(body: CompletionRequestBody, signal?: AbortSignal): Promise<CompletionResponseBody>;
    listModelIds(): Promise<string[]>;
}

export interface LlmClientOptions {
    apiKey?: string;
    baseUrl?: string;
    logger?: WorkbenchLogger;
}

function toMessageParam(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
    switch (message.role) {
        case 'system':
            return { role: 'system', content: message.content };
        case 'user':
            return { role: 'user', content: message.content };
        case 'assistant':
            return { role: 'assistant', content: message.content };
    }
}

export function openAiBackend(options: LlmClientOptions): ChatBackend {
    // Local servers ignore the key but the SDK insists on one.
    const apiKey = options.apiKey || (options.baseUrl ? 'not-needed' : undefined);
    // Built on first use: the SDK throws at construction when no key is available.
    let client: OpenAI | undefined;
    const getClient = (): OpenAI => (client ??= new OpenAI({ apiKey, baseURL: options.baseUrl }));

    return {
        createCompletion: async (body, signal) =>
            getClient().chat.completions.create(
                {
                    model: body.model,
                    messages: body.messages.map(toMessageParam),
                    temperature: body.temperature,
                    max_tokens: body.max_tokens,
                },
                { signal }
            ),
        listModelIds: async () => {
            const page = await getClient().models.list();
            return page.data.map(model => model.id);
        },
    };
}

function statusOf(err: unknown): number | undefined {
    if (err instanceof OpenAI.APIError && typeof err.status === 'number') return err.status;
    if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') return err.status;
    return undefined;
}

/**
 * SDK error classes first, then status codes, then message text for
 * servers that report failures loosely.
 */
export function classifyLlmError(err: unknown, model?: string): LlmError {
    if (err instanceof LlmError) return err;

    const message = err instanceof Error ? err.message : String(err);
    const status = statusOf(err);
    const lower = message.toLowerCase();

    let kind: LlmErrorKind;
    if (err instanceof OpenAI.APIConnectionError) kind = 'Connection';
    else if (err instanceof OpenAI.AuthenticationError || status === 401) kind = 'Authentication';
    else if (err instanceof OpenAI.PermissionDeniedError || status === 403) kind = 'Authorization';
    else if (err instanceof OpenAI.RateLimitError || status === 429) kind = 'RateLimit';
    else if (lower.includes('model') && (lower.includes('not found') || lower.includes('does not exist'))) kind = 'ModelNotFound';
    else if (err instanceof OpenAI.NotFoundError && model) kind = 'ModelNotFound';
    else if (lower.includes('econnrefused') || lower.includes('connect') || lower.includes('fetch failed')) kind = 'Connection';
    else if (lower.includes('unauthorized') || lower.includes('api key') || lower.includes('api_key')) kind = 'Authentication';
    else if (lower.includes('forbidden')) kind = 'Authorization';
    else if (lower.includes('rate limit')) kind = 'RateLimit';
    else kind = 'Api';

    const detail = kind === 'ModelNotFound' && model ? `Model '${model}' not found: ${message}` : message;
    return new LlmError(kind, detail, status);
}

export class LlmClient {
    private backend: ChatBackend;
    private baseUrl?: string;
    private logger?: WorkbenchLogger;

    constructor(options: LlmClientOptions = {}, backend?: ChatBackend) {
        this.baseUrl = options.baseUrl;
        this.logger = options.logger;
        this.backend = backend ?? openAiBackend(options);
    }

    providerName(): string {
        return providerNameFromUrl(this.baseUrl);
    }

    async complete(messages: ChatMessage[], params: ResolvedModelParams, signal?: AbortSignal): Promise<Completion> {
        const request: CompletionRequestBody = {
            model: params.model,
            messages,
            temperature: params.temperature,
            max_tokens: params.maxTokens,
        };
        this.logger?.debug(`[llm] ${this.providerName()} ${params.model} (${messages.length} message(s))`);

        let response: CompletionResponseBody;
        try {
            response = await this.backend.createCompletion(request, signal);
        } catch (err) {
            throw classifyLlmError(err, params.model);
        }

        const rawText = response.choices[0]?.message.content ?? '';
        const usage: TokenUsage | undefined = response.usage
            ? {
                promptTokens: response.usage.prompt_tokens,
                completionTokens: response.usage.completion_tokens,
                totalTokens: response.usage.total_tokens,
            }
            : undefined;

        return { text: stripThinking(rawText), rawText, rawRequest: request, rawResponse: response, usage };
    }

    /** Sorted model ids. An empty listing is an error. */
    async listModels(): Promise<string[]> {
        let ids: string[];
        try {
            ids = await this.backend.listModelIds();
        } catch (err) {
            throw classifyLlmError(err);
        }
        if (ids.length === 0) {
            throw new LlmError('Api', `No models returned by ${this.providerName()}`);
        }
        return [...ids].sort();
    }

    /** Bound `complete`, for handing to the chain engine. */
    asCompleteFn(): CompleteFn {
        return (messages, params, signal) => this.complete(messages, params, signal);
    }
}
