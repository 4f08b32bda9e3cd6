/**
 * SHELL: Provider Presets
 * OpenAI-compatible endpoints the workbench knows how to reach.
 */

export interface ProviderPreset {
    label: string;
    /** Empty for the SDK's default OpenAI endpoint. */
    baseUrl?: string;
    apiKeyRequired: boolean;
    defaultModels: string[];
}

export const PROVIDER_PRESETS: Record<string, ProviderPreset> = {
    openai: {
        label: 'OpenAI',
        apiKeyRequired: true,
        defaultModels: ['gpt-4o', 'gpt-4o-mini', 'gpt-3.5-turbo'],
    },
    ollama: {
        label: 'Ollama',
        baseUrl: 'http://localhost:11434/v1',
        apiKeyRequired: false,
        defaultModels: ['llama3.2', 'mistral', 'codellama'],
    },
    'lm-studio': {
        label: 'LM Studio',
        baseUrl: 'http://localhost:1234/v1',
        apiKeyRequired: false,
        defaultModels: [],
    },
    openrouter: {
        label: 'OpenRouter',
        baseUrl: 'https://openrouter.ai/api/v1',
        apiKeyRequired: true,
        defaultModels: ['anthropic/claude-3.5-sonnet', 'openai/gpt-4o'],
    },
    vllm: {
        label: 'vLLM',
        baseUrl: 'http://localhost:8000/v1',
        apiKeyRequired: false,
        defaultModels: [],
    },
};

export function getProviderPreset(name: string): ProviderPreset | undefined {
    return Object.prototype.hasOwnProperty.call(PROVIDER_PRESETS, name) ? PROVIDER_PRESETS[name] : undefined;
}

/** Display name inferred from a base URL. */
export function providerNameFromUrl(baseUrl: string | undefined): string {
    if (!baseUrl) return 'OpenAI';
    const url = baseUrl.toLowerCase();
    if (url.includes('openrouter')) return 'OpenRouter';
    if (url.includes(':11434') || url.includes('ollama')) return 'Ollama';
    if (url.includes(':1234') || url.includes('lmstudio') || url.includes('lm-studio')) return 'LM Studio';
    if (url.includes(':8000') || url.includes('vllm')) return 'vLLM';
    if (url.includes('api.openai.com')) return 'OpenAI';
    return 'Custom';
}
