/**
 * CORE: Model Parameter Precedence
 * Layers are ordered broadest first; the narrowest layer that sets a field wins.
 */

import type { ModelParams, ResolvedModelParams } from './types';

export const TEMPERATURE_RANGE = { min: 0, max: 2 } as const;

export const FALLBACK_PARAMS: ResolvedModelParams = {
    provider: 'openai',
    model: 'gpt-4o',
    temperature: 0.7,
    maxTokens: 2000,
};

export function resolveModelParams(...layers: Array<ModelParams | undefined>): ResolvedModelParams {
    const resolved: ResolvedModelParams = { ...FALLBACK_PARAMS };
    for (const layer of layers) {
        if (!layer) continue;
        if (layer.provider !== undefined) resolved.provider = layer.provider;
        if (layer.model !== undefined) resolved.model = layer.model;
        if (layer.temperature !== undefined) resolved.temperature = layer.temperature;
        if (layer.maxTokens !== undefined) resolved.maxTokens = layer.maxTokens;
    }
    return resolved;
}

export function validateModelParams(params: ModelParams): string[] {
    const issues: string[] = [];
    if (params.temperature !== undefined) {
        const { min, max } = TEMPERATURE_RANGE;
        if (!Number.isFinite(params.temperature) || params.temperature < min || params.temperature > max) {
            issues.push(`temperature must be between ${min} and ${max} (got ${params.temperature})`);
        }
    }
    if (params.maxTokens !== undefined && (!Number.isInteger(params.maxTokens) || params.maxTokens < 1)) {
        issues.push(`maxTokens must be a positive integer (got ${params.maxTokens})`);
    }
    if (params.model !== undefined && !params.model.trim()) {
        issues.push('model must not be empty');
    }
    return issues;
}
