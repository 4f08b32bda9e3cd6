/**
 * CORE: Token & Cost Estimates
 * Rough figures for display, not billing.
 */

import type { TokenUsage } from './types';

/** USD per 1K tokens: [input, output] */
export const MODEL_PRICING: Record<string, readonly [number, number]> = {
    'gpt-4o': [0.0025, 0.01],
    'gpt-4o-mini': [0.00015, 0.0006],
    'gpt-4-turbo': [0.01, 0.03],
    'gpt-3.5-turbo': [0.0005, 0.0015],
};

/** ~4 characters per token */
export function estimateTokens(text: string): number {
    return Math.floor(text.length / 4);
}

export function estimateUsage(promptText: string, completionText: string): TokenUsage {
    const promptTokens = estimateTokens(promptText);
    const completionTokens = estimateTokens(completionText);
    return { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens };
}

export function estimateCost(model: string, promptTokens: number, completionTokens: number): string {
    if (!Object.prototype.hasOwnProperty.call(MODEL_PRICING, model)) return 'Unknown';
    const prices = MODEL_PRICING[model];

    const cost = (promptTokens / 1000) * prices[0] + (completionTokens / 1000) * prices[1];
    return `$${cost.toFixed(4)}`;
}
