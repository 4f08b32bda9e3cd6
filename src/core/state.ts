/**
 * CORE: Chain Run State
 * One value per run. The context only ever gains keys.
 */

import type { VariableError } from './variables';
import type { LlmErrorKind } from './errors';

/** outputVar -> captured output text */
export type ChainContext = Readonly<Record<string, string>>;

interface FailureBase {
    stepName: string;
    message: string;
}

export type ChainFailure =
    | (FailureBase & { kind: 'ForwardReference'; reference: string })
    | (FailureBase & { kind: 'InterpolationError'; variable: string; role: string; error: VariableError })
    | (FailureBase & { kind: 'UnmappedVariable'; variables: string[]; role: string })
    | (FailureBase & { kind: 'LLMError'; llmKind: LlmErrorKind })
    | (FailureBase & { kind: 'Cancelled' });

export type ChainFailureKind = ChainFailure['kind'];

export type ChainRunState =
    | { status: 'pending'; context: ChainContext; updatedAt: number }
    | { status: 'running'; stepIndex: number; stepCount: number; context: ChainContext; updatedAt: number }
    | { status: 'completed'; stepCount: number; context: ChainContext; updatedAt: number }
    | { status: 'failed'; stepIndex: number; stepCount: number; reason: ChainFailure; context: ChainContext; updatedAt: number };

export type ChainStatus = ChainRunState['status'];

export const INITIAL_CHAIN_STATE: ChainRunState = {
    status: 'pending',
    context: {},
    updatedAt: 0,
};

export function isTerminal(state: ChainRunState): boolean {
    return state.status === 'completed' || state.status === 'failed';
}

export function describeState(state: ChainRunState): string {
    switch (state.status) {
        case 'pending':
            return 'Pending';
        case 'running':
            return `Running(${state.stepIndex})`;
        case 'completed':
            return 'Completed';
        case 'failed':
            return `Failed(${state.stepIndex}, ${state.reason.kind})`;
    }
}
