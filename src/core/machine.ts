/**
 * CORE: Chain State Machine Reducer
 * Pure function: (State, Action) -> State
 * Pending -> Running(i) -> Completed | Failed(i, reason)
 */

import { INITIAL_CHAIN_STATE, type ChainFailure, type ChainRunState } from './state';
import { validateAction } from './rules';

export type ChainAction =
    | { type: 'START'; stepCount: number; timestamp: number }
    | { type: 'STEP_SUCCEEDED'; stepIndex: number; outputVar: string; output: string; timestamp: number }
    | { type: 'STEP_FAILED'; stepIndex: number; reason: ChainFailure; timestamp: number };

export function reducer(state: ChainRunState = INITIAL_CHAIN_STATE, action: ChainAction): ChainRunState {
    const now = action.timestamp;

    switch (action.type) {
        case 'START': {
            validateAction(state, action);
            return {
                status: 'running',
                stepIndex: 0,
                stepCount: action.stepCount,
                context: {},
                updatedAt: now,
            };
        }

        case 'STEP_SUCCEEDED': {
            validateAction(state, action);
            if (state.status !== 'running') return state;

            const context = { ...state.context, [action.outputVar]: action.output };
            const next = state.stepIndex + 1;

            if (next >= state.stepCount) {
                return { status: 'completed', stepCount: state.stepCount, context, updatedAt: now };
            }
            return { ...state, stepIndex: next, context, updatedAt: now };
        }

        case 'STEP_FAILED': {
            validateAction(state, action);
            if (state.status !== 'running') return state;

            // Context keeps earlier outputs; the failing step never wrote one.
            return {
                status: 'failed',
                stepIndex: state.stepIndex,
                stepCount: state.stepCount,
                reason: action.reason,
                context: state.context,
                updatedAt: now,
            };
        }

        default:
            return state;
    }
}
