/**
 * CORE: Chain Transition Rules
 * Pure validation logic. Throws on a transition the run must never take.
 */

import type { ChainAction } from './machine';
import type { ChainRunState } from './state';

export function validateAction(state: ChainRunState, action: ChainAction): void {
    switch (action.type) {
        case 'START':
            if (state.status !== 'pending') {
                throw new Error(`Cannot start chain in state: ${state.status}`);
            }
            if (!Number.isInteger(action.stepCount) || action.stepCount < 1) {
                throw new Error(`Cannot start chain with ${action.stepCount} steps`);
            }
            break;

        case 'STEP_SUCCEEDED':
            if (state.status !== 'running') {
                throw new Error(`Cannot record step output in state: ${state.status}`);
            }
            if (action.stepIndex !== state.stepIndex) {
                throw new Error(`Step index mismatch: Expected ${state.stepIndex}, got ${action.stepIndex}`);
            }
            if (Object.prototype.hasOwnProperty.call(state.context, action.outputVar)) {
                throw new Error(`Output variable '${action.outputVar}' was already captured by an earlier step`);
            }
            break;

        case 'STEP_FAILED':
            if (state.status !== 'running') {
                throw new Error(`Cannot fail step in state: ${state.status}`);
            }
            if (action.stepIndex !== state.stepIndex) {
                throw new Error(`Step index mismatch: Expected ${state.stepIndex}, got ${action.stepIndex}`);
            }
            break;
    }
}
