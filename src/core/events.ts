/**
 * CORE: Chain Events
 * Synchronous progress notifications for a chain run.
 */

import type { ChainRunState } from './state';
import type { StepRecord } from './chain';

export interface ChainEventMap {
    transition: ChainRunState;
    stepStarted: { stepIndex: number; stepName: string };
    stepCompleted: StepRecord;
}

export type ChainEventName = keyof ChainEventMap;
export type ChainEventListener<K extends ChainEventName> = (payload: ChainEventMap[K]) => void;

export class ChainEvents {
    private listeners: { [K in ChainEventName]: Array<ChainEventListener<K>> } = {
        transition: [],
        stepStarted: [],
        stepCompleted: [],
    };

    on<K extends ChainEventName>(event: K, listener: ChainEventListener<K>): void {
        this.listeners[event].push(listener);
    }

    trigger<K extends ChainEventName>(event: K, payload: ChainEventMap[K]): void {
        for (const listener of this.listeners[event]) {
            listener(payload);
        }
    }
}
