/**
 * CORE: Chain Execution Engine
 * Runs steps strictly in declaration order. Each step interpolates its role
 * templates against (outputs < shared variables < step variables), calls the
 * completion adapter, and records its output under `outputVar`.
 * The first failing step ends the run.
 */

import { reducer, type ChainAction } from './machine';
import { INITIAL_CHAIN_STATE, type ChainContext, type ChainFailure, type ChainRunState } from './state';
import { interpolate } from './interpolate';
import { extractPlaceholders } from './tokenizer';
import { mergeNamespaces, valueVariable } from './variables';
import { resolveModelParams, validateModelParams } from './params';
import { ChainDefinitionError, LlmError } from './errors';
import type { ChainEvents } from './events';
import type { WorkbenchLogger } from './logger';
import {
    DEFAULT_DELIMITERS,
    MESSAGE_ROLES,
    type ChatMessage,
    type CompleteFn,
    type Completion,
    type Delimiters,
    type MessageRole,
    type ModelParams,
    type ResolvedModelParams,
    type VariableNamespace,
} from './types';

export interface ChainStep {
    name: string;
    templates: Partial<Record<MessageRole, string>>;
    variables?: VariableNamespace;
    outputVar: string;
    params?: ModelParams;
}

export interface ChainDefinition {
    name: string;
    description?: string;
    /** Shared by every step; step variables override these. */
    variables?: VariableNamespace;
    params?: ModelParams;
    steps: ChainStep[];
}

export interface StepRecord {
    stepIndex: number;
    stepName: string;
    outputVar: string;
    messages: ChatMessage[];
    params: ResolvedModelParams;
    completion: Completion;
}

export interface ChainRunOptions {
    workspaceRoot: string;
    complete: CompleteFn;
    delimiters?: Delimiters;
    /** Workspace and user defaults, broadest first. */
    defaults?: ModelParams[];
    signal?: AbortSignal;
    events?: ChainEvents;
    logger?: WorkbenchLogger;
    now?: () => number;
}

export interface ChainRun {
    state: ChainRunState;
    steps: StepRecord[];
    context: ChainContext;
}

const STEP_OUTPUT_REF = /^steps\.(\w+)\.output$/;
const IDENTIFIER = /^\w+$/;

export function stepOutputRef(name: string): string {
    return `steps.${name}.output`;
}

export function validateChain(chain: ChainDefinition): string[] {
    const issues: string[] = [];
    if (chain.steps.length === 0) {
        issues.push(`Chain '${chain.name}' has no steps`);
    }

    const names = new Set<string>();
    const outputs = new Set<string>();
    chain.steps.forEach((step, i) => {
        const label = `Step ${i + 1} (${step.name || '?'})`;
        if (!step.name) issues.push(`${label}: name is required`);
        else if (names.has(step.name)) issues.push(`${label}: duplicate step name '${step.name}'`);
        names.add(step.name);

        if (!IDENTIFIER.test(step.outputVar)) {
            issues.push(`${label}: output variable '${step.outputVar}' must match [A-Za-z0-9_]+`);
        } else if (outputs.has(step.outputVar)) {
            issues.push(`${label}: duplicate output variable '${step.outputVar}'`);
        }
        outputs.add(step.outputVar);

        if (!MESSAGE_ROLES.some(role => step.templates[role] !== undefined)) {
            issues.push(`${label}: at least one of system, user or assistant template is required`);
        }
        if (step.params) {
            issues.push(...validateModelParams(step.params).map(issue => `${label}: ${issue}`));
        }
    });

    if (chain.params) {
        issues.push(...validateModelParams(chain.params).map(issue => `Chain defaults: ${issue}`));
    }
    return issues;
}

/**
 * First `steps.<name>.output` reference that names neither an executed step
 * nor an earlier output variable, skipping names the step or chain defines itself.
 */
export function findForwardReference(
    step: ChainStep,
    executed: ReadonlyArray<ChainStep>,
    shared: VariableNamespace,
    delimiters: Delimiters
): string | null {
    const available = new Set<string>();
    for (const done of executed) {
        available.add(done.name);
        available.add(done.outputVar);
    }

    for (const role of MESSAGE_ROLES) {
        const template = step.templates[role];
        if (template === undefined) continue;

        for (const { name } of extractPlaceholders(template, delimiters, { qualified: true })) {
            const match = STEP_OUTPUT_REF.exec(name);
            if (!match) continue;
            if (step.variables && Object.prototype.hasOwnProperty.call(step.variables, name)) continue;
            if (Object.prototype.hasOwnProperty.call(shared, name)) continue;
            if (!available.has(match[1])) return name;
        }
    }
    return null;
}

/** outputs < chain variables < step variables */
export function buildStepNamespace(
    step: ChainStep,
    executed: ReadonlyArray<ChainStep>,
    context: ChainContext,
    shared: VariableNamespace
): VariableNamespace {
    const outputs: VariableNamespace = {};
    for (const done of executed) {
        const output = context[done.outputVar];
        if (output === undefined) continue;
        const spec = valueVariable(output);
        outputs[done.outputVar] = spec;
        outputs[stepOutputRef(done.outputVar)] = spec;
        outputs[stepOutputRef(done.name)] = spec;
    }
    return mergeNamespaces(outputs, shared, step.variables);
}

type MessageOutcome = { ok: true; messages: ChatMessage[] } | { ok: false; failure: ChainFailure };

function renderMessages(
    step: ChainStep,
    namespace: VariableNamespace,
    workspaceRoot: string,
    delimiters: Delimiters
): MessageOutcome {
    const messages: ChatMessage[] = [];

    for (const role of MESSAGE_ROLES) {
        const template = step.templates[role];
        if (template === undefined) continue;

        const result = interpolate(template, namespace, workspaceRoot, { delimiters, qualified: true });

        const [firstError] = result.errors;
        if (firstError) {
            const [variable, error] = firstError;
            return {
                ok: false,
                failure: {
                    kind: 'InterpolationError',
                    stepName: step.name,
                    role,
                    variable,
                    error,
                    message: `Step '${step.name}' (${role}): variable '${variable}' failed with ${error.kind}: ${error.message}`,
                },
            };
        }

        if (result.unmapped.size > 0) {
            const variables = [...result.unmapped];
            return {
                ok: false,
                failure: {
                    kind: 'UnmappedVariable',
                    stepName: step.name,
                    role,
                    variables,
                    message: `Step '${step.name}' (${role}): unmapped variable(s) ${variables.join(', ')}`,
                },
            };
        }

        messages.push({ role, content: result.text });
    }
    return { ok: true, messages };
}

function cancelled(step: ChainStep): ChainFailure {
    return { kind: 'Cancelled', stepName: step.name, message: `Chain cancelled at step '${step.name}'` };
}

export async function runChain(chain: ChainDefinition, options: ChainRunOptions): Promise<ChainRun> {
    const issues = validateChain(chain);
    if (issues.length > 0) {
        throw new ChainDefinitionError(`Invalid chain '${chain.name}'`, issues);
    }

    const delimiters = options.delimiters ?? DEFAULT_DELIMITERS;
    const shared = chain.variables ?? {};
    const now = options.now ?? Date.now;
    const { logger, events, signal } = options;

    let state: ChainRunState = INITIAL_CHAIN_STATE;
    const records: StepRecord[] = [];

    const dispatch = (action: ChainAction): void => {
        const prev = state.status;
        state = reducer(state, action);
        logger?.debug(`[chain:${chain.name}] ${action.type}: ${prev} -> ${state.status}`);
        events?.trigger('transition', state);
    };

    dispatch({ type: 'START', stepCount: chain.steps.length, timestamp: now() });

    for (let i = 0; i < chain.steps.length; i++) {
        const step = chain.steps[i];
        const executed = chain.steps.slice(0, i);
        const fail = (reason: ChainFailure): ChainRun => {
            logger?.warn(`[chain:${chain.name}] ${reason.kind} at step ${i + 1}/${chain.steps.length}: ${reason.message}`);
            dispatch({ type: 'STEP_FAILED', stepIndex: i, reason, timestamp: now() });
            return { state, steps: records, context: state.context };
        };

        if (signal?.aborted) return fail(cancelled(step));

        events?.trigger('stepStarted', { stepIndex: i, stepName: step.name });
        logger?.info(`[chain:${chain.name}] Step ${i + 1}/${chain.steps.length}: ${step.name}`);

        const forward = findForwardReference(step, executed, shared, delimiters);
        if (forward) {
            return fail({
                kind: 'ForwardReference',
                stepName: step.name,
                reference: forward,
                message: `Step '${step.name}' references '${forward}', which has not run before this step`,
            });
        }

        const namespace = buildStepNamespace(step, executed, state.context, shared);
        const rendered = renderMessages(step, namespace, options.workspaceRoot, delimiters);
        if (!rendered.ok) return fail(rendered.failure);

        const params = resolveModelParams(...(options.defaults ?? []), chain.params, step.params);

        let completion: Completion;
        try {
            // The signal is not forwarded: a step that has started always finishes.
            completion = await options.complete(rendered.messages, params);
        } catch (err) {
            if (signal?.aborted) return fail(cancelled(step));
            const llmKind = err instanceof LlmError ? err.kind : 'Api';
            const reason = err instanceof Error ? err.message : String(err);
            return fail({
                kind: 'LLMError',
                stepName: step.name,
                llmKind,
                message: `Step '${step.name}': ${llmKind} error from model ${params.model}: ${reason}`,
            });
        }

        // Output of a step that finished after cancellation is discarded.
        if (signal?.aborted) return fail(cancelled(step));

        const record: StepRecord = {
            stepIndex: i,
            stepName: step.name,
            outputVar: step.outputVar,
            messages: rendered.messages,
            params,
            completion,
        };
        records.push(record);
        dispatch({ type: 'STEP_SUCCEEDED', stepIndex: i, outputVar: step.outputVar, output: completion.text, timestamp: now() });
        events?.trigger('stepCompleted', record);
    }

    logger?.success(`[chain:${chain.name}] Completed ${chain.steps.length} step(s)`);
    return { state, steps: records, context: state.context };
}
