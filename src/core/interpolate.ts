/**
 * CORE: Interpolation Engine
 * Pure function over (Template, Namespace, workspaceRoot) -> InterpolationResult
 * Failures are data. Nothing in here throws for a bad template or variable.
 */

import { extractPlaceholders, type TokenizeOptions } from './tokenizer';
import { resolveVariable, type VariableError } from './variables';
import { DEFAULT_DELIMITERS, type Delimiters, type VariableNamespace } from './types';

export interface InterpolationResult {
    text: string;
    /** Names whose every occurrence was replaced. */
    substituted: Set<string>;
    /** Names with no namespace entry. Their tokens stay in `text`. */
    unmapped: Set<string>;
    /** Names whose spec failed to resolve. Their tokens stay in `text`. */
    errors: Map<string, VariableError>;
}

export interface InterpolateOptions extends TokenizeOptions {
    delimiters?: Delimiters;
}

export function interpolate(
    template: string,
    namespace: VariableNamespace,
    workspaceRoot: string,
    options: InterpolateOptions = {}
): InterpolationResult {
    const delimiters = options.delimiters ?? DEFAULT_DELIMITERS;
    const placeholders = extractPlaceholders(template, delimiters, { qualified: options.qualified });

    const resolved = new Map<string, string>();
    const unmapped = new Set<string>();
    const errors = new Map<string, VariableError>();

    for (const { name } of placeholders) {
        if (resolved.has(name) || unmapped.has(name) || errors.has(name)) continue;

        if (!Object.prototype.hasOwnProperty.call(namespace, name)) {
            unmapped.add(name);
            continue;
        }

        const outcome = resolveVariable(namespace[name], workspaceRoot);
        if (outcome.ok) {
            resolved.set(name, outcome.value);
        } else {
            errors.set(name, outcome.error);
        }
    }

    // Single left-to-right pass: inserted values are never scanned again.
    let text = '';
    let cursor = 0;
    for (const placeholder of placeholders) {
        text += template.slice(cursor, placeholder.start);
        const value = resolved.get(placeholder.name);
        text += value === undefined ? placeholder.raw : value;
        cursor = placeholder.end;
    }
    text += template.slice(cursor);

    return { text, substituted: new Set(resolved.keys()), unmapped, errors };
}

export function hasIssues(result: InterpolationResult): boolean {
    return result.unmapped.size > 0 || result.errors.size > 0;
}

/** Warning lines for interactive callers. */
export function formatInterpolationIssues(result: InterpolationResult): string[] {
    const lines: string[] = [];
    if (result.unmapped.size > 0) {
        lines.push(`Unmapped variables: ${[...result.unmapped].join(', ')}`);
    }
    for (const [name, error] of result.errors) {
        lines.push(`${name}: ${error.kind} (${error.message})`);
    }
    return lines;
}
