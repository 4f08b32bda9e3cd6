/**
 * CORE: Delimiter-Aware Tokenizer
 * Pure function: (Template, Delimiters) -> Placeholder[]
 */

import type { Delimiters } from './types';

export interface Placeholder {
    name: string;
    /** Offset of the start delimiter. */
    start: number;
    /** Offset one past the end delimiter. */
    end: number;
    raw: string;
}

export interface TokenizeOptions {
    /** Also accept step output references such as `steps.review.output`. */
    qualified?: boolean;
}

export const DELIMITER_PRESETS: Record<string, Delimiters> = {
    curly: { start: '{', end: '}' },
    dollar: { start: '$', end: '$' },
    angle: { start: '<', end: '>' },
    double_bracket: { start: '[[', end: ']]' },
    shell: { start: '${', end: '}' },
};

const WORD = '\\w+';
const QUALIFIED_WORD = '(?:steps\\.\\w+\\.output|\\w+)';

export function escapeRegExp(literal: string): string {
    return literal.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Every match consumes at least one word character, so even empty or identical
 * delimiters advance the scan.
 */
export function buildPlaceholderPattern(delimiters: Delimiters, options: TokenizeOptions = {}): RegExp {
    const ident = options.qualified ? QUALIFIED_WORD : WORD;
    return new RegExp(`${escapeRegExp(delimiters.start)}(${ident})${escapeRegExp(delimiters.end)}`, 'g');
}

export function extractPlaceholders(
    template: string,
    delimiters: Delimiters,
    options: TokenizeOptions = {}
): Placeholder[] {
    const pattern = buildPlaceholderPattern(delimiters, options);
    const found: Placeholder[] = [];

    for (const match of template.matchAll(pattern)) {
        const start = match.index ?? 0;
        found.push({
            name: match[1],
            start,
            end: start + match[0].length,
            raw: match[0],
        });
    }
    return found;
}

/** Distinct names in order of first appearance. */
export function extractVariables(template: string, delimiters: Delimiters, options: TokenizeOptions = {}): string[] {
    const seen = new Set<string>();
    for (const placeholder of extractPlaceholders(template, delimiters, options)) {
        seen.add(placeholder.name);
    }
    return [...seen];
}

export function countPlaceholders(template: string, delimiters: Delimiters): Map<string, number> {
    const counts = new Map<string, number>();
    for (const { name } of extractPlaceholders(template, delimiters)) {
        counts.set(name, (counts.get(name) ?? 0) + 1);
    }
    return counts;
}

/** Configuration-time check; the tokenizer itself tolerates degenerate pairs. */
export function validateDelimiters(delimiters: Delimiters): string[] {
    const issues: string[] = [];
    if (!delimiters.start) issues.push('Start delimiter must not be empty');
    if (!delimiters.end) issues.push('End delimiter must not be empty');
    if (delimiters.start && delimiters.start === delimiters.end) {
        issues.push(`Start and end delimiters must differ (both are '${delimiters.start}')`);
    }
    return issues;
}

/**
 * Lint a template for placeholder mistakes the tokenizer would silently skip.
 */
export function validateTemplate(template: string, delimiters: Delimiters): string[] {
    const issues: string[] = [];
    const { start, end } = delimiters;
    if (!start || !end) return validateDelimiters(delimiters);

    if (start !== end && !end.includes(start) && !start.includes(end)) {
        const opens = template.split(start).length - 1;
        const closes = template.split(end).length - 1;
        if (opens !== closes) {
            issues.push(`Mismatched delimiters: ${opens} '${start}' vs ${closes} '${end}'`);
        }
    }

    const s = escapeRegExp(start);
    const e = escapeRegExp(end);

    if (new RegExp(`${s}\\s*${e}`).test(template)) {
        issues.push(`Empty placeholder found: ${start}${end}`);
    }

    const inner = new RegExp(`${s}([^${escapeRegExp(end.charAt(0))}\\n]*?)${e}`, 'g');
    for (const match of template.matchAll(inner)) {
        const name = match[1];
        if (name.trim() && !/^\w+$/.test(name)) {
            issues.push(`Invalid variable name: '${name}'`);
        }
    }
    return issues;
}
