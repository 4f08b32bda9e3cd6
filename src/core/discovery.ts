/**
 * CORE: Auto-Matching Discovery
 * Groups a flat list of prompt filenames into named sets by a naming pattern
 * such as `{role}-{name}.st`. Rebuilt from scratch on every call.
 */

import path from 'path';
import { escapeRegExp } from './tokenizer';

export const ORPHAN_ROLE = 'unknown';

export interface PromptGroup {
    name: string;
    /** role -> filename. Missing roles are absent keys. */
    roles: Record<string, string>;
    isOrphan: boolean;
    varFile?: string;
}

export interface DuplicateGroupKey {
    name: string;
    role: string;
    kept: string;
    ignored: string;
}

export interface DiscoveryResult {
    groups: PromptGroup[];
    duplicates: DuplicateGroupKey[];
}

export interface DiscoveryOptions {
    /** Accepted roles. A file with any other role is an orphan. */
    roles?: readonly string[];
    /** When given, groups with no `<name><varExtension>` entry are orphans. */
    varFiles?: readonly string[];
    varExtension?: string;
}

export interface NamingPattern {
    source: string;
    match(filename: string): { role: string; name: string } | null;
}

const TOKENS: Record<string, string> = {
    '{role}': '(?<role>[A-Za-z0-9_]+?)',
    '{name}': '(?<name>.+?)',
    '{ext}': '(?:[^.]+)',
};

/**
 * `{role}`, `{name}` and `{ext}` are tokens; everything else is literal.
 * Role is matched lazily, so `system-code-review.st` gives role `system` and name `code-review`.
 */
export function compileNamingPattern(pattern: string): NamingPattern {
    if (!pattern.includes('{role}') || !pattern.includes('{name}')) {
        throw new Error(`Naming pattern must contain {role} and {name}: ${pattern}`);
    }

    const body = pattern
        .split(/(\{role\}|\{name\}|\{ext\})/)
        .map(part => TOKENS[part] ?? escapeRegExp(part))
        .join('');
    const regex = new RegExp(`^${body}$`);

    return {
        source: pattern,
        match(filename: string) {
            const groups = regex.exec(filename)?.groups;
            if (!groups?.role || !groups.name) return null;
            return { role: groups.role, name: groups.name };
        },
    };
}

function orphan(filename: string): PromptGroup {
    return {
        name: path.parse(filename).name,
        roles: { [ORPHAN_ROLE]: filename },
        isOrphan: true,
    };
}

/**
 * For a (name, role) pair claimed twice, the lexicographically first filename
 * is kept and the others are reported in `duplicates`.
 */
export function discover(
    filenames: readonly string[],
    pattern: string | NamingPattern,
    options: DiscoveryOptions = {}
): DiscoveryResult {
    const naming = typeof pattern === 'string' ? compileNamingPattern(pattern) : pattern;
    const accepted = options.roles ? new Set(options.roles) : null;

    const byName = new Map<string, PromptGroup>();
    const orphans: PromptGroup[] = [];
    const duplicates: DuplicateGroupKey[] = [];

    for (const filename of [...filenames].sort()) {
        const parsed = naming.match(path.basename(filename));
        if (!parsed || (accepted && !accepted.has(parsed.role))) {
            orphans.push(orphan(filename));
            continue;
        }

        let group = byName.get(parsed.name);
        if (!group) {
            group = { name: parsed.name, roles: {}, isOrphan: false };
            byName.set(parsed.name, group);
        }

        const existing = group.roles[parsed.role];
        if (existing !== undefined) {
            duplicates.push({ name: parsed.name, role: parsed.role, kept: existing, ignored: filename });
            continue;
        }
        group.roles[parsed.role] = filename;
    }

    if (options.varFiles) {
        const ext = options.varExtension ?? '.yaml';
        const varByName = new Map<string, string>();
        for (const file of options.varFiles) {
            const base = path.basename(file);
            if (base.endsWith(ext)) varByName.set(base.slice(0, -ext.length), file);
        }
        for (const group of byName.values()) {
            const varFile = varByName.get(group.name);
            if (varFile) group.varFile = varFile;
            else group.isOrphan = true;
        }
    }

    const groups = [...byName.values(), ...orphans].sort((a, b) => {
        if (a.isOrphan !== b.isOrphan) return a.isOrphan ? 1 : -1;
        return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
    });

    return { groups, duplicates };
}

export function groupRoles(group: PromptGroup, roles: readonly string[]): { present: string[]; missing: string[] } {
    return {
        present: roles.filter(role => group.roles[role] !== undefined),
        missing: roles.filter(role => group.roles[role] === undefined),
    };
}
