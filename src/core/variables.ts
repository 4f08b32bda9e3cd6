/**
 * CORE: Variable Resolver
 * (VariableSpec, workspaceRoot) -> Result<string, VariableError>
 * File variables are read at call time. Nothing is cached.
 */

import fs from 'fs-extra';
import path from 'path';
import { TextDecoder } from 'util';
import type { Result, VariableNamespace, VariableSpec } from './types';

export type VariableErrorKind = 'FileNotFound' | 'FileUnreadable';

export interface VariableError {
    kind: VariableErrorKind;
    path: string;
    message: string;
}

export function valueVariable(content: string): VariableSpec {
    return { type: 'value', content };
}

export function fileVariable(filePath: string): VariableSpec {
    return { type: 'file', path: filePath };
}

/** Paths are joined naively; `..` may leave the workspace root. */
export function resolveVariablePath(spec: { path: string }, workspaceRoot: string): string {
    return path.resolve(workspaceRoot, spec.path);
}

function errorCode(err: unknown): string | undefined {
    if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
        return err.code;
    }
    return undefined;
}

function readUtf8(fullPath: string): Result<string, VariableError> {
    let bytes: Buffer;
    try {
        bytes = fs.readFileSync(fullPath);
    } catch (err) {
        const code = errorCode(err);
        if (code === 'ENOENT' || code === 'ENOTDIR') {
            return { ok: false, error: { kind: 'FileNotFound', path: fullPath, message: `File not found: ${fullPath}` } };
        }
        const reason = err instanceof Error ? err.message : String(err);
        return { ok: false, error: { kind: 'FileUnreadable', path: fullPath, message: `Cannot read ${fullPath}: ${reason}` } };
    }

    try {
        return { ok: true, value: new TextDecoder('utf-8', { fatal: true }).decode(bytes) };
    } catch {
        return {
            ok: false,
            error: { kind: 'FileUnreadable', path: fullPath, message: `File is not valid UTF-8 text: ${fullPath}` },
        };
    }
}

export function resolveVariable(spec: VariableSpec, workspaceRoot: string): Result<string, VariableError> {
    switch (spec.type) {
        case 'value':
            return { ok: true, value: spec.content };
        case 'file':
            return readUtf8(resolveVariablePath(spec, workspaceRoot));
        default: {
            const unreachable: never = spec;
            throw new Error(`Unknown variable type: ${JSON.stringify(unreachable)}`);
        }
    }
}

/** One-line summary for listings. */
export function describeVariable(spec: VariableSpec, maxLength = 50): string {
    switch (spec.type) {
        case 'value': {
            const flat = spec.content.replace(/\s+/g, ' ');
            return flat.length > maxLength ? `value: ${flat.slice(0, maxLength)}...` : `value: ${flat}`;
        }
        case 'file':
            return `file: ${spec.path}`;
        default: {
            const unreachable: never = spec;
            throw new Error(`Unknown variable type: ${JSON.stringify(unreachable)}`);
        }
    }
}

/** Later namespaces override earlier ones. */
export function mergeNamespaces(...layers: Array<VariableNamespace | undefined>): VariableNamespace {
    const merged: VariableNamespace = {};
    for (const layer of layers) {
        if (layer) Object.assign(merged, layer);
    }
    return merged;
}
