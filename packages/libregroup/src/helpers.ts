// libregroup/src/helpers.ts
// Argument parsing: raw query/env values to strongly-typed settings.

import { ConfigError } from './errors.js';
import type { ConvertMode, ConvertOptions } from './types.js';

// ─── Value Parsers ──────────────────────────────────────────────────

export function parseBool(value: unknown, defaultValue = false): boolean {
    if (value === null || typeof value === 'undefined') return defaultValue;
    if (typeof value === 'boolean') return value;
    if (typeof value === 'string') {
        if (value.toLowerCase() === 'true' || value === '1') return true;
        if (value.toLowerCase() === 'false' || value === '0') return false;
    }
    throw new ConfigError(`Invalid boolean value: ${String(value)}`);
}

export function parseNumber(value: unknown, defaultValue = 0): number {
    if (value === null || typeof value === 'undefined') return defaultValue;
    const num = parseInt(String(value), 10);
    return isNaN(num) ? defaultValue : num;
}

export function parseString(defaultValue: string): (value: unknown) => string {
    return (value: unknown): string => {
        if (value === null || typeof value === 'undefined') return defaultValue;
        return String(value);
    };
}

export function parseEnum<T extends string>(
    allowed: readonly T[],
    defaultValue: T,
): (value: unknown) => T {
    return (value: unknown): T => {
        if (value === null || typeof value === 'undefined' || value === '') return defaultValue;
        const found = allowed.find(candidate => candidate === String(value));
        if (found === undefined) {
            throw new ConfigError(
                `Invalid value ${String(value)}; expected one of ${allowed.join(', ')}`,
            );
        }
        return found;
    };
}

// ─── Conversion Arguments ───────────────────────────────────────────

export const CONVERT_MODES: readonly ConvertMode[] = ['registry', 'auto'];

/**
 * Parse user-provided conversion arguments (query parameters).
 *
 * Unknown fields are ignored.
 * Missing values fall back to defaults:
 * - `mode: 'registry'`
 * - `includeEmptyBuckets: false`
 * - `infoNodes: true`
 * - `general: false`
 */
export function parseConvertArgs(args: Record<string, unknown>): ConvertOptions {
    return {
        mode: parseEnum(CONVERT_MODES, 'registry')(args.mode),
        includeEmptyBuckets: parseBool(args.includeEmptyBuckets),
        detectInfoNodes: parseBool(args.infoNodes, true),
        general: parseBool(args.general),
    };
}
