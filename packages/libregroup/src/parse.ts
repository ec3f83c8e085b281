// libregroup/src/parse.ts
// Subscription parsing: YAML text to proxy entries.

import YAML from 'yaml';
import { ParseError } from './errors.js';
import { logger } from './logger.js';
import type { ProxyEntry } from './types.js';

export interface ParsedSubscription {
    /** Unique by name, first occurrence kept, input order preserved. */
    entries: ProxyEntry[];
    /** Names of later duplicates that were dropped. */
    dropped: string[];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a subscription document.
 *
 * Throws `ParseError` when the text is not YAML, the root is not a mapping,
 * `proxies` is missing or not a list, or an entry is not a mapping with a
 * string `name`.
 */
export function parseSubscription(text: string): ParsedSubscription {
    let root: unknown;
    try {
        // Integers beyond 2^53 (ids, numeric passwords) must survive unchanged.
        root = YAML.parse(text, { merge: true, intAsBigInt: true });
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ParseError(`Failed to parse YAML: ${reason}`, { cause: err });
    }

    if (!isPlainObject(root)) {
        throw new ParseError('Subscription must be a YAML mapping');
    }
    const rawProxies = root.proxies;
    if (rawProxies === undefined || rawProxies === null) {
        throw new ParseError('Subscription has no proxies list');
    }
    if (!Array.isArray(rawProxies)) {
        throw new ParseError(`proxies must be a list, got ${typeof rawProxies}`);
    }

    const entries: ProxyEntry[] = [];
    const dropped: string[] = [];
    const seen = new Set<string>();
    rawProxies.forEach((raw: unknown, index) => {
        if (!isPlainObject(raw)) {
            throw new ParseError(`proxies[${index}] must be a mapping`);
        }
        const name = raw.name;
        if (typeof name !== 'string') {
            throw new ParseError(`proxies[${index}] has no string name`);
        }
        if (seen.has(name)) {
            dropped.push(name);
            return;
        }
        seen.add(name);
        entries.push({ name, fields: raw });
    });

    if (dropped.length > 0) {
        logger.warn(`Dropped ${dropped.length} duplicate proxies: ${dropped.join(', ')}`);
    }
    return { entries, dropped };
}
