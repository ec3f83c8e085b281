// libregroup/src/convert.ts
// Conversion pipeline: parse → classify → synthesize → validate → emit.
// Synchronous and pure apart from logging; each call owns all its state.

import { validateGroups } from './arena.js';
import { classify } from './classify.js';
import { emitDocument } from './emit.js';
import { GENERAL_SETTINGS, defaultRules } from './groups.js';
import { logger } from './logger.js';
import { parseSubscription } from './parse.js';
import { DEFAULT_REGISTRY } from './registry.js';
import { resolveFixedNames, synthesizeGroups } from './synthesize.js';
import type { BucketMap, ClassifyOptions, ConvertOptions, Group, ProxyEntry } from './types.js';

export const DEFAULT_CONVERT_OPTIONS: Readonly<ConvertOptions> = {
    mode: 'registry',
    includeEmptyBuckets: false,
    detectInfoNodes: true,
    general: false,
};

export interface ConversionResult {
    text: string;
    proxies: ProxyEntry[];
    buckets: BucketMap;
    /** Groups in emission order. */
    groups: Group[];
}

export function classifyOptionsFor(options: ConvertOptions): ClassifyOptions {
    return {
        strategy: options.mode === 'auto'
            ? { kind: 'decompose' }
            : {
                kind: 'registry',
                registry: options.registry ?? DEFAULT_REGISTRY,
                includeEmptyBuckets: options.includeEmptyBuckets,
            },
        detectInfoNodes: options.detectInfoNodes,
    };
}

/**
 * Convert subscription text and keep the intermediate results.
 * Throws a `ConvertError` subclass on any failure; nothing partial is returned.
 */
export function convert(text: string, overrides: Partial<ConvertOptions> = {}): ConversionResult {
    const options: ConvertOptions = { ...DEFAULT_CONVERT_OPTIONS, ...overrides };
    const classifyOptions = classifyOptionsFor(options);

    const { entries } = parseSubscription(text);
    const names = entries.map(e => e.name);

    const buckets = classify(entries, classifyOptions);
    logger.debug(
        `Classified ${entries.length} proxies into ${buckets.size} buckets: ` +
        [...buckets.values()].map(b => `${b.name}(${b.members.length})`).join(', '),
    );

    const arena = synthesizeGroups(buckets, names, classifyOptions);
    validateGroups(arena, names);
    const groups = arena.ordered();

    const output = emitDocument({
        proxies: entries,
        groups,
        rules: defaultRules(resolveFixedNames(names)),
        general: options.general ? GENERAL_SETTINGS : undefined,
    });

    return { text: output, proxies: entries, buckets, groups };
}

/** Convert subscription text to the regrouped configuration document. */
export function convertSubscription(text: string, options: Partial<ConvertOptions> = {}): string {
    return convert(text, options).text;
}
