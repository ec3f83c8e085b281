// libregroup/src/registry.ts
// Region pattern registry. Order is the tie-break: a name matching several
// patterns lands in the first listed bucket. The catch-all must come last.

import { ConfigError } from './errors.js';
import { INFO_BUCKET } from './info.js';
import { matches, regexMatcher } from './matcher.js';
import type { CompiledRegistryEntry, PatternRegistry, RegistryEntry } from './types.js';

export const CATCH_ALL_PATTERN = '.*';

export const DEFAULT_REGISTRY_ENTRIES: readonly RegistryEntry[] = [
    { name: '香港负载组', pattern: '港|hk|hongkong|hong kong' },
    { name: '台湾负载组', pattern: '台|tw|taiwan' },
    { name: '日本负载组', pattern: '日|jp|japan' },
    { name: '新加坡负载组', pattern: '新|sg|singapore' },
    { name: '美国负载组', pattern: '美|us|usa|united states|america' },
    { name: '韩国负载组', pattern: '韩|kr|korea' },
    { name: '英国负载组', pattern: '英|uk|britain|united kingdom' },
    { name: '德国负载组', pattern: '德|de|germany' },
    { name: '法国负载组', pattern: '法|fr|france' },
    { name: '加拿大负载组', pattern: '加|ca|canada' },
    { name: '澳大利亚负载组', pattern: '澳|au|australia' },
    { name: '马来西亚负载组', pattern: '马来|my|malaysia' },
    { name: '土耳其负载组', pattern: '土耳其|tr|turkey' },
    { name: '阿根廷负载组', pattern: '阿根廷|ar|argentina' },
    { name: '其他负载组', pattern: CATCH_ALL_PATTERN },
];

/**
 * Validate and compile a registry.
 *
 * Rejects an empty list, blank, reserved or duplicate bucket names, empty or
 * invalid patterns, and a list whose last entry is not the catch-all (`.*`).
 */
export function compileRegistry(entries: readonly RegistryEntry[]): PatternRegistry {
    if (entries.length === 0) {
        throw new ConfigError('Registry must contain at least the catch-all entry');
    }

    const seen = new Set<string>();
    const compiled: CompiledRegistryEntry[] = entries.map(({ name, pattern }, index) => {
        if (!name.trim()) {
            throw new ConfigError(`Registry entry #${index} has an empty bucket name`);
        }
        if (name === INFO_BUCKET) {
            throw new ConfigError(`Registry bucket name ${INFO_BUCKET} is reserved for info nodes`);
        }
        if (seen.has(name)) {
            throw new ConfigError(`Duplicate registry bucket: ${name}`);
        }
        seen.add(name);
        if (!pattern) {
            throw new ConfigError(`Registry bucket ${name} has an empty pattern`);
        }
        try {
            return { name, matcher: regexMatcher(pattern) };
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            throw new ConfigError(`Registry bucket ${name} has an invalid pattern: ${reason}`);
        }
    });

    const catchAll = compiled[compiled.length - 1];
    if (catchAll.matcher.source !== CATCH_ALL_PATTERN) {
        throw new ConfigError(
            `Last registry entry must be the catch-all (${CATCH_ALL_PATTERN}), got ${catchAll.name}`,
        );
    }
    const misplaced = compiled.slice(0, -1).find(e => e.matcher.source === CATCH_ALL_PATTERN);
    if (misplaced) {
        throw new ConfigError(`Catch-all bucket ${misplaced.name} must be the last entry`);
    }

    return { entries: compiled, catchAll };
}

export const DEFAULT_REGISTRY: PatternRegistry = compileRegistry(DEFAULT_REGISTRY_ENTRIES);

/** First entry whose pattern matches `name`; the catch-all otherwise. */
export function lookupEntry(registry: PatternRegistry, name: string): CompiledRegistryEntry {
    for (const entry of registry.entries) {
        if (entry === registry.catchAll) break;
        if (matches(entry.matcher, name)) return entry;
    }
    return registry.catchAll;
}

/** Bucket name for `name` under `registry`. */
export function lookupBucket(registry: PatternRegistry, name: string): string {
    return lookupEntry(registry, name).name;
}

/** Pattern bodies of every entry listed before `bucketName`. */
export function precedingPatterns(registry: PatternRegistry, bucketName: string): string[] {
    const sources: string[] = [];
    for (const entry of registry.entries) {
        if (entry.name === bucketName) return sources;
        sources.push(entry.matcher.source);
    }
    throw new ConfigError(`Unknown registry bucket: ${bucketName}`);
}
