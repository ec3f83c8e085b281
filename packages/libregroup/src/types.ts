// libregroup/src/types.ts
// Core type definitions for classification, group synthesis and emission.

// ─── Proxies ────────────────────────────────────────────────────────

/**
 * One proxy definition from the subscription.
 *
 * `fields` is the original mapping (including `name`) and is emitted
 * untouched. Groups never embed entries; they refer to them by `name`.
 */
export interface ProxyEntry {
    readonly name: string;
    readonly fields: Readonly<Record<string, unknown>>;
}

// ─── Matchers ───────────────────────────────────────────────────────

/** Case-insensitive regular expression over the display name. */
export interface RegexMatcher {
    readonly kind: 'regex';
    /** Pattern body without the `(?i)` prefix. */
    readonly source: string;
    readonly regex: RegExp;
}

/** Exact (case-sensitive) comparison against a decomposed stem. */
export interface StemMatcher {
    readonly kind: 'stem';
    readonly stem: string;
}

export type Matcher = RegexMatcher | StemMatcher;

// ─── Registry ───────────────────────────────────────────────────────

/** A registry entry as written by hand (pattern body, no `(?i)`). */
export interface RegistryEntry {
    name: string;
    pattern: string;
}

export interface CompiledRegistryEntry {
    readonly name: string;
    readonly matcher: RegexMatcher;
}

/**
 * Ordered list of region buckets. First match wins; the last entry is
 * the catch-all and matches every name.
 */
export interface PatternRegistry {
    readonly entries: readonly CompiledRegistryEntry[];
    readonly catchAll: CompiledRegistryEntry;
}

// ─── Buckets ────────────────────────────────────────────────────────

export type BucketKind = 'region' | 'info' | 'catch-all';

export interface Bucket {
    readonly name: string;
    readonly kind: BucketKind;
    /** Absent for the info bucket, which is routed by the info predicate. */
    readonly matcher?: Matcher;
    readonly members: readonly string[];
}

/** Bucket name → bucket, in classification order. */
export type BucketMap = ReadonlyMap<string, Bucket>;

export type ClassifyStrategy =
    | { kind: 'registry'; registry: PatternRegistry; includeEmptyBuckets: boolean }
    | { kind: 'decompose' };

export interface ClassifyOptions {
    strategy: ClassifyStrategy;
    detectInfoNodes: boolean;
}

// ─── Groups ─────────────────────────────────────────────────────────

export interface SelectGroup {
    readonly type: 'select';
    readonly name: string;
    readonly proxies: readonly string[];
}

export interface LoadBalanceGroup {
    readonly type: 'load-balance';
    readonly name: string;
    readonly proxies?: readonly string[];
    readonly includeAll?: boolean;
    readonly filter?: string;
    readonly excludeFilter?: string;
    readonly url: string;
    readonly interval: number;
    readonly strategy: string;
}

export type Group = SelectGroup | LoadBalanceGroup;

// ─── Conversion ─────────────────────────────────────────────────────

export type ConvertMode = 'registry' | 'auto';

export interface ConvertOptions {
    mode: ConvertMode;
    includeEmptyBuckets: boolean;
    detectInfoNodes: boolean;
    /** Prepend the general client settings (ports, mode, log level). */
    general: boolean;
    /** Overrides the built-in registry in `registry` mode. */
    registry?: PatternRegistry;
}
