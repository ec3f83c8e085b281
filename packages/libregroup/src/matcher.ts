// libregroup/src/matcher.ts
// Matcher constructors and dispatch. Patterns are kept as bodies and only
// receive the `(?i)` prefix when handed to the client.

import type { Matcher, RegexMatcher, StemMatcher } from './types.js';

export const CASE_INSENSITIVE_PREFIX = '(?i)';

/**
 * Compile a case-insensitive pattern body. Throws `SyntaxError` for an
 * invalid body; callers decide how to report it.
 */
export function regexMatcher(source: string): RegexMatcher {
    return { kind: 'regex', source, regex: new RegExp(source, 'i') };
}

export function stemMatcher(stem: string): StemMatcher {
    return { kind: 'stem', stem };
}

/**
 * Test a name against a matcher. Stem matchers compare the decomposed stem,
 * so the caller passes the stem it already computed.
 */
export function matches(matcher: Matcher, name: string, stem?: string): boolean {
    switch (matcher.kind) {
        case 'regex':
            return matcher.regex.test(name);
        case 'stem':
            return (stem ?? name) === matcher.stem;
    }
}

/** Client-side filter string for a pattern body. */
export function clientFilter(source: string): string {
    return `${CASE_INSENSITIVE_PREFIX}${source}`;
}

/** Union of pattern bodies as one client-side filter, or undefined if none. */
export function unionFilter(sources: readonly string[]): string | undefined {
    if (sources.length === 0) return undefined;
    return clientFilter(sources.join('|'));
}
