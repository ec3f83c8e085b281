// tests/registry.test.ts — Tests for the region pattern registry
import { describe, it, expect } from 'vitest';
import {
    CATCH_ALL_PATTERN, DEFAULT_REGISTRY, DEFAULT_REGISTRY_ENTRIES,
    compileRegistry, lookupBucket, lookupEntry, precedingPatterns,
} from '../src/registry.js';
import { ConfigError } from '../src/errors.js';

const HK_US = compileRegistry([
    { name: '香港负载组', pattern: 'hk' },
    { name: '美国负载组', pattern: 'us' },
    { name: '其他负载组', pattern: '.*' },
]);

// ─── Default registry ───────────────────────────────────────────────

describe('DEFAULT_REGISTRY', () => {
    it('ends with the catch-all', () => {
        expect(DEFAULT_REGISTRY.catchAll.name).toBe('其他负载组');
        expect(DEFAULT_REGISTRY.catchAll.matcher.source).toBe(CATCH_ALL_PATTERN);
        expect(DEFAULT_REGISTRY.entries[DEFAULT_REGISTRY.entries.length - 1])
            .toBe(DEFAULT_REGISTRY.catchAll);
    });

    it('keeps the declared order', () => {
        expect(DEFAULT_REGISTRY.entries.map(e => e.name))
            .toEqual(DEFAULT_REGISTRY_ENTRIES.map(e => e.name));
        expect(DEFAULT_REGISTRY.entries.slice(0, 3).map(e => e.name))
            .toEqual(['香港负载组', '台湾负载组', '日本负载组']);
    });

    it('classifies common region names', () => {
        expect(lookupBucket(DEFAULT_REGISTRY, '🇭🇰 香港 01')).toBe('香港负载组');
        expect(lookupBucket(DEFAULT_REGISTRY, 'HK-02')).toBe('香港负载组');
        expect(lookupBucket(DEFAULT_REGISTRY, 'Taiwan 01')).toBe('台湾负载组');
        expect(lookupBucket(DEFAULT_REGISTRY, '日本东京')).toBe('日本负载组');
        expect(lookupBucket(DEFAULT_REGISTRY, 'Singapore 02')).toBe('新加坡负载组');
        expect(lookupBucket(DEFAULT_REGISTRY, 'US-01')).toBe('美国负载组');
        expect(lookupBucket(DEFAULT_REGISTRY, '土耳其 01')).toBe('土耳其负载组');
    });

    it('falls back to the catch-all', () => {
        expect(lookupBucket(DEFAULT_REGISTRY, '🇮🇳 印度 01')).toBe('其他负载组');
    });

    it('is case-insensitive', () => {
        expect(lookupBucket(DEFAULT_REGISTRY, 'hongkong-01')).toBe('香港负载组');
        expect(lookupBucket(DEFAULT_REGISTRY, 'HONG KONG 01')).toBe('香港负载组');
    });
});

// ─── First match wins ───────────────────────────────────────────────

describe('lookupBucket', () => {
    it('picks the first listed bucket when several match', () => {
        expect(lookupBucket(HK_US, 'hk-us-relay')).toBe('香港负载组');
        expect(lookupBucket(HK_US, 'us-hk-relay')).toBe('香港负载组');
    });

    it('returns the catch-all for unmatched names', () => {
        expect(lookupEntry(HK_US, 'JP-01')).toBe(HK_US.catchAll);
    });

    it('matches the empty string only with the catch-all', () => {
        expect(lookupBucket(HK_US, '')).toBe('其他负载组');
    });

    it('is stable across repeated calls', () => {
        const first = lookupBucket(HK_US, 'US-01');
        expect(lookupBucket(HK_US, 'US-01')).toBe(first);
        expect(lookupBucket(HK_US, 'US-01')).toBe('美国负载组');
    });
});

describe('precedingPatterns', () => {
    it('lists the bodies of earlier entries', () => {
        expect(precedingPatterns(HK_US, '香港负载组')).toEqual([]);
        expect(precedingPatterns(HK_US, '美国负载组')).toEqual(['hk']);
        expect(precedingPatterns(HK_US, '其他负载组')).toEqual(['hk', 'us']);
    });

    it('throws for unknown buckets', () => {
        expect(() => precedingPatterns(HK_US, 'nope')).toThrow(ConfigError);
    });
});

// ─── Validation ─────────────────────────────────────────────────────

describe('compileRegistry', () => {
    it('rejects an empty registry', () => {
        expect(() => compileRegistry([])).toThrow(/at least the catch-all/);
    });

    it('rejects a registry without a trailing catch-all', () => {
        expect(() => compileRegistry([{ name: 'HK', pattern: 'hk' }]))
            .toThrow(/Last registry entry must be the catch-all/);
    });

    it('rejects a catch-all that is not last', () => {
        expect(() => compileRegistry([
            { name: 'Any', pattern: '.*' },
            { name: 'HK', pattern: 'hk' },
            { name: 'Rest', pattern: '.*' },
        ])).toThrow(/Catch-all bucket Any must be the last entry/);
    });

    it('rejects duplicate bucket names', () => {
        expect(() => compileRegistry([
            { name: 'HK', pattern: 'hk' },
            { name: 'HK', pattern: 'hong kong' },
            { name: 'Rest', pattern: '.*' },
        ])).toThrow(/Duplicate registry bucket: HK/);
    });

    it('rejects the reserved info bucket name', () => {
        expect(() => compileRegistry([
            { name: '订阅信息', pattern: 'info' },
            { name: 'Rest', pattern: '.*' },
        ])).toThrow(/reserved/);
    });

    it('rejects invalid and empty patterns', () => {
        expect(() => compileRegistry([
            { name: 'Broken', pattern: '(' },
            { name: 'Rest', pattern: '.*' },
        ])).toThrow(/Broken has an invalid pattern/);
        expect(() => compileRegistry([
            { name: 'Empty', pattern: '' },
            { name: 'Rest', pattern: '.*' },
        ])).toThrow(/Empty has an empty pattern/);
    });

    it('rejects blank bucket names', () => {
        expect(() => compileRegistry([{ name: ' ', pattern: '.*' }]))
            .toThrow(/empty bucket name/);
    });

    it('accepts a catch-all-only registry', () => {
        const registry = compileRegistry([{ name: 'All', pattern: '.*' }]);
        expect(registry.entries).toHaveLength(1);
        expect(lookupBucket(registry, 'anything')).toBe('All');
    });
});
