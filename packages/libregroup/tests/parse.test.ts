// tests/parse.test.ts — Tests for subscription parsing
import { describe, it, expect } from 'vitest';
import { ParseError } from '../src/errors.js';
import { parseSubscription } from '../src/parse.js';

describe('parseSubscription', () => {
    it('reads proxies in input order', () => {
        const { entries, dropped } = parseSubscription([
            'proxies:',
            '  - { name: HK-01, type: ss, server: hk.example.com, port: 8388 }',
            '  - { name: US-01, type: trojan, server: us.example.com, port: 443 }',
        ].join('\n'));
        expect(entries.map(e => e.name)).toEqual(['HK-01', 'US-01']);
        expect(entries[1].fields).toEqual({ name: 'US-01', type: 'trojan', server: 'us.example.com', port: 443n });
        expect(dropped).toEqual([]);
    });

    it('reads integers beyond 2^53 without rounding', () => {
        const { entries } = parseSubscription([
            'proxies:',
            '  - { name: HK-01, type: ss, password: 12345678901234567890, ratio: 1.5 }',
        ].join('\n'));
        expect(entries[0].fields.password).toBe(12345678901234567890n);
        expect(entries[0].fields.ratio).toBe(1.5);
    });

    it('ignores unrelated top-level keys', () => {
        const { entries } = parseSubscription('port: 7890\nrules: []\nproxies: []\n');
        expect(entries).toEqual([]);
    });

    it('resolves merge keys in the input', () => {
        const { entries } = parseSubscription([
            'base: &base',
            '  type: ss',
            '  server: example.com',
            'proxies:',
            '  - name: HK-01',
            '    <<: *base',
        ].join('\n'));
        expect(entries[0].fields).toEqual({ name: 'HK-01', type: 'ss', server: 'example.com' });
    });

    it('keeps the first of duplicate names', () => {
        const { entries, dropped } = parseSubscription([
            'proxies:',
            '  - { name: HK-01, server: a.example.com }',
            '  - { name: HK-01, server: b.example.com }',
            '  - { name: HK-02, server: c.example.com }',
        ].join('\n'));
        expect(entries.map(e => e.fields.server)).toEqual(['a.example.com', 'c.example.com']);
        expect(dropped).toEqual(['HK-01']);
    });
});

describe('parseSubscription — errors', () => {
    it('rejects malformed YAML', () => {
        expect(() => parseSubscription('proxies: [')).toThrow(ParseError);
        expect(() => parseSubscription('proxies: [')).toThrow(/^Failed to parse YAML: /);
    });

    it('rejects non-mapping roots', () => {
        expect(() => parseSubscription('just text')).toThrow('Subscription must be a YAML mapping');
        expect(() => parseSubscription('- a\n- b\n')).toThrow('Subscription must be a YAML mapping');
    });

    it('rejects a missing proxies list', () => {
        expect(() => parseSubscription('rules: []')).toThrow('Subscription has no proxies list');
        expect(() => parseSubscription('proxies:')).toThrow('Subscription has no proxies list');
    });

    it('rejects a non-list proxies value', () => {
        expect(() => parseSubscription('proxies: 5')).toThrow('proxies must be a list, got bigint');
    });

    it('rejects malformed entries', () => {
        expect(() => parseSubscription('proxies:\n  - 1\n')).toThrow('proxies[0] must be a mapping');
        expect(() => parseSubscription('proxies:\n  - { name: a }\n  - { type: ss }\n'))
            .toThrow('proxies[1] has no string name');
        expect(() => parseSubscription('proxies:\n  - { name: 42 }\n'))
            .toThrow('proxies[0] has no string name');
    });

    it('carries the error code', () => {
        try {
            parseSubscription('proxies: 5');
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(ParseError);
            expect(err).toMatchObject({ code: 'PARSE_ERROR', name: 'ParseError' });
        }
    });
});
