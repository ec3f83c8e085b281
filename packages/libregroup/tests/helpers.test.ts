// tests/helpers.test.ts — Tests for argument parsing helpers
import { describe, it, expect } from 'vitest';
import { ConfigError } from '../src/errors.js';
import {
    CONVERT_MODES, parseBool, parseConvertArgs, parseEnum, parseNumber, parseString,
} from '../src/helpers.js';

// ─── parseBool ──────────────────────────────────────────────────────

describe('parseBool', () => {
    it('returns default for null/undefined', () => {
        expect(parseBool(null)).toBe(false);
        expect(parseBool(undefined)).toBe(false);
        expect(parseBool(undefined, true)).toBe(true);
    });

    it('passes through boolean values', () => {
        expect(parseBool(true)).toBe(true);
        expect(parseBool(false)).toBe(false);
    });

    it('parses string variants (case insensitive)', () => {
        expect(parseBool('True')).toBe(true);
        expect(parseBool('FALSE')).toBe(false);
        expect(parseBool('1')).toBe(true);
        expect(parseBool('0')).toBe(false);
    });

    it('throws ConfigError on anything else', () => {
        expect(() => parseBool('yes')).toThrow(ConfigError);
        expect(() => parseBool(42)).toThrow('Invalid boolean value: 42');
    });
});

// ─── parseNumber / parseString ──────────────────────────────────────

describe('parseNumber', () => {
    it('parses integers and falls back on NaN', () => {
        expect(parseNumber('8080')).toBe(8080);
        expect(parseNumber('3.9')).toBe(3);
        expect(parseNumber('abc', 5)).toBe(5);
        expect(parseNumber(undefined, 99)).toBe(99);
    });
});

describe('parseString', () => {
    it('stringifies values and falls back on null/undefined', () => {
        const parser = parseString('default');
        expect(parser(undefined)).toBe('default');
        expect(parser('x')).toBe('x');
        expect(parser(12)).toBe('12');
    });
});

// ─── parseEnum ──────────────────────────────────────────────────────

describe('parseEnum', () => {
    const parseMode = parseEnum(CONVERT_MODES, 'registry');

    it('accepts allowed values', () => {
        expect(parseMode('auto')).toBe('auto');
        expect(parseMode('registry')).toBe('registry');
    });

    it('uses the default for missing or empty values', () => {
        expect(parseMode(undefined)).toBe('registry');
        expect(parseMode('')).toBe('registry');
    });

    it('rejects other values', () => {
        expect(() => parseMode('AUTO')).toThrow('Invalid value AUTO; expected one of registry, auto');
    });
});

// ─── parseConvertArgs ───────────────────────────────────────────────

describe('parseConvertArgs', () => {
    it('fills in defaults', () => {
        expect(parseConvertArgs({})).toEqual({
            mode: 'registry',
            includeEmptyBuckets: false,
            detectInfoNodes: true,
            general: false,
        });
    });

    it('reads every option', () => {
        expect(parseConvertArgs({
            mode: 'auto',
            includeEmptyBuckets: '1',
            infoNodes: 'false',
            general: 'true',
            url: 'https://example.com/sub',
        })).toEqual({
            mode: 'auto',
            includeEmptyBuckets: true,
            detectInfoNodes: false,
            general: true,
        });
    });

    it('throws on invalid values', () => {
        expect(() => parseConvertArgs({ mode: 'fast' })).toThrow(ConfigError);
        expect(() => parseConvertArgs({ general: 'maybe' })).toThrow(/Invalid boolean value/);
    });
});
