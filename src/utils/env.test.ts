import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { envBool, envPositiveInt, envTimeoutMs, parsePositiveInt } from './env.js';
import { isSupportedNodeVersion } from './node-version.js';

describe('env helpers', () => {
    it('envBool should accept common truthy spellings and default on blanks', () => {
        expect(envBool('YES', false)).toBe(true);
        expect(envBool(' on ', false)).toBe(true);
        expect(envBool('off', true)).toBe(false);
        expect(envBool('', true)).toBe(true);
        expect(envBool(undefined, false)).toBe(false);
    });

    it('envPositiveInt should default on zero, fractions and junk', () => {
        expect(envPositiveInt('12', 8)).toBe(12);
        expect(envPositiveInt('0', 8)).toBe(8);
        expect(envPositiveInt('2.5', 8)).toBe(8);
        expect(envPositiveInt('lots', 8)).toBe(8);
    });

    it('parsePositiveInt should reject instead of defaulting', () => {
        expect(parsePositiveInt('3')).toBe(3);
        expect(() => parsePositiveInt('0')).toThrow('Expected a positive integer, got "0"');
        expect(() => parsePositiveInt('abc')).toThrow(InvalidArgumentError);
    });

    it('envTimeoutMs should fall back for missing or non-positive values', () => {
        expect(envTimeoutMs('1500', 90_000)).toBe(1500);
        expect(envTimeoutMs('-1', 90_000)).toBe(90_000);
        expect(envTimeoutMs(undefined, 90_000)).toBe(90_000);
    });
});

describe('isSupportedNodeVersion', () => {
    it('should compare the major version', () => {
        expect(isSupportedNodeVersion('20.11.1')).toBe(true);
        expect(isSupportedNodeVersion('v22.0.0')).toBe(true);
        expect(isSupportedNodeVersion('18.19.0')).toBe(false);
        expect(isSupportedNodeVersion('garbage')).toBe(false);
    });
});
