/**
 * ARC Emulator - Configuration Tests
 *
 * SPDX-License-Identifier: MIT
 */

import { describe, test, expect } from 'vitest';
import { parseMemorySize, resolveEmulatorConfig, formatMemorySize } from './config';
import { ConfigError } from './errors';

describe('parseMemorySize', () => {
    test('suffixes are 1024-based and case-insensitive', () => {
        expect(parseMemorySize('64KB')).toBe(65536);
        expect(parseMemorySize('1 mb')).toBe(1048576);
        expect(parseMemorySize('8MB')).toBe(8388608);
        expect(parseMemorySize('131072')).toBe(131072);
    });

    test('sizes outside 64KB–8MB are rejected', () => {
        expect(() => parseMemorySize('32KB')).toThrow(ConfigError);
        expect(() => parseMemorySize('32KB')).toThrow("Memory size '32KB' is out of range (valid: 64KB–8MB)");
        expect(() => parseMemorySize('9MB')).toThrow(ConfigError);
    });

    test('malformed text', () => {
        expect(() => parseMemorySize('lots')).toThrow(ConfigError);
        expect(() => parseMemorySize('64GB')).toThrow(ConfigError);
    });
});

describe('resolveEmulatorConfig', () => {
    test('defaults to 64KB', () => {
        expect(resolveEmulatorConfig({}, {})).toEqual({ memorySize: 65536 });
    });

    test('falls back to ARC_MEMORY', () => {
        expect(resolveEmulatorConfig({}, { ARC_MEMORY: '128KB' })).toEqual({ memorySize: 131072 });
    });

    test('an explicit size wins over the environment', () => {
        expect(resolveEmulatorConfig({ memorySize: '1MB' }, { ARC_MEMORY: '128KB' })).toEqual({ memorySize: 1048576 });
        expect(resolveEmulatorConfig({ memorySize: 262144 }, {})).toEqual({ memorySize: 262144 });
    });
});

describe('formatMemorySize', () => {
    test('uses the largest exact unit', () => {
        expect(formatMemorySize(65536)).toBe('64KB');
        expect(formatMemorySize(1048576)).toBe('1MB');
        expect(formatMemorySize(65537)).toBe('65537B');
    });
});
