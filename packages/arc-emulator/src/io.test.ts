/**
 * ARC Emulator - I/O Device Tests
 *
 * SPDX-License-Identifier: MIT
 */

import { describe, test, expect } from 'vitest';
import { IoDevice } from './io';
import { tokenValue } from './instructions/io';

describe('IoDevice', () => {
    test('peekToken skips leading whitespace and does not consume', () => {
        const io = new IoDevice('  12\t-3');
        expect(io.peekToken()).toEqual({ text: '12', end: 4 });
        expect(io.input).toBe('  12\t-3');

        io.consume(4);
        expect(io.peekToken()).toEqual({ text: '-3', end: 3 });
        io.consume(3);
        expect(io.peekToken()).toBeNull();
    });

    test('input is held as UTF-8 bytes', () => {
        const io = new IoDevice('é!');
        expect(Array.from(io.peekBytes())).toEqual([0xC3, 0xA9, 0x21]);
        io.consume(2);
        expect(io.input).toBe('!');
    });

    test('reset replaces input and clears output', () => {
        const io = new IoDevice('a');
        io.write('x');
        io.reset('b');
        expect(io.input).toBe('b');
        expect(io.output).toBe('');
    });

    test('token values', () => {
        expect(tokenValue('42')).toBe(42);
        expect(tokenValue('-1')).toBe(0xFFFFFFFF);
        expect(tokenValue('4x')).toBe(0);
        expect(tokenValue(undefined)).toBe(0);
    });
});
