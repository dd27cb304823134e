/**
 * ARC Emulator - Main Memory
 *
 * SPDX-License-Identifier: MIT
 *
 * Flat byte-addressed memory. All multi-byte access is little-endian and
 * bounds-checked: an access of N bytes at A requires A + N <= size.
 */

import { hex } from '@arc/assembler';
import { EmulatorFault } from './errors';

const utf8Decoder = new TextDecoder();

export class Memory {
    readonly size: number;
    private bytes: Uint8Array;
    private view: DataView;

    constructor(size: number) {
        this.size = size;
        this.bytes = new Uint8Array(size);
        this.view = new DataView(this.bytes.buffer);
    }

    private check(addr: number, length: number): void {
        if (!Number.isInteger(addr) || addr < 0 || addr + length > this.size) {
            throw new EmulatorFault(
                'MEMORY_OUT_OF_BOUNDS',
                `${length}-byte access at ${hex(Math.max(addr, 0), 4)} is outside memory (size ${hex(this.size, 4)})`
            );
        }
    }

    // =========================================================================
    // Reads
    // =========================================================================

    readU8(addr: number): number {
        this.check(addr, 1);
        return this.bytes[addr];
    }

    readU16(addr: number): number {
        this.check(addr, 2);
        return this.view.getUint16(addr, true);
    }

    readU32(addr: number): number {
        this.check(addr, 4);
        return this.view.getUint32(addr, true);
    }

    readF32(addr: number): number {
        this.check(addr, 4);
        return this.view.getFloat32(addr, true);
    }

    /** Copy `length` bytes starting at `addr`. */
    readBytes(addr: number, length: number): Uint8Array {
        this.check(addr, length);
        return this.bytes.slice(addr, addr + length);
    }

    /**
     * Read a NUL-terminated UTF-8 string.
     *
     * @throws EmulatorFault if no terminator is found before the end of memory
     */
    readCString(addr: number): string {
        this.check(addr, 1);
        const end = this.bytes.indexOf(0, addr);
        if (end === -1) {
            throw new EmulatorFault(
                'MEMORY_OUT_OF_BOUNDS',
                `String at ${hex(addr, 4)} has no terminator before the end of memory`
            );
        }
        return utf8Decoder.decode(this.bytes.subarray(addr, end));
    }

    // =========================================================================
    // Writes
    // =========================================================================

    writeU8(addr: number, value: number): void {
        this.check(addr, 1);
        this.bytes[addr] = value & 0xFF;
    }

    writeU16(addr: number, value: number): void {
        this.check(addr, 2);
        this.view.setUint16(addr, value & 0xFFFF, true);
    }

    writeU32(addr: number, value: number): void {
        this.check(addr, 4);
        this.view.setUint32(addr, value >>> 0, true);
    }

    writeF32(addr: number, value: number): void {
        this.check(addr, 4);
        this.view.setFloat32(addr, value, true);
    }

    /** Bounds-checked as a whole before any byte is written. */
    writeBytes(addr: number, data: ArrayLike<number>): void {
        this.check(addr, data.length);
        this.bytes.set(data, addr);
    }

    /** Store instruction words little-endian from `addr`. */
    loadWords(addr: number, words: readonly number[]): void {
        this.check(addr, words.length * 4);
        words.forEach((word, i) => this.view.setUint32(addr + i * 4, word >>> 0, true));
    }

    clear(): void {
        this.bytes.fill(0);
    }
}
