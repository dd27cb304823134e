/**
 * ARC Emulator - I/O Device
 *
 * SPDX-License-Identifier: MIT
 *
 * In-process console: pending input bytes consumed by IN/INSI/INSW and an
 * output buffer appended to by OUT/OUTI/OUTW.
 */

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder();

const WHITESPACE = new Set([0x20, 0x09, 0x0A, 0x0D]);

export interface InputToken {
    text: string;
    /** Bytes to consume to move past the token */
    end: number;
}

export class IoDevice {
    private pending: Uint8Array;
    output = '';

    constructor(input: string = '') {
        this.pending = utf8Encoder.encode(input);
    }

    /** Input not yet consumed. */
    get input(): string {
        return utf8Decoder.decode(this.pending);
    }

    set input(text: string) {
        this.pending = utf8Encoder.encode(text);
    }

    /** Pending input bytes, without consuming them. */
    peekBytes(max: number = this.pending.length): Uint8Array {
        return this.pending.slice(0, max);
    }

    /** Next whitespace-delimited token, without consuming it. */
    peekToken(): InputToken | null {
        let start = 0;
        while (start < this.pending.length && WHITESPACE.has(this.pending[start])) {
            start++;
        }
        if (start === this.pending.length) {
            return null;
        }
        let end = start;
        while (end < this.pending.length && !WHITESPACE.has(this.pending[end])) {
            end++;
        }
        return { text: utf8Decoder.decode(this.pending.subarray(start, end)), end };
    }

    consume(count: number): void {
        this.pending = this.pending.slice(Math.min(count, this.pending.length));
    }

    write(text: string): void {
        this.output += text;
    }

    reset(input: string = ''): void {
        this.input = input;
        this.output = '';
    }
}
