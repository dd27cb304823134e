/**
 * ARC Assembler - Operand Parsing
 *
 * SPDX-License-Identifier: MIT
 */

import { registerByName, registerName } from './isa/registers';
import { flagIdByName, flagNameById } from './isa/flags';
import type { Operand } from './types';
import { ParseError } from './types';

const U32_MAX = 0xFFFFFFFF;

// =============================================================================
// Number Parsing
// =============================================================================

const DECIMAL = /^\d+$/;
const HEX = /^0x[0-9a-f]+$/i;
const BINARY = /^0b[01]+$/i;
const FLOAT = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Convert a finite or infinite number to u32, saturating at both ends.
 * Fractions are truncated toward zero; NaN becomes 0.
 */
export function toU32Saturating(value: number): number {
    if (Number.isNaN(value) || value <= 0) {
        return 0;
    }
    if (value >= U32_MAX) {
        return U32_MAX;
    }
    return Math.trunc(value);
}

/**
 * Parse an unsigned integer literal.
 *
 * Supports:
 *   - Decimal: 123
 *   - Hexadecimal: 0x1234, 0X5678
 *   - Binary: 0b1010
 *
 * @returns The value, or null if the text is not an integer literal
 * @throws ParseError if a hex or binary literal does not fit in 32 bits
 */
export function parseInteger(s: string): number | null {
    const text = s.trim();
    let value: number;

    if (HEX.test(text)) {
        value = parseInt(text.slice(2), 16);
    } else if (BINARY.test(text)) {
        value = parseInt(text.slice(2), 2);
    } else if (DECIMAL.test(text)) {
        value = Number(text);
        // Decimal overflow saturates
        return value > U32_MAX ? U32_MAX : value;
    } else {
        return null;
    }

    if (value > U32_MAX) {
        throw new ParseError(`Numeric literal out of range: ${text}`);
    }
    return value;
}

/**
 * Parse a numeric literal: an integer, or a float truncated to u32.
 *
 * @returns The u32 value, or null if the text is not numeric
 */
export function parseNumber(s: string): number | null {
    const integer = parseInteger(s);
    if (integer !== null) {
        return integer;
    }
    const text = s.trim();
    if (FLOAT.test(text)) {
        return toU32Saturating(parseFloat(text));
    }
    return null;
}

// =============================================================================
// String and Character Literals
// =============================================================================

const ESCAPES: Record<string, string> = {
    'n': '\n',
    'r': '\r',
    't': '\t',
    '0': '\0',
    '\\': '\\',
    '"': '"',
    "'": "'",
};

function unescape(body: string): string {
    let out = '';
    for (let i = 0; i < body.length; i++) {
        const ch = body[i];
        if (ch === '\\' && i + 1 < body.length && body[i + 1] in ESCAPES) {
            out += ESCAPES[body[i + 1]];
            i++;
        } else {
            out += ch;
        }
    }
    return out;
}

function isQuoted(text: string, quote: string): boolean {
    return text.length >= 2 && text.startsWith(quote) && text.endsWith(quote);
}

// =============================================================================
// Operand Parsing
// =============================================================================

/**
 * Parse one operand token.
 *
 * Recognition order (first match wins):
 *   1. "quoted"          -> string
 *   2. register name     -> register
 *   3. flag name         -> flag
 *   4. [reg] / [num] / [name] -> addressRegister / address / label
 *   5. numeric literal   -> immediate
 *   6. bare word         -> label
 *
 * @throws ParseError for anything else
 */
export function parseOperand(token: string): Operand {
    const text = token.trim();

    if (!text) {
        return { type: 'none' };
    }

    if (isQuoted(text, '"')) {
        return { type: 'string', value: unescape(text.slice(1, -1)) };
    }

    const reg = registerByName(text);
    if (reg !== null) {
        return { type: 'register', reg };
    }

    const flag = flagIdByName(text);
    if (flag !== null) {
        return { type: 'flag', id: flag };
    }

    if (text.startsWith('[') && text.endsWith(']')) {
        const inner = text.slice(1, -1).trim();
        const innerReg = registerByName(inner);
        if (innerReg !== null) {
            return { type: 'addressRegister', reg: innerReg };
        }
        const address = parseInteger(inner);
        if (address !== null) {
            return { type: 'address', value: address };
        }
        if (isBareWord(inner)) {
            return { type: 'label', name: inner };
        }
        throw new ParseError(`Invalid address operand: ${text}`);
    }

    // Character literal: 'A', '\n'
    if (isQuoted(text, "'")) {
        const chars = unescape(text.slice(1, -1));
        if (chars.length === 1) {
            return { type: 'immediate', value: chars.charCodeAt(0) };
        }
    }

    const value = parseNumber(text);
    if (value !== null) {
        return { type: 'immediate', value };
    }

    if (isBareWord(text)) {
        return { type: 'label', name: text };
    }

    throw new ParseError(`Invalid operand: ${text}`);
}

function isBareWord(text: string): boolean {
    return text.length > 0 && !/[\s[\]]/.test(text);
}

// =============================================================================
// Formatting
// =============================================================================

export function hex(value: number, width: number): string {
    return `0x${(value >>> 0).toString(16).toUpperCase().padStart(width, '0')}`;
}

/**
 * Render an operand the way it would be written in source.
 */
export function formatOperand(operand: Operand): string {
    switch (operand.type) {
        case 'register':
            return registerName(operand.reg);
        case 'immediate':
            return hex(operand.value, 4);
        case 'address':
            return `[${hex(operand.value, 4)}]`;
        case 'addressRegister':
            return `[${registerName(operand.reg)}]`;
        case 'label':
            return operand.name;
        case 'flag':
            return flagNameById(operand.id) ?? `flag${operand.id}`;
        case 'string':
            return JSON.stringify(operand.value);
        case 'none':
            return '';
    }
}
