/**
 * ARC Assembler - Instruction Encoding
 *
 * SPDX-License-Identifier: MIT
 *
 * Converts between resolved operands and 32-bit instruction words.
 * The emulator decodes with the same table, so both directions live here.
 */

import { Opcode, OPCODE_LAYOUT, OPCODE_BY_VALUE, opcodeOf } from './opcodes';
import type { Mnemonic, OperandLayout } from './opcodes';
import { isRegId } from './registers';
import type { RegId } from './registers';
import { EncodingError, NO_OPERAND } from '../types';
import type { Operand } from '../types';
import { hex } from '../operands';

export const FIELD_LIMITS = {
    IMM16: 0xFFFF,
    ADDR8: 0x7F,
    ADDR16: 0xFFFF,
    ADDR24: 0x7FFFFF,
} as const;

const INDIRECT_BIT_24 = 1 << 23;
const INDIRECT_BIT_8 = 0x80;
const REGISTER_FORM = 1;

/**
 * A decoded instruction word.
 */
export interface DecodedInstruction {
    opcode: number;
    mnemonic: Mnemonic;
    operand1: Operand;
    operand2: Operand;
}

export type DecodeErrorCode = 'UNKNOWN_OPCODE' | 'INVALID_REGISTER';

/**
 * Raised when a word cannot be decoded.
 */
export class DecodeError extends Error {
    code: DecodeErrorCode;
    word: number;

    constructor(code: DecodeErrorCode, message: string, word: number) {
        super(message);
        this.name = 'DecodeError';
        this.code = code;
        this.word = word;
    }
}

// =============================================================================
// Encoding
// =============================================================================

function expectRegister(mnemonic: Mnemonic, operand: Operand, position: string): RegId {
    if (operand.type !== 'register') {
        throw new EncodingError(`${mnemonic} expects a register as ${position} operand, got ${operand.type}`);
    }
    return operand.reg;
}

function expectNone(mnemonic: Mnemonic, operand: Operand, position: string): void {
    if (operand.type !== 'none') {
        throw new EncodingError(`${mnemonic} takes no ${position} operand`);
    }
}

function checkWidth(value: number, max: number, what: string): number {
    if (value > max) {
        throw new EncodingError(
            `${what} ${hex(value, 4)} does not fit its field (max ${max} / ${hex(max, 4)})`
        );
    }
    return value;
}

function immediateValue(mnemonic: Mnemonic, operand: Operand, position: string): number {
    if (operand.type !== 'immediate') {
        throw new EncodingError(`${mnemonic} expects an immediate as ${position} operand, got ${operand.type}`);
    }
    return checkWidth(operand.value, FIELD_LIMITS.IMM16, 'Immediate value');
}

/**
 * Bit 0 selects the register form, so an immediate in the same field must be even.
 */
function discriminatedImmediate(mnemonic: Mnemonic, operand: Operand, position: string): number {
    const value = immediateValue(mnemonic, operand, position);
    if ((value & REGISTER_FORM) !== 0) {
        throw new EncodingError(
            `Immediate value ${hex(value, 4)} has bit 0 set, which ${mnemonic} reserves for its register form; ` +
            `load odd values into a register with MOVI first`
        );
    }
    return value;
}

/**
 * Register-or-immediate field: reg at `regShift` plus the bit-0 marker, or an even imm16.
 */
function regOrImmField(mnemonic: Mnemonic, operand: Operand, position: string, regShift: number): number {
    if (operand.type === 'register') {
        return (operand.reg << regShift) | REGISTER_FORM;
    }
    return discriminatedImmediate(mnemonic, operand, position);
}

function directAddress(operand: Operand, max: number): number | null {
    if (operand.type === 'address' || operand.type === 'immediate') {
        return checkWidth(operand.value, max, 'Address');
    }
    return null;
}

function addr24Field(mnemonic: Mnemonic, operand: Operand): number {
    const direct = directAddress(operand, FIELD_LIMITS.ADDR24);
    if (direct !== null) {
        return direct;
    }
    if (operand.type === 'addressRegister') {
        return INDIRECT_BIT_24 | (operand.reg << 19);
    }
    throw new EncodingError(`${mnemonic} expects an address, label or [register], got ${operand.type}`);
}

function addr8Field(mnemonic: Mnemonic, operand: Operand): number {
    const direct = directAddress(operand, FIELD_LIMITS.ADDR8);
    if (direct !== null) {
        return direct;
    }
    if (operand.type === 'addressRegister') {
        return INDIRECT_BIT_8 | (operand.reg << 3);
    }
    throw new EncodingError(`${mnemonic} expects an address, label or [register], got ${operand.type}`);
}

function addr16Field(mnemonic: Mnemonic, operand: Operand): number {
    const direct = directAddress(operand, FIELD_LIMITS.ADDR16);
    if (direct === null) {
        throw new EncodingError(`${mnemonic} expects an address or label, got ${operand.type}`);
    }
    return direct;
}

/** Operand fields (bits 23-0) for a layout. */
function encodeFields(mnemonic: Mnemonic, layout: OperandLayout, op1: Operand, op2: Operand): number {
    switch (layout) {
        case 'regImm16':
            return (expectRegister(mnemonic, op1, 'first') << 16) | immediateValue(mnemonic, op2, 'second');

        case 'regRegOrImm':
            return (expectRegister(mnemonic, op1, 'first') << 16) | regOrImmField(mnemonic, op2, 'second', 8);

        case 'regAddr16':
            return (expectRegister(mnemonic, op1, 'first') << 16) | addr16Field(mnemonic, op2);

        case 'addr8Imm16': {
            const slot = mnemonic === 'INSW' && op2.type === 'none'
                ? 0
                : immediateValue(mnemonic, op2, 'second');
            return (addr8Field(mnemonic, op1) << 16) | slot;
        }

        case 'addr8RegOrImm': {
            const source = mnemonic === 'OUTW' && op2.type === 'none'
                ? 0
                : regOrImmField(mnemonic, op2, 'second', 8);
            return (addr8Field(mnemonic, op1) << 16) | source;
        }

        case 'regOrImm':
            expectNone(mnemonic, op2, 'second');
            return regOrImmField(mnemonic, op1, 'first', 16);

        case 'reg':
            expectNone(mnemonic, op2, 'second');
            return expectRegister(mnemonic, op1, 'first') << 16;

        case 'regReg':
            return (expectRegister(mnemonic, op1, 'first') << 16) | (expectRegister(mnemonic, op2, 'second') << 8);

        case 'addr24':
            expectNone(mnemonic, op2, 'second');
            return addr24Field(mnemonic, op1);

        case 'flag':
            expectNone(mnemonic, op2, 'second');
            if (op1.type !== 'flag') {
                throw new EncodingError(`${mnemonic} expects a flag name, got ${op1.type}`);
            }
            return op1.id & 0xFF;

        case 'none':
            expectNone(mnemonic, op1, 'first');
            expectNone(mnemonic, op2, 'second');
            return 0;
    }
}

/**
 * Encode one instruction with resolved operands.
 *
 * @throws EncodingError on a wrong operand kind or a value outside its field
 */
export function encodeInstruction(
    mnemonic: Mnemonic,
    operand1: Operand = NO_OPERAND,
    operand2: Operand = NO_OPERAND
): number {
    const fields = encodeFields(mnemonic, OPCODE_LAYOUT[mnemonic], operand1, operand2);
    return ((Opcode[mnemonic] << 24) | fields) >>> 0;
}

// =============================================================================
// Decoding
// =============================================================================

function registerField(word: number, value: number): Operand {
    if (!isRegId(value)) {
        throw new DecodeError('INVALID_REGISTER', `Invalid register code ${value} in ${hex(word, 8)}`, word);
    }
    return { type: 'register', reg: value };
}

function decodeAddr24(word: number): Operand {
    const field = word & 0xFFFFFF;
    if ((field & INDIRECT_BIT_24) !== 0) {
        const reg = (field >>> 19) & 0xF;
        if (!isRegId(reg)) {
            throw new DecodeError('INVALID_REGISTER', `Invalid register code ${reg} in ${hex(word, 8)}`, word);
        }
        return { type: 'addressRegister', reg };
    }
    return { type: 'address', value: field };
}

function decodeAddr8(word: number): Operand {
    const field = (word >>> 16) & 0xFF;
    if ((field & INDIRECT_BIT_8) !== 0) {
        const reg = (field >>> 3) & 0xF;
        if (!isRegId(reg)) {
            throw new DecodeError('INVALID_REGISTER', `Invalid register code ${reg} in ${hex(word, 8)}`, word);
        }
        return { type: 'addressRegister', reg };
    }
    return { type: 'address', value: field };
}

function decodeRegOrImm(word: number, regShift: number): Operand {
    if ((word & REGISTER_FORM) !== 0) {
        return registerField(word, (word >>> regShift) & 0xFF);
    }
    return { type: 'immediate', value: word & 0xFFFF };
}

/**
 * Decode a 32-bit instruction word.
 *
 * @throws DecodeError for an unknown opcode or an out-of-range register field
 */
export function decodeInstruction(word: number): DecodedInstruction {
    const opcode = opcodeOf(word);
    const mnemonic = OPCODE_BY_VALUE[opcode];

    if (mnemonic === undefined) {
        throw new DecodeError('UNKNOWN_OPCODE', `Unknown opcode: ${hex(opcode, 2)}`, word);
    }

    const reg1 = (): Operand => registerField(word, (word >>> 16) & 0xFF);
    const reg2 = (): Operand => registerField(word, (word >>> 8) & 0xFF);
    const imm16: Operand = { type: 'immediate', value: word & 0xFFFF };

    let operand1: Operand = NO_OPERAND;
    let operand2: Operand = NO_OPERAND;

    switch (OPCODE_LAYOUT[mnemonic]) {
        case 'regImm16':
            operand1 = reg1();
            operand2 = imm16;
            break;
        case 'regRegOrImm':
            operand1 = reg1();
            operand2 = decodeRegOrImm(word, 8);
            break;
        case 'regAddr16':
            operand1 = reg1();
            operand2 = { type: 'address', value: word & 0xFFFF };
            break;
        case 'addr8Imm16':
            operand1 = decodeAddr8(word);
            operand2 = imm16;
            break;
        case 'addr8RegOrImm':
            operand1 = decodeAddr8(word);
            operand2 = decodeRegOrImm(word, 8);
            break;
        case 'regOrImm':
            operand1 = decodeRegOrImm(word, 16);
            break;
        case 'reg':
            operand1 = reg1();
            break;
        case 'regReg':
            operand1 = reg1();
            operand2 = reg2();
            break;
        case 'addr24':
            operand1 = decodeAddr24(word);
            break;
        case 'flag':
            operand1 = { type: 'flag', id: word & 0xFF };
            break;
        case 'none':
            break;
    }

    return { opcode, mnemonic, operand1, operand2 };
}
