/**
 * ARC Assembler - Pass 2: Code Generator
 *
 * SPDX-License-Identifier: MIT
 *
 * Encodes text-section instructions into 32-bit words and data directives
 * into raw bytes. All multi-byte values are little-endian.
 */

import { encodeInstruction, decodeInstruction, DecodeError } from './isa/encoding';
import type { DecodedInstruction } from './isa/encoding';
import { mnemonicByName, OPCODE_LAYOUT } from './isa/opcodes';
import { hex, formatOperand } from './operands';
import { isDataDirective, isDirective, withLine } from './parser';
import { alignPadding, bitvSize } from './layout';
import type { Layout } from './layout';
import type { Command, Operand } from './types';
import { AssemblerError, EncodingError } from './types';

const utf8 = new TextEncoder();

export interface GenerateResult {
    text: number[];
    data: Uint8Array;
    errors: AssemblerError[];
}

// =============================================================================
// Label Resolution
// =============================================================================

/**
 * Replace a label operand with its symbol value.
 *
 * @throws EncodingError if the label is not defined
 */
export function resolveOperand(operand: Operand, symbols: Map<string, number>): Operand {
    if (operand.type !== 'label') {
        return operand;
    }
    const value = symbols.get(operand.name);
    if (value === undefined) {
        throw new EncodingError(`Unknown label: ${operand.name}`);
    }
    return { type: 'immediate', value };
}

// =============================================================================
// Emitters
// =============================================================================

function emitInstruction(cmd: Command, symbols: Map<string, number>): number {
    const mnemonic = mnemonicByName(cmd.opcode);
    if (mnemonic === null) {
        throw new EncodingError(`Unsupported instruction '${cmd.opcode.toUpperCase()}'`);
    }
    return encodeInstruction(
        mnemonic,
        resolveOperand(cmd.operand1, symbols),
        resolveOperand(cmd.operand2, symbols)
    );
}

function emitData(cmd: Command, offset: number, symbols: Map<string, number>): number[] {
    switch (cmd.opcode) {
        case '.word': {
            const op = resolveOperand(cmd.operand1, symbols);
            if (op.type !== 'immediate') {
                throw new EncodingError('.word expects an immediate value or label');
            }
            const bytes = new Uint8Array(4);
            new DataView(bytes.buffer).setUint32(0, op.value >>> 0, true);
            return Array.from(bytes);
        }

        case '.byte': {
            const op = resolveOperand(cmd.operand1, symbols);
            if (op.type !== 'immediate') {
                throw new EncodingError('.byte expects an immediate value');
            }
            if (op.value > 0xFF) {
                throw new EncodingError(`Byte value ${hex(op.value, 2)} does not fit in 8 bits (max 255)`);
            }
            return [op.value];
        }

        case '.string': {
            if (cmd.operand1.type !== 'string') {
                throw new EncodingError('.string expects a quoted string');
            }
            return [...utf8.encode(cmd.operand1.value), 0];
        }

        case '.space':
            return new Array<number>(cmd.operand1.type === 'immediate' ? cmd.operand1.value : 0).fill(0);

        case '.align':
            return new Array<number>(
                cmd.operand1.type === 'immediate' ? alignPadding(offset, cmd.operand1.value) : 0
            ).fill(0);

        case '.bitv':
            return new Array<number>(bitvSize(cmd)).fill(0);

        default:
            throw new EncodingError(`'${cmd.opcode}' is not a data directive`);
    }
}

// =============================================================================
// Pass 2
// =============================================================================

/**
 * Pass 2: encode commands using the symbol table from pass 1.
 *
 * Section placement was validated in pass 1, so instructions here are always
 * in the text section and data directives in the data section. A command that
 * fails to encode still occupies its slot, so later addresses stay aligned
 * with the layout while errors are collected.
 */
export function generate(commands: Command[], layout: Layout): GenerateResult {
    const text: number[] = [];
    const data: number[] = [];
    const errors: AssemblerError[] = [];

    for (const cmd of commands) {
        if (cmd.opcode === '' || (isDirective(cmd.opcode) && !isDataDirective(cmd.opcode))) {
            continue;
        }

        try {
            if (isDataDirective(cmd.opcode)) {
                for (const byte of emitData(cmd, data.length, layout.symbols)) {
                    data.push(byte);
                }
            } else {
                text.push(emitInstruction(cmd, layout.symbols));
            }
        } catch (e) {
            const err = withLine(e, cmd.lineNum, cmd.line);
            if (!(err instanceof AssemblerError)) {
                throw err;
            }
            errors.push(err);
            if (!isDataDirective(cmd.opcode)) {
                text.push(0);
            }
        }
    }

    // Tail padding up to the stack start when the data start was aligned down
    while (data.length < layout.dataSize) {
        data.push(0);
    }

    return { text, data: Uint8Array.from(data), errors };
}

// =============================================================================
// Disassembler
// =============================================================================

function formatAddress(operand: Operand, width: number): string {
    if (operand.type === 'address') {
        return hex(operand.value, width);
    }
    return formatOperand(operand);
}

function formatValue(operand: Operand): string {
    switch (operand.type) {
        case 'address':
            return hex(operand.value, 4);
        default:
            return formatOperand(operand);
    }
}

/**
 * Render a decoded instruction in source syntax.
 */
export function formatInstruction(instr: DecodedInstruction): string {
    const layout = OPCODE_LAYOUT[instr.mnemonic];
    const parts: string[] = [];

    switch (layout) {
        case 'addr24':
            parts.push(formatAddress(instr.operand1, 6));
            break;
        case 'addr8Imm16':
        case 'addr8RegOrImm':
            parts.push(formatAddress(instr.operand1, 2), formatValue(instr.operand2));
            break;
        case 'regAddr16':
            parts.push(formatValue(instr.operand1), formatAddress(instr.operand2, 4));
            break;
        case 'none':
            break;
        default:
            parts.push(formatValue(instr.operand1));
            if (instr.operand2.type !== 'none') {
                parts.push(formatValue(instr.operand2));
            }
            break;
    }

    return parts.length > 0 ? `${instr.mnemonic} ${parts.join(', ')}` : instr.mnemonic;
}

/**
 * Disassemble a single instruction word.
 */
export function disassembleWord(word: number): string {
    try {
        return formatInstruction(decodeInstruction(word));
    } catch (e) {
        if (e instanceof DecodeError) {
            return `UNKNOWN ${hex(word, 8)}`;
        }
        throw e;
    }
}

/**
 * Disassemble instruction words to readable text.
 *
 * @param words - Encoded instructions
 * @param baseAddr - Address of the first word (default 0)
 * @returns Disassembly listing
 */
export function disassemble(words: readonly number[], baseAddr: number = 0): string {
    return words
        .map((word, i) => `${hex(baseAddr + i * 4, 4)}: ${hex(word, 8)}  ${disassembleWord(word)}`)
        .join('\n');
}

/**
 * Generate hex dump of a byte array.
 *
 * @param bytes - Byte array to dump
 * @param baseAddr - Address of the first byte (default 0)
 * @returns Hex dump string
 */
export function hexDump(bytes: Uint8Array, baseAddr: number = 0): string {
    const lines: string[] = [];

    for (let i = 0; i < bytes.length; i += 16) {
        const chunk = bytes.slice(i, Math.min(i + 16, bytes.length));
        const hexBytes = Array.from(chunk)
            .map(b => b.toString(16).padStart(2, '0').toUpperCase())
            .join(' ');
        lines.push(`${hex(baseAddr + i, 4)}: ${hexBytes}`);
    }

    return lines.join('\n');
}
