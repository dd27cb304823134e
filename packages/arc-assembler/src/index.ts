/**
 * ARC Assembler
 *
 * SPDX-License-Identifier: MIT
 *
 * Converts ARC assembly source into an AssembledProgram: text words, data
 * bytes and the resolved segment layout the emulator loader needs.
 *
 * Usage:
 *   import { assemble } from '@arc/assembler';
 *
 *   const program = assemble(`
 *     start:
 *       MOVI AX, 10
 *       MOVI BX, 20
 *       XOR  AX, BX
 *       HALT
 *   `);
 *   console.log(program.text);          // Encoded words
 *   console.log(program.actualDataStart);
 */

// Re-export types and functions
export { Reg, REGISTER_COUNT, REGISTER_NAMES, isRegId, registerByName, registerName } from './isa/registers';
export type { RegId, RegName } from './isa/registers';
export { FLAG_IDS, FLAG_BITS, FLAG_NAMES, flagIdByName, flagNameById } from './isa/flags';
export type { FlagName } from './isa/flags';
export { Opcode, OPCODE_LAYOUT, OPCODE_BY_NAME, OPCODE_BY_VALUE, MNEMONICS, mnemonicByName, isMnemonic, opcodeOf } from './isa/opcodes';
export type { Mnemonic, OpcodeValue, OperandLayout } from './isa/opcodes';
export { encodeInstruction, decodeInstruction, DecodeError, FIELD_LIMITS } from './isa/encoding';
export type { DecodedInstruction, DecodeErrorCode } from './isa/encoding';
export {
    AssemblerError,
    ParseError,
    LayoutError,
    EncodingError,
    AssemblyFailure,
    ASSEMBLER_DEFAULTS,
    NO_OPERAND,
} from './types';
export type {
    Operand,
    OperandType,
    Command,
    Macro,
    Section,
    AssembledProgram,
    AssemblyOutcome,
    AssemblerOptions,
    Logger,
} from './types';
export { parseNumber, parseInteger, parseOperand, formatOperand, toU32Saturating, hex } from './operands';
export { parseCommand, parseSource, splitOperands } from './parser';
export type { ParseResult } from './parser';
export { expandMacros } from './macros';
export { computeLayout, alignPadding } from './layout';
export type { Layout, LayoutResult } from './layout';
export { generate, resolveOperand, formatInstruction, disassembleWord, disassemble, hexDump } from './codegen';

import { parseSource } from './parser';
import { expandMacros } from './macros';
import { computeLayout } from './layout';
import { generate } from './codegen';
import { hex } from './operands';
import { AssemblyFailure, ASSEMBLER_DEFAULTS } from './types';
import type { AssembledProgram, AssemblerOptions, AssemblyOutcome } from './types';

/**
 * Assemble source text, returning either the program or every error found.
 *
 * Stages stop at the first stage that reports errors: parsing, macro
 * expansion, pass 1 (layout), pass 2 (encoding).
 */
export function tryAssemble(source: string, options: AssemblerOptions = {}): AssemblyOutcome {
    const memorySize = options.memorySize ?? ASSEMBLER_DEFAULTS.MEMORY_SIZE;
    const logger = options.logger ?? console;
    const log = (message: string): void => {
        if (options.verbose) {
            logger.log(`[Assembler] ${message}`);
        }
    };

    const parsed = parseSource(source);
    if (parsed.errors.length > 0) {
        return { ok: false, errors: parsed.errors };
    }
    log(`parsed ${parsed.commands.length} commands, ${parsed.macros.size} macros`);

    const expanded = expandMacros(parsed.commands, parsed.macros);
    if (expanded.errors.length > 0) {
        return { ok: false, errors: expanded.errors };
    }

    const { layout, errors: layoutErrors } = computeLayout(expanded.commands, memorySize);
    if (!layout) {
        return { ok: false, errors: layoutErrors };
    }
    log(
        `pass 1: text ${hex(layout.actualTextStart, 4)} (${layout.textSize} bytes), ` +
        `data ${hex(layout.actualDataStart, 4)} (${layout.dataSize} bytes), ` +
        `stack ${hex(layout.actualStackStart, 4)} (${layout.actualStackSize} bytes), ` +
        `${layout.symbols.size} symbols`
    );

    const generated = generate(expanded.commands, layout);
    if (generated.errors.length > 0) {
        return { ok: false, errors: generated.errors };
    }
    log(`pass 2: ${generated.text.length} words, ${generated.data.length} data bytes`);

    const program: AssembledProgram = {
        text: generated.text,
        data: generated.data,
        actualTextStart: layout.actualTextStart,
        actualDataStart: layout.actualDataStart,
        actualStackStart: layout.actualStackStart,
        actualStackSize: layout.actualStackSize,
        memorySize,
        symbols: layout.symbols,
    };
    return { ok: true, program };
}

/**
 * Assemble source code.
 *
 * @param source - Assembly source code
 * @param options - Target memory size and logging
 * @returns The assembled program
 * @throws AssemblyFailure listing every error found
 *
 * @example
 * ```typescript
 * const program = assemble(`
 *   .data
 *   msg: .string "hi"
 *   .text
 *     OUT msg
 *     HALT
 * `);
 * ```
 */
export function assemble(source: string, options: AssemblerOptions = {}): AssembledProgram {
    const outcome = tryAssemble(source, options);
    if (!outcome.ok) {
        throw new AssemblyFailure(outcome.errors);
    }
    return outcome.program;
}

/**
 * Validate assembly source without keeping the output.
 *
 * @param source - Assembly source code
 * @returns null if valid, or the error listing if invalid
 */
export function validate(source: string, options: AssemblerOptions = {}): string | null {
    const outcome = tryAssemble(source, options);
    if (outcome.ok) {
        return null;
    }
    return outcome.errors.map(e => e.message).join('\n');
}
