/**
 * ARC Assembler - Type Definitions
 *
 * SPDX-License-Identifier: MIT
 */

import type { RegId } from './isa/registers';

// =============================================================================
// Operands
// =============================================================================

/**
 * An instruction argument.
 *
 * `label` only exists before symbol resolution and never reaches the encoder.
 * `string` only appears as the argument of `.string`.
 */
export type Operand =
    | { type: 'register'; reg: RegId }
    | { type: 'immediate'; value: number }
    | { type: 'address'; value: number }
    | { type: 'addressRegister'; reg: RegId }
    | { type: 'label'; name: string }
    | { type: 'flag'; id: number }
    | { type: 'string'; value: string }
    | { type: 'none' };

export type OperandType = Operand['type'];

export const NO_OPERAND: Operand = { type: 'none' };

// =============================================================================
// Commands
// =============================================================================

/**
 * One parsed source line.
 */
export interface Command {
    /** Lowercased mnemonic or directive (leading '.'); '' for an empty line */
    opcode: string;
    label?: string;
    operand1: Operand;
    operand2: Operand;
    /** `.macro` header payload */
    macroName?: string;
    macroParams?: string[];
    /** Segment directive payloads */
    textStart?: number;
    stackStart?: number;
    stackSize?: number;
    lineNum: number;
    line: string;
}

/**
 * A macro definition collected from `.macro` ... `.endmacro`.
 */
export interface Macro {
    name: string;
    params: string[];
    body: Command[];
    lineNum: number;
}

export type Section = 'text' | 'data';

// =============================================================================
// Output
// =============================================================================

/**
 * Final assembler output, ready for the emulator loader.
 */
export interface AssembledProgram {
    /** Encoded instruction words */
    text: number[];
    /** Initialized data bytes */
    data: Uint8Array;
    actualTextStart: number;
    actualDataStart: number;
    actualStackStart: number;
    actualStackSize: number;
    /** Memory size the layout was computed for */
    memorySize: number;
    /** Absolute address (or constant value) of every symbol */
    symbols: Map<string, number>;
}

/**
 * Outcome of `tryAssemble`.
 */
export type AssemblyOutcome =
    | { ok: true; program: AssembledProgram }
    | { ok: false; errors: AssemblerError[] };

/**
 * Minimal logging surface; `console` satisfies it.
 */
export interface Logger {
    log(message: string): void;
    warn(message: string): void;
}

/**
 * Assembler options.
 */
export interface AssemblerOptions {
    /** Memory size the layout targets (default 64 KiB) */
    memorySize?: number;
    /** Enable verbose logging */
    verbose?: boolean;
    /** Log sink for verbose output (default console) */
    logger?: Logger;
}

export const ASSEMBLER_DEFAULTS = {
    MEMORY_SIZE: 64 * 1024,
    TEXT_START: 0x0000,
    STACK_SIZE: 0x1000,
    /** Instruction width in bytes */
    WORD_SIZE: 4,
    /** Nested macro invocations deeper than this are rejected */
    MAX_MACRO_DEPTH: 16,
} as const;

// =============================================================================
// Errors
// =============================================================================

/**
 * Assembler error with line information.
 */
export class AssemblerError extends Error {
    lineNum: number;
    line: string;
    /** Message without the line prefix */
    detail: string;

    constructor(message: string, lineNum: number = 0, line: string = '') {
        super(lineNum > 0 ? `Line ${lineNum}: ${message}\n  -> ${line.trim()}` : message);
        this.name = 'AssemblerError';
        this.lineNum = lineNum;
        this.line = line;
        this.detail = message;
    }
}

/** Malformed source: operands, directives, macros, duplicates. */
export class ParseError extends AssemblerError {
    constructor(message: string, lineNum: number = 0, line: string = '') {
        super(message, lineNum, line);
        this.name = 'ParseError';
    }
}

/** Segment placement failures found after pass 1. */
export class LayoutError extends AssemblerError {
    constructor(message: string, lineNum: number = 0, line: string = '') {
        super(message, lineNum, line);
        this.name = 'LayoutError';
    }
}

/** Pass 2 failures: unknown labels, field widths, unsupported mnemonics. */
export class EncodingError extends AssemblerError {
    constructor(message: string, lineNum: number = 0, line: string = '') {
        super(message, lineNum, line);
        this.name = 'EncodingError';
    }
}

/**
 * Thrown by `assemble()`; carries every collected error.
 */
export class AssemblyFailure extends Error {
    errors: AssemblerError[];

    constructor(errors: AssemblerError[]) {
        const count = errors.length === 1 ? '1 error' : `${errors.length} errors`;
        super(`Assembly failed with ${count}:\n${errors.map(e => e.message).join('\n')}`);
        this.name = 'AssemblyFailure';
        this.errors = errors;
    }
}
