/**
 * ARC Assembler - Pass 1: Symbols and Segment Layout
 *
 * SPDX-License-Identifier: MIT
 *
 * Walks the expanded command list once, recording label offsets per section
 * and the size of every instruction and data directive. Segment start
 * addresses are then fixed and the symbol table is rebased to absolute
 * addresses.
 *
 * Memory map (defaults):
 *
 *   0x0000              text (grows up from text_start)
 *   ...
 *   data_start          data (ends exactly at stack_start)
 *   stack_start         stack (stack_size bytes)
 *   memory_size
 */

import { hex } from './operands';
import { isDataDirective, isDirective, isSegmentDirective, withLine } from './parser';
import type { Command, Section } from './types';
import { AssemblerError, LayoutError, ParseError, ASSEMBLER_DEFAULTS } from './types';

const utf8 = new TextEncoder();

interface SymbolEntry {
    section: Section | null;
    /** Section-relative offset, or the constant value for `.equ` */
    value: number;
    lineNum: number;
}

export interface Layout {
    /** Absolute addresses (constants for `.equ`) */
    symbols: Map<string, number>;
    textSize: number;
    dataSize: number;
    actualTextStart: number;
    actualDataStart: number;
    actualStackStart: number;
    actualStackSize: number;
    memorySize: number;
}

export interface LayoutResult {
    layout: Layout | null;
    errors: AssemblerError[];
}

// =============================================================================
// Sizes
// =============================================================================

function isPowerOfTwo(n: number): boolean {
    return n > 0 && (n & (n - 1)) === 0;
}

/**
 * Padding needed to bring `offset` up to a multiple of `boundary`.
 */
export function alignPadding(offset: number, boundary: number): number {
    const rem = offset % boundary;
    return rem === 0 ? 0 : boundary - rem;
}

/**
 * Byte size of a `.bitv [begin],[end]` directive.
 */
export function bitvSize(cmd: Command): number {
    const begin = cmd.operand1;
    const end = cmd.operand2;
    if (begin.type !== 'address' || end.type !== 'address') {
        throw new ParseError('.bitv expects two bracketed addresses: .bitv [begin],[end]');
    }
    if (begin.value > end.value) {
        throw new ParseError(`.bitv begin ${hex(begin.value, 4)} is after end ${hex(end.value, 4)}`);
    }
    return end.value - begin.value + 1;
}

/**
 * Bytes occupied by one data directive at the given section offset.
 */
export function dataDirectiveSize(cmd: Command, offset: number): number {
    const op = cmd.operand1;
    switch (cmd.opcode) {
        case '.word':
            return 4;
        case '.byte':
            return 1;
        case '.string':
            if (op.type !== 'string') {
                throw new ParseError('.string expects a quoted string');
            }
            return utf8.encode(op.value).length + 1;
        case '.space':
            if (op.type !== 'immediate') {
                throw new ParseError('.space expects a byte count');
            }
            return op.value;
        case '.align':
            if (op.type !== 'immediate' || !isPowerOfTwo(op.value)) {
                throw new ParseError('.align expects a power-of-two boundary');
            }
            return alignPadding(offset, op.value);
        case '.bitv':
            return bitvSize(cmd);
        default:
            throw new ParseError(`'${cmd.opcode}' is not a data directive`);
    }
}

// =============================================================================
// Pass 1
// =============================================================================

interface Pass1State {
    section: Section;
    textCounter: number;
    dataCounter: number;
    textStart?: number;
    stackStart?: number;
    stackSize?: number;
    /** Largest `.align` boundary seen in the data section */
    dataAlign: number;
    symbols: Map<string, SymbolEntry>;
}

function defineSymbol(state: Pass1State, name: string, entry: SymbolEntry, cmd: Command): void {
    const existing = state.symbols.get(name);
    if (existing) {
        throw new ParseError(`Duplicate label '${name}' (first defined on line ${existing.lineNum})`, cmd.lineNum, cmd.line);
    }
    state.symbols.set(name, entry);
}

function handleSegmentDirective(state: Pass1State, cmd: Command): void {
    if (cmd.textStart !== undefined) {
        if (state.textStart !== undefined) {
            throw new ParseError('Duplicate .text_start directive');
        }
        state.textStart = cmd.textStart;
    }
    if (cmd.stackStart !== undefined) {
        if (state.stackStart !== undefined) {
            throw new ParseError('Duplicate .stack_start directive');
        }
        state.stackStart = cmd.stackStart;
    }
    if (cmd.stackSize !== undefined) {
        if (state.stackSize !== undefined) {
            throw new ParseError('Duplicate .stack_size directive');
        }
        state.stackSize = cmd.stackSize;
    }
}

function handleEqu(state: Pass1State, cmd: Command): void {
    // NAME: .equ value   or   .equ NAME, value
    let name = cmd.label;
    let valueOp = cmd.operand1;
    if (name === undefined) {
        if (cmd.operand1.type !== 'label') {
            throw new ParseError('.equ expects a name: .equ NAME, value');
        }
        name = cmd.operand1.name;
        valueOp = cmd.operand2;
    }
    if (valueOp.type !== 'immediate') {
        throw new ParseError(`.equ ${name} expects an immediate value`);
    }
    defineSymbol(state, name, { section: null, value: valueOp.value, lineNum: cmd.lineNum }, cmd);
}

function visit(state: Pass1State, cmd: Command): void {
    if (isSegmentDirective(cmd.opcode)) {
        handleSegmentDirective(state, cmd);
    }

    switch (cmd.opcode) {
        case '.equ':
            handleEqu(state, cmd);
            return;
        case '.text':
            state.section = 'text';
            break;
        case '.data':
            state.section = 'data';
            break;
    }

    const offset = state.section === 'text' ? state.textCounter : state.dataCounter;
    if (cmd.label !== undefined) {
        defineSymbol(state, cmd.label, { section: state.section, value: offset, lineNum: cmd.lineNum }, cmd);
    }

    if (cmd.opcode === '' || (isDirective(cmd.opcode) && !isDataDirective(cmd.opcode))) {
        return;
    }

    if (isDataDirective(cmd.opcode)) {
        if (state.section !== 'data') {
            throw new ParseError(`${cmd.opcode} is only allowed in the .data section`);
        }
        state.dataCounter += dataDirectiveSize(cmd, offset);
        if (cmd.opcode === '.align' && cmd.operand1.type === 'immediate') {
            state.dataAlign = Math.max(state.dataAlign, cmd.operand1.value);
        }
        return;
    }

    if (state.section !== 'text') {
        throw new ParseError(`Instruction '${cmd.opcode.toUpperCase()}' is only allowed in the .text section`);
    }
    state.textCounter += ASSEMBLER_DEFAULTS.WORD_SIZE;
}

/**
 * Validate the final segment placement.
 */
function checkLayout(layout: Layout): LayoutError[] {
    const errors: LayoutError[] = [];
    const mem = layout.memorySize;
    const textEnd = layout.actualTextStart + layout.textSize;
    const stackEnd = layout.actualStackStart + layout.actualStackSize;

    if (layout.actualTextStart >= mem) {
        errors.push(new LayoutError(
            `Text segment start ${hex(layout.actualTextStart, 4)} is outside memory (size ${hex(mem, 4)})`
        ));
    }
    if (layout.actualStackStart < 0 || layout.actualStackStart >= mem) {
        errors.push(new LayoutError(
            `Stack segment start ${hex(Math.max(layout.actualStackStart, 0), 4)} is outside memory (size ${hex(mem, 4)})`
        ));
    } else if (stackEnd > mem) {
        errors.push(new LayoutError(
            `Stack segment ${hex(layout.actualStackStart, 4)}-${hex(stackEnd, 4)} runs past the end of memory (size ${hex(mem, 4)})`
        ));
    }
    if (layout.actualDataStart < 0) {
        errors.push(new LayoutError(
            `Data segment (${layout.dataSize} bytes) does not fit below stack start ${hex(Math.max(layout.actualStackStart, 0), 4)}`
        ));
    } else if (textEnd > layout.actualDataStart) {
        errors.push(new LayoutError(
            `Text segment ${hex(layout.actualTextStart, 4)}-${hex(textEnd, 4)} overlaps data segment starting at ${hex(layout.actualDataStart, 4)}`
        ));
    }

    return errors;
}

/**
 * Pass 1: build the symbol table and fix segment addresses.
 *
 * @param commands - Macro-expanded commands
 * @param memorySize - Total memory the program will be loaded into
 */
export function computeLayout(
    commands: Command[],
    memorySize: number = ASSEMBLER_DEFAULTS.MEMORY_SIZE
): LayoutResult {
    const state: Pass1State = {
        section: 'text',
        textCounter: 0,
        dataCounter: 0,
        dataAlign: 1,
        symbols: new Map(),
    };
    const errors: AssemblerError[] = [];

    for (const cmd of commands) {
        try {
            visit(state, cmd);
        } catch (e) {
            const err = withLine(e, cmd.lineNum, cmd.line);
            if (err instanceof AssemblerError) {
                errors.push(err);
                continue;
            }
            throw err;
        }
    }

    if (errors.length > 0) {
        return { layout: null, errors };
    }

    const actualStackSize = state.stackSize ?? ASSEMBLER_DEFAULTS.STACK_SIZE;
    const actualStackStart = state.stackStart ?? memorySize - actualStackSize;
    // Section offsets are aligned, so the data start is aligned down to the
    // largest boundary and the gap left below the stack becomes tail padding.
    const actualDataStart = Math.floor((actualStackStart - state.dataCounter) / state.dataAlign) * state.dataAlign;
    const layout: Layout = {
        symbols: new Map(),
        textSize: state.textCounter,
        dataSize: actualStackStart - actualDataStart,
        actualTextStart: state.textStart ?? ASSEMBLER_DEFAULTS.TEXT_START,
        actualDataStart,
        actualStackStart,
        actualStackSize,
        memorySize,
    };

    const layoutErrors = checkLayout(layout);
    if (layoutErrors.length > 0) {
        return { layout: null, errors: layoutErrors };
    }

    for (const [name, entry] of state.symbols) {
        let address = entry.value;
        if (entry.section === 'text') {
            address += layout.actualTextStart;
        } else if (entry.section === 'data') {
            address += layout.actualDataStart;
        }
        layout.symbols.set(name, address);
    }

    return { layout, errors: [] };
}
