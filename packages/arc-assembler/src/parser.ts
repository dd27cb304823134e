/**
 * ARC Assembler - Parser
 *
 * SPDX-License-Identifier: MIT
 *
 * Turns source text into commands and collects macro definitions.
 * Layout and encoding happen later (see layout.ts and codegen.ts).
 */

import { parseOperand } from './operands';
import type { Command, Macro, Operand } from './types';
import { AssemblerError, EncodingError, LayoutError, ParseError, NO_OPERAND } from './types';

// =============================================================================
// Directive Table
// =============================================================================

/** Directives that set a segment address or size. */
export const SEGMENT_DIRECTIVES = ['.text_start', '.stack_start', '.stack_size'] as const;

/** Directives that reserve or emit bytes in the data section. */
export const DATA_DIRECTIVES = ['.word', '.byte', '.string', '.space', '.align', '.bitv'] as const;

const KNOWN_DIRECTIVES: ReadonlySet<string> = new Set<string>([
    ...SEGMENT_DIRECTIVES,
    ...DATA_DIRECTIVES,
    '.text',
    '.data',
    '.equ',
    '.macro',
    '.endmacro',
]);

export function isDirective(opcode: string): boolean {
    return opcode.startsWith('.');
}

export function isDataDirective(opcode: string): boolean {
    return DATA_DIRECTIVES.some(d => d === opcode);
}

export function isSegmentDirective(opcode: string): boolean {
    return SEGMENT_DIRECTIVES.some(d => d === opcode);
}

// =============================================================================
// Line Helpers
// =============================================================================

/**
 * Remove a `;` comment, ignoring semicolons inside quotes.
 */
function stripComment(line: string): string {
    let quote: string | null = null;
    for (let i = 0; i < line.length; i++) {
        const ch = line[i];
        if (quote) {
            if (ch === '\\') {
                i++;
            } else if (ch === quote) {
                quote = null;
            }
        } else if (ch === '"' || ch === "'") {
            quote = ch;
        } else if (ch === ';') {
            return line.slice(0, i);
        }
    }
    return line;
}

/**
 * Split instruction operands: on commas when present, otherwise on whitespace.
 */
export function splitOperands(text: string): string[] {
    const trimmed = text.trim();
    if (!trimmed) {
        return [];
    }
    const parts = trimmed.includes(',') ? trimmed.split(',') : trimmed.split(/\s+/);
    return parts.map(p => p.trim());
}

function emptyCommand(lineNum: number, line: string): Command {
    return { opcode: '', operand1: NO_OPERAND, operand2: NO_OPERAND, lineNum, line };
}

// =============================================================================
// Command Parsing
// =============================================================================

function requireImmediate(directive: string, operand: Operand): number {
    if (operand.type !== 'immediate') {
        throw new ParseError(`${directive} expects an immediate value`);
    }
    return operand.value;
}

function parseDirective(cmd: Command, operandText: string): void {
    const directive = cmd.opcode;

    if (!KNOWN_DIRECTIVES.has(directive)) {
        throw new ParseError(`Unknown directive '${directive}'`);
    }

    switch (directive) {
        case '.text_start':
            cmd.textStart = requireImmediate(directive, parseOperand(operandText));
            break;

        case '.stack_start':
            cmd.stackStart = requireImmediate(directive, parseOperand(operandText));
            break;

        case '.stack_size':
            cmd.stackSize = requireImmediate(directive, parseOperand(operandText));
            break;

        case '.macro': {
            const parts = operandText.split(/[\s,]+/).filter(p => p.length > 0);
            if (parts.length === 0) {
                throw new ParseError('.macro requires a name');
            }
            cmd.macroName = parts[0];
            cmd.macroParams = parts.slice(1);
            break;
        }

        case '.endmacro':
        case '.text':
        case '.data':
            if (operandText.trim()) {
                throw new ParseError(`${directive} takes no operands`);
            }
            break;

        case '.string': {
            const operand = parseOperand(operandText);
            if (operand.type !== 'string') {
                throw new ParseError('.string expects a quoted string');
            }
            cmd.operand1 = operand;
            break;
        }

        case '.equ':
        case '.bitv': {
            const parts = splitOperands(operandText);
            if (parts.length > 2) {
                throw new ParseError(`${directive} takes at most two operands`);
            }
            cmd.operand1 = parseOperand(parts[0] ?? '');
            cmd.operand2 = parseOperand(parts[1] ?? '');
            break;
        }

        default:
            // .word, .byte, .space, .align
            if (!operandText.trim()) {
                throw new ParseError(`${directive} requires an operand`);
            }
            cmd.operand1 = parseOperand(operandText);
            break;
    }
}

/**
 * Parse a single line of assembly.
 *
 * Syntax:
 *   [label:] [mnemonic|directive [operand1[, operand2]]] [; comment]
 *
 * @param line - Source line to parse
 * @param lineNum - Line number (1-based)
 * @throws ParseError on malformed input
 */
export function parseCommand(line: string, lineNum: number = 0): Command {
    const cmd = emptyCommand(lineNum, line);

    try {
        let text = stripComment(line).trim();
        if (!text) {
            return cmd;
        }

        const labelMatch = text.match(/^([a-zA-Z_][a-zA-Z0-9_]*)\s*:/);
        if (labelMatch) {
            cmd.label = labelMatch[1];
            text = text.slice(labelMatch[0].length).trim();
            if (!text) {
                return cmd;
            }
        }

        const spaceIdx = text.search(/\s/);
        const opcodeToken = spaceIdx === -1 ? text : text.slice(0, spaceIdx);
        const operandText = spaceIdx === -1 ? '' : text.slice(spaceIdx + 1).trim();
        cmd.opcode = opcodeToken.toLowerCase();

        if (isDirective(cmd.opcode)) {
            parseDirective(cmd, operandText);
            return cmd;
        }

        const operands = splitOperands(operandText);
        if (operands.length > 2) {
            throw new ParseError(`Too many operands for '${opcodeToken}' (at most 2)`);
        }
        cmd.operand1 = parseOperand(operands[0] ?? '');
        cmd.operand2 = parseOperand(operands[1] ?? '');
        return cmd;
    } catch (e) {
        throw withLine(e, lineNum, line);
    }
}

/**
 * Attach line context to an error raised below the line level, keeping its phase.
 */
export function withLine(e: unknown, lineNum: number, line: string): unknown {
    if (!(e instanceof AssemblerError) || e.lineNum !== 0 || lineNum <= 0) {
        return e;
    }
    if (e instanceof EncodingError) {
        return new EncodingError(e.detail, lineNum, line);
    }
    if (e instanceof LayoutError) {
        return new LayoutError(e.detail, lineNum, line);
    }
    return new ParseError(e.detail, lineNum, line);
}

// =============================================================================
// Source Parsing
// =============================================================================

export interface ParseResult {
    commands: Command[];
    macros: Map<string, Macro>;
    errors: AssemblerError[];
}

/**
 * Parse a whole source text.
 *
 * Every line is parsed even after an error, so all problems are reported.
 * Macro bodies are removed from the command stream and returned separately,
 * keyed by lowercased name.
 */
export function parseSource(source: string): ParseResult {
    const commands: Command[] = [];
    const macros = new Map<string, Macro>();
    const errors: AssemblerError[] = [];
    let current: Macro | null = null;

    const lines = source.split(/\r?\n/);
    for (let i = 0; i < lines.length; i++) {
        const lineNum = i + 1;
        let cmd: Command;
        try {
            cmd = parseCommand(lines[i], lineNum);
        } catch (e) {
            if (e instanceof AssemblerError) {
                errors.push(e);
                continue;
            }
            throw e;
        }

        if (cmd.opcode === '.macro') {
            if (current) {
                errors.push(new ParseError(
                    `Nested macro definition '${cmd.macroName}' inside '${current.name}'`,
                    lineNum,
                    cmd.line
                ));
                continue;
            }
            current = {
                name: cmd.macroName ?? '',
                params: cmd.macroParams ?? [],
                body: [],
                lineNum,
            };
            continue;
        }

        if (cmd.opcode === '.endmacro') {
            if (!current) {
                errors.push(new ParseError('.endmacro without matching .macro', lineNum, cmd.line));
                continue;
            }
            const key = current.name.toLowerCase();
            if (macros.has(key)) {
                errors.push(new ParseError(`Duplicate macro '${current.name}'`, current.lineNum, lines[current.lineNum - 1]));
            } else {
                macros.set(key, current);
            }
            current = null;
            continue;
        }

        if (cmd.opcode === '' && cmd.label === undefined) {
            continue;
        }

        if (current) {
            current.body.push(cmd);
        } else {
            commands.push(cmd);
        }
    }

    if (current) {
        errors.push(new ParseError(
            `Unclosed macro '${current.name}' (missing .endmacro)`,
            current.lineNum,
            lines[current.lineNum - 1]
        ));
    }

    return { commands, macros, errors };
}
