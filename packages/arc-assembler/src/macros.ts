/**
 * ARC Assembler - Macro Expansion
 *
 * SPDX-License-Identifier: MIT
 *
 * A macro invocation is replaced by a copy of the macro body. Body operands
 * that are labels named like a parameter are substituted positionally:
 * operand1 -> parameter 0, operand2 -> parameter 1.
 */

import type { Command, Macro, Operand } from './types';
import { AssemblerError, ParseError, ASSEMBLER_DEFAULTS, NO_OPERAND } from './types';

export interface ExpansionResult {
    commands: Command[];
    errors: AssemblerError[];
}

function substitute(operand: Operand, macro: Macro, args: Operand[], call: Command): Operand {
    if (operand.type !== 'label') {
        return operand;
    }
    const index = macro.params.indexOf(operand.name);
    if (index === -1) {
        return operand;
    }
    const arg = args[index];
    if (arg === undefined || arg.type === 'none') {
        throw new ParseError(
            `Missing argument for macro parameter '${operand.name}' of '${macro.name}'`,
            call.lineNum,
            call.line
        );
    }
    return arg;
}

function expandCommand(
    cmd: Command,
    macros: Map<string, Macro>,
    depth: number,
    out: Command[]
): void {
    const macro = macros.get(cmd.opcode);
    if (!macro) {
        out.push(cmd);
        return;
    }

    if (depth >= ASSEMBLER_DEFAULTS.MAX_MACRO_DEPTH) {
        throw new ParseError(
            `Macro '${macro.name}' nested deeper than ${ASSEMBLER_DEFAULTS.MAX_MACRO_DEPTH} levels`,
            cmd.lineNum,
            cmd.line
        );
    }

    // The invoking line's label marks the first expanded instruction
    if (cmd.label !== undefined) {
        out.push({
            opcode: '',
            label: cmd.label,
            operand1: NO_OPERAND,
            operand2: NO_OPERAND,
            lineNum: cmd.lineNum,
            line: cmd.line,
        });
    }

    const args = [cmd.operand1, cmd.operand2];
    for (const bodyCmd of macro.body) {
        const expanded: Command = {
            ...bodyCmd,
            operand1: substitute(bodyCmd.operand1, macro, args, cmd),
            operand2: substitute(bodyCmd.operand2, macro, args, cmd),
            lineNum: cmd.lineNum,
            line: `${cmd.line.trim()}  ; ${macro.name}: ${bodyCmd.line.trim()}`,
        };
        expandCommand(expanded, macros, depth + 1, out);
    }
}

/**
 * Expand every macro invocation in a command list.
 *
 * Expanded commands carry the invoking line number so errors point at the call site.
 */
export function expandMacros(commands: Command[], macros: Map<string, Macro>): ExpansionResult {
    const out: Command[] = [];
    const errors: AssemblerError[] = [];

    for (const cmd of commands) {
        try {
            expandCommand(cmd, macros, 0, out);
        } catch (e) {
            if (e instanceof AssemblerError) {
                errors.push(e);
                continue;
            }
            throw e;
        }
    }

    return { commands: out, errors };
}
