/**
 * ARC Emulator - Control Flow and Flags
 *
 * SPDX-License-Identifier: MIT
 *
 * PC has already been advanced past the instruction when these run, so the
 * return address CALL pushes is simply the current PC.
 */

import { flagNameById } from '@arc/assembler';
import type { DecodedInstruction, FlagName } from '@arc/assembler';
import { EmulatorFault } from '../errors';
import type { RegisterBank } from '../registers';
import type { ExecutionContext, HandlerTable } from './context';
import { addressOf } from './context';
import { popWord, pushWord } from './moves';

type Condition = (r: RegisterBank) => boolean;

function jumpIf(condition: Condition) {
    return (ctx: ExecutionContext, instr: DecodedInstruction): void => {
        const target = addressOf(ctx, instr, instr.operand1);
        if (condition(ctx.registers)) {
            ctx.registers.pc = target;
        }
    };
}

function flagOf(instr: DecodedInstruction): FlagName {
    const name = instr.operand1.type === 'flag' ? flagNameById(instr.operand1.id) : null;
    if (name === null) {
        throw new EmulatorFault('INVALID_OPERAND', `${instr.mnemonic} expects a flag id 0-7`);
    }
    return name;
}

export const controlHandlers = {
    JMP: jumpIf(() => true),
    JE: jumpIf(r => r.getFlag('zero')),
    JNE: jumpIf(r => !r.getFlag('zero')),
    JGT: jumpIf(r => !r.getFlag('zero') && !r.getFlag('sign')),
    JGE: jumpIf(r => !r.getFlag('sign')),
    JLT: jumpIf(r => !r.getFlag('zero') && r.getFlag('sign')),
    JLE: jumpIf(r => r.getFlag('zero') || r.getFlag('sign')),
    JS: jumpIf(r => r.getFlag('sign')),
    JCO: jumpIf(r => r.getFlag('carry') || r.getFlag('overflow')),

    CALL: (ctx, instr) => {
        const target = addressOf(ctx, instr, instr.operand1);
        pushWord(ctx, ctx.registers.pc);
        ctx.registers.pc = target;
    },

    RET: (ctx) => {
        ctx.registers.pc = popWord(ctx);
    },

    SETF: (ctx, instr) => {
        ctx.registers.setFlag(flagOf(instr), true);
    },

    CLRF: (ctx, instr) => {
        ctx.registers.setFlag(flagOf(instr), false);
    },

    HALT: (ctx) => {
        ctx.halt();
    },
} satisfies HandlerTable;
