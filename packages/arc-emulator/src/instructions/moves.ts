/**
 * ARC Emulator - Data Movement and Stack
 *
 * SPDX-License-Identifier: MIT
 *
 * By default the stack grows downward: PUSH writes [SP-4] then SP -= 4,
 * POP reads [SP] then SP += 4. With the stack_dir flag set both directions
 * are mirrored. CALL and RET in control.ts use the same helpers.
 */

import type { ExecutionContext, HandlerTable } from './context';
import { WORD_SIZE, addressOf, registerOf, valueOf } from './context';

export function pushWord(ctx: ExecutionContext, value: number): void {
    const { registers, memory } = ctx;
    if (registers.getFlag('stack_dir')) {
        memory.writeU32(registers.sp, value);
        registers.sp = registers.sp + WORD_SIZE;
    } else {
        const addr = registers.sp - WORD_SIZE;
        memory.writeU32(addr, value);
        registers.sp = addr;
    }
}

export function popWord(ctx: ExecutionContext): number {
    const { registers, memory } = ctx;
    if (registers.getFlag('stack_dir')) {
        const addr = registers.sp - WORD_SIZE;
        const value = memory.readU32(addr);
        registers.sp = addr;
        return value;
    }
    const value = memory.readU32(registers.sp);
    registers.sp = registers.sp + WORD_SIZE;
    return value;
}

export const moveHandlers = {
    MOVI: (ctx, instr) => {
        const reg = registerOf(instr, instr.operand1);
        ctx.registers.set(reg, valueOf(ctx, instr, instr.operand2));
    },

    MOVW: (ctx, instr) => {
        const reg = registerOf(instr, instr.operand1);
        ctx.registers.set(reg, valueOf(ctx, instr, instr.operand2));
    },

    LODI: (ctx, instr) => {
        const reg = registerOf(instr, instr.operand1);
        ctx.registers.set(reg, valueOf(ctx, instr, instr.operand2));
    },

    LODW: (ctx, instr) => {
        const reg = registerOf(instr, instr.operand1);
        const value = ctx.memory.readU32(addressOf(ctx, instr, instr.operand2));
        ctx.registers.set(reg, value);
    },

    STRI: (ctx, instr) => {
        const addr = addressOf(ctx, instr, instr.operand1);
        ctx.memory.writeU32(addr, valueOf(ctx, instr, instr.operand2));
    },

    STRW: (ctx, instr) => {
        const addr = addressOf(ctx, instr, instr.operand1);
        ctx.memory.writeU32(addr, valueOf(ctx, instr, instr.operand2));
    },

    PUSH: (ctx, instr) => {
        pushWord(ctx, valueOf(ctx, instr, instr.operand1));
    },

    POP: (ctx, instr) => {
        const reg = registerOf(instr, instr.operand1);
        const value = popWord(ctx);
        ctx.registers.set(reg, value);
    },

    XCGH: (ctx, instr) => {
        const a = registerOf(instr, instr.operand1);
        const b = registerOf(instr, instr.operand2);
        const tmp = ctx.registers.get(a);
        ctx.registers.set(a, ctx.registers.get(b));
        ctx.registers.set(b, tmp);
    },
} satisfies HandlerTable;
