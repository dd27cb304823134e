/**
 * ARC Emulator - Bitwise, Shift and Compare
 *
 * SPDX-License-Identifier: MIT
 *
 * Raw u32 operations. NOT/AND/OR/XOR set flags addition-style (NOT with
 * b = 0); CMPW sets them subtraction-style and discards the difference.
 */

import type { DecodedInstruction } from '@arc/assembler';
import type { ExecutionContext, HandlerTable } from './context';
import { registerOf, valueOf } from './context';

function logical(op: (a: number, b: number) => number) {
    return (ctx: ExecutionContext, instr: DecodedInstruction): void => {
        const reg = registerOf(instr, instr.operand1);
        const a = ctx.registers.get(reg);
        const b = valueOf(ctx, instr, instr.operand2);
        const result = op(a, b) >>> 0;
        ctx.registers.set(reg, result);
        ctx.registers.updateIntegerFlags(result, a, b, 'add');
    };
}

/**
 * Logical shift left. Returns the result and the last bit shifted out.
 */
export function shiftLeft(value: number, count: number): { result: number; carry: boolean } {
    if (count === 0) {
        return { result: value >>> 0, carry: false };
    }
    if (count >= 32) {
        return { result: 0, carry: count === 32 && (value & 1) === 1 };
    }
    return {
        result: (value << count) >>> 0,
        carry: ((value >>> (32 - count)) & 1) === 1,
    };
}

/**
 * Logical shift right. Returns the result and the last bit shifted out.
 */
export function shiftRight(value: number, count: number): { result: number; carry: boolean } {
    if (count === 0) {
        return { result: value >>> 0, carry: false };
    }
    if (count >= 32) {
        return { result: 0, carry: count === 32 && (value >>> 31) === 1 };
    }
    return {
        result: value >>> count,
        carry: ((value >>> (count - 1)) & 1) === 1,
    };
}

function shift(op: typeof shiftLeft) {
    return (ctx: ExecutionContext, instr: DecodedInstruction): void => {
        const reg = registerOf(instr, instr.operand1);
        const count = valueOf(ctx, instr, instr.operand2);
        const { result, carry } = op(ctx.registers.get(reg), count);
        ctx.registers.set(reg, result);
        ctx.registers.updateShiftFlags(result, carry);
    };
}

export const bitwiseHandlers = {
    NOT: (ctx, instr) => {
        const reg = registerOf(instr, instr.operand1);
        const a = ctx.registers.get(reg);
        const result = ~a >>> 0;
        ctx.registers.set(reg, result);
        ctx.registers.updateIntegerFlags(result, a, 0, 'add');
    },

    AND: logical((a, b) => a & b),
    OR: logical((a, b) => a | b),
    XOR: logical((a, b) => a ^ b),
    SHL: shift(shiftLeft),
    SHR: shift(shiftRight),

    CMPW: (ctx, instr) => {
        const a = ctx.registers.get(registerOf(instr, instr.operand1));
        const b = valueOf(ctx, instr, instr.operand2);
        ctx.registers.updateIntegerFlags((a - b) >>> 0, a, b, 'sub');
    },
} satisfies HandlerTable;
