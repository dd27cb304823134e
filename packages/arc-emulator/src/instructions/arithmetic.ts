/**
 * ARC Emulator - Arithmetic
 *
 * SPDX-License-Identifier: MIT
 *
 * ADDW, SUBW, MUL, INC, DEC and NEG operate on f32: register bits are
 * reinterpreted and results rounded to single precision. Afterwards
 * zero = (result == 0), sign = (result < 0), carry and overflow are cleared.
 */

import type { DecodedInstruction } from '@arc/assembler';
import type { ExecutionContext, HandlerTable } from './context';
import { floatOf, registerOf } from './context';

type FloatOp = (a: number, b: number) => number;

function binary(op: FloatOp) {
    return (ctx: ExecutionContext, instr: DecodedInstruction): void => {
        const reg = registerOf(instr, instr.operand1);
        const a = ctx.registers.getFloat(reg);
        const b = floatOf(ctx, instr, instr.operand2);
        const result = Math.fround(op(a, b));
        ctx.registers.setFloat(reg, result);
        ctx.registers.updateFloatFlags(result);
    };
}

function unary(op: (a: number) => number) {
    return (ctx: ExecutionContext, instr: DecodedInstruction): void => {
        const reg = registerOf(instr, instr.operand1);
        const result = Math.fround(op(ctx.registers.getFloat(reg)));
        ctx.registers.setFloat(reg, result);
        ctx.registers.updateFloatFlags(result);
    };
}

export const arithmeticHandlers = {
    ADDW: binary((a, b) => a + b),
    SUBW: binary((a, b) => a - b),
    MUL: binary((a, b) => a * b),
    INC: unary(a => a + 1),
    DEC: unary(a => a - 1),
    NEG: unary(a => -a),
} satisfies HandlerTable;
