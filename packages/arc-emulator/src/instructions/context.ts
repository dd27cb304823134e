/**
 * ARC Emulator - Instruction Context
 *
 * SPDX-License-Identifier: MIT
 *
 * What a handler sees, and the operand accessors shared by all handlers.
 * Handlers validate operands and perform reads before they write, so a
 * fault leaves the instruction without partial effects.
 */

import { formatOperand } from '@arc/assembler';
import type { DecodedInstruction, Mnemonic, Operand, RegId } from '@arc/assembler';
import { EmulatorFault } from '../errors';
import type { Memory } from '../memory';
import type { RegisterBank } from '../registers';
import type { IoDevice } from '../io';

export interface ExecutionContext {
    registers: RegisterBank;
    memory: Memory;
    io: IoDevice;
    halt(): void;
}

export type InstructionHandler = (ctx: ExecutionContext, instr: DecodedInstruction) => void;

export type HandlerTable = Partial<Record<Mnemonic, InstructionHandler>>;

export const WORD_SIZE = 4;

function invalid(instr: DecodedInstruction, operand: Operand, expected: string): EmulatorFault {
    return new EmulatorFault(
        'INVALID_OPERAND',
        `${instr.mnemonic} expects ${expected}, got ${operand.type === 'none' ? 'nothing' : formatOperand(operand)}`
    );
}

export function registerOf(instr: DecodedInstruction, operand: Operand): RegId {
    if (operand.type !== 'register') {
        throw invalid(instr, operand, 'a register');
    }
    return operand.reg;
}

/** Raw u32 of a register or immediate operand. */
export function valueOf(ctx: ExecutionContext, instr: DecodedInstruction, operand: Operand): number {
    switch (operand.type) {
        case 'register':
            return ctx.registers.get(operand.reg);
        case 'immediate':
            return operand.value >>> 0;
        default:
            throw invalid(instr, operand, 'a register or immediate');
    }
}

/**
 * f32 view of a register or immediate operand.
 * Registers are reinterpreted; immediates are converted numerically (10 -> 10.0).
 */
export function floatOf(ctx: ExecutionContext, instr: DecodedInstruction, operand: Operand): number {
    switch (operand.type) {
        case 'register':
            return ctx.registers.getFloat(operand.reg);
        case 'immediate':
            return Math.fround(operand.value);
        default:
            throw invalid(instr, operand, 'a register or immediate');
    }
}

/** Effective address of a direct or register-indirect operand. */
export function addressOf(ctx: ExecutionContext, instr: DecodedInstruction, operand: Operand): number {
    switch (operand.type) {
        case 'address':
        case 'immediate':
            return operand.value;
        case 'addressRegister':
            return ctx.registers.get(operand.reg);
        default:
            throw invalid(instr, operand, 'an address or [register]');
    }
}
