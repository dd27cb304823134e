/**
 * ARC Emulator - I/O Instructions
 *
 * SPDX-License-Identifier: MIT
 *
 * Input is consumed only after the memory write succeeds.
 */

import { hex } from '@arc/assembler';
import type { HandlerTable } from './context';
import { WORD_SIZE, addressOf, valueOf } from './context';

const INTEGER_TOKEN = /^[+-]?\d+$/;

/** Integer value of an input token; 0 when it is not an integer. */
export function tokenValue(text: string | undefined): number {
    if (text === undefined || !INTEGER_TOKEN.test(text)) {
        return 0;
    }
    return Number(text) >>> 0;
}

export const ioHandlers = {
    IN: (ctx, instr) => {
        const addr = addressOf(ctx, instr, instr.operand1);
        const bytes = ctx.io.peekBytes();
        ctx.memory.writeBytes(addr, [...bytes, 0]);
        ctx.io.consume(bytes.length);
    },

    OUT: (ctx, instr) => {
        const addr = addressOf(ctx, instr, instr.operand1);
        ctx.io.write(ctx.memory.readCString(addr));
    },

    INSI: (ctx, instr) => {
        const addr = addressOf(ctx, instr, instr.operand1);
        const token = ctx.io.peekToken();
        ctx.memory.writeU32(addr, tokenValue(token?.text));
        if (token) {
            ctx.io.consume(token.end);
        }
    },

    INSW: (ctx, instr) => {
        // operand2 is the informational slot number
        const addr = addressOf(ctx, instr, instr.operand1);
        const bytes = ctx.io.peekBytes(WORD_SIZE);
        const word = new Uint8Array(WORD_SIZE);
        word.set(bytes);
        ctx.memory.writeBytes(addr, word);
        ctx.io.consume(bytes.length);
    },

    OUTI: (ctx, instr) => {
        ctx.io.write(`${valueOf(ctx, instr, instr.operand1)}\n`);
    },

    OUTW: (ctx, instr) => {
        // operand2 is informational; it is validated but does not change the output
        const addr = addressOf(ctx, instr, instr.operand1);
        valueOf(ctx, instr, instr.operand2);
        ctx.io.write(`${hex(ctx.memory.readU32(addr), 8)}\n`);
    },
} satisfies HandlerTable;
