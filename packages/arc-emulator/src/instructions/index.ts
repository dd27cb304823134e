/**
 * ARC Emulator - Instruction Table
 *
 * SPDX-License-Identifier: MIT
 */

import type { DecodedInstruction, Mnemonic } from '@arc/assembler';
import type { ExecutionContext, InstructionHandler } from './context';
import { moveHandlers } from './moves';
import { arithmeticHandlers } from './arithmetic';
import { bitwiseHandlers } from './bitwise';
import { controlHandlers } from './control';
import { ioHandlers } from './io';

export type { ExecutionContext, InstructionHandler } from './context';
export { shiftLeft, shiftRight } from './bitwise';

/** One handler per mnemonic; a missing entry is a compile error. */
export const HANDLERS: Record<Mnemonic, InstructionHandler> = {
    ...moveHandlers,
    ...arithmeticHandlers,
    ...bitwiseHandlers,
    ...controlHandlers,
    ...ioHandlers,
};

export function execute(ctx: ExecutionContext, instr: DecodedInstruction): void {
    HANDLERS[instr.mnemonic](ctx, instr);
}
