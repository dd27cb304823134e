/**
 * ARC Emulator - Faults
 *
 * SPDX-License-Identifier: MIT
 */

import { hex } from '@arc/assembler';

export type FaultCode =
    | 'MEMORY_OUT_OF_BOUNDS'
    | 'UNKNOWN_OPCODE'
    | 'INVALID_OPERAND'
    | 'ALREADY_HALTED'
    | 'PROGRAM_MISMATCH';

/**
 * A recoverable execution fault.
 *
 * Raised below the instruction level without a PC; the emulator attaches the
 * address of the faulting instruction with `atPc`.
 */
export class EmulatorFault extends Error {
    readonly code: FaultCode;
    readonly detail: string;
    readonly pc: number | null;

    constructor(code: FaultCode, detail: string, pc: number | null = null) {
        super(pc === null ? `${code}: ${detail}` : `${code} at ${hex(pc, 4)}: ${detail}`);
        this.name = 'EmulatorFault';
        this.code = code;
        this.detail = detail;
        this.pc = pc;
    }

    atPc(pc: number): EmulatorFault {
        return new EmulatorFault(this.code, this.detail, pc);
    }
}

/**
 * Invalid emulator configuration (memory size).
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}
