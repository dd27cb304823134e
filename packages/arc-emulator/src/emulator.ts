/**
 * ARC Emulator - Execution Driver
 *
 * SPDX-License-Identifier: MIT
 *
 * Fetch-decode-execute loop over one Memory, RegisterBank and IoDevice.
 *
 * Usage:
 *   import { assemble } from '@arc/assembler';
 *   import { Emulator } from '@arc/emulator';
 *
 *   const emu = new Emulator();
 *   emu.load(assemble(source));
 *   const result = emu.run();
 *   console.log(result.reason, emu.snapshot().registers.AX);
 */

import { decodeInstruction, disassembleWord, DecodeError, hex } from '@arc/assembler';
import type { AssembledProgram, DecodedInstruction, FlagName, Logger, RegName } from '@arc/assembler';
import { resolveEmulatorConfig } from './config';
import { EmulatorFault } from './errors';
import { IoDevice } from './io';
import { Memory } from './memory';
import { RegisterBank } from './registers';
import { execute } from './instructions';
import type { ExecutionContext } from './instructions';

export type EmulatorStatus = 'ready' | 'halted' | 'faulted';

export type RunReason = 'halted' | 'end-of-memory' | 'faulted' | 'step-limit';

export const DEFAULT_MAX_STEPS = 1_000_000;

export interface EmulatorOptions {
    /** Bytes, or text such as "64KB" (default 64KB) */
    memorySize?: number | string;
    /** Initial pending input */
    input?: string;
    verbose?: boolean;
    logger?: Logger;
}

export interface RunOptions {
    maxSteps?: number;
    /** Called after every executed instruction with the address it was fetched from */
    onStep?: (instr: DecodedInstruction, pc: number) => void;
}

export interface RunResult {
    reason: RunReason;
    /** Instructions executed by this run */
    steps: number;
    pc: number;
    fault?: EmulatorFault;
}

export interface EmulatorSnapshot {
    status: EmulatorStatus;
    halted: boolean;
    registers: Record<RegName, number>;
    flags: Record<FlagName, boolean>;
    /** Disassembly at PC, or null when PC is outside memory */
    currentInstruction: string | null;
}

export class Emulator {
    readonly memory: Memory;
    readonly registers = new RegisterBank();
    readonly io: IoDevice;

    private _status: EmulatorStatus = 'ready';
    private _steps = 0;
    private _lastFault: EmulatorFault | null = null;
    private readonly verbose: boolean;
    private readonly logger: Logger;
    private readonly context: ExecutionContext;

    constructor(options: EmulatorOptions = {}) {
        const config = resolveEmulatorConfig({ memorySize: options.memorySize }, {});
        this.memory = new Memory(config.memorySize);
        this.io = new IoDevice(options.input);
        this.verbose = options.verbose ?? false;
        this.logger = options.logger ?? console;
        this.context = {
            registers: this.registers,
            memory: this.memory,
            io: this.io,
            halt: () => {
                this._status = 'halted';
            },
        };
    }

    get status(): EmulatorStatus {
        return this._status;
    }

    get halted(): boolean {
        return this._status === 'halted';
    }

    /** Instructions executed since the last load. */
    get steps(): number {
        return this._steps;
    }

    get lastFault(): EmulatorFault | null {
        return this._lastFault;
    }

    get output(): string {
        return this.io.output;
    }

    private log(message: string): void {
        if (this.verbose) {
            this.logger.log(`[Emulator] ${message}`);
        }
    }

    // =========================================================================
    // Loading
    // =========================================================================

    /**
     * Reset the machine and load an assembled program.
     *
     * PC is set to the text start and SP to the stack start.
     *
     * @throws EmulatorFault(PROGRAM_MISMATCH) if the program was assembled for another memory size
     */
    load(program: AssembledProgram, input: string = this.io.input): void {
        if (program.memorySize !== this.memory.size) {
            throw new EmulatorFault(
                'PROGRAM_MISMATCH',
                `Program was assembled for ${program.memorySize} bytes of memory, emulator has ${this.memory.size}`
            );
        }

        this.registers.reset();
        this.memory.clear();
        this.io.reset(input);
        this._status = 'ready';
        this._steps = 0;
        this._lastFault = null;

        this.memory.loadWords(program.actualTextStart, program.text);
        this.memory.writeBytes(program.actualDataStart, program.data);
        this.registers.pc = program.actualTextStart;
        this.registers.sp = program.actualStackStart;

        this.log(
            `loaded ${program.text.length} words at ${hex(program.actualTextStart, 4)}, ` +
            `${program.data.length} data bytes at ${hex(program.actualDataStart, 4)}, ` +
            `SP=${hex(program.actualStackStart, 4)}`
        );
    }

    // =========================================================================
    // Execution
    // =========================================================================

    private decode(word: number): DecodedInstruction {
        try {
            return decodeInstruction(word);
        } catch (e) {
            if (e instanceof DecodeError) {
                throw new EmulatorFault(e.code === 'UNKNOWN_OPCODE' ? 'UNKNOWN_OPCODE' : 'INVALID_OPERAND', e.message);
            }
            throw e;
        }
    }

    /**
     * Execute one instruction.
     *
     * PC is advanced past the instruction before it executes. On a fault PC
     * is restored, the status becomes 'faulted' and the fault is thrown;
     * stepping again retries the same instruction.
     *
     * @returns The executed instruction
     * @throws EmulatorFault
     */
    step(): DecodedInstruction {
        const pc = this.registers.pc;
        if (this._status === 'halted') {
            throw new EmulatorFault('ALREADY_HALTED', 'Emulator is halted; load a program to run again', pc);
        }

        try {
            const instr = this.decode(this.memory.readU32(pc));
            this.registers.pc = pc + 4;
            execute(this.context, instr);
            this._steps++;
            if (this._status === 'faulted') {
                this._status = 'ready';
            }
            return instr;
        } catch (e) {
            if (e instanceof EmulatorFault) {
                this.registers.pc = pc;
                this._status = 'faulted';
                this._lastFault = e.pc === null ? e.atPc(pc) : e;
                throw this._lastFault;
            }
            throw e;
        }
    }

    /**
     * Step until the program halts, runs off the end of memory, faults or
     * reaches the step limit.
     */
    run(options: RunOptions = {}): RunResult {
        const maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
        let steps = 0;

        const finish = (reason: RunReason, fault?: EmulatorFault): RunResult => {
            const result: RunResult = { reason, steps, pc: this.registers.pc };
            if (fault) {
                result.fault = fault;
                this.log(`faulted at ${hex(this.registers.pc, 4)}: ${fault.message}`);
            } else {
                this.log(`${reason} at ${hex(this.registers.pc, 4)} after ${steps} steps`);
            }
            return result;
        };

        for (;;) {
            if (this._status === 'halted') {
                return finish('halted');
            }
            // A whole word must fit at pc
            if (this.registers.pc + 4 > this.memory.size) {
                return finish('end-of-memory');
            }
            if (steps >= maxSteps) {
                return finish('step-limit');
            }

            const pc = this.registers.pc;
            let instr: DecodedInstruction;
            try {
                instr = this.step();
            } catch (e) {
                if (e instanceof EmulatorFault) {
                    return finish('faulted', e);
                }
                throw e;
            }
            steps++;
            options.onStep?.(instr, pc);
        }
    }

    // =========================================================================
    // Inspection
    // =========================================================================

    readMemory(addr: number, length: number): Uint8Array {
        return this.memory.readBytes(addr, length);
    }

    snapshot(): EmulatorSnapshot {
        const pc = this.registers.pc;
        const currentInstruction = pc + 4 <= this.memory.size
            ? disassembleWord(this.memory.readU32(pc))
            : null;

        return {
            status: this._status,
            halted: this.halted,
            registers: this.registers.toRecord(),
            flags: this.registers.flagsRecord(),
            currentInstruction,
        };
    }
}
