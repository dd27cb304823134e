/**
 * ARC Emulator
 *
 * SPDX-License-Identifier: MIT
 */

export { Emulator, DEFAULT_MAX_STEPS } from './emulator';
export type {
    EmulatorOptions,
    EmulatorSnapshot,
    EmulatorStatus,
    RunOptions,
    RunReason,
    RunResult,
} from './emulator';
export { EmulatorFault, ConfigError } from './errors';
export type { FaultCode } from './errors';
export {
    KB,
    MB,
    DEFAULT_MEMORY_SIZE,
    MIN_MEMORY_SIZE,
    MAX_MEMORY_SIZE,
    MEMORY_ENV_VAR,
    SOURCE_EXTENSIONS,
    parseMemorySize,
    validateMemorySize,
    resolveEmulatorConfig,
    formatMemorySize,
} from './config';
export type { EmulatorConfig, EmulatorConfigInput } from './config';
export { Memory } from './memory';
export { RegisterBank, bitsToFloat, floatToBits } from './registers';
export type { FlagMode } from './registers';
export { IoDevice } from './io';
export type { InputToken } from './io';
export { HANDLERS, execute, shiftLeft, shiftRight } from './instructions';
export type { ExecutionContext, InstructionHandler } from './instructions';
