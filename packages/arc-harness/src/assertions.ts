import { bitsToFloat } from '@arc/emulator';
import type { Emulator, FaultCode, RunResult } from '@arc/emulator';
import { Reg, hex } from '@arc/assembler';
import type { AssembledProgram, FlagName, RegName } from '@arc/assembler';
import type { TraceFrame } from './protocol';

export type MemoryWidth = 1 | 2 | 4;

export type Assertion =
  | { type: 'pattern'; pattern: RegExp | string }
  | { type: 'register'; register: RegName; expected: number }
  | { type: 'float'; register: RegName; expected: number; tolerance?: number }
  | { type: 'memory'; address: number | string; expected: number; width?: MemoryWidth }
  | { type: 'flag'; flag: FlagName; expected: boolean }
  | { type: 'output'; expected: string }
  | { type: 'fault'; code: FaultCode }
  | { type: 'no_fault' }
  | { type: 'halted' };

export type AssertionType = Assertion['type'];

/** Everything an assertion can look at once a program has run. */
export interface Observation {
  frames: TraceFrame[];
  emulator: Emulator;
  program: AssembledProgram;
  result: RunResult;
}

const DEFAULT_FLOAT_TOLERANCE = 1e-6;

export function assertPattern(frames: TraceFrame[], pattern: RegExp | string): boolean {
  const regex = typeof pattern === 'string' ? new RegExp(pattern) : pattern;
  return frames.some(f => regex.test(f.raw));
}

export function assertRegister(emulator: Emulator, register: RegName, expected: number): boolean {
  return emulator.registers.get(Reg[register]) === expected >>> 0;
}

export function assertFloat(emulator: Emulator, register: RegName, expected: number, tolerance: number = DEFAULT_FLOAT_TOLERANCE): boolean {
  const actual = bitsToFloat(emulator.registers.get(Reg[register]));
  return Math.abs(actual - expected) <= tolerance;
}

/**
 * Resolve a numeric address or a symbol name.
 */
export function resolveAddress(program: AssembledProgram, address: number | string): number {
  if (typeof address === 'number') return address;
  const value = program.symbols.get(address);
  if (value === undefined) {
    throw new Error(`Unknown symbol '${address}'`);
  }
  return value;
}

export function readMemory(emulator: Emulator, addr: number, width: MemoryWidth): number {
  switch (width) {
    case 1:
      return emulator.memory.readU8(addr);
    case 2:
      return emulator.memory.readU16(addr);
    case 4:
      return emulator.memory.readU32(addr);
  }
}

export function assertMemory(emulator: Emulator, addr: number, expected: number, width: MemoryWidth = 4): boolean {
  return readMemory(emulator, addr, width) === expected >>> 0;
}

export function assertFlag(emulator: Emulator, flag: FlagName, expected: boolean): boolean {
  return emulator.registers.getFlag(flag) === expected;
}

export function assertOutput(emulator: Emulator, expected: string): boolean {
  return emulator.output === expected;
}

export function assertFault(result: RunResult, code: FaultCode): boolean {
  return result.fault?.code === code;
}

export function assertNoFault(result: RunResult): boolean {
  return result.reason !== 'faulted';
}

export function assertHalted(result: RunResult): boolean {
  return result.reason === 'halted';
}

export function evaluate(assertion: Assertion, obs: Observation): boolean {
  switch (assertion.type) {
    case 'pattern':
      return assertPattern(obs.frames, assertion.pattern);
    case 'register':
      return assertRegister(obs.emulator, assertion.register, assertion.expected);
    case 'float':
      return assertFloat(obs.emulator, assertion.register, assertion.expected, assertion.tolerance);
    case 'memory':
      return assertMemory(obs.emulator, resolveAddress(obs.program, assertion.address), assertion.expected, assertion.width);
    case 'flag':
      return assertFlag(obs.emulator, assertion.flag, assertion.expected);
    case 'output':
      return assertOutput(obs.emulator, assertion.expected);
    case 'fault':
      return assertFault(obs.result, assertion.code);
    case 'no_fault':
      return assertNoFault(obs.result);
    case 'halted':
      return assertHalted(obs.result);
  }
}

/**
 * One-line description of what was expected and what was observed.
 */
export function describeFailure(assertion: Assertion, obs: Observation): string {
  const { emulator, result } = obs;
  switch (assertion.type) {
    case 'pattern':
      return `no frame matched ${String(assertion.pattern)}`;
    case 'register':
      return `${assertion.register} expected ${hex(assertion.expected, 8)}, got ${hex(emulator.registers.get(Reg[assertion.register]), 8)}`;
    case 'float':
      return `${assertion.register} expected ${assertion.expected}, got ${bitsToFloat(emulator.registers.get(Reg[assertion.register]))}`;
    case 'memory': {
      const addr = resolveAddress(obs.program, assertion.address);
      return `memory ${hex(addr, 4)} expected ${hex(assertion.expected, 8)}, got ${hex(readMemory(emulator, addr, assertion.width ?? 4), 8)}`;
    }
    case 'flag':
      return `flag ${assertion.flag} expected ${assertion.expected}, got ${emulator.registers.getFlag(assertion.flag)}`;
    case 'output':
      return `output expected ${JSON.stringify(assertion.expected)}, got ${JSON.stringify(emulator.output)}`;
    case 'fault':
      return `expected fault ${assertion.code}, got ${result.fault?.code ?? 'none'}`;
    case 'no_fault':
      return `unexpected fault: ${result.fault?.message ?? result.reason}`;
    case 'halted':
      return `expected halt, run ended with ${result.reason}`;
  }
}
