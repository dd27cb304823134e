import * as fs from 'fs';
import * as path from 'path';
import { FLAG_NAMES, REGISTER_NAMES } from '@arc/assembler';
import type { FlagName, RegName } from '@arc/assembler';
import type { FaultCode } from '@arc/emulator';
import type { Assertion, MemoryWidth } from './assertions';
import type { TraceMode } from './device';
import type { ProgramTestCase, TestCategory } from './runner';

export interface TestSuite {
  name: string;
  tests: ProgramTestCase[];
}

/**
 * A suite file that does not have the expected shape.
 */
export class SuiteFormatError extends Error {
  constructor(where: string, message: string) {
    super(`${where}: ${message}`);
    this.name = 'SuiteFormatError';
  }
}

const CATEGORIES: readonly TestCategory[] = ['opcode', 'program', 'io', 'fault'];
const TRACE_MODES: readonly TraceMode[] = ['off', 'summary', 'verbose'];
const FAULT_CODES: readonly FaultCode[] = [
  'MEMORY_OUT_OF_BOUNDS',
  'UNKNOWN_OPCODE',
  'INVALID_OPERAND',
  'ALREADY_HALTED',
  'PROGRAM_MISMATCH',
];
const WIDTHS: readonly MemoryWidth[] = [1, 2, 4];

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function record(value: unknown, where: string): Json {
  if (!isRecord(value)) throw new SuiteFormatError(where, 'expected an object');
  return value;
}

function str(obj: Json, key: string, where: string): string {
  const value = obj[key];
  if (typeof value !== 'string') throw new SuiteFormatError(where, `'${key}' must be a string`);
  return value;
}

function num(obj: Json, key: string, where: string): number {
  const value = obj[key];
  if (typeof value !== 'number') throw new SuiteFormatError(where, `'${key}' must be a number`);
  return value;
}

function optional<T>(obj: Json, key: string, read: (obj: Json, key: string, where: string) => T, where: string): T | undefined {
  return obj[key] === undefined ? undefined : read(obj, key, where);
}

function oneOf<T extends string | number>(allowed: readonly T[], value: unknown, what: string, where: string): T {
  const match = allowed.find(a => a === value);
  if (match === undefined) {
    throw new SuiteFormatError(where, `unknown ${what} ${JSON.stringify(value)}`);
  }
  return match;
}

function parseAssertion(value: unknown, where: string): Assertion {
  const a = record(value, where);
  const type = str(a, 'type', where);

  switch (type) {
    case 'pattern':
      return { type, pattern: str(a, 'pattern', where) };
    case 'register':
      return { type, register: oneOf<RegName>(REGISTER_NAMES, a.register, 'register', where), expected: num(a, 'expected', where) };
    case 'float': {
      const tolerance = optional(a, 'tolerance', num, where);
      const register = oneOf<RegName>(REGISTER_NAMES, a.register, 'register', where);
      return tolerance === undefined
        ? { type, register, expected: num(a, 'expected', where) }
        : { type, register, expected: num(a, 'expected', where), tolerance };
    }
    case 'memory': {
      const address = typeof a.address === 'string' ? a.address : num(a, 'address', where);
      const width = a.width === undefined ? undefined : oneOf(WIDTHS, a.width, 'width', where);
      return width === undefined
        ? { type, address, expected: num(a, 'expected', where) }
        : { type, address, expected: num(a, 'expected', where), width };
    }
    case 'flag': {
      if (typeof a.expected !== 'boolean') throw new SuiteFormatError(where, "'expected' must be a boolean");
      return { type, flag: oneOf<FlagName>(FLAG_NAMES, a.flag, 'flag', where), expected: a.expected };
    }
    case 'output':
      return { type, expected: str(a, 'expected', where) };
    case 'fault':
      return { type, code: oneOf(FAULT_CODES, a.code, 'fault code', where) };
    case 'no_fault':
    case 'halted':
      return { type };
    default:
      throw new SuiteFormatError(where, `unknown assertion type '${type}'`);
  }
}

function parseTest(value: unknown, where: string, baseDir: string | null): ProgramTestCase {
  const t = record(value, where);

  let source: string;
  if (typeof t.sourceFile === 'string') {
    if (baseDir === null) throw new SuiteFormatError(where, "'sourceFile' needs a suite loaded from disk");
    source = fs.readFileSync(path.resolve(baseDir, t.sourceFile), 'utf-8');
  } else {
    source = str(t, 'source', where);
  }

  if (!Array.isArray(t.assertions)) throw new SuiteFormatError(where, "'assertions' must be an array");

  const test: ProgramTestCase = {
    id: str(t, 'id', where),
    name: optional(t, 'name', str, where) ?? str(t, 'id', where),
    category: t.category === undefined ? 'program' : oneOf(CATEGORIES, t.category, 'category', where),
    source,
    traceMode: t.traceMode === undefined ? 'summary' : oneOf(TRACE_MODES, t.traceMode, 'trace mode', where),
    assertions: t.assertions.map((a: unknown, i: number) => parseAssertion(a, `${where}.assertions[${i}]`))
  };

  if (typeof t.memorySize === 'string' || typeof t.memorySize === 'number') test.memorySize = t.memorySize;
  const maxSteps = optional(t, 'maxSteps', num, where);
  if (maxSteps !== undefined) test.maxSteps = maxSteps;
  const input = optional(t, 'input', str, where);
  if (input !== undefined) test.input = input;

  return test;
}

/**
 * Validate parsed JSON as a test suite.
 *
 * @param baseDir - Directory `sourceFile` entries are resolved against
 */
export function parseSuite(value: unknown, baseDir: string | null = null): TestSuite {
  const s = record(value, 'suite');
  if (!Array.isArray(s.tests)) throw new SuiteFormatError('suite', "'tests' must be an array");

  return {
    name: str(s, 'name', 'suite'),
    tests: s.tests.map((t: unknown, i: number) => parseTest(t, `tests[${i}]`, baseDir))
  };
}

/**
 * Read a JSON suite file. Test sources may be inline (`source`) or a path
 * relative to the suite file (`sourceFile`).
 */
export function loadSuite(filePath: string): TestSuite {
  const text = fs.readFileSync(filePath, 'utf-8');
  return parseSuite(JSON.parse(text), path.dirname(path.resolve(filePath)));
}
