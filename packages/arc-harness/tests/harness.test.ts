import { describe, test, expect } from 'vitest';
import { fileURLToPath } from 'url';
import { assemble } from '@arc/assembler';
import {
  EmulatorDevice,
  JUnitReporter,
  SuiteFormatError,
  connect,
  createFrame,
  loadSuite,
  parseFrame,
  parseSuite,
  run,
  runSuite
} from '../src/index';
import type { DeviceStatus, ProgramTestCase, TestResult, TestSuite, TraceFrame } from '../src/index';

function testCase(id: string, source: string, overrides: Partial<ProgramTestCase> = {}): ProgramTestCase {
  return { id, name: id, category: 'program', source, traceMode: 'summary', assertions: [], ...overrides };
}

function collect(device: EmulatorDevice): TraceFrame[] {
  const frames: TraceFrame[] = [];
  device.on('frame', (frame: TraceFrame) => frames.push(frame));
  return frames;
}

// =============================================================================
// Protocol
// =============================================================================

describe('protocol', () => {
  test('createFrame serializes the payload', () => {
    const frame = createFrame({ t: 'halt', pc: 8, steps: 2 }, 1000);
    expect(frame).toEqual({
      type: 'halt',
      timestamp: 1000,
      raw: '{"t":"halt","pc":8,"steps":2}',
      payload: { t: 'halt', pc: 8, steps: 2 }
    });
  });

  test('parseFrame reads a frame line', () => {
    const frame = parseFrame('  {"t":"fault","code":"UNKNOWN_OPCODE","msg":"Unknown opcode: 0x00","pc":0}\n');
    expect(frame?.type).toBe('fault');
    expect(frame?.payload).toEqual({ t: 'fault', code: 'UNKNOWN_OPCODE', msg: 'Unknown opcode: 0x00', pc: 0 });
    expect(frame?.raw).toBe('{"t":"fault","code":"UNKNOWN_OPCODE","msg":"Unknown opcode: 0x00","pc":0}');
  });

  test('parseFrame rejects lines that are not frames', () => {
    expect(parseFrame('hello')).toBeNull();
    expect(parseFrame('{not json}')).toBeNull();
    expect(parseFrame('{"t":"bogus"}')).toBeNull();
    expect(parseFrame('{"t":"halt","pc":"8","steps":2}')).toBeNull();
    expect(parseFrame('{"t":"end","reason":"crashed","pc":0,"steps":0}')).toBeNull();
  });
});

// =============================================================================
// Device
// =============================================================================

describe('EmulatorDevice', () => {
  const program = assemble('OUTI 8\nHALT');

  test('summary mode emits load, out, halt and end frames', () => {
    const device = new EmulatorDevice();
    const frames = collect(device);
    device.load(program);
    const result = device.run();

    expect(result).toEqual({ reason: 'halted', steps: 2, pc: 8 });
    expect(frames.map(f => f.type)).toEqual(['load', 'out', 'halt', 'end']);
    expect(frames.map(f => f.raw)).toEqual([
      '{"t":"load","words":2,"bytes":0,"pc":0,"sp":61440}',
      '{"t":"out","text":"8\\n"}',
      '{"t":"halt","pc":8,"steps":2}',
      '{"t":"end","reason":"halted","pc":8,"steps":2}'
    ]);
  });

  test('verbose mode adds a step frame per instruction', () => {
    const device = new EmulatorDevice({ traceMode: 'verbose' });
    const frames = collect(device);
    device.load(program);
    device.run();

    expect(frames.map(f => f.type)).toEqual(['load', 'step', 'out', 'step', 'halt', 'end']);
    expect(frames[1].raw).toBe('{"t":"step","op":"OUTI","pc":0,"sp":61440,"ax":0}');
  });

  test('off mode emits nothing but still tracks status', () => {
    const device = new EmulatorDevice({ traceMode: 'off' });
    const frames = collect(device);
    const statuses: DeviceStatus[] = [];
    device.on('status', (status: DeviceStatus) => statuses.push(status));

    device.load(program);
    device.run();

    expect(frames).toEqual([]);
    expect(statuses).toEqual(['loaded', 'running', 'halted']);
    expect(device.status).toBe('halted');
  });

  test('a fault is reported as a frame', () => {
    const device = new EmulatorDevice();
    const seen: TraceFrame[] = [];
    device.onFrame(frame => seen.push(frame));
    device.load(assemble('LODW AX, 0xFFFE'));
    const result = device.run();

    expect(result.fault?.code).toBe('MEMORY_OUT_OF_BOUNDS');
    expect(device.status).toBe('faulted');
    expect(seen.map(f => f.type)).toEqual(['load', 'fault', 'end']);
    expect(seen[1].payload).toEqual({
      t: 'fault',
      code: 'MEMORY_OUT_OF_BOUNDS',
      msg: '4-byte access at 0xFFFE is outside memory (size 0x10000)',
      pc: 0
    });
  });

  test('step limit leaves the device stopped', () => {
    const device = new EmulatorDevice();
    device.load(assemble('loop: JMP loop'));
    expect(device.run(5)).toEqual({ reason: 'step-limit', steps: 5, pc: 0 });
    expect(device.status).toBe('stopped');
  });

  test('connect loads the program with the given input', () => {
    const device = connect(assemble('.data\nn: .word 0\n.text\nINSI n\nLODW AX, n\nOUTI AX\nHALT'), { input: '31' });
    device.run();
    expect(device.emulator.output).toBe('31\n');
  });
});

// =============================================================================
// Runner and Suites
// =============================================================================

describe('run', () => {
  test('a failed assertion reports what was observed', async () => {
    const result = await run(testCase('checks.ax', 'HALT', {
      assertions: [{ type: 'register', register: 'AX', expected: 1 }]
    }));

    expect(result.status).toBe('fail');
    expect(result.error).toBe('Assertion failed: AX expected 0x00000001, got 0x00000000');
    expect(result.failedAssertion).toEqual({ type: 'register', register: 'AX', expected: 1 });
  });

  test('assembly errors are reported as errors', async () => {
    const result = await run(testCase('checks.bad', 'BOGUS AX'));
    expect(result.status).toBe('error');
    expect(result.frames).toEqual([]);
  });

  test('an invalid memory size is reported as an error', async () => {
    const result = await run(testCase('checks.memory', 'HALT', { memorySize: '1KB' }));
    expect(result.status).toBe('error');
    expect(result.error).toContain('out of range');
  });

  test('larger memory is passed to the assembler', async () => {
    const result = await run(testCase('checks.memory', 'HALT', {
      memorySize: '128KB',
      assertions: [{ type: 'register', register: 'SP', expected: 0x1F000 }]
    }));
    expect(result.status).toBe('pass');
  });

  test('runner maxSteps applies when the case sets none', async () => {
    const result = await run(
      testCase('checks.limit', 'loop: JMP loop', { assertions: [{ type: 'pattern', pattern: '"steps":3\\}' }] }),
      { maxSteps: 3 }
    );
    expect(result.status).toBe('pass');
  });
});

describe('runSuite', () => {
  const suite: TestSuite = {
    name: 'mixed',
    tests: [
      testCase('mixed.fails', 'HALT', { assertions: [{ type: 'output', expected: 'x' }] }),
      testCase('mixed.passes', 'HALT', { assertions: [{ type: 'halted' }] })
    ]
  };

  test('runs every test by default', async () => {
    const results = await runSuite(suite);
    expect(results.map(r => r.status)).toEqual(['fail', 'pass']);
  });

  test('failFast skips the rest of the suite', async () => {
    const results = await runSuite(suite, { failFast: true });
    expect(results.map(r => [r.testId, r.status])).toEqual([
      ['mixed.fails', 'fail'],
      ['mixed.passes', 'skip']
    ]);
  });
});

describe('suite files', () => {
  test('parseSuite fills in defaults', () => {
    const suite = parseSuite({
      name: 'inline',
      tests: [{ id: 'inline.one', source: 'HALT', assertions: [{ type: 'pattern', pattern: 'halt' }] }]
    });

    expect(suite).toEqual({
      name: 'inline',
      tests: [{
        id: 'inline.one',
        name: 'inline.one',
        category: 'program',
        source: 'HALT',
        traceMode: 'summary',
        assertions: [{ type: 'pattern', pattern: 'halt' }]
      }]
    });
  });

  test('parseSuite names the offending entry', () => {
    const bad = {
      name: 'bad',
      tests: [{ id: 'a', source: 'HALT', assertions: [{ type: 'halted' }, { type: 'register', register: 'QX', expected: 1 }] }]
    };
    expect(() => parseSuite(bad)).toThrow(new SuiteFormatError('tests[0].assertions[1]', 'unknown register "QX"'));
    expect(() => parseSuite({ name: 'empty' })).toThrow("suite: 'tests' must be an array");
    expect(() => parseSuite({ name: 's', tests: [{ id: 'a', sourceFile: 'a.arc', assertions: [] }] }))
      .toThrow("tests[0]: 'sourceFile' needs a suite loaded from disk");
    expect(() => parseSuite({ name: 's', tests: [{ id: 'a', source: 'HALT', assertions: [{ type: 'timing' }] }] }))
      .toThrow("tests[0].assertions[0]: unknown assertion type 'timing'");
  });

  test('loadSuite reads sources beside the suite file', async () => {
    const suite = loadSuite(fileURLToPath(new URL('./fixtures/suite.json', import.meta.url)));
    expect(suite.tests.map(t => t.id)).toEqual(['fixtures.countdown', 'fixtures.inline']);
    expect(suite.tests[0].source).toContain('ADDW CX, 3');
    expect(suite.tests[1].category).toBe('io');

    const results = await runSuite(suite);
    expect(results.map(r => r.status)).toEqual(['pass', 'pass']);
  });
});

// =============================================================================
// JUnit Reporter
// =============================================================================

describe('JUnitReporter', () => {
  const results: TestResult[] = [
    { testId: 'opcodes.a', status: 'pass', duration: 5, frames: [] },
    {
      testId: 'opcodes.b',
      status: 'fail',
      duration: 10,
      frames: [],
      error: 'Assertion failed: x',
      failedAssertion: { type: 'output', expected: 'a<b' }
    },
    { testId: 'io.c', status: 'error', duration: 0, frames: [], error: 'bad "x"' },
    { testId: 'io.d', status: 'skip', duration: 0, frames: [] }
  ];
  const reporter = new JUnitReporter({ now: () => new Date(Date.UTC(2024, 0, 2, 3, 4, 5)) });

  test('totals and suites', () => {
    const lines = reporter.generate(results).split('\n');

    expect(lines[0]).toBe('<?xml version="1.0" encoding="UTF-8"?>');
    expect(lines[1]).toBe('<testsuites time="0.015" tests="4" failures="1" errors="1" skipped="1">');
    expect(lines[2]).toBe(
      '  <testsuite name="opcodes" timestamp="2024-01-02T03:04:05.000Z" time="0.015" tests="2" failures="1" errors="0" skipped="0">'
    );
    expect(lines[3]).toBe('    <testcase name="opcodes.a" classname="opcodes" time="0.005">');
  });

  test('failure, error and skip elements', () => {
    const xml = reporter.generate(results);

    expect(xml).toContain(
      '      <failure message="Assertion failed: x">{&quot;type&quot;:&quot;output&quot;,&quot;expected&quot;:&quot;a&lt;b&quot;}</failure>\n'
    );
    expect(xml).toContain('      <error message="bad &quot;x&quot;"/>\n');
    expect(xml).toContain('    <testcase name="io.d" classname="io" time="0">\n      <skipped/>\n');
  });

  test('pattern assertions keep their source text', () => {
    const xml = reporter.generate([{
      testId: 'p.q',
      status: 'fail',
      duration: 0,
      frames: [],
      failedAssertion: { type: 'pattern', pattern: /ADDW/ }
    }]);
    expect(xml).toContain('<failure message="Failed">{&quot;type&quot;:&quot;pattern&quot;,&quot;pattern&quot;:&quot;/ADDW/&quot;}</failure>');
  });

  test('program output goes to system-out', () => {
    const xml = reporter.generate([{
      testId: 'io.hello',
      status: 'pass',
      duration: 2,
      frames: [
        createFrame({ t: 'out', text: 'Hi ' }, 0),
        createFrame({ t: 'out', text: '<3' }, 1),
        createFrame({ t: 'halt', pc: 8, steps: 3 }, 2)
      ]
    }]);
    expect(xml).toContain(
      '    <testcase name="io.hello" classname="io" time="0.002">\n      <system-out>Hi &lt;3</system-out>\n    </testcase>\n'
    );
  });

  test('a fault frame types the error element', () => {
    const fault = createFrame({ t: 'fault', code: 'DIVISION_BY_ZERO', msg: 'division by zero', pc: 4 }, 0);
    const xml = reporter.generate([
      { testId: 'f.crash', status: 'error', duration: 0, frames: [fault], error: 'Unexpected fault' },
      { testId: 'f.expected', status: 'pass', duration: 0, frames: [fault] }
    ]);
    expect(xml).toContain(
      '      <error message="Unexpected fault" type="DIVISION_BY_ZERO">division by zero (pc 0x0004)</error>\n'
    );
    expect(xml).toContain(
      '    <testcase name="f.expected" classname="f" time="0">\n      <system-err>DIVISION_BY_ZERO: division by zero (pc 0x0004)</system-err>\n'
    );
  });
});
