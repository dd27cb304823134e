import { tryAssemble } from '@arc/assembler';
import type { AssembledProgram } from '@arc/assembler';
import { EmulatorDevice } from './device';
import type { TraceMode } from './device';
import type { TraceFrame } from './protocol';
import { describeFailure, evaluate } from './assertions';
import type { Assertion } from './assertions';

export type TestCategory = 'opcode' | 'program' | 'io' | 'fault';

export interface ProgramTestCase {
  id: string;
  name: string;
  category: TestCategory;
  source: string;
  traceMode: TraceMode;
  /** Bytes or text such as "128KB" (default 64KB) */
  memorySize?: number | string;
  maxSteps?: number;
  input?: string;
  assertions: Assertion[];
}

export type TestStatus = 'pass' | 'fail' | 'skip' | 'error';

export interface TestResult {
  testId: string;
  status: TestStatus;
  duration: number;
  frames: TraceFrame[];
  error?: string;
  failedAssertion?: Assertion;
}

export interface RunnerOptions {
  /** Used when a test case sets no maxSteps */
  maxSteps?: number;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class TestRunner {
  private options: RunnerOptions;

  constructor(options: RunnerOptions = {}) {
    this.options = options;
  }

  async runTest(test: ProgramTestCase): Promise<TestResult> {
    const startTime = Date.now();
    try {
      return this.executeTest(test, startTime);
    } catch (err) {
      return {
        testId: test.id,
        status: 'error',
        duration: Date.now() - startTime,
        frames: [],
        error: errorMessage(err)
      };
    }
  }

  private executeTest(test: ProgramTestCase, startTime: number): TestResult {
    const frames: TraceFrame[] = [];

    // 1. Build the device (validates the memory size)
    const device = new EmulatorDevice({ memorySize: test.memorySize, traceMode: test.traceMode });
    const memorySize = device.emulator.memory.size;

    // 2. Assemble for the same memory size
    const outcome = tryAssemble(test.source, { memorySize });
    if (!outcome.ok) {
      return {
        testId: test.id,
        status: 'error',
        duration: Date.now() - startTime,
        frames,
        error: outcome.errors.map(e => e.message).join('\n')
      };
    }
    const program: AssembledProgram = outcome.program;

    // 3. Load and run, capturing frames
    device.on('frame', (frame: TraceFrame) => {
      frames.push(frame);
    });
    device.load(program, test.input);
    const result = device.run(test.maxSteps ?? this.options.maxSteps);
    const duration = Date.now() - startTime;

    // 4. Check assertions
    const observation = { frames, emulator: device.emulator, program, result };
    for (const assertion of test.assertions) {
      if (!evaluate(assertion, observation)) {
        return {
          testId: test.id,
          status: 'fail',
          duration,
          frames,
          failedAssertion: assertion,
          error: `Assertion failed: ${describeFailure(assertion, observation)}`
        };
      }
    }

    return {
      testId: test.id,
      status: 'pass',
      duration,
      frames
    };
  }
}
