/**
 * @arc/harness - Emulator-in-the-Loop Program Testing
 */

export const VERSION = '0.1.0';

export * from './device';
export * from './protocol';
export * from './runner';
export * from './assertions';
export * from './reporter';
export * from './suite';

import { TestRunner } from './runner';
import type { ProgramTestCase, RunnerOptions, TestResult } from './runner';
import type { TestSuite } from './suite';

export interface SuiteOptions extends RunnerOptions {
  failFast?: boolean;
}

export async function run(test: ProgramTestCase, options: RunnerOptions = {}): Promise<TestResult> {
  const runner = new TestRunner(options);
  return runner.runTest(test);
}

/**
 * Run every test of a suite in order. With failFast, the tests after the
 * first failure or error are reported as skipped.
 */
export async function runSuite(suite: TestSuite, options: SuiteOptions = {}): Promise<TestResult[]> {
  const runner = new TestRunner(options);
  const results: TestResult[] = [];
  let stopped = false;

  for (const test of suite.tests) {
    if (stopped) {
      results.push({ testId: test.id, status: 'skip', duration: 0, frames: [] });
      continue;
    }
    const result = await runner.runTest(test);
    results.push(result);
    if (options.failFast && result.status !== 'pass') stopped = true;
  }

  return results;
}
