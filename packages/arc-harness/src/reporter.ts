import * as fs from 'fs';
import { hex } from '@arc/assembler';
import type { FaultPayload, TraceFrame } from './protocol';
import type { TestResult } from './runner';

export interface ReporterOptions {
  /** Clock for suite timestamps */
  now?: () => Date;
}

interface Tally {
  tests: number;
  failures: number;
  errors: number;
  skipped: number;
  /** Seconds */
  time: number;
}

function tally(results: TestResult[]): Tally {
  const t: Tally = { tests: results.length, failures: 0, errors: 0, skipped: 0, time: 0 };
  let ms = 0;
  for (const r of results) {
    ms += r.duration;
    if (r.status === 'fail') t.failures++;
    else if (r.status === 'error') t.errors++;
    else if (r.status === 'skip') t.skipped++;
  }
  t.time = ms / 1000;
  return t;
}

function counts(t: Tally): string {
  return `time="${t.time}" tests="${t.tests}" failures="${t.failures}" errors="${t.errors}" skipped="${t.skipped}"`;
}

/** Suite name is the test id up to its first '.' */
function bySuite(results: TestResult[]): Map<string, TestResult[]> {
  const suites = new Map<string, TestResult[]>();
  for (const result of results) {
    const name = result.testId.split('.')[0] || 'default';
    const suite = suites.get(name) ?? [];
    suite.push(result);
    suites.set(name, suite);
  }
  return suites;
}

function faultOf(frames: TraceFrame[]): FaultPayload | undefined {
  for (const frame of frames) {
    if (frame.payload.t === 'fault') return frame.payload;
  }
  return undefined;
}

/** Text the program printed, joined from its out frames */
function programOutput(frames: TraceFrame[]): string {
  let out = '';
  for (const frame of frames) {
    if (frame.payload.t === 'out') out += frame.payload.text;
  }
  return out;
}

function describeFault(fault: FaultPayload): string {
  return `${fault.msg} (pc ${hex(fault.pc, 4)})`;
}

function renderCase(result: TestResult, suiteName: string): string {
  let xml = `    <testcase name="${escape(result.testId)}" classname="${escape(suiteName)}" time="${result.duration / 1000}">\n`;
  const fault = faultOf(result.frames);

  switch (result.status) {
    case 'fail': {
      const detail = result.failedAssertion ? escape(JSON.stringify(result.failedAssertion, patternReplacer)) : '';
      xml += `      <failure message="${escape(result.error ?? 'Failed')}">${detail}</failure>\n`;
      break;
    }
    case 'error':
      if (fault) {
        xml += `      <error message="${escape(result.error ?? fault.code)}" type="${escape(fault.code)}">${escape(describeFault(fault))}</error>\n`;
      } else {
        xml += `      <error message="${escape(result.error ?? 'Error')}"/>\n`;
      }
      break;
    case 'skip':
      xml += `      <skipped/>\n`;
      break;
    case 'pass':
      break;
  }

  const output = programOutput(result.frames);
  if (output !== '') {
    xml += `      <system-out>${escape(output)}</system-out>\n`;
  }
  // An expected fault still shows up beside the passing case
  if (fault && result.status !== 'error') {
    xml += `      <system-err>${escape(`${fault.code}: ${describeFault(fault)}`)}</system-err>\n`;
  }

  return xml + `    </testcase>\n`;
}

export class JUnitReporter {
  private now: () => Date;

  constructor(options: ReporterOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  generate(results: TestResult[]): string {
    const timestamp = this.now().toISOString();
    let xml = '<?xml version="1.0" encoding="UTF-8"?>\n';
    xml += `<testsuites ${counts(tally(results))}>\n`;

    for (const [suiteName, suiteResults] of bySuite(results)) {
      xml += `  <testsuite name="${escape(suiteName)}" timestamp="${timestamp}" ${counts(tally(suiteResults))}>\n`;
      for (const result of suiteResults) {
        xml += renderCase(result, suiteName);
      }
      xml += `  </testsuite>\n`;
    }

    return xml + `</testsuites>\n`;
  }

  write(results: TestResult[], path: string): void {
    fs.writeFileSync(path, this.generate(results));
  }
}

// RegExp serializes to {} by default
function patternReplacer(_key: string, value: unknown): unknown {
  return value instanceof RegExp ? String(value) : value;
}

function escape(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;')
    .replace(/\n/g, '&#10;');
}
