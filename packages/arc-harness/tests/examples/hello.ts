import { run } from '../../src/index';
import type { ProgramTestCase } from '../../src/index';

const test: ProgramTestCase = {
  id: 'examples.hello',
  name: 'Hello: Print a Greeting and a Sum',
  category: 'program',
  source: `
    .data
    greeting: .string "hello, arc\\n"
    .text
        OUT greeting
        MOVI AX, 10
        MOVI BX, 5
        OR AX, BX
        OUTI AX
        HALT
  `,
  traceMode: 'verbose',
  assertions: [
    { type: 'pattern', pattern: /\{"t":"step","op":"OR",.*"ax":15\}/ },
    { type: 'output', expected: 'hello, arc\n15\n' }
  ]
};

async function main(): Promise<void> {
  // Usage: tsx packages/arc-harness/tests/examples/hello.ts
  console.log(`Running test: ${test.name}`);

  const result = await run(test);
  console.log(`Status: ${result.status}`);
  console.log(`Duration: ${result.duration}ms`);
  for (const frame of result.frames) {
    console.log(`  ${frame.raw}`);
  }
  if (result.status !== 'pass') {
    console.log(result.error);
    process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  console.error('Harness error:', err);
  process.exitCode = 1;
});
