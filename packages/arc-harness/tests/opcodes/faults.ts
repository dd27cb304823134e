import type { ProgramTestCase } from '../../src/runner';

export const faultTests: ProgramTestCase[] = [
  {
    id: 'opcodes.faults.out_of_bounds',
    name: 'LODW: Read Past the End of Memory',
    category: 'fault',
    source: `
      MOVI AX, 1
      LODW BX, 0xFFFE
      HALT
    `,
    traceMode: 'summary',
    assertions: [
      { type: 'fault', code: 'MEMORY_OUT_OF_BOUNDS' },
      { type: 'pattern', pattern: /\{"t":"fault","code":"MEMORY_OUT_OF_BOUNDS",.*"pc":4\}/ },
      { type: 'register', register: 'AX', expected: 1 }
    ]
  },
  {
    id: 'opcodes.faults.unknown_opcode',
    name: 'JMP: Executing a Zero Word',
    category: 'fault',
    source: `
      .data
      zero: .word 0
      .text
      JMP zero
    `,
    traceMode: 'summary',
    assertions: [
      { type: 'fault', code: 'UNKNOWN_OPCODE' }
    ]
  },
  {
    id: 'opcodes.faults.step_limit',
    name: 'JMP: Endless Loop Stops at the Step Limit',
    category: 'fault',
    maxSteps: 50,
    source: `
      loop: JMP loop
    `,
    traceMode: 'summary',
    assertions: [
      { type: 'no_fault' },
      { type: 'pattern', pattern: '"reason":"step-limit","pc":0,"steps":50' }
    ]
  },
  {
    id: 'opcodes.faults.end_of_memory',
    name: 'JMP: Past the End of Memory Ends the Run',
    category: 'fault',
    source: `
      JMP 0x10000
    `,
    traceMode: 'summary',
    assertions: [
      { type: 'no_fault' },
      { type: 'pattern', pattern: /"t":"end","reason":"end-of-memory"/ }
    ]
  }
];
