import type { ProgramTestCase } from '../../src/runner';

export const controlTests: ProgramTestCase[] = [
  {
    id: 'opcodes.control.jmp',
    name: 'JMP: Unconditional Jump',
    category: 'opcode',
    source: `
          JMP over
          MOVI AX, 1
      over:
          MOVI BX, 2
          HALT
    `,
    traceMode: 'summary',
    assertions: [
      { type: 'register', register: 'AX', expected: 0 },
      { type: 'register', register: 'BX', expected: 2 }
    ]
  },
  {
    id: 'opcodes.control.je_not_taken',
    name: 'JE: Falls Through When Values Differ',
    category: 'opcode',
    source: `
          MOVI AX, 6
          CMPW AX, 8
          JE equal
          MOVI BX, 1
          HALT
      equal:
          MOVI BX, 2
          HALT
    `,
    traceMode: 'summary',
    assertions: [
      { type: 'register', register: 'BX', expected: 1 }
    ]
  },
  {
    id: 'opcodes.control.jne_taken',
    name: 'JNE: Taken When Values Differ',
    category: 'opcode',
    source: `
          MOVI AX, 6
          CMPW AX, 8
          JNE differ
          MOVI BX, 1
          HALT
      differ:
          MOVI BX, 2
          HALT
    `,
    traceMode: 'summary',
    assertions: [
      { type: 'register', register: 'BX', expected: 2 }
    ]
  },
  {
    id: 'opcodes.control.jge_equal',
    name: 'JGE: Taken on Equal Values',
    category: 'opcode',
    source: `
          MOVI AX, 8
          CMPW AX, 8
          JGE yes
          MOVI BX, 1
          HALT
      yes:
          MOVI BX, 2
          HALT
    `,
    traceMode: 'summary',
    assertions: [
      { type: 'register', register: 'BX', expected: 2 }
    ]
  },
  {
    id: 'opcodes.control.js',
    name: 'JS: Taken When Sign Is Set',
    category: 'opcode',
    source: `
          NOT AX
          JS negative
          MOVI BX, 1
          HALT
      negative:
          MOVI BX, 2
          HALT
    `,
    traceMode: 'summary',
    assertions: [
      { type: 'register', register: 'BX', expected: 2 }
    ]
  },
  {
    id: 'opcodes.control.loop',
    name: 'JGT: Countdown Loop',
    category: 'opcode',
    source: `
          ADDW CX, 4
      loop:
          ADDW AX, 2
          DEC CX
          CMPW CX, 0
          JGT loop
          HALT
    `,
    traceMode: 'summary',
    assertions: [
      { type: 'float', register: 'AX', expected: 8 },
      { type: 'register', register: 'CX', expected: 0 },
      { type: 'pattern', pattern: '\\{"t":"halt","pc":24,"steps":18\\}' }
    ]
  },
  {
    id: 'opcodes.control.call_ret',
    name: 'CALL/RET: Subroutine Returns to Caller',
    category: 'opcode',
    source: `
          CALL sub
          OUTI AX
          HALT
      sub:
          MOVI AX, 7
          RET
    `,
    traceMode: 'summary',
    assertions: [
      { type: 'output', expected: '7\n' },
      { type: 'register', register: 'SP', expected: 0xF000 },
      { type: 'memory', address: 0xEFFC, expected: 4 }
    ]
  },
  {
    id: 'opcodes.control.setf_clrf',
    name: 'SETF/CLRF: Carry Drives JCO',
    category: 'opcode',
    source: `
          SETF carry
          JCO set
          MOVI BX, 1
          HALT
      set:
          MOVI BX, 2
          CLRF carry
          HALT
    `,
    traceMode: 'summary',
    assertions: [
      { type: 'register', register: 'BX', expected: 2 },
      { type: 'flag', flag: 'carry', expected: false }
    ]
  }
];
