import type { ProgramTestCase } from '../../src/runner';

export const ioTests: ProgramTestCase[] = [
  {
    id: 'opcodes.io.out',
    name: 'OUT: Print a String',
    category: 'io',
    source: `
      .data
      msg: .string "hello"
      .text
      OUT msg
      HALT
    `,
    traceMode: 'summary',
    assertions: [
      { type: 'pattern', pattern: /\{"t":"out","text":"hello"\}/ },
      { type: 'output', expected: 'hello' }
    ]
  },
  {
    id: 'opcodes.io.outi',
    name: 'OUTI: Print Integers',
    category: 'io',
    source: `
      MOVI AX, 42
      OUTI AX
      OUTI 8
      HALT
    `,
    traceMode: 'summary',
    assertions: [
      { type: 'output', expected: '42\n8\n' }
    ]
  },
  {
    id: 'opcodes.io.insi',
    name: 'INSI: Read Decimal Tokens',
    category: 'io',
    input: '17 25',
    source: `
      .data
      a: .word 0
      b: .word 0
      .text
      INSI a
      INSI b
      LODW AX, a
      LODW BX, b
      HALT
    `,
    traceMode: 'summary',
    assertions: [
      { type: 'register', register: 'AX', expected: 17 },
      { type: 'register', register: 'BX', expected: 25 },
      { type: 'memory', address: 'b', expected: 25 }
    ]
  },
  {
    id: 'opcodes.io.insi_not_a_number',
    name: 'INSI: Non-numeric Token Reads as Zero',
    category: 'io',
    input: 'abc',
    source: `
      .data
      n: .word 0x7777
      .text
      INSI n
      HALT
    `,
    traceMode: 'summary',
    assertions: [
      { type: 'memory', address: 'n', expected: 0 }
    ]
  },
  {
    id: 'opcodes.io.in_echo',
    name: 'IN/OUT: Echo Pending Input',
    category: 'io',
    input: 'ping',
    source: `
      .data
      buf: .space 8
      .text
      IN buf
      OUT buf
      HALT
    `,
    traceMode: 'summary',
    assertions: [
      { type: 'output', expected: 'ping' }
    ]
  },
  {
    id: 'opcodes.io.outw',
    name: 'OUTW: Print a Word in Hex',
    category: 'io',
    source: `
      .data
      w: .word 0xCAFE
      .text
      MOVI BX, w
      OUTW [BX], AX
      HALT
    `,
    traceMode: 'summary',
    assertions: [
      { type: 'output', expected: '0x0000CAFE\n' }
    ]
  },
  {
    id: 'opcodes.io.insw',
    name: 'INSW: Read Four Bytes Little-Endian',
    category: 'io',
    input: 'AB',
    source: `
      .data
      w: .word 0
      .text
      MOVI BX, w
      INSW [BX]
      LODW AX, w
      HALT
    `,
    traceMode: 'summary',
    assertions: [
      { type: 'register', register: 'AX', expected: 0x4241 }
    ]
  }
];
