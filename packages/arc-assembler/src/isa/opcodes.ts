/**
 * ARC Assembler - Opcode Definitions
 *
 * SPDX-License-Identifier: MIT
 *
 * Every instruction is one 32-bit word. Bits 31-24 hold the opcode; the
 * remaining 24 bits follow the opcode's operand layout.
 *
 * Layouts (bit ranges inside the word):
 *   regImm16       reg(23-16) imm16(15-0)
 *   regRegOrImm    reg1(23-16); bit0=1 -> reg2(15-8), else imm16(15-0)
 *   regAddr16      reg(23-16) addr16(15-0)
 *   addr8Imm16     addr8(23-16) imm16(15-0)
 *   addr8RegOrImm  addr8(23-16); bit0=1 -> reg(15-8), else imm16(15-0)
 *   regOrImm       bit0=1 -> reg(23-16), else imm16(15-0)
 *   reg            reg(23-16)
 *   regReg         reg1(23-16) reg2(15-8)
 *   addr24         addr24(23-0)
 *   flag           flag id(7-0)
 *   none           -
 */

export const Opcode = {
    // ===== Moves (0x01-0x09) =====
    MOVI: 0x01,
    MOVW: 0x02,
    LODI: 0x03,
    LODW: 0x04,
    STRI: 0x05,
    STRW: 0x06,
    PUSH: 0x07,
    POP: 0x08,
    XCGH: 0x09,

    // ===== Float arithmetic (0x10-0x15) =====
    ADDW: 0x10,
    SUBW: 0x11,
    MUL: 0x12,
    INC: 0x13,
    DEC: 0x14,
    NEG: 0x15,

    // ===== Bitwise (0x20-0x25) =====
    NOT: 0x20,
    AND: 0x21,
    OR: 0x22,
    XOR: 0x23,
    SHL: 0x24,
    SHR: 0x25,

    // ===== Compare (0x30) =====
    CMPW: 0x30,

    // ===== Control flow (0x40-0x4A) =====
    JMP: 0x40,
    CALL: 0x41,
    RET: 0x42,
    JE: 0x43,
    JNE: 0x44,
    JGT: 0x45,
    JGE: 0x46,
    JLT: 0x47,
    JLE: 0x48,
    JS: 0x49,
    JCO: 0x4A,

    // ===== I/O (0x50-0x55) =====
    IN: 0x50,
    OUT: 0x51,
    INSI: 0x52,
    OUTI: 0x53,
    INSW: 0x54,
    OUTW: 0x55,

    // ===== Flags (0x60-0x61) =====
    SETF: 0x60,
    CLRF: 0x61,

    // ===== System =====
    HALT: 0xFF,
} as const;

export type Mnemonic = keyof typeof Opcode;
export type OpcodeValue = typeof Opcode[Mnemonic];

export type OperandLayout =
    | 'regImm16'
    | 'regRegOrImm'
    | 'regAddr16'
    | 'addr8Imm16'
    | 'addr8RegOrImm'
    | 'regOrImm'
    | 'reg'
    | 'regReg'
    | 'addr24'
    | 'flag'
    | 'none';

export const OPCODE_LAYOUT: Record<Mnemonic, OperandLayout> = {
    MOVI: 'regImm16',
    LODI: 'regImm16',
    MOVW: 'regRegOrImm',
    ADDW: 'regRegOrImm',
    SUBW: 'regRegOrImm',
    MUL: 'regRegOrImm',
    AND: 'regRegOrImm',
    OR: 'regRegOrImm',
    XOR: 'regRegOrImm',
    SHL: 'regRegOrImm',
    SHR: 'regRegOrImm',
    CMPW: 'regRegOrImm',
    LODW: 'regAddr16',
    STRI: 'addr8Imm16',
    INSW: 'addr8Imm16',
    STRW: 'addr8RegOrImm',
    OUTW: 'addr8RegOrImm',
    PUSH: 'regOrImm',
    OUTI: 'regOrImm',
    POP: 'reg',
    INC: 'reg',
    DEC: 'reg',
    NEG: 'reg',
    NOT: 'reg',
    XCGH: 'regReg',
    JMP: 'addr24',
    CALL: 'addr24',
    JE: 'addr24',
    JNE: 'addr24',
    JGT: 'addr24',
    JGE: 'addr24',
    JLT: 'addr24',
    JLE: 'addr24',
    JS: 'addr24',
    JCO: 'addr24',
    IN: 'addr24',
    OUT: 'addr24',
    INSI: 'addr24',
    SETF: 'flag',
    CLRF: 'flag',
    RET: 'none',
    HALT: 'none',
};

/**
 * Opcode name to value lookup table.
 */
export const OPCODE_BY_NAME: Record<string, number> = { ...Opcode };

/**
 * All mnemonics in table order.
 */
export const MNEMONICS: readonly Mnemonic[] = Object.keys(Opcode).filter(isMnemonic);

/**
 * Opcode value to name lookup table.
 */
export const OPCODE_BY_VALUE: Record<number, Mnemonic> = {};
for (const name of MNEMONICS) {
    OPCODE_BY_VALUE[Opcode[name]] = name;
}

/**
 * Look up a mnemonic (case-insensitive).
 */
export function mnemonicByName(name: string): Mnemonic | null {
    const upper = name.trim().toUpperCase();
    return isMnemonic(upper) ? upper : null;
}

export function isMnemonic(name: string): name is Mnemonic {
    return Object.prototype.hasOwnProperty.call(Opcode, name);
}

/** Opcode held in the top byte of an instruction word. */
export function opcodeOf(word: number): number {
    return (word >>> 24) & 0xFF;
}
