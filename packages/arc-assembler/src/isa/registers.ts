/**
 * ARC Assembler - Register Definitions
 *
 * SPDX-License-Identifier: MIT
 *
 * The 14 architectural registers and their 4-bit encoding codes.
 * The code is the value stored in register fields of an instruction word.
 */

export const Reg = {
    // ===== General purpose =====
    AX: 0,
    BX: 1,
    CX: 2,
    DX: 3,
    EX: 4,
    FX: 5,
    GX: 6,
    HX: 7,

    // ===== Pointer =====
    SP: 8,
    BP: 9,
    SI: 10,
    DI: 11,

    // ===== Control =====
    PC: 12,
    FLAGS: 13,
} as const;

export type RegName = keyof typeof Reg;
export type RegId = typeof Reg[RegName];

export const REGISTER_COUNT = 14;

/**
 * Register mnemonic by code.
 */
export const REGISTER_NAMES: readonly RegName[] = [
    'AX', 'BX', 'CX', 'DX', 'EX', 'FX', 'GX', 'HX',
    'SP', 'BP', 'SI', 'DI',
    'PC', 'FLAGS',
];

/**
 * Narrow a raw field value to a register code.
 */
export function isRegId(value: number): value is RegId {
    return Number.isInteger(value) && value >= 0 && value < REGISTER_COUNT;
}

/**
 * Look up a register by mnemonic (case-insensitive).
 *
 * @returns The register code, or null if the name is not a register
 */
export function registerByName(name: string): RegId | null {
    const upper = name.trim().toUpperCase();
    for (const [key, id] of Object.entries(Reg)) {
        if (key === upper) {
            return id;
        }
    }
    return null;
}

export function registerName(id: RegId): RegName {
    return REGISTER_NAMES[id];
}
