/**
 * ARC Assembler - Flag Definitions
 *
 * SPDX-License-Identifier: MIT
 *
 * Each condition flag has two numbers:
 *   - an id (0-7), used by operands and by the SETF/CLRF encoding
 *   - a bit position inside the FLAGS register
 */

export type FlagName =
    | 'carry'
    | 'zero'
    | 'sign'
    | 'interrupt'
    | 'string'
    | 'overflow'
    | 'macro'
    | 'stack_dir';

export const FLAG_IDS: Record<FlagName, number> = {
    carry: 0,
    zero: 1,
    sign: 2,
    interrupt: 3,
    string: 4,
    overflow: 5,
    macro: 6,
    stack_dir: 7,
};

export const FLAG_BITS: Record<FlagName, number> = {
    carry: 0,
    zero: 6,
    sign: 7,
    interrupt: 9,
    string: 10,
    overflow: 11,
    macro: 12,
    stack_dir: 13,
};

/** Flag names in id order. */
export const FLAG_NAMES: readonly FlagName[] = [
    'carry', 'zero', 'sign', 'interrupt', 'string', 'overflow', 'macro', 'stack_dir',
];

/**
 * Names accepted as flag operands in source text.
 * `string` is settable by id but is not a source-level flag name.
 */
const OPERAND_FLAG_NAMES: ReadonlySet<string> = new Set([
    'carry', 'zero', 'sign', 'interrupt', 'overflow', 'macro', 'stack_dir',
]);

export function flagIdByName(name: string): number | null {
    const lower = name.trim().toLowerCase();
    if (!OPERAND_FLAG_NAMES.has(lower)) {
        return null;
    }
    for (const flag of FLAG_NAMES) {
        if (flag === lower) {
            return FLAG_IDS[flag];
        }
    }
    return null;
}

export function flagNameById(id: number): FlagName | null {
    return FLAG_NAMES[id] ?? null;
}
