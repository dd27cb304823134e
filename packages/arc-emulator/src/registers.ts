/**
 * ARC Emulator - Register File
 *
 * SPDX-License-Identifier: MIT
 *
 * Fourteen 32-bit registers. Arithmetic instructions reinterpret register
 * bits as f32; bitwise and compare instructions use them as raw u32.
 */

import { Reg, REGISTER_COUNT, FLAG_BITS } from '@arc/assembler';
import type { RegId, RegName, FlagName } from '@arc/assembler';

// Shared scratch buffer for bit reinterpretation
const scratch = new ArrayBuffer(4);
const scratchF32 = new Float32Array(scratch);
const scratchU32 = new Uint32Array(scratch);

export function bitsToFloat(bits: number): number {
    scratchU32[0] = bits;
    return scratchF32[0];
}

export function floatToBits(value: number): number {
    scratchF32[0] = value;
    return scratchU32[0];
}

export type FlagMode = 'add' | 'sub';

function signBit(value: number): number {
    return (value >>> 31) & 1;
}

export class RegisterBank {
    private values = new Uint32Array(REGISTER_COUNT);

    get(reg: RegId): number {
        return this.values[reg];
    }

    set(reg: RegId, value: number): void {
        this.values[reg] = value >>> 0;
    }

    getFloat(reg: RegId): number {
        return bitsToFloat(this.values[reg]);
    }

    setFloat(reg: RegId, value: number): void {
        this.values[reg] = floatToBits(value);
    }

    get pc(): number {
        return this.values[Reg.PC];
    }

    set pc(value: number) {
        this.values[Reg.PC] = value >>> 0;
    }

    get sp(): number {
        return this.values[Reg.SP];
    }

    set sp(value: number) {
        this.values[Reg.SP] = value >>> 0;
    }

    // =========================================================================
    // Flags
    // =========================================================================

    getFlag(name: FlagName): boolean {
        return ((this.values[Reg.FLAGS] >>> FLAG_BITS[name]) & 1) === 1;
    }

    setFlag(name: FlagName, on: boolean): void {
        const mask = 1 << FLAG_BITS[name];
        const flags = this.values[Reg.FLAGS];
        this.values[Reg.FLAGS] = on ? flags | mask : flags & ~mask;
    }

    /**
     * Integer flag update for a u32 result of `a op b`.
     *
     * add: carry = result < a, overflow = sign(a) == sign(b) && sign(r) != sign(a)
     * sub: carry = a < b,      overflow = sign(a) != sign(b) && sign(r) != sign(a)
     */
    updateIntegerFlags(result: number, a: number, b: number, mode: FlagMode): void {
        const r = result >>> 0;
        const ua = a >>> 0;
        const ub = b >>> 0;
        const sa = signBit(ua);
        const sb = signBit(ub);
        const sr = signBit(r);

        this.setFlag('zero', r === 0);
        this.setFlag('sign', sr === 1);
        if (mode === 'add') {
            this.setFlag('carry', r < ua);
            this.setFlag('overflow', sa === sb && sr !== sa);
        } else {
            this.setFlag('carry', ua < ub);
            this.setFlag('overflow', sa !== sb && sr !== sa);
        }
    }

    updateFloatFlags(result: number): void {
        this.setFlag('zero', result === 0);
        this.setFlag('sign', result < 0);
        this.setFlag('carry', false);
        this.setFlag('overflow', false);
    }

    updateShiftFlags(result: number, carry: boolean): void {
        this.setFlag('zero', result >>> 0 === 0);
        this.setFlag('sign', signBit(result) === 1);
        this.setFlag('carry', carry);
        this.setFlag('overflow', false);
    }

    reset(): void {
        this.values.fill(0);
    }

    // =========================================================================
    // Inspection
    // =========================================================================

    toRecord(): Record<RegName, number> {
        const v = this.values;
        return {
            AX: v[Reg.AX], BX: v[Reg.BX], CX: v[Reg.CX], DX: v[Reg.DX],
            EX: v[Reg.EX], FX: v[Reg.FX], GX: v[Reg.GX], HX: v[Reg.HX],
            SP: v[Reg.SP], BP: v[Reg.BP], SI: v[Reg.SI], DI: v[Reg.DI],
            PC: v[Reg.PC], FLAGS: v[Reg.FLAGS],
        };
    }

    flagsRecord(): Record<FlagName, boolean> {
        return {
            carry: this.getFlag('carry'),
            zero: this.getFlag('zero'),
            sign: this.getFlag('sign'),
            interrupt: this.getFlag('interrupt'),
            string: this.getFlag('string'),
            overflow: this.getFlag('overflow'),
            macro: this.getFlag('macro'),
            stack_dir: this.getFlag('stack_dir'),
        };
    }
}
