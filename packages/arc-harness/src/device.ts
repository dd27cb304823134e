import { EventEmitter } from 'events';
import { Emulator } from '@arc/emulator';
import type { EmulatorOptions, RunResult } from '@arc/emulator';
import { Reg } from '@arc/assembler';
import type { AssembledProgram } from '@arc/assembler';
import { createFrame } from './protocol';
import type { TraceFrame, TracePayload } from './protocol';

/**
 * off:     no frames
 * summary: load, out, halt, fault, end
 * verbose: summary plus one step frame per instruction
 */
export type TraceMode = 'off' | 'summary' | 'verbose';

export type DeviceStatus = 'idle' | 'loaded' | 'running' | 'halted' | 'faulted' | 'stopped';

export interface DeviceOptions extends EmulatorOptions {
  traceMode?: TraceMode;
}

/**
 * An emulator wrapped as a trace-emitting device.
 *
 * Events:
 *   'frame'  (frame: TraceFrame)
 *   'status' (status: DeviceStatus)
 */
export class EmulatorDevice extends EventEmitter {
  readonly emulator: Emulator;
  traceMode: TraceMode;
  status: DeviceStatus = 'idle';

  private frameHandler?: (frame: TraceFrame) => void;

  constructor(options: DeviceOptions = {}) {
    super();
    const { traceMode, ...emulatorOptions } = options;
    this.emulator = new Emulator(emulatorOptions);
    this.traceMode = traceMode ?? 'summary';
  }

  private setStatus(status: DeviceStatus): void {
    if (this.status !== status) {
      this.status = status;
      this.emit('status', status);
    }
  }

  private emitFrame(payload: TracePayload): void {
    if (this.traceMode === 'off') return;
    if (payload.t === 'step' && this.traceMode !== 'verbose') return;

    const frame = createFrame(payload);
    this.emit('frame', frame);
    this.frameHandler?.(frame);
  }

  onFrame(handler: (frame: TraceFrame) => void): void {
    this.frameHandler = handler;
  }

  load(program: AssembledProgram, input?: string): void {
    this.emulator.load(program, input ?? '');
    this.setStatus('loaded');
    this.emitFrame({
      t: 'load',
      words: program.text.length,
      bytes: program.data.length,
      pc: this.emulator.registers.pc,
      sp: this.emulator.registers.sp
    });
  }

  /**
   * Run to completion, emitting frames as the program executes.
   * Faults end the run and are reported in the result, not thrown.
   */
  run(maxSteps?: number): RunResult {
    const emu = this.emulator;
    let printed = emu.output.length;

    this.setStatus('running');
    const result = emu.run({
      maxSteps,
      onStep: (instr, pc) => {
        this.emitFrame({
          t: 'step',
          op: instr.mnemonic,
          pc,
          sp: emu.registers.sp,
          ax: emu.registers.get(Reg.AX)
        });
        if (emu.output.length > printed) {
          this.emitFrame({ t: 'out', text: emu.output.slice(printed) });
          printed = emu.output.length;
        }
      }
    });

    if (result.reason === 'halted') {
      this.emitFrame({ t: 'halt', pc: result.pc, steps: result.steps });
      this.setStatus('halted');
    } else if (result.fault) {
      this.emitFrame({ t: 'fault', code: result.fault.code, msg: result.fault.detail, pc: result.pc });
      this.setStatus('faulted');
    } else {
      this.setStatus('stopped');
    }
    this.emitFrame({ t: 'end', reason: result.reason, pc: result.pc, steps: result.steps });

    return result;
  }
}

/**
 * Create a device and load a program into it.
 */
export function connect(program: AssembledProgram, options: DeviceOptions = {}): EmulatorDevice {
  const device = new EmulatorDevice(options);
  device.load(program, options.input);
  return device;
}
