import type { RunReason } from '@arc/emulator';

export type TraceFrameType = 'load' | 'step' | 'out' | 'halt' | 'fault' | 'end';

export interface BasePayload {
  t: TraceFrameType;
}

export interface LoadPayload extends BasePayload {
  t: 'load';
  words: number;
  bytes: number;
  pc: number;
  sp: number;
}

export interface StepPayload extends BasePayload {
  t: 'step';
  op: string;
  pc: number;
  sp: number;
  ax: number;
}

export interface OutPayload extends BasePayload {
  t: 'out';
  text: string;
}

export interface HaltPayload extends BasePayload {
  t: 'halt';
  pc: number;
  steps: number;
}

export interface FaultPayload extends BasePayload {
  t: 'fault';
  code: string;
  msg: string;
  pc: number;
}

export interface EndPayload extends BasePayload {
  t: 'end';
  reason: RunReason;
  pc: number;
  steps: number;
}

export type TracePayload =
  | LoadPayload
  | StepPayload
  | OutPayload
  | HaltPayload
  | FaultPayload
  | EndPayload;

export interface TraceFrame {
  type: TraceFrameType;
  timestamp: number;
  raw: string;
  payload: TracePayload;
}

const RUN_REASONS: readonly RunReason[] = ['halted', 'end-of-memory', 'faulted', 'step-limit'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasNumbers(obj: Record<string, unknown>, ...keys: string[]): boolean {
  return keys.every(k => typeof obj[k] === 'number');
}

function hasStrings(obj: Record<string, unknown>, ...keys: string[]): boolean {
  return keys.every(k => typeof obj[k] === 'string');
}

function toPayload(value: unknown): TracePayload | null {
  if (!isRecord(value)) return null;
  const v = value;

  switch (v.t) {
    case 'load':
      if (!hasNumbers(v, 'words', 'bytes', 'pc', 'sp')) return null;
      return { t: 'load', words: Number(v.words), bytes: Number(v.bytes), pc: Number(v.pc), sp: Number(v.sp) };
    case 'step':
      if (!hasStrings(v, 'op') || !hasNumbers(v, 'pc', 'sp', 'ax')) return null;
      return { t: 'step', op: String(v.op), pc: Number(v.pc), sp: Number(v.sp), ax: Number(v.ax) };
    case 'out':
      if (!hasStrings(v, 'text')) return null;
      return { t: 'out', text: String(v.text) };
    case 'halt':
      if (!hasNumbers(v, 'pc', 'steps')) return null;
      return { t: 'halt', pc: Number(v.pc), steps: Number(v.steps) };
    case 'fault':
      if (!hasStrings(v, 'code', 'msg') || !hasNumbers(v, 'pc')) return null;
      return { t: 'fault', code: String(v.code), msg: String(v.msg), pc: Number(v.pc) };
    case 'end': {
      const reason = RUN_REASONS.find(r => r === v.reason);
      if (reason === undefined || !hasNumbers(v, 'pc', 'steps')) return null;
      return { t: 'end', reason, pc: Number(v.pc), steps: Number(v.steps) };
    }
    default:
      return null;
  }
}

/**
 * Serialize a payload as one JSON line. Key order follows the payload object.
 */
export function formatFrame(payload: TracePayload): string {
  return JSON.stringify(payload);
}

export function createFrame(payload: TracePayload, timestamp: number = Date.now()): TraceFrame {
  return { type: payload.t, timestamp, raw: formatFrame(payload), payload };
}

export function parseFrame(line: string): TraceFrame | null {
  const cleanLine = line.trim();
  if (!cleanLine.startsWith('{') || !cleanLine.endsWith('}')) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(cleanLine);
  } catch {
    // Not a frame (e.g. program output that happens to look like JSON)
    return null;
  }

  const payload = toPayload(parsed);
  if (!payload) return null;

  return {
    type: payload.t,
    timestamp: Date.now(),
    raw: cleanLine,
    payload
  };
}
