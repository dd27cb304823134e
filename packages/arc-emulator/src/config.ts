/**
 * ARC Emulator - Configuration
 *
 * SPDX-License-Identifier: MIT
 *
 * Memory sizes are written with a KB or MB suffix (1024-based, case-insensitive,
 * optional space), e.g. "64KB", "1 mb". A bare byte count is accepted too.
 */

import { ConfigError } from './errors';

export const KB = 1024;
export const MB = 1024 * KB;

export const DEFAULT_MEMORY_SIZE = 64 * KB;
export const MIN_MEMORY_SIZE = 64 * KB;
export const MAX_MEMORY_SIZE = 8 * MB;

/** Environment variable read when no memory size is given explicitly. */
export const MEMORY_ENV_VAR = 'ARC_MEMORY';

/** Recognized source file extensions. */
export const SOURCE_EXTENSIONS = ['.arc', '.asm'] as const;

export interface EmulatorConfig {
    memorySize: number;
}

export interface EmulatorConfigInput {
    memorySize?: number | string;
}

const SIZE_PATTERN = /^(\d+)\s*(kb|mb)?$/i;

const RANGE_TEXT = '64KB–8MB';

/**
 * Check that a byte count is a valid memory size.
 *
 * @throws ConfigError if it is outside 64KB–8MB
 */
export function validateMemorySize(size: number, source: string = String(size)): number {
    if (!Number.isInteger(size) || size < MIN_MEMORY_SIZE || size > MAX_MEMORY_SIZE) {
        throw new ConfigError(`Memory size '${source}' is out of range (valid: ${RANGE_TEXT})`);
    }
    return size;
}

/**
 * Parse a memory size such as "64KB", "2 MB" or "131072".
 *
 * @throws ConfigError on malformed text or an out-of-range size
 */
export function parseMemorySize(text: string): number {
    const trimmed = text.trim();
    const match = SIZE_PATTERN.exec(trimmed);
    if (!match) {
        throw new ConfigError(`Invalid memory size '${text}' (expected e.g. 64KB or 1MB; valid: ${RANGE_TEXT})`);
    }

    const amount = Number(match[1]);
    const unit = (match[2] ?? '').toLowerCase();
    const multiplier = unit === 'mb' ? MB : unit === 'kb' ? KB : 1;
    return validateMemorySize(amount * multiplier, trimmed);
}

/**
 * Resolve the emulator configuration.
 *
 * Precedence: explicit value, then the ARC_MEMORY environment variable, then
 * the 64KB default.
 */
export function resolveEmulatorConfig(
    input: EmulatorConfigInput = {},
    env: NodeJS.ProcessEnv = process.env
): EmulatorConfig {
    const raw = input.memorySize ?? env[MEMORY_ENV_VAR];

    if (raw === undefined || raw === '') {
        return { memorySize: DEFAULT_MEMORY_SIZE };
    }
    if (typeof raw === 'number') {
        return { memorySize: validateMemorySize(raw) };
    }
    return { memorySize: parseMemorySize(raw) };
}

/**
 * Format a byte count the way sizes are written on the command line.
 */
export function formatMemorySize(size: number): string {
    if (size % MB === 0) {
        return `${size / MB}MB`;
    }
    if (size % KB === 0) {
        return `${size / KB}KB`;
    }
    return `${size}B`;
}
