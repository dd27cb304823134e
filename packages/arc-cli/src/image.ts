import type { AssembledProgram } from "@arc/assembler";
import { formatMemorySize } from "@arc/emulator";

/** Sidecar describing where each part of a binary image is loaded. */
export interface ImageManifest {
  memorySize: string;
  textStart: number;
  textWords: number;
  dataStart: number;
  dataBytes: number;
  stackStart: number;
  stackSize: number;
  symbols: Record<string, number>;
}

/**
 * Text words (little-endian) followed by the data bytes.
 */
export function programImage(program: AssembledProgram): Uint8Array {
  const image = new Uint8Array(program.text.length * 4 + program.data.length);
  const view = new DataView(image.buffer);
  program.text.forEach((word, i) => view.setUint32(i * 4, word >>> 0, true));
  image.set(program.data, program.text.length * 4);
  return image;
}

export function programManifest(program: AssembledProgram): ImageManifest {
  return {
    memorySize: formatMemorySize(program.memorySize),
    textStart: program.actualTextStart,
    textWords: program.text.length,
    dataStart: program.actualDataStart,
    dataBytes: program.data.length,
    stackStart: program.actualStackStart,
    stackSize: program.actualStackSize,
    symbols: Object.fromEntries(sortedSymbols(program))
  };
}

/** Symbols ordered by address, then name. */
export function sortedSymbols(program: AssembledProgram): Array<[string, number]> {
  return [...program.symbols.entries()].sort((a, b) => a[1] - b[1] || a[0].localeCompare(b[0]));
}
