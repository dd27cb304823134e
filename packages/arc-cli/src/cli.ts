import { parseArgs } from "util";
import * as fs from "fs";
import * as path from "path";
import { assemble, disassemble, hex, hexDump, REGISTER_NAMES } from "@arc/assembler";
import type { AssembledProgram } from "@arc/assembler";
import { SOURCE_EXTENSIONS, formatMemorySize, resolveEmulatorConfig } from "@arc/emulator";
import { EmulatorDevice, JUnitReporter, loadSuite, runSuite } from "@arc/harness";
import type { TraceFrame } from "@arc/harness";
import { programImage, programManifest, sortedSymbols } from "./image";

export const CLI_VERSION = "0.1.0";

export interface CliIo {
  log: (message: string) => void;
  error: (message: string) => void;
  env: NodeJS.ProcessEnv;
}

const defaultIo: CliIo = {
  log: message => console.log(message),
  error: message => console.error(message),
  env: process.env
};

interface CliOptions {
  json?: boolean;
  output?: string;
  memory?: string;
  "max-steps"?: string;
  trace?: boolean;
  input?: string;
  junit?: string;
  "fail-fast"?: boolean;
}

const HELP = `
ARC CLI - Assembler and Emulator for the ARC 32-bit CPU

Usage:
  arc <command> [arguments] [options]

Commands:
  assemble <file>     Assemble source; print layout and symbols
  run <file>          Assemble and run on the emulator
  disasm <file>       Print the disassembly listing and a data hex dump
  test <suite.json>   Run a JSON program test suite

Options:
  -h, --help          Show this help
  -v, --version       Show version
  -j, --json          Output result as JSON
  -o, --output <f>    Binary image path (assemble); a .json sidecar is written beside it
  -m, --memory <s>    Memory size, e.g. 64KB or 1MB (default: $ARC_MEMORY or 64KB)
      --max-steps <n> Step limit for run (default 1000000)
  -t, --trace         Print a trace frame per instruction (run)
  -i, --input <text>  Pending console input (run)
      --junit <f>     Write JUnit XML (test)
      --fail-fast     Stop a suite at the first failure (test)
`;

/**
 * Run the CLI and return its exit code.
 */
export async function main(argv: string[], io: CliIo = defaultIo): Promise<number> {
  try {
    const { values, positionals } = parseArgs({
      args: argv,
      options: {
        help: { type: "boolean", short: "h" },
        version: { type: "boolean", short: "v" },
        json: { type: "boolean", short: "j" },
        output: { type: "string", short: "o" },
        memory: { type: "string", short: "m" },
        "max-steps": { type: "string" },
        trace: { type: "boolean", short: "t" },
        input: { type: "string", short: "i" },
        junit: { type: "string" },
        "fail-fast": { type: "boolean" }
      },
      allowPositionals: true
    });

    if (values.help) {
      io.log(HELP);
      return 0;
    }

    if (values.version) {
      io.log(`arc v${CLI_VERSION}`);
      return 0;
    }

    const [command, file] = positionals;
    switch (command) {
      case "assemble":
        return handleAssemble(requireFile(file), values, io);
      case "run":
        return handleRun(requireFile(file), values, io);
      case "disasm":
        return handleDisasm(requireFile(file), values, io);
      case "test":
        return await handleTest(requireFile(file), values, io);
      default:
        io.error(command === undefined ? "No command given" : `Unknown command: ${command}`);
        io.log(HELP);
        return 1;
    }
  } catch (err) {
    io.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}

function requireFile(file: string | undefined): string {
  if (!file) throw new Error("No input file specified");
  if (!fs.existsSync(file)) throw new Error(`File not found: ${file}`);
  return file;
}

function memorySize(options: CliOptions, io: CliIo): number {
  return resolveEmulatorConfig({ memorySize: options.memory }, io.env).memorySize;
}

function assembleFile(file: string, options: CliOptions, io: CliIo): AssembledProgram {
  const ext = path.extname(file).toLowerCase();
  if (!SOURCE_EXTENSIONS.some(e => e === ext)) {
    io.error(`Warning: ${file} does not end in ${SOURCE_EXTENSIONS.join(" or ")}`);
  }
  return assemble(fs.readFileSync(file, "utf8"), { memorySize: memorySize(options, io) });
}

function parseMaxSteps(text: string | undefined): number | undefined {
  if (text === undefined) return undefined;
  const steps = Number(text);
  if (!Number.isInteger(steps) || steps <= 0) {
    throw new Error(`Invalid --max-steps '${text}' (expected a positive integer)`);
  }
  return steps;
}

// =============================================================================
// Commands
// =============================================================================

function handleAssemble(file: string, options: CliOptions, io: CliIo): number {
  const program = assembleFile(file, options, io);
  const manifest = programManifest(program);

  if (options.output) {
    fs.writeFileSync(options.output, programImage(program));
    fs.writeFileSync(`${options.output}.json`, JSON.stringify(manifest, null, 2) + "\n");
  }

  if (options.json) {
    io.log(JSON.stringify({ success: true, output: options.output ?? null, ...manifest }));
    return 0;
  }

  io.log(`Assembled ${file}`);
  io.log(`  Memory: ${manifest.memorySize}`);
  io.log(`  Text:   ${hex(program.actualTextStart, 4)} (${program.text.length} words)`);
  io.log(`  Data:   ${hex(program.actualDataStart, 4)} (${program.data.length} bytes)`);
  io.log(`  Stack:  ${hex(program.actualStackStart, 4)} (${program.actualStackSize} bytes)`);
  const symbols = sortedSymbols(program);
  if (symbols.length > 0) {
    io.log("Symbols:");
    for (const [name, value] of symbols) {
      io.log(`  ${hex(value, 4)}  ${name}`);
    }
  }
  if (options.output) {
    io.log(`Output: ${options.output} (${programImage(program).length} bytes), ${options.output}.json`);
  }
  return 0;
}

function handleRun(file: string, options: CliOptions, io: CliIo): number {
  const program = assembleFile(file, options, io);
  const device = new EmulatorDevice({
    memorySize: program.memorySize,
    traceMode: options.trace ? "verbose" : "off"
  });
  if (options.trace && !options.json) {
    device.onFrame((frame: TraceFrame) => io.log(frame.raw));
  }

  device.load(program, options.input);
  const result = device.run(parseMaxSteps(options["max-steps"]));
  const snapshot = device.emulator.snapshot();

  if (options.json) {
    io.log(JSON.stringify({
      reason: result.reason,
      steps: result.steps,
      pc: result.pc,
      output: device.emulator.output,
      registers: snapshot.registers,
      flags: snapshot.flags,
      fault: result.fault ? { code: result.fault.code, message: result.fault.message } : null
    }));
  } else {
    if (device.emulator.output) {
      io.log(device.emulator.output.replace(/\n$/, ""));
    }
    io.log("Registers:");
    for (let i = 0; i < REGISTER_NAMES.length; i += 4) {
      io.log("  " + REGISTER_NAMES.slice(i, i + 4)
        .map(name => `${name.padEnd(5)} ${hex(snapshot.registers[name], 8)}`)
        .join("  "));
    }
    const flags = Object.entries(snapshot.flags).filter(([, on]) => on).map(([name]) => name);
    io.log(`Flags: ${flags.length > 0 ? flags.join(" ") : "(none)"}`);
    io.log(`Stopped: ${result.reason} at ${hex(result.pc, 4)} after ${result.steps} steps`);
  }

  if (result.fault) {
    io.error(`Fault: ${result.fault.message}`);
    return 1;
  }
  return 0;
}

function handleDisasm(file: string, options: CliOptions, io: CliIo): number {
  const program = assembleFile(file, options, io);
  io.log(`; text at ${hex(program.actualTextStart, 4)}, memory ${formatMemorySize(program.memorySize)}`);
  io.log(disassemble(program.text, program.actualTextStart));
  if (program.data.length > 0) {
    io.log(`; data at ${hex(program.actualDataStart, 4)}`);
    io.log(hexDump(program.data, program.actualDataStart));
  }
  return 0;
}

async function handleTest(file: string, options: CliOptions, io: CliIo): Promise<number> {
  const suite = loadSuite(file);
  const results = await runSuite(suite, {
    failFast: options["fail-fast"],
    maxSteps: parseMaxSteps(options["max-steps"])
  });

  if (options.junit) {
    new JUnitReporter().write(results, options.junit);
  }

  const count = (status: string) => results.filter(r => r.status === status).length;
  if (options.json) {
    io.log(JSON.stringify({
      suite: suite.name,
      results: results.map(r => ({ id: r.testId, status: r.status, duration: r.duration, error: r.error ?? null }))
    }));
  } else {
    io.log(`Suite: ${suite.name}`);
    for (const r of results) {
      const line = `  ${r.status.toUpperCase().padEnd(5)} ${r.testId}`;
      io.log(r.error ? `${line}: ${r.error}` : line);
    }
    io.log(`${count("pass")} passed, ${count("fail")} failed, ${count("error")} errors, ${count("skip")} skipped`);
  }

  return count("fail") + count("error") > 0 ? 1 : 0;
}
