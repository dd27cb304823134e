import { describe, test, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { main } from "./cli";
import type { CliIo } from "./cli";

interface Captured extends CliIo {
  logs: string[];
  errors: string[];
}

function capture(env: NodeJS.ProcessEnv = {}): Captured {
  const logs: string[] = [];
  const errors: string[] = [];
  return {
    logs,
    errors,
    env,
    log: message => logs.push(message),
    error: message => errors.push(message)
  };
}

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "arc-cli-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function source(name: string, text: string): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, text);
  return file;
}

const HELLO = '.data\nmsg: .string "hi"\n.text\nstart:\n    OUT msg\n    HALT\n';

describe("arguments", () => {
  test("--version", async () => {
    const io = capture();
    expect(await main(["--version"], io)).toBe(0);
    expect(io.logs).toEqual(["arc v0.1.0"]);
  });

  test("missing and unknown commands", async () => {
    const none = capture();
    expect(await main([], none)).toBe(1);
    expect(none.errors).toEqual(["No command given"]);

    const unknown = capture();
    expect(await main(["frob"], unknown)).toBe(1);
    expect(unknown.errors).toEqual(["Unknown command: frob"]);
  });

  test("missing file", async () => {
    const io = capture();
    const file = path.join(dir, "nope.arc");
    expect(await main(["run", file], io)).toBe(1);
    expect(io.errors).toEqual([`Error: File not found: ${file}`]);
  });

  test("unexpected source extension is a warning", async () => {
    const io = capture();
    const file = source("prog.txt", "HALT\n");
    expect(await main(["disasm", file], io)).toBe(0);
    expect(io.errors).toEqual([`Warning: ${file} does not end in .arc or .asm`]);
  });
});

describe("assemble", () => {
  test("writes a binary image and a JSON sidecar", async () => {
    const io = capture();
    const file = source("hello.arc", HELLO);
    const out = path.join(dir, "hello.bin");

    expect(await main(["assemble", file, "-o", out], io)).toBe(0);

    expect(Array.from(fs.readFileSync(out))).toEqual([
      0xFD, 0xEF, 0x00, 0x51,
      0x00, 0x00, 0x00, 0xFF,
      0x68, 0x69, 0x00
    ]);
    expect(JSON.parse(fs.readFileSync(`${out}.json`, "utf8"))).toEqual({
      memorySize: "64KB",
      textStart: 0,
      textWords: 2,
      dataStart: 0xEFFD,
      dataBytes: 3,
      stackStart: 0xF000,
      stackSize: 4096,
      symbols: { start: 0, msg: 0xEFFD }
    });
    expect(io.logs).toEqual([
      `Assembled ${file}`,
      "  Memory: 64KB",
      "  Text:   0x0000 (2 words)",
      "  Data:   0xEFFD (3 bytes)",
      "  Stack:  0xF000 (4096 bytes)",
      "Symbols:",
      "  0x0000  start",
      "  0xEFFD  msg",
      `Output: ${out} (11 bytes), ${out}.json`
    ]);
  });

  test("assembly errors are reported", async () => {
    const io = capture();
    expect(await main(["assemble", source("bad.arc", "BOGUS AX\n")], io)).toBe(1);
    expect(io.errors[0]).toMatch(/^Error: Assembly failed with 1 error:\n/);
  });
});

describe("run", () => {
  test("prints output, registers and the stop reason", async () => {
    const io = capture();
    const file = source("answer.arc", "MOVI AX, 42\nOUTI AX\nHALT\n");

    expect(await main(["run", file], io)).toBe(0);
    expect(io.logs[0]).toBe("42");
    expect(io.logs[1]).toBe("Registers:");
    expect(io.logs[2]).toBe("  AX    0x0000002A  BX    0x00000000  CX    0x00000000  DX    0x00000000");
    expect(io.logs[io.logs.length - 2]).toBe("Flags: (none)");
    expect(io.logs[io.logs.length - 1]).toBe("Stopped: halted at 0x000C after 3 steps");
  });

  test("--json and a fault exit with 1", async () => {
    const io = capture();
    const file = source("fault.arc", "LODW AX, 0xFFFE\n");

    expect(await main(["run", file, "--json"], io)).toBe(1);
    const report = JSON.parse(io.logs[0]);
    expect(report.reason).toBe("faulted");
    expect(report.fault.code).toBe("MEMORY_OUT_OF_BOUNDS");
    expect(io.errors).toEqual([
      "Fault: MEMORY_OUT_OF_BOUNDS at 0x0000: 4-byte access at 0xFFFE is outside memory (size 0x10000)"
    ]);
  });

  test("--input feeds the console", async () => {
    const io = capture();
    const file = source("echo.arc", ".data\nbuf: .space 8\n.text\nIN buf\nOUT buf\nHALT\n");
    expect(await main(["run", file, "--input", "ping", "--json"], io)).toBe(0);
    expect(JSON.parse(io.logs[0]).output).toBe("ping");
  });

  test("memory size from the environment", async () => {
    const io = capture({ ARC_MEMORY: "128KB" });
    expect(await main(["run", source("halt.arc", "HALT\n"), "--json"], io)).toBe(0);
    expect(JSON.parse(io.logs[0]).registers.SP).toBe(0x1F000);
  });

  test("--memory outside the supported range", async () => {
    const io = capture();
    expect(await main(["run", source("halt.arc", "HALT\n"), "--memory", "1KB"], io)).toBe(1);
    expect(io.errors).toEqual(["Error: Memory size '1KB' is out of range (valid: 64KB–8MB)"]);
  });

  test("--max-steps", async () => {
    const io = capture();
    const file = source("loop.arc", "loop: JMP loop\n");

    expect(await main(["run", file, "--max-steps", "7", "--json"], io)).toBe(0);
    expect(JSON.parse(io.logs[0])).toMatchObject({ reason: "step-limit", steps: 7, pc: 0 });

    const bad = capture();
    expect(await main(["run", file, "--max-steps=0"], bad)).toBe(1);
    expect(bad.errors).toEqual(["Error: Invalid --max-steps '0' (expected a positive integer)"]);
  });

  test("--trace prints frames", async () => {
    const io = capture();
    expect(await main(["run", source("halt.arc", "HALT\n"), "--trace"], io)).toBe(0);
    expect(io.logs.slice(0, 4)).toEqual([
      '{"t":"load","words":1,"bytes":0,"pc":0,"sp":61440}',
      '{"t":"step","op":"HALT","pc":0,"sp":61440,"ax":0}',
      '{"t":"halt","pc":4,"steps":1}',
      '{"t":"end","reason":"halted","pc":4,"steps":1}'
    ]);
  });
});

describe("disasm", () => {
  test("listing and data dump", async () => {
    const io = capture();
    expect(await main(["disasm", source("hello.arc", HELLO)], io)).toBe(0);
    expect(io.logs).toEqual([
      "; text at 0x0000, memory 64KB",
      "0x0000: 0x5100EFFD  OUT 0x00EFFD\n0x0004: 0xFF000000  HALT",
      "; data at 0xEFFD",
      "0xEFFD: 68 69 00"
    ]);
  });
});

describe("test", () => {
  test("runs a suite and writes JUnit XML", async () => {
    const io = capture();
    const suite = source("suite.json", JSON.stringify({
      name: "s",
      tests: [
        { id: "s.ok", source: "HALT", assertions: [{ type: "halted" }] },
        { id: "s.bad", source: "HALT", assertions: [{ type: "output", expected: "x" }] }
      ]
    }));
    const junit = path.join(dir, "junit.xml");

    expect(await main(["test", suite, "--junit", junit], io)).toBe(1);
    expect(io.logs).toEqual([
      "Suite: s",
      "  PASS  s.ok",
      '  FAIL  s.bad: Assertion failed: output expected "x", got ""',
      "1 passed, 1 failed, 0 errors, 0 skipped"
    ]);
    expect(fs.readFileSync(junit, "utf8")).toContain('tests="2" failures="1" errors="0" skipped="0">');
  });
});
