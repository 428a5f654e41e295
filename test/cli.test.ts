import { describe, it, expect } from "vitest";
import { USAGE, UsageError, parseCliArgs, runCli } from "../src/lib/cli";
import type { CliIO } from "../src/lib/cli";
import { parseEventCsv } from "../src/lib/ledger-events";
import { verifyStream } from "../src/lib/stream-integrity";

function captureIO(): CliIO & { out: () => string; err: () => string } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout: text => {
      stdout.push(text);
    },
    stderr: text => {
      stderr.push(text);
    },
    out: () => stdout.join(""),
    err: () => stderr.join(""),
  };
}

describe("runCli: output", () => {
  it("should print only the header for zero records", () => {
    const io = captureIO();

    expect(runCli(["0"], io)).toBe(0);
    expect(io.out()).toBe("type,client,tx,amount\n");
    expect(io.err()).toBe("");
  });

  it("should print one base transaction with tx 0 for a single record", () => {
    const io = captureIO();

    expect(runCli(["1", "--seed", "17"], io)).toBe(0);

    const rows = io.out().trimEnd().split("\n");
    expect(rows[0]).toBe("type,client,tx,amount");
    expect(rows[1]).toMatch(/^(deposit|withdrawal),\d+,0,\d+(\.\d{1,4})?$/);
    expect(rows.length === 2 || rows.length === 3).toBe(true);

    if (rows.length === 3) {
      const baseClient = rows[1].split(",")[1];
      expect(rows[2]).toBe(`dispute,${baseClient},0`);
    }
  });

  it("should produce a consistent stream for larger counts", () => {
    const io = captureIO();

    expect(runCli(["500", "--seed", "4"], io)).toBe(0);

    const events = parseEventCsv(io.out());
    expect(events.filter(e => e.type === "deposit" || e.type === "withdrawal")).toHaveLength(500);
    expect(verifyStream(events).ok).toBe(true);
  });

  it("should repeat the same output for the same seed", () => {
    const first = captureIO();
    const second = captureIO();

    runCli(["50", "--seed", "123"], first);
    runCli(["--seed", "123", "50"], second);

    expect(second.out()).toBe(first.out());
  });

  it("should write a summary to stderr when verbose", () => {
    const io = captureIO();

    expect(runCli(["20", "--seed", "8", "--verbose"], io)).toBe(0);

    const dataRows = io.out().trimEnd().split("\n").length - 1;
    const summary = io.err().trimEnd().split("\n");
    expect(summary[0]).toBe(`events: ${dataRows}`);
    expect(summary[summary.length - 1]).toBe("integrity: ok");
  });
});

describe("runCli: invalid invocation", () => {
  const invalid: Array<[string, string[]]> = [
    ["no arguments", []],
    ["two arguments", ["10", "20"]],
    ["a non-numeric count", ["ten"]],
    ["a fractional count", ["2.5"]],
    ["a negative count", ["-5"]],
    ["a non-integer seed", ["10", "--seed", "abc"]],
  ];

  for (const [label, argv] of invalid) {
    it(`should exit non-zero with usage and no CSV for ${label}`, () => {
      const io = captureIO();

      expect(runCli(argv, io)).toBe(1);
      expect(io.out()).toBe("");
      expect(io.err().endsWith(`${USAGE}\n`)).toBe(true);
    });
  }

  it("should print help to stdout and exit zero", () => {
    const io = captureIO();

    expect(runCli(["--help"], io)).toBe(0);
    expect(io.out()).toContain("Usage: generate");
    expect(io.out()).not.toContain("type,client,tx,amount");
  });
});

describe("parseCliArgs", () => {
  it("should parse the count and options", () => {
    const io = captureIO();

    expect(parseCliArgs(["42", "--seed", "-3", "--verbose"], io)).toEqual({
      count: 42,
      seed: -3,
      verbose: true,
    });
  });

  it("should leave the seed unset by default", () => {
    const io = captureIO();

    expect(parseCliArgs(["7"], io)).toEqual({ count: 7, seed: undefined, verbose: false });
  });

  it("should fold argument errors into UsageError", () => {
    const io = captureIO();

    expect(() => parseCliArgs(["1", "2"], io)).toThrow(UsageError);
    expect(io.err()).toContain("too many arguments");
  });
});
