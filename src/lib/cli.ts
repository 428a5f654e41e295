/**
 * Command-line driver
 *
 *   generate <num_records> [--seed <n>] [--verbose]
 *
 * Writes the CSV stream to stdout. Wrong argument count or a count/seed that
 * is not an integer is a usage error: message and usage on stderr, exit code
 * 1, nothing on stdout.
 */

import { Command, CommanderError, InvalidArgumentError } from "commander";
import { toCsvLines } from "./ledger-events";
import { StreamGenerator } from "./stream-generator";
import { verifyStream } from "./stream-integrity";
import { formatSummary, summarizeStream } from "./stream-metrics";

export const USAGE = "Usage: generate <num_records> [--seed <n>] [--verbose]";

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export interface CliOptions {
  count: number;
  seed?: number;
  verbose: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function parseCount(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  const count = Number(value);
  if (!Number.isSafeInteger(count)) {
    throw new InvalidArgumentError("Count is too large.");
  }
  return count;
}

function parseSeed(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Expected an integer.");
  }
  return Number(value);
}

export function createCli(io: CliIO, onRun: (options: CliOptions) => void): Command {
  const program = new Command();
  program
    .name("generate")
    .description("Generate a referentially consistent ledger event stream as CSV")
    .argument("<num_records>", "number of base transactions to generate", parseCount)
    .option("--seed <n>", "seed for a reproducible stream", parseSeed)
    .option("--verbose", "write a stream summary to stderr", false)
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: io.stdout,
      writeErr: io.stderr,
      outputError(str, write) {
        write(str);
      },
    })
    .action((count: number, opts: { seed?: number; verbose: boolean }) => {
      onRun({ count, seed: opts.seed, verbose: opts.verbose });
    });

  return program;
}

/**
 * Parse user arguments (without the node and script entries).
 * Returns null when commander handled the invocation itself, e.g. --help.
 */
export function parseCliArgs(argv: readonly string[], io: CliIO): CliOptions | null {
  let parsed: CliOptions | null = null;
  const program = createCli(io, options => {
    parsed = options;
  });

  try {
    program.parse([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      if (error.exitCode === 0) return null;
      throw new UsageError(error.message);
    }
    throw error;
  }

  return parsed;
}

export function runCli(argv: readonly string[], io: CliIO): number {
  let options: CliOptions | null;
  try {
    options = parseCliArgs(argv, io);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`${USAGE}\n`);
      return 1;
    }
    throw error;
  }
  if (options === null) return 0;

  const generator = new StreamGenerator({ seed: options.seed });

  if (!options.verbose) {
    for (const line of toCsvLines(generator.stream(options.count))) {
      io.stdout(`${line}\n`);
    }
    return 0;
  }

  // The summary needs the whole stream
  const events = generator.generate(options.count);
  for (const line of toCsvLines(events)) {
    io.stdout(`${line}\n`);
  }

  const integrity = verifyStream(events, generator.getConfig());
  io.stderr(`${formatSummary(summarizeStream(events))}\n`);
  io.stderr(
    integrity.ok ? "integrity: ok\n" : `integrity: ${integrity.violations.length} violations\n`
  );

  return 0;
}
