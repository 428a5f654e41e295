/**
 * Ledger event stream generator - process entry point
 *
 * Usage: tsx scripts/generate.ts <num_records> [--seed <n>] [--verbose]
 */

import { runCli } from "../src/lib/cli";

try {
  process.exitCode = runCli(process.argv.slice(2), {
    stdout: text => {
      process.stdout.write(text);
    },
    stderr: text => {
      process.stderr.write(text);
    },
  });
} catch (error) {
  const message = error instanceof Error ? error.message : String(error);
  console.error(message);
  process.exitCode = 1;
}
