/**
 * Quote Shipment
 *
 * CLI tool to price a single shipment.
 * Runs in-process (no server needed).
 *
 * Usage: npm run quote -- <mode> <weight>
 * Example: npm run quote -- Air 12.5
 */

import { runQuoteCommand } from '../src/utils/cli';

function main() {
  const result = runQuoteCommand(process.argv.slice(2));

  for (const line of result.stdout) {
    console.log(line);
  }
  for (const line of result.stderr) {
    console.error(line);
  }

  process.exit(result.exitCode);
}

main();
