/**
 * Quote command
 *
 * Argument handling for scripts/quote.ts, kept free of process I/O.
 */

import { validateQuoteRequest } from '../api/validation';
import { getSupportedModes } from './factory';
import { quoteShipping } from './quote';

export interface CommandResult {
  exitCode: number;
  stdout: string[];
  stderr: string[];
}

const DECIMAL_PATTERN = /^-?(?:\d+(?:\.\d+)?|\.\d+)$/;

/**
 * Parse a weight written as a plain decimal ("12", "0.5", ".5").
 * Hex, exponents and blank input are rejected.
 */
export function parseWeight(raw: string): number {
  const trimmed = raw.trim();

  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new Error(`Invalid weight: "${raw}"`);
  }

  return Number(trimmed);
}

export function usageLines(): string[] {
  return [
    'Usage: npm run quote -- <mode> <weight>',
    `Modes: ${getSupportedModes().join(', ')}`,
  ];
}

/**
 * Run the quote command against its arguments (argv without node and script)
 */
export function runQuoteCommand(args: readonly string[]): CommandResult {
  const [mode, rawWeight] = args;

  if (!mode || rawWeight === undefined) {
    return { exitCode: 1, stdout: usageLines(), stderr: [] };
  }

  try {
    const weight = parseWeight(rawWeight);
    const validation = validateQuoteRequest({ mode, weight });

    if (!validation.valid) {
      throw new Error(validation.reason ?? 'Invalid weight');
    }

    const quote = quoteShipping({ mode, weight });

    return {
      exitCode: 0,
      stdout: [
        '',
        'Shipping quote:',
        `  Quote:  ${quote.quote_id}`,
        `  Mode:   ${quote.mode}`,
        `  Weight: ${quote.weight}`,
        `  Rate:   $${quote.unit_price} / unit`,
        `  Cost:   $${quote.cost.toFixed(2)} ${quote.currency}`,
      ],
      stderr: [],
    };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { exitCode: 1, stdout: [], stderr: [`Error: ${message}`] };
  }
}
