import { describe, expect, it } from 'vitest';
import { parseWeight, runQuoteCommand } from '../src/utils/cli';

describe('runQuoteCommand', () => {
  it('prints a quote for a valid mode and weight', () => {
    const result = runQuoteCommand(['Air', '12.5']);

    expect(result.exitCode).toBe(0);
    expect(result.stderr).toEqual([]);
    expect(result.stdout[1]).toBe('Shipping quote:');
    expect(result.stdout[2]).toMatch(/^ {2}Quote: {2}qt_[0-9a-f]{8}$/);
    expect(result.stdout.slice(3)).toEqual([
      '  Mode:   Air',
      '  Weight: 12.5',
      '  Rate:   $3 / unit',
      '  Cost:   $37.50 USD',
    ]);
  });

  it('prints usage when arguments are missing', () => {
    const usage = [
      'Usage: npm run quote -- <mode> <weight>',
      'Modes: Ground, Air',
    ];

    expect(runQuoteCommand([])).toEqual({ exitCode: 1, stdout: usage, stderr: [] });
    expect(runQuoteCommand(['Ground'])).toEqual({ exitCode: 1, stdout: usage, stderr: [] });
  });

  it('reports an unknown mode', () => {
    expect(runQuoteCommand(['Sea', '10'])).toEqual({
      exitCode: 1,
      stdout: [],
      stderr: ['Error: Invalid shipping mode: Sea. Supported modes: Ground, Air'],
    });
  });

  it('reports a weight that is not a number', () => {
    expect(runQuoteCommand(['Ground', 'heavy'])).toEqual({
      exitCode: 1,
      stdout: [],
      stderr: ['Error: Invalid weight: "heavy"'],
    });
  });

  it('reports a negative weight', () => {
    expect(runQuoteCommand(['Ground', '-1'])).toEqual({
      exitCode: 1,
      stdout: [],
      stderr: ['Error: Weight must not be negative'],
    });
  });

  it('reports blank and hex weights instead of quoting them', () => {
    expect(runQuoteCommand(['Ground', ' ']).stderr).toEqual(['Error: Invalid weight: " "']);
    expect(runQuoteCommand(['Ground', '0x10']).stderr).toEqual(['Error: Invalid weight: "0x10"']);
  });
});

describe('parseWeight', () => {
  it('parses plain decimals', () => {
    expect(parseWeight('10')).toBe(10);
    expect(parseWeight(' 0.5 ')).toBe(0.5);
    expect(parseWeight('.25')).toBe(0.25);
    expect(parseWeight('-3')).toBe(-3);
  });

  it.each(['', ' ', '0x10', '1e3', 'Infinity', '1.', '10kg'])('rejects %j', (raw) => {
    expect(() => parseWeight(raw)).toThrow(`Invalid weight: "${raw}"`);
  });
});
