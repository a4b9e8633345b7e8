import { describe, expect, it } from 'vitest';
import { validateRunOptions, type RunOptions } from './config';
import { MAX_SEED } from './constants';
import { CLIError } from './errors';

const options = (overrides: Partial<RunOptions> = {}): RunOptions => ({
  file: 'roster.xlsx',
  reviews: 2,
  days: 2,
  seed: 42,
  out: 'assignments.xlsx',
  timezone: 'UTC',
  ...overrides,
});

describe('validateRunOptions', () => {
  it('accepts seeds across the 32-bit range', () => {
    expect(validateRunOptions(options({ seed: 0 })).seed).toBe(0);
    expect(validateRunOptions(options({ seed: MAX_SEED })).seed).toBe(4294967295);
  });

  it('rejects seeds the generator would truncate', () => {
    expect(() => validateRunOptions(options({ seed: 2 ** 32 + 1 }))).toThrow(
      '--seed must be an integer from 0 to 4294967295, got 4294967297',
    );
    expect(() => validateRunOptions(options({ seed: -1 }))).toThrow(CLIError);
    expect(() => validateRunOptions(options({ seed: 1.5 }))).toThrow(CLIError);
  });

  it('rejects a non-positive review count', () => {
    expect(() => validateRunOptions(options({ reviews: 0 }))).toThrow('--reviews must be an integer >= 1, got 0');
  });
});
