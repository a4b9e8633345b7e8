import { MAX_SEED } from './constants';
import { CLIError } from './errors';
import { isValidTimeZone } from './utils/time';

export interface RunOptions {
  file: string;
  presenterSheet?: string;
  judgeSheet?: string;
  reviews: number;
  days: number;
  seed: number;
  out: string;
  timezone: string;
}

function requireInteger(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new CLIError(`--${name} must be an integer >= ${min}, got ${value}`);
  }
}

export function validateRunOptions(options: RunOptions): RunOptions {
  requireInteger('reviews', options.reviews, 1);
  requireInteger('days', options.days, 1);
  if (!Number.isInteger(options.seed) || options.seed < 0 || options.seed > MAX_SEED) {
    throw new CLIError(`--seed must be an integer from 0 to ${MAX_SEED}, got ${options.seed}`);
  }
  if (!isValidTimeZone(options.timezone)) {
    throw new CLIError(`--timezone '${options.timezone}' is not a valid IANA time zone`);
  }
  if (!options.out.toLowerCase().endsWith('.xlsx')) {
    throw new CLIError(`--out must name an .xlsx file, got '${options.out}'`);
  }
  return options;
}
