/* eslint-disable no-console */
import { CapacityError, CLIError, ValidationError } from '../errors';

export const logger = {
  /** Info message (no prefix) */
  info: (msg: string) => console.log(`   ${msg}`),

  /** Success message (checkmark) */
  success: (msg: string) => console.log(`✓ ${msg}`),

  warning: (msg: string) => console.log(`⚠️  ${msg}`),

  error: (msg: string) => console.error(`✗ ${msg}`),

  /** Step/section header */
  step: (msg: string) => console.log(`\n📋 ${msg}`),

  blank: () => console.log(),

  tableHeader: (columns: string[]) => {
    console.log(`\n   ${columns.join('\t')}`);
    console.log(`   ${columns.map((c) => '-'.repeat(c.length)).join('\t')}`);
  },

  tableRow: (values: (string | number | null | undefined)[]) => {
    console.log(`   ${values.map((v) => (v === '' || v == null ? '-' : v)).join('\t')}`);
  },
};

/**
 * Known errors print their message as-is; anything else is unexpected.
 */
export function handleError(error: unknown): never {
  if (error instanceof CLIError) {
    logger.error(error.message);
    process.exit(error.exitCode);
  }

  if (error instanceof ValidationError || error instanceof CapacityError) {
    logger.error(error.message);
    process.exit(1);
  }

  if (error instanceof Error) {
    logger.error(`Unexpected error: ${error.message}`);
    if (process.env.DEBUG) {
      console.error(error.stack);
    }
  } else {
    logger.error(`Unexpected error: ${String(error)}`);
  }

  process.exit(1);
}
