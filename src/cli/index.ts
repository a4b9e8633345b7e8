#!/usr/bin/env npx tsx
/**
 * Poster & judge assignment CLI
 *
 * Usage:
 *   npx tsx src/cli/index.ts <command> [options]
 *   npm run cli -- <command> [options]
 *
 * Examples:
 *   npm run cli -- sheets roster.xlsx
 *   npm run cli -- assign roster.xlsx --presenter-sheet Presenters --judge-sheet Judges --reviews 3
 *
 * Any option can also come from a POSTER_JUDGES_* environment variable
 * (e.g. POSTER_JUDGES_SEED=7), including one set in .env.
 */

import dotenv from 'dotenv';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { assignBuilder, runAssign } from './commands/assign';
import { runSheets } from './commands/sheets';
import { handleError } from './logger';

// .env must be loaded before yargs reads POSTER_JUDGES_* variables
dotenv.config();

yargs(hideBin(process.argv))
  .scriptName('poster-judges')
  .usage('$0 <command> [options]')
  .env('POSTER_JUDGES')
  .command(
    'sheets <file>',
    'List the sheets in a workbook',
    (yargs) => {
      return yargs.positional('file', {
        describe: 'Workbook (.xlsx) to inspect',
        type: 'string',
        demandOption: true,
      });
    },
    async (args) => {
      try {
        await runSheets(args.file);
      } catch (error) {
        handleError(error);
      }
    },
  )
  .command(
    'assign <file>',
    'Assign poster boards and judges, then write the assignment workbook',
    assignBuilder,
    async (args) => {
      try {
        await runAssign({
          file: args.file,
          presenterSheet: args.presenterSheet,
          judgeSheet: args.judgeSheet,
          reviews: args.reviews,
          days: args.days,
          seed: args.seed,
          out: args.out,
          timezone: args.timezone,
        });
      } catch (error) {
        handleError(error);
      }
    },
  )
  .demandCommand(1, 'You must specify a command')
  .strict()
  .help()
  .alias('h', 'help')
  .wrap(100)
  .parseAsync()
  .catch(handleError);
