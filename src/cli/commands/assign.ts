import { DateTime } from 'luxon';
import type { Argv } from 'yargs';
import { validateRunOptions, type RunOptions } from '../../config';
import {
  DEFAULT_DAYS,
  DEFAULT_OUTPUT_FILE,
  DEFAULT_REVIEWS_PER_POSTER,
  DEFAULT_SEED,
} from '../../constants';
import { CLIError } from '../../errors';
import { loadWorkbook, sheetTable, writeAssignmentWorkbook } from '../../io/workbook';
import { parseJudges, parsePresenters } from '../../utils/parser';
import { buildReport, type AssignmentReport } from '../../utils/report';
import { systemTimeZone } from '../../utils/time';
import { logger } from '../logger';

export const assignBuilder = (yargs: Argv) => {
  return yargs
    .positional('file', {
      describe: 'Workbook (.xlsx) with a presenter sheet and a judge sheet',
      type: 'string',
      demandOption: true,
    })
    .option('presenter-sheet', {
      describe: 'Sheet holding presenters (default: first sheet)',
      type: 'string',
    })
    .option('judge-sheet', {
      describe: 'Sheet holding judges (default: second sheet)',
      type: 'string',
    })
    .option('reviews', {
      alias: 'r',
      describe: 'Number of reviews per poster',
      type: 'number',
      default: DEFAULT_REVIEWS_PER_POSTER,
    })
    .option('days', {
      alias: 'd',
      describe: 'Number of presentation days',
      type: 'number',
      default: DEFAULT_DAYS,
    })
    .option('seed', {
      describe: 'Seed for the board shuffle',
      type: 'number',
      default: DEFAULT_SEED,
    })
    .option('out', {
      alias: 'o',
      describe: 'Output workbook path',
      type: 'string',
      default: DEFAULT_OUTPUT_FILE,
    })
    .option('timezone', {
      describe: 'IANA time zone for the generated-at stamp',
      type: 'string',
      default: systemTimeZone(),
    });
};

function pickSheet(requested: string | undefined, available: string[], position: number, role: string): string {
  if (requested) return requested;
  const fallback = available[position];
  if (fallback === undefined) {
    throw new CLIError(`No sheet at position ${position + 1} for ${role}; pass --${role}-sheet`);
  }
  return fallback;
}

function printGrid(report: AssignmentReport): void {
  const { slots, rows } = report.scheduleGrid;
  logger.step('Judge Assignment Matrix');
  logger.tableHeader(['Judge', ...slots]);
  rows.forEach((row) => logger.tableRow([row.judge, ...slots.map((slot) => row.cells[slot])]));
}

/**
 * Load presenters and judges from the workbook, run the assignment engine,
 * and write the result workbook.
 */
export async function runAssign(
  rawOptions: RunOptions,
  now: DateTime = DateTime.now(),
): Promise<AssignmentReport> {
  const options = validateRunOptions(rawOptions);

  logger.step(`Reading ${options.file}`);
  const workbook = await loadWorkbook(options.file);
  const available = workbook.worksheets.map((sheet) => sheet.name);
  const presenterSheet = pickSheet(options.presenterSheet, available, 0, 'presenter');
  const judgeSheet = pickSheet(options.judgeSheet, available, 1, 'judge');
  logger.info(`Presenters: '${presenterSheet}', judges: '${judgeSheet}'`);

  const originalPresenters = sheetTable(workbook, presenterSheet);
  const originalJudges = sheetTable(workbook, judgeSheet);
  const presenters = parsePresenters(originalPresenters);
  const { judges, duplicateNames } = parseJudges(originalJudges);
  if (duplicateNames.length > 0) {
    logger.warning(`Judges sharing a name are listed with their ID: ${duplicateNames.join(', ')}`);
  }

  logger.step(`Assigning ${presenters.length} posters to ${judges.length} judges`);
  const report = buildReport({
    presenters,
    judges,
    reviewsPerPoster: options.reviews,
    days: options.days,
    seed: options.seed,
    originalPresenters,
    originalJudges,
  });

  await writeAssignmentWorkbook(report, options.out, { generatedAt: now, timeZone: options.timezone });
  logger.success('Assignments generated successfully!');

  printGrid(report);
  logger.blank();
  logger.info(`Workbook: ${options.out}`);
  logger.info(`Maximum Physical Boards Needed: ${report.summary.physicalBoardsNeeded}`);
  logger.info(`Total Posters: ${report.summary.totalPosters}`);
  logger.info(`Total Judges: ${report.summary.totalJudges}`);

  return report;
}
