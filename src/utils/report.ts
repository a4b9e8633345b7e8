import { sheetNames } from '../constants';
import type {
  CellValue,
  Judge,
  JudgeReviewRow,
  NamedTable,
  PosterAssignmentRow,
  Presenter,
  RawTable,
  ReportSummary,
  ScheduleGrid,
} from '../types';
import { assignJudges, formatJudgeAssignments } from './assignment';
import { assignBoards, dayLabels } from './boards';
import { buildScheduleGrid } from './grid';
import { normalizeHeader } from './parser';
import { createRandom } from './random';

export interface ReportInput {
  presenters: readonly Presenter[];
  judges: readonly Judge[];
  reviewsPerPoster: number;
  days: number;
  seed: number;
  originalPresenters: RawTable;
  originalJudges: RawTable;
}

export interface AssignmentReport {
  posterAssignments: PosterAssignmentRow[];
  reviewAssignments: JudgeReviewRow[];
  scheduleGrid: ScheduleGrid;
  originalPresenters: RawTable;
  originalJudges: RawTable;
  summary: ReportSummary;
}

/** Judges sharing a name are told apart by their id. */
export function judgeDisplayNames(judges: readonly Judge[]): Map<string, string> {
  const counts = new Map<string, number>();
  judges.forEach((judge) => counts.set(judge.name, (counts.get(judge.name) ?? 0) + 1));
  return new Map(
    judges.map((judge): [string, string] => [judge.id, (counts.get(judge.name) ?? 0) > 1 ? `${judge.name} (${judge.id})` : judge.name]),
  );
}

export function physicalBoardsNeeded(maxBoard: number): number {
  return Math.ceil(maxBoard / 2);
}

export function buildReport(input: ReportInput): AssignmentReport {
  const { judges, reviewsPerPoster, days, seed } = input;

  const boarded = assignBoards(input.presenters, days, createRandom(seed));
  const { perPoster, perJudge } = assignJudges(boarded, judges, reviewsPerPoster);
  const names = judgeDisplayNames(judges);
  const nameOf = (judge: Judge) => names.get(judge.id) ?? judge.name;

  const posterAssignments: PosterAssignmentRow[] = perPoster.map(({ poster, judges: selected }) => ({
    day: poster.day,
    session: poster.session,
    board: poster.board,
    first_name: poster.firstName,
    last_name: poster.lastName,
    judges: selected.map(nameOf),
    lab: poster.lab,
    poster_title: poster.posterTitle,
    role: poster.role ?? '',
    extra: poster.extra,
  }));

  const reviewAssignments: JudgeReviewRow[] = perJudge.map(({ judge, load, assignments }) => ({
    judge: nameOf(judge),
    n_posters: load,
    assigned_posters: formatJudgeAssignments(assignments),
  }));

  const scheduleGrid = buildScheduleGrid(
    perJudge.map(({ judge, assignments }) => ({ judge: nameOf(judge), assignments })),
    dayLabels(days),
  );

  const maxBoard = boarded.reduce((max, poster) => Math.max(max, poster.board), 0);

  return {
    posterAssignments,
    reviewAssignments,
    scheduleGrid,
    originalPresenters: input.originalPresenters,
    originalJudges: input.originalJudges,
    summary: {
      maxBoard,
      physicalBoardsNeeded: physicalBoardsNeeded(maxBoard),
      totalPosters: boarded.length,
      totalJudges: judges.length,
      reviewsPerPoster,
      days,
      seed,
    },
  };
}

function judgeColumnHeaders(reviewsPerPoster: number): string[] {
  return Array.from({ length: reviewsPerPoster }, (_, idx) => `Judge_${idx + 1}`);
}

/**
 * Passthrough columns keep their input header unless it clashes with an
 * assigned column, in which case they are written as "<header> (input)".
 */
function passthroughHeaders(extraHeaders: readonly string[], assigned: readonly string[]): Map<string, string> {
  const taken = new Set(assigned.map(normalizeHeader));
  return new Map(
    extraHeaders.map((header): [string, string] => {
      let output = taken.has(normalizeHeader(header)) ? `${header} (input)` : header;
      for (let n = 2; taken.has(normalizeHeader(output)); n += 1) {
        output = `${header} (input ${n})`;
      }
      taken.add(normalizeHeader(output));
      return [header, output];
    }),
  );
}

function posterAssignmentsTable(report: AssignmentReport): NamedTable {
  const judgeHeaders = judgeColumnHeaders(report.summary.reviewsPerPoster);
  const assignedHeaders = [
    'Day',
    'Session',
    'Board',
    'FirstName',
    'LastName',
    ...judgeHeaders,
    'Lab',
    'Poster_Title',
    'Role',
  ];
  const passthrough = passthroughHeaders(Object.keys(report.posterAssignments[0]?.extra ?? {}), assignedHeaders);
  const columns = [...assignedHeaders, ...passthrough.values()];

  const rows = report.posterAssignments.map((row) => {
    const record: Record<string, CellValue> = {
      Day: row.day,
      Session: row.session,
      Board: row.board,
      FirstName: row.first_name,
      LastName: row.last_name,
    };
    judgeHeaders.forEach((header, idx) => {
      record[header] = row.judges[idx] ?? '';
    });
    record.Lab = row.lab;
    record.Poster_Title = row.poster_title;
    record.Role = row.role;
    passthrough.forEach((output, header) => {
      record[output] = row.extra[header] ?? '';
    });
    return record;
  });

  return { name: sheetNames.posterAssignments, columns, rows };
}

function scheduleGridTable(grid: ScheduleGrid): NamedTable {
  return {
    name: sheetNames.scheduleGrid,
    columns: ['Judge', ...grid.slots],
    rows: grid.rows.map((row) => ({ Judge: row.judge, ...row.cells })),
  };
}

function reviewAssignmentsTable(rows: readonly JudgeReviewRow[]): NamedTable {
  return {
    name: sheetNames.reviewAssignments,
    columns: ['Judge', 'Assigned_Posters'],
    rows: rows.map((row) => ({ Judge: row.judge, Assigned_Posters: row.assigned_posters })),
  };
}

function rawTable(name: string, table: RawTable): NamedTable {
  return { name, columns: [...table.headers], rows: table.rows.map((row) => ({ ...row })) };
}

/** Output tables in sheet order. */
export function reportTables(report: AssignmentReport): NamedTable[] {
  return [
    posterAssignmentsTable(report),
    scheduleGridTable(report.scheduleGrid),
    reviewAssignmentsTable(report.reviewAssignments),
    rawTable(sheetNames.originalPresenters, report.originalPresenters),
    rawTable(sheetNames.originalJudges, report.originalJudges),
  ];
}
