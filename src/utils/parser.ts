import { judgeColumns, presenterColumns } from '../constants';
import { ValidationError } from '../errors';
import type { Judge, Presenter, RawTable } from '../types';

export interface JudgeParseResult {
  judges: Judge[];
  duplicateNames: string[];
}

type ColumnSpec = { key: string; header: string; description: string };

export function normalizeHeader(header: string): string {
  return header.toLowerCase().replace(/[^a-z0-9]/g, '');
}

/** Maps each known column key to the header it appears under in the table. */
function locateColumns<K extends string>(
  headers: readonly string[],
  columns: ReadonlyArray<ColumnSpec & { key: K }>,
): Partial<Record<K, string>> {
  const byNormalized = new Map<string, string>();
  for (const header of headers) {
    const normalized = normalizeHeader(header);
    if (normalized && !byNormalized.has(normalized)) {
      byNormalized.set(normalized, header);
    }
  }
  const located: Partial<Record<K, string>> = {};
  for (const column of columns) {
    const header = byNormalized.get(normalizeHeader(column.header));
    if (header !== undefined) located[column.key] = header;
  }
  return located;
}

function describeColumn(column: ColumnSpec): string {
  return `${column.header} (${column.description})`;
}

function cell(row: Record<string, string>, header: string | undefined): string {
  if (header === undefined) return '';
  return (row[header] ?? '').trim();
}

function isBlankRow(row: Record<string, string>): boolean {
  return Object.values(row).every((value) => !value.trim());
}

function columnSpec(columns: ReadonlyArray<ColumnSpec>, key: string): ColumnSpec {
  const found = columns.find((column) => column.key === key);
  if (!found) throw new Error(`Unknown column key '${key}'`);
  return found;
}

export function parsePresenters(table: RawTable): Presenter[] {
  const located = locateColumns(table.headers, presenterColumns);

  const missing: string[] = [];
  const hasSplitName = located.firstName !== undefined && located.lastName !== undefined;
  if (!hasSplitName && located.name === undefined) {
    missing.push(
      `${describeColumn(columnSpec(presenterColumns, 'firstName'))} and ${describeColumn(columnSpec(presenterColumns, 'lastName'))}, or ${describeColumn(columnSpec(presenterColumns, 'name'))}`,
    );
  }
  if (located.lab === undefined) missing.push(describeColumn(columnSpec(presenterColumns, 'lab')));
  if (located.posterTitle === undefined) missing.push(describeColumn(columnSpec(presenterColumns, 'posterTitle')));
  if (missing.length > 0) {
    throw new ValidationError(`Presenter sheet is missing required columns: ${missing.join('; ')}`, missing);
  }

  // with split names a Name column is not read, so it passes through
  const known = new Set(Object.entries(located).flatMap(([key, header]) => (hasSplitName && key === 'name' ? [] : [header])));
  const extraHeaders = table.headers.filter((header) => header && !known.has(header));

  return table.rows.flatMap((row, idx) => {
    if (isBlankRow(row)) return [];
    const firstName = hasSplitName ? cell(row, located.firstName) : cell(row, located.name);
    const lastName = hasSplitName ? cell(row, located.lastName) : '';
    const name = hasSplitName ? [firstName, lastName].filter(Boolean).join(' ') : firstName;
    const role = cell(row, located.role);
    const extra = Object.fromEntries(extraHeaders.map((header) => [header, cell(row, header)]));
    return [
      {
        rowNumber: table.rowNumbers[idx] ?? idx + 2,
        firstName,
        lastName,
        name,
        lab: cell(row, located.lab),
        posterTitle: cell(row, located.posterTitle),
        role: role || null,
        extra,
      },
    ];
  });
}

/**
 * Judges are keyed by the ID column when the sheet has one, otherwise by
 * sheet row. Names are not identities: duplicates are reported, not merged.
 */
export function parseJudges(table: RawTable): JudgeParseResult {
  const located = locateColumns(table.headers, judgeColumns);

  const missing = (['name', 'lab'] as const)
    .filter((key) => located[key] === undefined)
    .map((key) => describeColumn(columnSpec(judgeColumns, key)));
  if (missing.length > 0) {
    throw new ValidationError(`Judge sheet is missing required columns: ${missing.join('; ')}`, missing);
  }

  const judges: Judge[] = [];
  const seenIds = new Set<string>();
  const duplicateIds: string[] = [];
  const unnamedRows: string[] = [];
  const nameCounts = new Map<string, number>();

  table.rows.forEach((row, idx) => {
    if (isBlankRow(row)) return;
    const rowNumber = table.rowNumbers[idx] ?? idx + 2;
    const id = cell(row, located.id) || `row-${rowNumber}`;
    const name = cell(row, located.name);
    if (!name) {
      unnamedRows.push(`row ${rowNumber}`);
      return;
    }
    if (seenIds.has(id)) {
      duplicateIds.push(id);
      return;
    }
    seenIds.add(id);
    nameCounts.set(name, (nameCounts.get(name) ?? 0) + 1);
    judges.push({ id, name, lab: cell(row, located.lab) });
  });

  if (unnamedRows.length > 0) {
    throw new ValidationError(`Judge sheet has judges without a name: ${unnamedRows.join(', ')}`, unnamedRows);
  }
  if (duplicateIds.length > 0) {
    throw new ValidationError(`Judge sheet has duplicate IDs: ${duplicateIds.join(', ')}`, duplicateIds);
  }

  const duplicateNames = Array.from(nameCounts.entries())
    .filter(([, count]) => count > 1)
    .map(([name]) => name);

  return { judges, duplicateNames };
}
