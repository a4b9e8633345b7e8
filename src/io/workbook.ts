import ExcelJS from 'exceljs';
import type { DateTime } from 'luxon';
import { HEADER_FILL, sheetNames } from '../constants';
import { ValidationError } from '../errors';
import type { CellValue, NamedTable, RawTable } from '../types';
import { reportTables, type AssignmentReport } from '../utils/report';
import { formatTimestamp } from '../utils/time';

export interface WriteOptions {
  generatedAt: DateTime;
  timeZone: string;
}

const thin: Partial<ExcelJS.Border> = { style: 'thin' };

export async function loadWorkbook(path: string): Promise<ExcelJS.Workbook> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(path);
  return workbook;
}

export async function listSheets(path: string): Promise<string[]> {
  const workbook = await loadWorkbook(path);
  return workbook.worksheets.map((sheet) => sheet.name);
}

// A repeated header becomes Notes_2, Notes_3, ...
function uniqueHeader(header: string, seen: readonly string[]): string {
  if (!seen.includes(header)) return header;
  let n = 2;
  while (seen.includes(`${header}_${n}`)) n += 1;
  return `${header}_${n}`;
}

function worksheetTable(worksheet: ExcelJS.Worksheet): RawTable {
  const headers: string[] = [];
  const columnNumbers: number[] = [];
  worksheet.getRow(1).eachCell({ includeEmpty: false }, (cell, colNumber) => {
    const header = cell.text.trim();
    if (!header) return;
    headers.push(uniqueHeader(header, headers));
    columnNumbers.push(colNumber);
  });

  const rows: RawTable['rows'] = [];
  const rowNumbers: number[] = [];
  worksheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
    if (rowNumber === 1) return;
    rows.push(Object.fromEntries(headers.map((header, idx) => [header, row.getCell(columnNumbers[idx]).text])));
    rowNumbers.push(rowNumber);
  });

  return { headers, rows, rowNumbers };
}

/** First row is the header; every value is read as its displayed text. */
export function sheetTable(workbook: ExcelJS.Workbook, sheetName: string): RawTable {
  const worksheet = workbook.getWorksheet(sheetName);
  if (!worksheet) {
    const available = workbook.worksheets.map((sheet) => sheet.name);
    throw new ValidationError(`Sheet '${sheetName}' not found. Available sheets: ${available.join(', ')}`, available);
  }
  return worksheetTable(worksheet);
}

function formatHeader(worksheet: ExcelJS.Worksheet, columnCount: number): void {
  const header = worksheet.getRow(1);
  for (let col = 1; col <= columnCount; col += 1) {
    const cell = header.getCell(col);
    cell.font = { bold: true, size: 15 };
    cell.border = { left: thin, right: thin, top: thin, bottom: { style: 'thick' } };
    cell.fill = {
      type: 'pattern',
      pattern: 'solid',
      fgColor: { argb: `FF${HEADER_FILL}` },
      bgColor: { argb: `FF${HEADER_FILL}` },
    };
    cell.alignment = { horizontal: 'center' };
  }
}

function formatGridBody(worksheet: ExcelJS.Worksheet, columnCount: number): void {
  for (let rowNumber = 2; rowNumber <= worksheet.rowCount; rowNumber += 1) {
    const row = worksheet.getRow(rowNumber);
    for (let col = 1; col <= columnCount; col += 1) {
      const cell = row.getCell(col);
      cell.border = { left: thin, right: thin, top: thin, bottom: thin };
      cell.alignment = { horizontal: 'center' };
    }
  }
}

function autoFitColumns(worksheet: ExcelJS.Worksheet, table: NamedTable): void {
  table.columns.forEach((column, idx) => {
    const longest = table.rows.reduce((max, row) => Math.max(max, String(row[column] ?? '').length), column.length);
    worksheet.getColumn(idx + 1).width = longest + 4;
  });
}

function addTable(workbook: ExcelJS.Workbook, table: NamedTable): ExcelJS.Worksheet {
  const worksheet = workbook.addWorksheet(table.name, { views: [{ state: 'frozen', ySplit: 1 }] });
  worksheet.addRow(table.columns);
  table.rows.forEach((row) => {
    worksheet.addRow(table.columns.map((column): CellValue => row[column] ?? ''));
  });
  formatHeader(worksheet, table.columns.length);
  autoFitColumns(worksheet, table);
  return worksheet;
}

export function summaryTable(report: AssignmentReport, options: WriteOptions): NamedTable {
  const { summary } = report;
  const metrics: Array<[string, CellValue]> = [
    ['Maximum Physical Boards Needed', summary.physicalBoardsNeeded],
    ['Highest Board Number', summary.maxBoard],
    ['Total Posters', summary.totalPosters],
    ['Total Judges', summary.totalJudges],
    ['Reviews per Poster', summary.reviewsPerPoster],
    ['Days', summary.days],
    ['Seed', summary.seed],
    ['Generated At', formatTimestamp(options.generatedAt, options.timeZone)],
  ];
  return {
    name: sheetNames.summary,
    columns: ['Metric', 'Value'],
    rows: metrics.map(([metric, value]) => ({ Metric: metric, Value: value })),
  };
}

export function buildWorkbook(report: AssignmentReport, options: WriteOptions): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.created = options.generatedAt.toJSDate();

  for (const table of [...reportTables(report), summaryTable(report, options)]) {
    const worksheet = addTable(workbook, table);
    if (table.name === sheetNames.scheduleGrid) {
      formatGridBody(worksheet, table.columns.length);
    }
  }
  return workbook;
}

export async function writeAssignmentWorkbook(
  report: AssignmentReport,
  path: string,
  options: WriteOptions,
): Promise<void> {
  await buildWorkbook(report, options).xlsx.writeFile(path);
}
