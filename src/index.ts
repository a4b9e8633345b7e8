export * from './constants';
export * from './errors';
export type * from './types';
export { createRandom, shuffle } from './utils/random';
export { assignBoards, dayLabel, dayLabels, daySizes, sessionForBoard } from './utils/boards';
export {
  assignJudges,
  buildInitialState,
  candidatePool,
  formatJudgeAssignments,
  pickJudges,
  type JudgeAssignmentResult,
} from './utils/assignment';
export { buildScheduleGrid, scheduleSlots, slotLabel, type GridInput } from './utils/grid';
export { normalizeHeader, parseJudges, parsePresenters, type JudgeParseResult } from './utils/parser';
export {
  buildReport,
  judgeDisplayNames,
  physicalBoardsNeeded,
  reportTables,
  type AssignmentReport,
  type ReportInput,
} from './utils/report';
export { buildWorkbook, listSheets, loadWorkbook, sheetTable, writeAssignmentWorkbook, type WriteOptions } from './io/workbook';
