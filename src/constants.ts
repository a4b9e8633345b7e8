export const sessions = ['AM', 'PM'] as const;

export type Session = (typeof sessions)[number];

export const DEFAULT_DAYS = 2;
export const DEFAULT_REVIEWS_PER_POSTER = 2;
export const DEFAULT_SEED = 42;
/** Seeds are unsigned 32-bit: the PRNG state holds no more. */
export const MAX_SEED = 0xffffffff;
export const DEFAULT_OUTPUT_FILE = 'poster_judge_assignments.xlsx';

export const presenterColumns = [
  { key: 'firstName', header: 'FirstName', description: 'Presenter first name' },
  { key: 'lastName', header: 'LastName', description: 'Presenter last name' },
  { key: 'name', header: 'Name', description: 'Combined presenter name' },
  { key: 'lab', header: 'Lab', description: 'Presenter lab' },
  { key: 'posterTitle', header: 'Poster_Title', description: 'Poster title' },
  { key: 'role', header: 'Role', description: 'Presenter role' },
] as const;

export const judgeColumns = [
  { key: 'id', header: 'ID', description: 'Judge identifier' },
  { key: 'name', header: 'Name', description: 'Judge name' },
  { key: 'lab', header: 'Lab', description: 'Judge lab' },
] as const;

export type PresenterColumnKey = (typeof presenterColumns)[number]['key'];
export type JudgeColumnKey = (typeof judgeColumns)[number]['key'];

export const sheetNames = {
  posterAssignments: 'Poster Assignments',
  scheduleGrid: 'Judge Schedule Grid',
  reviewAssignments: 'Judge Review Assignments',
  originalPresenters: 'Original Presenters',
  originalJudges: 'Original Judges',
  summary: 'Summary',
} as const;

export const HEADER_FILL = 'FFF2E6';
