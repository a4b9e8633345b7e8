import type { Session } from './constants';

export type CellValue = string | number;

export interface RawTable {
  headers: string[];
  rows: Array<Record<string, string>>;
  /** 1-based sheet row number of each data row, parallel to `rows`. */
  rowNumbers: number[];
}

export interface Presenter {
  rowNumber: number;
  firstName: string;
  lastName: string;
  name: string;
  lab: string;
  posterTitle: string;
  role: string | null;
  extra: Record<string, string>;
}

export interface Judge {
  id: string;
  name: string;
  lab: string;
}

export interface BoardAssignment {
  day: string;
  dayIndex: number;
  session: Session;
  board: number;
}

export type BoardedPresenter = Presenter & BoardAssignment;

export type RandomSource = () => number;

export interface JudgeAssignmentRecord {
  posterTitle: string;
  day: string;
  session: Session;
  board: number;
}

export interface JudgeLoad {
  judge: Judge;
  load: number;
  assignments: JudgeAssignmentRecord[];
}

export type JudgeState = Map<string, JudgeLoad>;

export interface PosterAssignment {
  poster: BoardedPresenter;
  judges: Judge[];
}

export interface PosterAssignmentRow {
  day: string;
  session: Session;
  board: number;
  first_name: string;
  last_name: string;
  judges: string[];
  lab: string;
  poster_title: string;
  role: string;
  extra: Record<string, string>;
}

export interface JudgeReviewRow {
  judge: string;
  n_posters: number;
  assigned_posters: string;
}

export interface ScheduleGridRow {
  judge: string;
  cells: Record<string, string>;
}

export interface ScheduleGrid {
  slots: string[];
  rows: ScheduleGridRow[];
}

export interface ReportSummary {
  maxBoard: number;
  physicalBoardsNeeded: number;
  totalPosters: number;
  totalJudges: number;
  reviewsPerPoster: number;
  days: number;
  seed: number;
}

export interface NamedTable {
  name: string;
  columns: string[];
  rows: Array<Record<string, CellValue>>;
}
