import { describe, expect, it } from 'vitest';
import type { JudgeAssignmentRecord } from '../types';
import { dayLabels } from './boards';
import { buildScheduleGrid, scheduleSlots } from './grid';

const record = (day: string, session: 'AM' | 'PM', board: number): JudgeAssignmentRecord => ({
  posterTitle: `${day} ${board}`,
  day,
  session,
  board,
});

describe('scheduleSlots', () => {
  it('crosses each day with AM and PM', () => {
    expect(scheduleSlots(dayLabels(2))).toEqual(['Day 1 AM', 'Day 1 PM', 'Day 2 AM', 'Day 2 PM']);
    expect(scheduleSlots(['Day 1'])).toEqual(['Day 1 AM', 'Day 1 PM']);
  });
});

describe('buildScheduleGrid', () => {
  it('joins boards per slot in assignment order', () => {
    const grid = buildScheduleGrid([
      {
        judge: 'Dr. Rivera',
        assignments: [record('Day 1', 'AM', 5), record('Day 2', 'PM', 2), record('Day 1', 'AM', 1)],
      },
    ]);

    expect(grid.slots).toEqual(['Day 1 AM', 'Day 1 PM', 'Day 2 AM', 'Day 2 PM']);
    expect(grid.rows).toEqual([
      {
        judge: 'Dr. Rivera',
        cells: { 'Day 1 AM': '5, 1', 'Day 1 PM': '', 'Day 2 AM': '', 'Day 2 PM': '2' },
      },
    ]);
  });

  it('gives judges without assignments empty cells', () => {
    const grid = buildScheduleGrid([{ judge: 'Idle', assignments: [] }]);
    expect(grid.rows[0].cells).toEqual({ 'Day 1 AM': '', 'Day 1 PM': '', 'Day 2 AM': '', 'Day 2 PM': '' });
  });

  it('supports more than two days', () => {
    const grid = buildScheduleGrid([{ judge: 'A', assignments: [record('Day 3', 'PM', 4)] }], dayLabels(3));
    expect(grid.slots).toHaveLength(6);
    expect(grid.rows[0].cells['Day 3 PM']).toBe('4');
  });

  it('ignores days outside the configured columns', () => {
    const grid = buildScheduleGrid([{ judge: 'A', assignments: [record('Day 3', 'AM', 1)] }]);
    expect(Object.values(grid.rows[0].cells)).toEqual(['', '', '', '']);
  });

  it('keeps one row per judge in input order', () => {
    const grid = buildScheduleGrid([
      { judge: 'B', assignments: [] },
      { judge: 'A', assignments: [] },
    ]);
    expect(grid.rows.map((row) => row.judge)).toEqual(['B', 'A']);
  });
});
