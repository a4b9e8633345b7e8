import { DEFAULT_DAYS, sessions } from '../constants';
import type { JudgeAssignmentRecord, ScheduleGrid } from '../types';
import { dayLabels } from './boards';

export interface GridInput {
  judge: string;
  assignments: readonly JudgeAssignmentRecord[];
}

export function slotLabel(day: string, session: string): string {
  return `${day} ${session}`;
}

export function scheduleSlots(days: readonly string[]): string[] {
  return days.flatMap((day) => sessions.map((session) => slotLabel(day, session)));
}

/**
 * One row per judge, one column per (day, session) slot. Cells list the
 * boards the judge reviews in that slot, in assignment order.
 */
export function buildScheduleGrid(
  perJudge: readonly GridInput[],
  days: readonly string[] = dayLabels(DEFAULT_DAYS),
): ScheduleGrid {
  const slots = scheduleSlots(days);

  const rows = perJudge.map(({ judge, assignments }) => {
    const boards = new Map(slots.map((slot): [string, string[]] => [slot, []]));
    for (const assignment of assignments) {
      // days outside the configured grid have no column
      boards.get(slotLabel(assignment.day, assignment.session))?.push(String(assignment.board));
    }
    const cells = Object.fromEntries(slots.map((slot) => [slot, (boards.get(slot) ?? []).join(', ')]));
    return { judge, cells };
  });

  return { slots, rows };
}
