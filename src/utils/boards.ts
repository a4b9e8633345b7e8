import { sessions, type Session } from '../constants';
import type { BoardedPresenter, Presenter, RandomSource } from '../types';
import { shuffle } from './random';

export function dayLabel(dayIndex: number): string {
  return `Day ${dayIndex + 1}`;
}

export function dayLabels(days: number): string[] {
  return Array.from({ length: days }, (_, idx) => dayLabel(idx));
}

export function sessionForBoard(board: number): Session {
  return board % 2 === 1 ? 'AM' : 'PM';
}

function assertDays(days: number): void {
  if (!Number.isInteger(days) || days < 1) {
    throw new RangeError(`days must be an integer >= 1, got ${days}`);
  }
}

/**
 * Every day but the last holds floor(n / days) posters; the last day takes
 * whatever remains.
 */
export function daySizes(n: number, days: number): number[] {
  assertDays(days);
  const base = Math.floor(n / days);
  return Array.from({ length: days }, (_, idx) => (idx < days - 1 ? base : n - (days - 1) * base));
}

function compareBoards(a: BoardedPresenter, b: BoardedPresenter): number {
  return (
    a.dayIndex - b.dayIndex ||
    sessions.indexOf(a.session) - sessions.indexOf(b.session) ||
    a.board - b.board
  );
}

/**
 * Shuffle the roster, split it into day groups and number the boards within
 * each day. The result is ordered Day 1 AM, Day 1 PM, Day 2 AM, ... with
 * boards ascending, so the shuffle decides who gets which board but not the
 * display order.
 */
export function assignBoards<T extends Presenter>(
  posters: readonly T[],
  days: number,
  random: RandomSource,
): Array<T & BoardedPresenter> {
  const sizes = daySizes(posters.length, days);
  if (posters.length === 0) return [];

  const shuffled = shuffle(posters, random);
  const boarded: Array<T & BoardedPresenter> = [];
  let offset = 0;

  sizes.forEach((size, dayIndex) => {
    shuffled.slice(offset, offset + size).forEach((poster, position) => {
      const board = position + 1;
      boarded.push({
        ...poster,
        day: dayLabel(dayIndex),
        dayIndex,
        session: sessionForBoard(board),
        board,
      });
    });
    offset += size;
  });

  return boarded.sort(compareBoards);
}
