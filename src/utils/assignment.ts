import { CapacityError } from '../errors';
import type {
  BoardedPresenter,
  Judge,
  JudgeAssignmentRecord,
  JudgeLoad,
  JudgeState,
  PosterAssignment,
} from '../types';

export interface JudgeAssignmentResult<P extends BoardedPresenter = BoardedPresenter> {
  perPoster: Array<PosterAssignment & { poster: P }>;
  perJudge: JudgeLoad[];
}

export function buildInitialState(judges: readonly Judge[]): JudgeState {
  const state: JudgeState = new Map();
  for (const judge of judges) {
    if (state.has(judge.id)) {
      throw new RangeError(`Duplicate judge id '${judge.id}'`);
    }
    state.set(judge.id, { judge, load: 0, assignments: [] });
  }
  return state;
}

function loadOf(state: JudgeState, judge: Judge): number {
  return state.get(judge.id)?.load ?? 0;
}

/**
 * Lab exclusion is best-effort: when too few judges sit outside the
 * poster's lab, every judge becomes a candidate again.
 */
export function candidatePool(poster: BoardedPresenter, judges: readonly Judge[], reviewsPerPoster: number): Judge[] {
  const outsideLab = judges.filter((judge) => judge.lab !== poster.lab);
  return outsideLab.length < reviewsPerPoster ? [...judges] : outsideLab;
}

/**
 * Least-loaded judges first; Array.prototype.sort is stable, so equal loads
 * keep the judges' input order.
 */
export function pickJudges(
  poster: BoardedPresenter,
  judges: readonly Judge[],
  state: JudgeState,
  reviewsPerPoster: number,
): Judge[] {
  const selected = candidatePool(poster, judges, reviewsPerPoster)
    .sort((a, b) => loadOf(state, a) - loadOf(state, b))
    .slice(0, reviewsPerPoster);

  if (selected.length < reviewsPerPoster) {
    throw new CapacityError(poster, reviewsPerPoster, selected.length);
  }
  return selected;
}

function updateJudgeState(selected: readonly Judge[], poster: BoardedPresenter, state: JudgeState): void {
  for (const judge of selected) {
    const entry = state.get(judge.id);
    if (!entry) continue;
    entry.load += 1;
    entry.assignments.push({
      posterTitle: poster.posterTitle,
      day: poster.day,
      session: poster.session,
      board: poster.board,
    });
  }
}

export function formatJudgeAssignments(assignments: readonly JudgeAssignmentRecord[]): string {
  return assignments.map((a) => `${a.day} (Board ${a.board})`).join(',');
}

/**
 * Give every poster `reviewsPerPoster` distinct judges, scanning posters in
 * the order given. Earlier posters see lower loads, so the partitioner's
 * ordering decides tie-break priority.
 */
export function assignJudges<P extends BoardedPresenter>(
  posters: readonly P[],
  judges: readonly Judge[],
  reviewsPerPoster: number,
): JudgeAssignmentResult<P> {
  if (!Number.isInteger(reviewsPerPoster) || reviewsPerPoster < 1) {
    throw new RangeError(`reviewsPerPoster must be an integer >= 1, got ${reviewsPerPoster}`);
  }

  const state = buildInitialState(judges);
  const perPoster = posters.map((poster) => {
    const selected = pickJudges(poster, judges, state, reviewsPerPoster);
    updateJudgeState(selected, poster, state);
    return { poster, judges: selected };
  });

  return { perPoster, perJudge: Array.from(state.values()) };
}
