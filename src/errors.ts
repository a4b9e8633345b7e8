import type { BoardedPresenter } from './types';

/**
 * Input tables are missing required columns, name an unknown sheet,
 * or otherwise cannot be turned into presenters and judges.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly details: string[] = [],
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Fewer judges exist than a poster needs, even after falling back to the
 * full judge pool. Aborts the whole assignment run.
 */
export class CapacityError extends Error {
  constructor(
    public readonly poster: BoardedPresenter,
    public readonly required: number,
    public readonly available: number,
  ) {
    super(
      `Not enough judges available for poster '${poster.posterTitle}' ` +
        `on ${poster.day} at Board ${poster.board}. ` +
        `Required ${required} judges, but only ${available} were found. ` +
        'Please add more judges or adjust the eligibility criteria.',
    );
    this.name = 'CapacityError';
  }
}

/**
 * Bad command-line input.
 */
export class CLIError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = 1,
  ) {
    super(message);
    this.name = 'CLIError';
  }
}
