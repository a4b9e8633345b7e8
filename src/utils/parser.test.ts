import { describe, expect, it } from 'vitest';
import { ValidationError } from '../errors';
import type { RawTable } from '../types';
import { normalizeHeader, parseJudges, parsePresenters } from './parser';

const table = (headers: string[], rows: string[][]): RawTable => ({
  headers,
  rows: rows.map((values) => Object.fromEntries(headers.map((header, idx) => [header, values[idx] ?? '']))),
  rowNumbers: rows.map((_, idx) => idx + 2),
});

describe('normalizeHeader', () => {
  it('ignores case, spaces and punctuation', () => {
    expect(normalizeHeader('Poster_Title')).toBe('postertitle');
    expect(normalizeHeader(' Poster Title ')).toBe('postertitle');
    expect(normalizeHeader('first-name')).toBe('firstname');
  });
});

describe('parsePresenters', () => {
  it('reads split names, role and passthrough columns', () => {
    const presenters = parsePresenters(
      table(
        ['First Name', 'last_name', 'Lab', 'Poster Title', 'Role', 'Email'],
        [
          ['Ada', 'Lovelace', 'Babbage Lab', 'Engines', 'PhD', 'ada@example.com'],
          [' Alan ', 'Turing', 'Bletchley', 'Machines', '', 'alan@example.com'],
        ],
      ),
    );

    expect(presenters).toEqual([
      {
        rowNumber: 2,
        firstName: 'Ada',
        lastName: 'Lovelace',
        name: 'Ada Lovelace',
        lab: 'Babbage Lab',
        posterTitle: 'Engines',
        role: 'PhD',
        extra: { Email: 'ada@example.com' },
      },
      {
        rowNumber: 3,
        firstName: 'Alan',
        lastName: 'Turing',
        name: 'Alan Turing',
        lab: 'Bletchley',
        posterTitle: 'Machines',
        role: null,
        extra: { Email: 'alan@example.com' },
      },
    ]);
  });

  it('accepts a single combined name column', () => {
    const [presenter] = parsePresenters(table(['Name', 'Lab', 'Poster_Title'], [['Grace Hopper', 'Navy', 'Compilers']]));
    expect(presenter).toMatchObject({ firstName: 'Grace Hopper', lastName: '', name: 'Grace Hopper', role: null });
  });

  it('passes an unused Name column through when names are split', () => {
    const [presenter] = parsePresenters(
      table(['FirstName', 'LastName', 'Name', 'Lab', 'Poster_Title'], [['Ada', 'Lovelace', 'A. Lovelace', 'Optics', 'Lenses']]),
    );
    expect(presenter).toMatchObject({ name: 'Ada Lovelace', extra: { Name: 'A. Lovelace' } });
  });

  it('skips blank rows and keeps sheet row numbers', () => {
    const presenters = parsePresenters(
      table(['FirstName', 'LastName', 'Lab', 'Poster_Title'], [['A', 'B', 'L', 'T'], ['', '', '', ''], ['C', 'D', 'L', 'U']]),
    );
    expect(presenters.map((p) => p.rowNumber)).toEqual([2, 4]);
  });

  it('reports every missing required column', () => {
    let caught: unknown;
    try {
      parsePresenters(table(['FirstName', 'Role'], [['A', 'PhD']]));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    if (!(caught instanceof ValidationError)) return;
    expect(caught.details).toEqual([
      'FirstName (Presenter first name) and LastName (Presenter last name), or Name (Combined presenter name)',
      'Lab (Presenter lab)',
      'Poster_Title (Poster title)',
    ]);
    expect(caught.message).toBe(`Presenter sheet is missing required columns: ${caught.details.join('; ')}`);
  });
});

describe('parseJudges', () => {
  it('keys judges by sheet row when there is no ID column', () => {
    const { judges, duplicateNames } = parseJudges(table(['Name', 'Lab'], [['Dr. Kim', 'Optics'], ['Dr. Osei', 'Genomics']]));
    expect(judges).toEqual([
      { id: 'row-2', name: 'Dr. Kim', lab: 'Optics' },
      { id: 'row-3', name: 'Dr. Osei', lab: 'Genomics' },
    ]);
    expect(duplicateNames).toEqual([]);
  });

  it('uses the ID column and reports shared names', () => {
    const { judges, duplicateNames } = parseJudges(
      table(['ID', 'Name', 'Lab'], [['j-1', 'Sam Lee', 'Optics'], ['j-2', 'Sam Lee', 'Genomics'], ['', 'Pat Ng', 'Optics']]),
    );
    expect(judges.map((judge) => judge.id)).toEqual(['j-1', 'j-2', 'row-4']);
    expect(duplicateNames).toEqual(['Sam Lee']);
  });

  it('rejects duplicate IDs', () => {
    expect(() => parseJudges(table(['ID', 'Name', 'Lab'], [['j-1', 'A', 'X'], ['j-1', 'B', 'Y']]))).toThrow(
      'Judge sheet has duplicate IDs: j-1',
    );
  });

  it('rejects judges without a name and names their rows', () => {
    let caught: unknown;
    try {
      parseJudges(table(['Name', 'Lab'], [['Dr. Kim', 'Optics'], ['', 'Genomics'], ['  ', 'Robotics']]));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    if (!(caught instanceof ValidationError)) return;
    expect(caught.message).toBe('Judge sheet has judges without a name: row 3, row 4');
    expect(caught.details).toEqual(['row 3', 'row 4']);
  });

  it('rejects a sheet without a Lab column', () => {
    expect(() => parseJudges(table(['Name'], [['A']]))).toThrow(
      'Judge sheet is missing required columns: Lab (Judge lab)',
    );
  });
});
