import { describe, expect, it } from 'vitest';

import { createCrosswordSolverModule } from '../src/domain/CrosswordSolver';
import type { CellStructure } from '../src/domain/PuzzleGeometry';
import { NoSolutionError } from '../src/domain/Solver';

function toStructure(rows: readonly string[]): CellStructure {
  return rows.map((row) => [...row].map((cell) => cell === '_'));
}

describe('CrosswordSolver module', () => {
  it('returns placements in slot order together with the letter grid', () => {
    const module = createCrosswordSolverModule({ searchStrategy: 'explicit-stack' });
    const crossword = module.fill({
      structure: toStructure(['___', '#_#', '#_#']),
      vocabulary: ['CAT', 'ART', 'TAR'],
    });

    expect(module.moduleName).toBe('CrosswordSolver');
    expect(crossword.placements).toEqual([
      {
        slot: { row: 0, col: 0, length: 3, direction: 'across' },
        slotKey: 'across:0:0:3',
        word: 'CAT',
      },
      {
        slot: { row: 0, col: 1, length: 3, direction: 'down' },
        slotKey: 'down:0:1:3',
        word: 'ART',
      },
    ]);
    expect(crossword.letterGrid).toEqual([
      ['C', 'A', 'T'],
      [null, 'R', null],
      [null, 'T', null],
    ]);
    expect(crossword.stats.nodesVisited).toBe(2);
  });

  it('applies the configured minimum slot length', () => {
    const module = createCrosswordSolverModule({ minSlotLength: 3 });
    const crossword = module.fill({
      structure: [[true, true]],
      vocabulary: [],
    });

    expect(crossword.geometry.slots).toEqual([]);
    expect(crossword.assignment.size).toBe(0);
    expect(crossword.letterGrid).toEqual([[null, null]]);
  });

  it('uses fresh domains for every fill', () => {
    const module = createCrosswordSolverModule();
    const structure = toStructure(['___', '#_#', '#_#']);

    expect(() => module.fill({ structure, vocabulary: ['CAT', 'DOG'] })).toThrow(NoSolutionError);
    expect(module.fill({ structure, vocabulary: ['CAT', 'ART', 'TAR'] }).placements).toHaveLength(2);
  });

  it('fills slots by character count for words outside the basic plane', () => {
    const module = createCrosswordSolverModule();
    const structure: CellStructure = [[true, true]];

    expect(() => module.fill({ structure, vocabulary: ['\u{1F600}'] })).toThrow(NoSolutionError);

    const crossword = module.fill({ structure, vocabulary: ['\u{1F600}', '\u{1F600}\u{1F601}'] });

    expect(crossword.placements).toEqual([
      {
        slot: { row: 0, col: 0, length: 2, direction: 'across' },
        slotKey: 'across:0:0:2',
        word: '\u{1F600}\u{1F601}',
      },
    ]);
    expect(crossword.letterGrid).toEqual([['\u{1F600}', '\u{1F601}']]);
  });
});
