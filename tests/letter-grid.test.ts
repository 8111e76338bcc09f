import { describe, expect, it } from 'vitest';

import { buildLetterGrid } from '../src/domain/LetterGrid';
import {
  createPuzzleGeometry,
  type CellStructure,
  type SlotKey,
} from '../src/domain/PuzzleGeometry';

function toStructure(rows: readonly string[]): CellStructure {
  return rows.map((row) => [...row].map((cell) => cell === '_'));
}

describe('LetterGrid', () => {
  const crossing = createPuzzleGeometry(toStructure(['___', '#_#', '#_#']));

  it('lays assigned words onto the grid', () => {
    const grid = buildLetterGrid(
      crossing,
      new Map<SlotKey, string>([
        ['across:0:0:3', 'CAT'],
        ['down:0:1:3', 'ART'],
      ]),
    );

    expect(grid).toEqual([
      ['C', 'A', 'T'],
      [null, 'R', null],
      [null, 'T', null],
    ]);
  });

  it('leaves unassigned cells empty and ignores unknown slots', () => {
    const grid = buildLetterGrid(
      crossing,
      new Map<SlotKey, string>([
        ['down:0:1:3', 'ART'],
        ['across:5:5:3', 'XYZ'],
      ]),
    );

    expect(grid).toEqual([
      [null, 'A', null],
      [null, 'R', null],
      [null, 'T', null],
    ]);
  });

  it('puts one character per cell for words outside the basic plane', () => {
    const pair = createPuzzleGeometry([[true, true]]);
    const grid = buildLetterGrid(
      pair,
      new Map<SlotKey, string>([['across:0:0:2', '\u{1F600}\u{1F601}']]),
    );

    expect(grid).toEqual([['\u{1F600}', '\u{1F601}']]);
  });
});
