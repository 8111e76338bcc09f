import { splitLetters } from '../data-contract';
import { getSlotCells, type PuzzleGeometry } from '../PuzzleGeometry';
import type { Assignment } from '../Solver';

export type LetterGrid = readonly (readonly (string | null)[])[];

/**
 * Lays assigned words onto a height x width matrix. Cells without a letter, and
 * cells outside the puzzle, hold null; `geometry.cells` tells the two apart.
 */
export function buildLetterGrid(geometry: PuzzleGeometry, assignment: Assignment): LetterGrid {
  const letters: (string | null)[][] = Array.from({ length: geometry.height }, () =>
    Array.from({ length: geometry.width }, () => null),
  );

  for (const [key, word] of assignment) {
    const slot = geometry.getSlot(key);
    if (!slot) {
      continue;
    }

    const wordLetters = splitLetters(word);

    for (const [index, cell] of getSlotCells(slot).entries()) {
      const row = letters[cell.row];
      const letter = wordLetters[index];

      if (row && letter !== undefined) {
        row[cell.col] = letter;
      }
    }
  }

  return letters;
}
