import { letterAt, wordLength } from '../data-contract';
import { toSlotKey, type PuzzleGeometry, type Slot, type SlotKey } from '../PuzzleGeometry';

export type Assignment = ReadonlyMap<SlotKey, string>;

export function createEmptyAssignment(): Assignment {
  return new Map();
}

/**
 * Copy-on-extend: the parent assignment is left untouched so sibling branches can
 * keep using it.
 */
export function extendAssignment(assignment: Assignment, slot: Slot, word: string): Assignment {
  const extended = new Map(assignment);
  extended.set(toSlotKey(slot), word);
  return extended;
}

export function isAssignmentComplete(assignment: Assignment, geometry: PuzzleGeometry): boolean {
  return assignment.size === geometry.slots.length;
}

export function isConsistent(assignment: Assignment, geometry: PuzzleGeometry): boolean {
  const entries: { readonly slot: Slot; readonly word: string }[] = [];

  for (const [key, word] of assignment) {
    const slot = geometry.getSlot(key);
    if (!slot || wordLength(word) !== slot.length) {
      return false;
    }

    entries.push({ slot, word });
  }

  for (let firstIndex = 0; firstIndex < entries.length; firstIndex += 1) {
    const first = entries[firstIndex];
    if (!first) {
      continue;
    }

    for (let secondIndex = firstIndex + 1; secondIndex < entries.length; secondIndex += 1) {
      const second = entries[secondIndex];
      if (!second) {
        continue;
      }

      if (first.word === second.word) {
        return false;
      }

      const overlap = geometry.getOverlap(first.slot, second.slot);
      if (
        overlap &&
        letterAt(first.word, overlap.firstIndex) !== letterAt(second.word, overlap.secondIndex)
      ) {
        return false;
      }
    }
  }

  return true;
}
