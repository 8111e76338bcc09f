import { letterAt } from '../data-contract';
import type { DomainStore } from '../DomainStore';
import { toSlotKey, type PuzzleGeometry, type Slot } from '../PuzzleGeometry';
import type { Assignment } from './assignment';

interface ScoredWord {
  readonly word: string;
  readonly conflicts: number;
}

/**
 * Minimum remaining values, then highest degree. Remaining ties go to the slot
 * that comes first in geometry order.
 */
export function selectUnassignedSlot(
  assignment: Assignment,
  store: DomainStore,
  geometry: PuzzleGeometry,
): Slot | null {
  let best: Slot | null = null;
  let bestSize = Infinity;
  let bestDegree = -1;

  for (const slot of geometry.slots) {
    if (assignment.has(toSlotKey(slot))) {
      continue;
    }

    const size = store.getDomainSize(slot);
    const degree = geometry.getNeighbors(slot).length;

    if (size < bestSize || (size === bestSize && degree > bestDegree)) {
      best = slot;
      bestSize = size;
      bestDegree = degree;
    }
  }

  return best;
}

/**
 * Least-constraining value first. A word's score is how many words of the
 * unassigned neighbors' domains disagree with it at the shared cell.
 */
export function orderDomainValues(
  slot: Slot,
  assignment: Assignment,
  store: DomainStore,
  geometry: PuzzleGeometry,
): readonly string[] {
  const crossings = geometry
    .getNeighbors(slot)
    .filter((neighbor) => !assignment.has(toSlotKey(neighbor)))
    .flatMap((neighbor) => {
      const overlap = geometry.getOverlap(slot, neighbor);
      if (!overlap) {
        return [];
      }

      const neighborDomain = store.getDomain(neighbor);
      const agreeingByLetter = new Map<string, number>();
      for (const word of neighborDomain) {
        const letter = letterAt(word, overlap.secondIndex);
        if (letter !== null) {
          agreeingByLetter.set(letter, (agreeingByLetter.get(letter) ?? 0) + 1);
        }
      }

      return [
        {
          firstIndex: overlap.firstIndex,
          domainSize: neighborDomain.size,
          agreeingByLetter,
        },
      ];
    });

  const scored: ScoredWord[] = [...store.getDomain(slot)].map((word) => {
    let conflicts = 0;

    for (const crossing of crossings) {
      const letter = letterAt(word, crossing.firstIndex);
      const agreeing = letter === null ? 0 : (crossing.agreeingByLetter.get(letter) ?? 0);
      conflicts += crossing.domainSize - agreeing;
    }

    return { word, conflicts };
  });

  return scored.sort((first, second) => first.conflicts - second.conflicts).map(({ word }) => word);
}
