import type { SearchStrategy } from '../../config/solver-settings';
import type { DomainStore } from '../DomainStore';
import type { PuzzleGeometry, Slot } from '../PuzzleGeometry';
import {
  extendAssignment,
  isAssignmentComplete,
  isConsistent,
  type Assignment,
} from './assignment';
import { orderDomainValues, selectUnassignedSlot } from './heuristics';

export interface SearchStats {
  readonly nodesVisited: number;
  readonly backtracks: number;
}

export interface SearchOutcome {
  readonly assignment: Assignment | null;
  readonly stats: SearchStats;
}

interface MutableSearchStats {
  nodesVisited: number;
  backtracks: number;
}

interface SearchFrame {
  readonly assignment: Assignment;
  readonly slot: Slot | null;
  readonly candidates: readonly string[];
  nextIndex: number;
}

function searchRecursively(
  store: DomainStore,
  geometry: PuzzleGeometry,
  initial: Assignment,
  stats: MutableSearchStats,
): Assignment | null {
  const backtrack = (assignment: Assignment): Assignment | null => {
    if (isAssignmentComplete(assignment, geometry)) {
      return assignment;
    }

    const slot = selectUnassignedSlot(assignment, store, geometry);
    if (slot) {
      for (const word of orderDomainValues(slot, assignment, store, geometry)) {
        const candidate = extendAssignment(assignment, slot, word);
        stats.nodesVisited += 1;

        if (!isConsistent(candidate, geometry)) {
          continue;
        }

        const result = backtrack(candidate);
        if (result) {
          return result;
        }
      }
    }

    stats.backtracks += 1;
    return null;
  };

  return backtrack(initial);
}

function searchWithExplicitStack(
  store: DomainStore,
  geometry: PuzzleGeometry,
  initial: Assignment,
  stats: MutableSearchStats,
): Assignment | null {
  if (isAssignmentComplete(initial, geometry)) {
    return initial;
  }

  const openFrame = (assignment: Assignment): SearchFrame => {
    const slot = selectUnassignedSlot(assignment, store, geometry);
    return {
      assignment,
      slot,
      candidates: slot ? orderDomainValues(slot, assignment, store, geometry) : [],
      nextIndex: 0,
    };
  };

  const stack: SearchFrame[] = [openFrame(initial)];

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (!frame) {
      break;
    }

    const word = frame.candidates[frame.nextIndex];
    if (!frame.slot || word === undefined) {
      stack.pop();
      stats.backtracks += 1;
      continue;
    }

    frame.nextIndex += 1;
    const candidate = extendAssignment(frame.assignment, frame.slot, word);
    stats.nodesVisited += 1;

    if (!isConsistent(candidate, geometry)) {
      continue;
    }

    if (isAssignmentComplete(candidate, geometry)) {
      return candidate;
    }

    stack.push(openFrame(candidate));
  }

  return null;
}

/**
 * Depth-first search over partial assignments. Domains are read but never
 * narrowed per branch. Both strategies explore branches in the same order.
 */
export function backtrackSearch(
  store: DomainStore,
  geometry: PuzzleGeometry,
  strategy: SearchStrategy,
  initial: Assignment = new Map(),
): SearchOutcome {
  const stats: MutableSearchStats = { nodesVisited: 0, backtracks: 0 };
  const assignment =
    strategy === 'explicit-stack'
      ? searchWithExplicitStack(store, geometry, initial, stats)
      : searchRecursively(store, geometry, initial, stats);

  return {
    assignment,
    stats: { nodesVisited: stats.nodesVisited, backtracks: stats.backtracks },
  };
}
