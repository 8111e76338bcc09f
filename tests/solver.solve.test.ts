import { describe, expect, it } from 'vitest';

import { SEARCH_STRATEGIES } from '../src/config/solver-settings';
import { initializeDomainStore } from '../src/domain/DomainStore';
import {
  createPuzzleGeometry,
  toSlotKey,
  type CellStructure,
  type PuzzleGeometry,
  type SlotKey,
} from '../src/domain/PuzzleGeometry';
import {
  isConsistent,
  NoSolutionError,
  solve,
  type Assignment,
  type SolveOptions,
} from '../src/domain/Solver';

function toStructure(rows: readonly string[]): CellStructure {
  return rows.map((row) => [...row].map((cell) => cell === '_'));
}

function solveFresh(
  geometry: PuzzleGeometry,
  words: readonly string[],
  options: SolveOptions = {},
) {
  return solve(initializeDomainStore(geometry, words), geometry, options);
}

function captureNoSolution(action: () => unknown): NoSolutionError {
  try {
    action();
  } catch (error: unknown) {
    if (error instanceof NoSolutionError) {
      return error;
    }

    throw error;
  }

  throw new Error('expected NoSolutionError');
}

function findAnySolution(geometry: PuzzleGeometry, words: readonly string[]): Assignment | null {
  const tryFrom = (index: number, assignment: Map<SlotKey, string>): Assignment | null => {
    const slot = geometry.slots[index];
    if (!slot) {
      return isConsistent(assignment, geometry) ? new Map(assignment) : null;
    }

    for (const word of words) {
      assignment.set(toSlotKey(slot), word);
      const found = tryFrom(index + 1, assignment);
      if (found) {
        return found;
      }
    }

    assignment.delete(toSlotKey(slot));
    return null;
  };

  return tryFrom(0, new Map());
}

const crossing = createPuzzleGeometry(toStructure(['___', '#_#', '#_#']));
const ring = createPuzzleGeometry(toStructure(['___', '_#_', '___']));
const ringWords = ['CAB', 'CUP', 'BUS', 'PUS', 'DOG', 'EAR', 'CAT', 'BAT'];

describe('solve', () => {
  it('fills a single slot with either candidate', () => {
    const single = createPuzzleGeometry(toStructure(['___']));
    const { assignment } = solveFresh(single, ['cat', 'dog']);

    expect(assignment.size).toBe(1);
    expect(['cat', 'dog']).toContain(assignment.get('across:0:0:3'));
  });

  it('fills two crossing slots with agreeing words', () => {
    const { assignment, stats } = solveFresh(crossing, ['CAT', 'ART', 'TAR']);

    expect(Object.fromEntries(assignment)).toEqual({
      'down:0:1:3': 'ART',
      'across:0:0:3': 'CAT',
    });
    expect(stats).toEqual({
      removedByNodeConsistency: 0,
      removedByArcConsistency: 3,
      revisions: 2,
      nodesVisited: 2,
      backtracks: 0,
    });
  });

  it('reports an arc-consistency failure when no words agree at the crossing', () => {
    const error = captureNoSolution(() => solveFresh(crossing, ['CAT', 'DOG']));

    expect(error.code).toBe('solver.no-solution');
    expect(error.reason).toBe('arc-consistency');
    expect(error.message).toBe('[solver] Arc consistency emptied a slot domain.');
  });

  it('never places one word in two slots', () => {
    const parallel = createPuzzleGeometry(toStructure(['___', '###', '___']));
    const error = captureNoSolution(() => solveFresh(parallel, ['CAT', 'DOGS']));

    expect(error.reason).toBe('search-exhausted');
    expect(error.context).toEqual({
      removedByNodeConsistency: 2,
      removedByArcConsistency: 0,
      revisions: 0,
      nodesVisited: 2,
      backtracks: 2,
    });
  });

  it('treats a slot without candidates of its length as unsolvable', () => {
    const single = createPuzzleGeometry(toStructure(['____']));

    expect(captureNoSolution(() => solveFresh(single, ['CAT'])).reason).toBe('arc-consistency');
  });

  it('returns an empty assignment when the structure has no slots', () => {
    const blank = createPuzzleGeometry(toStructure(['#_#']));
    const { assignment, stats } = solveFresh(blank, ['CAT']);

    expect(assignment.size).toBe(0);
    expect(stats.nodesVisited).toBe(0);
  });

  it.each(SEARCH_STRATEGIES)('returns a complete consistent fill with the %s strategy', (strategy) => {
    const { assignment } = solveFresh(ring, ringWords, { searchStrategy: strategy });

    expect(assignment.size).toBe(ring.slots.length);
    expect(isConsistent(assignment, ring)).toBe(true);
    expect([
      ['CAB', 'CUP', 'BUS', 'PUS'],
      ['CUP', 'CAB', 'PUS', 'BUS'],
    ]).toContainEqual(ring.slots.map((slot) => assignment.get(toSlotKey(slot))));
  });

  it('explores branches in the same order with both strategies', () => {
    const recursive = solveFresh(ring, ringWords, { searchStrategy: 'recursive' });
    const explicitStack = solveFresh(ring, ringWords, { searchStrategy: 'explicit-stack' });

    expect(Object.fromEntries(explicitStack.assignment)).toEqual(
      Object.fromEntries(recursive.assignment),
    );
    expect(explicitStack.stats).toEqual(recursive.stats);
  });

  it('gives the same answer on repeated runs', () => {
    const first = solveFresh(ring, ringWords);
    const second = solveFresh(ring, ringWords);

    expect(Object.fromEntries(second.assignment)).toEqual(Object.fromEntries(first.assignment));
  });

  it('only fails when no complete fill exists', () => {
    const withoutPus = ringWords.filter((word) => word !== 'PUS');

    expect(findAnySolution(ring, ringWords)).not.toBeNull();
    expect(findAnySolution(ring, withoutPus)).toBeNull();
    expect(() => solveFresh(ring, withoutPus)).toThrow(NoSolutionError);
  });

  it('forwards each domain revision to the observer', () => {
    let observed = 0;
    const { stats } = solveFresh(crossing, ['CAT', 'ART', 'TAR'], {
      onRevision: () => {
        observed += 1;
      },
    });

    expect(observed).toBe(stats.revisions);
    expect(observed).toBe(2);
  });
});
