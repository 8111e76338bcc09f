import { DEFAULT_SOLVER_SETTINGS, type SearchStrategy } from '../../config/solver-settings';
import { ac3, type ArcRevision } from '../ArcConsistency';
import { enforceNodeConsistency, type DomainStore } from '../DomainStore';
import type { PuzzleGeometry } from '../PuzzleGeometry';
import type { Assignment } from './assignment';
import { backtrackSearch } from './search';

export {
  createEmptyAssignment,
  extendAssignment,
  isAssignmentComplete,
  isConsistent,
  type Assignment,
} from './assignment';
export { orderDomainValues, selectUnassignedSlot } from './heuristics';
export { backtrackSearch, type SearchOutcome, type SearchStats } from './search';

export type NoSolutionReason = 'arc-consistency' | 'search-exhausted';

export interface SolveOptions {
  readonly searchStrategy?: SearchStrategy;
  readonly onRevision?: (revision: ArcRevision) => void;
}

export interface SolveStats {
  readonly removedByNodeConsistency: number;
  readonly removedByArcConsistency: number;
  readonly revisions: number;
  readonly nodesVisited: number;
  readonly backtracks: number;
}

export interface SolveResult {
  readonly assignment: Assignment;
  readonly stats: SolveStats;
}

export class NoSolutionError extends Error {
  readonly code = 'solver.no-solution';
  readonly retryable: false;
  readonly reason: NoSolutionReason;
  readonly context: Readonly<Record<string, unknown>>;

  constructor(
    reason: NoSolutionReason,
    message: string,
    context: Readonly<Record<string, unknown>> = {},
  ) {
    super(`[solver] ${message}`);
    this.name = 'NoSolutionError';
    this.retryable = false;
    this.reason = reason;
    this.context = context;
  }
}

/**
 * Node consistency, then AC-3, then backtracking search. Mutates `store` during
 * the consistency phase only.
 */
export function solve(
  store: DomainStore,
  geometry: PuzzleGeometry,
  options: SolveOptions = {},
): SolveResult {
  const initialSize = store.getTotalSize();
  enforceNodeConsistency(store, geometry);
  const nodeConsistentSize = store.getTotalSize();

  let revisions = 0;
  const isArcConsistent = ac3(store, geometry, null, {
    onRevision: (revision) => {
      revisions += 1;
      options.onRevision?.(revision);
    },
  });

  const removedByNodeConsistency = initialSize - nodeConsistentSize;
  const removedByArcConsistency = nodeConsistentSize - store.getTotalSize();

  if (!isArcConsistent) {
    throw new NoSolutionError('arc-consistency', 'Arc consistency emptied a slot domain.', {
      removedByNodeConsistency,
      removedByArcConsistency,
      revisions,
    });
  }

  const searchStrategy = options.searchStrategy ?? DEFAULT_SOLVER_SETTINGS.searchStrategy;
  const { assignment, stats } = backtrackSearch(store, geometry, searchStrategy);

  if (!assignment) {
    throw new NoSolutionError('search-exhausted', 'Search exhausted every branch.', {
      removedByNodeConsistency,
      removedByArcConsistency,
      revisions,
      nodesVisited: stats.nodesVisited,
      backtracks: stats.backtracks,
    });
  }

  return {
    assignment,
    stats: {
      removedByNodeConsistency,
      removedByArcConsistency,
      revisions,
      nodesVisited: stats.nodesVisited,
      backtracks: stats.backtracks,
    },
  };
}
