import { DEFAULT_SOLVER_SETTINGS, type SearchStrategy } from '../../config/solver-settings';
import { MODULE_IDS } from '../../shared/module-ids';
import type { ArcRevision } from '../ArcConsistency';
import { initializeDomainStore } from '../DomainStore';
import { buildLetterGrid, type LetterGrid } from '../LetterGrid';
import {
  createPuzzleGeometry,
  toSlotKey,
  type CellStructure,
  type PuzzleGeometry,
  type Slot,
  type SlotKey,
} from '../PuzzleGeometry';
import { solve, type Assignment, type SolveStats } from '../Solver';

export interface CrosswordSolverOptions {
  readonly searchStrategy?: SearchStrategy;
  readonly minSlotLength?: number;
}

export interface FillRequest {
  readonly structure: CellStructure;
  readonly vocabulary: Iterable<string>;
  readonly onRevision?: (revision: ArcRevision) => void;
}

export interface SlotPlacement {
  readonly slot: Slot;
  readonly slotKey: SlotKey;
  readonly word: string;
}

export interface FilledCrossword {
  readonly geometry: PuzzleGeometry;
  readonly assignment: Assignment;
  readonly placements: readonly SlotPlacement[];
  readonly letterGrid: LetterGrid;
  readonly stats: SolveStats;
}

export interface CrosswordSolverModule {
  readonly moduleName: typeof MODULE_IDS.crosswordSolver;
  fill: (request: FillRequest) => FilledCrossword;
}

function listPlacements(geometry: PuzzleGeometry, assignment: Assignment): readonly SlotPlacement[] {
  const placements: SlotPlacement[] = [];

  for (const slot of geometry.slots) {
    const slotKey = toSlotKey(slot);
    const word = assignment.get(slotKey);
    if (word !== undefined) {
      placements.push({ slot, slotKey, word });
    }
  }

  return placements;
}

export function createCrosswordSolverModule(
  options: CrosswordSolverOptions = {},
): CrosswordSolverModule {
  const searchStrategy = options.searchStrategy ?? DEFAULT_SOLVER_SETTINGS.searchStrategy;
  const minSlotLength = options.minSlotLength ?? DEFAULT_SOLVER_SETTINGS.minSlotLength;

  return {
    moduleName: MODULE_IDS.crosswordSolver,
    fill: (request) => {
      const geometry = createPuzzleGeometry(request.structure, { minSlotLength });
      const store = initializeDomainStore(geometry, request.vocabulary);
      const { assignment, stats } = solve(store, geometry, {
        searchStrategy,
        onRevision: request.onRevision,
      });

      return {
        geometry,
        assignment,
        placements: listPlacements(geometry, assignment),
        letterGrid: buildLetterGrid(geometry, assignment),
        stats,
      };
    },
  };
}
