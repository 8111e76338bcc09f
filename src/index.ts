export {
  DEFAULT_SOLVER_SETTINGS,
  SEARCH_STRATEGIES,
  SolverSettingsError,
  resolveSolverSettings,
  type SearchStrategy,
  type SolverSettings,
} from './config/solver-settings';
export { createCrosswordApplication } from './application';
export type {
  ApplicationError,
  ApplicationEvent,
  ApplicationEventBus,
  ApplicationResult,
  CrosswordApplication,
  FillCrosswordOutcome,
  FillCrosswordRequest,
} from './application';
export { createTelemetryModule, type TelemetryModule } from './adapters/Telemetry';
export { ac3, createAllArcs, revise, type Arc, type ArcRevision } from './domain/ArcConsistency';
export {
  createCrosswordSolverModule,
  type CrosswordSolverModule,
  type FilledCrossword,
  type SlotPlacement,
} from './domain/CrosswordSolver';
export {
  DomainStoreDomainError,
  enforceNodeConsistency,
  initializeDomainStore,
  type DomainStore,
} from './domain/DomainStore';
export { buildLetterGrid, type LetterGrid } from './domain/LetterGrid';
export {
  createPuzzleGeometry,
  PuzzleGeometryDomainError,
  toSlotKey,
  type CellStructure,
  type PuzzleGeometry,
  type Slot,
  type SlotDirection,
  type SlotKey,
  type SlotOverlap,
} from './domain/PuzzleGeometry';
export {
  isConsistent,
  NoSolutionError,
  orderDomainValues,
  selectUnassignedSlot,
  solve,
  type Assignment,
  type NoSolutionReason,
  type SolveResult,
  type SolveStats,
} from './domain/Solver';
export { createVocabulary, type NormalizedVocabulary } from './domain/Vocabulary';
