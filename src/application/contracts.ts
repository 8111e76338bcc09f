import type { SolverSettings } from '../config/solver-settings';
import type { FilledCrossword } from '../domain/CrosswordSolver';
import type { CellStructure } from '../domain/PuzzleGeometry';
import type { NoSolutionReason, SolveStats } from '../domain/Solver';
import type { VocabularyStats } from '../domain/Vocabulary';

export interface ApplicationError {
  readonly code: string;
  readonly message: string;
  readonly retryable: boolean;
  readonly context: Readonly<Record<string, unknown>>;
}

export interface ApplicationOkResult<TValue> {
  readonly type: 'ok';
  readonly value: TValue;
}

export interface ApplicationDomainErrorResult {
  readonly type: 'domainError';
  readonly error: ApplicationError;
}

export interface ApplicationInfraErrorResult {
  readonly type: 'infraError';
  readonly error: ApplicationError;
}

export type ApplicationResult<TValue> =
  | ApplicationOkResult<TValue>
  | ApplicationDomainErrorResult
  | ApplicationInfraErrorResult;

export interface FillCrosswordRequest {
  readonly structure: CellStructure;
  readonly words: Iterable<string>;
  readonly correlationId?: string | null;
}

export interface FillCrosswordOutcome {
  readonly correlationId: string;
  readonly vocabularyStats: VocabularyStats;
  readonly crossword: FilledCrossword;
}

export interface EventEnvelope<TEventType extends string, TPayload> {
  readonly eventId: string;
  readonly eventType: TEventType;
  readonly eventVersion: number;
  readonly occurredAt: number;
  readonly correlationId: string;
  readonly payload: TPayload;
}

export type SolveRequestedEvent = EventEnvelope<
  'solver/solve-requested',
  {
    readonly height: number;
    readonly width: number;
    readonly searchStrategy: SolverSettings['searchStrategy'];
  }
>;

export type VocabularyNormalizedEvent = EventEnvelope<
  'solver/vocabulary-normalized',
  { readonly stats: VocabularyStats }
>;

export type DomainRevisedEvent = EventEnvelope<
  'solver/domain-revised',
  {
    readonly slotKey: string;
    readonly againstSlotKey: string;
    readonly removedCount: number;
  }
>;

export type SolveSucceededEvent = EventEnvelope<
  'solver/solve-succeeded',
  {
    readonly slotCount: number;
    readonly stats: SolveStats;
  }
>;

export type SolveFailedEvent = EventEnvelope<
  'solver/solve-failed',
  {
    readonly code: string;
    readonly reason: NoSolutionReason | null;
    readonly message: string;
  }
>;

export type ApplicationEvent =
  | SolveRequestedEvent
  | VocabularyNormalizedEvent
  | DomainRevisedEvent
  | SolveSucceededEvent
  | SolveFailedEvent;

export type ApplicationEventListener = (event: ApplicationEvent) => void;

export interface ApplicationEventBus {
  publish: (event: ApplicationEvent) => void;
  subscribe: (listener: ApplicationEventListener) => () => void;
}

export interface CrosswordApplication {
  readonly settings: SolverSettings;
  readonly events: ApplicationEventBus;
  fillCrossword: (request: FillCrosswordRequest) => ApplicationResult<FillCrosswordOutcome>;
}
