import { resolveSolverSettings } from '../config/solver-settings';
import { createCrosswordSolverModule } from '../domain/CrosswordSolver';
import { DomainStoreDomainError } from '../domain/DomainStore';
import { PuzzleGeometryDomainError, toSlotKey } from '../domain/PuzzleGeometry';
import { NoSolutionError } from '../domain/Solver';
import { createVocabulary } from '../domain/Vocabulary';
import { toErrorMessage } from '../shared/errors';
import type {
  ApplicationDomainErrorResult,
  ApplicationError,
  ApplicationEvent,
  ApplicationEventBus,
  ApplicationEventListener,
  ApplicationInfraErrorResult,
  ApplicationResult,
  CrosswordApplication,
  EventEnvelope,
  FillCrosswordOutcome,
  FillCrosswordRequest,
} from './contracts';

export type * from './contracts';

type EventType = ApplicationEvent['eventType'];
type EventPayload<TType extends EventType> = Extract<
  ApplicationEvent,
  { readonly eventType: TType }
>['payload'];

const EVENT_VERSIONS: Readonly<Record<EventType, number>> = {
  'solver/solve-requested': 1,
  'solver/vocabulary-normalized': 1,
  'solver/domain-revised': 1,
  'solver/solve-succeeded': 1,
  'solver/solve-failed': 1,
};

function createError(
  code: string,
  message: string,
  retryable: boolean,
  context: Readonly<Record<string, unknown>> = {},
): ApplicationError {
  return { code, message, retryable, context };
}

function ok<TValue>(value: TValue): ApplicationResult<TValue> {
  return { type: 'ok', value };
}

function domainError(
  code: string,
  message: string,
  context: Readonly<Record<string, unknown>> = {},
): ApplicationDomainErrorResult {
  return {
    type: 'domainError',
    error: createError(code, message, false, context),
  };
}

function infraError(
  code: string,
  message: string,
  context: Readonly<Record<string, unknown>> = {},
): ApplicationInfraErrorResult {
  return {
    type: 'infraError',
    error: createError(code, message, false, context),
  };
}

function toFailureResult(
  error: unknown,
): ApplicationDomainErrorResult | ApplicationInfraErrorResult {
  if (error instanceof NoSolutionError) {
    return domainError(error.code, error.message, { reason: error.reason, ...error.context });
  }

  if (error instanceof PuzzleGeometryDomainError || error instanceof DomainStoreDomainError) {
    return domainError(error.code, error.message, error.context);
  }

  return infraError('application.unexpected-failure', toErrorMessage(error));
}

/**
 * Wires settings, the solver module and the event bus. `fillCrossword` never throws
 * for puzzle-level failures; they come back as `domainError` results.
 */
export function createCrosswordApplication(settingsOverrides: unknown = {}): CrosswordApplication {
  const settings = resolveSolverSettings(settingsOverrides);
  const solverModule = createCrosswordSolverModule({
    searchStrategy: settings.searchStrategy,
    minSlotLength: settings.minSlotLength,
  });

  const eventListeners = new Set<ApplicationEventListener>();
  let eventSequence = 0;
  let correlationSequence = 0;

  const publish = (event: ApplicationEvent): void => {
    eventListeners.forEach((listener) => {
      listener(event);
    });
  };

  const eventBus: ApplicationEventBus = {
    publish,
    subscribe: (listener) => {
      eventListeners.add(listener);
      return () => {
        eventListeners.delete(listener);
      };
    },
  };

  const resolveCorrelationId = (correlationId: string | null | undefined): string => {
    if (typeof correlationId === 'string') {
      const normalizedCorrelationId = correlationId.trim();
      if (normalizedCorrelationId.length > 0) {
        return normalizedCorrelationId;
      }
    }

    correlationSequence += 1;
    return `fill-${Date.now()}-${correlationSequence}`;
  };

  const createEvent = <TType extends EventType>(
    eventType: TType,
    correlationId: string,
    payload: EventPayload<TType>,
    occurredAt: number = Date.now(),
  ): EventEnvelope<TType, EventPayload<TType>> => {
    eventSequence += 1;
    return {
      eventId: `evt-${occurredAt}-${eventSequence}`,
      eventType,
      eventVersion: EVENT_VERSIONS[eventType],
      occurredAt,
      correlationId,
      payload,
    };
  };

  const fillCrossword = (
    request: FillCrosswordRequest,
  ): ApplicationResult<FillCrosswordOutcome> => {
    const correlationId = resolveCorrelationId(request.correlationId);

    try {
      publish(
        createEvent('solver/solve-requested', correlationId, {
          height: request.structure.length,
          width: request.structure[0]?.length ?? 0,
          searchStrategy: settings.searchStrategy,
        }),
      );

      const vocabulary = createVocabulary(request.words);
      publish(
        createEvent('solver/vocabulary-normalized', correlationId, {
          stats: vocabulary.stats,
        }),
      );

      const crossword = solverModule.fill({
        structure: request.structure,
        vocabulary: vocabulary.words,
        onRevision: ({ arc, removedWords }) => {
          publish(
            createEvent('solver/domain-revised', correlationId, {
              slotKey: toSlotKey(arc.from),
              againstSlotKey: toSlotKey(arc.to),
              removedCount: removedWords.length,
            }),
          );
        },
      });

      publish(
        createEvent('solver/solve-succeeded', correlationId, {
          slotCount: crossword.geometry.slots.length,
          stats: crossword.stats,
        }),
      );

      return ok({
        correlationId,
        vocabularyStats: vocabulary.stats,
        crossword,
      });
    } catch (error: unknown) {
      const failure = toFailureResult(error);

      publish(
        createEvent('solver/solve-failed', correlationId, {
          code: failure.error.code,
          reason: error instanceof NoSolutionError ? error.reason : null,
          message: failure.error.message,
        }),
      );

      return failure;
    }
  };

  return {
    settings,
    events: eventBus,
    fillCrossword,
  };
}
