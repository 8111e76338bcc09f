import type { ApplicationEvent, ApplicationEventBus } from '../../application';
import { MODULE_IDS } from '../../shared/module-ids';

export interface TelemetryModuleOptions {
  readonly bufferLimit: number;
}

export interface TelemetryModule {
  readonly moduleName: typeof MODULE_IDS.telemetry;
  start: () => void;
  stop: () => void;
  clear: () => void;
  getBufferedEvents: () => readonly ApplicationEvent[];
  getEventsByCorrelationId: (correlationId: string) => readonly ApplicationEvent[];
  getDroppedEventCount: () => number;
}

/**
 * Buffers application events in arrival order. Once `bufferLimit` is reached the
 * oldest event is dropped for every new one.
 */
export function createTelemetryModule(
  eventBus: ApplicationEventBus,
  options: TelemetryModuleOptions,
): TelemetryModule {
  const bufferedEvents: ApplicationEvent[] = [];
  let droppedEventCount = 0;
  let unsubscribe: (() => void) | null = null;

  const record = (event: ApplicationEvent): void => {
    bufferedEvents.push(event);

    while (bufferedEvents.length > options.bufferLimit) {
      bufferedEvents.shift();
      droppedEventCount += 1;
    }
  };

  return {
    moduleName: MODULE_IDS.telemetry,
    start: () => {
      if (!unsubscribe) {
        unsubscribe = eventBus.subscribe(record);
      }
    },
    stop: () => {
      if (unsubscribe) {
        unsubscribe();
        unsubscribe = null;
      }
    },
    clear: () => {
      bufferedEvents.length = 0;
      droppedEventCount = 0;
    },
    getBufferedEvents: () => [...bufferedEvents],
    getEventsByCorrelationId: (correlationId) =>
      bufferedEvents.filter((event) => event.correlationId === correlationId),
    getDroppedEventCount: () => droppedEventCount,
  };
}
