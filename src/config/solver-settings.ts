import { isRecordLike, parseOneOf, parsePositiveSafeInteger } from '../shared/runtime-guards';

export const SEARCH_STRATEGIES = ['recursive', 'explicit-stack'] as const;

export type SearchStrategy = (typeof SEARCH_STRATEGIES)[number];

export interface SolverSettings {
  readonly searchStrategy: SearchStrategy;
  readonly minSlotLength: number;
  readonly telemetryBufferLimit: number;
}

export const DEFAULT_SOLVER_SETTINGS: SolverSettings = Object.freeze({
  searchStrategy: 'recursive',
  minSlotLength: 2,
  telemetryBufferLimit: 500,
});

export class SolverSettingsError extends Error {
  readonly code: string;
  readonly context: Readonly<Record<string, unknown>>;

  constructor(code: string, message: string, context: Readonly<Record<string, unknown>> = {}) {
    super(`[solver-settings] ${message}`);
    this.name = 'SolverSettingsError';
    this.code = code;
    this.context = context;
  }
}

function resolvePositiveInteger(
  overrides: Readonly<Record<string, unknown>>,
  key: 'minSlotLength' | 'telemetryBufferLimit',
  code: string,
): number {
  const rawValue = overrides[key];
  if (rawValue === undefined) {
    return DEFAULT_SOLVER_SETTINGS[key];
  }

  const parsed = parsePositiveSafeInteger(rawValue);
  if (parsed === null) {
    throw new SolverSettingsError(code, `${key} must be a positive integer.`, {
      [key]: rawValue,
    });
  }

  return parsed;
}

/**
 * Merges untrusted overrides (for example a parsed JSON object) over the defaults.
 * Unknown keys are ignored.
 */
export function resolveSolverSettings(overrides: unknown = {}): SolverSettings {
  if (overrides === undefined || overrides === null) {
    return DEFAULT_SOLVER_SETTINGS;
  }

  if (!isRecordLike(overrides)) {
    throw new SolverSettingsError(
      'solver-settings.invalid-overrides',
      'Solver settings overrides must be a plain object.',
      { overrides },
    );
  }

  let searchStrategy = DEFAULT_SOLVER_SETTINGS.searchStrategy;
  if (overrides.searchStrategy !== undefined) {
    const parsedStrategy = parseOneOf(overrides.searchStrategy, SEARCH_STRATEGIES);
    if (parsedStrategy === null) {
      throw new SolverSettingsError(
        'solver-settings.invalid-search-strategy',
        `searchStrategy must be one of: ${SEARCH_STRATEGIES.join(', ')}.`,
        { searchStrategy: overrides.searchStrategy },
      );
    }

    searchStrategy = parsedStrategy;
  }

  return Object.freeze({
    searchStrategy,
    minSlotLength: resolvePositiveInteger(
      overrides,
      'minSlotLength',
      'solver-settings.invalid-min-slot-length',
    ),
    telemetryBufferLimit: resolvePositiveInteger(
      overrides,
      'telemetryBufferLimit',
      'solver-settings.invalid-telemetry-buffer-limit',
    ),
  });
}
