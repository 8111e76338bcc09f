export const MODULE_IDS = Object.freeze({
  crosswordSolver: 'CrosswordSolver',
  telemetry: 'Telemetry',
});
