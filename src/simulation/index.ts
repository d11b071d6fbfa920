export {
  playNGames,
  validateGameCount,
  MontyHallSimulator,
  DEFAULT_GAMES,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_PROGRESS_INTERVAL,
} from './BatchRunner';
export type {
  BatchOptions,
  SimulatorConfig,
  RunOptions,
  AsyncRunOptions,
  SimulationRun,
} from './BatchRunner';
export {
  summarize,
  validateSummaryOptions,
  pairedComparison,
  wilsonInterval,
  round,
  DEFAULT_PRECISION,
  DEFAULT_CONFIDENCE,
} from './summary';
export type {
  SummaryRow,
  SummaryTable,
  SummaryOptions,
  ConfidenceInterval,
  PairedComparison,
} from './summary';
