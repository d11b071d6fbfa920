/**
 * Monty Hall simulator
 *
 * Plays the three-door game once or many times and tabulates how often
 * staying and switching win.
 */

// Error handling
export { SimulationError, ErrorCode, isSimulationError, wrapError } from './core/errors';

// Random number generation
export { RNG, defaultRNG } from './core/math/random';
export type { RandomSource } from './core/math/random';

// Game components
export * from './game';

// Batch runs and summaries
export * from './simulation';

// Presentation
export {
  formatOutput,
  formatSummaryTable,
  formatJson,
  printSummary,
  isOutputFormat,
  OUTPUT_FORMATS,
} from './output';
export type { OutputFormat, TableOptions } from './output';

// Version
export const VERSION = '0.1.0';
