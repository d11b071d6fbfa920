// src/simulation/BatchRunner.ts
import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { SimulationError, ErrorCode, wrapError } from '../core/errors';
import { RNG, defaultRNG, type RandomSource } from '../core/math/random';
import { playGame } from '../game/round';
import type { BatchResultSet } from '../game/types';
import {
  summarize,
  validateSummaryOptions,
  DEFAULT_CONFIDENCE,
  DEFAULT_PRECISION,
  type SummaryTable,
} from './summary';

export const DEFAULT_GAMES = 100;
export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_PROGRESS_INTERVAL = 100;

/**
 * Options for a batch of rounds
 */
export interface BatchOptions {
  /** Random source; takes precedence over `seed` */
  rng?: RandomSource;
  /** Seed for a fresh RNG when no `rng` is given */
  seed?: number;
  /** Checked between rounds */
  signal?: AbortSignal;
  /** Called with the completed fraction */
  onProgress?: (progress: number) => void;
  progressInterval?: number;
  /** Rounds already played elsewhere; added to the round number in error context */
  roundOffset?: number;
}

/**
 * Configuration for a MontyHallSimulator
 */
export interface SimulatorConfig {
  seed?: number;
  precision?: number;
  confidenceLevel?: number;
  verbose?: boolean;
  /** Receives verbose messages; defaults to console.log */
  log?: (message: string) => void;
}

export interface RunOptions {
  signal?: AbortSignal;
  onProgress?: (progress: number) => void;
}

export interface AsyncRunOptions extends RunOptions {
  chunkSize?: number;
}

/**
 * Raw rows plus their summary
 */
export interface SimulationRun {
  seed: number;
  results: BatchResultSet;
  summary: SummaryTable;
}

/**
 * A batch needs a positive whole number of rounds
 */
export function validateGameCount(n: number): void {
  if (!Number.isSafeInteger(n) || n <= 0) {
    throw new SimulationError(ErrorCode.INVALID_INPUT, 'Number of games must be a positive integer', {
      n,
    });
  }
}

function throwIfCancelled(signal: AbortSignal | undefined, completedRounds: number): void {
  if (signal?.aborted) {
    throw new SimulationError(ErrorCode.CANCELLED, 'Simulation cancelled', { completedRounds });
  }
}

/**
 * Play `n` rounds and collect a stay row and a switch row for each.
 *
 * Any failure inside a round aborts the whole batch; the error carries the
 * round number in its context.
 *
 * @example
 * ```typescript
 * const results = playNGames(10000, { seed: 42 });
 * const table = summarize(results);
 * ```
 */
export function playNGames(n: number = DEFAULT_GAMES, options: BatchOptions = {}): BatchResultSet {
  validateGameCount(n);

  const rng = options.rng ?? (options.seed !== undefined ? new RNG(options.seed) : defaultRNG);
  const interval = options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL;
  const offset = options.roundOffset ?? 0;
  const results: BatchResultSet = [];

  for (let round = 1; round <= n; round++) {
    throwIfCancelled(options.signal, round - 1);

    try {
      results.push(...playGame(rng));
    } catch (error) {
      throw wrapError(error, ErrorCode.INTERNAL_ERROR, { round: offset + round });
    }

    if (options.onProgress && (round % interval === 0 || round === n)) {
      options.onProgress(round / n);
    }
  }

  return results;
}

/**
 * Seeded simulator producing results and summaries together
 */
export class MontyHallSimulator {
  private rng: RNG;
  private readonly precision: number;
  private readonly confidenceLevel: number;

  constructor(config: SimulatorConfig = {}) {
    this.precision = config.precision ?? DEFAULT_PRECISION;
    this.confidenceLevel = config.confidenceLevel ?? DEFAULT_CONFIDENCE;
    validateSummaryOptions(this.precision, this.confidenceLevel);
    this.rng = new RNG(config.seed);
    if (config.verbose) {
      const log = config.log ?? console.log;
      log(`MontyHallSimulator initialized with seed: ${this.rng.getSeed()}`);
    }
  }

  get seed(): number {
    return this.rng.getSeed();
  }

  run(n: number = DEFAULT_GAMES, options: RunOptions = {}): SimulationRun {
    const results = playNGames(n, { ...options, rng: this.rng });
    return this.finish(results);
  }

  /**
   * Play in chunks, yielding to the event loop between them so a caller can
   * abort a long run.
   */
  async runAsync(n: number = DEFAULT_GAMES, options: AsyncRunOptions = {}): Promise<SimulationRun> {
    validateGameCount(n);
    const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    validateGameCount(chunkSize);

    const results: BatchResultSet = [];
    let completed = 0;

    while (completed < n) {
      const size = Math.min(chunkSize, n - completed);
      // A chunk runs synchronously, so an abort can only land between chunks
      throwIfCancelled(options.signal, completed);
      results.push(...playNGames(size, { rng: this.rng, roundOffset: completed }));
      completed += size;

      options.onProgress?.(completed / n);
      await yieldToEventLoop();
    }

    return this.finish(results);
  }

  /**
   * Split `n` rounds over `shards` independent random streams.
   *
   * Shard `i` draws from `fork(i)` of the simulator seed, so the same seed and
   * shard count always reproduce the same results. Earlier shards take the
   * remainder rounds; results are concatenated in shard order.
   */
  runSharded(n: number, shards: number): SimulationRun {
    validateGameCount(n);
    if (!Number.isSafeInteger(shards) || shards <= 0) {
      throw new SimulationError(ErrorCode.INVALID_INPUT, 'Shard count must be a positive integer', {
        shards,
      });
    }

    const base = Math.floor(n / shards);
    const remainder = n % shards;
    const results: BatchResultSet = [];
    let completed = 0;

    for (let shard = 0; shard < shards; shard++) {
      const size = base + (shard < remainder ? 1 : 0);
      if (size === 0) continue;
      results.push(...playNGames(size, { rng: this.rng.fork(shard), roundOffset: completed }));
      completed += size;
    }

    return this.finish(results);
  }

  private finish(results: BatchResultSet): SimulationRun {
    return {
      seed: this.seed,
      results,
      summary: summarize(results, {
        precision: this.precision,
        confidenceLevel: this.confidenceLevel,
      }),
    };
  }
}
