// src/core/math/random.ts
/**
 * Seedable random number generation for the simulator
 */

import { Random, MersenneTwister19937 } from 'random-js';
import { SimulationError, ErrorCode } from '../errors';

/**
 * The slice of a random generator the game components draw from.
 * RNG implements it; tests can supply scripted sources.
 */
export interface RandomSource {
  /** Integer in range [min, max] inclusive */
  integer(min: number, max: number): number;
  /** One element chosen uniformly */
  pick<T>(items: readonly T[]): T;
  /** A shuffled copy */
  shuffle<T>(items: readonly T[]): T[];
}

const MAX_SEED = 0xffffffff;

function isUint32(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_SEED;
}

function checkSeed(seed: number): number {
  if (!isUint32(seed)) {
    throw new SimulationError(ErrorCode.INVALID_INPUT, 'Seed must be an integer from 0 to 4294967295', {
      seed,
    });
  }
  return seed;
}

/**
 * Seeded random number generator using Mersenne Twister
 */
export class RNG implements RandomSource {
  private random: Random;
  private engine: MersenneTwister19937;
  private seed: number;

  constructor(seed?: number) {
    // Draw a concrete seed when none is given so forked streams stay reproducible from it
    this.seed = seed !== undefined ? checkSeed(seed) : new Random(MersenneTwister19937.autoSeed()).uint32();
    this.engine = MersenneTwister19937.seed(this.seed);
    this.random = new Random(this.engine);
  }

  /**
   * Reset the RNG with a new seed
   */
  setSeed(seed: number): void {
    this.seed = checkSeed(seed);
    this.engine = MersenneTwister19937.seed(this.seed);
    this.random = new Random(this.engine);
  }

  getSeed(): number {
    return this.seed;
  }

  /**
   * Independent stream for a worker or shard.
   * The child's seed is the first draw of an engine seeded from
   * [seed, streamId], so the same pair always yields the same stream and
   * forks of a fork do not repeat their parent's siblings.
   */
  fork(streamId: number): RNG {
    if (!isUint32(streamId)) {
      throw new SimulationError(ErrorCode.INVALID_INPUT, 'Stream id must be an integer from 0 to 4294967295', {
        streamId,
      });
    }
    const childSeed = new Random(MersenneTwister19937.seedWithArray([this.seed, streamId])).uint32();
    return new RNG(childSeed);
  }

  /**
   * Uniform random in [0, 1)
   */
  uniform(): number {
    return this.random.real(0, 1, false);
  }

  integer(min: number, max: number): number {
    return this.random.integer(min, max);
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new SimulationError(ErrorCode.INVALID_INPUT, 'Cannot pick from an empty list');
    }
    return items[this.integer(0, items.length - 1)];
  }

  /**
   * Shuffled copy (Fisher-Yates)
   */
  shuffle<T>(items: readonly T[]): T[] {
    const result = [...items];
    for (let i = result.length - 1; i > 0; i--) {
      const j = this.integer(0, i);
      [result[i], result[j]] = [result[j], result[i]];
    }
    return result;
  }
}

// Default RNG instance (unseeded)
export const defaultRNG = new RNG();
