import { describe, it, expect } from 'vitest';
import { RNG } from '../../core/math/random';
import { ErrorCode, SimulationError } from '../../core/errors';
import { expectSimulationError } from '../utilities/assertions';

const draw = (rng: RNG, count: number) => Array.from({ length: count }, () => rng.integer(1, 1000));

describe('RNG', () => {
  it('should reproduce a sequence for the same seed', () => {
    expect(draw(new RNG(42), 20)).toEqual(draw(new RNG(42), 20));
  });

  it('should restart the sequence after setSeed', () => {
    const rng = new RNG(7);
    const first = draw(rng, 10);
    rng.setSeed(7);
    expect(draw(rng, 10)).toEqual(first);
    expect(rng.getSeed()).toBe(7);
  });

  it('should expose a concrete seed when auto-seeded', () => {
    const rng = new RNG();
    const replay = new RNG(rng.getSeed());
    expect(draw(rng, 10)).toEqual(draw(replay, 10));
  });

  it('should keep integers within inclusive bounds', () => {
    const rng = new RNG(1);
    const values = Array.from({ length: 500 }, () => rng.integer(1, 3));
    expect(new Set(values)).toEqual(new Set([1, 2, 3]));
  });

  it('should keep uniform draws in [0, 1)', () => {
    const rng = new RNG(3);
    for (let i = 0; i < 200; i++) {
      const u = rng.uniform();
      expect(u).toBeGreaterThanOrEqual(0);
      expect(u).toBeLessThan(1);
    }
  });

  it('should reject seeds outside the uint32 range', () => {
    expectSimulationError(() => new RNG(2 ** 32), ErrorCode.INVALID_INPUT);
    expectSimulationError(() => new RNG(-1), ErrorCode.INVALID_INPUT);
    const error = expectSimulationError(() => new RNG(1.5), ErrorCode.INVALID_INPUT);
    expect(error.message).toBe('Seed must be an integer from 0 to 4294967295');
    expect(error.context).toEqual({ seed: 1.5 });
  });

  it('should accept the largest uint32 seed', () => {
    expect(new RNG(2 ** 32 - 1).getSeed()).toBe(4294967295);
  });

  it('should reject an out-of-range seed in setSeed and keep the old one', () => {
    const rng = new RNG(7);
    expectSimulationError(() => rng.setSeed(2 ** 32), ErrorCode.INVALID_INPUT);
    expect(rng.getSeed()).toBe(7);
  });

  describe('shuffle', () => {
    it('should return a permutation without touching the input', () => {
      const input = ['goat', 'goat', 'car'] as const;
      const shuffled = new RNG(11).shuffle(input);

      expect([...shuffled].sort()).toEqual(['car', 'goat', 'goat']);
      expect(input).toEqual(['goat', 'goat', 'car']);
    });
  });

  describe('pick', () => {
    it('should throw on an empty list', () => {
      expect(() => new RNG(1).pick([])).toThrow(SimulationError);
    });
  });

  describe('fork', () => {
    it('should give reproducible streams per id', () => {
      const parent = new RNG(99);
      expect(draw(parent.fork(0), 10)).toEqual(draw(new RNG(99).fork(0), 10));
    });

    it('should give different streams for different ids', () => {
      const parent = new RNG(99);
      expect(draw(parent.fork(0), 10)).not.toEqual(draw(parent.fork(1), 10));
    });

    it('should not advance the parent stream', () => {
      const parent = new RNG(5);
      draw(parent.fork(3), 10);
      expect(draw(parent, 10)).toEqual(draw(new RNG(5), 10));
    });

    it('should reject ids that are not uint32', () => {
      const parent = new RNG(5);
      expectSimulationError(() => parent.fork(-1), ErrorCode.INVALID_INPUT);
      expectSimulationError(() => parent.fork(1.5), ErrorCode.INVALID_INPUT);
      expectSimulationError(() => parent.fork(2 ** 32), ErrorCode.INVALID_INPUT);
    });

    it('should give the child a seed of its own', () => {
      const child = new RNG(99).fork(0);
      expect(child.getSeed()).not.toBe(99);
      expect(child.getSeed()).toBe(new RNG(99).fork(0).getSeed());
    });

    it('should keep nested forks apart from sibling forks', () => {
      const parent = new RNG(99);
      const nested = parent.fork(0).fork(1);
      const sibling = parent.fork(1);

      expect(nested.getSeed()).not.toBe(sibling.getSeed());
      expect(draw(nested, 10)).not.toEqual(draw(sibling, 10));
    });
  });
});
