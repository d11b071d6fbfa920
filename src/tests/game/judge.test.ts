import { describe, it, expect } from 'vitest';
import { determineWinner } from '../../game/judge';
import type { Arrangement, DoorIndex } from '../../game/types';
import { ErrorCode } from '../../core/errors';
import { expectSimulationError } from '../utilities/assertions';

describe('determineWinner', () => {
  const game: Arrangement = ['goat', 'car', 'goat'];

  it('should return WIN only for the car door', () => {
    expect(determineWinner(1, game)).toBe('LOSE');
    expect(determineWinner(2, game)).toBe('WIN');
    expect(determineWinner(3, game)).toBe('LOSE');
  });

  it('should give the same answer on repeated calls', () => {
    const first = determineWinner(2, game);
    for (let i = 0; i < 10; i++) {
      expect(determineWinner(2, game)).toBe(first);
    }
  });

  it('should reject an out-of-range door', () => {
    const zero: number = 0;
    expectSimulationError(() => determineWinner(zero as DoorIndex, game), ErrorCode.INVALID_INPUT);
  });

  it('should reject a game with two cars', () => {
    expectSimulationError(() => determineWinner(1, ['car', 'car', 'goat']), ErrorCode.INVALID_INPUT);
  });
});
