// Door and arrangement checks shared by the game components
import { SimulationError, ErrorCode } from '../core/errors';
import { DOORS, PRIZE, type Arrangement, type DoorContent, type DoorIndex } from './types';

export function isDoorIndex(value: unknown): value is DoorIndex {
  return value === 1 || value === 2 || value === 3;
}

export function assertDoorIndex(value: unknown, name: string): asserts value is DoorIndex {
  if (!isDoorIndex(value)) {
    throw new SimulationError(ErrorCode.INVALID_INPUT, `${name} must be door 1, 2 or 3`, {
      [name]: value,
    });
  }
}

function isDoorContent(value: unknown): value is DoorContent {
  return value === 'car' || value === 'goat';
}

/**
 * Exactly three doors, each a car or a goat, with one car
 */
export function assertArrangement(game: readonly unknown[]): asserts game is Arrangement {
  if (game.length !== DOORS.length || !game.every(isDoorContent)) {
    throw new SimulationError(ErrorCode.INVALID_INPUT, 'Game must hold three doors of car or goat', {
      game,
    });
  }
  const cars = game.filter((content) => content === PRIZE).length;
  if (cars !== 1) {
    throw new SimulationError(ErrorCode.INVALID_INPUT, 'Game must hide exactly one car', {
      game,
      cars,
    });
  }
}

export function contentAt(game: Arrangement, door: DoorIndex): DoorContent {
  return game[door - 1];
}
