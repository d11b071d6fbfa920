// Round setup: hide the car, then let the contestant pick a door
import { defaultRNG, type RandomSource } from '../core/math/random';
import { assertArrangement } from './doors';
import { DOORS, NON_PRIZE, PRIZE, type Arrangement, type DoorContent, type DoorIndex } from './types';

const DOOR_CONTENTS: readonly DoorContent[] = [NON_PRIZE, NON_PRIZE, PRIZE];

/**
 * New game with two goats and one car behind doors 1..3.
 * Each of the three car positions is equally likely.
 *
 * @example
 * ```typescript
 * const game = createGame(new RNG(7));
 * // e.g. ['goat', 'car', 'goat']
 * ```
 */
export function createGame(rng: RandomSource = defaultRNG): Arrangement {
  const [first, second, third] = rng.shuffle(DOOR_CONTENTS);
  const game: Arrangement = [first, second, third];
  assertArrangement(game);
  return Object.freeze(game);
}

/**
 * The contestant's first pick, uniform over doors 1..3
 */
export function selectDoor(rng: RandomSource = defaultRNG): DoorIndex {
  return rng.pick(DOORS);
}
