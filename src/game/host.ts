import { defaultRNG, type RandomSource } from '../core/math/random';
import { SimulationError, ErrorCode } from '../core/errors';
import { assertArrangement, assertDoorIndex, contentAt } from './doors';
import { DOORS, PRIZE, type Arrangement, type DoorIndex } from './types';

/**
 * The host opens a goat door that the contestant did not pick.
 *
 * When the contestant is already on the car, both other doors hide goats and
 * the host chooses between them at random. Otherwise exactly one door is
 * neither the car nor the pick, and the host must open it.
 */
export function openGoatDoor(
  game: Arrangement,
  pick: DoorIndex,
  rng: RandomSource = defaultRNG
): DoorIndex {
  assertArrangement(game);
  assertDoorIndex(pick, 'pick');

  if (contentAt(game, pick) === PRIZE) {
    const goatDoors = DOORS.filter((door) => contentAt(game, door) !== PRIZE);
    if (goatDoors.length !== 2) {
      throw new SimulationError(ErrorCode.IMPOSSIBLE_STATE, 'Expected two goat doors', {
        game,
        pick,
        goatDoors,
      });
    }
    return rng.pick(goatDoors);
  }

  const candidates = DOORS.filter((door) => door !== pick && contentAt(game, door) !== PRIZE);
  if (candidates.length !== 1) {
    throw new SimulationError(ErrorCode.IMPOSSIBLE_STATE, 'Expected exactly one door for the host to open', {
      game,
      pick,
      candidates,
    });
  }
  return candidates[0];
}
