import { SimulationError, ErrorCode } from '../core/errors';
import { assertDoorIndex } from './doors';
import { DOORS, type DoorIndex, type Strategy } from './types';

/**
 * The contestant's final door.
 *
 * Staying keeps the first pick; switching moves to the one door that is
 * neither opened nor picked.
 *
 * @param stay - `true` or `'stay'` to keep the pick, `false` or `'switch'` to change
 */
export function changeDoor(
  stay: boolean | Strategy,
  openedDoor: DoorIndex,
  pick: DoorIndex
): DoorIndex {
  assertDoorIndex(openedDoor, 'openedDoor');
  assertDoorIndex(pick, 'pick');

  if (openedDoor === pick) {
    throw new SimulationError(ErrorCode.INVALID_INPUT, 'The host cannot open the picked door', {
      openedDoor,
      pick,
    });
  }

  const staying = typeof stay === 'boolean' ? stay : stay === 'stay';
  if (staying) {
    return pick;
  }

  const remaining = DOORS.filter((door) => door !== openedDoor && door !== pick);
  if (remaining.length !== 1) {
    throw new SimulationError(ErrorCode.IMPOSSIBLE_STATE, 'Expected exactly one door to switch to', {
      openedDoor,
      pick,
      remaining,
    });
  }
  return remaining[0];
}
