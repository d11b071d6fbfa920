import { assertArrangement, assertDoorIndex, contentAt } from './doors';
import { PRIZE, type Arrangement, type DoorIndex, type GameResult } from './types';

/**
 * WIN when the final door hides the car. The contestant does not keep the goat.
 */
export function determineWinner(finalPick: DoorIndex, game: Arrangement): GameResult {
  assertDoorIndex(finalPick, 'finalPick');
  assertArrangement(game);
  return contentAt(game, finalPick) === PRIZE ? 'WIN' : 'LOSE';
}
