import { defaultRNG, type RandomSource } from '../core/math/random';
import { changeDoor } from './decision';
import { openGoatDoor } from './host';
import { determineWinner } from './judge';
import { createGame, selectDoor } from './setup';
import type { RoundOutcome, RoundRecord } from './types';

/**
 * Play one full round and keep every intermediate door.
 *
 * Stay and switch are judged against the same game, first pick and opened
 * door, so the two outcomes form a paired observation.
 */
export function playRound(rng: RandomSource = defaultRNG): RoundRecord {
  const game = createGame(rng);
  const firstPick = selectDoor(rng);
  const openedDoor = openGoatDoor(game, firstPick, rng);

  const finalPickStay = changeDoor(true, openedDoor, firstPick);
  const finalPickSwitch = changeDoor(false, openedDoor, firstPick);

  const outcomes: readonly [RoundOutcome, RoundOutcome] = [
    { strategy: 'stay', outcome: determineWinner(finalPickStay, game) },
    { strategy: 'switch', outcome: determineWinner(finalPickSwitch, game) },
  ];

  return {
    game,
    firstPick,
    openedDoor,
    finalPicks: { stay: finalPickStay, switch: finalPickSwitch },
    outcomes,
  };
}

/**
 * One round reported as a stay row and a switch row
 */
export function playGame(rng: RandomSource = defaultRNG): readonly [RoundOutcome, RoundOutcome] {
  return playRound(rng).outcomes;
}
