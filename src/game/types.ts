/**
 * Game model for a single Monty Hall round
 */

export type DoorContent = 'car' | 'goat';

export const PRIZE: DoorContent = 'car';
export const NON_PRIZE: DoorContent = 'goat';

/** Contents of doors 1..3, stored at positions 0..2 */
export type Arrangement = readonly [DoorContent, DoorContent, DoorContent];

/** 1-indexed door number */
export type DoorIndex = 1 | 2 | 3;

export const DOORS: readonly DoorIndex[] = [1, 2, 3];

export type Strategy = 'stay' | 'switch';

export const STRATEGIES: readonly Strategy[] = ['stay', 'switch'];

export type GameResult = 'WIN' | 'LOSE';

export interface RoundOutcome {
  strategy: Strategy;
  outcome: GameResult;
}

/**
 * Both strategies evaluated against one shared game state
 */
export interface RoundRecord {
  game: Arrangement;
  firstPick: DoorIndex;
  openedDoor: DoorIndex;
  finalPicks: Record<Strategy, DoorIndex>;
  outcomes: readonly [RoundOutcome, RoundOutcome];
}

/** 2n rows for n rounds; stay row then switch row per round */
export type BatchResultSet = RoundOutcome[];
