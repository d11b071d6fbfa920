export * from './types';
export { isDoorIndex, assertDoorIndex, assertArrangement } from './doors';
export { createGame, selectDoor } from './setup';
export { openGoatDoor } from './host';
export { changeDoor } from './decision';
export { determineWinner } from './judge';
export { playGame, playRound } from './round';
