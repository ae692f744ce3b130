/**
 * Test Fixtures and Utilities
 * Common boards and helper functions for battle tests
 */

import type { GameState, Player, Position } from '../../src/shared/types/game';
import { boardFromString } from '../../src/shared/engine/board';
import { createGameState } from '../../src/shared/engine/gameState';

/**
 * Position helper - creates a position object
 */
export function pos(row: number, col: number): Position {
  return { row, col };
}

/**
 * Creates a game state on the given board text (see boardFromString).
 */
export function createTestGameState(
  boardText: string,
  currentPlayer: Player = 'black',
  id: string = 'test-game'
): GameState {
  const state = createGameState(id);
  state.board = boardFromString(boardText);
  state.currentPlayer = currentPlayer;
  return state;
}

/**
 * Black to move with a single placement at (4,2). Afterwards white has
 * (0,2) and (7,5) while black has nothing left, so white plays twice and
 * the game ends 3-6.
 */
export const DOUBLE_REPLY_BOARD = `
  WB......
  ........
  ........
  ........
  BW......
  ........
  ........
  ......BW
`;

/**
 * Black to move; (0,3) captures (0,1) and (0,2) and ends the game 4-1
 * since nobody can reach the white corner disc.
 */
export const WINNING_MOVE_BOARD = `
  BWW.....
  ........
  ........
  ........
  ........
  ........
  ........
  .......W
`;

/**
 * Placing black at (3,3) captures along NW, E and S.
 */
export const MULTI_DIRECTION_BOARD = `
  ........
  .B......
  ..W.....
  ....WWB.
  ...W....
  ...B....
  ........
  ........
`;

/** Neither side can move: isolated discs of each colour. */
export const DEADLOCK_BOARD = `
  B......W
  ........
  ........
  ........
  ........
  ........
  ........
  ........
`;

/** Black owns a corner next to a white disc; only black can move. */
export const CORNER_BOARD = `
  BW......
  ........
  ........
  ........
  ........
  ........
  ........
  ........
`;
