import { v4 as uuidv4 } from 'uuid';
import { GameState, Player, Score, opponentOf } from '../types/game';
import { cloneBoard, countPieces, createInitialBoard } from './board';

/**
 * Creates a fresh game on the standard opening board with black to move.
 *
 * @param id - Game identifier; a random UUID when omitted
 */
export function createGameState(id: string = uuidv4()): GameState {
  const now = new Date();
  return {
    id,
    board: createInitialBoard(),
    currentPlayer: 'black',
    status: { kind: 'in_progress' },
    moveHistory: [],
    createdAt: now,
    updatedAt: now,
  };
}

export function cloneGameState(state: GameState): GameState {
  return {
    ...state,
    board: cloneBoard(state.board),
    status:
      state.status.kind === 'finished'
        ? { ...state.status, score: { ...state.status.score } }
        : { ...state.status },
    moveHistory: state.moveHistory.map((move) => ({
      ...move,
      position: { ...move.position },
      flipped: move.flipped.map((p) => ({ ...p })),
      timestamp: new Date(move.timestamp),
    })),
    createdAt: new Date(state.createdAt),
    updatedAt: new Date(state.updatedAt),
  };
}

function touch(state: GameState): void {
  state.updatedAt = new Date();
}

/**
 * Hand the move to the other side. Called explicitly after every applied
 * placement; applying a move never switches on its own.
 */
export function switchPlayer(state: GameState): void {
  state.currentPlayer = opponentOf(state.currentPlayer);
  touch(state);
}

// Status transitions. Anything not listed is a silent no-op:
//   in_progress -> paused | finished
//   paused      -> in_progress

export function pauseGame(state: GameState): void {
  if (state.status.kind === 'in_progress') {
    state.status = { kind: 'paused' };
    touch(state);
  }
}

export function resumeGame(state: GameState): void {
  if (state.status.kind === 'paused') {
    state.status = { kind: 'in_progress' };
    touch(state);
  }
}

export function finishGame(state: GameState, winner: Player | null): void {
  if (state.status.kind === 'in_progress') {
    state.status = { kind: 'finished', winner, score: countPieces(state.board) };
    touch(state);
  }
}

export function isFinished(state: GameState): boolean {
  return state.status.kind === 'finished';
}

export function isPaused(state: GameState): boolean {
  return state.status.kind === 'paused';
}

export function getScore(state: GameState): Score {
  return countPieces(state.board);
}

export function getMoveCount(state: GameState): number {
  return state.moveHistory.length;
}

export function getWinner(state: GameState): Player | null {
  return state.status.kind === 'finished' ? state.status.winner : null;
}
