export const BOARD_SIZE = 8;

export type Player = 'black' | 'white';

/** Contents of a single square. */
export type Cell = Player | 'empty';

/**
 * Row-major 8×8 grid. `board[row][col]`; row 0 is the top edge.
 */
export type Board = Cell[][];

export interface Position {
  row: number;
  col: number;
}

/**
 * Lifecycle of a single game.
 *
 * - 'in_progress' ↔ 'paused' are reversible.
 * - 'finished' is terminal; `winner` is null for a draw.
 */
export type GameStatus =
  | { kind: 'in_progress' }
  | { kind: 'paused' }
  | { kind: 'finished'; winner: Player | null; score: Score };

export interface Score {
  black: number;
  white: number;
}

/**
 * One applied placement. Records are append-only; `flipped` lists the
 * captured discs in discovery order.
 */
export interface GameMove {
  player: Player;
  position: Position;
  flipped: Position[];
  timestamp: Date;
}

export interface GameState {
  id: string;
  board: Board;
  currentPlayer: Player;
  status: GameStatus;
  moveHistory: GameMove[];
  createdAt: Date;
  updatedAt: Date;
}

export type Difficulty = 'easy' | 'medium' | 'hard';

export const DIFFICULTIES: readonly Difficulty[] = ['easy', 'medium', 'hard'];

export interface DifficultyInfo {
  value: Difficulty;
  name: string;
  description: string;
}

export const DIFFICULTY_INFO: Record<Difficulty, DifficultyInfo> = {
  easy: {
    value: 'easy',
    name: 'Easy',
    description: 'Plays a reproducible pick from the legal moves',
  },
  medium: {
    value: 'medium',
    name: 'Medium',
    description: 'Looks three plies ahead with minimax',
  },
  hard: {
    value: 'hard',
    name: 'Hard',
    description: 'Looks five plies ahead with alpha-beta pruning',
  },
};

/**
 * Parse a difficulty label case-insensitively. Returns null for anything
 * outside the closed set.
 */
export function parseDifficulty(raw: string): Difficulty | null {
  const normalized = raw.trim().toLowerCase();
  return DIFFICULTIES.find((d) => d === normalized) ?? null;
}

export function opponentOf(player: Player): Player {
  return player === 'black' ? 'white' : 'black';
}

/** Black = 0, white = 1. */
export function playerOrdinal(player: Player): number {
  return player === 'black' ? 0 : 1;
}

export function positionsEqual(a: Position, b: Position): boolean {
  return a.row === b.row && a.col === b.col;
}
