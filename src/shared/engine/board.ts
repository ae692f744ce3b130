import { BOARD_SIZE, Board, Cell, Position, Score } from '../types/game';
import { InvalidPositionError } from '../errors/GameDomainErrors';

/**
 * Unit offsets scanned for captures, in the canonical order used by flip
 * discovery: NW, N, NE, W, E, SW, S, SE.
 */
export const DIRECTIONS: ReadonlyArray<readonly [number, number]> = [
  [-1, -1],
  [-1, 0],
  [-1, 1],
  [0, -1],
  [0, 1],
  [1, -1],
  [1, 0],
  [1, 1],
];

export const CORNERS: readonly Position[] = [
  { row: 0, col: 0 },
  { row: 0, col: BOARD_SIZE - 1 },
  { row: BOARD_SIZE - 1, col: 0 },
  { row: BOARD_SIZE - 1, col: BOARD_SIZE - 1 },
];

export function isInBounds(row: number, col: number): boolean {
  return (
    Number.isInteger(row) &&
    Number.isInteger(col) &&
    row >= 0 &&
    row < BOARD_SIZE &&
    col >= 0 &&
    col < BOARD_SIZE
  );
}

/**
 * Build a validated position. Throws InvalidPositionError outside the grid.
 */
export function createPosition(row: number, col: number): Position {
  if (!isInBounds(row, col)) {
    throw new InvalidPositionError(row, col);
  }
  return { row, col };
}

export function tryCreatePosition(row: number, col: number): Position | null {
  return isInBounds(row, col) ? { row, col } : null;
}

export function createEmptyBoard(): Board {
  return Array.from({ length: BOARD_SIZE }, () =>
    Array.from({ length: BOARD_SIZE }, (): Cell => 'empty')
  );
}

/**
 * Standard opening: white on the (3,3)/(4,4) diagonal, black on (3,4)/(4,3).
 */
export function createInitialBoard(): Board {
  const board = createEmptyBoard();
  board[3][3] = 'white';
  board[3][4] = 'black';
  board[4][3] = 'black';
  board[4][4] = 'white';
  return board;
}

export function cloneBoard(board: Board): Board {
  return board.map((row) => [...row]);
}

export function getCell(board: Board, position: Position): Cell {
  return board[position.row][position.col];
}

export function setCell(board: Board, position: Position, cell: Cell): void {
  board[position.row][position.col] = cell;
}

export function countPieces(board: Board): Score {
  const score: Score = { black: 0, white: 0 };
  for (const row of board) {
    for (const cell of row) {
      if (cell !== 'empty') {
        score[cell] += 1;
      }
    }
  }
  return score;
}

export function countEmpty(board: Board): number {
  const { black, white } = countPieces(board);
  return BOARD_SIZE * BOARD_SIZE - black - white;
}

export function isCorner(position: Position): boolean {
  const edge = BOARD_SIZE - 1;
  return (
    (position.row === 0 || position.row === edge) && (position.col === 0 || position.col === edge)
  );
}

export function isEdge(position: Position): boolean {
  const edge = BOARD_SIZE - 1;
  return (
    position.row === 0 || position.row === edge || position.col === 0 || position.col === edge
  );
}

/**
 * Render as eight lines of `B`, `W` and `.`; handy in logs and test failures.
 */
export function boardToString(board: Board): string {
  return board
    .map((row) => row.map((cell) => (cell === 'black' ? 'B' : cell === 'white' ? 'W' : '.')).join(''))
    .join('\n');
}

/**
 * Inverse of {@link boardToString}. Accepts surrounding whitespace on each
 * line; anything other than `B`/`W` is read as empty.
 */
export function boardFromString(text: string): Board {
  const lines = text
    .trim()
    .split('\n')
    .map((line) => line.trim());
  if (lines.length !== BOARD_SIZE || lines.some((line) => line.length !== BOARD_SIZE)) {
    throw new Error(`Board text must be ${BOARD_SIZE} lines of ${BOARD_SIZE} characters`);
  }
  return lines.map((line) =>
    [...line].map((ch): Cell => (ch === 'B' ? 'black' : ch === 'W' ? 'white' : 'empty'))
  );
}
