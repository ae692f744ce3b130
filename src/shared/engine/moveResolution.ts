import { BOARD_SIZE, Board, GameState, Player, Position, opponentOf } from '../types/game';
import { GameFinishedError, InvalidMoveError } from '../errors/GameDomainErrors';
import { DIRECTIONS, countPieces, getCell, isInBounds, setCell } from './board';
import { finishGame, isFinished, switchPlayer } from './gameState';

/**
 * Discs that placing `player` at `position` would capture.
 *
 * Each of the eight directions is walked independently: a run of opponent
 * discs counts only when it ends on one of the mover's own discs. An empty
 * square or the edge discards the run. Results are grouped by direction
 * (in {@link DIRECTIONS} order), nearest disc first. The target square's
 * own contents are not checked here; see {@link isLegalMove}.
 */
export function getFlippedPositions(board: Board, player: Player, position: Position): Position[] {
  const opponent = opponentOf(player);
  const flipped: Position[] = [];

  for (const [dr, dc] of DIRECTIONS) {
    const run: Position[] = [];
    let row = position.row + dr;
    let col = position.col + dc;

    while (isInBounds(row, col)) {
      const cell = board[row][col];
      if (cell === opponent) {
        run.push({ row, col });
      } else {
        if (cell === player) {
          flipped.push(...run);
        }
        break;
      }
      row += dr;
      col += dc;
    }
  }

  return flipped;
}

/**
 * True iff the square is empty and the placement captures at least one
 * disc. Pure: the board is never modified.
 */
export function isLegalMove(board: Board, player: Player, position: Position): boolean {
  if (!isInBounds(position.row, position.col)) {
    return false;
  }
  if (getCell(board, position) !== 'empty') {
    return false;
  }
  return getFlippedPositions(board, player, position).length > 0;
}

/**
 * All legal placements for `player`, scanned row-major from (0,0).
 * An empty result means the player must pass.
 */
export function getLegalMoves(board: Board, player: Player): Position[] {
  const moves: Position[] = [];
  for (let row = 0; row < BOARD_SIZE; row++) {
    for (let col = 0; col < BOARD_SIZE; col++) {
      const position = { row, col };
      if (isLegalMove(board, player, position)) {
        moves.push(position);
      }
    }
  }
  return moves;
}

export function hasLegalMoves(board: Board, player: Player): boolean {
  for (let row = 0; row < BOARD_SIZE; row++) {
    for (let col = 0; col < BOARD_SIZE; col++) {
      if (isLegalMove(board, player, { row, col })) {
        return true;
      }
    }
  }
  return false;
}

/**
 * Place a disc for the current mover and flip every captured disc.
 *
 * The turn is NOT advanced; callers follow up with `switchPlayer` and
 * {@link advanceTurn}.
 *
 * @returns the flipped positions, in discovery order
 * @throws GameFinishedError when the game is over
 * @throws InvalidMoveError when the square is occupied or captures nothing
 */
export function applyMove(state: GameState, position: Position): Position[] {
  if (isFinished(state)) {
    throw new GameFinishedError(state.id);
  }

  const player = state.currentPlayer;
  if (!isLegalMove(state.board, player, position)) {
    throw new InvalidMoveError(
      `Position (${position.row}, ${position.col}) is not a valid move for ${player}`,
      { row: position.row, col: position.col, player }
    );
  }

  const flipped = getFlippedPositions(state.board, player, position);
  setCell(state.board, position, player);
  for (const p of flipped) {
    setCell(state.board, p, player);
  }

  const now = new Date();
  state.moveHistory.push({
    player,
    position: { row: position.row, col: position.col },
    flipped: flipped.map((p) => ({ ...p })),
    timestamp: now,
  });
  state.updatedAt = now;

  return flipped;
}

/** Neither side can move. */
export function isTerminal(board: Board): boolean {
  return !hasLegalMoves(board, 'black') && !hasLegalMoves(board, 'white');
}

/** Higher disc count wins; equal counts are a draw (null). */
export function determineWinner(board: Board): Player | null {
  const { black, white } = countPieces(board);
  if (black > white) return 'black';
  if (white > black) return 'white';
  return null;
}

/**
 * Resolve passes for the side to move.
 *
 * - Current mover has a legal move: nothing happens.
 * - Otherwise the turn passes to the opponent.
 * - If the opponent cannot move either, the game is finished with the
 *   winner computed from the board.
 *
 * @returns whether the state changed
 */
export function advanceTurn(state: GameState): boolean {
  if (hasLegalMoves(state.board, state.currentPlayer)) {
    return false;
  }

  switchPlayer(state);

  if (hasLegalMoves(state.board, state.currentPlayer)) {
    return true;
  }

  finishGame(state, determineWinner(state.board));
  return true;
}
