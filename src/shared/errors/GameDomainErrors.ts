/**
 * Game Domain Errors - Structured error types for battles
 *
 * Every failure a caller can observe from the engine, the session registry
 * or the battle orchestrator is one of the classes below. Each carries a
 * stable code and maps onto a single HTTP status.
 *
 * Usage:
 * ```typescript
 * import { GameError, InvalidMoveError } from './GameDomainErrors';
 *
 * throw new InvalidMoveError('No discs would be flipped', { row: 0, col: 0 });
 *
 * if (error instanceof GameError) {
 *   res.status(error.httpStatus).json(error.toJSON());
 * }
 * ```
 *
 * @module GameDomainErrors
 */

import type { Player } from '../types/game';

// ═══════════════════════════════════════════════════════════════════════════
// ERROR CODES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Error codes, prefixed by category:
 * - GAME_* / SESSION_*: session lifecycle
 * - MOVE_*: placement validation
 * - AI_*: computer opponent
 */
export enum GameErrorCode {
  // Session Errors
  GAME_NOT_FOUND = 'GAME_NOT_FOUND',
  GAME_ALREADY_FINISHED = 'GAME_ALREADY_FINISHED',
  SESSION_LIMIT_REACHED = 'SESSION_LIMIT_REACHED',

  // Move Errors
  MOVE_INVALID = 'MOVE_INVALID',
  MOVE_NOT_YOUR_TURN = 'MOVE_NOT_YOUR_TURN',
  MOVE_INVALID_POSITION = 'MOVE_INVALID_POSITION',

  // Opponent Errors
  AI_BUSY = 'AI_BUSY',
  AI_THINKING_FAILED = 'AI_THINKING_FAILED',

  // Request Errors
  INVALID_DIFFICULTY = 'INVALID_DIFFICULTY',

  // Internal Errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * HTTP status codes for error types.
 */
export const ERROR_HTTP_STATUS: Record<GameErrorCode, number> = {
  [GameErrorCode.GAME_NOT_FOUND]: 404,
  [GameErrorCode.GAME_ALREADY_FINISHED]: 400,
  [GameErrorCode.SESSION_LIMIT_REACHED]: 429,

  [GameErrorCode.MOVE_INVALID]: 400,
  [GameErrorCode.MOVE_NOT_YOUR_TURN]: 403,
  [GameErrorCode.MOVE_INVALID_POSITION]: 400,

  [GameErrorCode.AI_BUSY]: 409,
  [GameErrorCode.AI_THINKING_FAILED]: 500,

  [GameErrorCode.INVALID_DIFFICULTY]: 400,

  [GameErrorCode.INTERNAL_ERROR]: 500,
};

// ═══════════════════════════════════════════════════════════════════════════
// BASE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Base class for all battle domain errors.
 */
export class GameError extends Error {
  /** Error code for programmatic handling */
  readonly code: GameErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  readonly timestamp: Date;

  constructor(code: GameErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'GameError';
    this.code = code;
    this.context = context;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, GameError.prototype);
  }

  get httpStatus(): number {
    return ERROR_HTTP_STATUS[this.code] ?? 500;
  }

  /** Serialize to a JSON-safe object for API responses */
  toJSON(): GameErrorJSON {
    return {
      error: true,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

export interface GameErrorJSON {
  error: true;
  code: string;
  message: string;
  context: Record<string, unknown>;
  timestamp: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// SPECIFIC ERROR CLASSES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Placement on an occupied square, or one that flips nothing.
 */
export class InvalidMoveError extends GameError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.MOVE_INVALID, message, context);
    this.name = 'InvalidMoveError';
    Object.setPrototypeOf(this, InvalidMoveError.prototype);
  }
}

/**
 * Coordinates outside the 8×8 grid.
 */
export class InvalidPositionError extends GameError {
  constructor(row: number, col: number) {
    super(
      GameErrorCode.MOVE_INVALID_POSITION,
      `Invalid position: (${row}, ${col}) is outside the board`,
      { row, col }
    );
    this.name = 'InvalidPositionError';
    Object.setPrototypeOf(this, InvalidPositionError.prototype);
  }
}

export class NotYourTurnError extends GameError {
  constructor(expectedPlayer: Player, actualPlayer: Player, context: Record<string, unknown> = {}) {
    super(
      GameErrorCode.MOVE_NOT_YOUR_TURN,
      `Not your turn. Expected ${expectedPlayer}, got ${actualPlayer}`,
      { expectedPlayer, actualPlayer, ...context }
    );
    this.name = 'NotYourTurnError';
    Object.setPrototypeOf(this, NotYourTurnError.prototype);
  }
}

export class GameNotFoundError extends GameError {
  constructor(gameId: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.GAME_NOT_FOUND, `Game not found: ${gameId}`, { gameId, ...context });
    this.name = 'GameNotFoundError';
    Object.setPrototypeOf(this, GameNotFoundError.prototype);
  }
}

export class GameFinishedError extends GameError {
  constructor(gameId: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.GAME_ALREADY_FINISHED, `Game ${gameId} is already finished`, {
      gameId,
      ...context,
    });
    this.name = 'GameFinishedError';
    Object.setPrototypeOf(this, GameFinishedError.prototype);
  }
}

/**
 * Admission control: the registry already holds its maximum number of
 * live sessions.
 */
export class SessionLimitError extends GameError {
  constructor(maxSessions: number) {
    super(
      GameErrorCode.SESSION_LIMIT_REACHED,
      `Maximum number of sessions reached (${maxSessions})`,
      { maxSessions }
    );
    this.name = 'SessionLimitError';
    Object.setPrototypeOf(this, SessionLimitError.prototype);
  }
}

/**
 * The opponent's reply for this session is still being computed.
 */
export class OpponentBusyError extends GameError {
  constructor(gameId: string) {
    super(GameErrorCode.AI_BUSY, `Opponent is still thinking in game ${gameId}`, { gameId });
    this.name = 'OpponentBusyError';
    Object.setPrototypeOf(this, OpponentBusyError.prototype);
  }
}

/**
 * Every attempt to obtain an opponent reply failed.
 */
export class OpponentThinkingError extends GameError {
  readonly attempts: number;

  constructor(lastError: string, attempts: number, context: Record<string, unknown> = {}) {
    super(
      GameErrorCode.AI_THINKING_FAILED,
      `Opponent failed to produce a move after ${attempts} attempt(s): ${lastError}`,
      { lastError, attempts, ...context }
    );
    this.name = 'OpponentThinkingError';
    this.attempts = attempts;
    Object.setPrototypeOf(this, OpponentThinkingError.prototype);
  }
}

export class InvalidDifficultyError extends GameError {
  constructor(value: string) {
    super(GameErrorCode.INVALID_DIFFICULTY, `Invalid difficulty: ${value}`, { value });
    this.name = 'InvalidDifficultyError';
    Object.setPrototypeOf(this, InvalidDifficultyError.prototype);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function isGameError(error: unknown): error is GameError {
  return error instanceof GameError;
}
