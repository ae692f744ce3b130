import type { Difficulty, GameState, Player, Position } from '../../shared/types/game';
import {
  cloneGameState,
  getLegalMoves,
  getMoveCount,
  getScore,
  isFinished,
} from '../../shared/engine';

/** Per-move note attached to opponent replies. */
export interface MoveAnnotation {
  /** 1-based index into the game's move history. */
  moveNumber: number;
  thinkingTimeMs: number;
}

/**
 * One human-vs-computer game. The registry owns the live record; everyone
 * else works on copies and writes them back through `SessionRegistry.update`.
 */
export interface BattleSession {
  id: string;
  gameState: GameState;
  difficulty: Difficulty;
  humanPlayer: Player;
  opponentPlayer: Player;
  aiThinking: boolean;
  createdAt: Date;
  lastActivityAt: Date;
  annotations: MoveAnnotation[];
}

export function cloneSession(session: BattleSession): BattleSession {
  return {
    ...session,
    gameState: cloneGameState(session.gameState),
    createdAt: new Date(session.createdAt),
    lastActivityAt: new Date(session.lastActivityAt),
    annotations: session.annotations.map((a) => ({ ...a })),
  };
}

export type BattleStatusLabel = 'in_progress' | 'paused' | 'finished';

export interface BattleView {
  gameId: string;
  board: Array<Array<Player | null>>;
  currentPlayer: Player;
  blackCount: number;
  whiteCount: number;
  difficulty: Difficulty;
  aiThinking: boolean;
  status: BattleStatusLabel;
  winner?: Player | null;
  validMoves: Position[];
  moveCount: number;
}

export interface BattleSummary {
  gameId: string;
  difficulty: Difficulty;
  status: BattleStatusLabel;
  createdAt: string;
  lastActivityAt: string;
  moveCount: number;
}

export interface HistoryEntry {
  moveNumber: number;
  player: Player;
  position: Position;
  flipped: Position[];
  timestamp: string;
  thinkingTimeMs?: number;
}

export function toBattleView(session: BattleSession): BattleView {
  const { gameState } = session;
  const score = getScore(gameState);
  const finished = isFinished(gameState);

  const view: BattleView = {
    gameId: session.id,
    board: gameState.board.map((row) => row.map((cell) => (cell === 'empty' ? null : cell))),
    currentPlayer: gameState.currentPlayer,
    blackCount: score.black,
    whiteCount: score.white,
    difficulty: session.difficulty,
    aiThinking: session.aiThinking,
    status: gameState.status.kind,
    validMoves: finished ? [] : getLegalMoves(gameState.board, gameState.currentPlayer),
    moveCount: getMoveCount(gameState),
  };
  if (gameState.status.kind === 'finished') {
    view.winner = gameState.status.winner;
  }
  return view;
}

export function toBattleSummary(session: BattleSession): BattleSummary {
  return {
    gameId: session.id,
    difficulty: session.difficulty,
    status: session.gameState.status.kind,
    createdAt: session.createdAt.toISOString(),
    lastActivityAt: session.lastActivityAt.toISOString(),
    moveCount: getMoveCount(session.gameState),
  };
}

export function toHistory(session: BattleSession): HistoryEntry[] {
  const thinking = new Map(session.annotations.map((a) => [a.moveNumber, a.thinkingTimeMs]));
  return session.gameState.moveHistory.map((move, index) => {
    const entry: HistoryEntry = {
      moveNumber: index + 1,
      player: move.player,
      position: { ...move.position },
      flipped: move.flipped.map((p) => ({ ...p })),
      timestamp: move.timestamp.toISOString(),
    };
    const thinkingTimeMs = thinking.get(index + 1);
    if (thinkingTimeMs !== undefined) {
      entry.thinkingTimeMs = thinkingTimeMs;
    }
    return entry;
  });
}
