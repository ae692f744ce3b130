import type { Difficulty, Position } from '../../shared/types/game';
import {
  advanceTurn,
  applyMove,
  cloneGameState,
  createPosition,
  isFinished,
  switchPlayer,
} from '../../shared/engine';
import {
  GameFinishedError,
  NotYourTurnError,
  OpponentBusyError,
} from '../../shared/errors/GameDomainErrors';
import { bindGameToContext, errorMessage, logger } from '../utils/logger';
import { getMetricsService } from '../services/MetricsService';
import type { OpponentServiceStatus } from './ai/OpponentService';
import {
  BattleSession,
  BattleSummary,
  BattleView,
  HistoryEntry,
  toBattleSummary,
  toBattleView,
  toHistory,
} from './BattleSession';
import type { OpponentMovePolicy } from './OpponentMovePolicy';
import type { SessionRegistry, SessionRegistryStats } from './SessionRegistry';

export interface MoveOutcome {
  success: true;
  gameState: BattleView;
  /** Null when only the opponent moved. */
  playerMove: Position | null;
  /** Last opponent reply; null when the opponent did not move. */
  aiMove: Position | null;
  message?: string;
}

export interface ServiceAvailability {
  name: string;
  kind: OpponentServiceStatus['kind'];
  available: boolean;
}

export interface BattleServiceStatus {
  primary: ServiceAvailability;
  secondary: ServiceAvailability | null;
  fallbackEnabled: boolean;
  sessions: SessionRegistryStats;
}

export interface BattleOrchestratorOptions {
  defaultDifficulty: Difficulty;
}

/**
 * Runs battles: admits new sessions, applies the human's moves and asks the
 * opponent policy for replies.
 *
 * Everything in {@link makeMove} up to the first `await` is synchronous, so
 * a concurrent request on the same battle observes either the untouched
 * session or one with the thinking flag already stored.
 */
export class BattleOrchestrator {
  constructor(
    private readonly registry: SessionRegistry,
    private readonly policy: OpponentMovePolicy,
    private readonly options: BattleOrchestratorOptions
  ) {}

  createBattle(difficulty: Difficulty = this.options.defaultDifficulty): BattleView {
    const id = this.registry.create(difficulty);
    return toBattleView(this.registry.get(id));
  }

  getBattle(gameId: string): BattleView {
    return toBattleView(this.registry.get(gameId));
  }

  listBattles(): BattleSummary[] {
    return this.registry.list().map(toBattleSummary);
  }

  deleteBattle(gameId: string): void {
    this.registry.remove(gameId);
    logger.info('Battle session deleted', { gameId });
  }

  changeDifficulty(gameId: string, difficulty: Difficulty): BattleView {
    const session = this.registry.get(gameId);
    if (session.aiThinking) {
      throw new OpponentBusyError(gameId);
    }
    const previous = session.difficulty;
    session.difficulty = difficulty;
    this.registry.update(session);
    logger.info('Battle difficulty changed', { gameId, from: previous, to: difficulty });
    return toBattleView(session);
  }

  getMoveHistory(gameId: string): HistoryEntry[] {
    return toHistory(this.registry.get(gameId));
  }

  isThinking(gameId: string): boolean {
    return this.registry.isThinking(gameId);
  }

  sweepIdleSessions(): number {
    return this.registry.sweepIdle();
  }

  getStats(): SessionRegistryStats {
    return this.registry.getStats();
  }

  async getServiceStatus(): Promise<BattleServiceStatus> {
    const primary = this.policy.getPrimary();
    const secondary = this.policy.getSecondary();

    const [primaryAvailable, secondaryAvailable] = await Promise.all([
      primary.isAvailable(),
      secondary ? secondary.isAvailable() : Promise.resolve(false),
    ]);

    return {
      primary: { name: primary.name, kind: primary.kind, available: primaryAvailable },
      secondary: secondary
        ? { name: secondary.name, kind: secondary.kind, available: secondaryAvailable }
        : null,
      fallbackEnabled: this.policy.isFallbackEnabled(),
      sessions: this.registry.getStats(),
    };
  }

  /**
   * Readiness probe: the primary opponent must pass its health check.
   */
  async checkReadiness(): Promise<OpponentServiceStatus> {
    return this.policy.getPrimary().healthCheck();
  }

  /**
   * Apply the human's placement and, when it is then the opponent's turn,
   * obtain and apply the opponent's reply. The human move is kept even if
   * the opponent fails.
   *
   * @throws GameNotFoundError, GameFinishedError, NotYourTurnError,
   *   OpponentBusyError, InvalidPositionError, InvalidMoveError before
   *   anything is stored
   * @throws OpponentThinkingError after the human move has been stored
   */
  async makeMove(gameId: string, row: number, col: number): Promise<MoveOutcome> {
    bindGameToContext(gameId);
    const position = createPosition(row, col);
    const session = this.registry.get(gameId);
    const state = session.gameState;

    if (isFinished(state)) {
      throw new GameFinishedError(gameId);
    }
    if (state.currentPlayer !== session.humanPlayer) {
      throw new NotYourTurnError(state.currentPlayer, session.humanPlayer);
    }
    if (session.aiThinking) {
      throw new OpponentBusyError(gameId);
    }

    applyMove(state, position);
    getMetricsService().recordMove('human');
    switchPlayer(state);
    advanceTurn(state);

    if (isFinished(state)) {
      this.recordFinish(session);
      this.registry.update(session);
      return this.outcome(session, position, null, 'Game finished');
    }

    if (state.currentPlayer === session.humanPlayer) {
      this.registry.update(session);
      return this.outcome(session, position, null, 'Opponent has no legal move; play again');
    }

    return this.runOpponentTurn(session, position);
  }

  /**
   * Ask the opponent again after a failed reply left the battle on its turn.
   *
   * @throws GameFinishedError, NotYourTurnError (human to move),
   *   OpponentBusyError, OpponentThinkingError
   */
  async resumeOpponentTurn(gameId: string): Promise<MoveOutcome> {
    bindGameToContext(gameId);
    const session = this.registry.get(gameId);
    const state = session.gameState;

    if (isFinished(state)) {
      throw new GameFinishedError(gameId);
    }
    if (state.currentPlayer !== session.opponentPlayer) {
      throw new NotYourTurnError(state.currentPlayer, session.opponentPlayer);
    }
    if (session.aiThinking) {
      throw new OpponentBusyError(gameId);
    }

    return this.runOpponentTurn(session, null);
  }

  /**
   * Store the thinking flag, play the opponent's turn and clear the flag
   * again on every path.
   */
  private async runOpponentTurn(
    session: BattleSession,
    playerMove: Position | null
  ): Promise<MoveOutcome> {
    session.aiThinking = true;
    this.registry.update(session);

    try {
      const aiMove = await this.playOpponentTurn(session);
      session.aiThinking = false;
      this.registry.update(session);
      return this.outcome(
        session,
        playerMove,
        aiMove,
        isFinished(session.gameState) ? 'Game finished' : undefined
      );
    } catch (error) {
      session.aiThinking = false;
      this.releaseAfterFailure(session);
      throw error;
    }
  }

  /**
   * Let the opponent move until it is the human's turn again or the game
   * ends. Returns the last position played.
   */
  private async playOpponentTurn(session: BattleSession): Promise<Position | null> {
    const state = session.gameState;
    let lastMove: Position | null = null;

    while (!isFinished(state) && state.currentPlayer === session.opponentPlayer) {
      const result = await this.policy.requestMove(cloneGameState(state), session.difficulty);

      applyMove(state, result.position);
      session.annotations.push({
        moveNumber: state.moveHistory.length,
        thinkingTimeMs: result.thinkingTimeMs,
      });
      getMetricsService().recordMove('opponent');
      logger.debug('Opponent move applied', {
        gameId: session.id,
        row: result.position.row,
        col: result.position.col,
        source: result.source,
        attempt: result.attempt,
      });

      switchPlayer(state);
      advanceTurn(state);
      lastMove = result.position;
    }

    if (isFinished(state)) {
      this.recordFinish(session);
    }
    return lastMove;
  }

  private releaseAfterFailure(session: BattleSession): void {
    try {
      this.registry.update(session);
    } catch (persistError) {
      logger.warn('Could not store battle after opponent failure', {
        gameId: session.id,
        error: errorMessage(persistError),
      });
    }
  }

  private recordFinish(session: BattleSession): void {
    const { status } = session.gameState;
    if (status.kind === 'finished') {
      getMetricsService().recordGameFinished(status.winner);
      logger.info('Battle finished', {
        gameId: session.id,
        winner: status.winner ?? 'draw',
        black: status.score.black,
        white: status.score.white,
      });
    }
  }

  private outcome(
    session: BattleSession,
    playerMove: Position | null,
    aiMove: Position | null,
    message?: string
  ): MoveOutcome {
    const outcome: MoveOutcome = {
      success: true,
      gameState: toBattleView(session),
      playerMove: playerMove ? { ...playerMove } : null,
      aiMove: aiMove ? { ...aiMove } : null,
    };
    if (message) {
      outcome.message = message;
    }
    return outcome;
  }
}
