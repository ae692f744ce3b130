import { Router, Request, Response } from 'express';
import { asyncHandler } from '../middleware/errorHandler';
import {
  ChangeDifficultySchema,
  CreateBattleSchema,
  GameIdParamSchema,
  MoveSchema,
  requireDifficulty,
} from '../../shared/validation/schemas';
import { DIFFICULTIES, DIFFICULTY_INFO } from '../../shared/types/game';
import type { BattleOrchestrator } from '../game/BattleOrchestrator';

/**
 * Human-vs-computer battle endpoints, mounted under /api/ai-battle.
 *
 * Static paths are registered before `/:gameId` so they are not captured
 * by the id parameter.
 */
export function createBattleRouter(orchestrator: BattleOrchestrator): Router {
  const router = Router();

  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const { difficulty } = CreateBattleSchema.parse(req.body ?? {});
      const battle = orchestrator.createBattle(
        difficulty === undefined ? undefined : requireDifficulty(difficulty)
      );
      res.status(201).json({
        success: true,
        data: battle,
        message: 'Battle created',
      });
    })
  );

  router.get('/difficulties', (_req: Request, res: Response) => {
    res.json({
      success: true,
      data: { difficulties: DIFFICULTIES.map((d) => DIFFICULTY_INFO[d]) },
    });
  });

  router.get('/sessions', (_req: Request, res: Response) => {
    const sessions = orchestrator.listBattles();
    res.json({
      success: true,
      data: { sessions, totalCount: sessions.length },
    });
  });

  router.get(
    '/status',
    asyncHandler(async (_req: Request, res: Response) => {
      const status = await orchestrator.getServiceStatus();
      res.json({ success: true, data: status });
    })
  );

  router.get(
    '/:gameId',
    asyncHandler(async (req: Request, res: Response) => {
      const { gameId } = GameIdParamSchema.parse(req.params);
      res.json({ success: true, data: orchestrator.getBattle(gameId) });
    })
  );

  router.delete(
    '/:gameId',
    asyncHandler(async (req: Request, res: Response) => {
      const { gameId } = GameIdParamSchema.parse(req.params);
      orchestrator.deleteBattle(gameId);
      res.status(204).send();
    })
  );

  router.post(
    '/:gameId/move',
    asyncHandler(async (req: Request, res: Response) => {
      const { gameId } = GameIdParamSchema.parse(req.params);
      const { row, col } = MoveSchema.parse(req.body);
      const outcome = await orchestrator.makeMove(gameId, row, col);
      res.json({ success: true, data: outcome });
    })
  );

  // Re-request the opponent's reply after a failed attempt.
  router.post(
    '/:gameId/opponent-move',
    asyncHandler(async (req: Request, res: Response) => {
      const { gameId } = GameIdParamSchema.parse(req.params);
      const outcome = await orchestrator.resumeOpponentTurn(gameId);
      res.json({ success: true, data: outcome });
    })
  );

  router.put(
    '/:gameId/difficulty',
    asyncHandler(async (req: Request, res: Response) => {
      const { gameId } = GameIdParamSchema.parse(req.params);
      const { difficulty } = ChangeDifficultySchema.parse(req.body);
      const battle = orchestrator.changeDifficulty(gameId, requireDifficulty(difficulty));
      res.json({ success: true, data: battle });
    })
  );

  router.get(
    '/:gameId/history',
    asyncHandler(async (req: Request, res: Response) => {
      const { gameId } = GameIdParamSchema.parse(req.params);
      const moves = orchestrator.getMoveHistory(gameId);
      res.json({
        success: true,
        data: { gameId, moves, totalMoves: moves.length },
      });
    })
  );

  return router;
}
