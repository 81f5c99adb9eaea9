import { Router, type RequestHandler } from 'express';
import { z } from 'zod';
import type { GameService, JoinGameResult, SubmitMoveResult } from '../services/gameService';
import type { PlayerService } from '../services/playerService';
import { toSnapshot } from '../game/gameSession';
import { currentUser } from '../middleware/auth';
import { idParamSchema, pageQuerySchema, sendFailure } from './common';
import { summarizeGames } from './summaries';

const createSchema = z.object({ opponentType: z.enum(['human', 'computer']) });

// Range is the move validator's call, so only the type is checked here.
const moveSchema = z.object({ row: z.number().int(), col: z.number().int() });

type Rejection<R> = R extends { ok: false; reason: infer E } ? E : never;

const MOVE_REJECTION_STATUS: Record<Rejection<SubmitMoveResult>, number> = {
  not_found: 404,
  game_finished: 400,
  out_of_bounds: 400,
  not_participant: 403,
  not_your_turn: 400,
  cell_occupied: 409,
};

const JOIN_REJECTION_STATUS: Record<Rejection<JoinGameResult>, number> = {
  not_found: 404,
  not_joinable: 400,
  own_game: 400,
  game_full: 409,
};

export function createGamesRouter(games: GameService, players: PlayerService, auth: RequestHandler) {
  const router = Router();

  router.post('/games', auth, async (req, res) => {
    try {
      const { opponentType } = createSchema.parse(req.body);
      const game = await games.createGame(currentUser(req).id, opponentType);
      return res.status(201).json(toSnapshot(game));
    } catch (err) {
      return sendFailure(res, 'games', 'game_create_failed', err);
    }
  });

  router.get('/games', async (req, res) => {
    try {
      const { limit, offset } = pageQuerySchema.parse(req.query);
      const list = await games.listRecent(limit, offset);
      return res.json({ games: await summarizeGames(list, players), limit, offset });
    } catch (err) {
      return sendFailure(res, 'games', 'games_list_failed', err);
    }
  });

  router.get('/games/:id', async (req, res) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const game = await games.getGame(id);
      if (!game) return res.status(404).json({ error: 'not_found' });
      return res.json(toSnapshot(game));
    } catch (err) {
      return sendFailure(res, 'games', 'game_get_failed', err);
    }
  });

  router.get('/games/:id/moves', async (req, res) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const moves = await games.listMoves(id);
      if (!moves) return res.status(404).json({ error: 'not_found' });
      return res.json({
        moves: moves.map((m) => ({
          moveNumber: m.moveNumber,
          playerId: m.playerId,
          row: m.row,
          col: m.col,
          mark: m.mark,
          createdAt: new Date(m.createdAt).toISOString(),
        })),
      });
    } catch (err) {
      return sendFailure(res, 'games', 'moves_list_failed', err);
    }
  });

  router.post('/games/:id/join', auth, async (req, res) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const result = await games.joinGame(id, currentUser(req).id);
      if (!result.ok) return res.status(JOIN_REJECTION_STATUS[result.reason]).json({ error: result.reason });
      return res.json(toSnapshot(result.game));
    } catch (err) {
      return sendFailure(res, 'games', 'join_failed', err);
    }
  });

  router.post('/games/:id/move', auth, async (req, res) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const { row, col } = moveSchema.parse(req.body);
      const result = await games.submitMove({ gameId: id, playerId: currentUser(req).id, row, col });
      if (!result.ok) return res.status(MOVE_REJECTION_STATUS[result.reason]).json({ error: result.reason });
      return res.json(toSnapshot(result.game));
    } catch (err) {
      return sendFailure(res, 'games', 'move_failed', err);
    }
  });

  return router;
}
