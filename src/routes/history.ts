import { Router } from 'express';
import type { GameService } from '../services/gameService';
import type { PlayerService } from '../services/playerService';
import { idParamSchema, pageQuerySchema, sendFailure } from './common';
import { summarizeGames } from './summaries';

export function createHistoryRouter(games: GameService, players: PlayerService) {
  const router = Router();

  // GET /history/:id?limit=20&offset=0
  router.get('/history/:id', async (req, res) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const { limit, offset } = pageQuerySchema.parse(req.query);
      const player = await players.get(id);
      if (!player) return res.status(404).json({ error: 'not_found' });
      const list = await games.listByPlayer(id, limit, offset);
      return res.json({ games: await summarizeGames(list, players), limit, offset });
    } catch (err) {
      return sendFailure(res, 'history', 'history_failed', err);
    }
  });

  return router;
}
