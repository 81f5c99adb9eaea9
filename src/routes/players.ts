import { Router, type RequestHandler } from 'express';
import { toPublicPlayer, type PlayerService } from '../services/playerService';
import { currentUser } from '../middleware/auth';
import { credentialsSchema } from './auth';
import { idParamSchema, pageQuerySchema, sendFailure } from './common';

const updateSchema = credentialsSchema.partial().refine((v) => v.username !== undefined || v.password !== undefined, {
  message: 'username or password required',
});

const STATUS = { not_found: 404, username_taken: 409, player_has_games: 409 } as const;

export function createPlayersRouter(players: PlayerService, auth: RequestHandler) {
  const router = Router();

  router.get('/players', async (req, res) => {
    try {
      const { limit, offset } = pageQuerySchema.parse(req.query);
      const list = await players.list(limit, offset);
      return res.json({ players: list.map(toPublicPlayer), limit, offset });
    } catch (err) {
      return sendFailure(res, 'players', 'players_list_failed', err);
    }
  });

  router.get('/players/:id', async (req, res) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      const player = await players.get(id);
      if (!player) return res.status(404).json({ error: 'not_found' });
      return res.json(toPublicPlayer(player));
    } catch (err) {
      return sendFailure(res, 'players', 'player_get_failed', err);
    }
  });

  router.put('/players/:id', auth, async (req, res) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      if (id !== currentUser(req).id) return res.status(403).json({ error: 'forbidden' });
      const body = updateSchema.parse(req.body);
      const result = await players.update(id, body);
      if (!result.ok) return res.status(STATUS[result.reason]).json({ error: result.reason });
      return res.json(toPublicPlayer(result.player));
    } catch (err) {
      return sendFailure(res, 'players', 'player_update_failed', err);
    }
  });

  router.delete('/players/:id', auth, async (req, res) => {
    try {
      const { id } = idParamSchema.parse(req.params);
      if (id !== currentUser(req).id) return res.status(403).json({ error: 'forbidden' });
      const result = await players.remove(id);
      if (!result.ok) return res.status(STATUS[result.reason]).json({ error: result.reason });
      return res.status(204).end();
    } catch (err) {
      return sendFailure(res, 'players', 'player_delete_failed', err);
    }
  });

  return router;
}
