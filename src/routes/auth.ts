import { Router, type RequestHandler } from 'express';
import { z } from 'zod';
import { toPublicPlayer, type PlayerService } from '../services/playerService';
import { currentUser } from '../middleware/auth';
import { sendFailure } from './common';

export const credentialsSchema = z.object({
  username: z.string().min(3).max(30).regex(/^[a-zA-Z0-9_]+$/),
  password: z.string().min(6).max(72),
});

export function createAuthRouter(players: PlayerService, auth: RequestHandler) {
  const router = Router();

  router.post('/auth/register', async (req, res) => {
    try {
      const body = credentialsSchema.parse(req.body);
      const result = await players.register(body.username, body.password);
      if (!result.ok) return res.status(409).json({ error: result.reason });
      return res.status(201).json({ token: result.token, tokenType: 'bearer', player: toPublicPlayer(result.player) });
    } catch (err) {
      return sendFailure(res, 'auth', 'register_failed', err);
    }
  });

  router.post('/auth/login', async (req, res) => {
    try {
      const body = credentialsSchema.parse(req.body);
      const result = await players.login(body.username, body.password);
      if (!result.ok) return res.status(401).json({ error: result.reason });
      return res.json({ token: result.token, tokenType: 'bearer', player: toPublicPlayer(result.player) });
    } catch (err) {
      return sendFailure(res, 'auth', 'login_failed', err);
    }
  });

  router.get('/auth/me', auth, async (req, res) => {
    try {
      const player = await players.get(currentUser(req).id);
      if (!player) return res.status(404).json({ error: 'not_found' });
      return res.json(toPublicPlayer(player));
    } catch (err) {
      return sendFailure(res, 'auth', 'me_failed', err);
    }
  });

  return router;
}
