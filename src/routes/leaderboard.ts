import { Router } from 'express';
import { z } from 'zod';
import type { LeaderboardService } from '../services/leaderboardService';
import { sendFailure } from './common';

const querySchema = z.object({ limit: z.coerce.number().int().min(1).max(100).default(10) });

export function createLeaderboardRouter(leaderboard: LeaderboardService) {
  const router = Router();

  router.get('/leaderboard', async (req, res) => {
    try {
      const { limit } = querySchema.parse(req.query);
      const top = await leaderboard.getTop(limit);
      return res.json({ top });
    } catch (err) {
      return sendFailure(res, 'leaderboard', 'leaderboard_error', err);
    }
  });

  return router;
}
