import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { GameService } from './services/gameService';
import type { LeaderboardService } from './services/leaderboardService';
import type { PlayerService } from './services/playerService';
import { requireAuth } from './middleware/auth';
import { createHealthRouter, type StorageKind } from './routes/health';
import { createAuthRouter } from './routes/auth';
import { createPlayersRouter } from './routes/players';
import { createGamesRouter } from './routes/games';
import { createHistoryRouter } from './routes/history';
import { createLeaderboardRouter } from './routes/leaderboard';

export interface AppDeps {
  players: PlayerService;
  games: GameService;
  leaderboard: LeaderboardService;
  corsOrigin: string;
  storage: StorageKind;
}

export function createApp(deps: AppDeps) {
  const app = express();
  const auth = requireAuth(deps.players);

  app.use(cors({ origin: deps.corsOrigin }));
  app.use(express.json());

  app.use('/', createHealthRouter(deps.storage));
  app.use('/', createAuthRouter(deps.players, auth));
  app.use('/', createPlayersRouter(deps.players, auth));
  app.use('/', createGamesRouter(deps.games, deps.players, auth));
  app.use('/', createHistoryRouter(deps.games, deps.players));
  app.use('/', createLeaderboardRouter(deps.leaderboard));

  // Body-parser errors (malformed JSON, oversized payloads) carry a status.
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(err);
    const status =
      typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number' ? err.status : 500;
    if (status >= 500) console.error('[server] unhandled error', err);
    return res.status(status).json({ error: status >= 500 ? 'internal_error' : 'invalid_body' });
  });

  return app;
}
