import http from 'http';
import { env } from './config/env';
import { createApp } from './app';
import { openDb, closeDb } from './lib/db';
import { ensureSchema } from './lib/schema';
import { ensureRedis, closeRedis } from './lib/redis';
import { createTokenService } from './lib/jwt';
import { createMemoryGameRepository, createPgGameRepository, type GameRepository } from './repositories/gamesRepo';
import { createMemoryPlayerRepository, createPgPlayerRepository, type PlayerRepository } from './repositories/playersRepo';
import { createGameService } from './services/gameService';
import { createPlayerService } from './services/playerService';
import { createLeaderboardService, createRedisLeaderboardCache } from './services/leaderboardService';
import { createRandomStrategy } from './game/computerPlayer';
import type { StorageKind } from './routes/health';

async function openStorage(): Promise<{ games: GameRepository; players: PlayerRepository; storage: StorageKind }> {
  try {
    const db = await openDb(env.databaseUrl);
    await ensureSchema(db);
    return { games: createPgGameRepository(db), players: createPgPlayerRepository(db), storage: 'postgres' };
  } catch (err) {
    if (env.nodeEnv === 'production') throw err;
    console.warn('[db] unavailable, using in-memory storage:', err instanceof Error ? err.message : err);
    return { games: createMemoryGameRepository(), players: createMemoryPlayerRepository(), storage: 'memory' };
  }
}

async function start() {
  const { games, players, storage } = await openStorage();

  const leaderboard = createLeaderboardService({
    games,
    players,
    cache: createRedisLeaderboardCache(() => ensureRedis(env.redisUrl), env.leaderboardCacheSeconds),
  });
  const gameService = createGameService({
    games,
    strategy: createRandomStrategy(),
    onGameCompleted: () => leaderboard.invalidate(),
  });
  const playerService = createPlayerService({
    players,
    games,
    tokens: createTokenService(env.jwtSecret, env.jwtExpiresInSeconds),
    bcryptRounds: env.bcryptRounds,
  });

  const app = createApp({
    players: playerService,
    games: gameService,
    leaderboard,
    corsOrigin: env.corsOrigin,
    storage,
  });
  const server = http.createServer(app);

  const shutdown = () => {
    console.log('[server] shutting down');
    server.close(() => {
      Promise.all([closeDb(), closeRedis()])
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          console.error('[server] shutdown failed', err);
          process.exit(1);
        });
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  server.listen(env.port, () => {
    console.log(`[server] listening on http://localhost:${env.port} (${storage} storage)`);
  });
}

start().catch((err: unknown) => {
  console.error('[server] failed to start', err);
  process.exit(1);
});
