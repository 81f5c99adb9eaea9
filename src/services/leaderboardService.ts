import type Redis from 'ioredis';
import { z } from 'zod';
import type { GameRepository } from '../repositories/gamesRepo';
import type { Player, PlayerRepository } from '../repositories/playersRepo';
import { createKeyedMutex } from '../lib/keyedMutex';

const LEADERBOARD_KEY = 'leaderboard:wins'; // JSON LeaderboardRow[]
const PAGE = 500;

export interface LeaderboardRow {
  playerId: string;
  username: string;
  wins: number;
}

const rowsSchema = z.array(z.object({ playerId: z.string(), username: z.string(), wins: z.number().int() }));

export interface LeaderboardCache {
  get(): Promise<LeaderboardRow[] | null>;
  set(rows: LeaderboardRow[]): Promise<void>;
  clear(): Promise<void>;
}

export function createRedisLeaderboardCache(connect: () => Promise<Redis>, ttlSeconds: number): LeaderboardCache {
  return {
    async get() {
      const r = await connect();
      const raw = await r.get(LEADERBOARD_KEY);
      if (!raw) return null;
      const parsed = rowsSchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : null;
    },
    async set(rows) {
      const r = await connect();
      await r.set(LEADERBOARD_KEY, JSON.stringify(rows), 'EX', ttlSeconds);
    },
    async clear() {
      const r = await connect();
      await r.del(LEADERBOARD_KEY);
    },
  };
}

export interface LeaderboardService {
  getTop(limit: number): Promise<LeaderboardRow[]>;
  /** Drops the cached board; a failing cache is logged, never thrown. */
  invalidate(): Promise<void>;
}

export interface LeaderboardServiceDeps {
  games: GameRepository;
  players: PlayerRepository;
  cache?: LeaderboardCache;
}

async function allPlayers(players: PlayerRepository): Promise<Player[]> {
  const out: Player[] = [];
  for (let offset = 0; ; offset += PAGE) {
    const page = await players.list(PAGE, offset);
    out.push(...page);
    if (page.length < PAGE) return out;
  }
}

/** Every player with their win count, most wins first, then by username. Draws count for nobody. */
export async function computeLeaderboard(games: GameRepository, players: PlayerRepository): Promise<LeaderboardRow[]> {
  const [wins, everyone] = await Promise.all([games.countWins(), allPlayers(players)]);
  const rows = everyone.map((p) => ({ playerId: p.id, username: p.username, wins: wins.get(p.id) ?? 0 }));
  rows.sort((a, b) => b.wins - a.wins || a.username.localeCompare(b.username));
  return rows;
}

export function createLeaderboardService(deps: LeaderboardServiceDeps): LeaderboardService {
  const { games, players, cache } = deps;
  let cacheWarned = false;
  // Bumped by every invalidate. Rows computed under an older version are not cached.
  let version = 0;
  // Cache writes and clears land in call order, so a clear is never overtaken by an older set.
  const writes = createKeyedMutex();

  function warnOnce(err: unknown) {
    if (!cacheWarned) {
      console.warn('[leaderboard] cache unavailable, computing directly:', err instanceof Error ? err.message : err);
      cacheWarned = true;
    }
  }

  return {
    async getTop(limit) {
      const seen = version;
      if (cache) {
        try {
          const cached = await cache.get();
          if (cached) return cached.slice(0, limit);
        } catch (err) {
          warnOnce(err);
        }
      }

      const rows = await computeLeaderboard(games, players);
      if (cache) {
        await writes
          .runExclusive(LEADERBOARD_KEY, async () => {
            if (version === seen) await cache.set(rows);
          })
          .catch(warnOnce);
      }
      return rows.slice(0, limit);
    },

    async invalidate() {
      version++;
      if (!cache) return;
      await writes.runExclusive(LEADERBOARD_KEY, () => cache.clear()).catch(warnOnce);
    },
  };
}
