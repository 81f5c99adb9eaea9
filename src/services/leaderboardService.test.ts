import { computeLeaderboard, createLeaderboardService, type LeaderboardCache, type LeaderboardRow } from './leaderboardService';
import { createMemoryGameRepository, type GameRepository } from '../repositories/gamesRepo';
import { createMemoryPlayerRepository, type PlayerRepository } from '../repositories/playersRepo';
import { createGameService } from './gameService';
import { createRandomStrategy } from '../game/computerPlayer';

class MemoryCache implements LeaderboardCache {
  stored: LeaderboardRow[] | null = null;

  async get() {
    return this.stored;
  }

  async set(rows: LeaderboardRow[]) {
    this.stored = rows;
  }

  async clear() {
    this.stored = null;
  }
}

describe('leaderboard', () => {
  let games: GameRepository;
  let players: PlayerRepository;
  let ids: Record<'alice' | 'bob' | 'carol', string>;

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    games = createMemoryGameRepository();
    players = createMemoryPlayerRepository();
    const alice = await players.create({ username: 'alice', passwordHash: 'x' });
    const bob = await players.create({ username: 'bob', passwordHash: 'x' });
    const carol = await players.create({ username: 'carol', passwordHash: 'x' });
    ids = { alice: alice.id, bob: bob.id, carol: carol.id };

    const svc = createGameService({ games, strategy: createRandomStrategy(() => 0) });

    // bob beats alice twice, once as X and once as joined O
    for (const [x, o, moves] of [
      ['bob', 'alice', [[0, 0], [1, 0], [0, 1], [1, 1], [0, 2]]],
      ['alice', 'bob', [[0, 0], [1, 0], [0, 1], [1, 1], [2, 2], [1, 2]]],
    ] as const) {
      const game = await svc.createGame(ids[x], 'human');
      await svc.joinGame(game.id, ids[o]);
      for (let i = 0; i < moves.length; i++) {
        const [row, col] = moves[i];
        await svc.submitMove({ gameId: game.id, playerId: ids[i % 2 === 0 ? x : o], row, col });
      }
    }

    // a draw counts for nobody
    const draw = await svc.createGame(ids.carol, 'human');
    await svc.joinGame(draw.id, ids.alice);
    const drawMoves = [[0, 0], [0, 1], [0, 2], [1, 1], [1, 0], [1, 2], [2, 1], [2, 0], [2, 2]];
    for (let i = 0; i < drawMoves.length; i++) {
      const [row, col] = drawMoves[i];
      await svc.submitMove({ gameId: draw.id, playerId: i % 2 === 0 ? ids.carol : ids.alice, row, col });
    }
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('ranks everyone by wins, then username', async () => {
    expect(await computeLeaderboard(games, players)).toEqual([
      { playerId: ids.bob, username: 'bob', wins: 2 },
      { playerId: ids.alice, username: 'alice', wins: 0 },
      { playerId: ids.carol, username: 'carol', wins: 0 },
    ]);
  });

  test('getTop honours the limit and fills the cache', async () => {
    const cache = new MemoryCache();
    const svc = createLeaderboardService({ games, players, cache });
    expect((await svc.getTop(1)).map((r) => r.username)).toEqual(['bob']);
    expect(cache.stored?.map((r) => r.username)).toEqual(['bob', 'alice', 'carol']);
  });

  test('getTop serves cached rows until invalidated', async () => {
    const cache = new MemoryCache();
    cache.stored = [{ playerId: 'p', username: 'cached', wins: 9 }];
    const svc = createLeaderboardService({ games, players, cache });
    expect(await svc.getTop(10)).toEqual([{ playerId: 'p', username: 'cached', wins: 9 }]);

    await svc.invalidate();
    expect((await svc.getTop(10))[0].username).toBe('bob');
  });

  test('rows computed before an invalidate are not cached', async () => {
    const cache = new MemoryCache();
    const svc = createLeaderboardService({ games, players, cache });

    const pending = svc.getTop(10);
    await svc.invalidate();

    expect((await pending).map((r) => r.username)).toEqual(['bob', 'alice', 'carol']);
    expect(cache.stored).toBeNull();
  });

  test('a slow cache write cannot outlive the invalidate of a game that finished meanwhile', async () => {
    const cache = new MemoryCache();
    let releaseSet: () => void = () => undefined;
    const setGate = new Promise<void>((resolve) => {
      releaseSet = resolve;
    });
    let markSetStarted: () => void = () => undefined;
    const setStarted = new Promise<void>((resolve) => {
      markSetStarted = resolve;
    });
    const slow: LeaderboardCache = {
      get: () => cache.get(),
      set: async (rows) => {
        markSetStarted();
        await setGate;
        await cache.set(rows);
      },
      clear: () => cache.clear(),
    };
    const board = createLeaderboardService({ games, players, cache: slow });
    const svc = createGameService({
      games,
      strategy: createRandomStrategy(() => 0),
      onGameCompleted: () => board.invalidate(),
    });

    const pending = board.getTop(10);
    await setStarted;

    // alice fills the bottom row while the computer takes (0,0) and (0,1)
    const game = await svc.createGame(ids.alice, 'computer');
    await svc.submitMove({ gameId: game.id, playerId: ids.alice, row: 2, col: 0 });
    await svc.submitMove({ gameId: game.id, playerId: ids.alice, row: 2, col: 1 });
    const winning = svc.submitMove({ gameId: game.id, playerId: ids.alice, row: 2, col: 2 });

    releaseSet();
    expect((await pending).find((r) => r.username === 'alice')?.wins).toBe(0);
    expect(await winning).toMatchObject({ ok: true, game: { winner: 'X' } });

    expect(cache.stored).toBeNull();
    expect((await board.getTop(10)).find((r) => r.username === 'alice')?.wins).toBe(1);
  });

  test('a broken cache falls back to computing and warns once', async () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const broken: LeaderboardCache = {
      get: async () => {
        throw new Error('redis down');
      },
      set: async () => {
        throw new Error('redis down');
      },
      clear: async () => {
        throw new Error('redis down');
      },
    };
    const svc = createLeaderboardService({ games, players, cache: broken });

    expect((await svc.getTop(10)).map((r) => r.wins)).toEqual([2, 0, 0]);
    await svc.invalidate();
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
