import { z } from 'zod';
import type { Board, GameState, Move, Opponent } from '../types/game';
import { oPlayerIdOf } from '../game/gameSession';
import type { Database, Queryable } from '../lib/db';

export interface GameRepository {
  create(game: GameState): Promise<void>;
  findById(id: string): Promise<GameState | null>;
  /**
   * Saves the game row and appends `moves` as one unit: either all of it is
   * stored or none of it is, and the promise rejects.
   */
  persist(game: GameState, moves: readonly Move[]): Promise<void>;
  listMoves(gameId: string): Promise<Move[]>;
  /** Newest first. */
  listRecent(limit: number, offset: number): Promise<GameState[]>;
  /** Games where the player is X or joined O, newest first. */
  listByPlayer(playerId: string, limit: number, offset: number): Promise<GameState[]>;
  /** playerId -> games won. Players without a win are absent. */
  countWins(): Promise<Map<string, number>>;
  hasGamesForPlayer(playerId: string): Promise<boolean>;
}

const markSchema = z.enum(['X', 'O']);
const boardSchema = z.array(z.array(markSchema.nullable()).length(3)).length(3);

const gameRowSchema = z.object({
  id: z.string(),
  x_player_id: z.string(),
  o_player_id: z.string().nullable(),
  opponent_type: z.enum(['human', 'computer']),
  board: boardSchema,
  turn: markSchema,
  winner: z.enum(['X', 'O', 'draw']).nullable(),
  complete: z.boolean(),
  created_at: z.date(),
  updated_at: z.date(),
});

const moveRowSchema = z.object({
  game_id: z.string(),
  player_id: z.string().nullable(),
  row_index: z.number().int(),
  col_index: z.number().int(),
  mark: markSchema,
  move_number: z.number().int(),
  created_at: z.date(),
});

const winsRowSchema = z.object({ player_id: z.string(), wins: z.number().int() });

/** Maps a `games` row to a GameState; throws a ZodError for a row that is not one. */
export function fromGameRow(raw: unknown): GameState {
  const row = gameRowSchema.parse(raw);
  const opponent: Opponent =
    row.opponent_type === 'computer' ? { kind: 'computer' } : { kind: 'human', playerId: row.o_player_id };
  const board: Board = row.board;
  return {
    id: row.id,
    board,
    turn: row.turn,
    winner: row.winner,
    complete: row.complete,
    xPlayerId: row.x_player_id,
    opponent,
    createdAt: row.created_at.getTime(),
    updatedAt: row.updated_at.getTime(),
  };
}

function fromMoveRow(raw: unknown): Move {
  const row = moveRowSchema.parse(raw);
  return {
    gameId: row.game_id,
    playerId: row.player_id,
    row: row.row_index,
    col: row.col_index,
    mark: row.mark,
    moveNumber: row.move_number,
    createdAt: row.created_at.getTime(),
  };
}

const GAME_COLUMNS = `id, x_player_id, o_player_id, opponent_type, board, turn, winner, complete, created_at, updated_at`;

async function inTransaction<T>(db: Database, work: (client: Queryable) => Promise<T>): Promise<T> {
  const client = await db.connect();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
      console.error('[db] rollback failed', rollbackErr);
    });
    throw err;
  } finally {
    client.release();
  }
}

export function createPgGameRepository(db: Database): GameRepository {
  return {
    async create(game) {
      await db.query(
        `insert into games (id, x_player_id, o_player_id, opponent_type, board, turn, winner, complete, created_at, updated_at)
         values ($1, $2, $3, $4, $5, $6, $7, $8, to_timestamp($9 / 1000.0), to_timestamp($10 / 1000.0))`,
        [
          game.id,
          game.xPlayerId,
          oPlayerIdOf(game),
          game.opponent.kind,
          JSON.stringify(game.board),
          game.turn,
          game.winner,
          game.complete,
          game.createdAt,
          game.updatedAt,
        ]
      );
    },

    async findById(id) {
      const { rows } = await db.query(`select ${GAME_COLUMNS} from games where id = $1 limit 1`, [id]);
      return rows.length > 0 ? fromGameRow(rows[0]) : null;
    },

    async persist(game, moves) {
      await inTransaction(db, async (client) => {
        const { rowCount } = await client.query(
          `update games
              set o_player_id = $2,
                  board = $3,
                  turn = $4,
                  winner = $5,
                  complete = $6,
                  updated_at = to_timestamp($7 / 1000.0)
            where id = $1`,
          [game.id, oPlayerIdOf(game), JSON.stringify(game.board), game.turn, game.winner, game.complete, game.updatedAt]
        );
        if (rowCount !== 1) throw new Error(`game ${game.id} does not exist`);

        for (const m of moves) {
          await client.query(
            `insert into moves (game_id, player_id, row_index, col_index, mark, move_number, created_at)
             values ($1, $2, $3, $4, $5, $6, to_timestamp($7 / 1000.0))`,
            [m.gameId, m.playerId, m.row, m.col, m.mark, m.moveNumber, m.createdAt]
          );
        }
      });
    },

    async listMoves(gameId) {
      const { rows } = await db.query(
        `select game_id, player_id, row_index, col_index, mark, move_number, created_at
           from moves
          where game_id = $1
          order by move_number asc`,
        [gameId]
      );
      return rows.map(fromMoveRow);
    },

    async listRecent(limit, offset) {
      const { rows } = await db.query(
        `select ${GAME_COLUMNS} from games order by created_at desc, id asc limit $1 offset $2`,
        [limit, offset]
      );
      return rows.map(fromGameRow);
    },

    async listByPlayer(playerId, limit, offset) {
      const { rows } = await db.query(
        `select ${GAME_COLUMNS}
           from games
          where x_player_id = $1 or o_player_id = $1
          order by created_at desc, id asc
          limit $2 offset $3`,
        [playerId, limit, offset]
      );
      return rows.map(fromGameRow);
    },

    async countWins() {
      const { rows } = await db.query(
        `select player_id, count(*)::int as wins
           from (
             select x_player_id as player_id from games where winner = 'X'
             union all
             select o_player_id as player_id from games where winner = 'O' and o_player_id is not null
           ) w
          group by player_id`
      );
      return new Map(
        rows.map((raw): [string, number] => {
          const r = winsRowSchema.parse(raw);
          return [r.player_id, r.wins];
        })
      );
    },

    async hasGamesForPlayer(playerId) {
      const { rows } = await db.query(
        `select exists(select 1 from games where x_player_id = $1 or o_player_id = $1) as found`,
        [playerId]
      );
      return z.object({ found: z.boolean() }).parse(rows[0]).found;
    },
  };
}

function cloneGame(game: GameState): GameState {
  return { ...game, board: game.board.map((r) => r.slice()), opponent: { ...game.opponent } };
}

// In-memory store, used by tests and when Postgres is unreachable at startup
export function createMemoryGameRepository(): GameRepository {
  const games = new Map<string, { game: GameState; seq: number }>();
  const movesByGame = new Map<string, Move[]>();
  let seq = 0;

  function newestFirst(list: { game: GameState; seq: number }[]) {
    return list.sort((a, b) => b.game.createdAt - a.game.createdAt || b.seq - a.seq);
  }

  return {
    async create(game) {
      if (games.has(game.id)) throw new Error(`game ${game.id} already exists`);
      games.set(game.id, { game: cloneGame(game), seq: seq++ });
      movesByGame.set(game.id, []);
    },

    async findById(id) {
      const entry = games.get(id);
      return entry ? cloneGame(entry.game) : null;
    },

    async persist(game, moves) {
      const entry = games.get(game.id);
      const log = movesByGame.get(game.id);
      if (!entry || !log) throw new Error(`game ${game.id} does not exist`);

      // Same guarantee the moves table gets from unique (game_id, move_number)
      let expected = log.length + 1;
      for (const m of moves) {
        if (m.gameId !== game.id || m.moveNumber !== expected) {
          throw new Error(`move ${m.moveNumber} out of sequence for game ${game.id}`);
        }
        expected++;
      }

      games.set(game.id, { game: cloneGame(game), seq: entry.seq });
      log.push(...moves.map((m) => ({ ...m })));
    },

    async listMoves(gameId) {
      return (movesByGame.get(gameId) ?? []).map((m) => ({ ...m }));
    },

    async listRecent(limit, offset) {
      return newestFirst(Array.from(games.values()))
        .slice(offset, offset + limit)
        .map((e) => cloneGame(e.game));
    },

    async listByPlayer(playerId, limit, offset) {
      const mine = Array.from(games.values()).filter(
        (e) => e.game.xPlayerId === playerId || oPlayerIdOf(e.game) === playerId
      );
      return newestFirst(mine)
        .slice(offset, offset + limit)
        .map((e) => cloneGame(e.game));
    },

    async countWins() {
      const wins = new Map<string, number>();
      for (const { game } of games.values()) {
        const winnerId = game.winner === 'X' ? game.xPlayerId : game.winner === 'O' ? oPlayerIdOf(game) : null;
        if (winnerId) wins.set(winnerId, (wins.get(winnerId) ?? 0) + 1);
      }
      return wins;
    },

    async hasGamesForPlayer(playerId) {
      for (const { game } of games.values()) {
        if (game.xPlayerId === playerId || oPlayerIdOf(game) === playerId) return true;
      }
      return false;
    },
  };
}
