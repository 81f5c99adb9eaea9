import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import type { Queryable } from '../lib/db';

export interface Player {
  id: string;
  username: string;
  passwordHash: string;
  createdAt: number;
}

export interface PlayerPatch {
  username?: string;
  passwordHash?: string;
}

export interface PlayerRepository {
  create(opts: { username: string; passwordHash: string }): Promise<Player>;
  findById(id: string): Promise<Player | null>;
  /** Case-insensitive. */
  findByUsername(username: string): Promise<Player | null>;
  list(limit: number, offset: number): Promise<Player[]>;
  update(id: string, patch: PlayerPatch): Promise<Player | null>;
  delete(id: string): Promise<boolean>;
}

/** Thrown by `create` and `update` when another account already has the name. */
export class DuplicateUsernameError extends Error {
  constructor(username: string) {
    super(`username ${username} already exists`);
    this.name = 'DuplicateUsernameError';
  }
}

const UNIQUE_VIOLATION = '23505';

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === UNIQUE_VIOLATION;
}

const playerRowSchema = z.object({
  id: z.string(),
  username: z.string(),
  password_hash: z.string(),
  created_at: z.date(),
});

function fromRow(raw: unknown): Player {
  const row = playerRowSchema.parse(raw);
  return {
    id: row.id,
    username: row.username,
    passwordHash: row.password_hash,
    createdAt: row.created_at.getTime(),
  };
}

const COLUMNS = 'id, username, password_hash, created_at';

export function createPgPlayerRepository(db: Queryable): PlayerRepository {
  return {
    async create(opts) {
      try {
        const { rows } = await db.query(
          `insert into players (id, username, password_hash)
           values ($1, $2, $3)
           returning ${COLUMNS}`,
          [uuid(), opts.username, opts.passwordHash]
        );
        return fromRow(rows[0]);
      } catch (err) {
        if (isUniqueViolation(err)) throw new DuplicateUsernameError(opts.username);
        throw err;
      }
    },

    async findById(id) {
      const { rows } = await db.query(`select ${COLUMNS} from players where id = $1 limit 1`, [id]);
      return rows.length > 0 ? fromRow(rows[0]) : null;
    },

    async findByUsername(username) {
      const { rows } = await db.query(
        `select ${COLUMNS} from players where lower(username) = lower($1) limit 1`,
        [username]
      );
      return rows.length > 0 ? fromRow(rows[0]) : null;
    },

    async list(limit, offset) {
      const { rows } = await db.query(
        `select ${COLUMNS} from players order by created_at asc, id asc limit $1 offset $2`,
        [limit, offset]
      );
      return rows.map(fromRow);
    },

    async update(id, patch) {
      try {
        const { rows } = await db.query(
          `update players
              set username = coalesce($2, username),
                  password_hash = coalesce($3, password_hash)
            where id = $1
            returning ${COLUMNS}`,
          [id, patch.username ?? null, patch.passwordHash ?? null]
        );
        return rows.length > 0 ? fromRow(rows[0]) : null;
      } catch (err) {
        if (isUniqueViolation(err) && patch.username !== undefined) throw new DuplicateUsernameError(patch.username);
        throw err;
      }
    },

    async delete(id) {
      const { rowCount } = await db.query('delete from players where id = $1', [id]);
      return (rowCount ?? 0) > 0;
    },
  };
}

// In-memory store, used by tests and when Postgres is unreachable at startup
export function createMemoryPlayerRepository(now: () => number = Date.now): PlayerRepository {
  const byId = new Map<string, Player>();
  const byUsername = new Map<string, string>(); // lower(username) -> id

  return {
    async create(opts) {
      const key = opts.username.toLowerCase();
      if (byUsername.has(key)) throw new DuplicateUsernameError(opts.username);
      const player: Player = { id: uuid(), username: opts.username, passwordHash: opts.passwordHash, createdAt: now() };
      byId.set(player.id, player);
      byUsername.set(key, player.id);
      return { ...player };
    },

    async findById(id) {
      const p = byId.get(id);
      return p ? { ...p } : null;
    },

    async findByUsername(username) {
      const id = byUsername.get(username.toLowerCase());
      const p = id ? byId.get(id) : undefined;
      return p ? { ...p } : null;
    },

    async list(limit, offset) {
      return Array.from(byId.values())
        .slice(offset, offset + limit)
        .map((p) => ({ ...p }));
    },

    async update(id, patch) {
      const current = byId.get(id);
      if (!current) return null;
      const next: Player = {
        ...current,
        username: patch.username ?? current.username,
        passwordHash: patch.passwordHash ?? current.passwordHash,
      };
      if (next.username !== current.username) {
        const key = next.username.toLowerCase();
        const owner = byUsername.get(key);
        if (owner !== undefined && owner !== id) throw new DuplicateUsernameError(next.username);
        byUsername.delete(current.username.toLowerCase());
        byUsername.set(key, id);
      }
      byId.set(id, next);
      return { ...next };
    },

    async delete(id) {
      const p = byId.get(id);
      if (!p) return false;
      byId.delete(id);
      byUsername.delete(p.username.toLowerCase());
      return true;
    },
  };
}
