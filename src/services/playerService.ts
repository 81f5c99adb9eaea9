import bcrypt from 'bcryptjs';
import { DuplicateUsernameError, type Player, type PlayerRepository } from '../repositories/playersRepo';
import type { GameRepository } from '../repositories/gamesRepo';
import type { TokenService } from '../lib/jwt';

export interface PublicPlayer {
  id: string;
  username: string;
  createdAt: string;
}

export function toPublicPlayer(p: Player): PublicPlayer {
  return { id: p.id, username: p.username, createdAt: new Date(p.createdAt).toISOString() };
}

export type RegisterResult = { ok: true; player: Player; token: string } | { ok: false; reason: 'username_taken' };
export type LoginResult = { ok: true; player: Player; token: string } | { ok: false; reason: 'invalid_credentials' };
export type UpdateResult = { ok: true; player: Player } | { ok: false; reason: 'not_found' | 'username_taken' };
export type DeleteResult = { ok: true } | { ok: false; reason: 'not_found' | 'player_has_games' };

export interface PlayerService {
  register(username: string, password: string): Promise<RegisterResult>;
  login(username: string, password: string): Promise<LoginResult>;
  /** Resolves a bearer token to a live account, or null. */
  authenticate(token: string): Promise<Player | null>;
  get(id: string): Promise<Player | null>;
  list(limit: number, offset: number): Promise<Player[]>;
  update(id: string, patch: { username?: string; password?: string }): Promise<UpdateResult>;
  remove(id: string): Promise<DeleteResult>;
}

export interface PlayerServiceDeps {
  players: PlayerRepository;
  games: GameRepository;
  tokens: TokenService;
  bcryptRounds: number;
}

export function createPlayerService(deps: PlayerServiceDeps): PlayerService {
  const { players, games, tokens, bcryptRounds } = deps;

  async function hash(password: string) {
    const salt = await bcrypt.genSalt(bcryptRounds);
    return bcrypt.hash(password, salt);
  }

  function issue(p: Player) {
    return tokens.sign({ sub: p.id, username: p.username });
  }

  return {
    async register(username, password) {
      const existing = await players.findByUsername(username);
      if (existing) return { ok: false, reason: 'username_taken' };
      let player: Player;
      try {
        player = await players.create({ username, passwordHash: await hash(password) });
      } catch (err) {
        // lost a race with another registration for the same name
        if (err instanceof DuplicateUsernameError) return { ok: false, reason: 'username_taken' };
        throw err;
      }
      console.log('[players] registered', player.id, player.username);
      return { ok: true, player, token: issue(player) };
    },

    async login(username, password) {
      const player = await players.findByUsername(username);
      if (!player) return { ok: false, reason: 'invalid_credentials' };
      const ok = await bcrypt.compare(password, player.passwordHash);
      if (!ok) return { ok: false, reason: 'invalid_credentials' };
      return { ok: true, player, token: issue(player) };
    },

    async authenticate(token) {
      const payload = tokens.verify(token);
      if (!payload) return null;
      return players.findById(payload.sub);
    },

    get(id) {
      return players.findById(id);
    },

    list(limit, offset) {
      return players.list(limit, offset);
    },

    async update(id, patch) {
      const current = await players.findById(id);
      if (!current) return { ok: false, reason: 'not_found' };
      if (patch.username && patch.username.toLowerCase() !== current.username.toLowerCase()) {
        const taken = await players.findByUsername(patch.username);
        if (taken) return { ok: false, reason: 'username_taken' };
      }
      let player: Player | null;
      try {
        player = await players.update(id, {
          username: patch.username,
          passwordHash: patch.password ? await hash(patch.password) : undefined,
        });
      } catch (err) {
        if (err instanceof DuplicateUsernameError) return { ok: false, reason: 'username_taken' };
        throw err;
      }
      if (!player) return { ok: false, reason: 'not_found' };
      return { ok: true, player };
    },

    async remove(id) {
      if (await games.hasGamesForPlayer(id)) return { ok: false, reason: 'player_has_games' };
      const deleted = await players.delete(id);
      if (!deleted) return { ok: false, reason: 'not_found' };
      console.log('[players] deleted', id);
      return { ok: true };
    },
  };
}
