import { v4 as uuid } from 'uuid';
import type { GameState, Move, MoveRejection, OpponentType } from '../types/game';
import type { GameRepository } from '../repositories/gamesRepo';
import type { MoveStrategy } from '../game/computerPlayer';
import { applyMove, createGameState, joinGameState, type JoinRejection } from '../game/gameSession';
import { createKeyedMutex, type KeyedMutex } from '../lib/keyedMutex';

export interface MoveInput {
  gameId: string;
  playerId: string;
  row: number;
  col: number;
}

export type SubmitMoveResult =
  | { ok: true; game: GameState; moves: Move[] }
  | { ok: false; reason: MoveRejection | 'not_found' };

export type JoinGameResult =
  | { ok: true; game: GameState }
  | { ok: false; reason: JoinRejection | 'not_found' };

export interface GameServiceDeps {
  games: GameRepository;
  strategy: MoveStrategy;
  locks?: KeyedMutex;
  now?: () => number;
  /** Called after a move that finished a game has been stored. Errors are logged, not returned. */
  onGameCompleted?: (game: GameState) => Promise<void>;
}

export interface GameService {
  createGame(playerId: string, opponentType: OpponentType): Promise<GameState>;
  getGame(gameId: string): Promise<GameState | null>;
  /** null when the game does not exist. */
  listMoves(gameId: string): Promise<Move[] | null>;
  joinGame(gameId: string, playerId: string): Promise<JoinGameResult>;
  submitMove(input: MoveInput): Promise<SubmitMoveResult>;
  listRecent(limit: number, offset: number): Promise<GameState[]>;
  listByPlayer(playerId: string, limit: number, offset: number): Promise<GameState[]>;
}

export function createGameService(deps: GameServiceDeps): GameService {
  const { games, strategy } = deps;
  const locks = deps.locks ?? createKeyedMutex();
  const now = deps.now ?? Date.now;

  return {
    async createGame(playerId, opponentType) {
      const game = createGameState(uuid(), playerId, opponentType, now());
      await games.create(game);
      console.log('[games] created', game.id, 'by', playerId, 'vs', opponentType);
      return game;
    },

    getGame(gameId) {
      return games.findById(gameId);
    },

    async listMoves(gameId) {
      const game = await games.findById(gameId);
      if (!game) return null;
      return games.listMoves(gameId);
    },

    joinGame(gameId, playerId) {
      return locks.runExclusive(gameId, async (): Promise<JoinGameResult> => {
        const game = await games.findById(gameId);
        if (!game) return { ok: false, reason: 'not_found' };
        const result = joinGameState(game, playerId, now());
        if (!result.ok) return result;
        await games.persist(result.game, []);
        console.log('[games] joined', gameId, 'by', playerId);
        return result;
      });
    },

    // Load, apply and persist run under the game's lock so two requests can
    // never both pass the turn check against the same snapshot.
    submitMove(input) {
      return locks.runExclusive(input.gameId, async (): Promise<SubmitMoveResult> => {
        const game = await games.findById(input.gameId);
        if (!game) return { ok: false, reason: 'not_found' };

        const result = applyMove(game, input.playerId, input.row, input.col, strategy, now());
        if (!result.ok) return result;

        await games.persist(result.game, result.moves);
        if (result.game.complete) {
          console.log('[games] finished', result.game.id, 'winner', result.game.winner);
          if (deps.onGameCompleted) {
            // the move is already committed; the reply must say so
            await deps.onGameCompleted(result.game).catch((err: unknown) => {
              console.error('[games] completion hook failed', result.game.id, err);
            });
          }
        }
        return result;
      });
    },

    listRecent(limit, offset) {
      return games.listRecent(limit, offset);
    },

    listByPlayer(playerId, limit, offset) {
      return games.listByPlayer(playerId, limit, offset);
    },
  };
}
