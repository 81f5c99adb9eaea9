import type { GameState, MoveRejection, PlayerMark } from '../types/game';
import { inBounds, isOccupied } from './board';

export type MoveCheck =
  | { ok: true; mark: PlayerMark }
  | { ok: false; reason: MoveRejection };

export function resolveMark(game: GameState, playerId: string): PlayerMark | null {
  if (playerId === game.xPlayerId) return 'X';
  if (game.opponent.kind === 'computer') return 'O';
  if (game.opponent.playerId !== null && game.opponent.playerId === playerId) return 'O';
  return null;
}

/**
 * Checks whether `playerId` may place a mark at (row, col). The first failing
 * check decides the reason: finished game, bounds, participation, turn, then
 * occupancy.
 */
export function validateMove(game: GameState, playerId: string, row: number, col: number): MoveCheck {
  if (game.complete) return { ok: false, reason: 'game_finished' };
  if (!inBounds(row, col)) return { ok: false, reason: 'out_of_bounds' };

  const mark = resolveMark(game, playerId);
  if (!mark) return { ok: false, reason: 'not_participant' };
  if (mark !== game.turn) return { ok: false, reason: 'not_your_turn' };
  if (isOccupied(game.board, row, col)) return { ok: false, reason: 'cell_occupied' };

  return { ok: true, mark };
}
