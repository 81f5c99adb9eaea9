import type { Board, CellRef } from '../types/game';
import { emptyCells } from './board';
import { InvariantViolation } from './errors';

export interface MoveStrategy {
  selectMove(board: Board): CellRef;
}

/** Uniform pick among the empty cells. Not meant to play well. */
export function createRandomStrategy(random: () => number = Math.random): MoveStrategy {
  return {
    selectMove(board) {
      const cells = emptyCells(board);
      if (cells.length === 0) {
        throw new InvariantViolation('computer asked to move on a full board');
      }
      const idx = Math.min(cells.length - 1, Math.floor(random() * cells.length));
      return cells[idx];
    },
  };
}
