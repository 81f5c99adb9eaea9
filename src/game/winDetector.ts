import type { Board, CellRef, PlayerMark } from '../types/game';
import { isFull } from './board';

const LINES: CellRef[][] = [
  // rows
  [{ row: 0, col: 0 }, { row: 0, col: 1 }, { row: 0, col: 2 }],
  [{ row: 1, col: 0 }, { row: 1, col: 1 }, { row: 1, col: 2 }],
  [{ row: 2, col: 0 }, { row: 2, col: 1 }, { row: 2, col: 2 }],
  // columns
  [{ row: 0, col: 0 }, { row: 1, col: 0 }, { row: 2, col: 0 }],
  [{ row: 0, col: 1 }, { row: 1, col: 1 }, { row: 2, col: 1 }],
  [{ row: 0, col: 2 }, { row: 1, col: 2 }, { row: 2, col: 2 }],
  // diagonals
  [{ row: 0, col: 0 }, { row: 1, col: 1 }, { row: 2, col: 2 }],
  [{ row: 0, col: 2 }, { row: 1, col: 1 }, { row: 2, col: 0 }],
];

const MARKS: PlayerMark[] = ['X', 'O'];

export function winningLine(board: Board): { mark: PlayerMark; line: CellRef[] } | null {
  for (const mark of MARKS) {
    for (const line of LINES) {
      if (line.every(({ row, col }) => board[row][col] === mark)) {
        return { mark, line };
      }
    }
  }
  return null;
}

export function evaluate(board: Board): PlayerMark | null {
  return winningLine(board)?.mark ?? null;
}

export function isDraw(board: Board): boolean {
  return isFull(board) && evaluate(board) === null;
}
