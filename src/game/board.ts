import type { Board, Cell, CellRef, PlayerMark } from '../types/game';
import { InvariantViolation } from './errors';

export const BOARD_SIZE = 3;

export function createBoard(): Board {
  return Array.from({ length: BOARD_SIZE }, () => Array<Cell>(BOARD_SIZE).fill(null));
}

export function inBounds(row: number, col: number): boolean {
  return (
    Number.isInteger(row) &&
    Number.isInteger(col) &&
    row >= 0 &&
    col >= 0 &&
    row < BOARD_SIZE &&
    col < BOARD_SIZE
  );
}

function assertInBounds(row: number, col: number) {
  if (!inBounds(row, col)) {
    throw new InvariantViolation(`cell (${row}, ${col}) is off the board`);
  }
}

export function getCell(board: Board, row: number, col: number): Cell {
  assertInBounds(row, col);
  return board[row][col];
}

export function isOccupied(board: Board, row: number, col: number): boolean {
  return getCell(board, row, col) !== null;
}

// Occupancy is the validator's job; this only writes.
export function placeMark(board: Board, row: number, col: number, mark: PlayerMark): Board {
  assertInBounds(row, col);
  const next = board.map((r) => r.slice());
  next[row][col] = mark;
  return next;
}

export function isFull(board: Board): boolean {
  return board.every((r) => r.every((c) => c !== null));
}

export function emptyCells(board: Board): CellRef[] {
  const out: CellRef[] = [];
  for (let row = 0; row < BOARD_SIZE; row++) {
    for (let col = 0; col < BOARD_SIZE; col++) {
      if (board[row][col] === null) out.push({ row, col });
    }
  }
  return out;
}

export function countMarks(board: Board): { X: number; O: number } {
  let X = 0;
  let O = 0;
  for (const r of board) {
    for (const c of r) {
      if (c === 'X') X++;
      else if (c === 'O') O++;
    }
  }
  return { X, O };
}

export function toGrid(board: Board): Cell[][] {
  return board.map((r) => r.slice());
}
