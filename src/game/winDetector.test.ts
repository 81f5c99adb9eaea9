import { evaluate, isDraw, winningLine } from './winDetector';
import { createBoard, emptyCells, placeMark } from './board';
import { boardOf } from '../test/boards';
import type { Board, PlayerMark } from '../types/game';

describe('winDetector', () => {
  test('empty board has no winner and is not a draw', () => {
    expect(evaluate(createBoard())).toBeNull();
    expect(isDraw(createBoard())).toBe(false);
  });

  test('detects a row', () => {
    const board = boardOf('XXX', 'OO.', '...');
    expect(evaluate(board)).toBe('X');
    expect(winningLine(board)).toEqual({
      mark: 'X',
      line: [
        { row: 0, col: 0 },
        { row: 0, col: 1 },
        { row: 0, col: 2 },
      ],
    });
  });

  test('detects a column', () => {
    expect(evaluate(boardOf('XO.', 'XO.', '.OX'))).toBe('O');
  });

  test('detects both diagonals', () => {
    expect(evaluate(boardOf('XO.', 'OX.', '..X'))).toBe('X');
    expect(winningLine(boardOf('X.O', 'XO.', 'O.X'))?.line).toEqual([
      { row: 0, col: 2 },
      { row: 1, col: 1 },
      { row: 2, col: 0 },
    ]);
  });

  test('a win on the last cell is not a draw', () => {
    const board = boardOf('XOX', 'OXO', 'OXX');
    expect(evaluate(board)).toBe('X');
    expect(isDraw(board)).toBe(false);
  });

  test('full board without a line is a draw', () => {
    const board = boardOf('XOX', 'XOO', 'OXX');
    expect(evaluate(board)).toBeNull();
    expect(isDraw(board)).toBe(true);
  });

  test('no reachable board has lines for both marks', () => {
    const onlyMark = (board: Board, mark: PlayerMark): Board =>
      board.map((r) => r.map((c) => (c === mark ? c : null)));

    // Walk every legal game from the empty board, stopping at wins.
    let visited = 0;
    let doubleWins = 0;
    const walk = (board: Board, turn: PlayerMark) => {
      visited++;
      const xLine = evaluate(onlyMark(board, 'X')) === 'X';
      const oLine = evaluate(onlyMark(board, 'O')) === 'O';
      if (xLine && oLine) doubleWins++;
      if (xLine || oLine) return;
      for (const { row, col } of emptyCells(board)) {
        walk(placeMark(board, row, col, turn), turn === 'X' ? 'O' : 'X');
      }
    };
    walk(createBoard(), 'X');

    expect(visited).toBe(549946);
    expect(doubleWins).toBe(0);
  }, 30000);
});
