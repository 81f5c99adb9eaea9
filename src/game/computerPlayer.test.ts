import { createRandomStrategy } from './computerPlayer';
import { InvariantViolation } from './errors';
import { boardOf } from '../test/boards';

describe('createRandomStrategy', () => {
  const board = boardOf('XO.', '.X.', 'O..');
  // empty cells in order: (0,2) (1,0) (1,2) (2,1) (2,2)

  test('maps the random draw onto the empty cells', () => {
    expect(createRandomStrategy(() => 0).selectMove(board)).toEqual({ row: 0, col: 2 });
    expect(createRandomStrategy(() => 0.5).selectMove(board)).toEqual({ row: 1, col: 2 });
    expect(createRandomStrategy(() => 0.999).selectMove(board)).toEqual({ row: 2, col: 2 });
  });

  test('never picks an occupied cell', () => {
    const strategy = createRandomStrategy();
    for (let i = 0; i < 200; i++) {
      const { row, col } = strategy.selectMove(board);
      expect(board[row][col]).toBeNull();
    }
  });

  test('clamps a random source that returns 1', () => {
    expect(createRandomStrategy(() => 1).selectMove(board)).toEqual({ row: 2, col: 2 });
  });

  test('refuses to move on a full board', () => {
    const full = boardOf('XOX', 'XOO', 'OXX');
    expect(() => createRandomStrategy().selectMove(full)).toThrow(InvariantViolation);
  });
});
