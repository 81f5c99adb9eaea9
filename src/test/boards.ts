import type { Board, Cell } from '../types/game';

// Builds a board from three rows like 'XO.', '.X.', 'O..'.
export function boardOf(...rows: [string, string, string]): Board {
  return rows.map((r) =>
    r.split('').map((ch): Cell => (ch === 'X' ? 'X' : ch === 'O' ? 'O' : null))
  );
}
