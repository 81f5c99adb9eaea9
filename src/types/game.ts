export type PlayerMark = 'X' | 'O';

export type Cell = PlayerMark | null;

/** 3x3 grid indexed as board[row][col]. */
export type Board = readonly (readonly Cell[])[];

export interface CellRef {
  row: number;
  col: number;
}

export type OpponentType = 'human' | 'computer';

// O side of a game. A human opponent without playerId is still pending a join.
export type Opponent =
  | { kind: 'human'; playerId: string | null }
  | { kind: 'computer' };

export type GameWinner = PlayerMark | 'draw' | null;

export interface GameState {
  id: string;
  board: Board;
  turn: PlayerMark;
  winner: GameWinner;
  complete: boolean;
  xPlayerId: string;
  opponent: Opponent;
  createdAt: number;
  updatedAt: number;
}

export interface Move {
  gameId: string;
  playerId: string | null; // null = computer
  row: number;
  col: number;
  mark: PlayerMark;
  moveNumber: number; // occupied cells after the move, from 1
  createdAt: number;
}

export type MoveRejection =
  | 'game_finished'
  | 'out_of_bounds'
  | 'not_participant'
  | 'not_your_turn'
  | 'cell_occupied';

export interface GameSnapshot {
  id: string;
  playerXId: string;
  playerOId: string | null;
  opponentType: OpponentType;
  board: Cell[][];
  turn: PlayerMark;
  winner: GameWinner;
  winningLine: CellRef[] | null;
  complete: boolean;
  createdAt: string;
}
