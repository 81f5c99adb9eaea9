import type {
  Board,
  CellRef,
  GameSnapshot,
  GameState,
  Move,
  MoveRejection,
  Opponent,
  OpponentType,
  PlayerMark,
} from '../types/game';
import { countMarks, createBoard, isFull, isOccupied, placeMark, toGrid } from './board';
import { InvariantViolation } from './errors';
import { validateMove } from './moveValidator';
import { evaluate, winningLine } from './winDetector';
import type { MoveStrategy } from './computerPlayer';

export type MoveResult =
  | { ok: true; game: GameState; moves: Move[] }
  | { ok: false; reason: MoveRejection };

export function createGameState(
  id: string,
  xPlayerId: string,
  opponentType: OpponentType,
  now: number = Date.now()
): GameState {
  const opponent: Opponent =
    opponentType === 'computer' ? { kind: 'computer' } : { kind: 'human', playerId: null };
  return {
    id,
    board: createBoard(),
    turn: 'X',
    winner: null,
    complete: false,
    xPlayerId,
    opponent,
    createdAt: now,
    updatedAt: now,
  };
}

export function opponentTypeOf(game: GameState): OpponentType {
  return game.opponent.kind;
}

export function oPlayerIdOf(game: GameState): string | null {
  return game.opponent.kind === 'human' ? game.opponent.playerId : null;
}

// Places one mark that has already been validated, then settles winner/draw/turn.
function advance(
  game: GameState,
  playerId: string | null,
  cell: CellRef,
  mark: PlayerMark,
  now: number
): { game: GameState; move: Move } {
  const board = placeMark(game.board, cell.row, cell.col, mark);
  const { X, O } = countMarks(board);
  const move: Move = {
    gameId: game.id,
    playerId,
    row: cell.row,
    col: cell.col,
    mark,
    moveNumber: X + O,
    createdAt: now,
  };

  const winner = evaluate(board);
  let next: GameState;
  if (winner) {
    next = { ...game, board, winner, complete: true, updatedAt: now };
  } else if (isFull(board)) {
    next = { ...game, board, winner: 'draw', complete: true, updatedAt: now };
  } else {
    next = { ...game, board, turn: mark === 'X' ? 'O' : 'X', updatedAt: now };
  }
  return { game: next, move };
}

/**
 * Runs one move request through the state machine. A rejected request leaves
 * `game` untouched. In a computer game an X move that leaves the game open is
 * answered right away by `strategy`, and both moves come back together.
 */
export function applyMove(
  game: GameState,
  playerId: string,
  row: number,
  col: number,
  strategy: MoveStrategy,
  now: number = Date.now()
): MoveResult {
  const check = validateMove(game, playerId, row, col);
  if (!check.ok) return check;

  const human = advance(game, playerId, { row, col }, check.mark, now);
  const moves = [human.move];
  let current = human.game;

  if (!current.complete && current.opponent.kind === 'computer' && current.turn === 'O') {
    const cell = strategy.selectMove(current.board);
    if (isOccupied(current.board, cell.row, cell.col)) {
      throw new InvariantViolation(`computer picked occupied cell ${cell.row},${cell.col}`);
    }
    const reply = advance(current, null, cell, 'O', now);
    moves.push(reply.move);
    current = reply.game;
  }

  return { ok: true, game: current, moves };
}

export type JoinRejection = 'not_joinable' | 'own_game' | 'game_full';

export type JoinResult = { ok: true; game: GameState } | { ok: false; reason: JoinRejection };

// First come, first served: the first other account to join takes O.
export function joinGameState(game: GameState, playerId: string, now: number = Date.now()): JoinResult {
  if (game.opponent.kind !== 'human') return { ok: false, reason: 'not_joinable' };
  if (game.xPlayerId === playerId) return { ok: false, reason: 'own_game' };
  if (game.opponent.playerId !== null) return { ok: false, reason: 'game_full' };
  return {
    ok: true,
    game: { ...game, opponent: { kind: 'human', playerId }, updatedAt: now },
  };
}

export function replayMoves(moves: readonly Move[]): Board {
  const ordered = moves.slice().sort((a, b) => a.moveNumber - b.moveNumber);
  return ordered.reduce((board, m) => placeMark(board, m.row, m.col, m.mark), createBoard());
}

export function toSnapshot(game: GameState): GameSnapshot {
  const line = winningLine(game.board);
  return {
    id: game.id,
    playerXId: game.xPlayerId,
    playerOId: oPlayerIdOf(game),
    opponentType: opponentTypeOf(game),
    board: toGrid(game.board),
    turn: game.turn,
    winner: game.winner,
    winningLine: line ? line.line : null,
    complete: game.complete,
    createdAt: new Date(game.createdAt).toISOString(),
  };
}
