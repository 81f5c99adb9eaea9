import type { GameState, GameWinner } from '../types/game';
import type { PlayerService } from '../services/playerService';

export interface GameSummary {
  id: string;
  playerX: string;
  playerO: string;
  winner: GameWinner;
  complete: boolean;
  createdAt: string;
}

/** List rows with usernames in place of ids. The O side reads Computer or Pending when no account holds it. */
export async function summarizeGames(games: GameState[], players: PlayerService): Promise<GameSummary[]> {
  const ids = new Set<string>();
  for (const g of games) {
    ids.add(g.xPlayerId);
    if (g.opponent.kind === 'human' && g.opponent.playerId) ids.add(g.opponent.playerId);
  }
  const names = new Map<string, string>();
  await Promise.all(
    Array.from(ids).map(async (id) => {
      const p = await players.get(id);
      if (p) names.set(id, p.username);
    })
  );

  return games.map((g) => {
    let playerO: string;
    if (g.opponent.kind === 'computer') playerO = 'Computer';
    else if (g.opponent.playerId === null) playerO = 'Pending';
    else playerO = names.get(g.opponent.playerId) ?? 'Unknown';
    return {
      id: g.id,
      playerX: names.get(g.xPlayerId) ?? 'Unknown',
      playerO,
      winner: g.winner,
      complete: g.complete,
      createdAt: new Date(g.createdAt).toISOString(),
    };
  });
}
