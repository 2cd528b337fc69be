import { PlayerState } from './PlayerState';

export interface VictoryResult {
  winners: PlayerState[];
  topScore: number;
}

/**
 * Highest score wins. Among tied players, the one(s) with the fewest
 * flipped tiles win; a remaining tie produces several winners.
 */
export function determineWinners(players: readonly PlayerState[]): VictoryResult {
  if (players.length === 0) {
    return { winners: [], topScore: 0 };
  }

  const topScore = Math.max(...players.map((p) => p.score));
  const leaders = players.filter((p) => p.score === topScore);
  if (leaders.length === 1) {
    return { winners: leaders, topScore };
  }

  const fewestFlipped = Math.min(...leaders.map((p) => p.board.countFlippedTiles()));
  return {
    winners: leaders.filter((p) => p.board.countFlippedTiles() === fewestFlipped),
    topScore,
  };
}

/** The match ends once every player has filled their board. */
export function allBoardsFull(players: readonly PlayerState[]): boolean {
  return players.length > 0 && players.every((p) => p.hasFullBoard());
}
