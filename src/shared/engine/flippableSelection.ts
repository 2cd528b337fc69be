import { Position } from '../types/game';
import {
  NeighborCounter,
  countDiagonalNeighbors,
  countOrthogonalNeighbors,
  isPureDiagonal,
  manhattanDistance,
  toKeySet,
} from './geometry';

/**
 * Positions whose tiles may be flipped when `combo` is settled.
 *
 * - Pure-diagonal clusters count diagonal neighbours, mixed clusters count
 *   orthogonal ones.
 * - A five-tile clean chain yields only its geometric centre.
 * - Odd size: the single member with the highest count.
 * - Even size, pure-diagonal: the two members with the highest counts.
 * - Even size, mixed: every member with at least two orthogonal neighbours.
 *
 * Ties go to the member that comes first in `combo`.
 */
export function getFlippablePositions(combo: readonly Position[]): Position[] {
  if (combo.length <= 2) {
    return [];
  }

  const members = toKeySet(combo);
  const pureDiagonal = isPureDiagonal(combo, members);
  const countNeighbors: NeighborCounter = pureDiagonal
    ? countDiagonalNeighbors
    : countOrthogonalNeighbors;

  if (combo.length === 5 && isLinearChain(combo, members, countNeighbors)) {
    return [findGeometricCenter(combo)];
  }

  const oddSize = combo.length % 2 === 1;
  if (oddSize) {
    return takeTopByNeighborCount(combo, members, countNeighbors, 1);
  }
  if (pureDiagonal) {
    return takeTopByNeighborCount(combo, members, countNeighbors, 2);
  }
  return combo.filter((p) => countOrthogonalNeighbors(p, members) >= 2);
}

/**
 * Exactly two endpoints with one neighbour each and every other member with
 * exactly two, under the given adjacency.
 */
export function isLinearChain(
  combo: readonly Position[],
  members: ReadonlySet<string>,
  countNeighbors: NeighborCounter
): boolean {
  let endpoints = 0;
  let middle = 0;

  for (const p of combo) {
    const neighbors = countNeighbors(p, members);
    if (neighbors === 1) {
      endpoints++;
    } else if (neighbors === 2) {
      middle++;
    } else {
      return false;
    }
  }

  return endpoints === 2 && middle === combo.length - 2;
}

/**
 * Member with the smallest summed Manhattan distance to all other members.
 */
export function findGeometricCenter(combo: readonly Position[]): Position {
  let center = combo[0];
  let best = Number.POSITIVE_INFINITY;

  for (const candidate of combo) {
    const total = combo.reduce((sum, other) => sum + manhattanDistance(candidate, other), 0);
    if (total < best) {
      best = total;
      center = candidate;
    }
  }

  return center;
}

function takeTopByNeighborCount(
  combo: readonly Position[],
  members: ReadonlySet<string>,
  countNeighbors: NeighborCounter,
  count: number
): Position[] {
  // Array.prototype.sort is stable, so equal counts keep combo order
  return combo
    .map((position) => ({ position, neighbors: countNeighbors(position, members) }))
    .sort((a, b) => b.neighbors - a.neighbors)
    .slice(0, count)
    .map((ranked) => ranked.position);
}
