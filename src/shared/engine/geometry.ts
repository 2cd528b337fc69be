import { BoundingBox, Position, positionToKey } from '../types/game';

export interface Direction {
  readonly dRow: number;
  readonly dCol: number;
}

// Up, down, left, right
export const ORTHOGONAL_DIRECTIONS: readonly Direction[] = [
  { dRow: -1, dCol: 0 },
  { dRow: 1, dCol: 0 },
  { dRow: 0, dCol: -1 },
  { dRow: 0, dCol: 1 },
];

export const DIAGONAL_DIRECTIONS: readonly Direction[] = [
  { dRow: -1, dCol: -1 },
  { dRow: -1, dCol: 1 },
  { dRow: 1, dCol: -1 },
  { dRow: 1, dCol: 1 },
];

/** All eight neighbours, row-major around the centre. */
export const ALL_DIRECTIONS: readonly Direction[] = [
  { dRow: -1, dCol: -1 },
  { dRow: -1, dCol: 0 },
  { dRow: -1, dCol: 1 },
  { dRow: 0, dCol: -1 },
  { dRow: 0, dCol: 1 },
  { dRow: 1, dCol: -1 },
  { dRow: 1, dCol: 0 },
  { dRow: 1, dCol: 1 },
];

export const step = (position: Position, direction: Direction): Position => ({
  row: position.row + direction.dRow,
  col: position.col + direction.dCol,
});

export const toKeySet = (positions: Iterable<Position>): Set<string> => {
  const keys = new Set<string>();
  for (const p of positions) {
    keys.add(positionToKey(p));
  }
  return keys;
};

function countNeighbors(
  position: Position,
  members: ReadonlySet<string>,
  directions: readonly Direction[]
): number {
  let count = 0;
  for (const direction of directions) {
    if (members.has(positionToKey(step(position, direction)))) {
      count++;
    }
  }
  return count;
}

export function countOrthogonalNeighbors(position: Position, members: ReadonlySet<string>): number {
  return countNeighbors(position, members, ORTHOGONAL_DIRECTIONS);
}

export function countDiagonalNeighbors(position: Position, members: ReadonlySet<string>): number {
  return countNeighbors(position, members, DIAGONAL_DIRECTIONS);
}

export type NeighborCounter = (position: Position, members: ReadonlySet<string>) => number;

/**
 * A cluster is pure-diagonal when no member touches another orthogonally.
 */
export function isPureDiagonal(positions: readonly Position[], members: ReadonlySet<string>): boolean {
  return positions.every((p) => countOrthogonalNeighbors(p, members) === 0);
}

export function computeBoundingBox(positions: Iterable<Position>): BoundingBox | undefined {
  let box: BoundingBox | undefined;
  for (const p of positions) {
    if (!box) {
      box = { minRow: p.row, maxRow: p.row, minCol: p.col, maxCol: p.col };
      continue;
    }
    box.minRow = Math.min(box.minRow, p.row);
    box.maxRow = Math.max(box.maxRow, p.row);
    box.minCol = Math.min(box.minCol, p.col);
    box.maxCol = Math.max(box.maxCol, p.col);
  }
  return box;
}

export function boxHeight(box: BoundingBox): number {
  return box.maxRow - box.minRow + 1;
}

export function boxWidth(box: BoundingBox): number {
  return box.maxCol - box.minCol + 1;
}

/** Bounding box grown to include one more position. */
export function extendBoundingBox(box: BoundingBox, position: Position): BoundingBox {
  return {
    minRow: Math.min(box.minRow, position.row),
    maxRow: Math.max(box.maxRow, position.row),
    minCol: Math.min(box.minCol, position.col),
    maxCol: Math.max(box.maxCol, position.col),
  };
}

/**
 * True when every position is reachable from the first through 8-directional
 * steps that stay inside the set. Empty and single-element sets are connected.
 */
export function isConnected(positions: readonly Position[]): boolean {
  if (positions.length <= 1) return true;

  const members = toKeySet(positions);
  const visited = new Set<string>([positionToKey(positions[0])]);
  const queue: Position[] = [positions[0]];

  while (queue.length > 0) {
    const current = queue.shift();
    if (!current) continue;

    for (const direction of ALL_DIRECTIONS) {
      const neighbor = step(current, direction);
      const key = positionToKey(neighbor);
      if (members.has(key) && !visited.has(key)) {
        visited.add(key);
        queue.push(neighbor);
      }
    }
  }

  return visited.size === members.size;
}

export function manhattanDistance(a: Position, b: Position): number {
  return Math.abs(a.row - b.row) + Math.abs(a.col - b.col);
}
