/**
 * Test Fixtures and Utilities
 * Common board builders and position helpers for engine tests
 */

import { Board } from '../../src/shared/engine/Board';
import { Tile } from '../../src/shared/engine/Tile';
import { Position, comparePositions, positionToKey } from '../../src/shared/types/game';

/** [row, col, color, symbol] */
export type TilePlacement = [number, number, number, number];

/**
 * Position helper - creates a position object
 */
export function pos(row: number, col: number): Position {
  return { row, col };
}

/**
 * Creates a board with the given tiles placed in order.
 */
export function createTestBoard(placements: TilePlacement[]): Board {
  const board = new Board();
  for (const [row, col, color, symbol] of placements) {
    board.placeTile(pos(row, col), Tile.of(color, symbol));
  }
  return board;
}

/**
 * Blue placements cycling through symbols 2-6, none of which is royal for
 * blue, so up to five tiles share no symbol.
 */
export function blueBoard(positions: Array<[number, number]>): Board {
  return createTestBoard(positions.map(([row, col], i): TilePlacement => [row, col, 1, (i % 5) + 2]));
}

/** Order-independent string for a set of positions, e.g. "0,0|0,1|1,0". */
export function keyOf(positions: readonly Position[]): string {
  return [...positions].sort(comparePositions).map(positionToKey).join('|');
}

export function keysOf(clusters: readonly (readonly Position[])[]): string[] {
  return clusters.map(keyOf).sort();
}
