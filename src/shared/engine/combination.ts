import { Combination, Position, comparePositions, positionToKey, positionsEqual } from '../types/game';

/**
 * Build an immutable combination. Positions are stored in row-major order
 * so equal clusters compare and print the same way.
 */
export function createCombination(
  positions: readonly Position[],
  flippablePositions: readonly Position[]
): Combination {
  return Object.freeze({
    positions: Object.freeze([...positions].sort(comparePositions)),
    flippablePositions: Object.freeze([...flippablePositions]),
  });
}

/** Order-independent key for a set of positions. */
export function combinationKey(positions: readonly Position[]): string {
  return [...positions]
    .sort(comparePositions)
    .map(positionToKey)
    .join('|');
}

export function isFlippable(combo: Combination, position: Position): boolean {
  return combo.flippablePositions.some((p) => positionsEqual(p, position));
}
