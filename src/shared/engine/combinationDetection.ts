import { config } from '../config';
import {
  Combination,
  MAX_COMBINATION_SIZE,
  MIN_COMBINATION_SIZE,
  Position,
  TileAttribute,
  comparePositions,
  positionToKey,
} from '../types/game';
import { componentLogger } from '../utils/logger';
import { Board } from './Board';
import { combinationKey, createCombination } from './combination';
import { getFlippablePositions } from './flippableSelection';
import {
  ALL_DIRECTIONS,
  boxHeight,
  boxWidth,
  computeBoundingBox,
  countDiagonalNeighbors,
  countOrthogonalNeighbors,
  isConnected,
  isPureDiagonal,
  step,
  toKeySet,
} from './geometry';

const log = componentLogger('CombinationFinder');

const MIN_COMPACTNESS = 0.5;

/**
 * Detect every valid same-color cluster of 3-5 unflipped tiles.
 *
 * Connected same-color groups of any size are found first; every connected
 * 3-, 4- and 5-tile subset of a group is then checked against the shape
 * rules, so a group of seven yields several candidate clusters.
 */
export function findCombinationsByColor(board: Board): Position[][] {
  return findCombinationsByAttribute(board, 'color');
}

/** Same as {@link findCombinationsByColor}, grouping by symbol. */
export function findCombinationsBySymbol(board: Board): Position[][] {
  return findCombinationsByAttribute(board, 'symbol');
}

export function findCombinationsByAttribute(board: Board, attribute: TileAttribute): Position[][] {
  const accepted: Position[][] = [];
  const acceptedKeys = new Set<string>();
  const visited = new Set<string>();
  let groupCount = 0;

  for (const start of board.positionsRowMajor()) {
    const startTile = board.getTile(start);
    if (!startTile || startTile.flipped || visited.has(positionToKey(start))) {
      continue;
    }

    const group = findConnectedGroup(board, start, attribute);
    for (const p of group) {
      visited.add(positionToKey(p));
    }
    if (group.length < MIN_COMBINATION_SIZE) {
      continue;
    }
    groupCount++;

    for (const subset of enumerateConnectedSubsets(group)) {
      const key = combinationKey(subset);
      if (acceptedKeys.has(key)) continue;

      const valid = isValidCombination(subset);
      if (config.diagnostics.traceCombinations) {
        log.debug('Candidate cluster', { attribute, positions: key, valid });
      }
      if (valid) {
        acceptedKeys.add(key);
        accepted.push(subset);
      }
    }
  }

  log.debug('Combination search finished', {
    attribute,
    groups: groupCount,
    combinations: accepted.length,
  });

  return accepted;
}

/**
 * Combinations by color, each with its flippable positions. Clusters without
 * any flippable tile are dropped.
 */
export function findByColor(board: Board): Combination[] {
  return toCombinations(findCombinationsByColor(board));
}

export function findBySymbol(board: Board): Combination[] {
  return toCombinations(findCombinationsBySymbol(board));
}

/** Color pass first, then symbol pass. */
export function findAllCombinations(board: Board): Combination[] {
  return [...findByColor(board), ...findBySymbol(board)];
}

function toCombinations(clusters: Position[][]): Combination[] {
  const result: Combination[] = [];
  for (const positions of clusters) {
    const flippable = getFlippablePositions(positions);
    if (flippable.length > 0) {
      result.push(createCombination(positions, flippable));
    }
  }
  return result;
}

// =============================================================================
// Group search
// =============================================================================

/**
 * 8-directional depth-first fill from `start` over unflipped tiles sharing
 * the start tile's attribute value. Returns positions in discovery order;
 * empty when `start` is empty or flipped.
 */
export function findConnectedGroup(
  board: Board,
  start: Position,
  attribute: TileAttribute
): Position[] {
  const startTile = board.getTile(start);
  if (!startTile || startTile.flipped) {
    return [];
  }

  const reference = startTile.attributeValue(attribute);
  const group: Position[] = [];
  const visited = new Set<string>();
  const stack: Position[] = [start];

  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) continue;

    const key = positionToKey(current);
    if (visited.has(key)) continue;

    const tile = board.getTile(current);
    if (!tile || tile.flipped || tile.attributeValue(attribute) !== reference) {
      continue;
    }

    visited.add(key);
    group.push(current);

    // Reverse so the first direction is explored first
    for (let i = ALL_DIRECTIONS.length - 1; i >= 0; i--) {
      const neighbor = step(current, ALL_DIRECTIONS[i]);
      if (!visited.has(positionToKey(neighbor))) {
        stack.push(neighbor);
      }
    }
  }

  return group;
}

// =============================================================================
// Sub-cluster enumeration
// =============================================================================

/**
 * All k-element selections of `items`, preserving their order, produced with
 * an index vector instead of recursion.
 */
export function* kCombinations<T>(items: readonly T[], k: number): Generator<T[]> {
  const n = items.length;
  if (k <= 0 || k > n) return;

  const indices = Array.from({ length: k }, (_, i) => i);

  while (true) {
    yield indices.map((i) => items[i]);

    // Rightmost index that can still advance
    let i = k - 1;
    while (i >= 0 && indices[i] === n - k + i) {
      i--;
    }
    if (i < 0) return;

    indices[i]++;
    for (let j = i + 1; j < k; j++) {
      indices[j] = indices[j - 1] + 1;
    }
  }
}

/**
 * Every 8-connected subset of `group` with 3, 4 or 5 members, each in
 * row-major order, without duplicates.
 */
export function enumerateConnectedSubsets(group: readonly Position[]): Position[][] {
  const ordered = [...group].sort(comparePositions);
  const seen = new Set<string>();
  const subsets: Position[][] = [];
  const largest = Math.min(ordered.length, MAX_COMBINATION_SIZE);

  for (let size = MIN_COMBINATION_SIZE; size <= largest; size++) {
    for (const subset of kCombinations(ordered, size)) {
      if (!isConnected(subset)) continue;
      const key = combinationKey(subset);
      if (seen.has(key)) continue;
      seen.add(key);
      subsets.push(subset);
    }
  }

  return subsets;
}

// =============================================================================
// Shape rules
// =============================================================================

/**
 * Shape acceptance for a connected 3-5 tile cluster.
 *
 * Pure-diagonal clusters must be one straight diagonal. Mixed clusters need
 * an orthogonal neighbour for every member, must fit the size-specific
 * bounding-box limits, must fill at least half their bounding box, must
 * survive weak-member stripping unchanged, and three-tile bends must be a
 * proper L.
 */
export function isValidCombination(subset: readonly Position[]): boolean {
  const size = subset.length;
  if (size < MIN_COMBINATION_SIZE || size > MAX_COMBINATION_SIZE) {
    return false;
  }

  const members = toKeySet(subset);

  if (isPureDiagonal(subset, members)) {
    return isLinearDiagonalChain(subset);
  }

  if (subset.some((p) => countOrthogonalNeighbors(p, members) === 0)) {
    return false;
  }

  const box = computeBoundingBox(subset);
  if (!box) return false;
  const height = boxHeight(box);
  const width = boxWidth(box);

  if (size === 4 && height < 3 && width < 3) {
    return false;
  }

  if (size === 5) {
    const straightLine = (height === 1 && width === 5) || (height === 5 && width === 1);
    if (!straightLine) {
      if ((height === 4 && width >= 3) || (width === 4 && height >= 3)) {
        return false;
      }
      if (height > 4 || width > 4) {
        return false;
      }
    }
  }

  const compactness = calculateCompactness(subset);
  if (compactness < MIN_COMPACTNESS) {
    return false;
  }

  const stable = filterWeaklyConnected(subset);
  if (stable.length < MIN_COMBINATION_SIZE || stable.length !== size) {
    return false;
  }

  return size !== 3 || compactness >= 1 || isLShape(subset);
}

/**
 * Sorted by row then column, every step is the same unit diagonal.
 */
export function isLinearDiagonalChain(positions: readonly Position[]): boolean {
  if (positions.length < 2) return true;

  const sorted = [...positions].sort(comparePositions);
  const dRow = sorted[1].row - sorted[0].row;
  const dCol = sorted[1].col - sorted[0].col;
  if (Math.abs(dRow) !== 1 || Math.abs(dCol) !== 1) {
    return false;
  }

  for (let i = 1; i < sorted.length - 1; i++) {
    if (sorted[i + 1].row - sorted[i].row !== dRow || sorted[i + 1].col - sorted[i].col !== dCol) {
      return false;
    }
  }

  return true;
}

/** Members divided by bounding-box area; 0 for an empty set. */
export function calculateCompactness(positions: readonly Position[]): number {
  const box = computeBoundingBox(positions);
  if (!box) return 0;
  return positions.length / (boxHeight(box) * boxWidth(box));
}

/**
 * Repeatedly drop members with no orthogonal and exactly one diagonal
 * neighbour in the remaining set, until none is left to drop.
 */
export function filterWeaklyConnected(positions: readonly Position[]): Position[] {
  let remaining = [...positions];

  while (true) {
    const members = toKeySet(remaining);
    const kept = remaining.filter(
      (p) => countOrthogonalNeighbors(p, members) !== 0 || countDiagonalNeighbors(p, members) !== 1
    );
    if (kept.length === remaining.length) {
      return kept;
    }
    remaining = kept;
  }
}

/**
 * Three tiles bending around exactly one corner tile (two orthogonal
 * neighbours) and not sharing a single row or column.
 */
export function isLShape(positions: readonly Position[]): boolean {
  if (positions.length !== 3) return false;

  const members = toKeySet(positions);
  const corners = positions.filter((p) => countOrthogonalNeighbors(p, members) === 2);
  if (corners.length !== 1) return false;

  const sameRow = new Set(positions.map((p) => p.row)).size === 1;
  const sameCol = new Set(positions.map((p) => p.col)).size === 1;
  return !sameRow && !sameCol;
}
